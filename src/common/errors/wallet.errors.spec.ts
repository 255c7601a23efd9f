import { InsufficientFundsError, describeError, isWalletError } from './wallet.errors';

describe('wallet errors', () => {
  describe('describeError', () => {
    it('should use the message of an Error', () => {
      expect(describeError(new Error('disk full'))).toBe('disk full');
    });

    it('should use the message of an error-shaped object', () => {
      expect(describeError({ code: 'ENOENT', message: 'no such file' })).toBe('no such file');
    });

    it('should stringify anything else', () => {
      expect(describeError('boom')).toBe('boom');
      expect(describeError(42)).toBe('42');
    });
  });

  it('should carry the kind on domain errors', () => {
    const error = new InsufficientFundsError('USD', '1.00', '2.00');

    expect(isWalletError(error)).toBe(true);
    expect(error.kind).toBe('InsufficientFundsError');
    expect(error.message).toBe('Insufficient funds: available 1.00 USD, required 2.00 USD');
  });
});
