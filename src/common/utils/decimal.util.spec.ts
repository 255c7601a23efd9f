import Decimal from 'decimal.js';
import { divide, roundToPrecision, toDecimal, toFixed, toNumber } from './decimal.util';

describe('decimal.util', () => {
  describe('roundToPrecision', () => {
    it('should round half to even', () => {
      expect(roundToPrecision(new Decimal('0.125'), 2).toString()).toBe('0.12');
      expect(roundToPrecision(new Decimal('0.135'), 2).toString()).toBe('0.14');
      expect(roundToPrecision(new Decimal('2.5'), 0).toString()).toBe('2');
      expect(roundToPrecision(new Decimal('3.5'), 0).toString()).toBe('4');
    });

    it('should price 0.05 BTC at 59337.21 to the cent', () => {
      const cost = roundToPrecision(new Decimal('0.05').times(59337.21), 2);
      expect(cost.toString()).toBe('2966.86');
    });

    it('should round a value below half a unit to zero', () => {
      expect(roundToPrecision(new Decimal('0.000000004'), 8).isZero()).toBe(true);
    });
  });

  describe('toNumber', () => {
    it('should round to 8 places by default', () => {
      expect(toNumber(new Decimal('0.123456789'))).toBe(0.12345679);
    });

    it('should honour explicit places', () => {
      expect(toNumber(new Decimal('33.145'), 2)).toBe(33.14);
    });
  });

  describe('toFixed', () => {
    it('should pad to the requested places', () => {
      expect(toFixed(new Decimal(0), 8)).toBe('0.00000000');
      expect(toFixed(33.1, 2)).toBe('33.10');
    });

    it('should not switch to exponent notation', () => {
      expect(toFixed(toDecimal('0.00000001'), 8)).toBe('0.00000001');
    });
  });

  describe('divide', () => {
    it('should divide exactly', () => {
      expect(divide(new Decimal(1), new Decimal(4)).toString()).toBe('0.25');
    });

    it('should throw on division by zero', () => {
      expect(() => divide(new Decimal(1), new Decimal(0))).toThrow('Division by zero');
    });
  });
});
