import { TimeoutError, withTimeout } from './timeout.util';

describe('withTimeout', () => {
  it('should resolve with the work result when it finishes in time', async () => {
    await expect(withTimeout('quick', 100, async () => 'done')).resolves.toBe('done');
  });

  it('should reject with TimeoutError and abort the signal when the work overruns', async () => {
    let seen: AbortSignal | undefined;
    const hung = withTimeout('slow call', 20, (signal) => {
      seen = signal;
      return new Promise<string>((_, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    });

    await expect(hung).rejects.toThrow(TimeoutError);
    await expect(hung).rejects.toThrow('slow call timed out after 20ms');
    expect(seen?.aborted).toBe(true);
  });

  it('should pass through the work error', async () => {
    await expect(
      withTimeout('failing', 100, async () => {
        throw new Error('upstream down');
      }),
    ).rejects.toThrow('upstream down');
  });
});
