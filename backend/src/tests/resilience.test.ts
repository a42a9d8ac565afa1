import { afterEach, describe, expect, it, vi } from 'vitest';
import { TimeoutError, withRetry } from '../utils/resilience.js';

describe('withRetry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('retries transient failures and returns the first success', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const fn = vi
      .fn<(signal: AbortSignal, attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }))
      .mockResolvedValueOnce('ok');

    await expect(withRetry('test.op', fn, { maxRetries: 2, initialDelayMs: 1 })).resolves.toBe('ok');
    expect(fn.mock.calls.map(([, attempt]) => attempt)).toEqual([0, 1]);
  });

  it('does not retry errors outside the retryable list', async () => {
    const fn = vi.fn<(signal: AbortSignal) => Promise<string>>().mockRejectedValue(new Error('bad request'));

    await expect(withRetry('test.op', fn, { maxRetries: 3, initialDelayMs: 1 })).rejects.toThrow('bad request');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('aborts an attempt that exceeds the timeout', async () => {
    let aborted = false;
    const fn = (signal: AbortSignal) =>
      new Promise<string>((resolve) => {
        signal.addEventListener('abort', () => {
          aborted = true;
        });
        setTimeout(() => resolve('late'), 200);
      });

    await expect(withRetry('test.slow', fn, { maxRetries: 0, timeoutMs: 10 })).rejects.toBeInstanceOf(TimeoutError);
    expect(aborted).toBe(true);
  });
});
