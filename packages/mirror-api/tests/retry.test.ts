import { describe, expect, it, vi } from 'vitest';
import { DEFAULT_RETRY, backoffDelay, withRetry } from '../src/utils/retry.js';
import { PermanentFetchError, TransientFetchError } from '../src/utils/errors.js';

const noSleep = async () => undefined;

describe('backoffDelay', () => {
  it('doubles from the base delay up to the cap', () => {
    expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(attempt, DEFAULT_RETRY))).toEqual([
      4000, 8000, 16000, 32000, 60000,
    ]);
  });
});

describe('withRetry', () => {
  const options = { attempts: 4, baseDelayMs: 100, maxDelayMs: 250 };

  it('returns the first success', async () => {
    const fn = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(new TransientFetchError('timeout'))
      .mockResolvedValueOnce('rows');
    const sleep = vi.fn(noSleep);

    await expect(withRetry(fn, { ...options, sleep })).resolves.toBe('rows');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(100);
  });

  it('rethrows the last transient error after the attempt cap', async () => {
    const error = new TransientFetchError('rate limited');
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(error);
    const onRetry = vi.fn();
    const sleep = vi.fn(noSleep);

    await expect(withRetry(fn, { ...options, sleep, onRetry })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls).toEqual([[100], [200], [250]]);
    expect(onRetry.mock.calls.map(([, attempt, delay]) => [attempt, delay])).toEqual([
      [1, 100],
      [2, 200],
      [3, 250],
    ]);
  });

  it('does not retry other errors', async () => {
    const error = new PermanentFetchError('bad params');
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(error);

    await expect(withRetry(fn, { ...options, sleep: noSleep })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('honours a custom retry predicate', async () => {
    const fn = vi.fn<[], Promise<number>>().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce(3);

    await expect(withRetry(fn, { ...options, sleep: noSleep, isRetryable: () => true })).resolves.toBe(3);
  });
});
