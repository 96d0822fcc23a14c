/**
 * Exponential backoff for provider calls
 */

import { TransientFetchError } from './errors.js';
import { sleep as defaultSleep } from '../services/rate-limit.js';
import type { Sleep } from '../services/rate-limit.js';
import type { Duration } from '../types/index.js';

export interface RetryOptions {
  /** Total attempts including the first */
  attempts: number;
  baseDelayMs: Duration;
  maxDelayMs: Duration;
  sleep?: Sleep;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: Duration) => void;
}

export const DEFAULT_RETRY: RetryOptions = {
  attempts: 5,
  baseDelayMs: 4000,
  maxDelayMs: 60000,
};

export function isTransient(error: unknown): boolean {
  return error instanceof TransientFetchError;
}

/**
 * Delay before retry number `attempt` (1-based): base * 2^(attempt-1), capped
 */
export function backoffDelay(attempt: number, options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs'>): Duration {
  return Math.min(options.baseDelayMs * 2 ** (attempt - 1), options.maxDelayMs);
}

/**
 * Run fn, retrying retryable failures. The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = DEFAULT_RETRY): Promise<T> {
  const isRetryable = options.isRetryable ?? isTransient;
  const sleep = options.sleep ?? defaultSleep;
  const attempts = Math.max(1, options.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= attempts || !isRetryable(err)) {
        throw err;
      }
      const delayMs = backoffDelay(attempt, options);
      options.onRetry?.(err, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
