/**
 * Retry Utility
 * 
 * Bounded exponential backoff around any async operation.
 * Attempt n (1-based) that fails waits baseDelayMs * 2^(n-1) before attempt n+1.
 * When every attempt fails the last error is re-thrown as-is, so callers can
 * still inspect its type and message.
 */

import { sleep } from './sleep.js';
import { ValidationError } from '../errors/index.js';

export interface RetryOptions {
  /** Total number of attempts, including the first */
  maxRetries: number;
  baseDelayMs: number;
  /** Return false to give up immediately on a given error */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  /** Called before each backoff wait */
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Backoff before the attempt that follows a failed `attempt`
 */
export function backoffDelayMs(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Runs an operation with retry
 * 
 * @example
 * const html = await withRetry(() => fetchPage(url), { maxRetries: 3, baseDelayMs: 2000 });
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  if (!Number.isFinite(options.maxRetries)) {
    throw new ValidationError(`maxRetries must be a finite number, got ${options.maxRetries}`, 'maxRetries');
  }
  if (!Number.isFinite(options.baseDelayMs) || options.baseDelayMs < 0) {
    throw new ValidationError(`baseDelayMs must be a non-negative number, got ${options.baseDelayMs}`, 'baseDelayMs');
  }
  const attempts = Math.max(1, Math.floor(options.maxRetries));
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (attempt >= attempts) throw err;
      if (options.shouldRetry && !options.shouldRetry(err, attempt)) throw err;

      const delayMs = backoffDelayMs(options.baseDelayMs, attempt);
      options.onRetry?.(err, attempt, delayMs);
      await wait(delayMs);
    }
  }
}

/**
 * Decorates a function so that every call goes through withRetry
 */
export function retryable<A extends unknown[], T>(
  fn: (...args: A) => Promise<T>,
  options: RetryOptions
): (...args: A) => Promise<T> {
  return (...args: A) => withRetry(() => fn(...args), options);
}
