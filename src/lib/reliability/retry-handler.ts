/**
 * Retry Handler
 * Generic retry-with-backoff utility
 *
 * Supports:
 * - Configurable retry predicates (isRetryable)
 * - Array-based backoff schedules (e.g., [0, 1000, 2000])
 * - Retry callbacks for logging
 * - Zero-indexed attempt counter
 */

import { sleep as defaultSleep, exponentialDelay, type Sleep } from './timeout-guard.js';

export interface RetryConfig<T> {
  /**
   * Function to execute (will be retried on failure)
   */
  fn: (attempt: number) => Promise<T>;

  /**
   * Return true to retry, false to fail fast
   */
  isRetryable: (error: unknown, attempt: number) => boolean;

  /**
   * Maximum number of attempts (total, including initial)
   */
  maxAttempts: number;

  /**
   * backoffMs[attempt] is the delay BEFORE attempt.
   * [0, 1000, 2000] means no delay before attempt 0, 1s before attempt 1, 2s before attempt 2
   */
  backoffMs: number[];

  onRetry?: (error: unknown, attempt: number, nextDelay: number) => void;

  sleep?: Sleep;
}

/**
 * Execute function with retry and backoff
 *
 * @example
 * ```typescript
 * const details = await retryWithBackoff({
 *   fn: () => client.placeDetails(placeId, fields),
 *   isRetryable: (err) => !(err instanceof PlacesApiError),
 *   maxAttempts: 3,
 *   backoffMs: exponentialSchedule(3, 1000),
 *   onRetry: (err, attempt, delay) => logger.warn({ attempt, delay })
 * });
 * ```
 */
export async function retryWithBackoff<T>(config: RetryConfig<T>): Promise<T> {
  const { fn, isRetryable, maxAttempts, backoffMs, onRetry } = config;
  const wait = config.sleep ?? defaultSleep;
  let lastErr: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const delay = backoffMs[attempt] ?? 0;
    if (delay > 0) {
      await wait(delay);
    }

    try {
      return await fn(attempt);
    } catch (e) {
      lastErr = e;

      if (!isRetryable(e, attempt)) {
        throw e;
      }

      if (attempt === maxAttempts - 1) {
        throw e;
      }

      if (onRetry) {
        const nextDelay = backoffMs[attempt + 1] ?? 0;
        onRetry(e, attempt, nextDelay);
      }
    }
  }

  throw lastErr ?? new Error('All retry attempts exhausted');
}

/**
 * Backoff schedule where the wait before attempt n (n >= 1) is base * 2^(n-1),
 * i.e. a 2^attempt wait after each failed attempt.
 */
export function exponentialSchedule(maxAttempts: number, baseMs: number): number[] {
  return Array.from({ length: maxAttempts }, (_, attempt) =>
    attempt === 0 ? 0 : exponentialDelay(attempt - 1, baseMs)
  );
}
