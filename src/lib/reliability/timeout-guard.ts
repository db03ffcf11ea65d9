/**
 * Delay helpers for backoff/retry logic.
 * Components take a `Sleep` so tests can record delays instead of waiting.
 */

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Exponential backoff: base * 2^attempt (attempt is zero-indexed). */
export function exponentialDelay(attempt: number, baseMs: number): number {
  return baseMs * 2 ** attempt;
}
