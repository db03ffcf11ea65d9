/**
 * Cache Policy (PURE)
 * TTL decisions for the review and analysis caches. No side effects, no IO.
 */

/**
 * An entry is valid while its age is strictly below the TTL.
 */
export function isFresh(cachedAt: number, ttlMs: number, now: number): boolean {
  return now - cachedAt < ttlMs;
}

export interface AnalysisTtlPolicy {
  analysisTtlSeconds: number;
  fallbackTtlSeconds: number;
}

/**
 * Fallback analyses expire on their own (shorter) schedule so the
 * generative model gets another chance once it is reachable again.
 */
export function getAnalysisTtlMs(usedFallback: boolean, policy: AnalysisTtlPolicy): number {
  return (usedFallback ? policy.fallbackTtlSeconds : policy.analysisTtlSeconds) * 1000;
}
