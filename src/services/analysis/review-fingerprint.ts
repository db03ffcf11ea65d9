import { createHash } from 'crypto';
import { FINGERPRINT_REVIEW_COUNT, FINGERPRINT_TEXT_LENGTH } from '../../config/index.js';
import type { AnalyzableReview } from './analysis.types.js';

/**
 * Cache key for an analysis: SHA-256 over the (excerpt, rating) pairs of the
 * leading reviews. Whitespace is collapsed before the excerpt is cut, so a
 * re-fetch with reflowed text maps to the same key.
 */
export function reviewFingerprint(reviews: readonly AnalyzableReview[]): string {
  const signature = reviews
    .slice(0, FINGERPRINT_REVIEW_COUNT)
    .map(r => [r.text.replace(/\s+/g, ' ').trim().slice(0, FINGERPRINT_TEXT_LENGTH), r.rating]);

  return createHash('sha256').update(JSON.stringify(signature), 'utf8').digest('hex');
}
