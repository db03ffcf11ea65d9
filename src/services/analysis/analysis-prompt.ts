/**
 * Review Analysis Prompt
 *
 * The model answers with one JSON object; keys are snake_case and
 * cleaned by cleanModelAnalysis().
 */

import { createHash } from 'crypto';
import { MAX_REVIEWS_FOR_PROMPT, MIN_REVIEW_TEXT_LENGTH } from '../../config/index.js';
import type { AnalyzableReview } from './analysis.types.js';

export const REVIEW_ANALYSIS_PROMPT_VERSION = 'review_analysis_v1';

export const REVIEW_ANALYSIS_INSTRUCTIONS = `You analyze customer reviews of a restaurant.

Output ONLY JSON with ALL fields:
{
  "cuisine_type": string,
  "ambience": string,
  "highlights": string[],
  "complaints": string[],
  "overall_sentiment": string,
  "price_range": string,
  "best_dishes": string[],
  "service_quality": string
}

RULES:
1. highlights: at most 5 short phrases, most frequent first
2. complaints: at most 4 short phrases, most frequent first
3. best_dishes: at most 3 dish names mentioned positively
4. overall_sentiment: one of "Very positive", "Positive", "Mixed", "Mixed with concerns", "Negative"
5. price_range: e.g. "$ - Inexpensive", "$$ - Moderate", "$$$ - Expensive", or "Not mentioned"
6. Base every field on the reviews only; use "Not mentioned" when they say nothing`;

export const REVIEW_ANALYSIS_PROMPT_HASH = createHash('sha256')
  .update(REVIEW_ANALYSIS_INSTRUCTIONS, 'utf8')
  .digest('hex');

/**
 * "Review i (Rating: r/5): text" blocks for the leading reviews with at least
 * 10 characters of text. i is the review's position in the input (1-based); line breaks and runs of
 * whitespace become single spaces.
 */
export function formatReviewsForPrompt(reviews: readonly AnalyzableReview[]): string {
  return reviews
    .map((review, index) => ({ index: index + 1, rating: review.rating, text: review.text.trim() }))
    .filter(r => r.text.length >= MIN_REVIEW_TEXT_LENGTH)
    .slice(0, MAX_REVIEWS_FOR_PROMPT)
    .map(r => `Review ${r.index} (Rating: ${r.rating}/5): ${r.text.replace(/\s+/g, ' ')}`)
    .join('\n\n');
}

/**
 * Full prompt, or null when no review has usable text.
 */
export function buildAnalysisPrompt(reviews: readonly AnalyzableReview[], restaurantName: string): string | null {
  const reviewsText = formatReviewsForPrompt(reviews);
  if (!reviewsText) return null;

  const name = restaurantName.trim();
  const context = name ? `Restaurant: ${name}\n\n` : '';
  return `${REVIEW_ANALYSIS_INSTRUCTIONS}\n\n${context}Reviews:\n\n${reviewsText}`;
}
