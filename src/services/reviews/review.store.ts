/**
 * Review Store
 * Fetches reviews for a place through the mapping provider and keeps them
 * in a file-backed cache keyed by place id.
 *
 * - Reviews with trimmed text of 10 characters or fewer are dropped
 * - The full filtered list is cached; callers get it truncated to maxCount
 * - An empty result is never cached
 * - Transport and HTTP failures are retried with 2^attempt s backoff;
 *   provider statuses (NOT_FOUND, INVALID_REQUEST, ...) are not
 */

import path from 'path';
import {
  MAX_REVIEW_COUNT,
  MIN_REVIEW_TEXT_LENGTH,
  REVIEW_DETAIL_FIELDS,
  BACKOFF_BASE_MS,
} from '../../config/index.js';
import { JsonFileCache } from '../../lib/cache/json-file-cache.js';
import { AnalysisError, describeError } from '../../lib/errors/analysis-error.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger/structured-logger.js';
import { exponentialSchedule, retryWithBackoff } from '../../lib/reliability/retry-handler.js';
import type { Sleep } from '../../lib/reliability/timeout-guard.js';
import { err, ok, type Result } from '../../lib/result.js';
import { isFetchError } from '../../utils/fetch-with-timeout.js';
import { PlacesApiError, type PlaceDetailsProvider } from '../places/google-maps.client.js';
import type { PlaceDetailsResult, RawReview } from '../places/places.schemas.js';
import {
  CachedReviewsSchema,
  type CachedReviews,
  type Review,
  type ReviewBundle,
  type ReviewCacheDiagnostics,
} from './review.types.js';

export const REVIEW_CACHE_FILE = 'review_cache.json';

export interface ReviewStoreOptions {
  provider: PlaceDetailsProvider;
  cacheDir: string;
  ttlSeconds: number;
  maxRetries: number;
  /** Upper bound for maxCount; never above MAX_REVIEW_COUNT */
  maxReviewCount?: number;
  now?: () => number;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Keep reviews with meaningful text, newest first.
 */
export function normalizeReviews(raw: readonly RawReview[]): Review[] {
  return raw
    .map(r => ({
      text: (r.text ?? '').trim(),
      rating: r.rating ?? 0,
      author: r.author_name ?? 'Anonymous',
      submittedAt: r.time ?? 0,
      relativeTimeDescription: r.relative_time_description ?? '',
      language: r.language ?? 'en',
    }))
    .filter(r => r.text.length > MIN_REVIEW_TEXT_LENGTH)
    .sort((a, b) => b.submittedAt - a.submittedAt);
}

function isRetryableFetchError(error: unknown): boolean {
  if (isFetchError(error)) return true;
  return error instanceof PlacesApiError && error.retryable;
}

export class ReviewStore {
  private readonly cache: JsonFileCache<CachedReviews>;
  private readonly logger: Logger;
  private readonly maxReviewCount: number;

  constructor(private readonly options: ReviewStoreOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.maxReviewCount = Math.min(options.maxReviewCount ?? MAX_REVIEW_COUNT, MAX_REVIEW_COUNT);
    this.cache = new JsonFileCache({
      filePath: path.join(options.cacheDir, REVIEW_CACHE_FILE),
      name: 'reviews',
      schema: CachedReviewsSchema,
      ...(options.now && { now: options.now }),
      logger: this.logger,
    });
  }

  private get ttlMs(): number {
    return this.options.ttlSeconds * 1000;
  }

  async getReviews(placeId: string, maxCount: number = this.maxReviewCount): Promise<Result<ReviewBundle, AnalysisError>> {
    const id = placeId.trim();
    if (!id) {
      return err(new AnalysisError('INVALID_INPUT', 'Place id must not be empty'));
    }

    const limit = Math.min(Math.max(Math.trunc(maxCount) || 1, 1), this.maxReviewCount);

    const cached = this.cache.get(id, this.ttlMs);
    if (cached) {
      this.logger.info({ placeId: id, reviews: cached.value.reviews.length }, '[Reviews] Cache hit');
      return ok(this.toBundle(id, cached.value, cached.cachedAt, limit, true));
    }

    this.logger.info({ placeId: id }, '[Reviews] Cache miss, fetching from provider');

    let details: PlaceDetailsResult;
    try {
      details = await retryWithBackoff({
        fn: () => this.options.provider.placeDetails(id, REVIEW_DETAIL_FIELDS),
        isRetryable: isRetryableFetchError,
        maxAttempts: this.options.maxRetries,
        backoffMs: exponentialSchedule(this.options.maxRetries, BACKOFF_BASE_MS),
        onRetry: (error, attempt, nextDelay) => {
          this.logger.warn({ placeId: id, attempt: attempt + 1, nextDelayMs: nextDelay, error: describeError(error) },
            '[Reviews] Fetch attempt failed, retrying');
        },
        ...(this.options.sleep && { sleep: this.options.sleep }),
      });
    } catch (error) {
      this.logger.error({ placeId: id, error: describeError(error) }, '[Reviews] Fetch failed');
      return err(new AnalysisError('FETCH_FAILED', `Failed to fetch reviews: ${describeError(error)}`, {
        cause: error,
        details: { placeId: id },
      }));
    }

    const reviews = normalizeReviews(details.reviews ?? []);
    if (reviews.length === 0) {
      this.logger.warn({ placeId: id, raw: details.reviews?.length ?? 0 }, '[Reviews] No usable reviews');
      return err(new AnalysisError('NO_REVIEWS', 'No reviews found for this restaurant', { details: { placeId: id } }));
    }

    const entry = this.cache.set(id, {
      placeName: details.name ?? 'Unknown',
      aggregateRating: details.rating ?? 0,
      totalRatingCount: details.user_ratings_total ?? 0,
      reviews,
    });

    this.logger.info({ placeId: id, reviews: reviews.length }, '[Reviews] Fetched and cached');
    return ok(this.toBundle(id, entry.value, entry.cachedAt, limit, false));
  }

  /**
   * Remove one place, or everything when placeId is omitted.
   * Returns false only if the cache file could not be written.
   */
  clearCache(placeId?: string): boolean {
    const cleared = placeId === undefined ? this.cache.clear() : this.cache.delete(placeId);
    this.logger.info({ placeId: placeId ?? 'all', cleared }, '[Reviews] Cache cleared');
    return cleared;
  }

  getCacheDiagnostics(): ReviewCacheDiagnostics {
    const diagnostics = this.cache.diagnostics(this.ttlMs);
    return {
      cachedPlaces: diagnostics.entries,
      cachedReviews: this.cache.values().reduce((sum, e) => sum + e.value.reviews.length, 0),
      expiredEntries: diagnostics.expiredEntries,
      cacheFileExists: diagnostics.fileExists,
      cacheFile: this.cache.filePath,
    };
  }

  private toBundle(placeId: string, value: CachedReviews, cachedAt: number, limit: number, fromCache: boolean): ReviewBundle {
    return {
      placeId,
      placeName: value.placeName,
      aggregateRating: value.aggregateRating,
      totalRatingCount: value.totalRatingCount,
      reviews: value.reviews.slice(0, limit),
      fetchedAt: cachedAt,
      fromCache,
    };
  }
}
