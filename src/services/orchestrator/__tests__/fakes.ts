import { AnalysisError } from '../../../lib/errors/analysis-error.js';
import { err, ok, type Result } from '../../../lib/result.js';
import type { AnalysisCacheDiagnostics, AnalysisOutcome, AnalysisResult, AnalyzableReview } from '../../analysis/analysis.types.js';
import type { ReviewBundle, ReviewCacheDiagnostics } from '../../reviews/review.types.js';
import type { ReviewAnalyzer, ReviewSource } from '../analysis.types.js';

/** A promise the test resolves by hand. */
export class Gate {
  private release: (() => void) | undefined;
  readonly opened: Promise<void>;

  constructor() {
    this.opened = new Promise(resolve => {
      this.release = resolve;
    });
  }

  open(): void {
    this.release?.();
  }
}

export function bundle(overrides: Partial<ReviewBundle> = {}): ReviewBundle {
  return {
    placeId: 'place-1',
    placeName: 'Test Bistro',
    aggregateRating: 4.4,
    totalRatingCount: 120,
    reviews: [
      { text: 'Fresh pasta and kind staff', rating: 5, author: 'A', submittedAt: 2, relativeTimeDescription: '', language: 'en' },
      { text: 'Slow service on a Friday', rating: 3, author: 'B', submittedAt: 1, relativeTimeDescription: '', language: 'en' },
    ],
    fetchedAt: 0,
    fromCache: false,
    ...overrides,
  };
}

export const sampleAnalysis: AnalysisResult = {
  cuisineType: 'Italian',
  ambience: 'Cozy',
  highlights: ['Fresh pasta', 'Kind staff'],
  complaints: [],
  overallSentiment: 'Positive',
  priceRange: '$$ - Moderate',
  bestDishes: ['Lasagna', 'Tiramisu'],
  serviceQuality: 'Attentive',
  usedFallback: false,
};

const reviewDiagnostics: ReviewCacheDiagnostics = {
  cachedPlaces: 1,
  cachedReviews: 2,
  expiredEntries: 0,
  cacheFileExists: true,
  cacheFile: 'cache/review_cache.json',
};

const analysisDiagnostics: AnalysisCacheDiagnostics = {
  cachedAnalyses: 1,
  fallbackEntries: 0,
  expiredEntries: 0,
  cacheFileExists: true,
  cacheFile: 'cache/analysis_cache.json',
};

export class FakeReviewSource implements ReviewSource {
  calls: Array<{ placeId: string; maxCount: number | undefined }> = [];
  cleared = 0;

  constructor(
    private readonly result: Result<ReviewBundle, AnalysisError> = ok(bundle()),
    private readonly gate?: Gate
  ) {}

  async getReviews(placeId: string, maxCount?: number): Promise<Result<ReviewBundle, AnalysisError>> {
    this.calls.push({ placeId, maxCount });
    if (this.gate) await this.gate.opened;
    return this.result;
  }

  clearCache(): boolean {
    this.cleared++;
    return true;
  }

  getCacheDiagnostics(): ReviewCacheDiagnostics {
    return reviewDiagnostics;
  }
}

export class FakeAnalyzer implements ReviewAnalyzer {
  names: string[] = [];

  constructor(private readonly outcome: Result<AnalysisOutcome, AnalysisError> | Error = ok({
    analysis: sampleAnalysis,
    fromCache: false,
    cacheKey: 'key-1',
    reviewCount: 2,
  })) {}

  async analyze(_reviews: readonly AnalyzableReview[], restaurantName = ''): Promise<Result<AnalysisOutcome, AnalysisError>> {
    this.names.push(restaurantName);
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }

  clearCache(): boolean {
    return true;
  }

  getCacheDiagnostics(): AnalysisCacheDiagnostics {
    return analysisDiagnostics;
  }
}

export function failure(code: AnalysisError['code'], message: string): Result<never, AnalysisError> {
  return err(new AnalysisError(code, message));
}
