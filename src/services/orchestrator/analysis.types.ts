import type { AnalysisError, AnalysisStage } from '../../lib/errors/analysis-error.js';
import type { Result } from '../../lib/result.js';
import type {
  AnalysisCacheDiagnostics,
  AnalysisOutcome,
  AnalysisResult,
  AnalyzableReview,
} from '../analysis/analysis.types.js';
import type { ReviewBundle, ReviewCacheDiagnostics } from '../reviews/review.types.js';

export type SessionStatus = 'pending' | 'fetchingReviews' | 'analyzing' | 'completed' | 'failed';

export interface AnalysisSession {
  sessionId: string;
  placeId: string;
  status: SessionStatus;
  progressPercent: number;
  lastMessage: string;
  startedAt: string;
  cancelled: boolean;
}

export interface CombinedResult {
  placeId: string;
  restaurantName: string;
  reviewMetadata: {
    totalReviews: number;
    overallRating: number;
    totalRatings: number;
    fromCache: boolean;
  };
  analysis: AnalysisResult;
  analysisFromCache: boolean;
  timestamps: {
    startedAt: string;
    completedAt: string;
  };
}

export type AnalysisEvent =
  | { type: 'progress'; sessionId: string; message: string; percent: number }
  | { type: 'completed'; sessionId: string; result: CombinedResult }
  | { type: 'failed'; sessionId: string; error: AnalysisError; stage: AnalysisStage | undefined };

export type AnalysisOutput = Result<CombinedResult, AnalysisError>;

export interface AnalysisRequest {
  placeId: string;
  /** Falls back to the name the review source reports */
  restaurantName?: string | undefined;
  maxReviews?: number | undefined;
  onProgress?: (message: string, percent: number) => void;
  onComplete?: (result: CombinedResult) => void;
  /** Background runs only */
  onError?: (error: AnalysisError) => void;
  onEvent?: (event: AnalysisEvent) => void;
}

export interface AnalysisHandle {
  sessionId: string;
  /** Settles with the run's result; CANCELLED after cancel() */
  done: Promise<AnalysisOutput>;
  /** Discards the session; false when it already ended or was cancelled */
  cancel(): boolean;
}

export interface ReviewSource {
  getReviews(placeId: string, maxCount?: number): Promise<Result<ReviewBundle, AnalysisError>>;
  clearCache(placeId?: string): boolean;
  getCacheDiagnostics(): ReviewCacheDiagnostics;
}

export interface ReviewAnalyzer {
  analyze(reviews: readonly AnalyzableReview[], restaurantName?: string): Promise<Result<AnalysisOutcome, AnalysisError>>;
  clearCache(cacheKey?: string): boolean;
  getCacheDiagnostics(): AnalysisCacheDiagnostics;
}

export interface CacheStatus {
  reviews: ReviewCacheDiagnostics;
  analysis: AnalysisCacheDiagnostics;
  currentAnalysisAvailable: boolean;
  isAnalyzing: boolean;
}

export interface ClearCachesResult {
  reviewsCleared: boolean;
  analysisCleared: boolean;
}
