/**
 * Analysis Orchestrator
 * Runs review fetch → analysis → combined result for one place at a time.
 *
 * Session lifecycle: pending → fetchingReviews → analyzing → completed | failed.
 * - A second request while a run is active is rejected (ALREADY_IN_PROGRESS), never queued
 * - The busy flag is set synchronously and cleared when the run settles
 * - Runs never reject; every failure is an AnalysisError with a stage
 * - cancel() discards the session: later callbacks/events are dropped and the
 *   run's result becomes CANCELLED, but in-flight requests still finish
 */

import { v4 as uuidv4 } from 'uuid';
import { AnalysisError, describeError } from '../../lib/errors/analysis-error.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger/structured-logger.js';
import { err, ok, type Result } from '../../lib/result.js';
import type {
  AnalysisEvent,
  AnalysisHandle,
  AnalysisOutput,
  AnalysisRequest,
  AnalysisSession,
  CacheStatus,
  ClearCachesResult,
  CombinedResult,
  ReviewAnalyzer,
  ReviewSource,
  SessionStatus,
} from './analysis.types.js';

export interface AnalysisOrchestratorOptions {
  reviews: ReviewSource;
  analyzer: ReviewAnalyzer;
  defaultReviewCount: number;
  now?: () => number;
  createId?: () => string;
  logger?: Logger;
}

export class AnalysisOrchestrator {
  private analyzing = false;
  private session: AnalysisSession | null = null;
  private lastResult: CombinedResult | null = null;
  private readonly now: () => number;
  private readonly createId: () => string;
  private readonly logger: Logger;

  constructor(private readonly options: AnalysisOrchestratorOptions) {
    this.now = options.now ?? Date.now;
    this.createId = options.createId ?? uuidv4;
    this.logger = options.logger ?? defaultLogger;
  }

  get isAnalyzing(): boolean {
    return this.analyzing;
  }

  /** Snapshot of the active session, if any. */
  getSession(): AnalysisSession | null {
    return this.session ? { ...this.session } : null;
  }

  getLastResult(): CombinedResult | null {
    return this.lastResult;
  }

  analyze(request: AnalysisRequest): Promise<AnalysisOutput> {
    const started = this.start(request);
    return started.ok ? started.value.done : Promise.resolve(started);
  }

  /**
   * Starts a detached run. The busy check happens before this returns, so a
   * rejected request never touches the review source.
   */
  analyzeAsync(request: AnalysisRequest): Result<AnalysisHandle, AnalysisError> {
    const started = this.start(request);
    if (!started.ok) {
      this.notifyError(request, started.error);
      return started;
    }

    const { session, done } = started.value;
    const settled = done.then(result => {
      if (!result.ok && !session.cancelled) {
        this.notifyError(request, result.error);
      }
      return result;
    });

    return ok({
      sessionId: session.sessionId,
      done: settled,
      cancel: () => this.cancel(session.sessionId),
    });
  }

  cancel(sessionId?: string): boolean {
    const session = this.session;
    if (!session || (sessionId !== undefined && session.sessionId !== sessionId)) {
      return false;
    }

    session.cancelled = true;
    this.session = null;
    this.logger.info({ sessionId: session.sessionId, placeId: session.placeId }, '[Orchestrator] Session cancelled');
    return true;
  }

  getCacheStatus(): CacheStatus {
    return {
      reviews: this.options.reviews.getCacheDiagnostics(),
      analysis: this.options.analyzer.getCacheDiagnostics(),
      currentAnalysisAvailable: this.lastResult !== null,
      isAnalyzing: this.analyzing,
    };
  }

  clearAllCaches(): ClearCachesResult {
    const result = {
      reviewsCleared: this.options.reviews.clearCache(),
      analysisCleared: this.options.analyzer.clearCache(),
    };
    this.lastResult = null;
    this.logger.info(result, '[Orchestrator] All caches cleared');
    return result;
  }

  private start(request: AnalysisRequest): Result<{ session: AnalysisSession; done: Promise<AnalysisOutput> }, AnalysisError> {
    if (this.analyzing) {
      this.logger.warn({ placeId: request.placeId, activeSession: this.session?.sessionId }, '[Orchestrator] Analysis already in progress');
      return err(new AnalysisError('ALREADY_IN_PROGRESS', 'Analysis already in progress'));
    }

    this.analyzing = true;
    const session: AnalysisSession = {
      sessionId: this.createId(),
      placeId: request.placeId,
      status: 'pending',
      progressPercent: 0,
      lastMessage: '',
      startedAt: new Date(this.now()).toISOString(),
      cancelled: false,
    };
    this.session = session;

    const done = this.run(session, request).finally(() => {
      this.analyzing = false;
      if (this.session === session) {
        this.session = null;
      }
    });

    return ok({ session, done });
  }

  private async run(session: AnalysisSession, request: AnalysisRequest): Promise<AnalysisOutput> {
    const log = this.logger.child({ sessionId: session.sessionId, placeId: session.placeId });
    const result = await this.execute(session, request, log);

    if (session.cancelled) {
      log.info({ outcome: result.ok ? 'completed' : result.error.code }, '[Orchestrator] Cancelled run finished, result dropped');
      return err(new AnalysisError('CANCELLED', 'Analysis was cancelled'));
    }

    if (!result.ok) {
      session.status = 'failed';
      log.error({ code: result.error.code, stage: result.error.stage, error: result.error.message }, '[Orchestrator] Analysis failed');
      this.emit(session, request, { type: 'failed', sessionId: session.sessionId, error: result.error, stage: result.error.stage });
    }

    return result;
  }

  private async execute(session: AnalysisSession, request: AnalysisRequest, log: Logger): Promise<AnalysisOutput> {
    try {
      this.advance(session, request, 'fetchingReviews', 'Fetching restaurant reviews...', 10);
      log.info({ maxReviews: request.maxReviews ?? this.options.defaultReviewCount }, '[Orchestrator] Starting analysis');

      const reviews = await this.options.reviews.getReviews(
        request.placeId,
        request.maxReviews ?? this.options.defaultReviewCount
      );
      if (!reviews.ok) {
        return err(new AnalysisError('REVIEW_FETCH_FAILED', reviews.error.message, {
          stage: 'review_fetch',
          details: { reason: reviews.error.code },
          cause: reviews.error,
        }));
      }

      const bundle = reviews.value;
      const restaurantName = request.restaurantName?.trim() || bundle.placeName || 'Unknown Restaurant';

      this.advance(session, request, 'analyzing', `Analyzing ${bundle.reviews.length} reviews...`, 50);

      const analysis = await this.options.analyzer.analyze(bundle.reviews, restaurantName);
      if (!analysis.ok) {
        return err(new AnalysisError('ANALYSIS_FAILED', analysis.error.message, {
          stage: 'analysis',
          details: { reason: analysis.error.code },
          cause: analysis.error,
        }));
      }

      const combined: CombinedResult = {
        placeId: request.placeId,
        restaurantName,
        reviewMetadata: {
          totalReviews: bundle.reviews.length,
          overallRating: bundle.aggregateRating,
          totalRatings: bundle.totalRatingCount,
          fromCache: bundle.fromCache,
        },
        analysis: analysis.value.analysis,
        analysisFromCache: analysis.value.fromCache,
        timestamps: {
          startedAt: session.startedAt,
          completedAt: new Date(this.now()).toISOString(),
        },
      };

      this.advance(session, request, 'completed', 'Analysis complete!', 100);
      if (!session.cancelled) {
        this.lastResult = combined;
        request.onComplete?.(combined);
        this.emit(session, request, { type: 'completed', sessionId: session.sessionId, result: combined });
      }

      log.info({
        restaurantName,
        reviews: combined.reviewMetadata.totalReviews,
        usedFallback: combined.analysis.usedFallback,
        reviewsFromCache: bundle.fromCache,
        analysisFromCache: combined.analysisFromCache,
      }, '[Orchestrator] Analysis completed');

      return ok(combined);
    } catch (error) {
      return err(new AnalysisError('UNEXPECTED', `Unexpected error during analysis: ${describeError(error)}`, {
        stage: 'unexpected',
        cause: error,
      }));
    }
  }

  private advance(session: AnalysisSession, request: AnalysisRequest, status: SessionStatus, message: string, percent: number): void {
    session.status = status;
    session.progressPercent = percent;
    session.lastMessage = message;

    if (session.cancelled) return;
    request.onProgress?.(message, percent);
    this.emit(session, request, { type: 'progress', sessionId: session.sessionId, message, percent });
  }

  /** Event consumers cannot break a run; a throwing handler is logged. */
  private emit(session: AnalysisSession, request: AnalysisRequest, event: AnalysisEvent): void {
    if (session.cancelled || !request.onEvent) return;
    try {
      request.onEvent(event);
    } catch (handlerError) {
      this.logger.error({ event: event.type, error: describeError(handlerError) }, '[Orchestrator] onEvent handler threw');
    }
  }

  private notifyError(request: AnalysisRequest, error: AnalysisError): void {
    try {
      request.onError?.(error);
    } catch (callbackError) {
      this.logger.error({ error: describeError(callbackError) }, '[Orchestrator] onError callback threw');
    }
  }
}
