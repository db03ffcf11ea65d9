/**
 * Summary Store
 * Structured review analysis, cached under a fingerprint of the reviews.
 *
 * Path: cache → generative model → keyword fallback.
 * Model failures never fail the analysis; they are recorded as usedFallback.
 * Fallback entries expire on their own (shorter) TTL.
 */

import path from 'path';
import { getAnalysisTtlMs, isFresh, type AnalysisTtlPolicy } from '../../lib/cache/cache-policy.js';
import { JsonFileCache, type CacheEntry } from '../../lib/cache/json-file-cache.js';
import { AnalysisError, describeError } from '../../lib/errors/analysis-error.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger/structured-logger.js';
import { err, ok, type Result } from '../../lib/result.js';
import type { GenerativeRequester } from '../../llm/generative.client.js';
import { extractCandidateText, type GenerativeResponse } from '../../llm/generative.types.js';
import { buildAnalysisPrompt, REVIEW_ANALYSIS_PROMPT_HASH, REVIEW_ANALYSIS_PROMPT_VERSION } from './analysis-prompt.js';
import {
  cleanModelAnalysis,
  extractJsonObject,
  StoredAnalysisSchema,
  type AnalysisCacheDiagnostics,
  type AnalysisOutcome,
  type AnalysisResult,
  type AnalyzableReview,
  type StoredAnalysis,
} from './analysis.types.js';
import { analyzeWithKeywords, loadFallbackLexicon, type FallbackLexicon } from './fallback-analyzer.js';
import { reviewFingerprint } from './review-fingerprint.js';

export const ANALYSIS_CACHE_FILE = 'analysis_cache.json';

export interface SummaryStoreOptions {
  /** null disables the model; every analysis uses the fallback */
  generative: GenerativeRequester | null;
  cacheDir: string;
  ttl: AnalysisTtlPolicy;
  lexicon?: FallbackLexicon;
  now?: () => number;
  logger?: Logger;
}

export class SummaryStore {
  private readonly cache: JsonFileCache<StoredAnalysis>;
  private readonly lexicon: FallbackLexicon;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(private readonly options: SummaryStoreOptions) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;
    this.lexicon = options.lexicon ?? loadFallbackLexicon();
    this.cache = new JsonFileCache({
      filePath: path.join(options.cacheDir, ANALYSIS_CACHE_FILE),
      name: 'analysis',
      schema: StoredAnalysisSchema,
      now: this.now,
      logger: this.logger,
    });
  }

  get generativeEnabled(): boolean {
    return this.options.generative !== null;
  }

  async analyze(reviews: readonly AnalyzableReview[], restaurantName = ''): Promise<Result<AnalysisOutcome, AnalysisError>> {
    if (reviews.length === 0) {
      return err(new AnalysisError('INVALID_INPUT', 'No reviews provided for analysis'));
    }

    const cacheKey = reviewFingerprint(reviews);
    const cached = this.cache.peek(cacheKey);
    if (cached && isFresh(cached.cachedAt, this.ttlFor(cached), this.now())) {
      this.logger.info({ cacheKey, usedFallback: cached.value.analysis.usedFallback }, '[Summary] Cache hit');
      return ok({ analysis: cached.value.analysis, fromCache: true, cacheKey, reviewCount: reviews.length });
    }

    const prompt = buildAnalysisPrompt(reviews, restaurantName);
    if (!prompt) {
      return err(new AnalysisError('INVALID_INPUT', 'No valid review text found'));
    }

    const analysis = await this.summarize(prompt, reviews);
    this.cache.set(cacheKey, { analysis, reviewCount: reviews.length, restaurantName });

    this.logger.info({ cacheKey, reviews: reviews.length, usedFallback: analysis.usedFallback }, '[Summary] Analysis cached');
    return ok({ analysis, fromCache: false, cacheKey, reviewCount: reviews.length });
  }

  clearCache(cacheKey?: string): boolean {
    const cleared = cacheKey === undefined ? this.cache.clear() : this.cache.delete(cacheKey);
    this.logger.info({ cacheKey: cacheKey ?? 'all', cleared }, '[Summary] Cache cleared');
    return cleared;
  }

  getCacheDiagnostics(): AnalysisCacheDiagnostics {
    const diagnostics = this.cache.diagnostics(entry => this.ttlFor(entry));
    return {
      cachedAnalyses: diagnostics.entries,
      fallbackEntries: this.cache.values().filter(e => e.value.analysis.usedFallback).length,
      expiredEntries: diagnostics.expiredEntries,
      cacheFileExists: diagnostics.fileExists,
      cacheFile: this.cache.filePath,
    };
  }

  private ttlFor(entry: CacheEntry<StoredAnalysis>): number {
    return getAnalysisTtlMs(entry.value.analysis.usedFallback, this.options.ttl);
  }

  private async summarize(prompt: string, reviews: readonly AnalyzableReview[]): Promise<AnalysisResult> {
    const generative = this.options.generative;
    if (!generative) {
      this.logger.info({ reviews: reviews.length }, '[Summary] Generative analysis disabled, using fallback');
      return analyzeWithKeywords(reviews, this.lexicon);
    }

    this.logger.info({
      reviews: reviews.length,
      promptVersion: REVIEW_ANALYSIS_PROMPT_VERSION,
      promptHash: REVIEW_ANALYSIS_PROMPT_HASH.slice(0, 12),
    }, '[Summary] Requesting model analysis');

    let response: Result<GenerativeResponse, AnalysisError>;
    try {
      response = await generative.request(prompt);
    } catch (error) {
      this.logger.error({ error: describeError(error) }, '[Summary] Generative request threw, using fallback');
      return analyzeWithKeywords(reviews, this.lexicon);
    }

    if (!response.ok) {
      this.logger.warn({ code: response.error.code, details: response.error.details }, '[Summary] Model unavailable, using fallback');
      return analyzeWithKeywords(reviews, this.lexicon);
    }

    const text = extractCandidateText(response.value.body);
    const analysis = text === null ? null : cleanModelAnalysis(extractJsonObject(text));
    if (!analysis) {
      const failure = new AnalysisError('PARSE_FAILURE', 'Model response did not contain a usable JSON object', {
        details: { model: response.value.model, textLength: text?.length ?? 0 },
      });
      this.logger.warn({ code: failure.code, details: failure.details }, '[Summary] Unusable model output, using fallback');
      return analyzeWithKeywords(reviews, this.lexicon);
    }

    return analysis;
  }
}
