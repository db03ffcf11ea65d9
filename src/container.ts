/**
 * Composition root: every service is built once here and passed down.
 */

import { getConfigStatus, type AppConfig } from './config/env.js';
import { logger as rootLogger, type Logger } from './lib/logger/structured-logger.js';
import { GenerativeClient } from './llm/generative.client.js';
import { loadFallbackLexicon } from './services/analysis/fallback-analyzer.js';
import { SummaryStore } from './services/analysis/summary.store.js';
import { GoogleMapsClient } from './services/places/google-maps.client.js';
import { RestaurantSearchService } from './services/places/restaurant-search.service.js';
import { ReviewStore } from './services/reviews/review.store.js';
import { AnalysisJobService } from './services/orchestrator/analysis-job.service.js';
import { InMemoryAnalysisJobStore } from './services/orchestrator/analysis-job.store.js';
import { AnalysisOrchestrator } from './services/orchestrator/analysis.orchestrator.js';
import type { ConnectionChecker } from './controllers/health.controller.js';

export interface AppServices {
  config: AppConfig;
  search: RestaurantSearchService;
  orchestrator: AnalysisOrchestrator;
  jobs: AnalysisJobService;
  jobStore: InMemoryAnalysisJobStore;
  generative: ConnectionChecker | null;
}

export function createServices(config: AppConfig, logger: Logger = rootLogger): AppServices {
  const status = getConfigStatus(config);
  for (const warning of status.warnings) {
    logger.warn({ warning }, '[Config] Warning');
  }

  const maps = new GoogleMapsClient({ apiKey: config.googleMapsApiKey, logger });

  const generative = status.generativeEnabled
    ? new GenerativeClient({
        apiKey: config.geminiApiKey,
        maxRetries: config.maxRetries,
        primaryModel: config.geminiModel,
        logger,
      })
    : null;

  const reviews = new ReviewStore({
    provider: maps,
    cacheDir: config.cacheDir,
    ttlSeconds: config.reviewCacheTtlSeconds,
    maxRetries: config.maxRetries,
    maxReviewCount: config.maxReviewCount,
    logger,
  });

  const summaries = new SummaryStore({
    generative,
    cacheDir: config.cacheDir,
    ttl: {
      analysisTtlSeconds: config.analysisCacheTtlSeconds,
      fallbackTtlSeconds: config.fallbackAnalysisCacheTtlSeconds,
    },
    lexicon: loadFallbackLexicon(),
    logger,
  });

  const orchestrator = new AnalysisOrchestrator({
    reviews,
    analyzer: summaries,
    defaultReviewCount: config.defaultReviewCount,
    logger,
  });

  const jobStore = new InMemoryAnalysisJobStore({ logger });

  logger.info({
    googleMapsConfigured: status.googleMapsConfigured,
    generativeEnabled: status.generativeEnabled,
    cacheDir: config.cacheDir,
  }, '[Container] Services initialized');

  return {
    config,
    search: new RestaurantSearchService(maps, logger),
    orchestrator,
    jobs: new AnalysisJobService(orchestrator, jobStore, logger),
    jobStore,
    generative,
  };
}
