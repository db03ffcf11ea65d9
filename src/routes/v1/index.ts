/**
 * API v1 Router Aggregator
 * Centralizes all v1 API routes under /api/v1
 *
 * Route Structure:
 * - /api/v1/restaurants/search          POST
 * - /api/v1/analysis                    POST (start), GET /:id, POST /:id/cancel, POST /export
 * - /api/v1/cache                       GET, DELETE
 * - /api/v1/health                      GET /, GET /generative
 */

import { Router } from 'express';
import type { AppServices } from '../../container.js';
import { createAnalysisRouter } from '../../controllers/analysis.controller.js';
import { createCacheRouter } from '../../controllers/cache.controller.js';
import { createHealthRouter } from '../../controllers/health.controller.js';
import { createRestaurantsRouter } from '../../controllers/restaurants.controller.js';

export function createV1Router(services: AppServices): Router {
  const router = Router();

  router.use('/restaurants', createRestaurantsRouter(services.search));
  router.use('/analysis', createAnalysisRouter(services.jobs));
  router.use('/cache', createCacheRouter(services.orchestrator));
  router.use('/health', createHealthRouter({
    config: services.config,
    orchestrator: services.orchestrator,
    jobs: services.jobs,
    generative: services.generative,
  }));

  return router;
}
