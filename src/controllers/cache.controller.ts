/**
 * Cache Controller
 * GET /api/v1/cache (diagnostics), DELETE /api/v1/cache (clear both caches)
 */

import { Router, type Request, type Response } from 'express';
import type { AnalysisOrchestrator } from '../services/orchestrator/analysis.orchestrator.js';

export function createCacheRouter(orchestrator: AnalysisOrchestrator): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ success: true, cache: orchestrator.getCacheStatus() });
  });

  router.delete('/', (req: Request, res: Response) => {
    const result = orchestrator.clearAllCaches();
    const success = result.reviewsCleared && result.analysisCleared;
    req.log.info(result, '[Cache] Clear requested');
    res.status(success ? 200 : 500).json({ success, ...result });
  });

  return router;
}
