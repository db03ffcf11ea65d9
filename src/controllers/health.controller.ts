/**
 * Health Endpoints
 *
 * - /health: liveness plus configuration status (which keys are set, never their values)
 * - /health/generative: live check against the generative endpoint
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import { getConfigStatus, type AppConfig } from '../config/env.js';
import type { ConnectionCheck } from '../llm/generative.types.js';
import type { AnalysisJobService } from '../services/orchestrator/analysis-job.service.js';
import type { AnalysisOrchestrator } from '../services/orchestrator/analysis.orchestrator.js';

export interface ConnectionChecker {
  checkConnection(): Promise<ConnectionCheck>;
}

export interface HealthDeps {
  config: AppConfig;
  orchestrator: AnalysisOrchestrator;
  jobs: AnalysisJobService;
  /** null when generative analysis is disabled */
  generative: ConnectionChecker | null;
}

export function createHealthRouter(deps: HealthDeps): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'UP',
      timestamp: new Date().toISOString(),
      activeAnalyses: deps.jobs.activeCount(),
      isAnalyzing: deps.orchestrator.isAnalyzing,
      config: getConfigStatus(deps.config),
    });
  });

  router.get('/generative', async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!deps.generative) {
        res.json({ success: false, message: 'Generative analysis is disabled' });
        return;
      }

      const check = await deps.generative.checkConnection();
      req.log.info({ success: check.success, model: check.model }, '[Health] Generative check');
      res.status(check.success ? 200 : 503).json(check);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
