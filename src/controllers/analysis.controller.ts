/**
 * Analysis Controller
 *
 * - POST /api/v1/analysis                      start a background analysis (202)
 * - GET  /api/v1/analysis/:analysisId          status, progress, result or error
 * - POST /api/v1/analysis/:analysisId/cancel   cancel a running analysis
 * - POST /api/v1/analysis/export               export a result as JSON or text
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import { createNotFoundError, createValidationError } from '../middleware/error.middleware.js';
import type { AnalysisJobService } from '../services/orchestrator/analysis-job.service.js';
import { exportAnalysis } from '../services/orchestrator/analysis-report.js';
import { ExportRequestSchema, StartAnalysisSchema, formatIssues } from './schemas.js';

export function createAnalysisRouter(jobs: AnalysisJobService): Router {
  const router = Router();

  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    const validation = StartAnalysisSchema.safeParse(req.body);
    if (!validation.success) {
      next(createValidationError('Invalid analysis request', formatIssues(validation.error)));
      return;
    }

    const started = jobs.start(validation.data);
    if (!started.ok) {
      next(started.error);
      return;
    }

    res.status(202).json({
      success: true,
      analysisId: started.value.jobId,
      message: 'Analysis started',
    });
  });

  // Registered before /:analysisId so "export" is never taken for an id
  router.post('/export', (req: Request, res: Response, next: NextFunction) => {
    const validation = ExportRequestSchema.safeParse(req.body);
    if (!validation.success) {
      next(createValidationError('Invalid export request', formatIssues(validation.error)));
      return;
    }

    const { analysisResult, format } = validation.data;
    res.json({
      success: true,
      format,
      data: exportAnalysis(analysisResult, format),
    });
  });

  router.get('/:analysisId', (req: Request, res: Response, next: NextFunction) => {
    const analysisId = req.params['analysisId'] ?? '';
    const job = jobs.getStatus(analysisId);
    if (!job) {
      next(createNotFoundError('Analysis not found'));
      return;
    }

    res.json({
      success: true,
      analysisId,
      status: job.status,
      progress: job.progress,
      message: job.message,
      ...(job.result && { result: job.result }),
      ...(job.error && { error: job.error }),
    });
  });

  router.post('/:analysisId/cancel', (req: Request, res: Response, next: NextFunction) => {
    const analysisId = req.params['analysisId'] ?? '';
    if (!jobs.cancel(analysisId)) {
      next(createNotFoundError('Analysis not found or already finished'));
      return;
    }

    req.log.info({ analysisId }, '[Analysis] Cancelled by client');
    res.json({ success: true, message: 'Analysis cancelled' });
  });

  return router;
}
