/**
 * Analysis Job Service
 * Runs orchestrator analyses in the background and tracks them as jobs.
 */

import { v4 as uuidv4 } from 'uuid';
import type { AnalysisError } from '../../lib/errors/analysis-error.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger/structured-logger.js';
import { err, ok, type Result } from '../../lib/result.js';
import type { AnalysisOrchestrator } from './analysis.orchestrator.js';
import type { AnalysisJob, InMemoryAnalysisJobStore } from './analysis-job.store.js';

export interface StartAnalysisParams {
  placeId: string;
  restaurantName?: string | undefined;
  maxReviews?: number | undefined;
}

export class AnalysisJobService {
  private readonly cancels = new Map<string, () => boolean>();

  constructor(
    private readonly orchestrator: AnalysisOrchestrator,
    private readonly jobs: InMemoryAnalysisJobStore,
    private readonly logger: Logger = defaultLogger,
    private readonly createId: () => string = uuidv4
  ) {}

  start(params: StartAnalysisParams): Result<{ jobId: string }, AnalysisError> {
    const jobId = this.createId();
    // Created first: the first progress event fires before analyzeAsync returns
    this.jobs.create(jobId, { placeId: params.placeId, restaurantName: params.restaurantName ?? '' });

    const started = this.orchestrator.analyzeAsync({
      placeId: params.placeId,
      restaurantName: params.restaurantName,
      maxReviews: params.maxReviews,
      onEvent: event => this.jobs.applyEvent(jobId, event),
    });

    if (!started.ok) {
      this.jobs.delete(jobId);
      return err(started.error);
    }

    this.cancels.set(jobId, started.value.cancel);
    void started.value.done
      .then(result => {
        if (!result.ok && result.error.code !== 'CANCELLED') {
          this.jobs.setError(jobId, result.error);
        }
      })
      .catch((error: unknown) => {
        this.logger.error({ jobId, error }, '[AnalysisJobs] Background run rejected');
      })
      .finally(() => this.cancels.delete(jobId));

    this.logger.info({ jobId, placeId: params.placeId }, '[AnalysisJobs] Analysis started');
    return ok({ jobId });
  }

  /** Terminal jobs are removed by this read. */
  getStatus(jobId: string): AnalysisJob | undefined {
    return this.jobs.read(jobId);
  }

  cancel(jobId: string): boolean {
    if (!this.jobs.cancel(jobId)) return false;
    this.cancels.get(jobId)?.();
    this.cancels.delete(jobId);
    return true;
  }

  activeCount(): number {
    return this.jobs.activeCount();
  }
}
