/**
 * In-Memory Analysis Job Store
 * Background analysis jobs polled by HTTP clients, with TTL-based cleanup.
 *
 * Terminal jobs (completed, error, cancelled) are removed the first time
 * their final state is read.
 */

import { ANALYSIS_JOB_TTL_MS } from '../../config/index.js';
import type { AnalysisError, AnalysisErrorCode, AnalysisStage } from '../../lib/errors/analysis-error.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger/structured-logger.js';
import type { AnalysisEvent, CombinedResult } from './analysis.types.js';

export type AnalysisJobStatus = 'starting' | 'running' | 'completed' | 'error' | 'cancelled';

export interface AnalysisJob {
  jobId: string;
  placeId: string;
  restaurantName: string;
  status: AnalysisJobStatus;
  progress: number;
  message: string;
  result?: CombinedResult;
  error?: { code: AnalysisErrorCode; message: string; stage?: AnalysisStage };
  createdAt: number;
  updatedAt: number;
}

const TERMINAL: ReadonlySet<AnalysisJobStatus> = new Set(['completed', 'error', 'cancelled']);

export function isTerminal(status: AnalysisJobStatus): boolean {
  return TERMINAL.has(status);
}

export interface AnalysisJobStoreOptions {
  ttlMs?: number;
  /** 0 disables the background sweep */
  sweepIntervalMs?: number;
  now?: () => number;
  logger?: Logger;
}

export class InMemoryAnalysisJobStore {
  private jobs = new Map<string, AnalysisJob>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly timer: NodeJS.Timeout | undefined;

  constructor(options: AnalysisJobStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? ANALYSIS_JOB_TTL_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;

    const interval = options.sweepIntervalMs ?? 60_000;
    this.timer = interval > 0 ? setInterval(() => this.sweep(), interval) : undefined;
    this.timer?.unref();
  }

  create(jobId: string, params: { placeId: string; restaurantName: string }): AnalysisJob {
    const now = this.now();
    const job: AnalysisJob = {
      jobId,
      placeId: params.placeId,
      restaurantName: params.restaurantName,
      status: 'starting',
      progress: 0,
      message: 'Initializing analysis...',
      createdAt: now,
      updatedAt: now,
    };
    this.jobs.set(jobId, job);
    this.logger.info({ jobId, placeId: params.placeId }, '[JobStore] Job created');
    return job;
  }

  /**
   * Folds an orchestrator event into the job. Progress never decreases.
   */
  applyEvent(jobId: string, event: AnalysisEvent): void {
    const job = this.jobs.get(jobId);
    if (!job || isTerminal(job.status)) return;

    switch (event.type) {
      case 'progress':
        job.status = 'running';
        job.progress = Math.max(job.progress, event.percent);
        job.message = event.message;
        break;
      case 'completed':
        job.status = 'completed';
        job.progress = 100;
        job.message = 'Analysis completed';
        job.result = event.result;
        break;
      case 'failed':
        this.fail(job, event.error);
        break;
    }
    job.updatedAt = this.now();
  }

  setError(jobId: string, error: AnalysisError): void {
    const job = this.jobs.get(jobId);
    if (!job || isTerminal(job.status)) return;
    this.fail(job, error);
    job.updatedAt = this.now();
  }

  /** Returns false for unknown or already finished jobs. */
  cancel(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job || isTerminal(job.status)) return false;

    job.status = 'cancelled';
    job.message = 'Analysis cancelled';
    job.updatedAt = this.now();
    this.logger.info({ jobId }, '[JobStore] Job cancelled');
    return true;
  }

  get(jobId: string): AnalysisJob | undefined {
    return this.jobs.get(jobId);
  }

  /**
   * Current state of the job; a terminal job is removed by this read.
   */
  read(jobId: string): AnalysisJob | undefined {
    const job = this.jobs.get(jobId);
    if (job && isTerminal(job.status)) {
      this.jobs.delete(jobId);
      this.logger.debug({ jobId, status: job.status }, '[JobStore] Terminal job delivered and removed');
    }
    return job ? { ...job } : undefined;
  }

  delete(jobId: string): boolean {
    return this.jobs.delete(jobId);
  }

  activeCount(): number {
    let count = 0;
    for (const job of this.jobs.values()) {
      if (!isTerminal(job.status)) count++;
    }
    return count;
  }

  /** Removes jobs not updated within the TTL; returns how many. */
  sweep(): number {
    const cutoff = this.now() - this.ttlMs;
    let removed = 0;
    for (const [jobId, job] of this.jobs) {
      if (job.updatedAt < cutoff) {
        this.jobs.delete(jobId);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.info({ removed, remaining: this.jobs.size }, '[JobStore] Swept stale jobs');
    }
    return removed;
  }

  shutdown(): void {
    if (this.timer) clearInterval(this.timer);
    this.jobs.clear();
  }

  private fail(job: AnalysisJob, error: AnalysisError): void {
    job.status = 'error';
    job.message = `Error: ${error.message}`;
    job.error = {
      code: error.code,
      message: error.message,
      ...(error.stage && { stage: error.stage }),
    };
  }
}
