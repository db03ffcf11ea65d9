/**
 * Analysis Error
 * Error taxonomy shared by the review pipeline, the orchestrator and the HTTP layer.
 */

export type AnalysisErrorCode =
  | 'INVALID_INPUT'
  | 'FETCH_FAILED'
  | 'NO_REVIEWS'
  | 'GENERATIVE_UNAVAILABLE'
  | 'PARSE_FAILURE'
  | 'ALREADY_IN_PROGRESS'
  | 'REVIEW_FETCH_FAILED'
  | 'ANALYSIS_FAILED'
  | 'CANCELLED'
  | 'UNEXPECTED';

/** Where a terminal orchestration failure happened. */
export type AnalysisStage = 'review_fetch' | 'analysis' | 'unexpected';

export interface AnalysisErrorOptions {
  stage?: AnalysisStage | undefined;
  details?: Record<string, unknown> | undefined;
  cause?: unknown;
}

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;
  readonly stage: AnalysisStage | undefined;
  readonly details: Record<string, unknown> | undefined;

  constructor(code: AnalysisErrorCode, message: string, options: AnalysisErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AnalysisError';
    this.code = code;
    this.stage = options.stage;
    this.details = options.details;
  }

  /** JSON-safe shape for logs and API responses (no stack, no cause chain). */
  toJSON(): { code: AnalysisErrorCode; message: string; stage?: AnalysisStage; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      ...(this.stage && { stage: this.stage }),
      ...(this.details && { details: this.details }),
    };
  }
}

/** Message of any thrown value, for logging. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
