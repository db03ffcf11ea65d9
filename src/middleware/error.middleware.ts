/**
 * Centralized Error Middleware
 * Prevents leaking raw provider errors and stack traces to clients.
 * Every error answer is JSON: { success: false, error, code, traceId, stage? }.
 */

import type { Request, Response, NextFunction } from 'express';
import { AnalysisError, type AnalysisErrorCode, type AnalysisStage } from '../lib/errors/analysis-error.js';
import { logger } from '../lib/logger/structured-logger.js';

const isProd = process.env.NODE_ENV === 'production';

/**
 * Application Error - Structured error with metadata
 * Use this for all known error cases
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown,
    public readonly exposeMessage: boolean = false,
    public readonly stage?: AnalysisStage
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

interface ErrorResponse {
  success: false;
  error: string;
  code: string;
  traceId: string;
  stage?: AnalysisStage;
  details?: unknown;
  stack?: string;
}

const STATUS_BY_CODE: Partial<Record<AnalysisErrorCode, number>> = {
  INVALID_INPUT: 400,
  NO_REVIEWS: 404,
  ALREADY_IN_PROGRESS: 409,
  FETCH_FAILED: 502,
  REVIEW_FETCH_FAILED: 502,
};

/**
 * HTTP view of a pipeline error. Upstream failures keep their message internal.
 */
export function fromAnalysisError(error: AnalysisError): AppError {
  const statusCode = STATUS_BY_CODE[error.code] ?? 500;
  return new AppError(error.message, statusCode, error.code, error.details, statusCode < 500, error.stage);
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app (after all routes)
 *
 * Production mode: no stack traces, no details, generic messages unless exposeMessage.
 * Development mode: includes stack traces and details.
 */
export function errorMiddleware(
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    return next(err);
  }

  const appError = err instanceof AnalysisError ? fromAnalysisError(err)
    : isBodyParseError(err) ? createValidationError('Malformed JSON body')
    : err;
  const isAppError = appError instanceof AppError;

  const header = res.getHeader('x-trace-id');
  const traceId = req.traceId || (typeof header === 'string' ? header : 'unknown');
  const statusCode = isAppError ? appError.statusCode : 500;
  const code = isAppError ? appError.code : 'INTERNAL_ERROR';

  let clientMessage: string;
  if (isAppError && appError.exposeMessage) {
    clientMessage = appError.message;
  } else if (isAppError) {
    clientMessage = getGenericMessage(appError.statusCode);
  } else {
    clientMessage = isProd ? 'Internal server error' : err.message || 'Internal server error';
  }

  const logContext = {
    error: {
      name: err.name,
      message: err.message,
      stack: err.stack,
      code,
      statusCode,
    },
    traceId,
    method: req.method,
    path: req.path,
  };

  const log = req.log ?? logger;
  if (statusCode >= 500) {
    log.error(logContext, 'Request error');
  } else {
    log.warn(logContext, 'Request error');
  }

  const response: ErrorResponse = {
    success: false,
    error: clientMessage,
    code,
    traceId,
  };

  if (isAppError && appError.stage) {
    response.stage = appError.stage;
  }

  if (!isProd) {
    if (isAppError && appError.details) {
      response.details = appError.details;
    }
    if (err.stack) {
      response.stack = err.stack;
    }
  }

  res.status(statusCode).json(response);
}

/** express.json() rejects unparsable bodies with a SyntaxError carrying the raw body */
function isBodyParseError(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

/**
 * JSON 404 for unmatched routes
 */
export function notFoundMiddleware(req: Request, _res: Response, next: NextFunction): void {
  next(new AppError(`Route not found: ${req.method} ${req.path}`, 404, 'NOT_FOUND', undefined, true));
}

function getGenericMessage(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'Invalid request';
    case 404:
      return 'Not found';
    case 409:
      return 'Conflict';
    case 500:
      return 'Internal server error';
    case 502:
      return 'Upstream service error';
    case 503:
      return 'Service unavailable';
    default:
      return statusCode >= 500 ? 'Internal server error' : 'Bad request';
  }
}

export function createValidationError(message: string, details?: unknown): AppError {
  return new AppError(message, 400, 'VALIDATION_ERROR', details, true);
}

export function createNotFoundError(message: string): AppError {
  return new AppError(message, 404, 'NOT_FOUND', undefined, true);
}
