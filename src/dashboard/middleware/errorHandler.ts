/**
 * Error handling middleware - maps optimizer errors to HTTP responses.
 * Body shape: { error, code, stage? } plus the error's own details.
 */

import { Request, Response, NextFunction } from 'express';
import { logger, serializeError } from '../../shared/logging/logger';
import {
  ExternalServiceError,
  ExtractionError,
  OptimizerError,
  PipelineError,
  ValidationError,
  statusOf
} from '../../optimizer/errors/types';

const log = logger.child({ component: 'dashboard' });

/**
 * Error raised by route handlers with an explicit status
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code: string = 'BAD_REQUEST'
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * HTTP status for an error; a PipelineError maps by the failure it wraps
 */
export function statusForError(err: unknown): number {
  if (err instanceof ApiError) return err.statusCode;
  if (err instanceof PipelineError) return statusForError(err.failure);
  if (err instanceof ValidationError) return 400;
  if (err instanceof ExtractionError) return 422;
  if (err instanceof ExternalServiceError) return 502;
  if (err instanceof OptimizerError) return 500;

  // body-parser errors carry their own 4xx status
  const status = statusOf(err);
  return status !== undefined && status >= 400 && status < 500 ? status : 500;
}

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const statusCode = statusForError(err);
  const context = {
    err: serializeError(err),
    method: req.method,
    path: req.path,
    statusCode
  };

  if (statusCode >= 500) {
    log.error(context, 'Request failed');
  } else {
    log.warn(context, 'Client error');
  }

  if (err instanceof OptimizerError) {
    res.status(statusCode).json(err.toErrorResponse());
    return;
  }
  if (err instanceof ApiError) {
    res.status(statusCode).json({ error: err.message, code: err.code });
    return;
  }
  if (statusCode < 500) {
    res.status(statusCode).json({
      error: err instanceof Error ? err.message : 'Bad request',
      code: 'BAD_REQUEST'
    });
    return;
  }
  res.status(500).json({ error: 'Internal Server Error', code: 'INTERNAL_ERROR' });
};

/**
 * Forward rejections of async route handlers to the error middleware
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
