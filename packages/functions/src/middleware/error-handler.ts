import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { error as logError, warn } from 'firebase-functions/logger';
import type { ApiError } from '../shared.js';
import { AppError } from '../types/errors.js';

export {
  AppError,
  NotFoundError,
  UnprocessableError,
  UpstreamError,
} from '../types/errors.js';

const TAG = '[Error Handler]';

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Handle Zod validation errors
  if (err instanceof ZodError) {
    warn(`${TAG} validation failed`, { path: req.path, issues: err.errors });
    const response: ApiError = {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request data',
        details: err.errors,
      },
    };
    res.status(400).json(response);
    return;
  }

  // Handle known application errors
  if (err instanceof AppError) {
    const log = err.statusCode >= 500 ? logError : warn;
    log(`${TAG} ${err.code}`, { path: req.path, statusCode: err.statusCode, message: err.message });
    const response: ApiError = {
      success: false,
      error: {
        code: err.code,
        message: err.message,
        details: err.details,
      },
    };
    res.status(err.statusCode).json(response);
    return;
  }

  // Unknown errors
  logError(`${TAG} unhandled error`, { path: req.path, message: err.message, stack: err.stack });
  const response: ApiError = {
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
  };
  res.status(500).json(response);
}
