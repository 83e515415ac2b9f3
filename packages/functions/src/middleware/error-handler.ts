import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { error as logError } from 'firebase-functions/logger';
import type { ApiError } from '../shared.js';
import { AppError } from '../types/errors.js';

// Re-export error classes so handler imports stay in one place
export { AppError, ConfigError } from '../types/errors.js';

/**
 * Body-parser failures carry an HTTP status and a `type` such as
 * 'entity.parse.failed'.
 */
function isClientHttpError(err: Error): err is Error & { status: number; type: string } {
  if (!('status' in err) || !('type' in err)) {
    return false;
  }
  const { status, type } = err;
  return typeof status === 'number' && status >= 400 && status < 500 && typeof type === 'string';
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Handle Zod validation errors
  if (err instanceof ZodError) {
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
    logError('Application error:', { code: err.code, message: err.message });
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

  // Malformed JSON and oversized bodies
  if (isClientHttpError(err)) {
    const response: ApiError = {
      success: false,
      error: {
        code: 'BAD_REQUEST',
        message: err.message,
      },
    };
    res.status(err.status).json(response);
    return;
  }

  // Unknown errors
  logError('Unhandled error:', err);
  const response: ApiError = {
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
  };
  res.status(500).json(response);
}
