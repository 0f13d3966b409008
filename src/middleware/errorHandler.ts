import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, RateLimitedError } from '../utils/errors';
import { describeIssues } from './validate';

interface ErrorBody {
  success: false;
  error: { code: string; message: string; details?: string[] };
}

function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 11000;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  let status = 500;
  let body: ErrorBody = {
    success: false,
    error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
  };

  if (err instanceof AppError) {
    status = err.statusCode;
    body = { success: false, error: { code: err.code, message: err.message, details: err.details } };
    if (err instanceof RateLimitedError) {
      res.setHeader('Retry-After', Math.ceil(err.retryAfterMs / 1000).toString());
    }
  } else if (err instanceof ZodError) {
    status = 400;
    body = {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request',
        details: describeIssues(err),
      },
    };
  } else if (isDuplicateKeyError(err)) {
    status = 409;
    body = { success: false, error: { code: 'CONFLICT', message: 'Resource already exists' } };
  } else {
    console.error(`[Error] ${req.method} ${req.originalUrl}:`, err);
  }

  res.status(status).json(body);
}
