/**
 * Global error handler for Express.
 * Sanitizes every error before it reaches the client: the response body is
 * `{ errorCode }` and nothing else.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { isApiError } from './apiError';
import { ValidationError } from '../../engine/records/errors';

/**
 * Must be registered LAST in the middleware chain
 */
export function globalErrorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ValidationError) {
    console.warn('[VALIDATION_ERROR]', { rejections: err.rejections });
  } else {
    console.error('[GLOBAL_ERROR_HANDLER]', {
      message: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
      type: err instanceof Error ? err.name : typeof err,
    });
  }

  if (isApiError(err)) {
    res.status(err.statusCode).json({ errorCode: err.errorCode });
    return;
  }

  res.status(500).json({ errorCode: 'INTERNAL_ERROR' });
}

/**
 * Create a wrapper for route handlers to catch async errors
 *
 * Usage:
 * router.get('/path', asyncHandler(async (req, res) => { ... }))
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
