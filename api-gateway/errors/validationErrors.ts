/**
 * Sanitized validation error handling
 */

import { Request, Response, NextFunction } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';
import { throwApiError } from './apiError';

export const SANITIZED_VALIDATION_ERROR = {
  errorCode: 'INVALID_REQUEST',
  statusCode: 400,
} as const;

export const SANITIZED_AUTH_ERROR = {
  errorCode: 'UNAUTHORIZED',
  statusCode: 401,
} as const;

/**
 * Send sanitized authentication error
 * @param message - Internal debug message (never sent to client)
 */
export function sendAuthError(res: Response, message?: string): void {
  if (message) {
    console.warn('[AUTH_ERROR]', message);
  }
  res.status(SANITIZED_AUTH_ERROR.statusCode).json({ errorCode: SANITIZED_AUTH_ERROR.errorCode });
}

/**
 * Parses request input against a zod schema. Issues are logged by path and
 * the client gets INVALID_REQUEST.
 */
export function parseRequest<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown, source: string): T {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const details: Record<string, string[]> = {};
  for (const issue of result.error.issues) {
    const path = issue.path.join('.') || '(root)';
    (details[path] ??= []).push(issue.message);
  }
  console.warn('[VALIDATION_ERROR]', { source, details });
  return throwApiError(SANITIZED_VALIDATION_ERROR.errorCode, SANITIZED_VALIDATION_ERROR.statusCode, `Invalid ${source}`);
}

function errorType(err: unknown): string | undefined {
  return err !== null && typeof err === 'object' && 'type' in err && typeof err.type === 'string'
    ? err.type
    : undefined;
}

/**
 * Catches body-parser failures (malformed JSON, oversized payloads) before
 * the global handler, so they answer 400/413 instead of 500.
 */
export function sanitizationErrorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  const type = errorType(err);

  if (type === 'entity.parse.failed' || type === 'encoding.unsupported' || type === 'charset.unsupported') {
    console.warn('[FRAMEWORK_ERROR]', type);
    res.status(400).json({ errorCode: SANITIZED_VALIDATION_ERROR.errorCode });
    return;
  }

  if (type === 'entity.too.large') {
    console.warn('[FRAMEWORK_ERROR]', type);
    res.status(413).json({ errorCode: SANITIZED_VALIDATION_ERROR.errorCode });
    return;
  }

  next(err);
}
