import type { ValidationRejection } from '../validation/validators';

export type RecordErrorCode =
  | 'INVALID_REQUEST'
  | 'RECORD_NOT_FOUND'
  | 'CONFLICT'
  | 'BLOB_MISSING'
  | 'STORE_UNAVAILABLE'
  | 'DUPLICATE_ID'
  | 'CANCELLED';

/**
 * Base class for every failure the coordinator and query engine surface.
 * Shaped like the gateway's ApiError so the transport layer can serialize it
 * without a translation table.
 */
export class RecordServiceError extends Error {
  constructor(
    readonly errorCode: RecordErrorCode,
    readonly statusCode: number,
    message: string,
    readonly retryable = false,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RecordServiceError';
  }
}

export class ValidationError extends RecordServiceError {
  constructor(readonly rejections: ValidationRejection[]) {
    super('INVALID_REQUEST', 400, rejections.map(r => `${r.field}: ${r.message}`).join('; ') || 'Invalid request');
    this.name = 'ValidationError';
  }
}

export class RecordNotFoundError extends RecordServiceError {
  constructor(recordId: string) {
    super('RECORD_NOT_FOUND', 404, `Record not found: ${recordId}`);
    this.name = 'RecordNotFoundError';
  }
}

/**
 * Owner mismatch. Subclasses RecordNotFoundError and carries the same code
 * and status so callers cannot tell a foreign record from a missing one.
 */
export class ForbiddenError extends RecordNotFoundError {
  constructor(recordId: string) {
    super(recordId);
    this.name = 'ForbiddenError';
  }
}

export class ConflictError extends RecordServiceError {
  constructor(message: string) {
    super('CONFLICT', 409, message);
    this.name = 'ConflictError';
  }
}

export class BlobMissingError extends RecordServiceError {
  constructor(recordId: string, objectRef: string) {
    super('BLOB_MISSING', 400, `No blob at ${objectRef} for record ${recordId}`, true);
    this.name = 'BlobMissingError';
  }
}

export class StoreUnavailableError extends RecordServiceError {
  constructor(message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super('STORE_UNAVAILABLE', 503, message, options.retryable ?? true, { cause: options.cause });
    this.name = 'StoreUnavailableError';
  }
}

export class DuplicateIdError extends RecordServiceError {
  constructor(recordId: string) {
    super('DUPLICATE_ID', 500, `Record id already exists: ${recordId}`);
    this.name = 'DuplicateIdError';
  }
}

export class OperationCancelledError extends RecordServiceError {
  constructor(operation: string) {
    super('CANCELLED', 499, `${operation} was cancelled before it changed any state`);
    this.name = 'OperationCancelledError';
  }
}
