/**
 * Canonical API error contract.
 * Clients only ever see `errorCode`; messages stay in server logs.
 */

/**
 * ApiError interface - canonical schema.
 * RecordServiceError and its subclasses satisfy it structurally.
 */
export interface ApiError extends Error {
  errorCode: string;
  statusCode: number;
}

/**
 * Throw a standardized API error
 *
 * Examples:
 * - throwApiError('INVALID_REQUEST', 400)
 * - throwApiError('UNAUTHORIZED', 401)
 * - throwApiError('NOT_FOUND', 404)
 */
export function throwApiError(errorCode: string, statusCode: number, message = errorCode): never {
  const error: ApiError = Object.assign(new Error(message), { errorCode, statusCode });
  error.name = 'ApiError';
  throw error;
}

/**
 * Type guard for narrowing error types
 */
export function isApiError(err: unknown): err is ApiError {
  return (
    err instanceof Error &&
    'errorCode' in err &&
    'statusCode' in err &&
    typeof err.errorCode === 'string' &&
    typeof err.statusCode === 'number'
  );
}
