/**
 * Error mapping utilities for the S3 client
 * @module s3-resumable-client/errors/mapping
 */

import { S3Error } from './error.js';
import { LocalIoError, NetworkError, StorageError } from './categories.js';

/**
 * Backend error codes that indicate throttling or a transient server fault
 */
const RETRYABLE_CODES = new Set([
  'SlowDown',
  'InternalError',
  'ServiceUnavailable',
  'RequestTimeout',
  'Throttling',
  'ThrottlingException',
  'RequestLimitExceeded',
]);

/**
 * Local filesystem error codes that are reported as LocalIoError
 */
const LOCAL_IO_CODES = new Set(['ENOSPC', 'EACCES', 'EPERM', 'EROFS', 'ENOENT', 'EISDIR', 'EMFILE', 'EDQUOT']);

/**
 * Returns the default message for an HTTP status
 */
function getDefaultMessageForStatus(status: number): string {
  switch (status) {
    case 400:
      return 'Bad request';
    case 403:
      return 'Access denied';
    case 404:
      return 'Not found';
    case 409:
      return 'Conflict';
    case 412:
      return 'Precondition failed';
    case 416:
      return 'Requested range not satisfiable';
    case 429:
      return 'Too many requests';
    case 500:
      return 'Internal server error';
    case 502:
      return 'Bad gateway';
    case 503:
      return 'Service unavailable';
    case 504:
      return 'Gateway timeout';
    default:
      return `HTTP ${status}`;
  }
}

/**
 * Maps a non-2xx response to a StorageError
 *
 * Throttling (429, 503, SlowDown) and 5xx responses are retryable; every
 * other 4xx is not.
 *
 * @param status - HTTP status code
 * @param code - Backend error code parsed from the XML body
 * @param message - Backend error message
 * @param requestId - Request id from headers or body
 * @param retryAfter - Retry-After in seconds
 */
export function mapHttpStatusToError(
  status: number,
  code?: string,
  message?: string,
  requestId?: string,
  retryAfter?: number
): StorageError {
  const isRetryable =
    status === 429 || status >= 500 || (code !== undefined && RETRYABLE_CODES.has(code));

  return new StorageError({
    message: message ?? getDefaultMessageForStatus(status),
    code: code ?? `Http${status}`,
    status,
    isRetryable,
    requestId,
    retryAfter,
  });
}

/**
 * Type guard for S3Error
 */
export function isS3Error(error: unknown): error is S3Error {
  return error instanceof S3Error;
}

/**
 * Checks whether an error should be retried
 *
 * S3Errors carry their own flag. Unknown errors are retried only when they
 * look like socket-level failures.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof S3Error) {
    return error.isRetryable;
  }

  if (error instanceof Error) {
    const code = getErrorCode(error);
    return code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'EPIPE' || code === 'ECONNREFUSED';
  }

  return false;
}

/**
 * Wraps an arbitrary error in an S3Error
 */
export function wrapError(error: unknown, context?: string): S3Error {
  if (error instanceof S3Error) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const prefixed = context ? `${context}: ${message}` : message;

  if (isRetryableError(error)) {
    return NetworkError.connectionFailed(prefixed, error);
  }

  return new S3Error({
    type: 'unknown_error',
    message: prefixed,
    isRetryable: false,
    cause: error,
  });
}

/**
 * Wraps a filesystem error in a LocalIoError, passing S3Errors through
 */
export function wrapLocalIoError(error: unknown, path: string, operation: string): S3Error {
  if (error instanceof S3Error) {
    return error;
  }

  const code = error instanceof Error ? getErrorCode(error) : undefined;
  const message = error instanceof Error ? error.message : String(error);

  return new LocalIoError({
    message: `Failed to ${operation} ${path}: ${message}`,
    code: code && LOCAL_IO_CODES.has(code) ? code : 'LOCAL_IO_ERROR',
    details: { path, operation },
    cause: error,
  });
}

function getErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
