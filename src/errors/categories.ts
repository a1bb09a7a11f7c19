/**
 * Specific error categories for the S3 client
 * @module s3-resumable-client/errors/categories
 */

import { S3Error, type S3ErrorParams } from './error.js';

type CategoryParams = Omit<S3ErrorParams, 'type' | 'isRetryable'> & {
  readonly isRetryable?: boolean;
};

/**
 * Configuration and initialization errors
 */
export class ConfigError extends S3Error {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'config_error',
      isRetryable: false,
    });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  /**
   * Missing access key or secret key
   */
  static missingCredentials(message?: string): ConfigError {
    return new ConfigError({
      message: message ?? 'Access key and secret key are required',
      code: 'MISSING_CREDENTIALS',
    });
  }

  /**
   * Invalid endpoint
   */
  static invalidEndpoint(endpoint: string, message?: string): ConfigError {
    return new ConfigError({
      message: message ?? `Invalid endpoint: ${endpoint}`,
      code: 'INVALID_ENDPOINT',
      details: { endpoint },
    });
  }

  /**
   * Invalid configuration parameter
   */
  static invalidConfig(paramName: string, message?: string): ConfigError {
    return new ConfigError({
      message: message ?? `Invalid configuration parameter: ${paramName}`,
      code: 'INVALID_CONFIG',
      details: { paramName },
    });
  }
}

/**
 * Invalid arguments passed to an operation
 */
export class ValidationError extends S3Error {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'validation_error',
      isRetryable: false,
    });
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static required(field: string): ValidationError {
    return new ValidationError({
      message: `${field} is required`,
      code: 'MISSING_FIELD',
      details: { field },
    });
  }
}

/**
 * Request signing failures. Fatal to the single request, never retried.
 */
export class SigningError extends S3Error {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'signing_error',
      isRetryable: false,
    });
    this.name = 'SigningError';
    Object.setPrototypeOf(this, SigningError.prototype);
  }

  static missingCredentials(): SigningError {
    return new SigningError({
      message: 'Cannot sign request: access key and secret key are required',
      code: 'MISSING_CREDENTIALS',
    });
  }

  static missingHost(): SigningError {
    return new SigningError({
      message: 'Cannot sign request: host header is missing',
      code: 'MISSING_HOST',
    });
  }

  static malformed(reason: string): SigningError {
    return new SigningError({
      message: `Cannot sign request: ${reason}`,
      code: 'MALFORMED_REQUEST',
    });
  }
}

/**
 * Network-level failures (timeouts, resets, DNS). Always retryable.
 */
export class NetworkError extends S3Error {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'network_error',
      isRetryable: params.isRetryable ?? true,
    });
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }

  static timeout(timeoutMs: number): NetworkError {
    return new NetworkError({
      message: `Request timed out after ${timeoutMs}ms`,
      code: 'TIMEOUT',
      details: { timeoutMs },
    });
  }

  static connectionReset(cause?: unknown): NetworkError {
    return new NetworkError({
      message: 'Connection was reset by peer',
      code: 'CONNECTION_RESET',
      cause,
    });
  }

  static dnsError(url: string, cause?: unknown): NetworkError {
    return new NetworkError({
      message: `DNS lookup failed for ${url}`,
      code: 'DNS_ERROR',
      details: { url },
      cause,
    });
  }

  static connectionFailed(message: string, cause?: unknown): NetworkError {
    return new NetworkError({
      message: `Connection failed: ${message}`,
      code: 'CONNECTION_FAILED',
      cause,
    });
  }
}

/**
 * Non-2xx responses from the storage backend
 */
export class StorageError extends S3Error {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'storage_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'StorageError';
    Object.setPrototypeOf(this, StorageError.prototype);
  }

  static notFound(resource: string, code = 'NotFound', requestId?: string): StorageError {
    return new StorageError({
      message: `Resource not found: ${resource}`,
      code,
      status: 404,
      requestId,
      details: { resource },
    });
  }
}

/**
 * Chunked transfer failures: retry budget exhausted, short reads,
 * cancellation, or source/destination validation.
 */
export class TransferError extends S3Error {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'transfer_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'TransferError';
    Object.setPrototypeOf(this, TransferError.prototype);
  }

  static chunkFailed(index: number, attempts: number, cause: unknown): TransferError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new TransferError({
      message: `Chunk ${index} failed after ${attempts} attempt(s): ${reason}`,
      code: 'CHUNK_FAILED',
      details: { index, attempts },
      cause,
    });
  }

  static shortBody(index: number, expected: number, received: number): TransferError {
    return new TransferError({
      message: `Chunk ${index} received ${received} of ${expected} bytes`,
      code: 'SHORT_BODY',
      isRetryable: true,
      details: { index, expected, received },
    });
  }

  static cancelled(): TransferError {
    return new TransferError({
      message: 'Transfer was cancelled',
      code: 'CANCELLED',
    });
  }

  static sourceChanged(path: string): TransferError {
    return new TransferError({
      message: `Source changed during transfer: ${path}`,
      code: 'SOURCE_CHANGED',
      details: { path },
    });
  }
}

/**
 * Stored resume data that cannot be used. Reported as a warning; the
 * transfer managers fall back to a fresh transfer.
 */
export class ResumeDataInvalidError extends S3Error {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'resume_data_invalid',
      isRetryable: false,
    });
    this.name = 'ResumeDataInvalidError';
    Object.setPrototypeOf(this, ResumeDataInvalidError.prototype);
  }

  static fingerprintMismatch(path: string, reason: string): ResumeDataInvalidError {
    return new ResumeDataInvalidError({
      message: `Resume data for ${path} no longer matches: ${reason}`,
      code: 'FINGERPRINT_MISMATCH',
      details: { path, reason },
    });
  }
}

/**
 * Local filesystem failures (disk full, permission denied). Fatal.
 */
export class LocalIoError extends S3Error {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'local_io_error',
      isRetryable: false,
    });
    this.name = 'LocalIoError';
    Object.setPrototypeOf(this, LocalIoError.prototype);
  }
}
