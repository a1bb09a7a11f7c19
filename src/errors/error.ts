/**
 * Base error class for the S3 client
 * @module s3-resumable-client/errors/error
 */

/**
 * Parameters for creating an S3Error
 */
export interface S3ErrorParams {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Backend error code (e.g. NoSuchKey) or a client-side code
   */
  readonly code?: string;

  /**
   * Whether this error is retryable
   */
  readonly isRetryable: boolean;

  /**
   * Request ID for troubleshooting
   */
  readonly requestId?: string;

  /**
   * Retry-After header value in seconds
   */
  readonly retryAfter?: number;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying error, if any
   */
  readonly cause?: unknown;
}

/**
 * Base error class for all client operations
 *
 * Carries the error category, HTTP status and backend code, retry hints and
 * the request id reported by the server.
 */
export class S3Error extends Error {
  readonly type: string;
  readonly status?: number;
  readonly code?: string;
  readonly isRetryable: boolean;
  readonly requestId?: string;
  readonly retryAfter?: number;
  readonly details?: Record<string, unknown>;
  override readonly cause?: unknown;

  constructor(params: S3ErrorParams) {
    super(params.message);

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, S3Error.prototype);

    this.name = 'S3Error';
    this.type = params.type;
    this.status = params.status;
    this.code = params.code;
    this.isRetryable = params.isRetryable;
    this.requestId = params.requestId;
    this.retryAfter = params.retryAfter;
    this.details = params.details;
    this.cause = params.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, S3Error);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      code: this.code,
      isRetryable: this.isRetryable,
      requestId: this.requestId,
      retryAfter: this.retryAfter,
      details: this.details,
    };
  }

  /**
   * Returns a string representation of the error
   */
  override toString(): string {
    const parts = [this.name, this.type];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    if (this.status) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.message}`);

    if (this.requestId) {
      parts.push(`(RequestId: ${this.requestId})`);
    }

    return parts.join(' ');
  }
}
