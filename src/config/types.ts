/**
 * Configuration type definitions for the S3 client
 * @module s3-resumable-client/config/types
 */

/**
 * Core configuration parameters, as handed over by the configuration
 * collaborator.
 */
export interface S3ClientConfig {
  /**
   * Endpoint as `host[:port]` or a full `http(s)://host[:port]` URL.
   */
  endpoint: string;

  /**
   * Access key ID.
   */
  accessKeyId: string;

  /**
   * Secret access key.
   */
  secretAccessKey: string;

  /**
   * Whether to use TLS. Ignored when the endpoint carries a scheme.
   * @default true
   */
  useSSL?: boolean;

  /**
   * Signing region.
   * @default "us-east-1"
   */
  region?: string;

  /**
   * Request timeout in milliseconds.
   * @default 30000
   */
  timeout?: number;

  /**
   * Default chunk size for multipart transfers, in bytes.
   * @default 67108864 (64 MiB)
   */
  chunkSize?: number;

  /**
   * Maximum concurrent part uploads per transfer.
   * @default 4
   */
  maxParallelUploads?: number;

  /**
   * Maximum concurrent ranged downloads per transfer.
   * @default 4
   */
  maxParallelDownloads?: number;

  /**
   * Retry attempts for a request or chunk after the first failure.
   * @default 3
   */
  maxRetries?: number;

  /**
   * Backoff tuning.
   */
  retry?: Partial<S3RetryConfig>;

  /**
   * Directory holding resume files.
   * @default "~/.s3-resumable-client/resume"
   */
  resumeDirectory?: string;

  /**
   * Resume files older than this are ignored.
   * @default 604800000 (7 days)
   */
  maxResumeAgeMs?: number;

  /**
   * How often transfer managers drain queued progress events while
   * waiting on workers.
   * @default 250
   */
  progressIntervalMs?: number;
}

/**
 * Retry configuration.
 */
export interface S3RetryConfig {
  /**
   * Maximum number of retry attempts.
   * @default 3
   */
  maxRetries: number;

  /**
   * Base delay in milliseconds for exponential backoff.
   * @default 200
   */
  baseDelayMs: number;

  /**
   * Maximum delay in milliseconds between retries.
   * @default 20000
   */
  maxDelayMs: number;

  /**
   * Jitter factor (0.0 to 1.0) for randomizing delays.
   * @default 0.1
   */
  jitterFactor: number;
}

/**
 * Normalized configuration with all fields populated.
 */
export interface NormalizedS3Config {
  /** `scheme://host[:port]`, no trailing slash */
  endpointUrl: string;
  /** Value of the Host header */
  host: string;
  useSSL: boolean;
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
  timeout: number;
  chunkSize: number;
  maxParallelUploads: number;
  maxParallelDownloads: number;
  retry: S3RetryConfig;
  resumeDirectory: string;
  maxResumeAgeMs: number;
  progressIntervalMs: number;
}
