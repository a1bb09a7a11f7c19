/**
 * Fluent configuration builder for the S3 client
 * @module s3-resumable-client/config/builder
 */

import type { S3ClientConfig, S3RetryConfig, NormalizedS3Config } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Fluent builder for constructing client configuration.
 *
 * @example
 * ```typescript
 * const config = new S3ConfigBuilder()
 *   .endpoint('localhost:9000')
 *   .credentials('test-access-key', 'test-secret')
 *   .useSSL(false)
 *   .chunkSize(16 * 1024 * 1024)
 *   .build();
 * ```
 */
export class S3ConfigBuilder {
  private config: Partial<S3ClientConfig> = {};

  /**
   * Sets the endpoint, as `host[:port]` or a full URL.
   */
  endpoint(endpoint: string): this {
    this.config.endpoint = endpoint;
    return this;
  }

  /**
   * Sets the access credentials.
   */
  credentials(accessKeyId: string, secretAccessKey: string): this {
    this.config.accessKeyId = accessKeyId;
    this.config.secretAccessKey = secretAccessKey;
    return this;
  }

  useSSL(enabled: boolean): this {
    this.config.useSSL = enabled;
    return this;
  }

  region(region: string): this {
    this.config.region = region;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  /**
   * Sets the default chunk size for multipart transfers, in bytes.
   */
  chunkSize(bytes: number): this {
    this.config.chunkSize = bytes;
    return this;
  }

  /**
   * Sets the worker counts for multipart uploads and downloads.
   */
  parallelism(uploads: number, downloads: number = uploads): this {
    this.config.maxParallelUploads = uploads;
    this.config.maxParallelDownloads = downloads;
    return this;
  }

  maxRetries(n: number): this {
    this.config.maxRetries = n;
    return this;
  }

  /**
   * Sets the backoff configuration.
   */
  retry(config: Partial<S3RetryConfig>): this {
    this.config.retry = {
      ...this.config.retry,
      ...config,
    };
    return this;
  }

  /**
   * Sets where resume files are kept and how long they stay valid.
   */
  resume(directory: string, maxAgeMs?: number): this {
    this.config.resumeDirectory = directory;
    if (maxAgeMs !== undefined) {
      this.config.maxResumeAgeMs = maxAgeMs;
    }
    return this;
  }

  progressInterval(ms: number): this {
    this.config.progressIntervalMs = ms;
    return this;
  }

  /**
   * Builds and validates the configuration.
   *
   * @throws {ConfigError} If configuration is invalid
   */
  build(): NormalizedS3Config {
    return normalizeConfig(this.config);
  }
}
