/**
 * Default configuration values for the S3 client
 * @module s3-resumable-client/config/defaults
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import type { S3RetryConfig } from './types.js';

export const MIB = 1024 * 1024;

/**
 * Default signing region.
 */
export const DEFAULT_REGION = 'us-east-1';

/**
 * Default request timeout in milliseconds (30 seconds).
 */
export const DEFAULT_TIMEOUT = 30000;

/**
 * Default chunk size for multipart transfers (64 MiB).
 */
export const DEFAULT_CHUNK_SIZE = 64 * MIB;

/**
 * Smallest part size the multipart protocol accepts, except for the last part.
 */
export const MIN_CHUNK_SIZE = 5 * MIB;

/**
 * Largest part size the multipart protocol accepts (5 GiB).
 */
export const MAX_CHUNK_SIZE = 5 * 1024 * MIB;

/**
 * Maximum number of parts in one multipart upload.
 */
export const MAX_PART_COUNT = 10000;

export const DEFAULT_MAX_PARALLEL_UPLOADS = 4;
export const MAX_PARALLEL_UPLOADS_LIMIT = 10;

export const DEFAULT_MAX_PARALLEL_DOWNLOADS = 4;
export const MAX_PARALLEL_DOWNLOADS_LIMIT = 8;

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: S3RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 200,
  maxDelayMs: 20000,
  jitterFactor: 0.1,
};

/**
 * Resume files older than a week are ignored.
 */
export const DEFAULT_MAX_RESUME_AGE_MS = 7 * 24 * 60 * 60 * 1000;

export const DEFAULT_PROGRESS_INTERVAL_MS = 250;

/**
 * Streaming buffer size for simple GET/PUT bodies (64 KiB).
 */
export const STREAM_BUFFER_SIZE = 64 * 1024;

export function defaultResumeDirectory(): string {
  return join(homedir(), '.s3-resumable-client', 'resume');
}
