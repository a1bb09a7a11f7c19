/**
 * Configuration module for the S3 client
 * @module s3-resumable-client/config
 */

export type { S3ClientConfig, S3RetryConfig, NormalizedS3Config } from './types.js';

export {
  MIB,
  DEFAULT_REGION,
  DEFAULT_TIMEOUT,
  DEFAULT_CHUNK_SIZE,
  MIN_CHUNK_SIZE,
  MAX_CHUNK_SIZE,
  MAX_PART_COUNT,
  DEFAULT_MAX_PARALLEL_UPLOADS,
  MAX_PARALLEL_UPLOADS_LIMIT,
  DEFAULT_MAX_PARALLEL_DOWNLOADS,
  MAX_PARALLEL_DOWNLOADS_LIMIT,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_MAX_RESUME_AGE_MS,
  DEFAULT_PROGRESS_INTERVAL_MS,
  STREAM_BUFFER_SIZE,
  defaultResumeDirectory,
} from './defaults.js';

export { validateConfig, normalizeConfig, parseEndpoint } from './validation.js';

export { S3ConfigBuilder } from './builder.js';

export { createConfigFromEnv, ENV_VARS } from './env.js';
