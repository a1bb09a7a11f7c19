/**
 * Environment variable configuration loading for the S3 client
 * @module s3-resumable-client/config/env
 */

import { ConfigError } from '../errors/index.js';
import type { S3ClientConfig, NormalizedS3Config } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Environment variable names for client configuration.
 */
export const ENV_VARS = {
  ENDPOINT: 'S3_ENDPOINT',
  ACCESS_KEY_ID: 'S3_ACCESS_KEY_ID',
  SECRET_ACCESS_KEY: 'S3_SECRET_ACCESS_KEY',
  REGION: 'S3_REGION',
  USE_SSL: 'S3_USE_SSL',
  TIMEOUT_MS: 'S3_TIMEOUT_MS',
  CHUNK_SIZE_BYTES: 'S3_CHUNK_SIZE_BYTES',
  MAX_PARALLEL_UPLOADS: 'S3_MAX_PARALLEL_UPLOADS',
  MAX_PARALLEL_DOWNLOADS: 'S3_MAX_PARALLEL_DOWNLOADS',
  MAX_RETRIES: 'S3_MAX_RETRIES',
  RESUME_DIR: 'S3_RESUME_DIR',
} as const;

/**
 * Parses an integer from an environment variable.
 *
 * @returns Parsed integer or undefined if value is empty
 * @throws {ConfigError} If value is not a valid integer
 */
function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }

  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed)) {
    throw new ConfigError({
      message: `${name} must be a valid integer, got: ${value}`,
      code: 'INVALID_INTEGER',
    });
  }

  return parsed;
}

function parseBoolEnv(value: string | undefined, name: string): boolean | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }

  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigError({
        message: `${name} must be a boolean, got: ${value}`,
        code: 'INVALID_BOOLEAN',
      });
  }
}

/**
 * Creates client configuration from environment variables.
 *
 * Environment variables:
 * - S3_ENDPOINT (required): `host[:port]` or URL
 * - S3_ACCESS_KEY_ID (required)
 * - S3_SECRET_ACCESS_KEY (required)
 * - S3_REGION, S3_USE_SSL, S3_TIMEOUT_MS, S3_CHUNK_SIZE_BYTES,
 *   S3_MAX_PARALLEL_UPLOADS, S3_MAX_PARALLEL_DOWNLOADS, S3_MAX_RETRIES,
 *   S3_RESUME_DIR (optional)
 *
 * @param env - Variables to read, defaults to `process.env`
 * @throws {ConfigError} If required variables are missing or invalid
 */
export function createConfigFromEnv(env: NodeJS.ProcessEnv = process.env): NormalizedS3Config {
  const config: Partial<S3ClientConfig> = {
    endpoint: env[ENV_VARS.ENDPOINT],
    accessKeyId: env[ENV_VARS.ACCESS_KEY_ID],
    secretAccessKey: env[ENV_VARS.SECRET_ACCESS_KEY],
    region: env[ENV_VARS.REGION] || undefined,
    useSSL: parseBoolEnv(env[ENV_VARS.USE_SSL], ENV_VARS.USE_SSL),
    timeout: parseIntEnv(env[ENV_VARS.TIMEOUT_MS], ENV_VARS.TIMEOUT_MS),
    chunkSize: parseIntEnv(env[ENV_VARS.CHUNK_SIZE_BYTES], ENV_VARS.CHUNK_SIZE_BYTES),
    maxParallelUploads: parseIntEnv(env[ENV_VARS.MAX_PARALLEL_UPLOADS], ENV_VARS.MAX_PARALLEL_UPLOADS),
    maxParallelDownloads: parseIntEnv(
      env[ENV_VARS.MAX_PARALLEL_DOWNLOADS],
      ENV_VARS.MAX_PARALLEL_DOWNLOADS
    ),
    maxRetries: parseIntEnv(env[ENV_VARS.MAX_RETRIES], ENV_VARS.MAX_RETRIES),
    resumeDirectory: env[ENV_VARS.RESUME_DIR] || undefined,
  };

  return normalizeConfig(config);
}
