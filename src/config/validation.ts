/**
 * Configuration validation and normalization for the S3 client
 * @module s3-resumable-client/config/validation
 */

import { ConfigError } from '../errors/index.js';
import type { S3ClientConfig, NormalizedS3Config } from './types.js';
import {
  DEFAULT_REGION,
  DEFAULT_TIMEOUT,
  DEFAULT_CHUNK_SIZE,
  MAX_CHUNK_SIZE,
  DEFAULT_MAX_PARALLEL_UPLOADS,
  MAX_PARALLEL_UPLOADS_LIMIT,
  DEFAULT_MAX_PARALLEL_DOWNLOADS,
  MAX_PARALLEL_DOWNLOADS_LIMIT,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_MAX_RESUME_AGE_MS,
  DEFAULT_PROGRESS_INTERVAL_MS,
  defaultResumeDirectory,
} from './defaults.js';

function requirePositiveInteger(value: number | undefined, name: string): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value <= 0) {
    throw ConfigError.invalidConfig(name, `${name} must be a positive integer`);
  }
}

function requireRange(value: number | undefined, name: string, min: number, max: number): void {
  if (value === undefined) return;
  requirePositiveInteger(value, name);
  if (value < min || value > max) {
    throw ConfigError.invalidConfig(name, `${name} must be between ${min} and ${max}`);
  }
}

/**
 * Parses an endpoint given as `host[:port]` or as a full URL.
 *
 * @returns Endpoint URL without trailing slash and the Host header value
 * @throws {ConfigError} If the endpoint cannot be parsed
 */
export function parseEndpoint(
  endpoint: string,
  useSSL: boolean
): { endpointUrl: string; host: string; useSSL: boolean } {
  const trimmed = endpoint.trim().replace(/\/+$/, '');
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)
    ? trimmed
    : `${useSSL ? 'https' : 'http'}://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch (error) {
    throw ConfigError.invalidEndpoint(
      endpoint,
      `Invalid endpoint ${endpoint}: ${error instanceof Error ? error.message : 'unknown error'}`
    );
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw ConfigError.invalidEndpoint(endpoint, 'endpoint must use http or https protocol');
  }

  if (url.pathname !== '/' || url.search !== '') {
    throw ConfigError.invalidEndpoint(endpoint, 'endpoint must not contain a path or query');
  }

  return {
    endpointUrl: `${url.protocol}//${url.host}`,
    host: url.host,
    useSSL: url.protocol === 'https:',
  };
}

/**
 * Validates configuration.
 *
 * @throws {ConfigError} If configuration is invalid
 */
export function validateConfig(config: Partial<S3ClientConfig>): asserts config is S3ClientConfig {
  if (!config.endpoint) {
    throw new ConfigError({
      message: 'endpoint is required',
      code: 'MISSING_ENDPOINT',
    });
  }

  if (!config.accessKeyId || !config.secretAccessKey) {
    throw ConfigError.missingCredentials();
  }

  requirePositiveInteger(config.timeout, 'timeout');
  requireRange(config.chunkSize, 'chunkSize', 1, MAX_CHUNK_SIZE);
  requireRange(config.maxParallelUploads, 'maxParallelUploads', 1, MAX_PARALLEL_UPLOADS_LIMIT);
  requireRange(config.maxParallelDownloads, 'maxParallelDownloads', 1, MAX_PARALLEL_DOWNLOADS_LIMIT);
  requirePositiveInteger(config.maxResumeAgeMs, 'maxResumeAgeMs');
  requirePositiveInteger(config.progressIntervalMs, 'progressIntervalMs');

  if (config.maxRetries !== undefined && (!Number.isInteger(config.maxRetries) || config.maxRetries < 0)) {
    throw ConfigError.invalidConfig('maxRetries', 'maxRetries must be a non-negative integer');
  }

  const jitter = config.retry?.jitterFactor;
  if (jitter !== undefined && (jitter < 0 || jitter > 1)) {
    throw ConfigError.invalidConfig('retry.jitterFactor', 'retry.jitterFactor must be between 0 and 1');
  }
}

/**
 * Normalizes configuration by validating it and applying defaults.
 *
 * @throws {ConfigError} If configuration is invalid
 */
export function normalizeConfig(config: Partial<S3ClientConfig>): NormalizedS3Config {
  validateConfig(config);

  const endpoint = parseEndpoint(config.endpoint, config.useSSL ?? true);

  return {
    endpointUrl: endpoint.endpointUrl,
    host: endpoint.host,
    useSSL: endpoint.useSSL,
    accessKeyId: config.accessKeyId,
    secretAccessKey: config.secretAccessKey,
    region: config.region || DEFAULT_REGION,
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    chunkSize: config.chunkSize ?? DEFAULT_CHUNK_SIZE,
    maxParallelUploads: config.maxParallelUploads ?? DEFAULT_MAX_PARALLEL_UPLOADS,
    maxParallelDownloads: config.maxParallelDownloads ?? DEFAULT_MAX_PARALLEL_DOWNLOADS,
    retry: {
      ...DEFAULT_RETRY_CONFIG,
      ...config.retry,
      maxRetries: config.maxRetries ?? config.retry?.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    },
    resumeDirectory: config.resumeDirectory ?? defaultResumeDirectory(),
    maxResumeAgeMs: config.maxResumeAgeMs ?? DEFAULT_MAX_RESUME_AGE_MS,
    progressIntervalMs: config.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS,
  };
}
