/**
 * Factory functions for creating clients
 */

import {
  createConfigFromEnv,
  normalizeConfig,
  type NormalizedS3Config,
  type S3ClientConfig,
} from '../config/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { createRetryExecutor } from '../resilience/index.js';
import { S3Signer } from '../signing/index.js';
import { ResumeStore } from '../transfer/index.js';
import { createUndiciTransport, type HttpTransport } from '../transport/index.js';
import { S3TransferClient } from './client.js';

/**
 * Collaborators that are not plain configuration values
 */
export interface ClientOptions {
  /** Defaults to a NoopLogger */
  logger?: Logger;
  /** Defaults to an undici connection pool */
  transport?: HttpTransport;
  /** Defaults to a store in the configured resume directory */
  resumeStore?: ResumeStore;
}

export type ConnectOptions = Omit<S3ClientConfig, 'endpoint' | 'accessKeyId' | 'secretAccessKey'> & ClientOptions;

function isNormalized(config: S3ClientConfig | NormalizedS3Config): config is NormalizedS3Config {
  return 'endpointUrl' in config;
}

/**
 * Creates a client from configuration values
 *
 * @throws {ConfigError} If configuration is invalid
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   endpoint: 'localhost:9000',
 *   accessKeyId: 'test-access-key',
 *   secretAccessKey: 'test-secret',
 *   useSSL: false,
 * });
 *
 * try {
 *   const buckets = await client.listBuckets();
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export function createClient(
  config: S3ClientConfig | NormalizedS3Config,
  options: ClientOptions = {}
): S3TransferClient {
  const normalized = isNormalized(config) ? config : normalizeConfig(config);
  const logger = options.logger ?? new NoopLogger();

  const signer = new S3Signer({
    accessKeyId: normalized.accessKeyId,
    secretAccessKey: normalized.secretAccessKey,
    region: normalized.region,
    service: 's3',
  });

  const connections = Math.max(normalized.maxParallelUploads, normalized.maxParallelDownloads) * 2;

  return new S3TransferClient({
    config: normalized,
    transport: options.transport ?? createUndiciTransport(normalized.timeout, connections),
    signer,
    retry: createRetryExecutor(normalized.retry, logger),
    resumeStore:
      options.resumeStore ??
      new ResumeStore({
        directory: normalized.resumeDirectory,
        maxAgeMs: normalized.maxResumeAgeMs,
        logger,
      }),
    logger,
  });
}

/**
 * Opens a client for an endpoint given as `host[:port]` or a full URL
 *
 * @example
 * ```typescript
 * const client = connect('localhost:9000', 'test-access-key', 'test-secret', { useSSL: false });
 * const result = await client.uploadFile('backups', 'db.tar', './db.tar');
 * ```
 */
export function connect(
  endpoint: string,
  accessKeyId: string,
  secretAccessKey: string,
  options: ConnectOptions = {}
): S3TransferClient {
  const { logger, transport, resumeStore, ...config } = options;
  return createClient({ ...config, endpoint, accessKeyId, secretAccessKey }, { logger, transport, resumeStore });
}

/**
 * Creates a client from S3_* environment variables
 *
 * @throws {ConfigError} If required variables are missing or invalid
 */
export function createClientFromEnv(options: ClientOptions = {}, env: NodeJS.ProcessEnv = process.env): S3TransferClient {
  return createClient(createConfigFromEnv(env), options);
}
