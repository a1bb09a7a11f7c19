/**
 * Resumable S3-compatible storage client
 *
 * - Bucket, object and multipart operations over path-style URLs
 * - SigV4 request signing and presigned URLs
 * - Parallel, resumable multipart uploads and ranged downloads
 * - Pull-based progress reporting
 *
 * @example
 * ```typescript
 * import { connect } from 's3-resumable-client';
 *
 * const client = connect('localhost:9000', 'test-access-key', 'test-secret', { useSSL: false });
 *
 * const result = await client.uploadFile('backups', 'db.tar', './db.tar', {}, (events) => {
 *   const last = events[events.length - 1];
 *   console.log(`${last.bytesTransferred}/${last.totalBytes}`);
 * });
 * if (!result.success) {
 *   console.error(result.error?.message);
 * }
 *
 * await client.close();
 * ```
 */

// ============================================================================
// Client API
// ============================================================================

export { S3TransferClient, connect, createClient, createClientFromEnv } from './client/index.js';
export type { ClientOptions, ConnectOptions, S3TransferClientDeps } from './client/index.js';

// ============================================================================
// Configuration
// ============================================================================

export type { S3ClientConfig, S3RetryConfig, NormalizedS3Config } from './config/index.js';
export {
  S3ConfigBuilder,
  normalizeConfig,
  validateConfig,
  createConfigFromEnv,
  ENV_VARS,
  DEFAULT_CHUNK_SIZE,
  MIN_CHUNK_SIZE,
  MAX_CHUNK_SIZE,
  MAX_PART_COUNT,
} from './config/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  S3Error,
  ConfigError,
  ValidationError,
  SigningError,
  NetworkError,
  StorageError,
  TransferError,
  ResumeDataInvalidError,
  LocalIoError,
  mapHttpStatusToError,
  isRetryableError,
  isS3Error,
  wrapError,
} from './errors/index.js';
export type { S3ErrorParams } from './errors/index.js';

// ============================================================================
// Logging
// ============================================================================

export { ConsoleLogger, InMemoryLogger, NoopLogger, logError } from './observability/index.js';
export type { Logger, LogLevel, LogContext, LogEntry } from './observability/index.js';

// ============================================================================
// Signing
// ============================================================================

export { S3Signer, signRequest, UNSIGNED_PAYLOAD, EMPTY_SHA256 } from './signing/index.js';
export type {
  HttpMethod,
  PresignMethod,
  SigningCredentials,
  SigningRequest,
  SignedRequest,
  PresignedUrlOptions,
  PresignedUrlResult,
} from './signing/index.js';

// ============================================================================
// Transport
// ============================================================================

export { UndiciTransport, createUndiciTransport } from './transport/index.js';
export type { HttpTransport, HttpRequest, HttpResponse, StreamingHttpResponse } from './transport/index.js';

// ============================================================================
// Services and transfers
// ============================================================================

export { BucketsService } from './buckets/index.js';
export { ObjectsService, normalizeFolderPath } from './objects/index.js';
export type {
  ListObjectsOptions,
  ObjectHeaderOptions,
  DeleteFolderOptions,
  PutObjectOptions,
  PutObjectResult,
  GetObjectOptions,
  ByteRange,
  ObjectLocation,
} from './objects/index.js';
export { MultipartService } from './multipart/index.js';
export { StatsService } from './stats/index.js';
export type { StatsOptions, BucketStats, StorageStats } from './stats/index.js';

export {
  MultipartUploadManager,
  MultipartDownloadManager,
  ProgressCollector,
  ResumeStore,
  TransferState,
} from './transfer/index.js';
export type {
  UploadFileOptions,
  DownloadFileOptions,
  UploadResult,
  DownloadResult,
  UploadPhase,
  ProgressEvent,
  ProgressEventKind,
  ProgressSink,
  TransferStateData,
  ChunkRecord,
  ChunkStatus,
} from './transfer/index.js';

export type {
  ObjectDescriptor,
  BucketDescriptor,
  ListObjectsResult,
  CompletedPart,
  PartInfo,
  CopyObjectResult,
} from './types/index.js';
