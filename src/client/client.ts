/**
 * Client handle tying configuration, transport, signing and the services
 * together
 */

import type { Readable, Writable } from 'node:stream';
import type { NormalizedS3Config } from '../config/index.js';
import { BucketsService } from '../buckets/index.js';
import { MultipartService } from '../multipart/index.js';
import {
  ObjectsService,
  type DeleteFolderOptions,
  type GetObjectOptions,
  type ListObjectsOptions,
  type ObjectLocation,
  type PutObjectOptions,
  type PutObjectResult,
} from '../objects/index.js';
import type { Logger } from '../observability/index.js';
import type { RetryExecutor } from '../resilience/index.js';
import type { PresignMethod, PresignedUrlResult, S3Signer } from '../signing/index.js';
import { StatsService, type StatsOptions, type StorageStats } from '../stats/index.js';
import {
  MultipartDownloadManager,
  MultipartUploadManager,
  type DownloadFileOptions,
  type DownloadResult,
  type ProgressSink,
  type ResumeStore,
  type TransferStateData,
  type UploadFileOptions,
  type UploadResult,
} from '../transfer/index.js';
import type { HttpTransport } from '../transport/index.js';
import type {
  BucketDescriptor,
  CopyObjectResult,
  ListObjectsResult,
  ObjectDescriptor,
} from '../types/index.js';
import { RequestExecutor } from './request.js';

export interface S3TransferClientDeps {
  config: NormalizedS3Config;
  transport: HttpTransport;
  signer: S3Signer;
  retry: RetryExecutor;
  resumeStore: ResumeStore;
  logger: Logger;
}

/**
 * Handle for one storage endpoint and one set of credentials.
 *
 * Bucket and object operations are available directly; multipart
 * primitives through `multipart`. The client owns its transport and
 * releases it on close().
 */
export class S3TransferClient {
  readonly config: NormalizedS3Config;
  readonly buckets: BucketsService;
  readonly objects: ObjectsService;
  readonly multipart: MultipartService;
  readonly stats: StatsService;
  readonly resumeStore: ResumeStore;

  private readonly transport: HttpTransport;
  private readonly signer: S3Signer;
  private readonly logger: Logger;
  private readonly uploads: MultipartUploadManager;
  private readonly downloads: MultipartDownloadManager;
  private closed = false;

  constructor(deps: S3TransferClientDeps) {
    this.config = deps.config;
    this.transport = deps.transport;
    this.signer = deps.signer;
    this.logger = deps.logger;
    this.resumeStore = deps.resumeStore;

    const executor = new RequestExecutor(deps.config, deps.transport, deps.signer, deps.retry, deps.logger);
    this.buckets = new BucketsService(executor);
    this.objects = new ObjectsService(executor);
    this.multipart = new MultipartService(executor);
    this.stats = new StatsService(this.buckets, this.objects, deps.logger);

    this.uploads = new MultipartUploadManager({
      config: deps.config,
      objects: this.objects,
      multipart: this.multipart,
      resumeStore: deps.resumeStore,
      retry: deps.retry,
      logger: deps.logger,
    });
    this.downloads = new MultipartDownloadManager({
      config: deps.config,
      objects: this.objects,
      resumeStore: deps.resumeStore,
      retry: deps.retry,
      logger: deps.logger,
    });
  }

  listBuckets(): Promise<BucketDescriptor[]> {
    return this.buckets.listBuckets();
  }

  bucketExists(bucket: string): Promise<boolean> {
    return this.buckets.bucketExists(bucket);
  }

  createBucket(bucket: string, region?: string): Promise<void> {
    return this.buckets.createBucket(bucket, region);
  }

  deleteBucket(bucket: string): Promise<void> {
    return this.buckets.deleteBucket(bucket);
  }

  getBucketPolicy(bucket: string): Promise<string | undefined> {
    return this.buckets.getBucketPolicy(bucket);
  }

  setBucketPolicy(bucket: string, policy: string): Promise<void> {
    return this.buckets.setBucketPolicy(bucket, policy);
  }

  deleteBucketPolicy(bucket: string): Promise<void> {
    return this.buckets.deleteBucketPolicy(bucket);
  }

  listObjects(bucket: string, options?: ListObjectsOptions): Promise<ListObjectsResult> {
    return this.objects.listObjects(bucket, options);
  }

  headObject(bucket: string, key: string): Promise<ObjectDescriptor | undefined> {
    return this.objects.headObject(bucket, key);
  }

  objectExists(bucket: string, key: string): Promise<boolean> {
    return this.objects.objectExists(bucket, key);
  }

  putObject(
    bucket: string,
    key: string,
    body: Uint8Array | string | Readable,
    options?: PutObjectOptions
  ): Promise<PutObjectResult> {
    return this.objects.putObject(bucket, key, body, options);
  }

  getObject(bucket: string, key: string, destination: string | Writable, options?: GetObjectOptions): Promise<number> {
    return this.objects.getObject(bucket, key, destination, options);
  }

  deleteObject(bucket: string, key: string): Promise<void> {
    return this.objects.deleteObject(bucket, key);
  }

  copyObject(source: ObjectLocation, destination: ObjectLocation): Promise<CopyObjectResult> {
    return this.objects.copyObject(source, destination);
  }

  /**
   * Creates `path/` and every missing parent as zero-byte marker objects
   *
   * @returns Keys of the markers created
   */
  createFolder(bucket: string, path: string): Promise<string[]> {
    return this.objects.createFolder(bucket, path);
  }

  /**
   * @returns Keys deleted
   */
  deleteFolder(bucket: string, path: string, options?: DeleteFolderOptions): Promise<string[]> {
    return this.objects.deleteFolder(bucket, path, options);
  }

  getStats(options?: StatsOptions): Promise<StorageStats> {
    return this.stats.getStats(options);
  }

  /**
   * Uploads a local file, resuming a previous attempt when its state still
   * matches the file
   */
  uploadFile(
    bucket: string,
    key: string,
    localPath: string,
    options?: UploadFileOptions,
    sink?: ProgressSink
  ): Promise<UploadResult> {
    return this.uploads.uploadFile(bucket, key, localPath, options, sink);
  }

  /**
   * Downloads an object to a local file in parallel byte ranges
   */
  downloadFile(
    bucket: string,
    key: string,
    localPath: string,
    options?: DownloadFileOptions,
    sink?: ProgressSink
  ): Promise<DownloadResult> {
    return this.downloads.downloadFile(bucket, key, localPath, options, sink);
  }

  /**
   * Aborts the multipart upload recorded for a local file
   *
   * @returns false when nothing was recorded
   */
  abortUpload(bucket: string, key: string, localPath: string): Promise<boolean> {
    return this.uploads.abortUpload(bucket, key, localPath);
  }

  /**
   * @param expiresIn - Lifetime in seconds, 1 to 604800
   */
  generatePresignedUrl(method: PresignMethod, bucket: string, key: string, expiresIn: number): PresignedUrlResult {
    return this.signer.presignUrl({ method, bucket, key, expiresIn }, this.config.endpointUrl);
  }

  listResumableTransfers(): Promise<TransferStateData[]> {
    return this.resumeStore.list();
  }

  purgeResumeStates(maxAgeMs?: number): Promise<number> {
    return this.resumeStore.purgeOlderThan(maxAgeMs);
  }

  /**
   * Releases pooled connections. Calling close() again has no effect.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.transport.close();
    this.logger.debug('Client closed', { endpoint: this.config.endpointUrl });
  }

  isClosed(): boolean {
    return this.closed;
  }
}
