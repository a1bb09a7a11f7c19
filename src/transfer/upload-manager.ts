/**
 * Resumable multipart uploads from a local file
 */

import { open, readFile, stat, type FileHandle } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { NormalizedS3Config } from '../config/index.js';
import {
  LocalIoError,
  ResumeDataInvalidError,
  S3Error,
  StorageError,
  TransferError,
  wrapError,
  wrapLocalIoError,
} from '../errors/index.js';
import type { MultipartService } from '../multipart/index.js';
import type { ObjectsService } from '../objects/index.js';
import { logError, type LogContext, type Logger } from '../observability/index.js';
import type { RetryExecutor } from '../resilience/index.js';
import type { PartInfo } from '../types/index.js';
import { sha256Hex } from '../signing/index.js';
import { ByteTally, closeHandle, progressEvent, runChunks, throughput } from './chunk-runner.js';
import { choosePartSize } from './partition.js';
import { ProgressCollector, ProgressPump, type ProgressSink } from './progress.js';
import type { ResumeStore } from './resume-store.js';
import { TransferState, compareFingerprints, type TransferFingerprint } from './state.js';
import type { UploadFileOptions, UploadPhase, UploadResult } from './types.js';

export interface UploadManagerDeps {
  config: NormalizedS3Config;
  objects: ObjectsService;
  multipart: MultipartService;
  resumeStore: ResumeStore;
  retry: RetryExecutor;
  logger: Logger;
}

/**
 * Reads exactly `length` bytes at `position`
 *
 * @throws {TransferError} SOURCE_CHANGED when the file ends early
 */
async function readRange(handle: FileHandle, path: string, position: number, length: number): Promise<Uint8Array> {
  const buffer = new Uint8Array(length);
  let filled = 0;
  while (filled < length) {
    const { bytesRead } = await handle.read(buffer, filled, length - filled, position + filled);
    if (bytesRead === 0) {
      throw TransferError.sourceChanged(path);
    }
    filled += bytesRead;
  }
  return buffer;
}

async function fingerprintFile(path: string): Promise<TransferFingerprint> {
  try {
    const stats = await stat(path);
    if (stats.isFile()) {
      return { size: stats.size, lastModified: Math.floor(stats.mtimeMs) };
    }
  } catch (error) {
    throw wrapLocalIoError(error, path, 'stat');
  }
  throw new LocalIoError({
    message: `${path} is not a regular file`,
    code: 'EISDIR',
    details: { path, operation: 'read' },
  });
}

/**
 * Drives a multipart upload through
 * `NotStarted → Initiated → Uploading → Completing → Completed`.
 *
 * Files no larger than one part go up in a single PUT. Larger files are
 * split into parts, uploaded by a bounded worker pool with per-part retry,
 * and checkpointed after every part so an interrupted upload can resume.
 * A failed upload is left open on the backend; `abortUpload` discards it.
 */
export class MultipartUploadManager {
  constructor(private readonly deps: UploadManagerDeps) {}

  async uploadFile(
    bucket: string,
    key: string,
    localPath: string,
    options: UploadFileOptions = {},
    sink?: ProgressSink
  ): Promise<UploadResult> {
    const { config, logger } = this.deps;
    const path = resolve(localPath);
    const startedAt = Date.now();
    const logContext: LogContext = { bucket, key, localPath: path, direction: 'upload' };
    const collector = new ProgressCollector();
    const pump = new ProgressPump(collector, sink, config.progressIntervalMs, logger);

    let phase: UploadPhase = 'NotStarted';
    const setPhase = (next: UploadPhase): void => {
      phase = next;
      logger.debug('Upload phase changed', { ...logContext, phase });
      options.onPhaseChange?.(phase);
    };

    let fingerprint: TransferFingerprint;
    let partSize: number;
    try {
      fingerprint = await fingerprintFile(path);
      partSize = choosePartSize(fingerprint.size, options.chunkSize ?? config.chunkSize);
    } catch (error) {
      setPhase('Failed');
      return this.failure(bucket, key, path, startedAt, wrapError(error), phase, collector, pump);
    }

    logger.info('Starting upload', { ...logContext, totalSize: fingerprint.size, partSize });
    pump.start();

    if (fingerprint.size <= partSize) {
      return this.uploadSingle(bucket, key, path, fingerprint, options, collector, pump, setPhase, startedAt);
    }

    const identity = { bucket, key, localPath: path, direction: 'upload' as const };
    let state: TransferState | undefined;
    let resumed = false;

    try {
      if (options.resume !== false) {
        state = await this.loadResumable(identity, fingerprint, options, logContext);
        resumed = state !== undefined;
      }

      if (state && options.verifyRemoteParts) {
        state = await this.verifyRemoteParts(state, options, logContext);
        resumed = state !== undefined;
      }

      if (state?.uploadId) {
        logContext.uploadId = state.uploadId;
        logger.info('Resuming upload', {
          ...logContext,
          completedChunks: state.completedCount,
          chunkCount: state.chunkCount,
        });
      } else {
        const uploadId = await this.deps.multipart.createMultipartUpload(bucket, key, {
          contentType: options.contentType,
          metadata: options.metadata,
          cacheControl: options.cacheControl,
          contentDisposition: options.contentDisposition,
          contentEncoding: options.contentEncoding,
        });
        logContext.uploadId = uploadId;
        state = TransferState.create({
          bucket,
          key,
          localPath: path,
          totalSize: fingerprint.size,
          chunkSize: partSize,
          direction: 'upload',
          fingerprint,
          uploadId,
        });
        logger.info('Initiated multipart upload', { ...logContext, chunkCount: state.chunkCount });
      }
      setPhase('Initiated');
      await this.deps.resumeStore.save(state);
    } catch (error) {
      setPhase('Failed');
      const failure = wrapError(error);
      logError(logger, 'Upload initiation', failure, logContext);
      return this.failure(bucket, key, path, startedAt, failure, phase, collector, pump, state, resumed);
    }

    const active = state;
    const uploadId = active.uploadId ?? '';
    const resumedBytes = active.completedBytes;
    setPhase('Uploading');

    let handle: FileHandle;
    try {
      handle = await open(path, 'r');
    } catch (error) {
      setPhase('Failed');
      return this.failure(bucket, key, path, startedAt, wrapLocalIoError(error, path, 'open'), phase, collector, pump, active, resumed);
    }

    const run = await runChunks({
      state: active,
      concurrency: options.maxParallelUploads ?? config.maxParallelUploads,
      retry: this.deps.retry,
      collector,
      logger,
      signal: options.signal,
      logContext,
      persist: () => this.deps.resumeStore.save(active),
      transferChunk: async ({ record, reportProgress }) => {
        const body = await readRange(handle, path, record.offset, record.length);
        const checksum = sha256Hex(body);
        const eTag = await this.deps.multipart.uploadPart(bucket, key, uploadId, record.index + 1, body, {
          payloadHash: checksum,
          onProgress: reportProgress,
          retry: false,
        });
        return { eTag, checksum };
      },
    }).finally(() => closeHandle(handle, logger, logContext));

    let error = run.error;
    if (!error) {
      const current = await fingerprintFile(path).catch((statError: unknown) => wrapError(statError));
      if (current instanceof S3Error) {
        error = current;
      } else if (compareFingerprints(fingerprint, current)) {
        error = TransferError.sourceChanged(path);
      }
    }

    let eTag: string | undefined;
    if (!error) {
      setPhase('Completing');
      try {
        const completed = await this.deps.multipart.completeMultipartUpload(bucket, key, uploadId, active.completedParts());
        eTag = completed.eTag;
        setPhase('Completed');
      } catch (completeError) {
        error = wrapError(completeError);
      }
    }

    const tally = new ByteTally(active.completedBytes, active.totalSize);
    const { durationMs, averageBytesPerSecond } = throughput(startedAt, run.bytesTransferred);

    if (error) {
      setPhase('Failed');
      await this.persistAfterFailure(active, logContext);
      collector.enqueue(progressEvent('TransferFailed', tally, { message: error.message }));
      logError(logger, 'Upload', error, { ...logContext, completedChunks: active.completedCount });
    } else {
      await this.deps.resumeStore.delete(identity).catch((deleteError: unknown) => {
        logError(logger, 'Resume state cleanup', deleteError, logContext);
      });
      collector.enqueue(progressEvent('TransferCompleted', tally));
      logger.info('Upload completed', { ...logContext, eTag, durationMs, averageBytesPerSecond });
    }
    pump.stop();

    return {
      direction: 'upload',
      bucket,
      key,
      localPath: path,
      totalSize: active.totalSize,
      bytesTransferred: run.bytesTransferred,
      resumedBytes,
      chunkSize: active.chunkSize,
      chunkCount: active.chunkCount,
      completedChunks: active.completedCount,
      durationMs,
      averageBytesPerSecond,
      success: error === undefined,
      error,
      eTag,
      resumed,
      state: active.toJSON(),
      phase,
      uploadId,
    };
  }

  /**
   * Aborts the upload recorded for this file and deletes its resume state
   *
   * @returns false when no resumable upload is recorded
   */
  async abortUpload(bucket: string, key: string, localPath: string): Promise<boolean> {
    const identity = { bucket, key, localPath: resolve(localPath), direction: 'upload' as const };
    const { state } = await this.deps.resumeStore.inspect(identity);
    if (!state?.uploadId) {
      return false;
    }

    try {
      await this.deps.multipart.abortMultipartUpload(bucket, key, state.uploadId);
    } catch (error) {
      if (!(error instanceof StorageError && error.status === 404)) {
        throw error;
      }
    }
    await this.deps.resumeStore.delete(identity);
    this.deps.logger.info('Aborted multipart upload', { bucket, key, uploadId: state.uploadId, phase: 'Aborted' });
    return true;
  }

  private async uploadSingle(
    bucket: string,
    key: string,
    path: string,
    fingerprint: TransferFingerprint,
    options: UploadFileOptions,
    collector: ProgressCollector,
    pump: ProgressPump,
    setPhase: (phase: UploadPhase) => void,
    startedAt: number
  ): Promise<UploadResult> {
    const tally = new ByteTally(0, fingerprint.size);
    let eTag: string | undefined;
    let error: S3Error | undefined;

    setPhase('Uploading');
    collector.enqueue(progressEvent('ChunkStarted', tally, { chunkIndex: 0 }));
    try {
      let body: Uint8Array;
      try {
        body = await readFile(path);
      } catch (readError) {
        throw wrapLocalIoError(readError, path, 'read');
      }
      const result = await this.deps.objects.putObject(bucket, key, body, {
        contentType: options.contentType,
        metadata: options.metadata,
        cacheControl: options.cacheControl,
        contentDisposition: options.contentDisposition,
        contentEncoding: options.contentEncoding,
        retrySignal: options.signal,
        onProgress: (bytes) => {
          tally.set(0, bytes);
          collector.enqueue(progressEvent('ChunkProgress', tally, { chunkIndex: 0, chunkBytes: bytes }));
        },
      });
      eTag = result.eTag;
      tally.settle(0, fingerprint.size);
      collector.enqueue(progressEvent('ChunkCompleted', tally, { chunkIndex: 0, chunkBytes: fingerprint.size }));
      collector.enqueue(progressEvent('TransferCompleted', tally));
      setPhase('Completed');
      this.deps.logger.info('Upload completed', { bucket, key, eTag, totalSize: fingerprint.size });
    } catch (putError) {
      error = wrapError(putError);
      tally.reset(0);
      collector.enqueue(progressEvent('ChunkFailed', tally, { chunkIndex: 0, message: error.message }));
      collector.enqueue(progressEvent('TransferFailed', tally, { message: error.message }));
      setPhase('Failed');
      logError(this.deps.logger, 'Upload', error, { bucket, key });
    }
    pump.stop();

    const bytes = error ? 0 : fingerprint.size;
    return {
      direction: 'upload',
      bucket,
      key,
      localPath: path,
      totalSize: fingerprint.size,
      bytesTransferred: bytes,
      resumedBytes: 0,
      chunkSize: fingerprint.size,
      chunkCount: 1,
      completedChunks: error ? 0 : 1,
      ...throughput(startedAt, bytes),
      success: error === undefined,
      error,
      eTag,
      resumed: false,
      phase: error ? 'Failed' : 'Completed',
    };
  }

  private async loadResumable(
    identity: { bucket: string; key: string; localPath: string; direction: 'upload' },
    fingerprint: TransferFingerprint,
    options: UploadFileOptions,
    logContext: LogContext
  ): Promise<TransferState | undefined> {
    const { state, problem } = await this.deps.resumeStore.inspect(identity);
    if (problem) {
      options.onWarning?.(problem);
    }
    if (!state) {
      return undefined;
    }

    const reason = state.uploadId ? compareFingerprints(state.fingerprint, fingerprint) : 'no upload id recorded';
    if (reason) {
      const warning = ResumeDataInvalidError.fingerprintMismatch(identity.localPath, reason);
      this.deps.logger.warn('Discarding resume state', { ...logContext, reason });
      options.onWarning?.(warning);
      await this.deps.resumeStore.delete(identity);
      return undefined;
    }
    return state;
  }

  /**
   * Re-queues completed chunks whose part the backend does not list with
   * the recorded ETag. A vanished upload discards the state.
   */
  private async verifyRemoteParts(
    state: TransferState,
    options: UploadFileOptions,
    logContext: LogContext
  ): Promise<TransferState | undefined> {
    const uploadId = state.uploadId;
    if (!uploadId) {
      return undefined;
    }

    let parts: PartInfo[];
    try {
      parts = await this.deps.multipart.listParts(state.bucket, state.key, uploadId);
    } catch (error) {
      if (error instanceof StorageError && error.status === 404) {
        const warning = new ResumeDataInvalidError({
          message: `Upload ${uploadId} no longer exists on the backend`,
          code: 'UPLOAD_NOT_FOUND',
          details: { uploadId },
          cause: error,
        });
        this.deps.logger.warn('Discarding resume state', { ...logContext, reason: warning.message });
        options.onWarning?.(warning);
        await this.deps.resumeStore.delete(state);
        return undefined;
      }
      throw error;
    }

    const remote = new Map(parts.map((part) => [part.partNumber, part.eTag]));
    let requeued = 0;
    for (const record of state.chunks) {
      if (record.status === 'Completed' && remote.get(record.index + 1) !== record.eTag) {
        state.updateChunk(record.index, {
          status: 'Pending',
          bytesTransferred: 0,
          eTag: undefined,
          checksum: undefined,
          completedAt: undefined,
        });
        requeued++;
      }
    }
    if (requeued > 0) {
      this.deps.logger.warn('Re-queued chunks missing on the backend', { ...logContext, requeued });
    }
    return state;
  }

  private async persistAfterFailure(state: TransferState, logContext: LogContext): Promise<void> {
    try {
      await this.deps.resumeStore.save(state);
    } catch (error) {
      logError(this.deps.logger, 'Persisting resume state', error, logContext);
    }
  }

  private async failure(
    bucket: string,
    key: string,
    path: string,
    startedAt: number,
    error: S3Error,
    phase: UploadPhase,
    collector: ProgressCollector,
    pump: ProgressPump,
    state?: TransferState,
    resumed = false
  ): Promise<UploadResult> {
    if (state) {
      await this.persistAfterFailure(state, { bucket, key });
    }
    collector.enqueue(
      progressEvent('TransferFailed', new ByteTally(state?.completedBytes ?? 0, state?.totalSize ?? 0), {
        message: error.message,
      })
    );
    pump.stop();

    return {
      direction: 'upload',
      bucket,
      key,
      localPath: path,
      totalSize: state?.totalSize ?? 0,
      bytesTransferred: 0,
      resumedBytes: state?.completedBytes ?? 0,
      chunkSize: state?.chunkSize ?? 0,
      chunkCount: state?.chunkCount ?? 0,
      completedChunks: state?.completedCount ?? 0,
      ...throughput(startedAt, 0),
      success: false,
      error,
      resumed,
      state: state?.toJSON(),
      phase,
      uploadId: state?.uploadId,
    };
  }
}
