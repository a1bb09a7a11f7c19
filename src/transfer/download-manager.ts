/**
 * Resumable parallel ranged downloads into a local file
 */

import { mkdir, open, stat, writeFile, type FileHandle } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { NormalizedS3Config } from '../config/index.js';
import {
  ResumeDataInvalidError,
  S3Error,
  StorageError,
  TransferError,
  wrapError,
  wrapLocalIoError,
} from '../errors/index.js';
import type { ObjectsService } from '../objects/index.js';
import { logError, type LogContext, type Logger } from '../observability/index.js';
import type { RetryExecutor } from '../resilience/index.js';
import { Sha256Accumulator } from '../signing/index.js';
import { toNetworkError } from '../transport/index.js';
import type { ObjectDescriptor } from '../types/index.js';
import { ByteTally, closeHandle, progressEvent, runChunks, throughput } from './chunk-runner.js';
import { ProgressCollector, ProgressPump, type ProgressSink } from './progress.js';
import type { ResumeStore, TransferIdentity } from './resume-store.js';
import { TransferState, compareFingerprints, type ChunkRecord, type TransferFingerprint } from './state.js';
import type { DownloadFileOptions, DownloadResult } from './types.js';

export interface DownloadManagerDeps {
  config: NormalizedS3Config;
  objects: ObjectsService;
  resumeStore: ResumeStore;
  retry: RetryExecutor;
  logger: Logger;
}

async function writeAt(handle: FileHandle, data: Uint8Array, position: number): Promise<void> {
  let written = 0;
  while (written < data.length) {
    const result = await handle.write(data, written, data.length - written, position + written);
    written += result.bytesWritten;
  }
}

function rangeMismatch(record: ChunkRecord, received: number): TransferError {
  return new TransferError({
    message: `Chunk ${record.index} received ${received} bytes for a ${record.length}-byte range`,
    code: 'RANGE_MISMATCH',
    details: { index: record.index, expected: record.length, received },
  });
}

/**
 * Downloads an object in byte ranges.
 *
 * The destination is preallocated to the object size and each worker writes
 * its range at the chunk's offset through a shared file handle.
 */
export class MultipartDownloadManager {
  constructor(private readonly deps: DownloadManagerDeps) {}

  async downloadFile(
    bucket: string,
    key: string,
    localPath: string,
    options: DownloadFileOptions = {},
    sink?: ProgressSink
  ): Promise<DownloadResult> {
    const { config, logger } = this.deps;
    const path = resolve(localPath);
    const startedAt = Date.now();
    const logContext: LogContext = { bucket, key, localPath: path, direction: 'download' };
    const identity: TransferIdentity = { bucket, key, localPath: path, direction: 'download' };
    const collector = new ProgressCollector();
    const pump = new ProgressPump(collector, sink, config.progressIntervalMs, logger);

    const chunkSize = options.chunkSize ?? config.chunkSize;
    if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
      throw new TransferError({ message: `Invalid chunk size: ${chunkSize}`, code: 'INVALID_CHUNK_SIZE' });
    }

    let head: ObjectDescriptor | undefined;
    try {
      head = await this.deps.objects.headObject(bucket, key);
    } catch (error) {
      return this.failure(identity, startedAt, wrapError(error), collector, pump);
    }
    if (!head) {
      return this.failure(identity, startedAt, StorageError.notFound(`${bucket}/${key}`, 'NoSuchKey'), collector, pump);
    }

    const fingerprint: TransferFingerprint = {
      size: head.size,
      lastModified: head.lastModified.getTime(),
      eTag: head.eTag,
    };
    logger.info('Starting download', { ...logContext, totalSize: head.size, chunkSize, eTag: head.eTag });
    pump.start();

    if (head.size === 0) {
      return this.downloadEmpty(identity, head, startedAt, collector, pump);
    }

    let state: TransferState | undefined;
    let resumed = false;
    let handle: FileHandle;
    try {
      if (options.resume !== false) {
        state = await this.loadResumable(identity, fingerprint, options, logContext);
        resumed = state !== undefined;
      }

      if (state) {
        logger.info('Resuming download', {
          ...logContext,
          completedChunks: state.completedCount,
          chunkCount: state.chunkCount,
        });
        handle = await open(path, 'r+');
      } else {
        state = TransferState.create({
          bucket,
          key,
          localPath: path,
          totalSize: head.size,
          chunkSize,
          direction: 'download',
          fingerprint,
        });
        await mkdir(dirname(path), { recursive: true });
        handle = await open(path, 'w');
        await handle.truncate(head.size);
      }
    } catch (error) {
      return this.failure(identity, startedAt, wrapLocalIoError(error, path, 'prepare'), collector, pump);
    }

    try {
      await this.deps.resumeStore.save(state);
    } catch (error) {
      await closeHandle(handle, logger, logContext);
      return this.failure(identity, startedAt, wrapError(error), collector, pump);
    }

    const active = state;
    const resumedBytes = active.completedBytes;
    const objectUrl = `${config.endpointUrl}/${bucket}/${key}`;

    const run = await runChunks({
      state: active,
      concurrency: options.maxParallelDownloads ?? config.maxParallelDownloads,
      retry: this.deps.retry,
      collector,
      logger,
      signal: options.signal,
      logContext,
      persist: () => this.deps.resumeStore.save(active),
      transferChunk: async ({ record, reportProgress }) => {
        const { body, contentLength } = await this.deps.objects.getObjectStream(bucket, key, {
          range: { start: record.offset, end: record.offset + record.length - 1 },
          retry: false,
        });
        if (contentLength !== undefined && contentLength > record.length) {
          body.destroy();
          throw rangeMismatch(record, contentLength);
        }

        const hash = new Sha256Accumulator();
        let written = 0;
        try {
          for await (const piece of body) {
            if (!(piece instanceof Uint8Array)) {
              throw new TransferError({ message: 'Response body yielded a non-binary chunk', code: 'INVALID_BODY' });
            }
            if (written + piece.length > record.length) {
              throw rangeMismatch(record, written + piece.length);
            }
            try {
              await writeAt(handle, piece, record.offset + written);
            } catch (error) {
              throw wrapLocalIoError(error, path, 'write');
            }
            hash.update(piece);
            written += piece.length;
            reportProgress(written);
          }
        } catch (error) {
          body.destroy();
          throw error instanceof S3Error ? error : toNetworkError(error, objectUrl, config.timeout);
        }

        if (written < record.length) {
          throw TransferError.shortBody(record.index, record.length, written);
        }
        return { checksum: hash.digestHex() };
      },
    }).finally(() => closeHandle(handle, logger, logContext));

    const tally = new ByteTally(active.completedBytes, active.totalSize);
    const { durationMs, averageBytesPerSecond } = throughput(startedAt, run.bytesTransferred);
    const error = run.error;

    if (error) {
      await this.persistAfterFailure(active, logContext);
      collector.enqueue(progressEvent('TransferFailed', tally, { message: error.message }));
      logError(logger, 'Download', error, { ...logContext, completedChunks: active.completedCount });
    } else {
      await this.deps.resumeStore.delete(identity).catch((deleteError: unknown) => {
        logError(logger, 'Resume state cleanup', deleteError, logContext);
      });
      collector.enqueue(progressEvent('TransferCompleted', tally));
      logger.info('Download completed', { ...logContext, durationMs, averageBytesPerSecond });
    }
    pump.stop();

    return {
      direction: 'download',
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
      eTag: head.eTag,
      resumed,
      state: active.toJSON(),
    };
  }

  private async downloadEmpty(
    identity: TransferIdentity,
    head: ObjectDescriptor,
    startedAt: number,
    collector: ProgressCollector,
    pump: ProgressPump
  ): Promise<DownloadResult> {
    const path = identity.localPath;
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, new Uint8Array(0));
      await this.deps.resumeStore.delete(identity);
    } catch (error) {
      return this.failure(identity, startedAt, wrapLocalIoError(error, path, 'write'), collector, pump);
    }

    collector.enqueue(progressEvent('TransferCompleted', new ByteTally(0, 0)));
    pump.stop();
    this.deps.logger.info('Download completed', { bucket: identity.bucket, key: identity.key, totalSize: 0 });

    return {
      direction: 'download',
      bucket: identity.bucket,
      key: identity.key,
      localPath: path,
      totalSize: 0,
      bytesTransferred: 0,
      resumedBytes: 0,
      chunkSize: 0,
      chunkCount: 0,
      completedChunks: 0,
      ...throughput(startedAt, 0),
      success: true,
      eTag: head.eTag,
      resumed: false,
    };
  }

  /**
   * Returns the stored state when it matches the object and the destination
   * still has its preallocated size
   */
  private async loadResumable(
    identity: TransferIdentity,
    fingerprint: TransferFingerprint,
    options: DownloadFileOptions,
    logContext: LogContext
  ): Promise<TransferState | undefined> {
    const { state, problem } = await this.deps.resumeStore.inspect(identity);
    if (problem) {
      options.onWarning?.(problem);
    }
    if (!state) {
      return undefined;
    }

    let reason = compareFingerprints(state.fingerprint, fingerprint);
    if (!reason) {
      const size = await stat(identity.localPath).then(
        (stats) => stats.size,
        () => undefined
      );
      if (size === undefined) {
        reason = 'destination file is missing';
      } else if (size !== state.totalSize) {
        reason = `destination is ${size} bytes, expected ${state.totalSize}`;
      }
    }

    if (reason) {
      this.deps.logger.warn('Discarding resume state', { ...logContext, reason });
      options.onWarning?.(ResumeDataInvalidError.fingerprintMismatch(identity.localPath, reason));
      await this.deps.resumeStore.delete(identity);
      return undefined;
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
    identity: TransferIdentity,
    startedAt: number,
    error: S3Error,
    collector: ProgressCollector,
    pump: ProgressPump,
    state?: TransferState
  ): Promise<DownloadResult> {
    logError(this.deps.logger, 'Download', error, { bucket: identity.bucket, key: identity.key });
    if (state) {
      await this.persistAfterFailure(state, { bucket: identity.bucket, key: identity.key });
    }
    collector.enqueue(
      progressEvent('TransferFailed', new ByteTally(state?.completedBytes ?? 0, state?.totalSize ?? 0), {
        message: error.message,
      })
    );
    pump.stop();

    return {
      direction: 'download',
      bucket: identity.bucket,
      key: identity.key,
      localPath: identity.localPath,
      totalSize: state?.totalSize ?? 0,
      bytesTransferred: 0,
      resumedBytes: 0,
      chunkSize: state?.chunkSize ?? 0,
      chunkCount: state?.chunkCount ?? 0,
      completedChunks: state?.completedCount ?? 0,
      ...throughput(startedAt, 0),
      success: false,
      error,
      resumed: false,
      state: state?.toJSON(),
    };
  }
}
