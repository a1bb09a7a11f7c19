/**
 * Shared driver for chunked transfers: worker dispatch, per-chunk retry,
 * persistence and progress accounting
 */

import type { FileHandle } from 'node:fs/promises';
import { LocalIoError, S3Error, TransferError, wrapError } from '../errors/index.js';
import { logError, type LogContext, type Logger } from '../observability/index.js';
import type { RetryExecutor } from '../resilience/index.js';
import type { ProgressCollector, ProgressEvent, ProgressEventKind } from './progress.js';
import type { ChunkRecord, TransferState } from './state.js';
import { runWorkerPool } from './worker-pool.js';

export interface ChunkOutcome {
  eTag?: string;
  checksum?: string;
}

export interface ChunkContext {
  readonly record: ChunkRecord;
  /** 0-based attempt for this chunk */
  readonly attempt: number;
  /** Reports bytes moved so far for this attempt */
  reportProgress(chunkBytes: number): void;
}

export interface ChunkRunnerOptions {
  state: TransferState;
  concurrency: number;
  retry: RetryExecutor;
  collector: ProgressCollector;
  logger: Logger;
  signal?: AbortSignal;
  /** Persists the state after each completed chunk */
  persist: () => Promise<void>;
  transferChunk: (context: ChunkContext) => Promise<ChunkOutcome>;
  logContext: LogContext;
}

export interface ChunkRunResult {
  /** Bytes moved by this run */
  bytesTransferred: number;
  error?: S3Error;
}

/**
 * Cumulative byte accounting across concurrent chunks. A retried chunk
 * gives back what its failed attempt had counted.
 */
export class ByteTally {
  private total: number;
  private readonly inFlight = new Map<number, number>();

  constructor(
    private readonly baseline: number,
    readonly totalBytes: number
  ) {
    this.total = baseline;
  }

  get transferred(): number {
    return this.total;
  }

  get movedThisRun(): number {
    return this.total - this.baseline;
  }

  set(index: number, chunkBytes: number): void {
    this.total += chunkBytes - (this.inFlight.get(index) ?? 0);
    this.inFlight.set(index, chunkBytes);
  }

  reset(index: number): void {
    this.set(index, 0);
    this.inFlight.delete(index);
  }

  settle(index: number, length: number): void {
    this.set(index, length);
    this.inFlight.delete(index);
  }
}

export function progressEvent(
  kind: ProgressEventKind,
  tally: ByteTally,
  extra: { chunkIndex?: number; chunkBytes?: number; message?: string } = {}
): ProgressEvent {
  return {
    kind,
    chunkIndex: extra.chunkIndex,
    chunkBytes: extra.chunkBytes ?? 0,
    bytesTransferred: tally.transferred,
    totalBytes: tally.totalBytes,
    timestamp: Date.now(),
    message: extra.message,
  };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs every pending chunk of `state` through `transferChunk`.
 *
 * Chunk failures are recorded on their ChunkRecord and never thrown; the
 * first fatal one stops dispatch and is returned once in-flight chunks have
 * settled.
 */
export async function runChunks(options: ChunkRunnerOptions): Promise<ChunkRunResult> {
  const { state, retry, collector, logger, signal } = options;
  const tally = new ByteTally(state.completedBytes, state.totalSize);
  const pending = state.pendingIndices();
  let fatal: S3Error | undefined;

  const runChunk = async (index: number): Promise<void> => {
    if (!state.claim(index)) {
      return;
    }
    const record = state.chunk(index);
    const context = { ...options.logContext, chunkIndex: index, offset: record.offset, length: record.length };
    collector.enqueue(progressEvent('ChunkStarted', tally, { chunkIndex: index }));

    let attempts = 0;
    try {
      const outcome = await retry.execute(
        async (attempt) => {
          attempts = attempt + 1;
          tally.reset(index);
          return options.transferChunk({
            record,
            attempt,
            reportProgress: (chunkBytes) => {
              tally.set(index, chunkBytes);
              state.updateChunk(index, { bytesTransferred: chunkBytes });
              collector.enqueue(progressEvent('ChunkProgress', tally, { chunkIndex: index, chunkBytes }));
            },
          });
        },
        {
          signal,
          context,
          onRetry: (retryNumber, delayMs, error) => {
            tally.reset(index);
            state.recordRetry(index, describe(error));
            collector.enqueue(
              progressEvent('ChunkRetrying', tally, {
                chunkIndex: index,
                message: `retry ${retryNumber} in ${delayMs}ms: ${describe(error)}`,
              })
            );
          },
        }
      );

      tally.settle(index, record.length);
      state.markCompleted(index, outcome);
      collector.enqueue(progressEvent('ChunkCompleted', tally, { chunkIndex: index, chunkBytes: record.length }));
      logger.debug('Chunk completed', context);
    } catch (error) {
      tally.reset(index);
      const failure = chunkFailure(error, index, attempts, signal);
      state.markFailed(index, failure.message);
      collector.enqueue(progressEvent('ChunkFailed', tally, { chunkIndex: index, message: failure.message }));
      logger.error('Chunk failed', {
        ...context,
        attempts,
        errorCode: failure.code,
        errorMessage: failure.message,
      });
      fatal ??= failure;
      return;
    }

    try {
      await options.persist();
    } catch (error) {
      fatal ??= wrapError(error, 'Persisting transfer state');
    }
  };

  await runWorkerPool(pending, runChunk, {
    concurrency: options.concurrency,
    shouldContinue: () => fatal === undefined && !signal?.aborted,
  });

  if (!fatal && signal?.aborted && !state.isComplete) {
    fatal = TransferError.cancelled();
  }

  return { bytesTransferred: tally.movedThisRun, error: fatal };
}

function chunkFailure(error: unknown, index: number, attempts: number, signal?: AbortSignal): S3Error {
  if (signal?.aborted) {
    return error instanceof TransferError && error.code === 'CANCELLED' ? error : TransferError.cancelled();
  }
  if (error instanceof LocalIoError || (error instanceof TransferError && error.code === 'SOURCE_CHANGED')) {
    return error;
  }
  return TransferError.chunkFailed(index, attempts, error);
}

export function throughput(startedAt: number, bytes: number): { durationMs: number; averageBytesPerSecond: number } {
  const durationMs = Math.max(0, Date.now() - startedAt);
  return {
    durationMs,
    averageBytesPerSecond: durationMs > 0 ? Math.round((bytes * 1000) / durationMs) : bytes,
  };
}

/**
 * Closes a file handle, logging rather than raising a failed close
 */
export async function closeHandle(handle: FileHandle, logger: Logger, logContext: LogContext): Promise<void> {
  try {
    await handle.close();
  } catch (error) {
    logError(logger, 'Closing file handle', error, logContext);
  }
}
