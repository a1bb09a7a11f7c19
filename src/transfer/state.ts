/**
 * Serializable state of a chunked transfer
 */

import { ResumeDataInvalidError, ValidationError } from '../errors/index.js';
import type { CompletedPart } from '../types/index.js';
import { findTilingViolation, partition } from './partition.js';

export const TRANSFER_STATE_VERSION = 1;

export type TransferDirection = 'upload' | 'download';

export type ChunkStatus = 'Pending' | 'InFlight' | 'Completed' | 'Failed';

export interface ChunkRecord {
  readonly index: number;
  readonly offset: number;
  readonly length: number;
  readonly status: ChunkStatus;
  readonly retryCount: number;
  /** Part ETag (uploads) */
  readonly eTag?: string;
  /** Hex SHA-256 of the chunk bytes */
  readonly checksum?: string;
  readonly bytesTransferred: number;
  readonly lastError?: string;
  /** ISO timestamp */
  readonly completedAt?: string;
}

export type ChunkPatch = Partial<Omit<ChunkRecord, 'index' | 'offset' | 'length'>>;

/**
 * Identity of the source captured at transfer start: the local file for
 * uploads, the remote object for downloads
 */
export interface TransferFingerprint {
  readonly size: number;
  /** Epoch milliseconds */
  readonly lastModified: number;
  readonly eTag?: string;
}

export interface TransferStateData {
  readonly version: number;
  readonly bucket: string;
  readonly key: string;
  readonly localPath: string;
  readonly totalSize: number;
  readonly chunkSize: number;
  readonly direction: TransferDirection;
  readonly uploadId?: string;
  readonly chunks: readonly ChunkRecord[];
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly fingerprint: TransferFingerprint;
}

export interface CreateTransferStateParams {
  bucket: string;
  key: string;
  localPath: string;
  totalSize: number;
  chunkSize: number;
  direction: TransferDirection;
  fingerprint: TransferFingerprint;
  uploadId?: string;
  now?: Date;
}

/**
 * Compares two fingerprints. An ETag is compared only when both carry one.
 *
 * @returns Why they differ, or undefined when they match
 */
export function compareFingerprints(
  stored: TransferFingerprint,
  current: TransferFingerprint
): string | undefined {
  if (stored.size !== current.size) {
    return `size changed from ${stored.size} to ${current.size}`;
  }
  if (stored.lastModified !== current.lastModified) {
    return `last-modified changed from ${stored.lastModified} to ${current.lastModified}`;
  }
  if (stored.eTag !== undefined && current.eTag !== undefined && stored.eTag !== current.eTag) {
    return `ETag changed from ${stored.eTag} to ${current.eTag}`;
  }
  return undefined;
}

/**
 * Per-chunk progress of one transfer.
 *
 * Records are replaced, never mutated in place, and only through
 * updateChunk. A chunk is claimed before work starts so no two workers can
 * own the same index.
 */
export class TransferState {
  readonly bucket: string;
  readonly key: string;
  readonly localPath: string;
  readonly totalSize: number;
  readonly chunkSize: number;
  readonly direction: TransferDirection;
  readonly fingerprint: TransferFingerprint;
  readonly createdAt: string;
  private _uploadId?: string;
  private _updatedAt: string;
  private readonly records: ChunkRecord[];

  private constructor(data: TransferStateData) {
    this.bucket = data.bucket;
    this.key = data.key;
    this.localPath = data.localPath;
    this.totalSize = data.totalSize;
    this.chunkSize = data.chunkSize;
    this.direction = data.direction;
    this.fingerprint = { ...data.fingerprint };
    this.createdAt = data.createdAt;
    this._uploadId = data.uploadId;
    this._updatedAt = data.updatedAt;
    this.records = data.chunks.map((chunk) => ({ ...chunk }));
  }

  static create(params: CreateTransferStateParams): TransferState {
    const now = (params.now ?? new Date()).toISOString();
    const chunks: ChunkRecord[] = partition(params.totalSize, params.chunkSize).map((range) => ({
      ...range,
      status: 'Pending',
      retryCount: 0,
      bytesTransferred: 0,
    }));

    return new TransferState({
      version: TRANSFER_STATE_VERSION,
      bucket: params.bucket,
      key: params.key,
      localPath: params.localPath,
      totalSize: params.totalSize,
      chunkSize: params.chunkSize,
      direction: params.direction,
      uploadId: params.uploadId,
      chunks,
      createdAt: now,
      updatedAt: now,
      fingerprint: params.fingerprint,
    });
  }

  /**
   * Rebuilds a state from persisted data. Chunks left InFlight by an
   * interrupted run go back to Pending.
   *
   * @throws {ResumeDataInvalidError} If the version is unknown or the chunks
   * do not tile the total size
   */
  static fromData(data: TransferStateData): TransferState {
    if (data.version !== TRANSFER_STATE_VERSION) {
      throw new ResumeDataInvalidError({
        message: `Unsupported resume data version ${data.version}`,
        code: 'UNSUPPORTED_VERSION',
      });
    }

    const violation = findTilingViolation(data.chunks, data.totalSize);
    if (violation) {
      throw new ResumeDataInvalidError({
        message: `Resume data chunks are inconsistent: ${violation}`,
        code: 'INVALID_CHUNKS',
      });
    }

    const state = new TransferState(data);
    for (const record of state.records) {
      if (record.status === 'InFlight') {
        state.updateChunk(record.index, { status: 'Pending', bytesTransferred: 0 });
      }
    }
    return state;
  }

  get uploadId(): string | undefined {
    return this._uploadId;
  }

  set uploadId(value: string | undefined) {
    this._uploadId = value;
    this.touch();
  }

  get updatedAt(): string {
    return this._updatedAt;
  }

  get chunks(): readonly ChunkRecord[] {
    return this.records;
  }

  get chunkCount(): number {
    return this.records.length;
  }

  chunk(index: number): ChunkRecord {
    const record = this.records[index];
    if (!record) {
      throw new ValidationError({
        message: `Chunk index ${index} is out of range (0-${this.records.length - 1})`,
        code: 'INVALID_CHUNK_INDEX',
      });
    }
    return record;
  }

  /**
   * Replaces the record at `index` with the patched copy
   */
  updateChunk(index: number, patch: ChunkPatch): ChunkRecord {
    const updated: ChunkRecord = { ...this.chunk(index), ...patch };
    this.records[index] = updated;
    this.touch();
    return updated;
  }

  /**
   * Marks a chunk InFlight for the calling worker
   *
   * @returns false when the chunk is already InFlight or Completed
   */
  claim(index: number): boolean {
    const record = this.chunk(index);
    if (record.status === 'InFlight' || record.status === 'Completed') {
      return false;
    }
    this.updateChunk(index, { status: 'InFlight', bytesTransferred: 0, lastError: undefined });
    return true;
  }

  markCompleted(index: number, result: { eTag?: string; checksum?: string }, now: Date = new Date()): ChunkRecord {
    const record = this.chunk(index);
    return this.updateChunk(index, {
      status: 'Completed',
      bytesTransferred: record.length,
      eTag: result.eTag,
      checksum: result.checksum,
      lastError: undefined,
      completedAt: now.toISOString(),
    });
  }

  markFailed(index: number, error: string): ChunkRecord {
    return this.updateChunk(index, {
      status: 'Failed',
      bytesTransferred: 0,
      lastError: error,
    });
  }

  recordRetry(index: number, error: string): ChunkRecord {
    const record = this.chunk(index);
    return this.updateChunk(index, {
      retryCount: record.retryCount + 1,
      bytesTransferred: 0,
      lastError: error,
    });
  }

  /**
   * Resets every chunk to Pending, discarding all recorded progress
   */
  invalidate(): void {
    for (const record of this.records) {
      this.records[record.index] = {
        index: record.index,
        offset: record.offset,
        length: record.length,
        status: 'Pending',
        retryCount: 0,
        bytesTransferred: 0,
      };
    }
    this.touch();
  }

  /**
   * Indices of chunks still to transfer, ascending
   */
  pendingIndices(): number[] {
    return this.records.filter((record) => record.status !== 'Completed').map((record) => record.index);
  }

  get completedCount(): number {
    return this.records.filter((record) => record.status === 'Completed').length;
  }

  get completedBytes(): number {
    return this.records.reduce(
      (sum, record) => (record.status === 'Completed' ? sum + record.length : sum),
      0
    );
  }

  get isComplete(): boolean {
    return this.records.every(
      (record) => record.status === 'Completed' && record.bytesTransferred === record.length
    );
  }

  /**
   * Completed parts in ascending part-number order
   */
  completedParts(): CompletedPart[] {
    const parts: CompletedPart[] = [];
    for (const record of this.records) {
      if (record.status === 'Completed' && record.eTag) {
        parts.push({ partNumber: record.index + 1, eTag: record.eTag });
      }
    }
    return parts;
  }

  touch(now: Date = new Date()): void {
    this._updatedAt = now.toISOString();
  }

  toJSON(): TransferStateData {
    return {
      version: TRANSFER_STATE_VERSION,
      bucket: this.bucket,
      key: this.key,
      localPath: this.localPath,
      totalSize: this.totalSize,
      chunkSize: this.chunkSize,
      direction: this.direction,
      uploadId: this._uploadId,
      chunks: this.records.map((record) => ({ ...record })),
      createdAt: this.createdAt,
      updatedAt: this._updatedAt,
      fingerprint: { ...this.fingerprint },
    };
  }
}
