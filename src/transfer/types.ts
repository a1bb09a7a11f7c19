/**
 * Transfer options and result records
 */

import type { S3Error, ResumeDataInvalidError } from '../errors/index.js';
import type { ObjectHeaderOptions } from '../objects/index.js';
import type { TransferStateData } from './state.js';

export type UploadPhase =
  | 'NotStarted'
  | 'Initiated'
  | 'Uploading'
  | 'Completing'
  | 'Completed'
  | 'Failed'
  | 'Aborted';

interface TransferOptionsBase {
  /** Overrides the configured chunk size */
  chunkSize?: number;
  /** Reuse a stored resume state when it still matches (default true) */
  resume?: boolean;
  /** Stops dispatch of new chunks and further retries */
  signal?: AbortSignal;
  /** Called when stored resume data is discarded */
  onWarning?: (warning: ResumeDataInvalidError) => void;
}

export interface UploadFileOptions extends TransferOptionsBase, ObjectHeaderOptions {
  maxParallelUploads?: number;
  /** Re-list parts on resume and re-queue completed chunks the backend lacks */
  verifyRemoteParts?: boolean;
  onPhaseChange?: (phase: UploadPhase) => void;
}

export interface DownloadFileOptions extends TransferOptionsBase {
  maxParallelDownloads?: number;
}

export interface TransferResult {
  bucket: string;
  key: string;
  localPath: string;
  totalSize: number;
  /** Bytes moved by this call; chunks skipped on resume are not counted */
  bytesTransferred: number;
  /** Bytes already complete when the call started */
  resumedBytes: number;
  chunkSize: number;
  chunkCount: number;
  completedChunks: number;
  durationMs: number;
  averageBytesPerSecond: number;
  success: boolean;
  error?: S3Error;
  eTag?: string;
  /** True when a stored resume state was reused, even with no chunk complete */
  resumed: boolean;
  /** Final chunk state, when the transfer was chunked */
  state?: TransferStateData;
}

export interface UploadResult extends TransferResult {
  direction: 'upload';
  phase: UploadPhase;
  uploadId?: string;
}

export interface DownloadResult extends TransferResult {
  direction: 'download';
}
