/**
 * Chunked, resumable file transfers
 */

export type { ChunkRange } from './partition.js';
export { partition, chunkCount, choosePartSize, findTilingViolation } from './partition.js';

export type {
  TransferDirection,
  ChunkStatus,
  ChunkRecord,
  ChunkPatch,
  TransferFingerprint,
  TransferStateData,
  CreateTransferStateParams,
} from './state.js';
export { TransferState, TRANSFER_STATE_VERSION, compareFingerprints } from './state.js';

export type { TransferIdentity, ResumeStoreOptions, ResumeInspection } from './resume-store.js';
export { ResumeStore, parseResumeData, RESUME_FILE_SUFFIX } from './resume-store.js';

export type { ProgressEvent, ProgressEventKind, ProgressSink } from './progress.js';
export { ProgressCollector, ProgressPump } from './progress.js';

export type { WorkerPoolOptions, WorkerPoolStats } from './worker-pool.js';
export { runWorkerPool } from './worker-pool.js';

export type { ChunkContext, ChunkOutcome, ChunkRunnerOptions, ChunkRunResult } from './chunk-runner.js';
export { runChunks, ByteTally } from './chunk-runner.js';

export type {
  UploadPhase,
  UploadFileOptions,
  DownloadFileOptions,
  TransferResult,
  UploadResult,
  DownloadResult,
} from './types.js';

export type { UploadManagerDeps } from './upload-manager.js';
export { MultipartUploadManager } from './upload-manager.js';
export type { DownloadManagerDeps } from './download-manager.js';
export { MultipartDownloadManager } from './download-manager.js';
