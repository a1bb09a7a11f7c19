/**
 * In-memory backend records
 */

import type { HttpMethod } from '../signing/index.js';

export type S3Operation =
  | 'ListBuckets'
  | 'HeadBucket'
  | 'CreateBucket'
  | 'DeleteBucket'
  | 'GetBucketPolicy'
  | 'PutBucketPolicy'
  | 'DeleteBucketPolicy'
  | 'ListObjectsV2'
  | 'HeadObject'
  | 'GetObject'
  | 'PutObject'
  | 'CopyObject'
  | 'DeleteObject'
  | 'CreateMultipartUpload'
  | 'UploadPart'
  | 'CompleteMultipartUpload'
  | 'AbortMultipartUpload'
  | 'ListParts'
  | 'Unknown';

export interface StoredObject {
  data: Uint8Array;
  /** Unquoted */
  eTag: string;
  contentType: string;
  metadata: Record<string, string>;
  /** Cache-Control, Content-Disposition and Content-Encoding, lowercase names */
  standardHeaders: Record<string, string>;
  lastModified: Date;
}

export interface StoredPart {
  data: Uint8Array;
  eTag: string;
  lastModified: Date;
}

export interface StoredUpload {
  uploadId: string;
  bucket: string;
  key: string;
  contentType: string;
  metadata: Record<string, string>;
  standardHeaders: Record<string, string>;
  parts: Map<number, StoredPart>;
}

export interface StoredBucket {
  name: string;
  region: string;
  creationDate: Date;
  objects: Map<string, StoredObject>;
  policy?: string;
}

/**
 * A request as the backend saw it
 */
export interface RecordedRequest {
  operation: S3Operation;
  method: HttpMethod;
  bucket?: string;
  key?: string;
  query: Record<string, string>;
  /** Lowercase names */
  headers: Record<string, string>;
  bodyLength: number;
  status: number;
}

/**
 * Request details available to fault and hold predicates
 */
export type InboundRequest = Omit<RecordedRequest, 'status' | 'bodyLength'>;

export interface FaultRule {
  operation: S3Operation;
  /** Further narrows the matched requests */
  match?: (request: InboundRequest) => boolean;
  /** Number of requests to fail; defaults to 1 */
  times?: number;
  /** Respond with this status and an Error document */
  status?: number;
  code?: string;
  message?: string;
  /** Retry-After header, in seconds */
  retryAfter?: number;
  /** Fail the exchange as a dropped connection */
  connectionReset?: boolean;
  /** GetObject only: end the body after this many bytes */
  truncateBodyTo?: number;
}

export interface InMemoryS3Options {
  /** Host header every request must carry; defaults to localhost:9000 */
  host?: string;
  /** Recompute each SigV4 signature with these credentials */
  verifySignatures?: { accessKeyId: string; secretAccessKey: string; region: string };
  /** Upper bound on ListObjectsV2 page size */
  maxKeysPerPage?: number;
  /** Upper bound on ListParts page size */
  maxPartsPerPage?: number;
  /** Minimum size of every part but the last; defaults to 5 MiB */
  minPartSize?: number;
  /** Delay before each response */
  latencyMs?: number;
}
