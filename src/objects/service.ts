/**
 * Object operations
 * @module s3-resumable-client/objects/service
 */

import { createWriteStream } from 'node:fs';
import { Readable, Transform, type Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { STREAM_BUFFER_SIZE } from '../config/index.js';
import { ValidationError, wrapLocalIoError } from '../errors/index.js';
import { buildRequestUrl, toStorageError, type RequestExecutor } from '../client/request.js';
import { uriEncode, uriEncodePath } from '../signing/index.js';
import {
  getContentLength,
  getContentType,
  getETag,
  getHeader,
  getUserMetadata,
  toNetworkError,
  type UploadProgressCallback,
} from '../transport/index.js';
import type { CopyObjectResult, ListObjectsResult, ObjectDescriptor } from '../types/index.js';
import { parseCopyObjectResponse, parseDateSafe, parseErrorResponse, parseListObjectsResponse } from '../xml/index.js';

const decoder = new TextDecoder();

/** Largest page ListObjectsV2 returns */
const MAX_LIST_PAGE = 1000;

const FOLDER_CONTENT_TYPE = 'application/x-directory';

export interface ListObjectsOptions {
  prefix?: string;
  /** Defaults to true; otherwise keys are grouped on "/" into common prefixes */
  recursive?: boolean;
  /** Stop after this many objects */
  maxKeys?: number;
}

/**
 * Headers stored with an object and returned on GET and HEAD
 */
export interface ObjectHeaderOptions {
  contentType?: string;
  /** Sent as x-amz-meta-* headers */
  metadata?: Record<string, string>;
  cacheControl?: string;
  contentDisposition?: string;
  contentEncoding?: string;
}

export interface PutObjectOptions extends ObjectHeaderOptions {
  /** Required for stream bodies */
  contentLength?: number;
  onProgress?: UploadProgressCallback;
  /** Aborts the request in flight */
  signal?: AbortSignal;
  /** Stops further retries without aborting the request in flight */
  retrySignal?: AbortSignal;
}

export interface DeleteFolderOptions {
  /** Delete everything under the folder, not just its marker */
  recursive?: boolean;
}

export interface PutObjectResult {
  eTag: string;
}

/** Inclusive byte range */
export interface ByteRange {
  start: number;
  end?: number;
}

export interface GetObjectOptions {
  range?: ByteRange;
  /** Called with the running byte count as data is written */
  onProgress?: (bytesSoFar: number) => void;
  signal?: AbortSignal;
}

export interface ObjectStream {
  body: Readable;
  contentLength?: number;
  eTag?: string;
}

export interface ObjectLocation {
  bucket: string;
  key: string;
}

function requireLocation(bucket: string, key: string): void {
  if (!bucket) throw ValidationError.required('bucket');
  if (!key) throw ValidationError.required('key');
}

export function formatRange(range: ByteRange): string {
  if (!Number.isInteger(range.start) || range.start < 0) {
    throw new ValidationError({ message: `Invalid range start: ${range.start}`, code: 'INVALID_RANGE' });
  }
  if (range.end !== undefined && (!Number.isInteger(range.end) || range.end < range.start)) {
    throw new ValidationError({ message: `Invalid range end: ${range.end}`, code: 'INVALID_RANGE' });
  }
  return `bytes=${range.start}-${range.end ?? ''}`;
}

/**
 * Request headers for a new object. Content-Type defaults to
 * application/octet-stream; the other standard headers are sent when set.
 */
export function buildObjectHeaders(options: ObjectHeaderOptions): Record<string, string> {
  const headers: Record<string, string> = {
    'content-type': options.contentType ?? 'application/octet-stream',
  };
  if (options.cacheControl) headers['cache-control'] = options.cacheControl;
  if (options.contentDisposition) headers['content-disposition'] = options.contentDisposition;
  if (options.contentEncoding) headers['content-encoding'] = options.contentEncoding;

  for (const [name, value] of Object.entries(options.metadata ?? {})) {
    headers[`x-amz-meta-${name.toLowerCase()}`] = value;
  }
  return headers;
}

/**
 * Joins the non-blank segments of a folder path with "/". Backslashes count
 * as separators.
 *
 * @example
 * ```typescript
 * normalizeFolderPath(' /docs\\2024//q1/ '); // 'docs/2024/q1'
 * ```
 */
export function normalizeFolderPath(path: string): string {
  return path
    .split(/[\\/]/)
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0)
    .join('/');
}

function requireFolder(bucket: string, path: string): string {
  if (!bucket) throw ValidationError.required('bucket');
  const folder = normalizeFolderPath(path);
  if (!folder) {
    throw new ValidationError({ message: `Invalid folder path: '${path}'`, code: 'INVALID_FOLDER_PATH', details: { path } });
  }
  return folder;
}

/**
 * Listing, metadata, simple upload and download, copy and delete
 */
export class ObjectsService {
  constructor(private readonly executor: RequestExecutor) {}

  /**
   * Lists objects with ListObjectsV2, following continuation tokens until
   * the listing is exhausted or maxKeys objects were collected. Keys keep
   * the backend's order.
   */
  async listObjects(bucket: string, options: ListObjectsOptions = {}): Promise<ListObjectsResult> {
    if (!bucket) throw ValidationError.required('bucket');
    if (options.maxKeys !== undefined && (!Number.isInteger(options.maxKeys) || options.maxKeys < 1)) {
      throw new ValidationError({ message: 'maxKeys must be a positive integer', code: 'INVALID_MAX_KEYS' });
    }

    const limit = options.maxKeys ?? Number.POSITIVE_INFINITY;
    const objects: ObjectDescriptor[] = [];
    const commonPrefixes: string[] = [];
    let continuationToken: string | undefined;

    for (;;) {
      const response = await this.executor.send({
        method: 'GET',
        bucket,
        query: {
          'list-type': 2,
          prefix: options.prefix || undefined,
          delimiter: options.recursive === false ? '/' : undefined,
          'max-keys': Math.min(MAX_LIST_PAGE, limit - objects.length),
          'continuation-token': continuationToken,
        },
      });

      const page = parseListObjectsResponse(decoder.decode(response.body), bucket);
      objects.push(...page.objects);
      commonPrefixes.push(...page.commonPrefixes);

      if (objects.length >= limit) {
        return {
          objects: objects.slice(0, limit),
          commonPrefixes,
          truncated: page.isTruncated || objects.length > limit,
        };
      }
      if (!page.isTruncated || !page.nextContinuationToken) {
        return { objects, commonPrefixes, truncated: false };
      }
      continuationToken = page.nextContinuationToken;
    }
  }

  /**
   * Returns undefined when the object does not exist
   */
  async headObject(bucket: string, key: string): Promise<ObjectDescriptor | undefined> {
    requireLocation(bucket, key);
    const response = await this.executor.send({ method: 'HEAD', bucket, key, acceptStatus: [404] });
    if (response.status === 404) {
      return undefined;
    }

    return {
      bucket,
      key,
      size: getContentLength(response.headers) ?? 0,
      eTag: getETag(response.headers) ?? '',
      lastModified: parseDateSafe(getHeader(response.headers, 'last-modified')) ?? new Date(0),
      contentType: getContentType(response.headers),
      storageClass: getHeader(response.headers, 'x-amz-storage-class'),
      cacheControl: getHeader(response.headers, 'cache-control'),
      contentDisposition: getHeader(response.headers, 'content-disposition'),
      contentEncoding: getHeader(response.headers, 'content-encoding'),
      metadata: getUserMetadata(response.headers),
    };
  }

  async objectExists(bucket: string, key: string): Promise<boolean> {
    return (await this.headObject(bucket, key)) !== undefined;
  }

  /**
   * Uploads an object in one request. Buffered bodies are hashed and
   * retried; stream bodies are sent once with UNSIGNED-PAYLOAD and need a
   * contentLength.
   */
  async putObject(
    bucket: string,
    key: string,
    body: Uint8Array | string | Readable,
    options: PutObjectOptions = {}
  ): Promise<PutObjectResult> {
    requireLocation(bucket, key);

    const headers = buildObjectHeaders(options);

    if (body instanceof Readable) {
      if (options.contentLength === undefined) {
        throw ValidationError.required('contentLength');
      }
      headers['content-length'] = String(options.contentLength);
    }

    const response = await this.executor.send({
      method: 'PUT',
      bucket,
      key,
      headers,
      body,
      onUploadProgress: options.onProgress,
      signal: options.signal,
      retrySignal: options.retrySignal,
    });

    return { eTag: getETag(response.headers) ?? '' };
  }

  /**
   * Creates a folder as zero-byte `application/x-directory` marker objects,
   * one per level that does not exist yet
   *
   * @returns Keys of the markers created, outermost first
   */
  async createFolder(bucket: string, path: string): Promise<string[]> {
    const folder = requireFolder(bucket, path);
    const created: string[] = [];
    let prefix = '';

    for (const segment of folder.split('/')) {
      prefix += `${segment}/`;
      if (await this.objectExists(bucket, prefix)) {
        continue;
      }
      await this.putObject(bucket, prefix, new Uint8Array(0), { contentType: FOLDER_CONTENT_TYPE });
      created.push(prefix);
    }

    this.executor.logger.debug('Folder created', { bucket, folder, created: created.length });
    return created;
  }

  /**
   * Deletes a folder marker, or with `recursive` every object under the
   * folder
   *
   * @returns Keys deleted, in listing order; empty when nothing was there
   * @throws {ValidationError} FOLDER_NOT_EMPTY when the folder has contents
   * and `recursive` is not set
   */
  async deleteFolder(bucket: string, path: string, options: DeleteFolderOptions = {}): Promise<string[]> {
    const marker = `${requireFolder(bucket, path)}/`;
    const { objects } = await this.listObjects(bucket, { prefix: marker });

    const contents = objects.filter((object) => object.key !== marker);
    if (contents.length > 0 && !options.recursive) {
      throw new ValidationError({
        message: `Folder ${marker} is not empty`,
        code: 'FOLDER_NOT_EMPTY',
        details: { bucket, prefix: marker, objects: contents.length },
      });
    }

    const keys = objects.map((object) => object.key);
    for (const key of keys) {
      await this.deleteObject(bucket, key);
    }

    this.executor.logger.debug('Folder deleted', { bucket, prefix: marker, deleted: keys.length });
    return keys;
  }

  /**
   * Opens an object, or a byte range of it, as a stream
   */
  async getObjectStream(
    bucket: string,
    key: string,
    options: { range?: ByteRange; signal?: AbortSignal; retry?: boolean } = {}
  ): Promise<ObjectStream> {
    requireLocation(bucket, key);
    const response = await this.executor.sendStreaming({
      method: 'GET',
      bucket,
      key,
      headers: options.range ? { range: formatRange(options.range) } : undefined,
      signal: options.signal,
      retry: options.retry,
    });

    return {
      body: response.body,
      contentLength: getContentLength(response.headers),
      eTag: getETag(response.headers),
    };
  }

  /**
   * Downloads an object to a file path or a writable stream through 64 KiB
   * buffers.
   *
   * @returns Number of bytes written
   * @throws {LocalIoError} If the destination cannot be written
   */
  async getObject(
    bucket: string,
    key: string,
    destination: string | Writable,
    options: GetObjectOptions = {}
  ): Promise<number> {
    const source = await this.getObjectStream(bucket, key, { range: options.range, signal: options.signal });

    const target =
      typeof destination === 'string'
        ? createWriteStream(destination, { highWaterMark: STREAM_BUFFER_SIZE })
        : destination;

    let localError: unknown;
    target.once('error', (error: unknown) => {
      localError = error;
    });

    let bytes = 0;
    const onProgress = options.onProgress;
    const counter = new Transform({
      highWaterMark: STREAM_BUFFER_SIZE,
      transform(chunk: Buffer, _encoding, callback) {
        bytes += chunk.length;
        onProgress?.(bytes);
        callback(null, chunk);
      },
    });

    try {
      await pipeline(source.body, counter, target);
    } catch (error) {
      if (localError !== undefined) {
        throw wrapLocalIoError(localError, typeof destination === 'string' ? destination : key, 'write');
      }
      throw toNetworkError(
        error,
        buildRequestUrl(this.executor.config.endpointUrl, bucket, key),
        this.executor.config.timeout
      );
    }

    return bytes;
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    requireLocation(bucket, key);
    await this.executor.send({ method: 'DELETE', bucket, key });
  }

  /**
   * Server-side copy
   */
  async copyObject(source: ObjectLocation, destination: ObjectLocation): Promise<CopyObjectResult> {
    requireLocation(source.bucket, source.key);
    requireLocation(destination.bucket, destination.key);

    const response = await this.executor.send({
      method: 'PUT',
      bucket: destination.bucket,
      key: destination.key,
      headers: {
        'x-amz-copy-source': `/${uriEncode(source.bucket)}/${uriEncodePath(source.key)}`,
      },
    });

    // A copy can fail after the 200 status line was sent
    const text = decoder.decode(response.body);
    if (parseErrorResponse(text)) {
      throw toStorageError({ ...response, status: 500 });
    }
    return parseCopyObjectResponse(text);
  }
}
