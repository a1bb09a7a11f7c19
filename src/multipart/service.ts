/**
 * Multipart upload primitives
 * @module s3-resumable-client/multipart/service
 */

import { MAX_PART_COUNT } from '../config/index.js';
import { TransferError, ValidationError } from '../errors/index.js';
import { toStorageError, type RequestExecutor } from '../client/request.js';
import { buildObjectHeaders, type ObjectHeaderOptions } from '../objects/index.js';
import { getETag, type UploadProgressCallback } from '../transport/index.js';
import type { CompletedPart, CompleteMultipartResult, PartInfo } from '../types/index.js';
import {
  buildCompleteMultipartXml,
  parseCompleteMultipartResponse,
  parseErrorResponse,
  parseInitiateMultipartResponse,
  parseListPartsResponse,
} from '../xml/index.js';

const decoder = new TextDecoder();

export type CreateMultipartOptions = ObjectHeaderOptions;

export interface UploadPartOptions {
  /** Hex SHA-256 of the body when already computed */
  payloadHash?: string;
  onProgress?: UploadProgressCallback;
  signal?: AbortSignal;
  /** Defaults to true; transfer managers retry parts themselves */
  retry?: boolean;
}

function requireUpload(bucket: string, key: string, uploadId: string): void {
  if (!bucket) throw ValidationError.required('bucket');
  if (!key) throw ValidationError.required('key');
  if (!uploadId) throw ValidationError.required('uploadId');
}

/**
 * Initiate, upload part, complete, abort and list parts
 */
export class MultipartService {
  constructor(private readonly executor: RequestExecutor) {}

  /**
   * POST ?uploads
   *
   * @returns The upload id
   */
  async createMultipartUpload(bucket: string, key: string, options: CreateMultipartOptions = {}): Promise<string> {
    if (!bucket) throw ValidationError.required('bucket');
    if (!key) throw ValidationError.required('key');

    const headers = buildObjectHeaders(options);

    const response = await this.executor.send({
      method: 'POST',
      bucket,
      key,
      query: { uploads: '' },
      headers,
    });
    return parseInitiateMultipartResponse(decoder.decode(response.body));
  }

  /**
   * PUT ?partNumber=N&uploadId=ID
   *
   * @returns The part ETag, unquoted
   */
  async uploadPart(
    bucket: string,
    key: string,
    uploadId: string,
    partNumber: number,
    body: Uint8Array,
    options: UploadPartOptions = {}
  ): Promise<string> {
    requireUpload(bucket, key, uploadId);
    if (!Number.isInteger(partNumber) || partNumber < 1 || partNumber > MAX_PART_COUNT) {
      throw new ValidationError({
        message: `Part number must be between 1 and ${MAX_PART_COUNT}, got ${partNumber}`,
        code: 'INVALID_PART_NUMBER',
      });
    }

    const response = await this.executor.send({
      method: 'PUT',
      bucket,
      key,
      query: { partNumber, uploadId },
      body,
      payloadHash: options.payloadHash,
      onUploadProgress: options.onProgress,
      signal: options.signal,
      retry: options.retry,
    });

    const eTag = getETag(response.headers);
    if (!eTag) {
      throw new TransferError({
        message: `Part ${partNumber} upload returned no ETag`,
        code: 'MISSING_ETAG',
        isRetryable: true,
        details: { partNumber },
      });
    }
    return eTag;
  }

  /**
   * POST ?uploadId=ID with parts listed in ascending order
   */
  async completeMultipartUpload(
    bucket: string,
    key: string,
    uploadId: string,
    parts: CompletedPart[]
  ): Promise<CompleteMultipartResult> {
    requireUpload(bucket, key, uploadId);

    const response = await this.executor.send({
      method: 'POST',
      bucket,
      key,
      query: { uploadId },
      body: buildCompleteMultipartXml(parts),
      headers: { 'content-type': 'application/xml' },
    });

    // Completion can fail after the 200 status line was sent
    const text = decoder.decode(response.body);
    if (parseErrorResponse(text)) {
      throw toStorageError({ ...response, status: 500 });
    }
    return parseCompleteMultipartResponse(text);
  }

  /**
   * DELETE ?uploadId=ID
   */
  async abortMultipartUpload(bucket: string, key: string, uploadId: string): Promise<void> {
    requireUpload(bucket, key, uploadId);
    await this.executor.send({ method: 'DELETE', bucket, key, query: { uploadId } });
  }

  /**
   * GET ?uploadId=ID, following part-number markers across pages
   */
  async listParts(bucket: string, key: string, uploadId: string): Promise<PartInfo[]> {
    requireUpload(bucket, key, uploadId);

    const parts: PartInfo[] = [];
    let marker: number | undefined;

    for (;;) {
      const response = await this.executor.send({
        method: 'GET',
        bucket,
        key,
        query: { uploadId, 'part-number-marker': marker },
      });
      const page = parseListPartsResponse(decoder.decode(response.body));
      parts.push(...page.parts);

      if (!page.isTruncated || page.nextPartNumberMarker === undefined || page.nextPartNumberMarker === marker) {
        return parts;
      }
      marker = page.nextPartNumberMarker;
    }
  }
}
