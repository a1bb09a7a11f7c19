/**
 * Signed request execution shared by the bucket, object and multipart services
 * @module s3-resumable-client/client/request
 */

import { Readable } from 'node:stream';
import type { NormalizedS3Config } from '../config/index.js';
import { StorageError, ValidationError, mapHttpStatusToError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import type { RetryExecutor } from '../resilience/index.js';
import {
  S3Signer,
  UNSIGNED_PAYLOAD,
  hashPayload,
  uriEncode,
  uriEncodePath,
  type HttpMethod,
} from '../signing/index.js';
import {
  getRequestId,
  getRetryAfter,
  isSuccessResponse,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  type StreamingHttpResponse,
  type UploadProgressCallback,
} from '../transport/index.js';
import { parseErrorResponse } from '../xml/index.js';

/**
 * Query parameters; an empty string value renders as a bare key (`?uploads`)
 */
export type QueryParams = Record<string, string | number | undefined>;

export interface S3Request {
  method: HttpMethod;
  bucket?: string;
  key?: string;
  query?: QueryParams;
  headers?: Record<string, string>;
  /** Streamed bodies are sent with UNSIGNED-PAYLOAD and never retried */
  body?: Uint8Array | string | Readable;
  /** Precomputed SHA-256 of a buffered body */
  payloadHash?: string;
  onUploadProgress?: UploadProgressCallback;
  /** Aborts the exchange in flight and stops retries */
  signal?: AbortSignal;
  /** Stops retries only; defaults to signal */
  retrySignal?: AbortSignal;
  /** Set to false when the caller retries on its own. Defaults to true. */
  retry?: boolean;
  /** Statuses returned to the caller instead of raising StorageError */
  acceptStatus?: readonly number[];
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Builds a path-style URL: `{endpoint}/{bucket}/{key}?{query}`. Query keys
 * are sorted and every component is RFC 3986 encoded.
 *
 * @example
 * ```typescript
 * buildRequestUrl('http://localhost:9000', 'photos', 'a b/c.txt', { uploadId: 'x', partNumber: 1 });
 * // 'http://localhost:9000/photos/a%20b/c.txt?partNumber=1&uploadId=x'
 * ```
 */
export function buildRequestUrl(endpointUrl: string, bucket?: string, key?: string, query?: QueryParams): string {
  let url = endpointUrl + '/';
  if (bucket) {
    url += uriEncode(bucket);
    if (key) {
      url += '/' + uriEncodePath(key);
    }
  }

  const params = Object.entries(query ?? {})
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, value]) => {
      const text = String(value);
      return text === '' ? uriEncode(name) : `${uriEncode(name)}=${uriEncode(text)}`;
    });

  return params.length > 0 ? `${url}?${params.join('&')}` : url;
}

/**
 * Reads the body of a failed response and maps it to a StorageError
 */
export function toStorageError(response: HttpResponse): StorageError {
  const parsed = response.body.length > 0 ? parseErrorResponse(decoder.decode(response.body)) : undefined;
  return mapHttpStatusToError(
    response.status,
    parsed?.code,
    parsed?.message,
    parsed?.requestId ?? getRequestId(response.headers),
    getRetryAfter(response.headers)
  );
}

async function drain(body: Readable): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of body) {
    chunks.push(chunk instanceof Uint8Array ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

/**
 * Signs and sends requests against one endpoint, retrying buffered requests
 * and mapping non-2xx responses to StorageError.
 */
export class RequestExecutor {
  constructor(
    readonly config: NormalizedS3Config,
    private readonly transport: HttpTransport,
    readonly signer: S3Signer,
    readonly retry: RetryExecutor,
    readonly logger: Logger
  ) {}

  get region(): string {
    return this.config.region;
  }

  /**
   * Sends a request and buffers the response.
   *
   * @throws {StorageError} On a non-2xx status not listed in acceptStatus
   */
  async send(request: S3Request): Promise<HttpResponse> {
    return this.withRetry(request, async () => {
      const response = await this.transport.send(this.prepare(request));
      this.logResponse(request, response.status);
      if (!isSuccessResponse(response) && !request.acceptStatus?.includes(response.status)) {
        throw toStorageError(response);
      }
      return response;
    });
  }

  /**
   * Sends a request and returns the response body as a stream. Retries cover
   * the exchange up to the response headers only.
   *
   * @throws {StorageError} On a non-2xx status
   */
  async sendStreaming(request: S3Request): Promise<StreamingHttpResponse> {
    return this.withRetry(request, async () => {
      const response = await this.transport.sendStreaming(this.prepare(request));
      this.logResponse(request, response.status);
      if (!isSuccessResponse(response)) {
        const body = await drain(response.body);
        throw toStorageError({ status: response.status, headers: response.headers, body });
      }
      return response;
    });
  }

  private withRetry<T>(request: S3Request, operation: () => Promise<T>): Promise<T> {
    const retryable = request.retry !== false && !(request.body instanceof Readable);
    if (!retryable) {
      return operation();
    }
    return this.retry.execute(() => operation(), {
      signal: request.retrySignal ?? request.signal,
      context: { method: request.method, bucket: request.bucket, key: request.key },
    });
  }

  private prepare(request: S3Request): HttpRequest {
    if (request.key && !request.bucket) {
      throw ValidationError.required('bucket');
    }

    const url = new URL(buildRequestUrl(this.config.endpointUrl, request.bucket, request.key, request.query));
    const body = typeof request.body === 'string' ? encoder.encode(request.body) : request.body;

    let payloadHash: string;
    if (body instanceof Readable) {
      payloadHash = UNSIGNED_PAYLOAD;
    } else {
      payloadHash = request.payloadHash ?? hashPayload(body);
    }

    const headers: Record<string, string> = { host: this.config.host, ...request.headers };
    if (body instanceof Uint8Array && body.length > 0) {
      headers['content-length'] = String(body.length);
    }

    const signed = this.signer.sign({ method: request.method, url, headers, payloadHash });

    return {
      method: signed.method,
      url: signed.url.toString(),
      headers: signed.headers,
      body: body instanceof Uint8Array && body.length === 0 ? undefined : body,
      onUploadProgress: request.onUploadProgress,
      signal: request.signal,
    };
  }

  private logResponse(request: S3Request, status: number): void {
    this.logger.debug('S3 request completed', {
      method: request.method,
      bucket: request.bucket,
      key: request.key,
      status,
    });
  }
}
