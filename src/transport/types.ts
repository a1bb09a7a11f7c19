/**
 * HTTP transport type definitions
 */

import type { Readable } from 'node:stream';
import type { HttpMethod } from '../signing/index.js';

/**
 * Upload progress callback. Runs synchronously from the body stream and
 * must not wait on further I/O.
 */
export type UploadProgressCallback = (bytesSoFar: number) => void;

/**
 * HTTP request
 */
export interface HttpRequest {
  method: HttpMethod;
  /** Full URL including protocol, host, path, and query string */
  url: string;
  headers: Record<string, string>;
  /** Buffered or streamed request body */
  body?: Uint8Array | Readable;
  /** Called as request body bytes are handed to the socket */
  onUploadProgress?: UploadProgressCallback;
  /** Aborts the request when signalled */
  signal?: AbortSignal;
}

/**
 * HTTP response with buffered body
 */
export interface HttpResponse {
  status: number;
  /** Lowercase header names */
  headers: Record<string, string>;
  body: Uint8Array;
}

/**
 * HTTP response with streaming body
 */
export interface StreamingHttpResponse {
  status: number;
  /** Lowercase header names */
  headers: Record<string, string>;
  body: Readable;
}

/**
 * HTTP transport interface. Implementations do not interpret status codes.
 */
export interface HttpTransport {
  /**
   * Sends a request and buffers the whole response body.
   * Suitable for metadata, listings and error bodies.
   */
  send(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Sends a request and returns the response body as a stream.
   * The caller must consume or destroy the body.
   */
  sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse>;

  /**
   * Closes the transport and releases pooled connections
   */
  close(): Promise<void>;
}

/**
 * Helper to get header value (case-insensitive)
 */
export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

export function isSuccessResponse(response: { status: number }): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Helper to extract ETag from response headers, without quotes
 */
export function getETag(headers: Record<string, string>): string | undefined {
  return getHeader(headers, 'etag')?.replace(/^"|"$/g, '');
}

export function getContentLength(headers: Record<string, string>): number | undefined {
  const value = getHeader(headers, 'content-length');
  if (value === undefined) return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

export function getContentType(headers: Record<string, string>): string | undefined {
  return getHeader(headers, 'content-type');
}

export function getRequestId(headers: Record<string, string>): string | undefined {
  return getHeader(headers, 'x-amz-request-id');
}

/**
 * Helper to extract Retry-After (seconds) from response headers
 */
export function getRetryAfter(headers: Record<string, string>): number | undefined {
  const value = getHeader(headers, 'retry-after');
  if (!value) return undefined;

  // Retry-After can be either seconds or HTTP date
  const seconds = parseInt(value, 10);
  if (!isNaN(seconds)) {
    return seconds;
  }

  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    return Math.max(0, Math.floor((date.getTime() - Date.now()) / 1000));
  }

  return undefined;
}

/**
 * Collects `x-amz-meta-*` headers into a metadata record keyed without the
 * prefix
 */
export function getUserMetadata(headers: Record<string, string>): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    const lower = key.toLowerCase();
    if (lower.startsWith('x-amz-meta-')) {
      metadata[lower.substring('x-amz-meta-'.length)] = value;
    }
  }
  return metadata;
}
