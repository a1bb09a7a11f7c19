/**
 * undici-based HTTP transport
 */

import { Pool } from 'undici';
import type { Readable } from 'node:stream';
import { NetworkError, isS3Error } from '../errors/index.js';
import type { S3Error } from '../errors/index.js';
import type { HttpRequest, HttpResponse, StreamingHttpResponse, HttpTransport } from './types.js';
import { withUploadProgress } from './progress-stream.js';

export interface UndiciTransportOptions {
  /** Request timeout in milliseconds, applied to headers and body separately */
  timeout: number;
  /** Connections per origin */
  connections?: number;
  /** Idle keep-alive timeout in milliseconds */
  keepAliveTimeout?: number;
}

const DNS_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN']);
const RESET_CODES = new Set(['ECONNRESET', 'EPIPE', 'ECONNREFUSED', 'UND_ERR_SOCKET', 'UND_ERR_CLOSED']);
const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Maps a socket-level failure to a NetworkError. S3Errors pass through.
 */
export function toNetworkError(error: unknown, url: string, timeoutMs: number): S3Error {
  if (isS3Error(error)) {
    return error;
  }

  const code = errorCode(error) ?? (error instanceof Error && 'cause' in error ? errorCode(error.cause) : undefined);
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && (error.name === 'AbortError' || code === 'UND_ERR_ABORTED' || code === 'ABORT_ERR')) {
    return new NetworkError({
      message: 'Request was aborted',
      code: 'ABORTED',
      isRetryable: false,
      cause: error,
    });
  }
  if (code && TIMEOUT_CODES.has(code)) {
    return new NetworkError({
      message: `Request timed out after ${timeoutMs}ms`,
      code: 'TIMEOUT',
      details: { timeoutMs, url },
      cause: error,
    });
  }
  if (code && DNS_CODES.has(code)) {
    return NetworkError.dnsError(url, error);
  }
  if (code && RESET_CODES.has(code)) {
    return NetworkError.connectionReset(error);
  }
  return NetworkError.connectionFailed(message, error);
}

function convertHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      result[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      result[key.toLowerCase()] = value.join(', ');
    }
  }
  return result;
}

/**
 * HTTP transport over undici connection pools, one pool per origin.
 *
 * Request bodies are buffers or Node streams; when an upload progress
 * callback is given the body is routed through a byte-counting stream.
 */
export class UndiciTransport implements HttpTransport {
  private readonly options: UndiciTransportOptions;
  private readonly pools = new Map<string, Pool>();
  private closed = false;

  constructor(options: UndiciTransportOptions) {
    this.options = options;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const response = await this.dispatch(request);
    try {
      const body = new Uint8Array(await response.body.arrayBuffer());
      return { status: response.status, headers: response.headers, body };
    } catch (error) {
      throw toNetworkError(error, request.url, this.options.timeout);
    }
  }

  async sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse> {
    return this.dispatch(request);
  }

  async close(): Promise<void> {
    this.closed = true;
    const pools = [...this.pools.values()];
    this.pools.clear();
    await Promise.all(pools.map((pool) => pool.close()));
  }

  private async dispatch(request: HttpRequest): Promise<{
    status: number;
    headers: Record<string, string>;
    body: Readable & { arrayBuffer(): Promise<ArrayBuffer> };
  }> {
    if (this.closed) {
      throw NetworkError.connectionFailed('transport is closed');
    }

    const url = new URL(request.url);
    const pool = this.getPool(url.origin);

    const body =
      request.body !== undefined && request.onUploadProgress
        ? withUploadProgress(request.body, request.onUploadProgress)
        : request.body;

    try {
      const response = await pool.request({
        method: request.method,
        path: `${url.pathname}${url.search}`,
        headers: request.headers,
        body,
        signal: request.signal,
        headersTimeout: this.options.timeout,
        bodyTimeout: this.options.timeout,
      });

      return {
        status: response.statusCode,
        headers: convertHeaders(response.headers),
        body: response.body,
      };
    } catch (error) {
      throw toNetworkError(error, request.url, this.options.timeout);
    }
  }

  private getPool(origin: string): Pool {
    let pool = this.pools.get(origin);
    if (!pool) {
      pool = new Pool(origin, {
        connections: this.options.connections ?? 16,
        pipelining: 1,
        keepAliveTimeout: this.options.keepAliveTimeout ?? 60000,
        connectTimeout: this.options.timeout,
      });
      this.pools.set(origin, pool);
    }
    return pool;
  }
}

/**
 * Creates an undici transport
 */
export function createUndiciTransport(timeout: number = 30000, connections?: number): HttpTransport {
  return new UndiciTransport({ timeout, connections });
}
