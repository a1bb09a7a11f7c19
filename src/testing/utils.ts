/**
 * Helpers for the in-memory backend
 */

import { randomBytes } from 'node:crypto';
import { sha256Hex } from '../signing/index.js';

/**
 * Content ETag: the first 32 hex digits of the SHA-256, the length of an
 * MD5 ETag
 */
export function generateETag(data: Uint8Array): string {
  return sha256Hex(data).substring(0, 32);
}

/**
 * ETag of an object assembled from parts, in the `<hash>-<count>` form
 */
export function generateMultipartETag(partETags: readonly string[]): string {
  return `${sha256Hex(partETags.join('')).substring(0, 32)}-${partETags.length}`;
}

export function generateUploadId(): string {
  return randomBytes(16).toString('hex');
}

let requestCounter = 0;

export function generateRequestId(): string {
  requestCounter++;
  return `req-${requestCounter.toString(16).padStart(8, '0')}`;
}

export function concatenateArrays(arrays: readonly Uint8Array[]): Uint8Array {
  const total = arrays.reduce((sum, array) => sum + array.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const array of arrays) {
    result.set(array, offset);
    offset += array.length;
  }
  return result;
}

/**
 * Deterministic test payload: byte i is (i * 31 + seed) mod 251
 */
export function createTestData(size: number, seed = 7): Uint8Array {
  const data = new Uint8Array(size);
  for (let i = 0; i < size; i++) {
    data[i] = (i * 31 + seed) % 251;
  }
  return data;
}

/**
 * Parses `bytes=start-end`; an open end runs to the last byte
 *
 * @returns undefined when the header is malformed or unsatisfiable
 */
export function parseRangeHeader(header: string, size: number): { start: number; end: number } | undefined {
  const match = /^bytes=(\d+)-(\d*)$/.exec(header.trim());
  if (!match) {
    return undefined;
  }
  const start = Number(match[1]);
  const end = match[2] === '' ? size - 1 : Math.min(Number(match[2]), size - 1);
  if (start >= size || end < start) {
    return undefined;
  }
  return { start, end };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
