/**
 * Fixed-size partitioning of a byte range into chunks
 */

import { MAX_CHUNK_SIZE, MAX_PART_COUNT, MIN_CHUNK_SIZE } from '../config/index.js';
import { ValidationError } from '../errors/index.js';

export interface ChunkRange {
  readonly index: number;
  readonly offset: number;
  readonly length: number;
}

/**
 * Splits `[0, totalSize)` into consecutive ranges of `chunkSize` bytes; the
 * last range holds the remainder. A zero size yields no ranges.
 *
 * @example
 * ```typescript
 * partition(10, 4);
 * // [{ index: 0, offset: 0, length: 4 }, { index: 1, offset: 4, length: 4 }, { index: 2, offset: 8, length: 2 }]
 * ```
 */
export function partition(totalSize: number, chunkSize: number): ChunkRange[] {
  if (!Number.isSafeInteger(totalSize) || totalSize < 0) {
    throw new ValidationError({ message: `Invalid total size: ${totalSize}`, code: 'INVALID_SIZE' });
  }
  if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError({ message: `Invalid chunk size: ${chunkSize}`, code: 'INVALID_CHUNK_SIZE' });
  }

  const ranges: ChunkRange[] = [];
  for (let offset = 0, index = 0; offset < totalSize; offset += chunkSize, index++) {
    ranges.push({ index, offset, length: Math.min(chunkSize, totalSize - offset) });
  }
  return ranges;
}

export function chunkCount(totalSize: number, chunkSize: number): number {
  return totalSize === 0 ? 0 : Math.ceil(totalSize / chunkSize);
}

/**
 * Picks the part size for a multipart upload: at least the protocol
 * minimum, and large enough to stay within the part-count limit.
 *
 * @throws {ValidationError} If the object cannot fit in 10 000 parts of at most 5 GiB
 */
export function choosePartSize(totalSize: number, requested: number): number {
  const partSize = Math.max(requested, MIN_CHUNK_SIZE, Math.ceil(totalSize / MAX_PART_COUNT));
  if (partSize > MAX_CHUNK_SIZE) {
    throw new ValidationError({
      message: `Object of ${totalSize} bytes exceeds the multipart upload limit`,
      code: 'OBJECT_TOO_LARGE',
      details: { totalSize },
    });
  }
  return partSize;
}

/**
 * Checks that ranges are indexed 0..n-1 and tile `[0, totalSize)` exactly
 *
 * @returns A description of the first violation, or undefined
 */
export function findTilingViolation(ranges: readonly ChunkRange[], totalSize: number): string | undefined {
  let expectedOffset = 0;
  for (let i = 0; i < ranges.length; i++) {
    const range = ranges[i];
    if (range.index !== i) {
      return `chunk at position ${i} has index ${range.index}`;
    }
    if (range.offset !== expectedOffset) {
      return `chunk ${i} starts at ${range.offset}, expected ${expectedOffset}`;
    }
    if (range.length <= 0) {
      return `chunk ${i} is empty`;
    }
    expectedOffset += range.length;
  }
  if (expectedOffset !== totalSize) {
    return `chunks cover ${expectedOffset} of ${totalSize} bytes`;
  }
  return undefined;
}
