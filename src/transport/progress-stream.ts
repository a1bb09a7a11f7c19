/**
 * Byte-counting wrappers for request bodies
 */

import { Readable, Transform, pipeline } from 'node:stream';
import type { UploadProgressCallback } from './types.js';

export const BODY_SLICE_SIZE = 64 * 1024;

function* slices(data: Uint8Array, size: number): Generator<Uint8Array> {
  for (let offset = 0; offset < data.length; offset += size) {
    yield data.subarray(offset, Math.min(offset + size, data.length));
  }
}

/**
 * Wraps a body so every slice handed downstream reports the running byte
 * count. Buffered bodies are fed in 64 KiB slices.
 */
export function withUploadProgress(
  body: Uint8Array | Readable,
  onProgress: UploadProgressCallback
): Readable {
  const source = body instanceof Readable ? body : Readable.from(slices(body, BODY_SLICE_SIZE));
  let bytes = 0;

  const counter = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      bytes += chunk.length;
      onProgress(bytes);
      callback(null, chunk);
    },
  });

  return pipeline(source, counter, (error) => {
    if (error) {
      counter.destroy(error);
    }
  });
}
