/**
 * Tests for resumable ranged downloads against the in-memory backend
 */

import { mkdtemp, readFile, rm, stat, truncate } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { S3TransferClient } from '../../client/index.js';
import { MIB } from '../../config/index.js';
import type { ResumeDataInvalidError } from '../../errors/index.js';
import { sha256Hex } from '../../signing/index.js';
import { InMemoryS3Transport, createTestClient, createTestData } from '../../testing/index.js';
import type { ProgressEvent } from '../progress.js';

const BUCKET = 'downloads';
const KEY = 'archive/data.bin';
const SIZE = 10 * MIB;
const CHUNK = 4 * MIB;
const RANGES = ['bytes=0-4194303', 'bytes=4194304-8388607', 'bytes=8388608-10485759'];

describe('MultipartDownloadManager', () => {
  let directory: string;
  let transport: InMemoryS3Transport;
  let client: S3TransferClient;
  let data: Uint8Array;
  let destination: string;

  function failRange(range: string, status = 403, code = 'AccessDenied', message = 'Access Denied', times = 1): void {
    transport.injectFault({
      operation: 'GetObject',
      match: (request) => request.headers.range === range,
      status,
      code,
      message,
      times,
    });
  }

  function rangesRequested(from = 0): string[] {
    return transport
      .requestsFor('GetObject')
      .slice(from)
      .map((request) => request.headers.range ?? '');
  }

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'download-manager-'));
    destination = join(directory, 'out', 'data.bin');
    transport = new InMemoryS3Transport();
    data = createTestData(SIZE);
    transport.putObject(BUCKET, KEY, data, { lastModified: new Date('2024-01-15T10:30:00Z') });
    client = createTestClient(transport, { resumeDirectory: join(directory, 'resume'), chunkSize: CHUNK });
  });

  afterEach(async () => {
    await client.close();
    await rm(directory, { recursive: true, force: true });
  });

  it('should fetch each chunk with its own ranged GET', async () => {
    const events: ProgressEvent[] = [];
    const result = await client.downloadFile(BUCKET, KEY, destination, {}, (batch) => events.push(...batch));

    expect(result).toMatchObject({
      direction: 'download',
      success: true,
      totalSize: SIZE,
      bytesTransferred: SIZE,
      resumedBytes: 0,
      chunkSize: CHUNK,
      chunkCount: 3,
      completedChunks: 3,
      eTag: transport.getObject(BUCKET, KEY)?.eTag,
      resumed: false,
    });
    expect(rangesRequested().sort()).toEqual(RANGES);
    expect(transport.count('HeadObject')).toBe(1);
    expect(new Uint8Array(await readFile(destination))).toEqual(data);
    expect(result.state?.chunks.map((chunk) => chunk.checksum)).toEqual([
      sha256Hex(data.subarray(0, CHUNK)),
      sha256Hex(data.subarray(CHUNK, 2 * CHUNK)),
      sha256Hex(data.subarray(2 * CHUNK)),
    ]);
    expect(events[events.length - 1]).toMatchObject({ kind: 'TransferCompleted', bytesTransferred: SIZE });
    expect(await client.listResumableTransfers()).toEqual([]);
  });

  it('should honour the parallelism limit', async () => {
    transport.hold('GetObject');
    const pending = client.downloadFile(BUCKET, KEY, destination, { chunkSize: MIB, maxParallelDownloads: 2 });

    await transport.waitForHeld(2);
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(transport.heldCount).toBe(2);
    transport.releaseHeld();

    const result = await pending;
    expect(result.success).toBe(true);
    expect(transport.count('GetObject')).toBe(10);
    expect(transport.peakConcurrency('GetObject')).toBeLessThanOrEqual(2);
  });

  it('should retry a chunk whose body ended early', async () => {
    transport.injectFault({
      operation: 'GetObject',
      match: (request) => request.headers.range === RANGES[1],
      truncateBodyTo: 1000,
    });

    const result = await client.downloadFile(BUCKET, KEY, destination, { maxParallelDownloads: 1 });

    expect(result.success).toBe(true);
    expect(rangesRequested()).toEqual([RANGES[0], RANGES[1], RANGES[1], RANGES[2]]);
    expect(result.state?.chunks[1]).toMatchObject({
      status: 'Completed',
      retryCount: 1,
    });
    expect(result.bytesTransferred).toBe(SIZE);
    expect(new Uint8Array(await readFile(destination))).toEqual(data);
  });

  it('should persist completed chunks when a throttled chunk exhausts its retries', async () => {
    failRange(RANGES[1], 503, 'SlowDown', 'Reduce your request rate', 10);

    const result = await client.downloadFile(BUCKET, KEY, destination, { maxParallelDownloads: 1 });

    expect(result.success).toBe(false);
    expect(result.error).toMatchObject({
      code: 'CHUNK_FAILED',
      message: 'Chunk 1 failed after 4 attempt(s): Reduce your request rate',
    });
    expect(rangesRequested()).toEqual([RANGES[0], RANGES[1], RANGES[1], RANGES[1], RANGES[1]]);

    const stored = await client.listResumableTransfers();
    expect(stored).toHaveLength(1);
    expect(stored[0].chunks.map((chunk) => chunk.status)).toEqual(['Completed', 'Failed', 'Pending']);
    expect(stored[0].chunks[0].checksum).toBe(sha256Hex(data.subarray(0, CHUNK)));
    expect(stored[0].chunks[1].retryCount).toBe(3);
  });

  it('should stop dispatching chunks once cancelled', async () => {
    const controller = new AbortController();
    transport.hold('GetObject');

    const pending = client.downloadFile(BUCKET, KEY, destination, {
      maxParallelDownloads: 1,
      signal: controller.signal,
    });
    await transport.waitForHeld(1);
    controller.abort();
    transport.releaseHeld();
    const result = await pending;

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('CANCELLED');
    expect(result.completedChunks).toBe(1);
    expect(rangesRequested()).toEqual([RANGES[0]]);
    expect((await client.listResumableTransfers())[0].chunks.map((chunk) => chunk.status)).toEqual([
      'Completed',
      'Pending',
      'Pending',
    ]);
  });

  it('should create an empty file for a zero-length object without ranged GETs', async () => {
    transport.putObject(BUCKET, 'empty.txt', new Uint8Array(0));

    const result = await client.downloadFile(BUCKET, 'empty.txt', destination);

    expect(result).toMatchObject({ success: true, totalSize: 0, chunkCount: 0, bytesTransferred: 0 });
    expect(transport.count('GetObject')).toBe(0);
    expect((await stat(destination)).size).toBe(0);
  });

  it('should report a missing object', async () => {
    const result = await client.downloadFile(BUCKET, 'missing.bin', destination);
    expect(result.success).toBe(false);
    expect(result.error).toMatchObject({ code: 'NoSuchKey', status: 404 });
    expect(transport.count('GetObject')).toBe(0);
  });

  it('should reject an invalid chunk size', async () => {
    await expect(client.downloadFile(BUCKET, KEY, destination, { chunkSize: 0 })).rejects.toMatchObject({
      code: 'INVALID_CHUNK_SIZE',
    });
  });

  describe('resume', () => {
    it('should fetch only the chunks an earlier attempt did not finish', async () => {
      failRange(RANGES[2]);
      const first = await client.downloadFile(BUCKET, KEY, destination, { maxParallelDownloads: 1 });

      expect(first.success).toBe(false);
      expect(first.error?.code).toBe('CHUNK_FAILED');
      expect(first.completedChunks).toBe(2);
      expect((await client.listResumableTransfers())[0]).toMatchObject({ direction: 'download', key: KEY });

      const before = transport.count('GetObject');
      const second = await client.downloadFile(BUCKET, KEY, destination);

      expect(second).toMatchObject({
        success: true,
        resumed: true,
        resumedBytes: 2 * CHUNK,
        bytesTransferred: SIZE - 2 * CHUNK,
      });
      expect(rangesRequested(before)).toEqual([RANGES[2]]);
      expect(new Uint8Array(await readFile(destination))).toEqual(data);
      expect(await client.listResumableTransfers()).toEqual([]);
    });

    it('should report a reused state as resumed even when no chunk had completed', async () => {
      failRange(RANGES[0]);
      const first = await client.downloadFile(BUCKET, KEY, destination, { maxParallelDownloads: 1 });
      expect(first.completedChunks).toBe(0);

      const second = await client.downloadFile(BUCKET, KEY, destination);

      expect(second).toMatchObject({ success: true, resumed: true, resumedBytes: 0, bytesTransferred: SIZE });
      expect(new Uint8Array(await readFile(destination))).toEqual(data);
    });

    it('should start over when the object changed', async () => {
      failRange(RANGES[2]);
      await client.downloadFile(BUCKET, KEY, destination, { maxParallelDownloads: 1 });

      const replacement = createTestData(SIZE, 3);
      transport.putObject(BUCKET, KEY, replacement, { lastModified: new Date('2024-02-01T00:00:00Z') });
      const warnings: ResumeDataInvalidError[] = [];
      const before = transport.count('GetObject');

      const result = await client.downloadFile(BUCKET, KEY, destination, {
        onWarning: (warning) => warnings.push(warning),
      });

      expect(result.success).toBe(true);
      expect(result.resumed).toBe(false);
      expect(warnings.map((warning) => warning.code)).toEqual(['FINGERPRINT_MISMATCH']);
      expect(rangesRequested(before).sort()).toEqual(RANGES);
      expect(new Uint8Array(await readFile(destination))).toEqual(replacement);
    });

    it('should start over when the destination was truncated', async () => {
      failRange(RANGES[2]);
      await client.downloadFile(BUCKET, KEY, destination, { maxParallelDownloads: 1 });
      await truncate(destination, 5);

      const warnings: string[] = [];
      const result = await client.downloadFile(BUCKET, KEY, destination, {
        onWarning: (warning) => warnings.push(warning.message),
      });

      expect(result.success).toBe(true);
      expect(result.resumed).toBe(false);
      expect(warnings).toEqual([
        `Resume data for ${destination} no longer matches: destination is 5 bytes, expected ${SIZE}`,
      ]);
      expect(new Uint8Array(await readFile(destination))).toEqual(data);
    });
  });
});
