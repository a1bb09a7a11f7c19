/**
 * Upload followed by download of the same object
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { S3TransferClient } from '../../client/index.js';
import { MIB } from '../../config/index.js';
import {
  InMemoryS3Transport,
  TEST_ACCESS_KEY_ID,
  TEST_SECRET_ACCESS_KEY,
  createTestClient,
  createTestData,
} from '../../testing/index.js';

const BUCKET = 'round-trip';
const PART = 5 * MIB;

describe('upload then download', () => {
  let directory: string;
  let transport: InMemoryS3Transport;
  let client: S3TransferClient;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'round-trip-'));
    transport = new InMemoryS3Transport({
      verifySignatures: { accessKeyId: TEST_ACCESS_KEY_ID, secretAccessKey: TEST_SECRET_ACCESS_KEY, region: 'us-east-1' },
    });
    transport.createBucket(BUCKET);
    client = createTestClient(transport, { resumeDirectory: join(directory, 'resume'), chunkSize: PART });
  });

  afterEach(async () => {
    await client.close();
    await rm(directory, { recursive: true, force: true });
  });

  it.each([
    ['a single-PUT object', 1024, 0],
    ['a multipart object with a one-byte last part', 3 * PART + 1, 4],
  ])('should reproduce %s byte for byte', async (_label, size, parts) => {
    const source = join(directory, 'source.bin');
    const destination = join(directory, 'copy.bin');
    const data = createTestData(size, 11);
    await writeFile(source, data);

    const uploaded = await client.uploadFile(BUCKET, 'object.bin', source);
    const downloaded = await client.downloadFile(BUCKET, 'object.bin', destination);

    expect(uploaded.success).toBe(true);
    expect(downloaded.success).toBe(true);
    expect(transport.count('UploadPart')).toBe(parts);
    expect(downloaded.eTag).toBe(uploaded.eTag);
    expect(downloaded.bytesTransferred).toBe(size);
    expect(new Uint8Array(await readFile(destination))).toEqual(data);
  });
});
