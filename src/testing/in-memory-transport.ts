/**
 * In-process S3 backend behind the HttpTransport interface
 */

import { Readable } from 'node:stream';
import { NetworkError } from '../errors/index.js';
import { UNSIGNED_PAYLOAD, sha256Hex, signRequest, type HttpMethod } from '../signing/index.js';
import type { HttpRequest, HttpResponse, HttpTransport, StreamingHttpResponse } from '../transport/index.js';
import { buildXml, cleanETag, getNode, getNodes, getText, parseCreateBucketXml, parseXml } from '../xml/index.js';
import type {
  FaultRule,
  InboundRequest,
  InMemoryS3Options,
  RecordedRequest,
  S3Operation,
  StoredBucket,
  StoredObject,
  StoredUpload,
} from './types.js';
import {
  concatenateArrays,
  generateETag,
  generateMultipartETag,
  generateRequestId,
  generateUploadId,
  parseRangeHeader,
  sleep,
} from './utils.js';

export const DEFAULT_TEST_HOST = 'localhost:9000';

const BODY_SLICE_SIZE = 64 * 1024;
const MIN_PART_SIZE = 5 * 1024 * 1024;
const DEFAULT_PAGE_SIZE = 1000;
const encoder = new TextEncoder();
const decoder = new TextDecoder();

interface Reply {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
  /** Streamed bodies end after this many bytes */
  truncateTo?: number;
}

interface ActiveFault extends FaultRule {
  remaining: number;
}

interface HoldRule {
  operation: S3Operation;
  match?: (request: InboundRequest) => boolean;
}

function classify(method: HttpMethod, bucket: string | undefined, key: string | undefined, query: Record<string, string>, headers: Record<string, string>): S3Operation {
  if (!bucket) {
    return method === 'GET' ? 'ListBuckets' : 'Unknown';
  }

  if (!key) {
    if ('policy' in query) {
      switch (method) {
        case 'GET':
          return 'GetBucketPolicy';
        case 'PUT':
          return 'PutBucketPolicy';
        case 'DELETE':
          return 'DeleteBucketPolicy';
        default:
          return 'Unknown';
      }
    }
    switch (method) {
      case 'GET':
        return 'ListObjectsV2';
      case 'HEAD':
        return 'HeadBucket';
      case 'PUT':
        return 'CreateBucket';
      case 'DELETE':
        return 'DeleteBucket';
      default:
        return 'Unknown';
    }
  }

  if ('uploads' in query) {
    return method === 'POST' ? 'CreateMultipartUpload' : 'Unknown';
  }
  if ('uploadId' in query) {
    switch (method) {
      case 'PUT':
        return 'partNumber' in query ? 'UploadPart' : 'Unknown';
      case 'POST':
        return 'CompleteMultipartUpload';
      case 'DELETE':
        return 'AbortMultipartUpload';
      case 'GET':
        return 'ListParts';
      default:
        return 'Unknown';
    }
  }

  switch (method) {
    case 'PUT':
      return headers['x-amz-copy-source'] ? 'CopyObject' : 'PutObject';
    case 'GET':
      return 'GetObject';
    case 'HEAD':
      return 'HeadObject';
    case 'DELETE':
      return 'DeleteObject';
    default:
      return 'Unknown';
  }
}

function splitPath(pathname: string): { bucket?: string; key?: string } {
  const path = pathname.replace(/^\//, '');
  if (!path) {
    return {};
  }
  const slash = path.indexOf('/');
  if (slash < 0) {
    return { bucket: decodeURIComponent(path) };
  }
  const key = path.substring(slash + 1);
  return {
    bucket: decodeURIComponent(path.substring(0, slash)),
    key: key ? decodeURIComponent(key) : undefined,
  };
}

function parseAmzDate(value: string | undefined): Date | undefined {
  const match = value ? /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/.exec(value) : null;
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hour, minute, second] = match.map(Number);
  return new Date(Date.UTC(year, month - 1, day, hour, minute, second));
}

function metadataFrom(headers: Record<string, string>): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (name.startsWith('x-amz-meta-')) {
      metadata[name.substring('x-amz-meta-'.length)] = value;
    }
  }
  return metadata;
}

const STANDARD_HEADERS = ['cache-control', 'content-disposition', 'content-encoding'];

function standardHeadersFrom(headers: Record<string, string>): Record<string, string> {
  const kept: Record<string, string> = {};
  for (const name of STANDARD_HEADERS) {
    const value = headers[name];
    if (value !== undefined) {
      kept[name] = value;
    }
  }
  return kept;
}

function objectHeaders(object: StoredObject): Record<string, string> {
  const headers: Record<string, string> = {
    ...object.standardHeaders,
    etag: `"${object.eTag}"`,
    'last-modified': object.lastModified.toUTCString(),
    'content-type': object.contentType,
    'content-length': String(object.data.length),
    'accept-ranges': 'bytes',
  };
  for (const [name, value] of Object.entries(object.metadata)) {
    headers[`x-amz-meta-${name}`] = value;
  }
  return headers;
}

async function* slices(body: Uint8Array, limit: number): AsyncGenerator<Uint8Array> {
  for (let offset = 0; offset < limit; offset += BODY_SLICE_SIZE) {
    yield body.subarray(offset, Math.min(limit, offset + BODY_SLICE_SIZE));
  }
}

/**
 * S3 stand-in that serves buckets, objects, ranged reads, multipart
 * uploads, policies and paged listings from memory.
 *
 * Every request is recorded. Faults can be injected per operation, and
 * requests can be held until released to observe concurrency.
 *
 * @example
 * ```typescript
 * const transport = new InMemoryS3Transport();
 * transport.createBucket('photos');
 * transport.injectFault({ operation: 'UploadPart', status: 503, code: 'SlowDown' });
 * const client = createClient(createTestConfig(), { transport });
 * ```
 */
export class InMemoryS3Transport implements HttpTransport {
  readonly requests: RecordedRequest[] = [];
  private readonly buckets = new Map<string, StoredBucket>();
  private readonly uploads = new Map<string, StoredUpload>();
  private faults: ActiveFault[] = [];
  private holds: HoldRule[] = [];
  private held: Array<() => void> = [];
  private readonly inFlight = new Map<S3Operation, number>();
  private readonly peaks = new Map<S3Operation, number>();
  private closed = false;

  constructor(private readonly options: InMemoryS3Options = {}) {}

  get host(): string {
    return this.options.host ?? DEFAULT_TEST_HOST;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  createBucket(name: string, region = 'us-east-1'): StoredBucket {
    const bucket: StoredBucket = { name, region, creationDate: new Date(), objects: new Map() };
    this.buckets.set(name, bucket);
    return bucket;
  }

  getBucket(name: string): StoredBucket | undefined {
    return this.buckets.get(name);
  }

  putObject(
    bucket: string,
    key: string,
    data: Uint8Array,
    options: {
      contentType?: string;
      metadata?: Record<string, string>;
      standardHeaders?: Record<string, string>;
      lastModified?: Date;
    } = {}
  ): StoredObject {
    const target = this.buckets.get(bucket) ?? this.createBucket(bucket);
    const object: StoredObject = {
      data,
      eTag: generateETag(data),
      contentType: options.contentType ?? 'application/octet-stream',
      metadata: options.metadata ?? {},
      standardHeaders: options.standardHeaders ?? {},
      lastModified: options.lastModified ?? new Date(),
    };
    target.objects.set(key, object);
    return object;
  }

  getObject(bucket: string, key: string): StoredObject | undefined {
    return this.buckets.get(bucket)?.objects.get(key);
  }

  get openUploads(): StoredUpload[] {
    return [...this.uploads.values()];
  }

  getUpload(uploadId: string): StoredUpload | undefined {
    return this.uploads.get(uploadId);
  }

  injectFault(rule: FaultRule): void {
    this.faults.push({ ...rule, remaining: rule.times ?? 1 });
  }

  clearFaults(): void {
    this.faults = [];
  }

  /**
   * Requests recorded for an operation, in arrival order
   */
  requestsFor(operation: S3Operation): RecordedRequest[] {
    return this.requests.filter((request) => request.operation === operation);
  }

  count(operation: S3Operation): number {
    return this.requestsFor(operation).length;
  }

  /**
   * Highest number of simultaneous requests seen for an operation
   */
  peakConcurrency(operation: S3Operation): number {
    return this.peaks.get(operation) ?? 0;
  }

  /**
   * Parks matching requests until releaseHeld()
   */
  hold(operation: S3Operation, match?: (request: InboundRequest) => boolean): void {
    this.holds.push({ operation, match });
  }

  get heldCount(): number {
    return this.held.length;
  }

  /**
   * Resolves once at least `count` requests are parked
   */
  async waitForHeld(count: number, timeoutMs = 5000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (this.held.length < count) {
      if (Date.now() > deadline) {
        throw new Error(`Timed out waiting for ${count} held requests (have ${this.held.length})`);
      }
      await sleep(5);
    }
  }

  /**
   * Lets parked requests through and stops holding new ones
   */
  releaseHeld(): void {
    this.holds = [];
    const waiting = this.held;
    this.held = [];
    for (const release of waiting) {
      release();
    }
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const reply = await this.dispatch(request);
    const body = reply.truncateTo === undefined ? reply.body : reply.body.subarray(0, reply.truncateTo);
    return { status: reply.status, headers: reply.headers, body };
  }

  async sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse> {
    const reply = await this.dispatch(request);
    const limit = Math.min(reply.truncateTo ?? reply.body.length, reply.body.length);
    return { status: reply.status, headers: reply.headers, body: Readable.from(slices(reply.body, limit)) };
  }

  async close(): Promise<void> {
    this.closed = true;
    this.releaseHeld();
  }

  private async dispatch(request: HttpRequest): Promise<Reply> {
    if (this.closed) {
      throw NetworkError.connectionFailed('transport is closed');
    }

    const url = new URL(request.url);
    const { bucket, key } = splitPath(url.pathname);
    const query = Object.fromEntries(url.searchParams);
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(request.headers)) {
      headers[name.toLowerCase()] = value;
    }
    const operation = classify(request.method, bucket, key, query, headers);
    const inbound: InboundRequest = { operation, method: request.method, bucket, key, query, headers };

    if (this.holds.some((rule) => rule.operation === operation && (!rule.match || rule.match(inbound)))) {
      await new Promise<void>((resolve) => this.held.push(resolve));
    }

    const active = (this.inFlight.get(operation) ?? 0) + 1;
    this.inFlight.set(operation, active);
    this.peaks.set(operation, Math.max(active, this.peaks.get(operation) ?? 0));

    let body: Uint8Array = new Uint8Array(0);
    try {
      if (this.options.latencyMs) {
        await sleep(this.options.latencyMs);
      }
      body = await this.readBody(request);

      const fault = this.takeFault(inbound);
      if (fault?.connectionReset) {
        this.requests.push({ ...inbound, bodyLength: body.length, status: 0 });
        throw NetworkError.connectionReset();
      }

      let reply = this.checkRequest(request, url, headers, body);
      if (!reply && fault && fault.truncateBodyTo === undefined) {
        reply = this.error(inbound, fault.status ?? 500, fault.code ?? 'InternalError', fault.message, fault.retryAfter);
      }
      reply ??= this.route(inbound, body);
      if (fault?.truncateBodyTo !== undefined && reply.status < 300) {
        reply.truncateTo = fault.truncateBodyTo;
      }

      this.requests.push({ ...inbound, bodyLength: body.length, status: reply.status });
      return reply;
    } finally {
      this.inFlight.set(operation, (this.inFlight.get(operation) ?? 1) - 1);
    }
  }

  private async readBody(request: HttpRequest): Promise<Uint8Array> {
    const source = request.body;
    if (!source) {
      return new Uint8Array(0);
    }

    if (source instanceof Uint8Array) {
      for (let sent = 0; sent < source.length; ) {
        sent = Math.min(source.length, sent + BODY_SLICE_SIZE);
        request.onUploadProgress?.(sent);
      }
      return source;
    }

    const chunks: Uint8Array[] = [];
    let total = 0;
    for await (const chunk of source) {
      const bytes = chunk instanceof Uint8Array ? chunk : encoder.encode(String(chunk));
      chunks.push(bytes);
      total += bytes.length;
      request.onUploadProgress?.(total);
    }
    return concatenateArrays(chunks);
  }

  private takeFault(inbound: InboundRequest): ActiveFault | undefined {
    const fault = this.faults.find(
      (rule) => rule.remaining > 0 && rule.operation === inbound.operation && (!rule.match || rule.match(inbound))
    );
    if (fault) {
      fault.remaining--;
    }
    return fault;
  }

  /**
   * Host, authorization, body length and payload hash checks
   */
  private checkRequest(request: HttpRequest, url: URL, headers: Record<string, string>, body: Uint8Array): Reply | undefined {
    const inbound = { method: request.method };

    if (headers.host !== this.host || url.host !== this.host) {
      return this.error(inbound, 400, 'InvalidRequest', `Host header ${headers.host ?? '<missing>'} does not match ${this.host}`);
    }

    const authorization = headers.authorization;
    if (!authorization?.startsWith('AWS4-HMAC-SHA256 Credential=')) {
      return this.error(inbound, 403, 'AccessDenied', 'Missing SigV4 authorization');
    }

    const declaredLength = headers['content-length'];
    if (declaredLength !== undefined && Number(declaredLength) !== body.length) {
      return this.error(inbound, 400, 'IncompleteBody', `Expected ${declaredLength} bytes, received ${body.length}`);
    }

    const payloadHash = headers['x-amz-content-sha256'];
    if (!payloadHash) {
      return this.error(inbound, 400, 'InvalidRequest', 'Missing x-amz-content-sha256');
    }
    if (payloadHash !== UNSIGNED_PAYLOAD && payloadHash !== sha256Hex(body)) {
      return this.error(inbound, 400, 'XAmzContentSHA256Mismatch', 'Payload hash does not match the body');
    }

    const credentials = this.options.verifySignatures;
    if (credentials) {
      const timestamp = parseAmzDate(headers['x-amz-date']);
      if (!timestamp) {
        return this.error(inbound, 403, 'AccessDenied', 'Missing or malformed x-amz-date');
      }
      const unsigned: Record<string, string> = {};
      for (const [name, value] of Object.entries(headers)) {
        if (name !== 'authorization') {
          unsigned[name] = value;
        }
      }
      const expected = signRequest(
        { method: request.method, url, headers: unsigned, payloadHash },
        { ...credentials, service: 's3' },
        timestamp
      );
      if (expected.headers.authorization !== authorization) {
        return this.error(inbound, 403, 'SignatureDoesNotMatch', 'The request signature does not match');
      }
    }

    return undefined;
  }

  private route(request: InboundRequest, body: Uint8Array): Reply {
    const { bucket: bucketName, key } = request;
    if (request.operation === 'ListBuckets') {
      return this.listBuckets();
    }
    if (request.operation === 'Unknown' || !bucketName) {
      return this.error(request, 405, 'MethodNotAllowed', 'The specified method is not allowed');
    }

    if (request.operation === 'CreateBucket') {
      return this.createBucketRequest(request, bucketName, body);
    }

    const bucket = this.buckets.get(bucketName);
    if (!bucket) {
      return this.error(request, 404, 'NoSuchBucket', 'The specified bucket does not exist', undefined, bucketName);
    }

    switch (request.operation) {
      case 'HeadBucket':
        return this.empty(200);
      case 'DeleteBucket':
        if (bucket.objects.size > 0) {
          return this.error(request, 409, 'BucketNotEmpty', 'The bucket you tried to delete is not empty');
        }
        this.buckets.delete(bucketName);
        return this.empty(204);
      case 'GetBucketPolicy':
        if (bucket.policy === undefined) {
          return this.error(request, 404, 'NoSuchBucketPolicy', 'The bucket policy does not exist');
        }
        return { status: 200, headers: this.baseHeaders({ 'content-type': 'application/json' }), body: encoder.encode(bucket.policy) };
      case 'PutBucketPolicy':
        bucket.policy = decoder.decode(body);
        return this.empty(204);
      case 'DeleteBucketPolicy':
        bucket.policy = undefined;
        return this.empty(204);
      case 'ListObjectsV2':
        return this.listObjects(bucket, request.query);
      default:
        break;
    }

    if (!key) {
      return this.error(request, 405, 'MethodNotAllowed', 'The specified method is not allowed');
    }

    switch (request.operation) {
      case 'HeadObject':
      case 'GetObject':
        return this.readObject(request, bucket, key);
      case 'PutObject': {
        const object = this.putObject(bucket.name, key, body, {
          contentType: request.headers['content-type'],
          metadata: metadataFrom(request.headers),
          standardHeaders: standardHeadersFrom(request.headers),
        });
        return this.empty(200, { etag: `"${object.eTag}"` });
      }
      case 'CopyObject':
        return this.copyObject(request, bucket, key);
      case 'DeleteObject':
        bucket.objects.delete(key);
        return this.empty(204);
      case 'CreateMultipartUpload':
        return this.createUpload(request, bucket, key);
      case 'UploadPart':
        return this.uploadPart(request, body);
      case 'CompleteMultipartUpload':
        return this.completeUpload(request, bucket, key, body);
      case 'AbortMultipartUpload':
        return this.abortUpload(request);
      case 'ListParts':
        return this.listParts(request);
      default:
        return this.error(request, 405, 'MethodNotAllowed', 'The specified method is not allowed');
    }
  }

  private listBuckets(): Reply {
    const buckets = [...this.buckets.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((bucket) => ({ Name: bucket.name, CreationDate: bucket.creationDate.toISOString() }));
    return this.xml(200, {
      ListAllMyBucketsResult: {
        Owner: { ID: 'test-owner', DisplayName: 'test-owner' },
        Buckets: { Bucket: buckets },
      },
    });
  }

  private createBucketRequest(request: InboundRequest, name: string, body: Uint8Array): Reply {
    if (this.buckets.has(name)) {
      return this.error(request, 409, 'BucketAlreadyOwnedByYou', 'Your previous request to create the named bucket succeeded');
    }
    const region = body.length > 0 ? parseCreateBucketXml(decoder.decode(body)) : undefined;
    this.createBucket(name, region ?? 'us-east-1');
    return this.empty(200, { location: `/${name}` });
  }

  private listObjects(bucket: StoredBucket, query: Record<string, string>): Reply {
    const prefix = query.prefix ?? '';
    const delimiter = query.delimiter ?? '';
    const requested = query['max-keys'] === undefined ? DEFAULT_PAGE_SIZE : Number(query['max-keys']);
    const maxKeys = Math.min(requested, this.options.maxKeysPerPage ?? DEFAULT_PAGE_SIZE);
    const after = query['continuation-token']
      ? Buffer.from(query['continuation-token'], 'base64url').toString('utf8')
      : undefined;

    const keys = [...bucket.objects.keys()]
      .filter((key) => key.startsWith(prefix) && (after === undefined || key > after))
      .sort();

    const contents: Array<Record<string, unknown>> = [];
    const prefixes: string[] = [];
    let lastKey: string | undefined;
    let truncated = false;

    for (const key of keys) {
      const rest = key.substring(prefix.length);
      const cut = delimiter ? rest.indexOf(delimiter) : -1;
      const commonPrefix = cut >= 0 ? prefix + rest.substring(0, cut + delimiter.length) : undefined;

      if (commonPrefix !== undefined && prefixes[prefixes.length - 1] === commonPrefix) {
        lastKey = key;
        continue;
      }
      if (contents.length + prefixes.length >= maxKeys) {
        truncated = true;
        break;
      }

      if (commonPrefix !== undefined) {
        prefixes.push(commonPrefix);
      } else {
        const object = bucket.objects.get(key);
        if (object) {
          contents.push({
            Key: key,
            LastModified: object.lastModified.toISOString(),
            ETag: `"${object.eTag}"`,
            Size: object.data.length,
            StorageClass: 'STANDARD',
          });
        }
      }
      lastKey = key;
    }

    return this.xml(200, {
      ListBucketResult: {
        Name: bucket.name,
        Prefix: prefix,
        KeyCount: contents.length + prefixes.length,
        MaxKeys: maxKeys,
        Delimiter: delimiter || undefined,
        IsTruncated: truncated,
        Contents: contents,
        CommonPrefixes: prefixes.map((value) => ({ Prefix: value })),
        NextContinuationToken:
          truncated && lastKey !== undefined ? Buffer.from(lastKey, 'utf8').toString('base64url') : undefined,
      },
    });
  }

  private readObject(request: InboundRequest, bucket: StoredBucket, key: string): Reply {
    const object = bucket.objects.get(key);
    if (!object) {
      return this.error(request, 404, 'NoSuchKey', 'The specified key does not exist.', undefined, key);
    }

    const headers = this.baseHeaders(objectHeaders(object));
    if (request.operation === 'HeadObject') {
      return { status: 200, headers, body: new Uint8Array(0) };
    }

    const rangeHeader = request.headers.range;
    if (rangeHeader === undefined) {
      return { status: 200, headers, body: object.data };
    }

    const range = parseRangeHeader(rangeHeader, object.data.length);
    if (!range) {
      return this.error(request, 416, 'InvalidRange', 'The requested range is not satisfiable');
    }
    const slice = object.data.subarray(range.start, range.end + 1);
    return {
      status: 206,
      headers: {
        ...headers,
        'content-length': String(slice.length),
        'content-range': `bytes ${range.start}-${range.end}/${object.data.length}`,
      },
      body: slice,
    };
  }

  private copyObject(request: InboundRequest, bucket: StoredBucket, key: string): Reply {
    const source = splitPath(request.headers['x-amz-copy-source'] ?? '');
    const object = source.bucket && source.key ? this.getObject(source.bucket, source.key) : undefined;
    if (!object) {
      return this.error(request, 404, 'NoSuchKey', 'The specified copy source does not exist.');
    }

    const copy: StoredObject = {
      ...object,
      metadata: { ...object.metadata },
      standardHeaders: { ...object.standardHeaders },
      lastModified: new Date(),
    };
    bucket.objects.set(key, copy);
    return this.xml(200, {
      CopyObjectResult: { LastModified: copy.lastModified.toISOString(), ETag: `"${copy.eTag}"` },
    });
  }

  private createUpload(request: InboundRequest, bucket: StoredBucket, key: string): Reply {
    const uploadId = generateUploadId();
    this.uploads.set(uploadId, {
      uploadId,
      bucket: bucket.name,
      key,
      contentType: request.headers['content-type'] ?? 'application/octet-stream',
      metadata: metadataFrom(request.headers),
      standardHeaders: standardHeadersFrom(request.headers),
      parts: new Map(),
    });
    return this.xml(200, {
      InitiateMultipartUploadResult: { Bucket: bucket.name, Key: key, UploadId: uploadId },
    });
  }

  private findUpload(request: InboundRequest): StoredUpload | undefined {
    const upload = this.uploads.get(request.query.uploadId ?? '');
    return upload && upload.bucket === request.bucket && upload.key === request.key ? upload : undefined;
  }

  private uploadPart(request: InboundRequest, body: Uint8Array): Reply {
    const upload = this.findUpload(request);
    if (!upload) {
      return this.error(request, 404, 'NoSuchUpload', 'The specified upload does not exist.');
    }
    const partNumber = Number(request.query.partNumber);
    if (!Number.isInteger(partNumber) || partNumber < 1 || partNumber > 10000) {
      return this.error(request, 400, 'InvalidArgument', 'Part number must be an integer between 1 and 10000');
    }

    const eTag = generateETag(body);
    upload.parts.set(partNumber, { data: body, eTag, lastModified: new Date() });
    return this.empty(200, { etag: `"${eTag}"` });
  }

  private completeUpload(request: InboundRequest, bucket: StoredBucket, key: string, body: Uint8Array): Reply {
    const upload = this.findUpload(request);
    if (!upload) {
      return this.error(request, 404, 'NoSuchUpload', 'The specified upload does not exist.');
    }

    let listed: Array<{ partNumber: number; eTag: string }>;
    try {
      const root = getNode(parseXml(decoder.decode(body)), 'CompleteMultipartUpload');
      listed = getNodes(root, 'Part').map((part) => ({
        partNumber: Number(getText(part, 'PartNumber')),
        eTag: cleanETag(getText(part, 'ETag') ?? ''),
      }));
    } catch (error) {
      return this.error(request, 400, 'MalformedXML', error instanceof Error ? error.message : String(error));
    }
    if (listed.length === 0) {
      return this.error(request, 400, 'MalformedXML', 'No parts listed');
    }

    const minPartSize = this.options.minPartSize ?? MIN_PART_SIZE;
    const chunks: Uint8Array[] = [];
    for (let i = 0; i < listed.length; i++) {
      const { partNumber, eTag } = listed[i];
      if (i > 0 && partNumber <= listed[i - 1].partNumber) {
        return this.error(request, 400, 'InvalidPartOrder', 'The list of parts was not in ascending order.');
      }
      const part = upload.parts.get(partNumber);
      if (!part || part.eTag !== eTag) {
        return this.error(request, 400, 'InvalidPart', `Part ${partNumber} could not be found or its ETag does not match.`);
      }
      if (i < listed.length - 1 && part.data.length < minPartSize) {
        return this.error(request, 400, 'EntityTooSmall', `Part ${partNumber} is smaller than the minimum allowed size.`);
      }
      chunks.push(part.data);
    }

    const object: StoredObject = {
      data: concatenateArrays(chunks),
      eTag: generateMultipartETag(listed.map((part) => part.eTag)),
      contentType: upload.contentType,
      metadata: upload.metadata,
      standardHeaders: upload.standardHeaders,
      lastModified: new Date(),
    };
    bucket.objects.set(key, object);
    this.uploads.delete(upload.uploadId);

    return this.xml(200, {
      CompleteMultipartUploadResult: {
        Location: `http://${this.host}/${bucket.name}/${key}`,
        Bucket: bucket.name,
        Key: key,
        ETag: `"${object.eTag}"`,
      },
    });
  }

  private abortUpload(request: InboundRequest): Reply {
    const upload = this.findUpload(request);
    if (!upload) {
      return this.error(request, 404, 'NoSuchUpload', 'The specified upload does not exist.');
    }
    this.uploads.delete(upload.uploadId);
    return this.empty(204);
  }

  private listParts(request: InboundRequest): Reply {
    const upload = this.findUpload(request);
    if (!upload) {
      return this.error(request, 404, 'NoSuchUpload', 'The specified upload does not exist.');
    }

    const marker = Number(request.query['part-number-marker'] ?? '0');
    const pageSize = Math.min(Number(request.query['max-parts'] ?? DEFAULT_PAGE_SIZE), this.options.maxPartsPerPage ?? DEFAULT_PAGE_SIZE);
    const numbers = [...upload.parts.keys()].filter((n) => n > marker).sort((a, b) => a - b);
    const page = numbers.slice(0, pageSize);
    const truncated = numbers.length > page.length;

    return this.xml(200, {
      ListPartsResult: {
        Bucket: upload.bucket,
        Key: upload.key,
        UploadId: upload.uploadId,
        PartNumberMarker: marker,
        NextPartNumberMarker: truncated ? page[page.length - 1] : undefined,
        MaxParts: pageSize,
        IsTruncated: truncated,
        Part: page.map((partNumber) => {
          const part = upload.parts.get(partNumber);
          return {
            PartNumber: partNumber,
            LastModified: part?.lastModified.toISOString(),
            ETag: `"${part?.eTag ?? ''}"`,
            Size: part?.data.length ?? 0,
          };
        }),
      },
    });
  }

  private baseHeaders(extra: Record<string, string> = {}): Record<string, string> {
    return { 'x-amz-request-id': generateRequestId(), ...extra };
  }

  private empty(status: number, headers: Record<string, string> = {}): Reply {
    return { status, headers: this.baseHeaders(headers), body: new Uint8Array(0) };
  }

  private xml(status: number, document: Record<string, unknown>): Reply {
    return {
      status,
      headers: this.baseHeaders({ 'content-type': 'application/xml' }),
      body: encoder.encode(buildXml(document)),
    };
  }

  private error(
    request: { method: HttpMethod },
    status: number,
    code: string,
    message = code,
    retryAfter?: number,
    resource?: string
  ): Reply {
    const headers = this.baseHeaders(retryAfter === undefined ? {} : { 'retry-after': String(retryAfter) });
    if (request.method === 'HEAD') {
      return { status, headers, body: new Uint8Array(0) };
    }
    return {
      status,
      headers: { ...headers, 'content-type': 'application/xml' },
      body: encoder.encode(
        buildXml({
          Error: { Code: code, Message: message, Resource: resource, RequestId: headers['x-amz-request-id'] },
        })
      ),
    };
  }
}
