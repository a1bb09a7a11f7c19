/**
 * Signature V4 request signing
 */

import { SigningError } from '../errors/index.js';
import { sha256Hex, hmacSha256, toHex } from './crypto.js';
import {
  createCanonicalRequest,
  getCanonicalQueryString,
  getCanonicalUri,
  getSignedHeaders,
} from './canonical.js';
import { formatDateStamp, formatAmzDate } from './format.js';
import { SigningKeyCache } from './key-derivation.js';
import { createPresignedUrl } from './presign.js';
import {
  HTTP_METHODS,
  type HttpMethod,
  type SigningCredentials,
  type SigningRequest,
  type SignedRequest,
  type PresignedUrlOptions,
  type PresignedUrlResult,
} from './types.js';

export const ALGORITHM = 'AWS4-HMAC-SHA256';
export const UNSIGNED_PAYLOAD = 'UNSIGNED-PAYLOAD';
export const EMPTY_SHA256 = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';
export const DEFAULT_SERVICE = 's3';

/**
 * Hash payload and return hex string. Empty bodies hash to EMPTY_SHA256.
 */
export function hashPayload(body?: Uint8Array | string): string {
  if (!body || body.length === 0) {
    return EMPTY_SHA256;
  }
  return sha256Hex(body);
}

function isHttpMethod(method: string): method is HttpMethod {
  return HTTP_METHODS.some((m) => m === method);
}

export function assertCredentials(credentials: SigningCredentials): void {
  if (!credentials.accessKeyId || !credentials.secretAccessKey) {
    throw SigningError.missingCredentials();
  }
  if (!credentials.region) {
    throw SigningError.malformed('region is required');
  }
}

export function credentialScopeFor(dateStamp: string, credentials: SigningCredentials): string {
  return `${dateStamp}/${credentials.region}/${credentials.service ?? DEFAULT_SERVICE}/aws4_request`;
}

/**
 * Computes the hex signature of a canonical request
 */
export function computeSignature(
  canonicalRequest: string,
  amzDate: string,
  credentialScope: string,
  signingKey: Uint8Array
): string {
  const stringToSign = [ALGORITHM, amzDate, credentialScope, sha256Hex(canonicalRequest)].join('\n');
  return toHex(hmacSha256(signingKey, stringToSign));
}

/**
 * Signs a request. Deterministic for identical request, credentials and
 * timestamp; performs no I/O.
 *
 * @throws {SigningError} If credentials are missing, the host header is
 * absent, the method is unsupported or the URL is malformed
 */
export function signRequest(
  request: SigningRequest,
  credentials: SigningCredentials,
  timestamp: Date,
  keyCache: SigningKeyCache = new SigningKeyCache()
): SignedRequest {
  assertCredentials(credentials);

  const method = request.method.toUpperCase();
  if (!isHttpMethod(method)) {
    throw SigningError.malformed(`unsupported method ${request.method}`);
  }

  if (Number.isNaN(timestamp.getTime())) {
    throw SigningError.malformed('invalid timestamp');
  }

  if (!Object.keys(request.headers).some((name) => name.toLowerCase() === 'host')) {
    throw SigningError.missingHost();
  }

  const amzDate = formatAmzDate(timestamp);
  const dateStamp = formatDateStamp(timestamp);
  const payloadHash = request.payloadHash ?? hashPayload(request.body);

  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(request.headers)) {
    const lower = name.toLowerCase();
    if (lower !== 'authorization' && lower !== 'x-amz-date' && lower !== 'x-amz-content-sha256') {
      headers[name] = value;
    }
  }
  headers['x-amz-date'] = amzDate;
  headers['x-amz-content-sha256'] = payloadHash;

  const canonicalUri = getCanonicalUri(request.url.pathname);
  const canonicalQueryString = getCanonicalQueryString(request.url.search.substring(1));
  const canonicalRequest = createCanonicalRequest(
    method,
    canonicalUri,
    canonicalQueryString,
    headers,
    payloadHash
  );

  const service = credentials.service ?? DEFAULT_SERVICE;
  const credentialScope = credentialScopeFor(dateStamp, credentials);
  const signingKey = keyCache.getSigningKey(
    credentials.secretAccessKey,
    dateStamp,
    credentials.region,
    service
  );
  const signature = computeSignature(canonicalRequest, amzDate, credentialScope, signingKey);
  const signedHeaders = getSignedHeaders(headers);

  headers['authorization'] = [
    `${ALGORITHM} Credential=${credentials.accessKeyId}/${credentialScope}`,
    `SignedHeaders=${signedHeaders}`,
    `Signature=${signature}`,
  ].join(', ');

  return {
    method,
    url: request.url,
    headers,
    canonicalUri,
    canonicalQueryString,
    signedHeaders,
    credentialScope,
    payloadHash,
    amzDate,
    signature,
  };
}

/**
 * Signer bound to one set of credentials, sharing a signing-key cache
 * across requests.
 */
export class S3Signer {
  private readonly credentials: SigningCredentials;
  private readonly keyCache = new SigningKeyCache();

  constructor(credentials: SigningCredentials) {
    this.credentials = Object.freeze({ ...credentials });
  }

  get region(): string {
    return this.credentials.region;
  }

  /**
   * Signs a request, using the current time unless a timestamp is given
   */
  sign(request: SigningRequest, timestamp: Date = new Date()): SignedRequest {
    return signRequest(request, this.credentials, timestamp, this.keyCache);
  }

  /**
   * Generates a presigned URL for a path-style object URL on the endpoint
   *
   * @throws {ValidationError} If expiresIn is outside [1, 604800] seconds
   */
  presignUrl(options: PresignedUrlOptions, endpointUrl: string): PresignedUrlResult {
    return createPresignedUrl(this.credentials, endpointUrl, options, this.keyCache);
  }
}
