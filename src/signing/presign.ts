/**
 * Presigned URL generation for Signature V4
 */

import { ValidationError } from '../errors/index.js';
import { uriEncode, uriEncodePath, createCanonicalRequest } from './canonical.js';
import { formatAmzDate, formatDateStamp } from './format.js';
import { SigningKeyCache } from './key-derivation.js';
import {
  ALGORITHM,
  DEFAULT_SERVICE,
  UNSIGNED_PAYLOAD,
  assertCredentials,
  computeSignature,
  credentialScopeFor,
} from './signer.js';
import type { PresignedUrlOptions, PresignedUrlResult, SigningCredentials } from './types.js';

/** 7 days in seconds */
export const MAX_PRESIGN_EXPIRES = 604800;
export const MIN_PRESIGN_EXPIRES = 1;

const PRESIGN_METHODS = new Set(['GET', 'PUT', 'DELETE', 'HEAD']);

/**
 * Checks a presign expiry before anything is signed
 *
 * @throws {ValidationError} If expiresIn is not an integer in [1, 604800]
 */
export function validateExpiresIn(expiresIn: number): void {
  if (!Number.isInteger(expiresIn) || expiresIn < MIN_PRESIGN_EXPIRES || expiresIn > MAX_PRESIGN_EXPIRES) {
    throw new ValidationError({
      message: `Presigned URL expiration must be an integer between ${MIN_PRESIGN_EXPIRES} and ${MAX_PRESIGN_EXPIRES} seconds, got ${expiresIn}`,
      code: 'INVALID_EXPIRY',
      details: { expiresIn },
    });
  }
}

/**
 * Creates a presigned URL. Only the host header is signed and the payload
 * is declared unsigned.
 *
 * @param endpointUrl - `scheme://host[:port]`
 */
export function createPresignedUrl(
  credentials: SigningCredentials,
  endpointUrl: string,
  options: PresignedUrlOptions,
  keyCache: SigningKeyCache = new SigningKeyCache()
): PresignedUrlResult {
  validateExpiresIn(options.expiresIn);

  if (!PRESIGN_METHODS.has(options.method)) {
    throw new ValidationError({
      message: `Unsupported presign method: ${options.method}`,
      code: 'INVALID_METHOD',
    });
  }
  if (!options.bucket) {
    throw ValidationError.required('bucket');
  }
  if (!options.key) {
    throw ValidationError.required('key');
  }

  assertCredentials(credentials);

  const now = options.timestamp ?? new Date();
  const amzDate = formatAmzDate(now);
  const dateStamp = formatDateStamp(now);
  const credentialScope = credentialScopeFor(dateStamp, credentials);
  const host = new URL(endpointUrl).host;

  const canonicalUri = `/${uriEncode(options.bucket)}/${uriEncodePath(options.key)}`;
  const query = [
    ['X-Amz-Algorithm', ALGORITHM],
    ['X-Amz-Credential', `${credentials.accessKeyId}/${credentialScope}`],
    ['X-Amz-Date', amzDate],
    ['X-Amz-Expires', String(options.expiresIn)],
    ['X-Amz-SignedHeaders', 'host'],
  ]
    .map(([name, value]) => `${uriEncode(name)}=${uriEncode(value)}`)
    .join('&');

  const canonicalRequest = createCanonicalRequest(
    options.method,
    canonicalUri,
    query,
    { host },
    UNSIGNED_PAYLOAD
  );

  const signingKey = keyCache.getSigningKey(
    credentials.secretAccessKey,
    dateStamp,
    credentials.region,
    credentials.service ?? DEFAULT_SERVICE
  );
  const signature = computeSignature(canonicalRequest, amzDate, credentialScope, signingKey);

  return {
    url: `${endpointUrl}${canonicalUri}?${query}&X-Amz-Signature=${signature}`,
    expiresAt: new Date(now.getTime() + options.expiresIn * 1000),
    method: options.method,
  };
}
