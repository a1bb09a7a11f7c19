/**
 * Signature V4 signing module
 *
 * - Request signing with Authorization header
 * - Presigned URL generation (GET/PUT/DELETE/HEAD)
 * - Canonical request construction
 * - Signing key derivation with caching
 * - Cryptographic utilities (HMAC-SHA256, SHA-256)
 *
 * Path-style URLs only.
 */

export type {
  HttpMethod,
  PresignMethod,
  SigningCredentials,
  SigningRequest,
  SignedRequest,
  PresignedUrlOptions,
  PresignedUrlResult,
} from './types.js';

export {
  S3Signer,
  signRequest,
  hashPayload,
  ALGORITHM,
  UNSIGNED_PAYLOAD,
  EMPTY_SHA256,
} from './signer.js';

export { createPresignedUrl, validateExpiresIn, MAX_PRESIGN_EXPIRES, MIN_PRESIGN_EXPIRES } from './presign.js';

export { hmacSha256, sha256Hash, sha256Hex, toHex, Sha256Accumulator } from './crypto.js';

export {
  createCanonicalRequest,
  getCanonicalUri,
  getCanonicalQueryString,
  getCanonicalHeaders,
  getSignedHeaders,
  uriEncode,
  uriEncodePath,
} from './canonical.js';

export { deriveSigningKey, SigningKeyCache } from './key-derivation.js';

export { formatDateStamp, formatAmzDate } from './format.js';
