/**
 * Signing types for AWS Signature Version 4
 */

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE' | 'HEAD';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'PUT', 'POST', 'DELETE', 'HEAD'];

export type PresignMethod = 'GET' | 'PUT' | 'DELETE' | 'HEAD';

/**
 * Key material and scope used to sign requests
 */
export interface SigningCredentials {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly region: string;
  /** Defaults to "s3" */
  readonly service?: string;
}

export interface SigningRequest {
  method: string;
  url: URL;
  /** Must contain a host header */
  headers: Record<string, string>;
  /** Buffered body, hashed when no payloadHash is given */
  body?: Uint8Array | string;
  /** Precomputed payload hash or UNSIGNED-PAYLOAD for streamed bodies */
  payloadHash?: string;
}

export interface SignedRequest {
  method: HttpMethod;
  url: URL;
  /** Input headers plus x-amz-date, x-amz-content-sha256 and authorization */
  headers: Record<string, string>;
  canonicalUri: string;
  canonicalQueryString: string;
  signedHeaders: string;
  credentialScope: string;
  payloadHash: string;
  amzDate: string;
  signature: string;
}

export interface PresignedUrlOptions {
  method: PresignMethod;
  bucket: string;
  key: string;
  /** Seconds, integer in [1, 604800] */
  expiresIn: number;
  /** Signing time, defaults to now */
  timestamp?: Date;
}

export interface PresignedUrlResult {
  url: string;
  expiresAt: Date;
  method: PresignMethod;
}
