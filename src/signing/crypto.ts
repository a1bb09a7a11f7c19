/**
 * Cryptographic utilities for Signature V4 signing and chunk checksums
 * Uses @noble/hashes for HMAC-SHA256 and SHA-256
 */

import { hmac } from '@noble/hashes/hmac';
import { sha256 as sha256Noble } from '@noble/hashes/sha256';

const encoder = new TextEncoder();

function toBytes(data: string | Uint8Array): Uint8Array {
  return typeof data === 'string' ? encoder.encode(data) : data;
}

/**
 * Compute HMAC-SHA256
 */
export function hmacSha256(key: Uint8Array, data: string | Uint8Array): Uint8Array {
  return hmac(sha256Noble, key, toBytes(data));
}

/**
 * Compute SHA-256 hash
 */
export function sha256Hash(data: string | Uint8Array): Uint8Array {
  return sha256Noble(toBytes(data));
}

/**
 * Compute SHA-256 hash and return as hex string
 */
export function sha256Hex(data: string | Uint8Array): string {
  return toHex(sha256Hash(data));
}

/**
 * Incremental SHA-256 over a sequence of buffers
 */
export class Sha256Accumulator {
  private readonly hash = sha256Noble.create();

  update(data: Uint8Array): this {
    this.hash.update(data);
    return this;
  }

  digestHex(): string {
    return toHex(this.hash.digest());
  }
}

/**
 * Convert byte array to lowercase hex string
 */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}
