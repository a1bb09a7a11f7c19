/**
 * Signing key derivation for Signature V4
 */

import { hmacSha256 } from './crypto.js';

/**
 * Derive signing key using HMAC-SHA256 chaining
 * kSecret = "AWS4" + secretAccessKey
 * kDate = HMAC-SHA256(kSecret, dateStamp)
 * kRegion = HMAC-SHA256(kDate, region)
 * kService = HMAC-SHA256(kRegion, service)
 * kSigning = HMAC-SHA256(kService, "aws4_request")
 */
export function deriveSigningKey(
  secretAccessKey: string,
  dateStamp: string,
  region: string,
  service: string
): Uint8Array {
  const kSecret = new TextEncoder().encode('AWS4' + secretAccessKey);
  const kDate = hmacSha256(kSecret, dateStamp);
  const kRegion = hmacSha256(kDate, region);
  const kService = hmacSha256(kRegion, service);
  return hmacSha256(kService, 'aws4_request');
}

/**
 * Caches derived keys per date, region and service. Entries for other dates
 * are evicted whenever a new date is derived.
 */
export class SigningKeyCache {
  private cache: Map<string, { key: Uint8Array; date: string }> = new Map();

  getSigningKey(secretAccessKey: string, dateStamp: string, region: string, service: string): Uint8Array {
    const cacheKey = `${secretAccessKey}:${dateStamp}:${region}:${service}`;

    const cached = this.cache.get(cacheKey);
    if (cached) {
      return cached.key;
    }

    const key = deriveSigningKey(secretAccessKey, dateStamp, region, service);
    this.cleanupCache(dateStamp);
    this.cache.set(cacheKey, { key, date: dateStamp });

    return key;
  }

  get size(): number {
    return this.cache.size;
  }

  private cleanupCache(currentDate: string): void {
    for (const [key, value] of this.cache.entries()) {
      if (value.date !== currentDate) {
        this.cache.delete(key);
      }
    }
  }

  clear(): void {
    this.cache.clear();
  }
}
