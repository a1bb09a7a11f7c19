/**
 * Bucket operations
 * @module s3-resumable-client/buckets/service
 */

import { StorageError, ValidationError } from '../errors/index.js';
import type { RequestExecutor } from '../client/request.js';
import type { BucketDescriptor } from '../types/index.js';
import { buildCreateBucketXml, parseListBucketsResponse } from '../xml/index.js';
import { DEFAULT_REGION } from '../config/index.js';

const decoder = new TextDecoder();

function requireBucket(bucket: string): void {
  if (!bucket) {
    throw ValidationError.required('bucket');
  }
}

/**
 * Bucket listing, existence checks, creation, deletion and policies
 */
export class BucketsService {
  constructor(private readonly executor: RequestExecutor) {}

  async listBuckets(): Promise<BucketDescriptor[]> {
    const response = await this.executor.send({ method: 'GET' });
    return parseListBucketsResponse(decoder.decode(response.body));
  }

  /**
   * Returns false when the backend answers 404
   */
  async bucketExists(bucket: string): Promise<boolean> {
    requireBucket(bucket);
    const response = await this.executor.send({ method: 'HEAD', bucket, acceptStatus: [404] });
    return response.status !== 404;
  }

  /**
   * Creates a bucket. A LocationConstraint is sent unless the region is
   * us-east-1.
   *
   * @param region - Defaults to the client region
   */
  async createBucket(bucket: string, region: string = this.executor.region): Promise<void> {
    requireBucket(bucket);
    const body = region && region !== DEFAULT_REGION ? buildCreateBucketXml(region) : undefined;
    await this.executor.send({
      method: 'PUT',
      bucket,
      body,
      headers: body ? { 'content-type': 'application/xml' } : undefined,
    });
  }

  async deleteBucket(bucket: string): Promise<void> {
    requireBucket(bucket);
    await this.executor.send({ method: 'DELETE', bucket });
  }

  /**
   * Returns the policy JSON text, or undefined when the bucket has none
   */
  async getBucketPolicy(bucket: string): Promise<string | undefined> {
    requireBucket(bucket);
    try {
      const response = await this.executor.send({ method: 'GET', bucket, query: { policy: '' } });
      return decoder.decode(response.body);
    } catch (error) {
      if (error instanceof StorageError && error.code === 'NoSuchBucketPolicy') {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * @throws {ValidationError} If the policy is not valid JSON
   */
  async setBucketPolicy(bucket: string, policy: string): Promise<void> {
    requireBucket(bucket);
    try {
      JSON.parse(policy);
    } catch (error) {
      throw new ValidationError({
        message: `Bucket policy must be valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        code: 'INVALID_POLICY',
        cause: error,
      });
    }

    await this.executor.send({
      method: 'PUT',
      bucket,
      query: { policy: '' },
      body: policy,
      headers: { 'content-type': 'application/json' },
    });
  }

  async deleteBucketPolicy(bucket: string): Promise<void> {
    requireBucket(bucket);
    await this.executor.send({ method: 'DELETE', bucket, query: { policy: '' } });
  }
}
