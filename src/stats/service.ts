/**
 * Storage statistics across buckets
 * @module s3-resumable-client/stats/service
 */

import type { BucketsService } from '../buckets/index.js';
import { ValidationError, wrapError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import type { ObjectsService } from '../objects/index.js';
import type { BucketDescriptor } from '../types/index.js';

export interface StatsOptions {
  /** Count at most this many objects per bucket */
  maxObjectsPerBucket?: number;
}

export interface BucketStats {
  readonly name: string;
  readonly creationDate: Date;
  readonly objectCount: number;
  readonly totalSize: number;
  /** Rounded to whole bytes; 0 for an empty bucket */
  readonly averageObjectSize: number;
  /** Set when maxObjectsPerBucket cut the count short */
  readonly truncated: boolean;
  /** Set when the bucket could not be listed */
  readonly error?: string;
}

export interface StorageStats {
  readonly bucketCount: number;
  readonly objectCount: number;
  readonly totalSize: number;
  readonly averageObjectSize: number;
  readonly buckets: BucketStats[];
  readonly collectedAt: Date;
}

function average(total: number, count: number): number {
  return count > 0 ? Math.round(total / count) : 0;
}

/**
 * Counts buckets, objects and bytes by listing every bucket
 */
export class StatsService {
  constructor(
    private readonly buckets: BucketsService,
    private readonly objects: ObjectsService,
    private readonly logger: Logger
  ) {}

  /**
   * A bucket that cannot be listed is reported with `error` set and counts
   * as empty in the totals.
   */
  async getStats(options: StatsOptions = {}): Promise<StorageStats> {
    const { maxObjectsPerBucket } = options;
    if (maxObjectsPerBucket !== undefined && (!Number.isInteger(maxObjectsPerBucket) || maxObjectsPerBucket < 1)) {
      throw new ValidationError({
        message: 'maxObjectsPerBucket must be a positive integer',
        code: 'INVALID_MAX_OBJECTS',
      });
    }

    const buckets = await this.buckets.listBuckets();
    const results: BucketStats[] = [];
    for (const bucket of buckets) {
      results.push(await this.bucketStats(bucket, maxObjectsPerBucket));
    }

    const objectCount = results.reduce((sum, bucket) => sum + bucket.objectCount, 0);
    const totalSize = results.reduce((sum, bucket) => sum + bucket.totalSize, 0);
    this.logger.info('Storage statistics collected', { bucketCount: buckets.length, objectCount, totalSize });

    return {
      bucketCount: buckets.length,
      objectCount,
      totalSize,
      averageObjectSize: average(totalSize, objectCount),
      buckets: results,
      collectedAt: new Date(),
    };
  }

  private async bucketStats(bucket: BucketDescriptor, maxKeys: number | undefined): Promise<BucketStats> {
    const base = { name: bucket.name, creationDate: bucket.creationDate };
    try {
      const { objects, truncated } = await this.objects.listObjects(bucket.name, { maxKeys });
      const totalSize = objects.reduce((sum, object) => sum + object.size, 0);
      return {
        ...base,
        objectCount: objects.length,
        totalSize,
        averageObjectSize: average(totalSize, objects.length),
        truncated,
      };
    } catch (error) {
      const failure = wrapError(error);
      this.logger.warn('Skipping bucket in statistics', {
        bucket: bucket.name,
        errorCode: failure.code,
        errorMessage: failure.message,
      });
      return { ...base, objectCount: 0, totalSize: 0, averageObjectSize: 0, truncated: false, error: failure.message };
    }
  }
}
