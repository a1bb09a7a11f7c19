/**
 * Shared storage types
 * @module s3-resumable-client/types
 */

/**
 * Object metadata from listing or HEAD
 */
export interface ObjectDescriptor {
  readonly bucket: string;
  readonly key: string;
  readonly size: number;
  /** Unquoted entity tag */
  readonly eTag: string;
  readonly lastModified: Date;
  readonly contentType?: string;
  readonly storageClass?: string;
  /** Standard headers, HEAD only */
  readonly cacheControl?: string;
  readonly contentDisposition?: string;
  readonly contentEncoding?: string;
  /** User metadata, HEAD only */
  readonly metadata?: Record<string, string>;
}

export interface BucketDescriptor {
  readonly name: string;
  readonly creationDate: Date;
}

/**
 * One page of a ListObjectsV2 response
 */
export interface ListObjectsPage {
  readonly objects: ObjectDescriptor[];
  readonly commonPrefixes: string[];
  readonly isTruncated: boolean;
  readonly nextContinuationToken?: string;
}

/**
 * Aggregated listing across pages
 */
export interface ListObjectsResult {
  readonly objects: ObjectDescriptor[];
  readonly commonPrefixes: string[];
  /** True when the caller's cap stopped paging early */
  readonly truncated: boolean;
}

/**
 * Part reference sent on completion
 */
export interface CompletedPart {
  /** 1-10000 */
  readonly partNumber: number;
  readonly eTag: string;
}

/**
 * Part known to the backend
 */
export interface PartInfo extends CompletedPart {
  readonly size: number;
  readonly lastModified?: Date;
}

export interface ListPartsPage {
  readonly parts: PartInfo[];
  readonly isTruncated: boolean;
  readonly nextPartNumberMarker?: number;
}

export interface CompleteMultipartResult {
  readonly location?: string;
  readonly bucket: string;
  readonly key: string;
  readonly eTag: string;
}

export interface CopyObjectResult {
  readonly eTag: string;
  readonly lastModified?: Date;
}
