/**
 * XML parsing for ListObjectsV2 responses
 * @module s3-resumable-client/xml/list-objects
 */

import type { ListObjectsPage, ObjectDescriptor } from '../types/index.js';
import {
  cleanETag,
  getNode,
  getNodes,
  getText,
  parseBooleanSafe,
  parseDateSafe,
  parseIntSafe,
  parseXml,
} from './parser.js';

/**
 * Parses one ListBucketResult page
 *
 * @param bucket - Bucket the listing was issued against
 * @throws Error if the document is not a ListBucketResult
 */
export function parseListObjectsResponse(xml: string, bucket: string): ListObjectsPage {
  const result = getNode(parseXml(xml), 'ListBucketResult');
  if (!result) {
    throw new Error('Invalid ListObjects response: missing ListBucketResult element');
  }

  const objects: ObjectDescriptor[] = [];
  for (const entry of getNodes(result, 'Contents')) {
    const key = getText(entry, 'Key');
    if (key === undefined) continue;

    objects.push({
      bucket,
      key,
      size: parseIntSafe(getText(entry, 'Size'), 0),
      eTag: cleanETag(getText(entry, 'ETag') ?? ''),
      lastModified: parseDateSafe(getText(entry, 'LastModified')) ?? new Date(0),
      storageClass: getText(entry, 'StorageClass') || undefined,
    });
  }

  const commonPrefixes: string[] = [];
  for (const entry of getNodes(result, 'CommonPrefixes')) {
    const prefix = getText(entry, 'Prefix');
    if (prefix) commonPrefixes.push(prefix);
  }

  return {
    objects,
    commonPrefixes,
    isTruncated: parseBooleanSafe(getText(result, 'IsTruncated'), false),
    nextContinuationToken: getText(result, 'NextContinuationToken') || undefined,
  };
}
