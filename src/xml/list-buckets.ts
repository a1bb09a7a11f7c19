/**
 * XML parsing for ListBuckets responses
 * @module s3-resumable-client/xml/list-buckets
 */

import type { BucketDescriptor } from '../types/index.js';
import { getNode, getNodes, getText, parseDateSafe, parseXml } from './parser.js';

/**
 * Parses ListAllMyBucketsResult
 *
 * ```xml
 * <ListAllMyBucketsResult>
 *   <Buckets>
 *     <Bucket><Name>photos</Name><CreationDate>2024-01-15T10:30:00.000Z</CreationDate></Bucket>
 *   </Buckets>
 * </ListAllMyBucketsResult>
 * ```
 */
export function parseListBucketsResponse(xml: string): BucketDescriptor[] {
  const result = getNode(parseXml(xml), 'ListAllMyBucketsResult');
  if (!result) {
    throw new Error('Invalid ListBuckets response: missing ListAllMyBucketsResult element');
  }

  const buckets: BucketDescriptor[] = [];
  for (const bucket of getNodes(getNode(result, 'Buckets'), 'Bucket')) {
    const name = getText(bucket, 'Name');
    if (!name) continue;
    buckets.push({
      name,
      creationDate: parseDateSafe(getText(bucket, 'CreationDate')) ?? new Date(0),
    });
  }
  return buckets;
}
