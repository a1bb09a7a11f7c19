/**
 * XML for multipart upload operations
 * @module s3-resumable-client/xml/multipart
 */

import type { CompletedPart, CompleteMultipartResult, ListPartsPage, PartInfo } from '../types/index.js';
import {
  buildXml,
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
 * Extracts the upload id from InitiateMultipartUploadResult
 *
 * @throws Error if the upload id is missing
 */
export function parseInitiateMultipartResponse(xml: string): string {
  const result = getNode(parseXml(xml), 'InitiateMultipartUploadResult');
  const uploadId = getText(result, 'UploadId');
  if (!uploadId) {
    throw new Error('Invalid InitiateMultipartUpload response: missing UploadId');
  }
  return uploadId;
}

/**
 * Parses CompleteMultipartUploadResult
 *
 * @throws Error if the document is not a CompleteMultipartUploadResult
 */
export function parseCompleteMultipartResponse(xml: string): CompleteMultipartResult {
  const result = getNode(parseXml(xml), 'CompleteMultipartUploadResult');
  if (!result) {
    throw new Error('Invalid CompleteMultipartUpload response: missing CompleteMultipartUploadResult');
  }

  return {
    location: getText(result, 'Location') || undefined,
    bucket: getText(result, 'Bucket') ?? '',
    key: getText(result, 'Key') ?? '',
    eTag: cleanETag(getText(result, 'ETag') ?? ''),
  };
}

/**
 * Parses one ListPartsResult page
 */
export function parseListPartsResponse(xml: string): ListPartsPage {
  const result = getNode(parseXml(xml), 'ListPartsResult');
  if (!result) {
    throw new Error('Invalid ListParts response: missing ListPartsResult element');
  }

  const parts: PartInfo[] = getNodes(result, 'Part').map((part) => ({
    partNumber: parseIntSafe(getText(part, 'PartNumber'), 0),
    eTag: cleanETag(getText(part, 'ETag') ?? ''),
    size: parseIntSafe(getText(part, 'Size'), 0),
    lastModified: parseDateSafe(getText(part, 'LastModified')),
  }));

  const marker = getText(result, 'NextPartNumberMarker');

  return {
    parts,
    isTruncated: parseBooleanSafe(getText(result, 'IsTruncated'), false),
    nextPartNumberMarker: marker ? parseIntSafe(marker, 0) : undefined,
  };
}

/**
 * Builds the CompleteMultipartUpload body. Parts are listed in ascending
 * part-number order with quoted ETags.
 *
 * @throws Error if parts are empty, duplicated or out of range
 *
 * @example
 * ```typescript
 * buildCompleteMultipartXml([{ partNumber: 2, eTag: 'b' }, { partNumber: 1, eTag: 'a' }]);
 * // <CompleteMultipartUpload><Part><PartNumber>1</PartNumber><ETag>&quot;a&quot;</ETag></Part>...
 * ```
 */
export function buildCompleteMultipartXml(parts: CompletedPart[]): string {
  if (parts.length === 0) {
    throw new Error('Cannot build CompleteMultipartUpload XML: parts array is empty');
  }

  const seen = new Set<number>();
  for (const part of parts) {
    if (!Number.isInteger(part.partNumber) || part.partNumber < 1 || part.partNumber > 10000) {
      throw new Error(`Invalid part number: ${part.partNumber}. Must be between 1 and 10000.`);
    }
    if (!part.eTag) {
      throw new Error(`Part ${part.partNumber} is missing ETag`);
    }
    if (seen.has(part.partNumber)) {
      throw new Error(`Duplicate part number: ${part.partNumber}`);
    }
    seen.add(part.partNumber);
  }

  const sortedParts = [...parts].sort((a, b) => a.partNumber - b.partNumber);

  return buildXml({
    CompleteMultipartUpload: {
      Part: sortedParts.map((part) => ({
        PartNumber: String(part.partNumber),
        ETag: `"${cleanETag(part.eTag)}"`,
      })),
    },
  });
}
