/**
 * XML parsing for CopyObject responses
 * @module s3-resumable-client/xml/copy
 */

import type { CopyObjectResult } from '../types/index.js';
import { cleanETag, getNode, getText, parseDateSafe, parseXml } from './parser.js';

/**
 * Parses CopyObjectResult
 *
 * @throws Error if the document is not a CopyObjectResult
 */
export function parseCopyObjectResponse(xml: string): CopyObjectResult {
  const result = getNode(parseXml(xml), 'CopyObjectResult');
  if (!result) {
    throw new Error('Invalid CopyObject response: missing CopyObjectResult element');
  }
  return {
    eTag: cleanETag(getText(result, 'ETag') ?? ''),
    lastModified: parseDateSafe(getText(result, 'LastModified')),
  };
}
