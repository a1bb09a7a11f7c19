/**
 * XML codec for S3 request and response bodies
 * @module s3-resumable-client/xml
 */

export {
  parseXml,
  buildXml,
  createXmlParser,
  createXmlBuilder,
  isXmlNode,
  normalizeArray,
  getNode,
  getNodes,
  getText,
  getTexts,
  cleanETag,
  parseDate,
  parseDateSafe,
  parseIntSafe,
  parseBooleanSafe,
  type XmlNode,
} from './parser.js';

export { parseErrorResponse, formatErrorMessage, type ParsedError } from './error.js';

export { parseListBucketsResponse } from './list-buckets.js';

export { parseListObjectsResponse } from './list-objects.js';

export {
  parseInitiateMultipartResponse,
  parseCompleteMultipartResponse,
  parseListPartsResponse,
  buildCompleteMultipartXml,
} from './multipart.js';

export { buildCreateBucketXml, parseCreateBucketXml } from './bucket.js';

export { parseCopyObjectResponse } from './copy.js';
