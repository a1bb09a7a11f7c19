/**
 * HTTP transport layer
 */

export type {
  HttpRequest,
  HttpResponse,
  StreamingHttpResponse,
  HttpTransport,
  UploadProgressCallback,
} from './types.js';

export {
  getHeader,
  isSuccessResponse,
  getETag,
  getContentLength,
  getContentType,
  getRequestId,
  getRetryAfter,
  getUserMetadata,
} from './types.js';

export { withUploadProgress, BODY_SLICE_SIZE } from './progress-stream.js';

export {
  UndiciTransport,
  createUndiciTransport,
  toNetworkError,
  type UndiciTransportOptions,
} from './undici-transport.js';
