/**
 * XML parsing for S3 error responses
 * @module s3-resumable-client/xml/error
 */

import { getNode, getText, parseXml } from './parser.js';

/**
 * Parsed error information from an S3 response
 */
export interface ParsedError {
  /** Error code (e.g. 'NoSuchKey', 'AccessDenied') */
  readonly code: string;
  readonly message: string;
  readonly requestId?: string;
  readonly resource?: string;
  readonly hostId?: string;
}

/**
 * Parses an `<Error>` document.
 *
 * Returns undefined when the body is empty, is not XML or has no Error
 * element with a Code; callers then fall back to the HTTP status.
 *
 * @example
 * ```typescript
 * const error = parseErrorResponse(
 *   '<Error><Code>NoSuchKey</Code><Message>The specified key does not exist.</Message></Error>'
 * );
 * error?.code; // 'NoSuchKey'
 * ```
 */
export function parseErrorResponse(xml: string): ParsedError | undefined {
  if (!xml.includes('<Error')) {
    return undefined;
  }

  let doc;
  try {
    doc = parseXml(xml);
  } catch {
    return undefined;
  }

  const error = getNode(doc, 'Error');
  const code = getText(error, 'Code');
  if (!code) {
    return undefined;
  }

  return {
    code,
    message: getText(error, 'Message') || code,
    requestId: getText(error, 'RequestId') || undefined,
    resource: getText(error, 'Resource') || undefined,
    hostId: getText(error, 'HostId') || undefined,
  };
}

/**
 * Formats a parsed error for display
 *
 * @example
 * ```typescript
 * formatErrorMessage({ code: 'NoSuchKey', message: 'Not found', requestId: 'req-1' });
 * // 'NoSuchKey: Not found (RequestId: req-1)'
 * ```
 */
export function formatErrorMessage(error: ParsedError): string {
  let message = `${error.code}: ${error.message}`;

  if (error.requestId) {
    message += ` (RequestId: ${error.requestId})`;
  }

  if (error.resource) {
    message += ` [Resource: ${error.resource}]`;
  }

  return message;
}
