/**
 * Core XML parsing utilities for S3 API responses
 * @module s3-resumable-client/xml/parser
 */

import { XMLParser, XMLBuilder } from 'fast-xml-parser';

/**
 * Parsed XML element: child element names map to text, nested elements or
 * arrays of either
 */
export type XmlNode = Record<string, unknown>;

/**
 * Parser options for S3 XML. Tag values stay strings.
 */
const PARSER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  ignoreDeclaration: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
};

/**
 * Builder options for S3 XML request bodies
 */
const BUILDER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  format: false,
  suppressEmptyNode: true,
};

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export function createXmlParser(): XMLParser {
  return new XMLParser(PARSER_OPTIONS);
}

export function createXmlBuilder(): XMLBuilder {
  return new XMLBuilder(BUILDER_OPTIONS);
}

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses and validates an XML document
 *
 * @throws Error if XML is invalid
 *
 * @example
 * ```typescript
 * const doc = parseXml('<Root><Value>test</Value></Root>');
 * getText(getNode(doc, 'Root'), 'Value'); // 'test'
 * ```
 */
export function parseXml(xml: string): XmlNode {
  let parsed: unknown;
  try {
    parsed = createXmlParser().parse(xml, true);
  } catch (error) {
    throw new Error(`Failed to parse XML: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isXmlNode(parsed)) {
    throw new Error('Failed to parse XML: document has no root element');
  }
  return parsed;
}

/**
 * Converts an object to an XML document with declaration
 */
export function buildXml(obj: Record<string, unknown>): string {
  try {
    return XML_DECLARATION + String(createXmlBuilder().build(obj));
  } catch (error) {
    throw new Error(`Failed to build XML: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Normalizes array-or-single-item parsing behavior.
 * A single child parses as a value, repeated children as an array.
 *
 * @example
 * ```typescript
 * normalizeArray(undefined); // []
 * normalizeArray('single'); // ['single']
 * normalizeArray(['a', 'b']); // ['a', 'b']
 * ```
 */
export function normalizeArray(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Returns a child element, or undefined when absent or not an element
 */
export function getNode(node: XmlNode | undefined, name: string): XmlNode | undefined {
  const value = node?.[name];
  return isXmlNode(value) ? value : undefined;
}

/**
 * Returns all child elements with the given name
 */
export function getNodes(node: XmlNode | undefined, name: string): XmlNode[] {
  return normalizeArray(node?.[name]).filter(isXmlNode);
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (isXmlNode(value)) {
    const text = value['#text'];
    return typeof text === 'string' ? text : '';
  }
  return undefined;
}

/**
 * Returns the text content of a child element. Empty elements give ''.
 */
export function getText(node: XmlNode | undefined, name: string): string | undefined {
  return textOf(node?.[name]);
}

/**
 * Returns the text content of every child element with the given name
 */
export function getTexts(node: XmlNode | undefined, name: string): string[] {
  const texts: string[] = [];
  for (const value of normalizeArray(node?.[name])) {
    const text = textOf(value);
    if (text !== undefined) texts.push(text);
  }
  return texts;
}

/**
 * Removes surrounding quotes from ETag values
 *
 * @example
 * ```typescript
 * cleanETag('"abc123"'); // 'abc123'
 * cleanETag('abc123'); // 'abc123'
 * ```
 */
export function cleanETag(eTag: string): string {
  return eTag.replace(/^"(.+)"$/, '$1');
}

/**
 * Parses an ISO 8601 or HTTP date
 *
 * @throws Error if date string is invalid
 */
export function parseDate(dateStr: string): Date {
  const date = new Date(dateStr);
  if (isNaN(date.getTime())) {
    throw new Error(`Invalid date string: ${dateStr}`);
  }
  return date;
}

export function parseDateSafe(dateStr: string | undefined): Date | undefined {
  if (!dateStr) return undefined;
  const date = new Date(dateStr);
  return isNaN(date.getTime()) ? undefined : date;
}

/**
 * Safely parses an integer from a string
 *
 * @example
 * ```typescript
 * parseIntSafe('123', 0); // 123
 * parseIntSafe('invalid', 0); // 0
 * parseIntSafe('', 10); // 10
 * ```
 */
export function parseIntSafe(value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Safely parses an S3 'true'/'false' string
 */
export function parseBooleanSafe(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}
