/**
 * Tests for XML parser utilities
 */

import {
  buildXml,
  cleanETag,
  getNode,
  getNodes,
  getText,
  getTexts,
  normalizeArray,
  parseBooleanSafe,
  parseDate,
  parseDateSafe,
  parseIntSafe,
  parseXml,
} from '../parser.js';

describe('parseXml', () => {
  it('should keep tag values as strings', () => {
    const doc = parseXml('<Root><Size>0042</Size><Flag>true</Flag></Root>');
    expect(getText(getNode(doc, 'Root'), 'Size')).toBe('0042');
    expect(getText(getNode(doc, 'Root'), 'Flag')).toBe('true');
  });

  it('should ignore the XML declaration', () => {
    const doc = parseXml('<?xml version="1.0" encoding="UTF-8"?><Root><A>1</A></Root>');
    expect(Object.keys(doc)).toEqual(['Root']);
  });

  it('should decode entities', () => {
    const doc = parseXml('<Root><ETag>&quot;abc&quot;</ETag></Root>');
    expect(getText(getNode(doc, 'Root'), 'ETag')).toBe('"abc"');
  });

  it('should reject malformed documents', () => {
    expect(() => parseXml('<Root><Open></Root>')).toThrow('Failed to parse XML');
  });
});

describe('node access', () => {
  const doc = parseXml(`
    <Root>
      <Item><Name>a</Name></Item>
      <Item><Name>b</Name></Item>
      <Single><Name>c</Name></Single>
      <Empty></Empty>
      <Tagged kind="x">text</Tagged>
    </Root>
  `);
  const root = getNode(doc, 'Root');

  it('should return repeated elements as a list', () => {
    expect(getNodes(root, 'Item').map((item) => getText(item, 'Name'))).toEqual(['a', 'b']);
  });

  it('should wrap a single element in a list', () => {
    expect(getNodes(root, 'Single')).toHaveLength(1);
  });

  it('should return an empty list for missing elements', () => {
    expect(getNodes(root, 'Missing')).toEqual([]);
    expect(getNode(root, 'Missing')).toBeUndefined();
  });

  it('should read text of empty and attributed elements', () => {
    expect(getText(root, 'Empty')).toBe('');
    expect(getText(root, 'Tagged')).toBe('text');
    expect(getText(root, 'Missing')).toBeUndefined();
  });

  it('should collect texts of repeated elements', () => {
    const list = getNode(parseXml('<L><V>1</V><V>2</V></L>'), 'L');
    expect(getTexts(list, 'V')).toEqual(['1', '2']);
  });
});

describe('buildXml', () => {
  it('should prefix the declaration and omit undefined values', () => {
    expect(buildXml({ Root: { A: '1', B: undefined } })).toBe(
      '<?xml version="1.0" encoding="UTF-8"?><Root><A>1</A></Root>'
    );
  });

  it('should render arrays as repeated elements', () => {
    expect(buildXml({ Root: { V: ['1', '2'] } })).toBe(
      '<?xml version="1.0" encoding="UTF-8"?><Root><V>1</V><V>2</V></Root>'
    );
  });
});

describe('value helpers', () => {
  it('should normalize arrays', () => {
    expect(normalizeArray(undefined)).toEqual([]);
    expect(normalizeArray('a')).toEqual(['a']);
    expect(normalizeArray(['a', 'b'])).toEqual(['a', 'b']);
  });

  it('should strip ETag quotes', () => {
    expect(cleanETag('"abc123"')).toBe('abc123');
    expect(cleanETag('abc123')).toBe('abc123');
    expect(cleanETag('"abc-2"')).toBe('abc-2');
  });

  it('should parse dates', () => {
    expect(parseDate('2024-01-15T10:30:00.000Z').toISOString()).toBe('2024-01-15T10:30:00.000Z');
    expect(parseDateSafe('Mon, 15 Jan 2024 10:30:00 GMT')?.toISOString()).toBe('2024-01-15T10:30:00.000Z');
    expect(parseDateSafe('not a date')).toBeUndefined();
    expect(parseDateSafe(undefined)).toBeUndefined();
    expect(() => parseDate('nope')).toThrow('Invalid date string: nope');
  });

  it('should parse integers and booleans with defaults', () => {
    expect(parseIntSafe('123', 0)).toBe(123);
    expect(parseIntSafe('x', 7)).toBe(7);
    expect(parseIntSafe(undefined, 7)).toBe(7);
    expect(parseBooleanSafe('TRUE', false)).toBe(true);
    expect(parseBooleanSafe('false', true)).toBe(false);
    expect(parseBooleanSafe(undefined, true)).toBe(true);
  });
});
