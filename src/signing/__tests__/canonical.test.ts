/**
 * Tests for canonical request construction
 */

import {
  createCanonicalRequest,
  getCanonicalHeaders,
  getCanonicalQueryString,
  getCanonicalUri,
  getSignedHeaders,
  uriEncode,
  uriEncodePath,
} from '../canonical.js';
import { SigningError } from '../../errors/index.js';

describe('uriEncode', () => {
  it('should leave unreserved characters alone', () => {
    expect(uriEncode('AZaz09-_.~')).toBe('AZaz09-_.~');
  });

  it('should percent-encode reserved characters with uppercase hex', () => {
    expect(uriEncode('a b+c/d=e')).toBe('a%20b%2Bc%2Fd%3De');
  });

  it('should encode multi-byte characters as UTF-8', () => {
    expect(uriEncode('é')).toBe('%C3%A9');
    expect(uriEncode('😀')).toBe('%F0%9F%98%80');
  });

  it('should keep slashes in object keys', () => {
    expect(uriEncodePath('photos/2024/my file.jpg')).toBe('photos/2024/my%20file.jpg');
  });
});

describe('getCanonicalUri', () => {
  it('should return / for an empty path', () => {
    expect(getCanonicalUri('')).toBe('/');
    expect(getCanonicalUri('/')).toBe('/');
  });

  it('should not double-encode an already encoded path', () => {
    expect(getCanonicalUri('/bucket/my%20file.txt')).toBe('/bucket/my%20file.txt');
  });

  it('should normalize characters the URL parser leaves unencoded', () => {
    expect(getCanonicalUri("/bucket/it's(1).txt")).toBe('/bucket/it%27s%281%29.txt');
  });

  it('should keep empty segments', () => {
    expect(getCanonicalUri('/bucket//key')).toBe('/bucket//key');
  });

  it('should reject malformed percent-encoding', () => {
    expect(() => getCanonicalUri('/bucket/%E0%A4%A')).toThrow(SigningError);
  });
});

describe('getCanonicalQueryString', () => {
  it('should return an empty string for no query', () => {
    expect(getCanonicalQueryString('')).toBe('');
  });

  it('should sort by key and give bare keys an empty value', () => {
    expect(getCanonicalQueryString('uploads&prefix=a')).toBe('prefix=a&uploads=');
  });

  it('should sort equal keys by value', () => {
    expect(getCanonicalQueryString('k=b&k=a')).toBe('k=a&k=b');
  });

  it('should decode once and re-encode', () => {
    expect(getCanonicalQueryString('prefix=a%2Fb&marker=x%20y')).toBe('marker=x%20y&prefix=a%2Fb');
    expect(getCanonicalQueryString('prefix=a/b')).toBe('prefix=a%2Fb');
  });
});

describe('canonical headers', () => {
  const headers = {
    Host: 'localhost:9000',
    'X-Amz-Date': '20240115T103000Z',
    'x-amz-meta-note': '  two   spaces  ',
  };

  it('should lowercase, trim and sort header lines', () => {
    expect(getCanonicalHeaders(headers)).toBe(
      'host:localhost:9000\nx-amz-date:20240115T103000Z\nx-amz-meta-note:two spaces\n'
    );
  });

  it('should list signed headers in sorted order', () => {
    expect(getSignedHeaders(headers)).toBe('host;x-amz-date;x-amz-meta-note');
  });

  it('should join headers repeated with different case', () => {
    expect(getCanonicalHeaders({ 'X-Custom': 'a', 'x-custom': 'b' })).toBe('x-custom:a,b\n');
  });
});

describe('createCanonicalRequest', () => {
  it('should join the six parts with newlines', () => {
    const request = createCanonicalRequest('get', '/bucket/key', 'a=1', { host: 'h' }, 'UNSIGNED-PAYLOAD');
    expect(request).toBe('GET\n/bucket/key\na=1\nhost:h\n\nhost\nUNSIGNED-PAYLOAD');
  });
});
