import { baseMediaType, parseAuthChallenge, parseLinkHeader, parseRange, parseResponseHeaders } from '../src';

const DIGEST = `sha256:${'7'.repeat(64)}`;

describe('parseLinkHeader', () => {
  it('should parse a next link', () => {
    expect(parseLinkHeader('</v2/myrepo/tags/list?n=50&last=v1.9>; rel="next"')).toEqual({
      url: '/v2/myrepo/tags/list?n=50&last=v1.9',
      n: 50,
      last: 'v1.9',
    });
  });

  it('should pick rel="next" among several links', () => {
    const value = '</v2/_catalog?last=a>; rel="prev", <https://registry.test/v2/_catalog?last=m&n=10>; rel="next"';

    expect(parseLinkHeader(value)).toEqual({ url: 'https://registry.test/v2/_catalog?last=m&n=10', n: 10, last: 'm' });
  });

  it('should leave out a missing cursor', () => {
    expect(parseLinkHeader('</v2/_catalog>; rel="next"')).toEqual({ url: '/v2/_catalog' });
  });

  it('should return undefined for empty or malformed values', () => {
    expect(parseLinkHeader(undefined)).toBeUndefined();
    expect(parseLinkHeader('')).toBeUndefined();
    expect(parseLinkHeader('rel="next"')).toBeUndefined();
  });
});

describe('parseRange', () => {
  it.each([
    ['bytes=0-1023', { unit: 'bytes', start: 0, end: 1023 }],
    ['0-1023', { unit: 'bytes', start: 0, end: 1023 }],
    ['bytes 100-199/4096', { unit: 'bytes', start: 100, end: 199 }],
  ])('should parse %s', (value, expected) => {
    expect(parseRange(value)).toEqual(expected);
  });

  it('should return undefined for other values', () => {
    expect(parseRange('items=1-2')).toBeUndefined();
    expect(parseRange(undefined)).toBeUndefined();
  });
});

describe('parseAuthChallenge', () => {
  it('should parse a bearer challenge', () => {
    const value =
      'Bearer realm="https://auth.registry.test/token",service="registry.test",scope="repository:myrepo:pull"';

    expect(parseAuthChallenge(value)).toEqual({
      scheme: 'Bearer',
      params: { realm: 'https://auth.registry.test/token', service: 'registry.test', scope: 'repository:myrepo:pull' },
    });
  });

  it('should parse a basic challenge', () => {
    expect(parseAuthChallenge('Basic realm="Registry Realm"')).toEqual({
      scheme: 'Basic',
      params: { realm: 'Registry Realm' },
    });
  });

  it('should lowercase parameter names and unescape quotes', () => {
    expect(parseAuthChallenge('Bearer Realm="say \\"hi\\"", error=invalid_token')).toEqual({
      scheme: 'Bearer',
      params: { realm: 'say "hi"', error: 'invalid_token' },
    });
  });

  it('should accept a bare scheme', () => {
    expect(parseAuthChallenge('Basic')).toEqual({ scheme: 'Basic', params: {} });
    expect(parseAuthChallenge('  ')).toBeUndefined();
  });
});

describe('baseMediaType', () => {
  it('should drop parameters and lowercase', () => {
    expect(baseMediaType('Application/JSON; charset=utf-8')).toBe('application/json');
    expect(baseMediaType('')).toBeUndefined();
    expect(baseMediaType(undefined)).toBeUndefined();
  });
});

describe('parseResponseHeaders', () => {
  it('should read headers case-insensitively', () => {
    const headers = parseResponseHeaders({
      'Content-Type': 'application/vnd.docker.distribution.manifest.v2+json',
      'CONTENT-LENGTH': '528',
      'Docker-Content-Digest': DIGEST,
      'docker-distribution-api-version': 'registry/2.0',
      'Docker-Upload-UUID': 'test-upload',
      ETag: `"${DIGEST}"`,
      Location: '/v2/myrepo/blobs/uploads/test-upload',
      Range: '0-99',
      'Accept-Ranges': 'bytes',
      Date: 'Mon, 01 Jan 2024 00:00:00 GMT',
    });

    expect(headers).toEqual({
      contentType: 'application/vnd.docker.distribution.manifest.v2+json',
      contentLength: 528,
      dockerContentDigest: DIGEST,
      dockerDistributionApiVersion: 'registry/2.0',
      dockerUploadUuid: 'test-upload',
      etag: `"${DIGEST}"`,
      location: '/v2/myrepo/blobs/uploads/test-upload',
      range: { unit: 'bytes', start: 0, end: 99 },
      acceptRanges: 'bytes',
      date: new Date('2024-01-01T00:00:00Z'),
    });
  });

  it('should leave out unparseable values', () => {
    const headers = parseResponseHeaders({
      'content-length': 'many',
      'docker-content-digest': 'not-a-digest',
      date: 'yesterday',
    });

    expect(headers.contentLength).toBeUndefined();
    expect(headers.dockerContentDigest).toBeUndefined();
    expect(headers.date).toBeUndefined();
  });

  it('should join repeated headers', () => {
    const headers = parseResponseHeaders({
      link: ['</v2/_catalog?last=a>; rel="prev"', '</v2/_catalog?last=b&n=1>; rel="next"'],
    });

    expect(headers.link).toEqual({ url: '/v2/_catalog?last=b&n=1', n: 1, last: 'b' });
  });
});
