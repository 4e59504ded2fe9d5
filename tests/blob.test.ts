import {
  BlobMediaTypes,
  ValidationError,
  descriptorFromHeaders,
  isValidDigest,
  parseBlobDescriptor,
} from '../src';

const DIGEST = `sha256:${'4'.repeat(64)}`;

describe('isValidDigest', () => {
  test.each(['sha256:abc123', `sha512:${'0f'.repeat(64)}`, 'multihash+base58:deadbeef', 'sha256.v2:00'])(
    'should accept %s',
    (value) => {
      expect(isValidDigest(value)).toBe(true);
    }
  );

  test.each(['sha256:ABC123', 'sha256', ':abc', 'sha256:', 'SHA256:abc', 'sha256:xyz', 'sha256:abc\n'])(
    'should reject %j',
    (value) => {
      expect(isValidDigest(value)).toBe(false);
    }
  );
});

describe('parseBlobDescriptor', () => {
  test('should parse a descriptor', () => {
    const raw = { mediaType: BlobMediaTypes.OCI_LAYER, digest: DIGEST, size: 1024, urls: ['https://mirror.test/blob'] };

    expect(parseBlobDescriptor(raw)).toEqual(raw);
  });

  test('should accept a zero size', () => {
    expect(parseBlobDescriptor({ mediaType: BlobMediaTypes.OCI_EMPTY, digest: DIGEST, size: 0 }).size).toBe(0);
  });

  test('should reject a negative size', () => {
    expect(() => parseBlobDescriptor({ mediaType: BlobMediaTypes.OCI_LAYER, digest: DIGEST, size: -5 })).toThrow(
      ValidationError
    );
  });

  test('should reject a fractional size', () => {
    expect(() => parseBlobDescriptor({ mediaType: BlobMediaTypes.OCI_LAYER, digest: DIGEST, size: 1.5 })).toThrow(
      ValidationError
    );
  });

  test('should report every missing field', () => {
    let thrown: unknown;
    try {
      parseBlobDescriptor({});
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ValidationError);
    if (!(thrown instanceof ValidationError)) return;
    expect(thrown.issues.map((issue) => issue.path)).toEqual(['mediaType', 'digest', 'size']);
  });
});

describe('descriptorFromHeaders', () => {
  test('should strip Content-Type parameters', () => {
    const descriptor = descriptorFromHeaders({
      contentType: 'application/vnd.oci.image.manifest.v1+json; charset=utf-8',
      dockerContentDigest: DIGEST,
      contentLength: 733,
    });

    expect(descriptor).toEqual({ mediaType: 'application/vnd.oci.image.manifest.v1+json', digest: DIGEST, size: 733 });
  });

  test('should fall back to the requested digest', () => {
    const descriptor = descriptorFromHeaders({ contentLength: 12 }, DIGEST);

    expect(descriptor).toEqual({ mediaType: 'application/octet-stream', digest: DIGEST, size: 12 });
  });

  test('should not fall back to a tag', () => {
    expect(() => descriptorFromHeaders({ contentLength: 12 }, 'latest')).toThrow(ValidationError);
  });

  test('should require a Content-Length', () => {
    expect(() => descriptorFromHeaders({ dockerContentDigest: DIGEST })).toThrow(
      'invalid blob descriptor: size: Required'
    );
  });
});
