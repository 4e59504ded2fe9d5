import { ValidationError, parseCatalog, parseTags } from '../src';

describe('parseCatalog', () => {
  test('should keep repository order', () => {
    expect(parseCatalog({ repositories: ['zeta', 'alpha', 'team/app'] })).toEqual({
      repositories: ['zeta', 'alpha', 'team/app'],
    });
  });

  test('should treat a null list as empty', () => {
    expect(parseCatalog({ repositories: null })).toEqual({ repositories: [] });
    expect(parseCatalog({})).toEqual({ repositories: [] });
  });

  test('should attach the next page', () => {
    const next = { url: '/v2/_catalog?n=1&last=alpha', n: 1, last: 'alpha' };

    expect(parseCatalog({ repositories: ['alpha'] }, next)).toEqual({ repositories: ['alpha'], next });
  });

  test('should reject a malformed body', () => {
    expect(() => parseCatalog({ repositories: [1, 2] })).toThrow(ValidationError);
    expect(() => parseCatalog('alpha')).toThrow('invalid catalog response');
  });
});

describe('parseTags', () => {
  test('should parse tags', () => {
    expect(parseTags({ name: 'myrepo', tags: ['a', 'b'] })).toEqual({ name: 'myrepo', tags: ['a', 'b'] });
  });

  test('should treat null tags as empty', () => {
    expect(parseTags({ name: 'myrepo', tags: null })).toEqual({ name: 'myrepo', tags: [] });
  });

  test('should require a name', () => {
    expect(() => parseTags({ tags: ['a'] })).toThrow('invalid tags response: name: Required');
  });
});
