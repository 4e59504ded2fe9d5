/**
 * Client configuration tests
 */

import {
  ClientOptions,
  ConfigurationError,
  DEFAULT_TIMEOUT,
  loadClientOptions,
  normalizeBaseURL,
  validateClientOptions,
} from '../src';

describe('normalizeBaseURL', () => {
  it('should strip trailing slashes and the API prefix', () => {
    expect(normalizeBaseURL('https://registry.test/')).toBe('https://registry.test');
    expect(normalizeBaseURL(' https://registry.test/v2/ ')).toBe('https://registry.test');
    expect(normalizeBaseURL('http://localhost:5000/mirror')).toBe('http://localhost:5000/mirror');
  });
});

describe('validateClientOptions', () => {
  it('should apply defaults', () => {
    expect(validateClientOptions({ baseURL: 'https://registry.test' })).toEqual({
      baseURL: 'https://registry.test',
      timeout: DEFAULT_TIMEOUT,
      insecure: false,
    });
  });

  it('should keep credentials', () => {
    expect(
      validateClientOptions({ baseURL: 'http://localhost:5000', username: 'test-user', password: 'test-secret' })
    ).toEqual({
      baseURL: 'http://localhost:5000',
      timeout: DEFAULT_TIMEOUT,
      insecure: false,
      username: 'test-user',
      password: 'test-secret',
    });
  });

  const invalid: [string, ClientOptions, string][] = [
    ['a missing baseURL', { baseURL: '' }, 'baseURL is required'],
    ['a relative baseURL', { baseURL: '/v2' }, 'invalid baseURL "/v2"'],
    ['a non-http scheme', { baseURL: 'ftp://registry.test' }, 'baseURL must use http or https, got "ftp:"'],
    [
      'a username without password',
      { baseURL: 'https://registry.test', username: 'test-user' },
      'username and password must be given together',
    ],
    [
      'an empty password',
      { baseURL: 'https://registry.test', username: 'test-user', password: '' },
      'username and password cannot be empty',
    ],
    ['an empty token', { baseURL: 'https://registry.test', token: '' }, 'token cannot be empty'],
    [
      'a zero timeout',
      { baseURL: 'https://registry.test', timeout: 0 },
      'timeout must be a positive integer, got 0',
    ],
  ];

  it.each(invalid)('should reject %s', (_label, options, message) => {
    expect(() => validateClientOptions(options)).toThrow(new ConfigurationError(message));
  });
});

describe('loadClientOptions', () => {
  it('should read the registry environment', () => {
    const options = loadClientOptions({
      REGISTRY_URL: 'https://registry.test',
      REGISTRY_TOKEN: 'test-token',
      REGISTRY_TIMEOUT: '5000',
      REGISTRY_INSECURE: 'true',
    });

    expect(options).toEqual({
      baseURL: 'https://registry.test',
      token: 'test-token',
      timeout: 5000,
      insecure: true,
    });
  });

  it('should read basic credentials', () => {
    const options = loadClientOptions({
      REGISTRY_URL: 'http://localhost:5000',
      REGISTRY_USERNAME: 'test-user',
      REGISTRY_PASSWORD: 'test-secret',
    });

    expect(options).toEqual({
      baseURL: 'http://localhost:5000',
      username: 'test-user',
      password: 'test-secret',
      insecure: false,
    });
  });

  it('should require REGISTRY_URL', () => {
    expect(() => loadClientOptions({})).toThrow('REGISTRY_URL is not set');
  });

  it('should reject a malformed timeout', () => {
    expect(() => loadClientOptions({ REGISTRY_URL: 'https://registry.test', REGISTRY_TIMEOUT: 'soon' })).toThrow(
      ConfigurationError
    );
  });
});
