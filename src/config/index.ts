/**
 * Client configuration: option validation and environment loading
 */

import { ClientOptions } from '../types';
import { ConfigurationError } from '../errors';

export const DEFAULT_TIMEOUT = 30000;

/**
 * Options after validation, with defaults applied
 */
export interface ResolvedClientOptions {
  baseURL: string;
  timeout: number;
  insecure: boolean;
  username?: string;
  password?: string;
  token?: string;
}

/**
 * Strip trailing slashes and a trailing `/v2` so paths can be appended as
 * `/v2/...`
 */
export function normalizeBaseURL(baseURL: string): string {
  return baseURL.trim().replace(/\/+$/, '').replace(/\/v2$/, '');
}

export function validateClientOptions(options: ClientOptions): ResolvedClientOptions {
  if (!options.baseURL) {
    throw new ConfigurationError('baseURL is required');
  }

  const baseURL = normalizeBaseURL(options.baseURL);
  let url: URL;
  try {
    url = new URL(baseURL);
  } catch (error) {
    throw new ConfigurationError(`invalid baseURL "${options.baseURL}"`, { cause: error });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`baseURL must use http or https, got "${url.protocol}"`);
  }

  const { username, password, token } = options;
  if ((username === undefined) !== (password === undefined)) {
    throw new ConfigurationError('username and password must be given together');
  }
  if (username !== undefined && (!username || !password)) {
    throw new ConfigurationError('username and password cannot be empty');
  }
  if (token !== undefined && !token) {
    throw new ConfigurationError('token cannot be empty');
  }
  if (token !== undefined && username !== undefined) {
    throw new ConfigurationError('use either basic credentials or a bearer token, not both');
  }

  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ConfigurationError(`timeout must be a positive integer, got ${timeout}`);
  }

  return {
    baseURL,
    timeout,
    insecure: options.insecure ?? false,
    ...(username !== undefined ? { username, password } : {}),
    ...(token !== undefined ? { token } : {}),
  };
}

/**
 * Authorization header for the configured credentials
 */
export function buildAuthHeaders(options: ResolvedClientOptions): Record<string, string> {
  if (options.token) {
    return { Authorization: `Bearer ${options.token}` };
  }
  if (options.username && options.password) {
    const basic = Buffer.from(`${options.username}:${options.password}`, 'utf8').toString('base64');
    return { Authorization: `Basic ${basic}` };
  }
  return {};
}

function parseBoolean(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

/**
 * Read client options from the environment
 */
export function loadClientOptions(env: NodeJS.ProcessEnv = process.env): ClientOptions {
  const baseURL = env.REGISTRY_URL;
  if (!baseURL) {
    throw new ConfigurationError('REGISTRY_URL is not set');
  }

  let timeout: number | undefined;
  if (env.REGISTRY_TIMEOUT) {
    timeout = Number(env.REGISTRY_TIMEOUT);
    if (!Number.isInteger(timeout) || timeout <= 0) {
      throw new ConfigurationError(`REGISTRY_TIMEOUT must be a positive integer, got "${env.REGISTRY_TIMEOUT}"`);
    }
  }

  return {
    baseURL,
    ...(env.REGISTRY_USERNAME ? { username: env.REGISTRY_USERNAME } : {}),
    ...(env.REGISTRY_PASSWORD ? { password: env.REGISTRY_PASSWORD } : {}),
    ...(env.REGISTRY_TOKEN ? { token: env.REGISTRY_TOKEN } : {}),
    ...(timeout !== undefined ? { timeout } : {}),
    insecure: parseBoolean(env.REGISTRY_INSECURE),
  };
}
