/**
 * Registry Client - Errors
 */

import type { ZodIssue } from 'zod';
import { AuthChallenge, ErrorCode, RegistryErrorEntry, ResponseHeaders } from '../types';

/**
 * Base class of every error thrown by the client
 */
export class RegistryClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Thrown when the client is constructed with invalid options
 */
export class ConfigurationError extends RegistryClientError {}

/**
 * Thrown when no response was received (DNS, refused connection, timeout)
 */
export class TransportError extends RegistryClientError {
  readonly code?: string;

  constructor(message: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.code = options.code;
  }
}

/**
 * A single validation failure
 */
export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Thrown when an argument or a response body fails model validation
 */
export class ValidationError extends RegistryClientError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
    super(summary ? `${message}: ${summary}` : message);
    this.issues = issues;
  }

  static fromZodIssues(message: string, issues: ZodIssue[]): ValidationError {
    return new ValidationError(
      message,
      issues.map((issue) => ({
        path: issue.path.length > 0 ? issue.path.join('.') : '<root>',
        message: issue.message,
      }))
    );
  }
}

/**
 * Thrown when a manifest's media type is missing or not recognized
 */
export class UnsupportedManifestTypeError extends ValidationError {
  readonly mediaType?: string;

  constructor(mediaType?: string) {
    super(`unsupported manifest type: ${mediaType ?? '<missing>'}`);
    this.mediaType = mediaType;
  }
}

export interface HTTPErrorInit {
  status: number;
  method: string;
  url: string;
  errors?: RegistryErrorEntry[];
  body?: string;
  headers?: ResponseHeaders;
}

/**
 * Thrown for any non-2xx registry response
 */
export class HTTPError extends RegistryClientError {
  readonly status: number;
  readonly method: string;
  readonly url: string;
  /** Parsed registry errors, empty when the body was not an error envelope */
  readonly errors: RegistryErrorEntry[];
  /** Raw body text when it could not be parsed */
  readonly body?: string;
  readonly headers: ResponseHeaders;

  constructor(init: HTTPErrorInit) {
    const errors = init.errors ?? [];
    const detail = errors.length > 0
      ? errors.map((entry) => `${entry.code}: ${entry.message}`).join(', ')
      : init.body || 'no error body';
    super(`${init.method} ${init.url} failed with status ${init.status} (${detail})`);
    this.status = init.status;
    this.method = init.method;
    this.url = init.url;
    this.errors = errors;
    this.body = init.body;
    this.headers = init.headers ?? {};
  }

  get codes(): ErrorCode[] {
    return this.errors.map((entry) => entry.code);
  }

  hasCode(code: ErrorCode): boolean {
    return this.errors.some((entry) => entry.code === code);
  }
}

export class BadRequestError extends HTTPError {}

export class UnauthorizedError extends HTTPError {
  /** Challenge from `WWW-Authenticate`, if the registry sent one */
  get challenge(): AuthChallenge | undefined {
    return this.headers.wwwAuthenticate;
  }
}

export class ForbiddenError extends HTTPError {}

export class NotFoundError extends HTTPError {}

export class MethodNotAllowedError extends HTTPError {}

export class RangeNotSatisfiableError extends HTTPError {}

export class TooManyRequestsError extends HTTPError {}

export class ServerError extends HTTPError {}

/**
 * Build the HTTPError subclass matching the response status
 */
export function createHTTPError(init: HTTPErrorInit): HTTPError {
  switch (init.status) {
    case 400:
      return new BadRequestError(init);
    case 401:
      return new UnauthorizedError(init);
    case 403:
      return new ForbiddenError(init);
    case 404:
      return new NotFoundError(init);
    case 405:
      return new MethodNotAllowedError(init);
    case 416:
      return new RangeNotSatisfiableError(init);
    case 429:
      return new TooManyRequestsError(init);
    default:
      return init.status >= 500 ? new ServerError(init) : new HTTPError(init);
  }
}
