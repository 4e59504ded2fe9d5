/**
 * Registry error bodies: `{"errors":[{"code":..,"message":..,"detail":..}]}`.
 *
 * Entries are read leniently. A missing or unrecognized code becomes UNKNOWN
 * and a missing message becomes an empty string; only a body without an
 * `errors` array of objects is rejected.
 */

import { z } from 'zod';
import { ErrorCode, ErrorCodes, ErrorResponse, RegistryErrorEntry } from '../types';
import { ValidationError } from '../errors';
import { parseWith } from './parse';

const errorEnvelopeSchema = z.object({
  errors: z.array(z.record(z.unknown())),
});

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCodes));

function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && KNOWN_CODES.has(value);
}

function toErrorEntry(entry: Record<string, unknown>): RegistryErrorEntry {
  const code = isErrorCode(entry.code) ? entry.code : ErrorCodes.UNKNOWN;
  const message = typeof entry.message === 'string' ? entry.message : '';
  return entry.detail === undefined ? { code, message } : { code, message, detail: entry.detail };
}

export function parseErrorResponse(raw: unknown): ErrorResponse {
  const envelope = parseWith(errorEnvelopeSchema, raw, 'invalid registry error body');
  return { errors: envelope.errors.map(toErrorEntry) };
}

/**
 * Like parseErrorResponse, but undefined instead of throwing
 */
export function tryParseErrorResponse(raw: unknown): ErrorResponse | undefined {
  try {
    return parseErrorResponse(raw);
  } catch (error) {
    if (error instanceof ValidationError) {
      return undefined;
    }
    throw error;
  }
}
