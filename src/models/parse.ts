import { z } from 'zod';
import { ValidationError } from '../errors';

/**
 * Run a schema and turn its failure into a ValidationError
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown, message: string): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw ValidationError.fromZodIssues(message, result.error.issues);
  }
  return result.data;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
