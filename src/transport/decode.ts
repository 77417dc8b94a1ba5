/**
 * Caller-side decoding of response bodies. Transports return raw text;
 * callers decode it here into checked values.
 */

import { err, ok } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';
import { SerializationError, type ClientResult } from '../errors/index.js';

/**
 * Parses `body` as JSON and validates it against `schema`.
 */
export function parseJsonBody<T>(body: string, schema: ZodType<T, ZodTypeDef, unknown>): ClientResult<T> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new SerializationError(`Response is not valid JSON: ${reason}`, error));
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return err(new SerializationError(`Response does not match the expected shape: ${issues}`, parsed.error));
  }
  return ok(parsed.data);
}
