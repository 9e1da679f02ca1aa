/**
 * JSON parsing and schema validation for decoded segments
 */

import type { z } from 'zod';
import { fail, ok, type Result } from '../types/result';

/**
 * A zod schema producing `T` from any parsed JSON value
 */
export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Parse raw segment bytes as UTF-8 JSON
 */
export function parseJson(bytes: Uint8Array): Result<unknown, string> {
  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch {
    return fail('Segment is not valid UTF-8');
  }

  try {
    return ok(JSON.parse(text));
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    return fail(`Segment is not valid JSON: ${message}`);
  }
}

/**
 * Validate a parsed value, yielding one message per violated rule
 */
export function validate<T>(schema: PayloadSchema<T>, value: unknown): Result<T, string[]> {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return ok(parsed.data);
  }

  return fail(
    parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
  );
}
