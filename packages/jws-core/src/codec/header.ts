/**
 * JOSE header schema
 */

import { z } from 'zod';
import { type Algorithm, parseAlgorithm } from '../types/algorithm';
import type { PayloadSchema } from './json';

/**
 * Decoded JOSE header. `parameters` holds every field except `alg`, uninterpreted.
 */
export interface JwsHeader {
  readonly algorithm: Algorithm;
  readonly parameters: Readonly<Record<string, unknown>>;
}

const algorithmSchema = z
  .string({
    required_error: 'missing',
    invalid_type_error: 'must be a string',
  })
  .transform((name, ctx) => {
    const algorithm = parseAlgorithm(name);
    if (!algorithm) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unsupported algorithm "${name}"` });
      return z.NEVER;
    }
    return algorithm;
  });

export const jwsHeaderSchema: PayloadSchema<JwsHeader> = z
  .object({ alg: algorithmSchema }, { invalid_type_error: 'Header was not a JSON object' })
  .passthrough()
  .transform(({ alg, ...parameters }) => ({ algorithm: alg, parameters }));

/**
 * Default payload schema: any JSON object
 */
export const jsonObjectSchema = z.record(z.string(), z.unknown(), {
  invalid_type_error: 'Payload was not a JSON object',
});

export type JsonObject = z.infer<typeof jsonObjectSchema>;
