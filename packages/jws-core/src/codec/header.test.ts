import { describe, expect, it } from 'vitest';
import { ALGORITHMS } from '../types/algorithm';
import { jsonObjectSchema, jwsHeaderSchema } from './header';
import { validate } from './json';

describe('jwsHeaderSchema', () => {
  it('should split alg from the other header parameters', () => {
    const result = validate(jwsHeaderSchema, { alg: 'HS256', typ: 'JWT', kid: 'k1' });

    expect(result).toEqual({
      success: true,
      value: { algorithm: ALGORITHMS.HS256, parameters: { typ: 'JWT', kid: 'k1' } },
    });
    expect(result.success && 'alg' in result.value.parameters).toBe(false);
  });

  it('should keep nested parameters as they are', () => {
    const result = validate(jwsHeaderSchema, { alg: 'none', crit: ['exp'], jwk: { kty: 'oct' } });

    expect(result.success && result.value.parameters).toEqual({ crit: ['exp'], jwk: { kty: 'oct' } });
  });

  it.each([
    [{}, 'alg: missing'],
    [{ alg: null }, 'alg: must be a string'],
    [{ alg: 'hs256' }, 'alg: unsupported algorithm "hs256"'],
    ['HS256', 'Header was not a JSON object'],
    [null, 'Header was not a JSON object'],
  ])('should reject %j', (header, message) => {
    expect(validate(jwsHeaderSchema, header)).toEqual({ success: false, error: [message] });
  });
});

describe('jsonObjectSchema', () => {
  it('should accept any JSON object', () => {
    expect(validate(jsonObjectSchema, { a: [1, 2], b: { c: null } })).toEqual({
      success: true,
      value: { a: [1, 2], b: { c: null } },
    });
  });

  it('should reject arrays', () => {
    expect(validate(jsonObjectSchema, [])).toEqual({
      success: false,
      error: ['Payload was not a JSON object'],
    });
  });
});
