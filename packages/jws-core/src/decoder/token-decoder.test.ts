import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { TokenVerificationError, unwrapDecoded } from '../errors/token-error';
import { KeySet } from '../keys/key-set';
import { type AlgorithmName } from '../types/algorithm';
import { extractBearerToken } from './bearer';
import { inspectToken } from './inspect';
import { createTokenDecoder, decodeAndVerify } from './token-decoder';

const TOKEN =
  'eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9.' +
  'eyJzdWIiOiIxMjM0NTY3ODkwIiwibmFtZSI6IkpvaG4gRG9lIiwiYWRtaW4iOnRydWV9.' +
  'TJVA95OrM7E2cBab30RMHrHDcEfxjoYZgeFONFh7HgQ';
const UNSECURED = 'eyJhbGciOiJub25lIn0.eyJzdWIiOiIxMjM0NTY3ODkwIn0.';

const keys = KeySet.empty().withHmacSecret('secret');

function createLogger() {
  return { debug: vi.fn(), warn: vi.fn() };
}

describe('TokenDecoder', () => {
  it('should decode like decodeAndVerify', () => {
    const decoder = createTokenDecoder({ keys });

    expect(decoder.decode(TOKEN)).toEqual(decodeAndVerify(TOKEN, keys));
  });

  it('should apply a payload schema', () => {
    const decoder = createTokenDecoder({ keys });
    const result = decoder.decode(TOKEN, z.object({ sub: z.string() }));

    expect(result).toEqual({ success: true, value: { sub: '1234567890' } });
  });

  it('should accept unsecured tokens without an allow-list', () => {
    const decoder = createTokenDecoder({ keys });

    expect(decoder.decode(UNSECURED)).toEqual({ success: true, value: { sub: '1234567890' } });
  });

  it('should reject algorithms outside the allow-list', () => {
    const decoder = createTokenDecoder({ keys, algorithms: ['HS256'] });

    expect(decoder.decode(TOKEN).success).toBe(true);
    expect(decoder.decode(UNSECURED)).toEqual({
      success: false,
      error: {
        code: 'INVALID_HEADER',
        message: 'Token header is invalid',
        messages: ['alg: algorithm "none" is not allowed'],
      },
    });
  });

  it('should refuse unknown names in the allow-list', () => {
    const algorithms: AlgorithmName[] = JSON.parse('["HS256","HS1"]');

    expect(() => createTokenDecoder({ keys, algorithms })).toThrow(
      'Unknown algorithm in allow-list: HS1'
    );
  });

  it('should log verified and rejected tokens', () => {
    const logger = createLogger();
    const decoder = createTokenDecoder({ keys: KeySet.empty(), logger });

    decoder.decode(UNSECURED);
    decoder.decode(TOKEN);
    decoder.decode('wut');

    expect(logger.debug).toHaveBeenCalledWith('[JWS] Token verified');
    expect(logger.warn).toHaveBeenNthCalledWith(1, '[JWS] Token rejected', {
      code: 'NO_KEY_CONFIGURED',
      algorithm: 'HS256',
    });
    expect(logger.warn).toHaveBeenNthCalledWith(2, '[JWS] Token rejected', {
      code: 'INVALID_TOKEN_FORMAT',
    });
  });

  describe('decodeBearer', () => {
    it('should decode the token of a Bearer header', () => {
      const decoder = createTokenDecoder({ keys });

      expect(decoder.decodeBearer(`Bearer ${TOKEN}`)).toEqual(decoder.decode(TOKEN));
    });

    it('should treat a missing or malformed header as a format error', () => {
      const logger = createLogger();
      const decoder = createTokenDecoder({ keys, logger });

      for (const header of [undefined, null, '', `Basic ${TOKEN}`, TOKEN]) {
        const result = decoder.decodeBearer(header);
        expect(result.success || result.error.code).toBe('INVALID_TOKEN_FORMAT');
      }
      expect(logger.warn).toHaveBeenCalledTimes(5);
    });
  });
});

describe('extractBearerToken', () => {
  it('should extract token from valid header', () => {
    expect(extractBearerToken('Bearer eyJhbGciOiJIUzI1NiJ9.test')).toBe(
      'eyJhbGciOiJIUzI1NiJ9.test'
    );
    expect(extractBearerToken('bearer abc')).toBe('abc');
  });

  it('should return null on missing or invalid header', () => {
    expect(extractBearerToken(undefined)).toBeNull();
    expect(extractBearerToken('Basic abc123')).toBeNull();
    expect(extractBearerToken('Bearer')).toBeNull();
    expect(extractBearerToken('Bearer a b')).toBeNull();
  });
});

describe('unwrapDecoded', () => {
  it('should return the payload of a verified token', () => {
    expect(unwrapDecoded(decodeAndVerify(TOKEN, keys))).toEqual({
      sub: '1234567890',
      name: 'John Doe',
      admin: true,
    });
  });

  it('should throw TokenVerificationError with the code', () => {
    const result = decodeAndVerify(TOKEN, KeySet.empty());

    expect(() => unwrapDecoded(result)).toThrow(TokenVerificationError);
    expect(() => unwrapDecoded(result)).toThrow('No key configured for algorithm HS256');
    try {
      unwrapDecoded(result);
    } catch (error) {
      expect(error instanceof TokenVerificationError && error.code).toBe('NO_KEY_CONFIGURED');
    }
  });

  it('should include detail messages in the error message', () => {
    const result = decodeAndVerify('W10.e30.', keys);

    expect(() => unwrapDecoded(result)).toThrow(
      'Token header is invalid: Header was not a JSON object'
    );
  });
});

describe('inspectToken', () => {
  it('should decode without verifying', () => {
    const tampered = `${TOKEN.slice(0, -1)}A`;

    expect(inspectToken(tampered)).toEqual({
      success: true,
      value: {
        header: { alg: 'HS256', typ: 'JWT' },
        payload: { sub: '1234567890', name: 'John Doe', admin: true },
        signatureLength: 43,
      },
    });
  });

  it('should report undecodable tokens', () => {
    const result = inspectToken('wut');

    expect(result.success).toBe(false);
    expect(result.success || result.error.startsWith('Failed to decode token: ')).toBe(true);
  });
});
