/**
 * JWS signature verification
 */

import { constants, createHmac, timingSafeEqual, verify } from 'node:crypto';
import { decodeBase64Url } from '../codec/base64url';
import type { KeySet } from '../keys/key-set';
import type { Algorithm, HmacAlgorithm, RsaAlgorithm } from '../types/algorithm';
import {
  type DecodingError,
  incorrectSignature,
  noKeyConfigured,
} from '../types/decoding-error';
import { fail, ok, type Result } from '../types/result';

/**
 * Timing-safe byte comparison. Only the lengths, which are public, may
 * short-circuit.
 */
function secureCompare(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(a, b);
}

function verifyHmac(
  algorithm: HmacAlgorithm,
  keys: KeySet,
  signingInput: string,
  signature: string
): Result<void, DecodingError> {
  const secret = keys.hmacSecret;
  if (!secret) {
    return fail(noKeyConfigured(algorithm));
  }

  const expected = createHmac(algorithm.primitive, secret).update(signingInput, 'ascii').digest();
  const supplied = decodeBase64Url(signature);
  if (!supplied.success || !secureCompare(supplied.value, expected)) {
    return fail(incorrectSignature());
  }
  return ok(undefined);
}

function verifyRsa(
  algorithm: RsaAlgorithm,
  keys: KeySet,
  signingInput: string,
  signature: string
): Result<void, DecodingError> {
  const key = keys.publicKey;
  if (!key) {
    return fail(noKeyConfigured(algorithm));
  }

  const supplied = decodeBase64Url(signature);
  if (!supplied.success) {
    return fail(incorrectSignature());
  }

  try {
    const valid = verify(
      algorithm.primitive,
      Buffer.from(signingInput, 'ascii'),
      algorithm.padding === 'pss'
        ? {
            key,
            padding: constants.RSA_PKCS1_PSS_PADDING,
            saltLength: constants.RSA_PSS_SALTLEN_DIGEST,
          }
        : { key, padding: constants.RSA_PKCS1_PADDING },
      supplied.value
    );
    return valid ? ok(undefined) : fail(incorrectSignature());
  } catch {
    // Key unusable for this algorithm (e.g. an EC key for RS256)
    return fail(incorrectSignature());
  }
}

/**
 * Verify `signature` (base64url) over `signingInput`, which must be the
 * original `header_b64.payload_b64` text of the token.
 */
export function verifySignature(
  algorithm: Algorithm,
  keys: KeySet,
  signingInput: string,
  signature: string
): Result<void, DecodingError> {
  switch (algorithm.family) {
    case 'hmac':
      return verifyHmac(algorithm, keys, signingInput, signature);
    case 'rsa':
      return verifyRsa(algorithm, keys, signingInput, signature);
    case 'ecdsa':
      // Not implemented: reported as if no key were configured
      return fail(noKeyConfigured(algorithm));
    case 'none':
      return ok(undefined);
  }
}
