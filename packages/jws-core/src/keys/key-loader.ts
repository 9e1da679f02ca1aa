/**
 * Public key loading
 *
 * Runs once at startup, outside the verification pipeline. Failures are
 * reported as KeyLoadError, not as decoding errors.
 *
 * To create a key pair in the expected format:
 *
 *   openssl genrsa -out private.pem 2048
 *   openssl rsa -in private.pem -pubout > public.pem
 */

import { createPublicKey, type JsonWebKey, type KeyObject } from 'node:crypto';
import * as fs from 'node:fs/promises';
import { fail, ok, type Result } from '../types/result';

export type KeyLoadErrorCode = 'KEY_NOT_FOUND' | 'INVALID_KEY';

export interface KeyLoadError {
  readonly code: KeyLoadErrorCode;
  readonly message: string;
  /** File the key was read from, when there was one */
  readonly path?: string;
}

const RSA_KEY_TYPES = ['rsa', 'rsa-pss'];

function requireRsa(key: KeyObject): Result<KeyObject, KeyLoadError> {
  if (!key.asymmetricKeyType || !RSA_KEY_TYPES.includes(key.asymmetricKeyType)) {
    return fail({
      code: 'INVALID_KEY',
      message: `Expected an RSA key, got ${key.asymmetricKeyType ?? 'unknown'}`,
    });
  }
  return ok(key);
}

/**
 * Parse an RSA public key from PEM text (SPKI or PKCS#1). A private key PEM
 * yields its public half.
 */
export function parsePublicKeyPem(pem: string): Result<KeyObject, KeyLoadError> {
  try {
    return requireRsa(createPublicKey({ key: pem, format: 'pem' }));
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    return fail({ code: 'INVALID_KEY', message: `Failed to parse PEM key: ${message}` });
  }
}

/**
 * Parse an RSA public key from a JWK, as served by a JWKS endpoint
 */
export function parsePublicJwk(jwk: JsonWebKey): Result<KeyObject, KeyLoadError> {
  try {
    return requireRsa(createPublicKey({ key: jwk, format: 'jwk' }));
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    return fail({ code: 'INVALID_KEY', message: `Failed to parse JWK: ${message}` });
  }
}

/**
 * Load an RSA public key from a PEM file
 */
export async function loadPublicKeyFromPemFile(
  path: string
): Promise<Result<KeyObject, KeyLoadError>> {
  let pem: string;
  try {
    pem = await fs.readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return fail({ code: 'KEY_NOT_FOUND', message: `Key file not found: ${path}`, path });
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    return fail({ code: 'INVALID_KEY', message: `Failed to read key file: ${message}`, path });
  }

  const parsed = parsePublicKeyPem(pem);
  return parsed.success ? parsed : fail({ ...parsed.error, path });
}
