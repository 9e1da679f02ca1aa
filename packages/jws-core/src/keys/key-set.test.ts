import { generateKeyPairSync } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { KeySet } from './key-set';

describe('KeySet', () => {
  it('should start with no keys', () => {
    const keys = KeySet.empty();
    expect(keys.hmacSecret).toBeUndefined();
    expect(keys.publicKey).toBeUndefined();
    expect(Object.isFrozen(keys)).toBe(true);
  });

  it('should return a new key set on each with call', () => {
    const empty = KeySet.empty();
    const withSecret = empty.withHmacSecret('test-secret');

    expect(withSecret).not.toBe(empty);
    expect(empty.hmacSecret).toBeUndefined();
    expect(Buffer.from(withSecret.hmacSecret ?? []).toString('utf-8')).toBe('test-secret');
  });

  it('should copy the secret bytes', () => {
    const secret = Buffer.from('test-secret', 'utf-8');
    const keys = KeySet.empty().withHmacSecret(secret);

    secret.fill(0);

    expect(Buffer.from(keys.hmacSecret ?? []).toString('utf-8')).toBe('test-secret');
  });

  it('should reject an empty secret', () => {
    expect(() => KeySet.empty().withHmacSecret('')).toThrow('HMAC secret must not be empty');
  });

  it('should keep both key slots independent', () => {
    const { publicKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });
    const keys = KeySet.empty().withHmacSecret('test-secret').withPublicKey(publicKey);

    expect(keys.publicKey).toBe(publicKey);
    expect(keys.hmacSecret).toBeDefined();
  });

  it('should derive the public key from a private key or PEM text', () => {
    const { publicKey, privateKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });
    const pem = publicKey.export({ type: 'spki', format: 'pem' }).toString();

    const fromPrivate = KeySet.empty().withPublicKey(privateKey).publicKey;
    const fromPem = KeySet.empty().withPublicKey(pem).publicKey;

    expect(fromPrivate?.type).toBe('public');
    expect(fromPrivate?.equals(publicKey)).toBe(true);
    expect(fromPem?.equals(publicKey)).toBe(true);
  });
});
