/**
 * Verification key set
 *
 * Holds at most one HMAC secret and at most one public key. Instances are
 * frozen; every `with*` call returns a new KeySet, so one instance can be
 * built at startup and shared across all verifications.
 */

import { createPublicKey, type KeyObject } from 'node:crypto';

export class KeySet {
  private static readonly EMPTY = new KeySet(undefined, undefined);

  private constructor(
    private readonly secret: Uint8Array | undefined,
    private readonly key: KeyObject | undefined
  ) {
    Object.freeze(this);
  }

  /**
   * A key set with no keys configured
   */
  static empty(): KeySet {
    return KeySet.EMPTY;
  }

  /**
   * Set the shared secret for HS256/HS384/HS512. Strings are taken as UTF-8.
   * The bytes are copied, so later changes to the caller's buffer have no effect.
   */
  withHmacSecret(secret: Uint8Array | string): KeySet {
    const bytes = typeof secret === 'string' ? Buffer.from(secret, 'utf-8') : secret;
    if (bytes.length === 0) {
      throw new Error('HMAC secret must not be empty');
    }
    return new KeySet(Uint8Array.from(bytes), this.key);
  }

  /**
   * Set the public key for RS* and PS* tokens. Accepts a KeyObject or PEM text;
   * a private key is reduced to its public half.
   */
  withPublicKey(publicKey: KeyObject | string): KeySet {
    const key =
      typeof publicKey === 'string' || publicKey.type !== 'public'
        ? createPublicKey(publicKey)
        : publicKey;
    return new KeySet(this.secret, key);
  }

  /** A copy of the HMAC secret */
  get hmacSecret(): Uint8Array | undefined {
    return this.secret && Uint8Array.from(this.secret);
  }

  get publicKey(): KeyObject | undefined {
    return this.key;
  }
}
