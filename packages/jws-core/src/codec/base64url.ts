/**
 * Base64url codec for token segments
 *
 * Accepts both the url-safe and the standard alphabet, padded or not.
 * Anything else, including set bits past the last byte, is rejected instead
 * of being skipped the way Buffer does.
 */

import { fail, ok, type Result } from '../types/result';

const BASE64_PATTERN = /^[A-Za-z0-9\-_+/]*={0,2}$/;
const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/';

// Bits of the last character that fall outside the decoded bytes, by length mod 4
const UNUSED_BITS_MASK = [0, 0, 0x0f, 0x03];

export function decodeBase64Url(input: string): Result<Uint8Array, string> {
  if (!BASE64_PATTERN.test(input)) {
    return fail('Segment contains characters outside the base64url alphabet');
  }

  const unpadded = input.replace(/=+$/, '');
  if (unpadded.length % 4 === 1) {
    return fail('Segment has an impossible base64 length');
  }
  if (unpadded.length !== input.length && input.length % 4 !== 0) {
    return fail('Segment has incorrect base64 padding');
  }

  const base64 = unpadded.replace(/-/g, '+').replace(/_/g, '/');
  const lastValue = ALPHABET.indexOf(base64.charAt(base64.length - 1));
  if ((lastValue & UNUSED_BITS_MASK[base64.length % 4]) !== 0) {
    return fail('Segment has non-canonical trailing bits');
  }

  return ok(new Uint8Array(Buffer.from(base64, 'base64')));
}

export function encodeBase64Url(input: string | Uint8Array): string {
  return Buffer.from(input).toString('base64url');
}
