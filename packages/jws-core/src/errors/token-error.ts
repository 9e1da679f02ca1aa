import type { DecodingError, DecodingErrorCode } from '../types/decoding-error';
import { describeDecodingError } from '../types/decoding-error';
import type { Result } from '../types/result';

/**
 * Token verification error, for callers that prefer exceptions over results
 */
export class TokenVerificationError extends Error {
  public readonly code: DecodingErrorCode;

  constructor(public readonly reason: DecodingError) {
    super(describeDecodingError(reason));
    this.name = 'TokenVerificationError';
    this.code = reason.code;
  }
}

/**
 * Return the decoded payload or throw TokenVerificationError
 */
export function unwrapDecoded<T>(result: Result<T, DecodingError>): T {
  if (!result.success) {
    throw new TokenVerificationError(result.error);
  }
  return result.value;
}
