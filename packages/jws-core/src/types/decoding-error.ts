import type { Algorithm } from './algorithm';

/**
 * Decoding error codes, in pipeline order
 */
export type DecodingErrorCode =
  | 'INVALID_TOKEN_FORMAT'
  | 'INVALID_HEADER'
  | 'INVALID_PAYLOAD'
  | 'NO_KEY_CONFIGURED'
  | 'INCORRECT_SIGNATURE';

export type DecodingError =
  | { readonly code: 'INVALID_TOKEN_FORMAT'; readonly message: string }
  | { readonly code: 'INVALID_HEADER'; readonly message: string; readonly messages: readonly string[] }
  | { readonly code: 'INVALID_PAYLOAD'; readonly message: string; readonly messages: readonly string[] }
  | { readonly code: 'NO_KEY_CONFIGURED'; readonly message: string; readonly algorithm: Algorithm }
  | { readonly code: 'INCORRECT_SIGNATURE'; readonly message: string };

export function invalidTokenFormat(): DecodingError {
  return {
    code: 'INVALID_TOKEN_FORMAT',
    message: 'Token is not in the header.payload.signature format',
  };
}

export function invalidHeader(messages: readonly string[]): DecodingError {
  return { code: 'INVALID_HEADER', message: 'Token header is invalid', messages };
}

export function invalidPayload(messages: readonly string[]): DecodingError {
  return { code: 'INVALID_PAYLOAD', message: 'Token payload is invalid', messages };
}

export function noKeyConfigured(algorithm: Algorithm): DecodingError {
  return {
    code: 'NO_KEY_CONFIGURED',
    message: `No key configured for algorithm ${algorithm.name}`,
    algorithm,
  };
}

export function incorrectSignature(): DecodingError {
  return { code: 'INCORRECT_SIGNATURE', message: 'Token signature does not match' };
}

/**
 * One-line description including any detail messages, for logs and CLI output
 */
export function describeDecodingError(error: DecodingError): string {
  switch (error.code) {
    case 'INVALID_HEADER':
    case 'INVALID_PAYLOAD':
      return error.messages.length > 0
        ? `${error.message}: ${error.messages.join('; ')}`
        : error.message;
    default:
      return error.message;
  }
}
