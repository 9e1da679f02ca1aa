/**
 * @jwscheck/core - JWS decoding and signature verification
 */

export { decodeBase64Url, encodeBase64Url } from './codec/base64url';
export { type JsonObject, type JwsHeader, jsonObjectSchema, jwsHeaderSchema } from './codec/header';
export { type PayloadSchema, parseJson, validate } from './codec/json';
export { verifySignature } from './crypto/signature-verifier';
export { extractBearerToken } from './decoder/bearer';
export { type InspectedToken, inspectToken } from './decoder/inspect';
export {
  createTokenDecoder,
  type DecodeResult,
  decodeAndVerify,
  TokenDecoder,
  type TokenDecoderOptions,
  type TokenLogger,
} from './decoder/token-decoder';
export { TokenVerificationError, unwrapDecoded } from './errors/token-error';
export {
  type KeyLoadError,
  type KeyLoadErrorCode,
  loadPublicKeyFromPemFile,
  parsePublicJwk,
  parsePublicKeyPem,
} from './keys/key-loader';
export { KeySet } from './keys/key-set';
export {
  ALGORITHMS,
  type Algorithm,
  type AlgorithmFamily,
  type AlgorithmName,
  type EcdsaAlgorithm,
  type HmacAlgorithm,
  isAlgorithmName,
  isVerifiable,
  listAlgorithms,
  parseAlgorithm,
  type RsaAlgorithm,
  type UnsecuredAlgorithm,
} from './types/algorithm';
export {
  type DecodingError,
  type DecodingErrorCode,
  describeDecodingError,
  incorrectSignature,
  invalidHeader,
  invalidPayload,
  invalidTokenFormat,
  noKeyConfigured,
} from './types/decoding-error';
export { fail, ok, type Result } from './types/result';
