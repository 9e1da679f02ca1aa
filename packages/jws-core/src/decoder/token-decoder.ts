/**
 * Token decoder
 *
 * split -> header -> payload -> signature, each stage returning its error
 * immediately. Nothing in the pipeline throws.
 */

import { decodeBase64Url } from '../codec/base64url';
import { type JsonObject, type JwsHeader, jsonObjectSchema, jwsHeaderSchema } from '../codec/header';
import { type PayloadSchema, parseJson, validate } from '../codec/json';
import { verifySignature } from '../crypto/signature-verifier';
import type { KeySet } from '../keys/key-set';
import { type AlgorithmName, isAlgorithmName } from '../types/algorithm';
import {
  type DecodingError,
  invalidHeader,
  invalidPayload,
  invalidTokenFormat,
} from '../types/decoding-error';
import { fail, ok, type Result } from '../types/result';
import { extractBearerToken } from './bearer';

export type DecodeResult<T> = Result<T, DecodingError>;

/**
 * Sink for decoder logs; `console` fits
 */
export interface TokenLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
}

export interface TokenDecoderOptions {
  /** Verification keys */
  keys: KeySet;
  /** Accepted `alg` values; every recognized algorithm when omitted */
  algorithms?: readonly AlgorithmName[];
  /** Receives one entry per decoded token */
  logger?: TokenLogger;
}

interface EncodedToken {
  header: string;
  payload: string;
  signature: string;
}

function splitOnDots(token: string): DecodeResult<EncodedToken> {
  const parts = token.split('.');
  if (parts.length !== 3) {
    return fail(invalidTokenFormat());
  }
  const [header, payload, signature] = parts;
  return ok({ header, payload, signature });
}

function decodeSegment<T>(segment: string, schema: PayloadSchema<T>): Result<T, string[]> {
  const bytes = decodeBase64Url(segment);
  if (!bytes.success) {
    return fail([bytes.error]);
  }

  const json = parseJson(bytes.value);
  if (!json.success) {
    return fail([json.error]);
  }

  return validate(schema, json.value);
}

function decodeHeader(segment: string): DecodeResult<JwsHeader> {
  const header = decodeSegment(segment, jwsHeaderSchema);
  return header.success ? header : fail(invalidHeader(header.error));
}

function decodePayload<T>(segment: string, schema: PayloadSchema<T>): DecodeResult<T> {
  const payload = decodeSegment(segment, schema);
  return payload.success ? payload : fail(invalidPayload(payload.error));
}

function runPipeline<T>(
  token: string,
  keys: KeySet,
  schema: PayloadSchema<T>,
  algorithms?: readonly AlgorithmName[]
): DecodeResult<T> {
  const encoded = splitOnDots(token);
  if (!encoded.success) {
    return encoded;
  }

  const header = decodeHeader(encoded.value.header);
  if (!header.success) {
    return header;
  }

  const { algorithm } = header.value;
  if (algorithms && !algorithms.includes(algorithm.name)) {
    return fail(invalidHeader([`alg: algorithm "${algorithm.name}" is not allowed`]));
  }

  const payload = decodePayload(encoded.value.payload, schema);
  if (!payload.success) {
    return payload;
  }

  const verified = verifySignature(
    algorithm,
    keys,
    `${encoded.value.header}.${encoded.value.payload}`,
    encoded.value.signature
  );
  if (!verified.success) {
    return verified;
  }

  // Claims (exp, iss, aud, ...) are left to the caller
  return payload;
}

/**
 * Decode a JWS in compact serialization and verify its signature
 *
 * Without a schema the payload is returned as a plain JSON object. With a
 * zod schema it is validated and returned as the schema's output type.
 *
 * Every recognized algorithm is accepted, `none` included. Use
 * createTokenDecoder with `algorithms` to restrict them.
 */
export function decodeAndVerify(token: string, keys: KeySet): DecodeResult<JsonObject>;
export function decodeAndVerify<T>(
  token: string,
  keys: KeySet,
  schema: PayloadSchema<T>
): DecodeResult<T>;
export function decodeAndVerify<T>(
  token: string,
  keys: KeySet,
  schema?: PayloadSchema<T>
): DecodeResult<T | JsonObject> {
  return schema ? runPipeline(token, keys, schema) : runPipeline(token, keys, jsonObjectSchema);
}

/**
 * Decoder bound to a key set and verification policy
 */
export class TokenDecoder {
  private readonly keys: KeySet;
  private readonly algorithms?: readonly AlgorithmName[];
  private readonly logger?: TokenLogger;

  constructor(options: TokenDecoderOptions) {
    for (const name of options.algorithms ?? []) {
      if (!isAlgorithmName(name)) {
        throw new Error(`Unknown algorithm in allow-list: ${String(name)}`);
      }
    }

    this.keys = options.keys;
    this.algorithms = options.algorithms ? [...options.algorithms] : undefined;
    this.logger = options.logger;
  }

  decode(token: string): DecodeResult<JsonObject>;
  decode<T>(token: string, schema: PayloadSchema<T>): DecodeResult<T>;
  decode<T>(token: string, schema?: PayloadSchema<T>): DecodeResult<T | JsonObject> {
    const result = schema
      ? runPipeline(token, this.keys, schema, this.algorithms)
      : runPipeline(token, this.keys, jsonObjectSchema, this.algorithms);
    this.log(result);
    return result;
  }

  /**
   * Decode the token of an `Authorization: Bearer <token>` header. A missing
   * or malformed header is reported as INVALID_TOKEN_FORMAT.
   */
  decodeBearer(authorizationHeader: string | null | undefined): DecodeResult<JsonObject>;
  decodeBearer<T>(
    authorizationHeader: string | null | undefined,
    schema: PayloadSchema<T>
  ): DecodeResult<T>;
  decodeBearer<T>(
    authorizationHeader: string | null | undefined,
    schema?: PayloadSchema<T>
  ): DecodeResult<T | JsonObject> {
    const token = extractBearerToken(authorizationHeader);
    if (token === null) {
      const result = fail(invalidTokenFormat());
      this.log(result);
      return result;
    }
    return schema ? this.decode(token, schema) : this.decode(token);
  }

  private log(result: DecodeResult<unknown>): void {
    if (!this.logger) {
      return;
    }

    if (result.success) {
      this.logger.debug('[JWS] Token verified');
      return;
    }

    const { error } = result;
    this.logger.warn('[JWS] Token rejected', {
      code: error.code,
      ...(error.code === 'NO_KEY_CONFIGURED' ? { algorithm: error.algorithm.name } : {}),
    });
  }
}

export function createTokenDecoder(options: TokenDecoderOptions): TokenDecoder {
  return new TokenDecoder(options);
}
