/**
 * JWS signing algorithms (RFC 7518 §3.1)
 *
 * Each member carries the identifier of the node:crypto primitive that
 * verifies it. The verifier dispatches on `family`.
 */

export type HmacAlgorithmName = 'HS256' | 'HS384' | 'HS512';
export type RsaAlgorithmName = 'RS256' | 'RS384' | 'RS512' | 'PS256' | 'PS384' | 'PS512';
export type EcdsaAlgorithmName = 'ES256' | 'ES384' | 'ES512';
export type AlgorithmName = HmacAlgorithmName | RsaAlgorithmName | EcdsaAlgorithmName | 'none';

export type AlgorithmFamily = Algorithm['family'];

export interface HmacAlgorithm {
  readonly family: 'hmac';
  readonly name: HmacAlgorithmName;
  /** Digest name for createHmac */
  readonly primitive: 'sha256' | 'sha384' | 'sha512';
}

export interface RsaAlgorithm {
  readonly family: 'rsa';
  readonly name: RsaAlgorithmName;
  /** Digest name for crypto.verify */
  readonly primitive: 'RSA-SHA256' | 'RSA-SHA384' | 'RSA-SHA512';
  readonly padding: 'pkcs1' | 'pss';
}

export interface EcdsaAlgorithm {
  readonly family: 'ecdsa';
  readonly name: EcdsaAlgorithmName;
  readonly primitive: 'SHA256' | 'SHA384' | 'SHA512';
}

export interface UnsecuredAlgorithm {
  readonly family: 'none';
  readonly name: 'none';
  readonly primitive: '';
}

export type Algorithm = HmacAlgorithm | RsaAlgorithm | EcdsaAlgorithm | UnsecuredAlgorithm;

export const ALGORITHMS = {
  HS256: { family: 'hmac', name: 'HS256', primitive: 'sha256' },
  HS384: { family: 'hmac', name: 'HS384', primitive: 'sha384' },
  HS512: { family: 'hmac', name: 'HS512', primitive: 'sha512' },
  RS256: { family: 'rsa', name: 'RS256', primitive: 'RSA-SHA256', padding: 'pkcs1' },
  RS384: { family: 'rsa', name: 'RS384', primitive: 'RSA-SHA384', padding: 'pkcs1' },
  RS512: { family: 'rsa', name: 'RS512', primitive: 'RSA-SHA512', padding: 'pkcs1' },
  PS256: { family: 'rsa', name: 'PS256', primitive: 'RSA-SHA256', padding: 'pss' },
  PS384: { family: 'rsa', name: 'PS384', primitive: 'RSA-SHA384', padding: 'pss' },
  PS512: { family: 'rsa', name: 'PS512', primitive: 'RSA-SHA512', padding: 'pss' },
  ES256: { family: 'ecdsa', name: 'ES256', primitive: 'SHA256' },
  ES384: { family: 'ecdsa', name: 'ES384', primitive: 'SHA384' },
  ES512: { family: 'ecdsa', name: 'ES512', primitive: 'SHA512' },
  none: { family: 'none', name: 'none', primitive: '' },
} as const satisfies { readonly [N in AlgorithmName]: Algorithm & { readonly name: N } };

const ALGORITHM_NAMES = Object.keys(ALGORITHMS);

export function isAlgorithmName(value: unknown): value is AlgorithmName {
  return typeof value === 'string' && ALGORITHM_NAMES.includes(value);
}

/**
 * Look up an algorithm by its `alg` header value (case-sensitive)
 */
export function parseAlgorithm(name: string): Algorithm | undefined {
  return isAlgorithmName(name) ? ALGORITHMS[name] : undefined;
}

export function listAlgorithms(): Algorithm[] {
  return Object.values(ALGORITHMS);
}

/**
 * Whether this library can verify signatures of the algorithm at all
 */
export function isVerifiable(algorithm: Algorithm): boolean {
  return algorithm.family !== 'ecdsa';
}
