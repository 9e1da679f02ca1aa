/**
 * CLI configuration types
 */

import { type AlgorithmName, isAlgorithmName } from '@jwscheck/core';
import { z } from 'zod';

export const algorithmNameSchema = z
  .string()
  .refine(isAlgorithmName, (value) => ({ message: `unknown algorithm "${value}"` }));

/**
 * Shape of the JSON file passed with --config
 */
export const configFileSchema = z
  .object({
    hmacSecret: z.string().min(1, 'hmacSecret must not be empty').optional(),
    publicKeyFile: z.string().min(1, 'publicKeyFile must not be empty').optional(),
    algorithms: z.array(algorithmNameSchema).optional(),
  })
  .strict();

export interface CliConfig {
  /** HMAC shared secret (UTF-8) */
  hmacSecret?: string;
  /** Path of a PEM public key */
  publicKeyFile?: string;
  /** Accepted algorithms; all when unset */
  algorithms?: AlgorithmName[];
}

export const CONFIG_ENV = {
  configFile: 'JWSCHECK_CONFIG',
  hmacSecret: 'JWSCHECK_HMAC_SECRET',
  publicKeyFile: 'JWSCHECK_PUBLIC_KEY_FILE',
  algorithms: 'JWSCHECK_ALGORITHMS',
} as const;
