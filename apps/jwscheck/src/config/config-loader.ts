/**
 * Configuration Loader
 *
 * Merges defaults, the JSON config file, environment variables and
 * command line flags, in that order of precedence.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { type AlgorithmName, KeySet, loadPublicKeyFromPemFile } from '@jwscheck/core';
import type { z } from 'zod';
import { algorithmNameSchema, CONFIG_ENV, type CliConfig, configFileSchema } from './types';

export type ConfigErrorCode = 'CONFIG_NOT_FOUND' | 'INVALID_CONFIG' | 'INVALID_KEY';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** --config flag */
  configFile?: string;
  /** Values from command line flags */
  overrides?: CliConfig;
  env?: NodeJS.ProcessEnv;
}

const DEFAULT_CONFIG: CliConfig = {};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse a comma separated algorithm list (--algorithms, JWSCHECK_ALGORITHMS)
 */
export function parseAlgorithmList(value: string, source: string): AlgorithmName[] {
  const names = value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  const result = algorithmNameSchema.array().safeParse(names);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error)}`, 'INVALID_CONFIG');
  }
  return result.data;
}

/**
 * Load the JSON config file; relative key paths resolve against its directory
 */
export async function loadConfigFile(filePath: string): Promise<CliConfig> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${filePath}`, 'CONFIG_NOT_FOUND');
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${message}`, 'INVALID_CONFIG');
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${filePath}: ${formatIssues(result.error)}`, 'INVALID_CONFIG');
  }

  const config: CliConfig = { ...result.data };
  if (config.publicKeyFile !== undefined) {
    config.publicKeyFile = path.resolve(path.dirname(filePath), config.publicKeyFile);
  }
  return config;
}

/**
 * Load config values from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv): CliConfig {
  const config: CliConfig = {};

  const hmacSecret = env[CONFIG_ENV.hmacSecret];
  if (hmacSecret) {
    config.hmacSecret = hmacSecret;
  }

  const publicKeyFile = env[CONFIG_ENV.publicKeyFile];
  if (publicKeyFile) {
    config.publicKeyFile = publicKeyFile;
  }

  const algorithms = env[CONFIG_ENV.algorithms];
  if (algorithms) {
    config.algorithms = parseAlgorithmList(algorithms, CONFIG_ENV.algorithms);
  }

  return config;
}

function mergeConfig(base: CliConfig, override: CliConfig): CliConfig {
  const merged: CliConfig = { ...base };
  if (override.hmacSecret !== undefined) merged.hmacSecret = override.hmacSecret;
  if (override.publicKeyFile !== undefined) merged.publicKeyFile = override.publicKeyFile;
  if (override.algorithms !== undefined) merged.algorithms = override.algorithms;
  return merged;
}

/**
 * Load full configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CliConfig> {
  const env = options.env ?? process.env;
  let config: CliConfig = { ...DEFAULT_CONFIG };

  const configFile = options.configFile ?? env[CONFIG_ENV.configFile];
  if (configFile) {
    config = mergeConfig(config, await loadConfigFile(configFile));
  }

  config = mergeConfig(config, loadEnvConfig(env));

  if (options.overrides) {
    config = mergeConfig(config, options.overrides);
  }

  return config;
}

/**
 * Build the verification keys described by the config
 */
export async function buildKeySet(config: CliConfig): Promise<KeySet> {
  let keys = KeySet.empty();

  if (config.hmacSecret !== undefined) {
    if (config.hmacSecret.length === 0) {
      throw new ConfigError('HMAC secret must not be empty', 'INVALID_CONFIG');
    }
    keys = keys.withHmacSecret(config.hmacSecret);
  }

  if (config.publicKeyFile !== undefined) {
    const loaded = await loadPublicKeyFromPemFile(config.publicKeyFile);
    if (!loaded.success) {
      throw new ConfigError(loaded.error.message, 'INVALID_KEY');
    }
    keys = keys.withPublicKey(loaded.value);
  }

  return keys;
}
