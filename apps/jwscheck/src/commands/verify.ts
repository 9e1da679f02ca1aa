/**
 * Verify command
 */

import {
  createTokenDecoder,
  describeDecodingError,
  extractBearerToken,
  type DecodingError,
} from '@jwscheck/core';
import { Command } from 'commander';
import { buildKeySet, loadConfig, parseAlgorithmList } from '../config/config-loader';
import type { CliConfig } from '../config/types';
import { error, printJson, success, verbose, verboseLogger } from '../utils/output';

interface VerifyOptions {
  secret?: string;
  publicKey?: string;
  algorithms?: string;
}

interface GlobalOptions {
  config?: string;
}

function describeFailure(reason: DecodingError): string {
  return `${reason.code}: ${describeDecodingError(reason)}`;
}

/**
 * Verify a token against the configured keys; prints the payload on success
 */
export async function verifyToken(rawToken: string, config: CliConfig): Promise<boolean> {
  const token = extractBearerToken(rawToken) ?? rawToken.trim();
  const keys = await buildKeySet(config);
  const decoder = createTokenDecoder({ keys, algorithms: config.algorithms, logger: verboseLogger });

  const result = decoder.decode(token);
  if (!result.success) {
    error(describeFailure(result.error));
    return false;
  }

  success('Signature verified');
  printJson(result.value);
  return true;
}

export function createVerifyCommand(): Command {
  return new Command('verify')
    .description('Decode a token and verify its signature')
    .argument('<token>', 'Compact JWS token, optionally prefixed with "Bearer "')
    .option('-s, --secret <secret>', 'HMAC shared secret')
    .option('-k, --public-key <file>', 'PEM file holding the RSA public key')
    .option('-a, --algorithms <list>', 'Accepted algorithms (comma-separated)')
    .action(async (token: string, _options: VerifyOptions, command: Command) => {
      const options = command.optsWithGlobals<VerifyOptions & GlobalOptions>();
      const config = await loadConfig({
        configFile: options.config,
        overrides: {
          hmacSecret: options.secret,
          publicKeyFile: options.publicKey,
          algorithms:
            options.algorithms === undefined
              ? undefined
              : parseAlgorithmList(options.algorithms, '--algorithms'),
        },
      });
      verbose(`Accepted algorithms: ${config.algorithms?.join(', ') ?? 'all'}`);

      if (!(await verifyToken(token, config))) {
        process.exitCode = 1;
      }
    });
}
