/**
 * Inspect command
 */

import { extractBearerToken, inspectToken } from '@jwscheck/core';
import { Command } from 'commander';
import { error, printJson, warn } from '../utils/output';

/**
 * Print header and payload without checking the signature
 */
export function inspect(rawToken: string): boolean {
  const token = extractBearerToken(rawToken) ?? rawToken.trim();
  const result = inspectToken(token);
  if (!result.success) {
    error(result.error);
    return false;
  }

  warn('Signature NOT verified');
  printJson(result.value);
  return true;
}

export function createInspectCommand(): Command {
  return new Command('inspect')
    .description('Show token header and payload without verifying the signature')
    .argument('<token>', 'Compact JWS token')
    .action((token: string) => {
      if (!inspect(token)) {
        process.exitCode = 1;
      }
    });
}
