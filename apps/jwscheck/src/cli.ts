/**
 * jwscheck CLI - Main CLI setup
 */

import { Command, Option } from 'commander';
import { createAlgorithmsCommand } from './commands/algorithms';
import { createInspectCommand } from './commands/inspect';
import { createVerifyCommand } from './commands/verify';
import { type OutputFormat, setOutputFormat, setQuietMode, setVerboseMode } from './utils/output';

interface GlobalOptions {
  output: OutputFormat;
  quiet?: boolean;
  verbose?: boolean;
}

export function createCli(): Command {
  const program = new Command();

  program
    .name('jwscheck')
    .description('Decode and verify compact JWS tokens')
    .version('0.1.0')
    .option('-c, --config <file>', 'JSON config file (or JWSCHECK_CONFIG)')
    .addOption(
      new Option('-o, --output <format>', 'Output format').choices(['json', 'table']).default('json')
    )
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('-v, --verbose', 'Show decoder log output');

  program.hook('preAction', (thisCommand) => {
    const options = thisCommand.opts<GlobalOptions>();
    setOutputFormat(options.output);
    setQuietMode(options.quiet ?? false);
    setVerboseMode(options.verbose ?? false);
  });

  program.addCommand(createVerifyCommand());
  program.addCommand(createInspectCommand());
  program.addCommand(createAlgorithmsCommand());

  return program;
}
