/**
 * Capabilities Command
 *
 * Lists the capabilities the CLI registers, with their provider and
 * input/output schemas under --verbose.
 *
 * Usage:
 *   capflow capabilities
 *   capflow capabilities --format json
 */

import { Option, type Command } from 'commander';
import { ExitCodes, toError } from '@capflow/engine';
import { createFormatter, FORMATTER_TYPES } from '../formatters/createFormatter.js';
import type { Formatter } from '../formatters/Formatter.js';
import type { CliValidateOptions } from '../types/CliValidateOptions.js';
import { exitCodeForError } from '../utils/exit.js';
import { createRuntime } from '../utils/runtime.js';

export function registerCapabilitiesCommand(program: Command): void {
  program
    .command('capabilities')
    .description('List registered capabilities')
    .option('-c, --config <path>', 'Platform config file (YAML or JSON)')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(FORMATTER_TYPES).default('human'))
    .option('--verbose', 'Show descriptions and schemas')
    .option('--no-color', 'Disable colored output')
    .action((options: CliValidateOptions) => {
      process.exitCode = listCapabilities(options);
    });
}

export function listCapabilities(
  options: CliValidateOptions,
  formatter: Formatter = createFormatter(options.format ?? 'human', {
    verbose: options.verbose,
    noColor: options.color === false,
  })
): ExitCodes {
  try {
    const { registry } = createRuntime(options.config);
    formatter.showCapabilities(registry.listCapabilities());
    return ExitCodes.SUCCESS;
  } catch (error) {
    formatter.showError(toError(error));
    return exitCodeForError(error);
  }
}
