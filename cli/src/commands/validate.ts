/**
 * Validate Command
 *
 * Loads a flow and builds its graph against the built-in capabilities
 * without running anything. Prints the execution phases on success.
 *
 * Usage:
 *   capflow validate flow.yaml
 *   capflow validate flow.yaml --format json
 *
 * Exit codes:
 *   0 - Flow is valid
 *   1 - Flow is invalid or unreadable
 */

import { Option, type Command } from 'commander';
import { ExitCodes, FlowLoader, WorkflowGraph, toError } from '@capflow/engine';
import { createFormatter, FORMATTER_TYPES } from '../formatters/createFormatter.js';
import type { Formatter } from '../formatters/Formatter.js';
import type { CliValidateOptions } from '../types/CliValidateOptions.js';
import { exitCodeForError } from '../utils/exit.js';
import { createRuntime } from '../utils/runtime.js';

export function registerValidateCommand(program: Command): void {
  program
    .command('validate <flow>')
    .description('Check a flow file without running it')
    .option('-c, --config <path>', 'Platform config file (YAML or JSON)')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(FORMATTER_TYPES).default('human'))
    .option('--verbose', 'Show per-node dependencies')
    .option('--no-color', 'Disable colored output')
    .action(async (flow: string, options: CliValidateOptions) => {
      process.exitCode = await validateFlow(flow, options);
    });
}

/**
 * Validate command handler
 *
 * @returns the process exit code
 */
export async function validateFlow(
  flowPath: string,
  options: CliValidateOptions,
  formatter: Formatter = createFormatter(options.format ?? 'human', {
    verbose: options.verbose,
    noColor: options.color === false,
  })
): Promise<ExitCodes> {
  try {
    const { registry } = createRuntime(options.config);
    const definition = await FlowLoader.fromFile(flowPath);
    const graph = WorkflowGraph.build(definition, registry);
    formatter.showValidation(graph, flowPath);
    return ExitCodes.SUCCESS;
  } catch (error) {
    formatter.showError(toError(error));
    const code = exitCodeForError(error);
    // Anything wrong with the flow is the caller's to fix
    return code === ExitCodes.INTERNAL_ERROR ? code : ExitCodes.INVALID_INPUT;
  }
}
