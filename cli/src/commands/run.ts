/**
 * Run Command
 *
 * Loads a flow, validates it against the built-in capabilities and runs it,
 * streaming engine events to the selected formatter.
 *
 * Usage:
 *   capflow run flow.yaml --input audio=aGVsbG8=
 *   capflow run flow.yaml --inputs-file inputs.yaml --config capflow.yaml
 *   capflow run --input audio=aGVsbG8=          (built-in conversation flow)
 *   capflow run flow.yaml --format json --timeout 30
 *
 * Exit codes:
 *   0   - Run succeeded
 *   1   - Invalid flow, config or arguments
 *   2   - Run failed or finished partially
 *   3   - Run timed out
 *   4   - Internal error
 *   130 - Cancelled (Ctrl-C)
 */

import { InvalidArgumentError, Option, type Command } from 'commander';
import {
  ExitCodes,
  FlowLoader,
  WorkflowEngine,
  WorkflowGraph,
  createDefaultConversationFlow,
  toError,
  type CapabilityRegistry,
  type FlowDefinition,
} from '@capflow/engine';
import { createFormatter, FORMATTER_TYPES } from '../formatters/createFormatter.js';
import type { Formatter } from '../formatters/Formatter.js';
import type { CliRunOptions } from '../types/CliRunOptions.js';
import { exitCodeForError, exitCodeForStatus } from '../utils/exit.js';
import { collectInputs } from '../utils/inputs.js';
import { createRuntime } from '../utils/runtime.js';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run [flow]')
    .description('Run a flow file, or the built-in conversation flow when none is given')
    .option('-i, --input <key=value...>', 'Run input (repeatable)')
    .option('--inputs-file <path>', 'Load run inputs from a JSON or YAML file')
    .option('-c, --config <path>', 'Platform config file (YAML or JSON)')
    .option('--concurrency <n>', 'Maximum nodes running at once', parsePositiveInt)
    .option('-t, --timeout <seconds>', 'Run timeout in seconds', parsePositiveNumber)
    .addOption(new Option('-f, --format <format>', 'Output format').choices(FORMATTER_TYPES).default('human'))
    .option('--verbose', 'Show node outputs and debug logs')
    .option('--no-color', 'Disable colored output')
    .action(async (flow: string | undefined, options: CliRunOptions) => {
      process.exitCode = await runFlow(flow, options);
    });
}

export interface RunFlowDeps {
  /** Replaces the formatter chosen by `--format` */
  formatter?: Formatter;
  /** Cancels the run when aborted; SIGINT does the same */
  signal?: AbortSignal;
}

/**
 * Run command handler
 *
 * @returns the process exit code
 */
export async function runFlow(
  flowPath: string | undefined,
  options: CliRunOptions,
  deps: RunFlowDeps = {}
): Promise<ExitCodes> {
  const formatter = deps.formatter ?? createFormatter(options.format ?? 'human', {
    verbose: options.verbose,
    noColor: options.color === false,
  });
  let registry: CapabilityRegistry | undefined;
  try {
    const runtime = createRuntime(options.config, options);
    registry = runtime.registry;

    const definition: FlowDefinition = flowPath
      ? await FlowLoader.fromFile(flowPath)
      : createDefaultConversationFlow();
    const graph = WorkflowGraph.build(definition, runtime.registry);
    const inputs = await collectInputs(options);

    const engine = new WorkflowEngine(runtime.registry, runtime.engineConfig, { logger: runtime.logger });
    engine.events.onAny(event => formatter.onEvent(event));

    const { runId, result } = engine.start(graph, {
      inputs,
      signal: deps.signal,
      concurrency: options.concurrency,
      timeoutMs: options.timeout === undefined ? undefined : Math.max(1, Math.round(options.timeout * 1000)),
    });

    const onInterrupt = (): void => {
      formatter.showWarning('Interrupted; cancelling run');
      engine.cancel(runId, 'Interrupted by user');
    };
    process.once('SIGINT', onInterrupt);

    try {
      const outcome = await result;
      formatter.showResult(outcome);
      return exitCodeForStatus(outcome.status);
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  } catch (error) {
    formatter.showError(toError(error));
    return exitCodeForError(error);
  } finally {
    await registry?.closeAll();
  }
}
