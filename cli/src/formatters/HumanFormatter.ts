/**
 * Human-Readable Formatter
 *
 * Symbols:
 * - ▶ Run started
 * - ● Node running
 * - ✔ Success
 * - ✖ Failure
 * - ⊘ Skipped or cancelled
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import {
  CapflowError,
  EngineEventType,
  NodeStatus,
  RunStatus,
  type CapabilityDescriptor,
  type EngineEvent,
  type JsonObject,
  type RunResult,
  type WorkflowGraph,
} from '@capflow/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';
import { StatusSymbols, divider, formatDuration, plural } from '../utils/format.js';

export class HumanFormatter implements Formatter {
  private readonly options: FormatterOptions;
  private readonly chalk: ChalkInstance;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
    this.chalk = options.noColor ? new Chalk({ level: 0 }) : chalk;
  }

  onEvent(event: EngineEvent): void {
    const c = this.chalk;
    const nodeId = event.nodeId ?? '';

    switch (event.type) {
      case EngineEventType.RUN_STARTED:
        console.log();
        console.log(c.cyan(divider(60, '━')));
        console.log(c.bold(`${StatusSymbols.start} ${event.flowId}`));
        console.log(c.dim(`   ${plural(event.payload.nodeCount, 'node')}, concurrency ${event.payload.concurrency}`));
        console.log(c.cyan(divider(60, '━')));
        console.log();
        break;

      case EngineEventType.NODE_STARTED:
        console.log(c.blue(StatusSymbols.running), nodeId, c.dim(`(${event.payload.capabilityId})`));
        break;

      case EngineEventType.NODE_SUCCEEDED:
        console.log(
          c.green(`  ${StatusSymbols.success}`),
          nodeId,
          c.dim(`completed in ${formatDuration(event.payload.durationMs)}`)
        );
        if (this.options.verbose) {
          this.printOutputs(event.payload.outputs);
        }
        break;

      case EngineEventType.NODE_FAILED:
        console.log(c.red(`  ${StatusSymbols.failure}`), nodeId, c.red(`failed: ${event.payload.error.message}`));
        if (this.options.verbose && event.payload.error.hint) {
          console.log(c.yellow(`    Hint: ${event.payload.error.hint}`));
        }
        break;

      case EngineEventType.NODE_SKIPPED:
        console.log(
          c.gray(`  ${StatusSymbols.skipped}`),
          nodeId,
          c.gray(`skipped (blocked by ${event.payload.blockedBy.join(', ')})`)
        );
        break;

      case EngineEventType.NODE_CANCELLED:
        console.log(c.yellow(`  ${StatusSymbols.skipped}`), nodeId, c.yellow(`cancelled: ${event.payload.reason}`));
        break;

      case EngineEventType.RUN_COMPLETED:
        // Summary comes from showResult()
        break;
    }
  }

  showResult(result: RunResult): void {
    const c = this.chalk;

    console.log();
    console.log(c.cyan(divider(60, '═')));
    switch (result.status) {
      case RunStatus.SUCCEEDED:
        console.log(c.green.bold(`${StatusSymbols.success} Run succeeded`));
        break;
      case RunStatus.PARTIAL:
        console.log(c.yellow.bold(`${StatusSymbols.warning} Run finished with failures`));
        break;
      case RunStatus.TIMED_OUT:
        console.log(c.red.bold(`${StatusSymbols.failure} Run timed out`));
        break;
      case RunStatus.CANCELLED:
        console.log(c.yellow.bold(`${StatusSymbols.skipped} Run cancelled`));
        break;
      default:
        console.log(c.red.bold(`${StatusSymbols.failure} Run failed`));
        break;
    }
    console.log(c.cyan(divider(60, '═')));
    console.log();

    const { counts } = result;
    console.log(c.bold('Summary:'));
    console.log(`  Run ID:     ${result.runId}`);
    console.log(`  Nodes:      ${counts.total}`);
    console.log(`  Succeeded:  ${c.green(String(counts.succeeded))}`);
    if (counts.failed > 0) console.log(`  Failed:     ${c.red(String(counts.failed))}`);
    if (counts.skipped > 0) console.log(`  Skipped:    ${c.gray(String(counts.skipped))}`);
    if (counts.cancelled > 0) console.log(`  Cancelled:  ${c.yellow(String(counts.cancelled))}`);
    console.log(`  Duration:   ${formatDuration(result.durationMs)}`);

    if (result.firstError) {
      console.log();
      console.log(c.red.bold('First error:'), `[${result.firstError.code}]`, result.firstError.message);
    }

    if (this.options.verbose && result.nodes.size > 0) {
      console.log();
      console.log(c.bold('Nodes:'));
      for (const node of result.nodes.values()) {
        const duration = node.durationMs === undefined ? '' : c.dim(` ${formatDuration(node.durationMs)}`);
        console.log(`  ${this.statusMark(node.status)} ${node.nodeId} ${c.dim(node.status)}${duration}`);
      }
    }

    console.log();
  }

  showValidation(graph: WorkflowGraph, source: string): void {
    const c = this.chalk;
    console.log(c.green(`${StatusSymbols.success} Flow is valid: ${source}`));
    console.log(`  ID:     ${graph.id}`);
    if (graph.name) {
      console.log(`  Name:   ${graph.name}`);
    }
    console.log(`  Nodes:  ${graph.size}`);
    console.log();
    console.log(c.bold('Execution phases:'));
    graph.getPhases().forEach((phase, index) => {
      console.log(`  ${index + 1}. ${phase.join(', ')}`);
    });

    if (this.options.verbose) {
      console.log();
      console.log(c.bold('Nodes:'));
      for (const node of graph.getNodes()) {
        const deps = graph.getDependencies(node.id);
        const after = deps.length > 0 ? c.dim(` after ${deps.join(', ')}`) : '';
        console.log(`  ${node.id} ${c.dim(`(${node.capabilityId})`)}${after}`);
      }
    }
  }

  showCapabilities(capabilities: readonly CapabilityDescriptor[]): void {
    const c = this.chalk;
    if (capabilities.length === 0) {
      console.log(c.dim('No capabilities registered'));
      return;
    }

    const width = Math.max(...capabilities.map(cap => cap.id.length));
    for (const cap of capabilities) {
      console.log(`${c.bold(cap.id.padEnd(width))}  ${c.cyan(cap.type)}  ${c.dim(cap.providerName)}`);
      if (this.options.verbose) {
        console.log(`  ${cap.description}`);
        console.log(c.dim(`  inputs:  ${this.describeSchema(cap.inputSchema.properties, cap.inputSchema.required)}`));
        console.log(c.dim(`  outputs: ${this.describeSchema(cap.outputSchema.properties, cap.outputSchema.required)}`));
      }
    }
  }

  showError(error: Error): void {
    const c = this.chalk;
    console.error();
    if (error instanceof CapflowError) {
      console.error(c.red.bold(`${StatusSymbols.failure} Error [${error.code}]:`), error.message);
      if (error.hint) {
        console.error(c.yellow('  Hint:'), error.hint);
      }
      if (this.options.verbose) {
        console.error();
        console.error(c.gray(error.toDetailedString()));
      }
      return;
    }

    console.error(c.red.bold(`${StatusSymbols.failure} Error:`), error.message);
    if (this.options.verbose && error.stack) {
      console.error();
      console.error(c.gray('Stack trace:'));
      console.error(c.gray(error.stack));
    }
  }

  showWarning(message: string): void {
    console.warn(this.chalk.yellow(StatusSymbols.warning), message);
  }

  showInfo(message: string): void {
    console.log(this.chalk.blue(StatusSymbols.info), message);
  }

  private printOutputs(outputs: Readonly<JsonObject>): void {
    const rendered = JSON.stringify(outputs, null, 2);
    console.log(this.chalk.dim('    Outputs:'));
    for (const line of rendered.split('\n')) {
      console.log(this.chalk.dim(`      ${line}`));
    }
  }

  private statusMark(status: NodeStatus): string {
    switch (status) {
      case NodeStatus.SUCCEEDED:
        return this.chalk.green(StatusSymbols.success);
      case NodeStatus.FAILED:
        return this.chalk.red(StatusSymbols.failure);
      default:
        return this.chalk.gray(StatusSymbols.skipped);
    }
  }

  private describeSchema(properties: Readonly<Record<string, { type: string }>>, required: readonly string[] = []): string {
    const entries = Object.entries(properties);
    if (entries.length === 0) {
      return '(any)';
    }
    return entries
      .map(([name, prop]) => `${name}${required.includes(name) ? '' : '?'}: ${prop.type}`)
      .join(', ');
  }
}
