/**
 * JSON Formatter
 *
 * One JSON object per line (NDJSON) for log shippers, CI and monitoring.
 * Engine events are printed as they arrive; the run result is the last line.
 * Errors serialise through `CapflowError.toJSON()`.
 */

import {
  CapflowError,
  type CapabilityDescriptor,
  type EngineEvent,
  type RunResult,
  type WorkflowGraph,
} from '@capflow/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';

function serializeError(error: Error): Record<string, unknown> {
  if (error instanceof CapflowError) {
    return error.toJSON();
  }
  return { name: error.name, message: error.message };
}

export class JsonFormatter implements Formatter {
  private readonly options: FormatterOptions;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
  }

  onEvent(event: EngineEvent): void {
    this.print({
      type: event.type,
      timestamp: new Date(event.timestamp).toISOString(),
      runId: event.runId,
      flowId: event.flowId,
      nodeId: event.nodeId,
      ...event.payload,
    });
  }

  showResult(result: RunResult): void {
    // Last line of the stream; pretty-printed under --verbose
    this.print({
      type: 'run.result',
      runId: result.runId,
      flowId: result.flowId,
      status: result.status,
      startedAt: result.startedAt.toISOString(),
      completedAt: result.completedAt.toISOString(),
      durationMs: result.durationMs,
      counts: result.counts,
      firstError: result.firstError ? serializeError(result.firstError) : undefined,
      nodes: Array.from(result.nodes.values()).map(node => ({
        nodeId: node.nodeId,
        capabilityId: node.capabilityId,
        status: node.status,
        durationMs: node.durationMs,
        outputs: node.outputs,
        error: node.error ? serializeError(node.error) : undefined,
      })),
    }, this.options.verbose);
  }

  showValidation(graph: WorkflowGraph, source: string): void {
    this.print({
      type: 'flow.valid',
      source,
      flowId: graph.id,
      name: graph.name,
      nodeCount: graph.size,
      phases: graph.getPhases(),
      nodes: graph.getNodes().map(node => ({
        id: node.id,
        capabilityId: node.capabilityId,
        dependsOn: graph.getDependencies(node.id),
      })),
    });
  }

  showCapabilities(capabilities: readonly CapabilityDescriptor[]): void {
    this.print({ type: 'capabilities', capabilities });
  }

  showError(error: Error): void {
    console.error(JSON.stringify({ type: 'error', timestamp: new Date().toISOString(), error: serializeError(error) }));
  }

  showWarning(message: string): void {
    this.print({ type: 'warning', timestamp: new Date().toISOString(), message });
  }

  showInfo(message: string): void {
    this.print({ type: 'info', timestamp: new Date().toISOString(), message });
  }

  private print(value: Record<string, unknown>, pretty = false): void {
    console.log(JSON.stringify(value, null, pretty ? 2 : undefined));
  }
}
