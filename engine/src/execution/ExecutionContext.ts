/**
 * Execution Context
 *
 * Mutable per-run state: node state machines, outputs, errors and the
 * execution log. Owned by one RunScheduler; nothing outside the run
 * writes to it.
 *
 * @module execution
 */

import { CancelledError, ExecutionError } from '../errors/ExecutionErrors.js';
import type { CapflowError } from '../errors/CapflowError.js';
import type { WorkflowNode } from '../graph/WorkflowGraph.js';
import { NodeStatus } from '../state/ExecutionState.js';
import { createNodeStateMachine, type StateMachine } from '../state/StateMachine.js';
import { frozenCopy, type JsonObject } from '../types/core-types.js';
import type { LogLevel, LogSink } from '../types/log-types.js';
import { emptyCounts, type ExecutionLogEntry, type NodeResult, type RunCounts } from './RunResult.js';

export interface ExecutionContextInit {
  runId: string;
  flowId: string;
  nodes: readonly WorkflowNode[];
  signal: AbortSignal;
  inputs?: JsonObject;
  logger: LogSink;
}

export class ExecutionContext {
  readonly runId: string;
  readonly flowId: string;
  readonly signal: AbortSignal;
  readonly inputs: Readonly<JsonObject>;
  readonly startedAt = new Date();

  private readonly nodes: ReadonlyMap<string, WorkflowNode>;
  private readonly machines = new Map<string, StateMachine<NodeStatus>>();
  private readonly outputs = new Map<string, Readonly<JsonObject>>();
  private readonly errors = new Map<string, CapflowError>();
  private readonly entries: ExecutionLogEntry[] = [];
  private readonly logger: LogSink;
  private firstNodeError?: CapflowError;

  constructor(init: ExecutionContextInit) {
    this.runId = init.runId;
    this.flowId = init.flowId;
    this.signal = init.signal;
    this.inputs = frozenCopy(init.inputs ?? {});
    this.logger = init.logger;
    this.nodes = new Map(init.nodes.map(node => [node.id, node]));

    for (const node of init.nodes) {
      this.machines.set(node.id, createNodeStateMachine());
    }
  }

  getStatus(nodeId: string): NodeStatus {
    return this.machine(nodeId).getState();
  }

  /**
   * @throws Error on a transition the node state machine does not allow
   */
  transition(nodeId: string, to: NodeStatus, reason?: string): void {
    this.machine(nodeId).transition(to, reason);
  }

  allTerminal(): boolean {
    for (const machine of this.machines.values()) {
      if (!machine.isTerminal()) {
        return false;
      }
    }
    return true;
  }

  nodeIdsIn(...statuses: NodeStatus[]): string[] {
    return Array.from(this.machines)
      .filter(([, machine]) => statuses.includes(machine.getState()))
      .map(([nodeId]) => nodeId);
  }

  /**
   * Store a node's outputs. They are copied and deep-frozen; a node's
   * outputs are written once.
   */
  recordOutputs(nodeId: string, outputs: JsonObject): Readonly<JsonObject> {
    if (this.outputs.has(nodeId)) {
      throw new Error(`Outputs of node '${nodeId}' already recorded`);
    }
    const frozen = frozenCopy(outputs);
    this.outputs.set(nodeId, frozen);
    return frozen;
  }

  getOutputs(nodeId: string): Readonly<JsonObject> | undefined {
    return this.outputs.get(nodeId);
  }

  /**
   * Attach an error to a node. Cancellations are kept per node but never
   * become the run's first error.
   */
  recordError(nodeId: string, error: CapflowError): void {
    this.errors.set(nodeId, error);
    if (!this.firstNodeError && !(error instanceof CancelledError)) {
      this.firstNodeError = error;
    }
  }

  getError(nodeId: string): CapflowError | undefined {
    return this.errors.get(nodeId);
  }

  get firstError(): CapflowError | undefined {
    return this.firstNodeError;
  }

  /**
   * Build the node's inputs from its bindings.
   *
   * @throws ExecutionError(INPUT_MISSING) if a referenced output or run input is absent
   */
  resolveInputs(node: WorkflowNode): JsonObject {
    const resolved: JsonObject = {};

    for (const [name, binding] of Object.entries(node.inputBindings)) {
      switch (binding.kind) {
        case 'literal':
          resolved[name] = binding.value;
          break;

        case 'reference': {
          const outputs = this.outputs.get(binding.sourceNodeId);
          const value = outputs && Object.hasOwn(outputs, binding.outputKey) ? outputs[binding.outputKey] : undefined;
          if (value === undefined) {
            throw ExecutionError.missingInput(
              node.id,
              name,
              `node '${binding.sourceNodeId}' has no output '${binding.outputKey}'`
            );
          }
          resolved[name] = value;
          break;
        }

        case 'input': {
          const value = Object.hasOwn(this.inputs, binding.key) ? this.inputs[binding.key] : undefined;
          if (value === undefined) {
            throw ExecutionError.missingInput(node.id, name, `run input '${binding.key}' was not provided`);
          }
          resolved[name] = value;
          break;
        }
      }
    }

    return resolved;
  }

  /**
   * Append to the execution log and forward to the log sink
   */
  log(level: LogLevel, message: string, nodeId?: string, details?: Record<string, unknown>): void {
    this.entries.push(Object.freeze({
      timestamp: new Date(),
      level,
      nodeId,
      message,
      details: details ? Object.freeze({ ...details }) : undefined,
    }));
    this.logger.log(level, message, { runId: this.runId, nodeId, ...details });
  }

  getLogs(): readonly ExecutionLogEntry[] {
    return Object.freeze([...this.entries]);
  }

  statusMap(): Record<string, NodeStatus> {
    const out: Record<string, NodeStatus> = {};
    for (const [nodeId, machine] of this.machines) {
      out[nodeId] = machine.getState();
    }
    return out;
  }

  counts(): RunCounts {
    const counts = emptyCounts(this.machines.size);
    for (const machine of this.machines.values()) {
      switch (machine.getState()) {
        case NodeStatus.SUCCEEDED:
          counts.succeeded++;
          break;
        case NodeStatus.FAILED:
          counts.failed++;
          break;
        case NodeStatus.SKIPPED:
          counts.skipped++;
          break;
        case NodeStatus.CANCELLED:
          counts.cancelled++;
          break;
        default:
          break;
      }
    }
    return counts;
  }

  nodeResults(): Map<string, NodeResult> {
    const results = new Map<string, NodeResult>();
    for (const [nodeId, machine] of this.machines) {
      const startedAt = machine.enteredAt(NodeStatus.RUNNING);
      const completedAt = machine.isTerminal() ? machine.getHistory().at(-1)?.timestamp : undefined;
      results.set(nodeId, Object.freeze({
        nodeId,
        capabilityId: this.nodes.get(nodeId)?.capabilityId ?? '',
        status: machine.getState(),
        error: this.errors.get(nodeId),
        outputs: this.outputs.get(nodeId),
        startedAt: startedAt === undefined ? undefined : new Date(startedAt),
        completedAt: completedAt === undefined ? undefined : new Date(completedAt),
        durationMs: startedAt !== undefined && completedAt !== undefined ? completedAt - startedAt : undefined,
      }));
    }
    return results;
  }

  private machine(nodeId: string): StateMachine<NodeStatus> {
    const machine = this.machines.get(nodeId);
    if (!machine) {
      throw new Error(`Unknown node '${nodeId}' in run '${this.runId}'`);
    }
    return machine;
  }
}
