/**
 * Run Scheduler
 *
 * Drives one run of a WorkflowGraph to completion.
 *
 * Scheduling:
 * - Every node starts with a count of unfinished dependencies
 * - When a node reaches a terminal state, each dependent's count drops;
 *   at zero the dependent is promoted
 * - A promoted node whose dependencies all succeeded becomes READY; any
 *   other outcome skips it, and the skip propagates to its own dependents
 * - READY nodes are dispatched while fewer than `concurrency` are running
 * - The loop sleeps until a node finishes or the run is aborted
 *
 * On abort nothing new is dispatched, every PENDING or READY node is
 * cancelled and the loop waits for in-flight nodes to settle.
 *
 * @module execution
 */

import { missingRequiredKeys, type CapabilityDescriptor } from '../capabilities/Capability.js';
import type { Executor } from '../capabilities/Executor.js';
import { CapflowError } from '../errors/CapflowError.js';
import { CancelledError, ExecutionError, cancellationFromSignal } from '../errors/ExecutionErrors.js';
import { createEvent, EngineEventType } from '../events/EngineEvents.js';
import type { EventBus } from '../events/EventBus.js';
import type { WorkflowGraph, WorkflowNode } from '../graph/WorkflowGraph.js';
import { NodeStatus } from '../state/ExecutionState.js';
import { LogLevel, type LogSink } from '../types/log-types.js';
import type { ExecutionContext } from './ExecutionContext.js';

/**
 * What the scheduler needs from a registry
 */
export interface ExecutorSource {
  getExecutor(capabilityId: string): Promise<Executor>;
  getCapability(capabilityId: string): CapabilityDescriptor | undefined;
}

export interface RunSchedulerOptions {
  graph: WorkflowGraph;
  context: ExecutionContext;
  registry: ExecutorSource;
  events: EventBus;
  logger: LogSink;
  concurrency: number;
  validateOutputs: boolean;
}

export class RunScheduler {
  private readonly graph: WorkflowGraph;
  private readonly context: ExecutionContext;
  private readonly registry: ExecutorSource;
  private readonly events: EventBus;
  private readonly logger: LogSink;
  private readonly concurrency: number;
  private readonly validateOutputs: boolean;

  /** nodeId → dependencies not yet terminal */
  private readonly unresolved = new Map<string, number>();
  /** nodeId → dependencies that ended without succeeding */
  private readonly blockedBy = new Map<string, string[]>();
  private readonly readyQueue: string[] = [];
  private runningCount = 0;

  private notifyResolve: (() => void) | null = null;
  private pendingNotification = false;

  constructor(options: RunSchedulerOptions) {
    this.graph = options.graph;
    this.context = options.context;
    this.registry = options.registry;
    this.events = options.events;
    this.logger = options.logger;
    this.concurrency = options.concurrency;
    this.validateOutputs = options.validateOutputs;
  }

  /**
   * Resolve once every node is terminal
   */
  async run(): Promise<void> {
    for (const nodeId of this.graph.getNodeIds()) {
      this.unresolved.set(nodeId, this.graph.getDependencies(nodeId).length);
      this.blockedBy.set(nodeId, []);
    }
    for (const nodeId of this.graph.getNodeIds()) {
      if (this.unresolved.get(nodeId) === 0) {
        this.promote(nodeId);
      }
    }
    this.launchReady();

    while (!this.context.allTerminal()) {
      if (this.context.signal.aborted) {
        this.cancelWaiting();
        while (this.runningCount > 0) {
          await this.waitForNotification();
        }
        break;
      }

      await this.waitForNotification();
      this.launchReady();
    }
  }

  private waitForNotification(): Promise<void> {
    if (this.pendingNotification) {
      this.pendingNotification = false;
      return Promise.resolve();
    }

    return new Promise<void>(resolve => {
      const { signal } = this.context;

      // Already aborted: only in-flight completions can wake us
      if (signal.aborted) {
        this.notifyResolve = resolve;
        return;
      }

      const onAbort = (): void => {
        this.notifyResolve = null;
        resolve();
      };
      this.notifyResolve = () => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      };
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  private notify(): void {
    if (this.notifyResolve) {
      const resolve = this.notifyResolve;
      this.notifyResolve = null;
      resolve();
    } else {
      this.pendingNotification = true;
    }
  }

  /**
   * All dependencies of `nodeId` are terminal: make it READY or skip it
   */
  private promote(nodeId: string): void {
    if (this.context.signal.aborted || this.context.getStatus(nodeId) !== NodeStatus.PENDING) {
      return;
    }

    const blockers = this.blockedBy.get(nodeId) ?? [];
    if (blockers.length > 0) {
      this.context.transition(nodeId, NodeStatus.SKIPPED, `blocked by ${blockers.join(', ')}`);
      this.context.log(LogLevel.INFO, 'Node skipped', nodeId, { blockedBy: blockers });
      this.events.emit(createEvent(
        EngineEventType.NODE_SKIPPED,
        { capabilityId: this.capabilityOf(nodeId), blockedBy: [...blockers] },
        this.eventContext(nodeId)
      ));
      this.settle(nodeId, NodeStatus.SKIPPED);
      return;
    }

    this.context.transition(nodeId, NodeStatus.READY);
    this.readyQueue.push(nodeId);
  }

  /**
   * Release the dependents of a node that just reached `status`
   */
  private settle(nodeId: string, status: NodeStatus): void {
    for (const dependent of this.graph.getDependents(nodeId)) {
      if (status !== NodeStatus.SUCCEEDED) {
        this.blockedBy.get(dependent)?.push(nodeId);
      }
      const remaining = (this.unresolved.get(dependent) ?? 0) - 1;
      this.unresolved.set(dependent, remaining);
      if (remaining === 0) {
        this.promote(dependent);
      }
    }
  }

  private launchReady(): void {
    while (
      !this.context.signal.aborted &&
      this.runningCount < this.concurrency &&
      this.readyQueue.length > 0
    ) {
      const nodeId = this.readyQueue.shift();
      if (nodeId !== undefined) {
        this.launch(nodeId);
      }
    }
  }

  private launch(nodeId: string): void {
    const node = this.graph.getNode(nodeId);
    if (!node) {
      throw new Error(`Node '${nodeId}' is not part of flow '${this.graph.id}'`);
    }

    this.context.transition(nodeId, NodeStatus.RUNNING);
    this.runningCount++;
    this.context.log(LogLevel.DEBUG, 'Node started', nodeId, { capabilityId: node.capabilityId });
    this.events.emit(createEvent(
      EngineEventType.NODE_STARTED,
      { capabilityId: node.capabilityId },
      this.eventContext(nodeId)
    ));

    this.executeNode(node).then(
      status => this.finish(nodeId, status),
      (error: unknown) => {
        // executeNode handles node failures itself; this is a scheduler fault
        this.logger.log(LogLevel.ERROR, 'Node bookkeeping failed', {
          runId: this.context.runId,
          nodeId,
          error: error instanceof Error ? error.message : String(error),
        });
        if (this.context.getStatus(nodeId) === NodeStatus.RUNNING) {
          this.context.recordError(nodeId, ExecutionError.wrap(error, { nodeId }));
          this.context.transition(nodeId, NodeStatus.FAILED);
        }
        this.finish(nodeId, this.context.getStatus(nodeId));
      }
    );
  }

  private finish(nodeId: string, status: NodeStatus): void {
    this.runningCount--;
    this.settle(nodeId, status);
    this.notify();
  }

  /**
   * Run one node and record its outcome. Never rejects for node failures.
   */
  private async executeNode(node: WorkflowNode): Promise<NodeStatus> {
    const started = Date.now();
    const { signal, runId } = this.context;

    try {
      const executor = await this.registry.getExecutor(node.capabilityId);
      const descriptor = this.registry.getCapability(node.capabilityId);

      const inputs = this.context.resolveInputs(node);
      if (descriptor) {
        const missing = missingRequiredKeys(descriptor.inputSchema, inputs);
        if (missing.length > 0) {
          throw ExecutionError.missingInput(node.id, missing.join(', '), `required by capability '${node.capabilityId}'`);
        }
      }

      const outputs = await executor.execute({ signal, runId, nodeId: node.id, logger: this.logger }, node.config, inputs);

      if (this.validateOutputs && descriptor) {
        const missing = missingRequiredKeys(descriptor.outputSchema, outputs);
        if (missing.length > 0) {
          throw ExecutionError.missingOutputs(node.id, node.capabilityId, missing);
        }
      }

      const recorded = this.context.recordOutputs(node.id, outputs);
      const durationMs = Date.now() - started;
      this.context.transition(node.id, NodeStatus.SUCCEEDED);
      this.context.log(LogLevel.INFO, 'Node succeeded', node.id, { durationMs });
      this.events.emit(createEvent(
        EngineEventType.NODE_SUCCEEDED,
        { capabilityId: node.capabilityId, durationMs, outputs: recorded },
        this.eventContext(node.id)
      ));
      return NodeStatus.SUCCEEDED;
    } catch (error) {
      const durationMs = Date.now() - started;

      if (error instanceof CancelledError || signal.aborted) {
        const cancellation = error instanceof CancelledError ? error : cancellationFromSignal(signal);
        this.context.recordError(node.id, cancellation);
        this.context.transition(node.id, NodeStatus.CANCELLED, cancellation.message);
        this.context.log(LogLevel.WARN, 'Node cancelled', node.id, { reason: cancellation.message });
        this.events.emit(createEvent(
          EngineEventType.NODE_CANCELLED,
          { capabilityId: node.capabilityId, reason: cancellation.message },
          this.eventContext(node.id)
        ));
        return NodeStatus.CANCELLED;
      }

      const failure = error instanceof CapflowError
        ? error
        : ExecutionError.wrap(error, { nodeId: node.id, capabilityId: node.capabilityId });
      this.context.recordError(node.id, failure);
      this.context.transition(node.id, NodeStatus.FAILED, failure.message);
      this.context.log(LogLevel.ERROR, 'Node failed', node.id, {
        code: failure.code,
        error: failure.message,
        durationMs,
      });
      this.events.emit(createEvent(
        EngineEventType.NODE_FAILED,
        { capabilityId: node.capabilityId, durationMs, error: failure },
        this.eventContext(node.id)
      ));
      return NodeStatus.FAILED;
    }
  }

  /**
   * Cancel every node that has not been dispatched
   */
  private cancelWaiting(): void {
    this.readyQueue.length = 0;
    const cancellation = cancellationFromSignal(this.context.signal);

    for (const nodeId of this.context.nodeIdsIn(NodeStatus.PENDING, NodeStatus.READY)) {
      this.context.recordError(nodeId, cancellation);
      this.context.transition(nodeId, NodeStatus.CANCELLED, cancellation.message);
      this.context.log(LogLevel.WARN, 'Node cancelled before start', nodeId, { reason: cancellation.message });
      this.events.emit(createEvent(
        EngineEventType.NODE_CANCELLED,
        { capabilityId: this.capabilityOf(nodeId), reason: cancellation.message },
        this.eventContext(nodeId)
      ));
    }
  }

  private capabilityOf(nodeId: string): string {
    return this.graph.getNode(nodeId)?.capabilityId ?? '';
  }

  private eventContext(nodeId: string): { runId: string; flowId: string; nodeId: string } {
    return { runId: this.context.runId, flowId: this.context.flowId, nodeId };
  }
}
