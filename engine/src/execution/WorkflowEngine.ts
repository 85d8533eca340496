/**
 * Workflow Engine
 *
 * Runs validated WorkflowGraphs against a capability registry. Any number
 * of runs may be active at once; each gets its own ExecutionContext,
 * scheduler and AbortController.
 *
 * A run always resolves to a RunResult. Node failures, cancellation and
 * timeouts are reported in the result, never thrown.
 *
 * @example
 * ```ts
 * const graph = WorkflowGraph.build(definition, registry);
 * const engine = new WorkflowEngine(registry, { concurrency: 4 });
 *
 * const { runId, result } = engine.start(graph, { inputs: { audio } });
 * // engine.cancel(runId) stops it early
 * const outcome = await result;
 * ```
 *
 * @module execution
 */

import { z } from 'zod';
import {
  applyConfigDefaults,
  validateEngineConfig,
  type EngineConfig,
  type ResolvedEngineConfig,
} from '../core/EngineConfig.js';
import { ConfigError } from '../errors/ConfigError.js';
import { CancelledError, TimeoutError } from '../errors/ExecutionErrors.js';
import { createEvent, EngineEventType } from '../events/EngineEvents.js';
import { EventBus } from '../events/EventBus.js';
import type { WorkflowGraph } from '../graph/WorkflowGraph.js';
import { RunStatus } from '../state/ExecutionState.js';
import { createRunStateMachine, type StateMachine } from '../state/StateMachine.js';
import type { JsonObject } from '../types/core-types.js';
import { createEngineLogger } from '../logging/EngineLogger.js';
import { LogLevel, silentSink, type LogSink } from '../types/log-types.js';
import { ExecutionContext } from './ExecutionContext.js';
import { deriveRunStatus, type RunResult, type RunSnapshot } from './RunResult.js';
import { RunScheduler, type ExecutorSource } from './RunScheduler.js';

export interface RunOptions {
  /** Values for `{ input: key }` bindings */
  inputs?: JsonObject;
  /** External cancellation */
  signal?: AbortSignal;
  runId?: string;
  /** Overrides flow settings and engine config */
  concurrency?: number;
  /** Overrides flow settings and engine config */
  timeoutMs?: number;
}

export interface RunHandle {
  readonly runId: string;
  readonly result: Promise<RunResult>;
}

export interface WorkflowEngineOptions {
  /** Replaces the console logger built from `config.logLevel` */
  logger?: LogSink;
  /** Share a bus with other components; a private one is created otherwise */
  events?: EventBus;
}

interface ActiveRun {
  readonly controller: AbortController;
  readonly context: ExecutionContext;
  readonly state: StateMachine<RunStatus>;
}

const runOptionsSchema = z.object({
  runId: z.string().min(1).optional(),
  concurrency: z.number().int().min(1).optional(),
  timeoutMs: z.number().int().min(1).optional(),
});

/**
 * Run ID in the form `run-<epoch ms>-<random base36>`
 */
export function generateRunId(): string {
  return `run-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

export class WorkflowEngine {
  readonly events: EventBus;
  private readonly registry: ExecutorSource;
  private readonly config: ResolvedEngineConfig;
  private readonly logger: LogSink;
  private readonly active = new Map<string, ActiveRun>();
  /** Finished runs, oldest first */
  private readonly history = new Map<string, RunSnapshot>();

  /**
   * @throws ConfigError if `config` is invalid
   */
  constructor(registry: ExecutorSource, config: EngineConfig = {}, options: WorkflowEngineOptions = {}) {
    this.registry = registry;
    this.config = applyConfigDefaults(validateEngineConfig(config));
    this.logger = options.logger ?? createEngineLogger(this.config.logLevel) ?? silentSink;
    this.events = options.events ?? new EventBus(this.logger);
  }

  getConfig(): Readonly<ResolvedEngineConfig> {
    return { ...this.config };
  }

  /**
   * Start a run and return immediately.
   *
   * @throws ConfigError for invalid options or a run ID that is already active
   */
  start(graph: WorkflowGraph, options: RunOptions = {}): RunHandle {
    const parsed = runOptionsSchema.safeParse({
      runId: options.runId,
      concurrency: options.concurrency,
      timeoutMs: options.timeoutMs,
    });
    if (!parsed.success) {
      throw ConfigError.fromZodError('run', parsed.error);
    }

    const runId = options.runId ?? generateRunId();
    if (this.active.has(runId)) {
      throw ConfigError.single('run', 'runId', `run '${runId}' is already active`);
    }

    const concurrency = options.concurrency ?? graph.settings.concurrency ?? this.config.concurrency;
    const timeoutMs = options.timeoutMs ?? graph.settings.timeoutMs ?? this.config.defaultTimeoutMs;

    const controller = new AbortController();
    const context = new ExecutionContext({
      runId,
      flowId: graph.id,
      nodes: graph.getNodes(),
      signal: controller.signal,
      inputs: options.inputs,
      logger: this.logger,
    });
    const run: ActiveRun = { controller, context, state: createRunStateMachine() };
    this.active.set(runId, run);

    const result = this.execute(graph, run, { concurrency, timeoutMs, signal: options.signal });
    return { runId, result };
  }

  /**
   * Start a run and wait for its result
   */
  async run(graph: WorkflowGraph, options: RunOptions = {}): Promise<RunResult> {
    return this.start(graph, options).result;
  }

  /**
   * Abort an active run. Nodes not yet dispatched are cancelled; running
   * nodes receive the abort signal.
   *
   * @returns false if the run is unknown, finished or already aborted
   */
  cancel(runId: string, reason?: string): boolean {
    const run = this.active.get(runId);
    if (!run || run.controller.signal.aborted) {
      return false;
    }
    run.controller.abort(new CancelledError(reason ?? `Run '${runId}' cancelled`));
    return true;
  }

  /**
   * Snapshot of an active run, or of one of the most recent finished runs
   */
  getRun(runId: string): RunSnapshot | undefined {
    const run = this.active.get(runId);
    if (run) {
      return Object.freeze({
        runId,
        flowId: run.context.flowId,
        state: run.state.getState(),
        nodes: Object.freeze(run.context.statusMap()),
        startedAt: run.context.startedAt,
      });
    }
    return this.history.get(runId);
  }

  getActiveRunIds(): string[] {
    return Array.from(this.active.keys());
  }

  private async execute(
    graph: WorkflowGraph,
    run: ActiveRun,
    settings: { concurrency: number; timeoutMs: number; signal?: AbortSignal }
  ): Promise<RunResult> {
    const { context, controller } = run;
    const { runId } = context;
    const eventContext = { runId, flowId: graph.id };

    const timer = setTimeout(() => {
      controller.abort(new TimeoutError(settings.timeoutMs));
    }, settings.timeoutMs);

    const external = settings.signal;
    const onExternalAbort = (): void => {
      const reason: unknown = external?.reason;
      controller.abort(
        reason instanceof CancelledError
          ? reason
          : new CancelledError(reason instanceof Error ? reason.message : 'Run cancelled by caller')
      );
    };
    if (external?.aborted) {
      onExternalAbort();
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }

    context.log(LogLevel.INFO, 'Run started', undefined, {
      flowId: graph.id,
      nodes: graph.size,
      concurrency: settings.concurrency,
      timeoutMs: settings.timeoutMs,
    });
    this.events.emit(createEvent(
      EngineEventType.RUN_STARTED,
      { nodeCount: graph.size, concurrency: settings.concurrency, timeoutMs: settings.timeoutMs },
      eventContext
    ));

    const scheduler = new RunScheduler({
      graph,
      context,
      registry: this.registry,
      events: this.events,
      logger: this.logger,
      concurrency: settings.concurrency,
      validateOutputs: this.config.validateOutputs,
    });

    try {
      await scheduler.run();
    } finally {
      clearTimeout(timer);
      external?.removeEventListener('abort', onExternalAbort);
      this.active.delete(runId);
    }

    const completedAt = new Date();
    const counts = context.counts();
    const abortReason: unknown = controller.signal.aborted ? controller.signal.reason : undefined;
    const status = deriveRunStatus(counts, abortReason);
    run.state.transition(status);

    const firstError = context.firstError
      ?? (abortReason instanceof CancelledError ? abortReason : undefined);

    const nodes = context.nodeResults();
    const outputs = new Map<string, Readonly<JsonObject>>();
    for (const [nodeId, node] of nodes) {
      if (node.outputs) {
        outputs.set(nodeId, node.outputs);
      }
    }

    const durationMs = completedAt.getTime() - context.startedAt.getTime();
    context.log(status === RunStatus.SUCCEEDED ? LogLevel.INFO : LogLevel.WARN, 'Run completed', undefined, {
      status,
      durationMs,
      ...counts,
    });
    this.events.emit(createEvent(
      EngineEventType.RUN_COMPLETED,
      { status, durationMs, counts: { ...counts } },
      eventContext
    ));

    this.remember({
      runId,
      flowId: graph.id,
      state: run.state.getState(),
      nodes: Object.freeze(context.statusMap()),
      startedAt: context.startedAt,
      completedAt,
    });

    return Object.freeze({
      runId,
      flowId: graph.id,
      status,
      nodes,
      outputs,
      firstError,
      startedAt: context.startedAt,
      completedAt,
      durationMs,
      counts: Object.freeze(counts),
      logs: context.getLogs(),
    });
  }

  private remember(snapshot: RunSnapshot): void {
    if (this.config.historyLimit === 0) {
      return;
    }
    this.history.set(snapshot.runId, Object.freeze(snapshot));
    while (this.history.size > this.config.historyLimit) {
      const oldest = this.history.keys().next();
      if (oldest.done) {
        break;
      }
      this.history.delete(oldest.value);
    }
  }
}
