/**
 * Engine event types
 *
 * Emitted at run and node lifecycle moments. Consumed by CLI formatters,
 * loggers and anything else that wants to watch a run without being part
 * of it.
 */

import type { CapflowError } from '../errors/CapflowError.js';
import type { RunCounts } from '../execution/RunResult.js';
import type { FinalRunStatus } from '../state/ExecutionState.js';
import type { JsonObject } from '../types/core-types.js';

export enum EngineEventType {
  RUN_STARTED = 'run.started',
  RUN_COMPLETED = 'run.completed',

  NODE_STARTED = 'node.started',
  NODE_SUCCEEDED = 'node.succeeded',
  NODE_FAILED = 'node.failed',
  NODE_SKIPPED = 'node.skipped',
  NODE_CANCELLED = 'node.cancelled',
}

export interface RunStartedPayload {
  nodeCount: number;
  concurrency: number;
  timeoutMs: number;
}

export interface RunCompletedPayload {
  status: FinalRunStatus;
  durationMs: number;
  counts: RunCounts;
}

export interface NodeStartedPayload {
  capabilityId: string;
}

export interface NodeSucceededPayload {
  capabilityId: string;
  durationMs: number;
  outputs: JsonObject;
}

export interface NodeFailedPayload {
  capabilityId: string;
  durationMs?: number;
  error: CapflowError;
}

export interface NodeSkippedPayload {
  capabilityId: string;
  /** Dependencies that did not succeed */
  blockedBy: string[];
}

export interface NodeCancelledPayload {
  capabilityId: string;
  reason: string;
}

interface EventPayloads {
  [EngineEventType.RUN_STARTED]: RunStartedPayload;
  [EngineEventType.RUN_COMPLETED]: RunCompletedPayload;
  [EngineEventType.NODE_STARTED]: NodeStartedPayload;
  [EngineEventType.NODE_SUCCEEDED]: NodeSucceededPayload;
  [EngineEventType.NODE_FAILED]: NodeFailedPayload;
  [EngineEventType.NODE_SKIPPED]: NodeSkippedPayload;
  [EngineEventType.NODE_CANCELLED]: NodeCancelledPayload;
}

/**
 * Every event carries its run; node events also carry the node.
 */
export type EngineEvent = {
  [K in EngineEventType]: {
    readonly type: K;
    /** Unix timestamp in milliseconds */
    readonly timestamp: number;
    readonly runId: string;
    readonly flowId: string;
    readonly nodeId?: string;
    readonly payload: EventPayloads[K];
  };
}[EngineEventType];

export type EngineEventOf<K extends EngineEventType> = Extract<EngineEvent, { type: K }>;

export function isEventOf<K extends EngineEventType>(event: EngineEvent, type: K): event is EngineEventOf<K> {
  return event.type === type;
}

/**
 * Helper to create well-formed events
 */
export function createEvent<K extends EngineEventType>(
  type: K,
  payload: EventPayloads[K],
  context: { runId: string; flowId: string; nodeId?: string }
): { type: K; timestamp: number; runId: string; flowId: string; nodeId?: string; payload: EventPayloads[K] } {
  return {
    type,
    timestamp: Date.now(),
    runId: context.runId,
    flowId: context.flowId,
    nodeId: context.nodeId,
    payload,
  };
}
