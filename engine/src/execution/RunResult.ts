/**
 * Run result types
 *
 * @module execution
 */

import type { CapflowError } from '../errors/CapflowError.js';
import { TimeoutError } from '../errors/ExecutionErrors.js';
import { NodeStatus, RunStatus, type FinalRunStatus } from '../state/ExecutionState.js';
import type { JsonObject } from '../types/core-types.js';
import type { LogLevel } from '../types/log-types.js';

export interface NodeResult {
  readonly nodeId: string;
  readonly capabilityId: string;
  readonly status: NodeStatus;
  /** Set for failed and cancelled nodes */
  readonly error?: CapflowError;
  /** Set for succeeded nodes */
  readonly outputs?: Readonly<JsonObject>;
  readonly startedAt?: Date;
  readonly completedAt?: Date;
  readonly durationMs?: number;
}

export interface RunCounts {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  cancelled: number;
}

export interface ExecutionLogEntry {
  readonly timestamp: Date;
  readonly level: LogLevel;
  readonly nodeId?: string;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface RunResult {
  readonly runId: string;
  readonly flowId: string;
  readonly status: FinalRunStatus;
  readonly nodes: ReadonlyMap<string, NodeResult>;
  /** Outputs of succeeded nodes only */
  readonly outputs: ReadonlyMap<string, Readonly<JsonObject>>;
  /** First node failure, or the cancellation/timeout error when no node failed */
  readonly firstError?: CapflowError;
  readonly startedAt: Date;
  readonly completedAt: Date;
  readonly durationMs: number;
  readonly counts: Readonly<RunCounts>;
  readonly logs: readonly ExecutionLogEntry[];
}

/**
 * Point-in-time view of a run, available while it runs and for a while
 * after it finishes
 */
export interface RunSnapshot {
  readonly runId: string;
  readonly flowId: string;
  readonly state: RunStatus;
  readonly nodes: Readonly<Record<string, NodeStatus>>;
  readonly startedAt: Date;
  readonly completedAt?: Date;
}

export function emptyCounts(total = 0): RunCounts {
  return { total, succeeded: 0, failed: 0, skipped: 0, cancelled: 0 };
}

/**
 * Final status from node counts and the run's abort reason (if aborted).
 *
 * - aborted by timeout → timed_out
 * - aborted otherwise → cancelled
 * - all succeeded (or no nodes) → succeeded
 * - some succeeded → partial
 * - none succeeded → failed
 */
export function deriveRunStatus(counts: RunCounts, abortReason?: unknown): FinalRunStatus {
  if (abortReason !== undefined) {
    return abortReason instanceof TimeoutError ? RunStatus.TIMED_OUT : RunStatus.CANCELLED;
  }
  if (counts.succeeded === counts.total) {
    return RunStatus.SUCCEEDED;
  }
  return counts.succeeded > 0 ? RunStatus.PARTIAL : RunStatus.FAILED;
}
