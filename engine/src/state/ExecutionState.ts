/**
 * Execution State
 *
 * Status values for nodes and runs.
 *
 * @module state
 */

/**
 * Node lifecycle:
 *
 * PENDING → READY → RUNNING → SUCCEEDED | FAILED | CANCELLED
 * PENDING → SKIPPED (a dependency did not succeed)
 * PENDING | READY → CANCELLED (run aborted before dispatch)
 */
export enum NodeStatus {
  PENDING = 'pending',
  READY = 'ready',
  RUNNING = 'running',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  SKIPPED = 'skipped',
  CANCELLED = 'cancelled',
}

/**
 * Overall run outcome
 */
export enum RunStatus {
  RUNNING = 'running',
  /** Every node succeeded (or the flow was empty) */
  SUCCEEDED = 'succeeded',
  /** Some nodes succeeded, some did not */
  PARTIAL = 'partial',
  /** No node succeeded */
  FAILED = 'failed',
  CANCELLED = 'cancelled',
  TIMED_OUT = 'timed_out',
}

export type FinalRunStatus = Exclude<RunStatus, RunStatus.RUNNING>;
