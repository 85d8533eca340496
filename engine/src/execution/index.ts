/**
 * Execution
 *
 * - WorkflowEngine: starts, tracks and cancels runs
 * - RunScheduler: dependency-ordered, bounded-concurrency dispatch for one run
 * - ExecutionContext: per-run node state, outputs and log
 */

export * from './RunResult.js';
export * from './ExecutionContext.js';
export * from './RunScheduler.js';
export * from './WorkflowEngine.js';
