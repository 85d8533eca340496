/**
 * Base Formatter Interface
 *
 * Formatters are the ONLY place where console output is allowed in the CLI.
 *
 * Flow:
 * 1. The engine emits events while a run progresses
 * 2. The command forwards every event to formatter.onEvent()
 * 3. The formatter decides what to print and how
 *
 * Library use and scripts that only care about the exit code use the
 * null formatter.
 */

import type {
  CapabilityDescriptor,
  EngineEvent,
  RunResult,
  WorkflowGraph,
} from '@capflow/engine';

export interface FormatterOptions {
  /** Node outputs, error details and stack traces */
  verbose?: boolean;

  /** Disable colors (CI, terminals without color support) */
  noColor?: boolean;
}

export interface Formatter {
  /**
   * Called for every engine event of the run
   */
  onEvent(event: EngineEvent): void;

  /**
   * Final summary; called once per run, whatever its status
   */
  showResult(result: RunResult): void;

  /**
   * A flow that passed validation
   */
  showValidation(graph: WorkflowGraph, source: string): void;

  showCapabilities(capabilities: readonly CapabilityDescriptor[]): void;

  /**
   * CLI-level errors: unreadable files, invalid flows or config
   */
  showError(error: Error): void;

  showWarning(message: string): void;

  showInfo(message: string): void;
}
