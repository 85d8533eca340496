/**
 * Execution Errors
 *
 * Node-level failures. These never abort a run: the failing node ends
 * Failed (or Cancelled) and only its dependent subtree is skipped.
 *
 * @module errors
 */

import { CapflowError } from './CapflowError.js';
import { CapflowErrorCode, ErrorSeverity } from './ErrorCodes.js';

export interface ExecutionErrorOptions {
  nodeId?: string;
  capabilityId?: string;
  cause?: unknown;
  code?: CapflowErrorCode.EXECUTION_FAILED | CapflowErrorCode.EXECUTION_INPUT_MISSING | CapflowErrorCode.EXECUTION_OUTPUT_MISSING;
}

/**
 * Provider invocation failure; wraps the underlying cause
 */
export class ExecutionError extends CapflowError {
  readonly nodeId?: string;

  constructor(message: string, options: ExecutionErrorOptions = {}) {
    super({
      code: options.code ?? CapflowErrorCode.EXECUTION_FAILED,
      message,
      severity: ErrorSeverity.NODE,
      path: options.nodeId ? `nodes.${options.nodeId}` : undefined,
      context: { nodeId: options.nodeId, capabilityId: options.capabilityId },
      cause: options.cause,
    });
    this.nodeId = options.nodeId;
  }

  /**
   * Wrap an arbitrary thrown value, keeping its message.
   */
  static wrap(cause: unknown, options: Omit<ExecutionErrorOptions, 'cause' | 'code'> = {}): ExecutionError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ExecutionError(reason, { ...options, cause });
  }

  static missingInput(nodeId: string, input: string, detail: string): ExecutionError {
    return new ExecutionError(`Node '${nodeId}' input '${input}' is unavailable: ${detail}`, {
      nodeId,
      code: CapflowErrorCode.EXECUTION_INPUT_MISSING,
    });
  }

  static missingOutputs(nodeId: string, capabilityId: string, keys: readonly string[]): ExecutionError {
    return new ExecutionError(
      `Node '${nodeId}' output is missing required key(s): ${keys.join(', ')}`,
      { nodeId, capabilityId, code: CapflowErrorCode.EXECUTION_OUTPUT_MISSING }
    );
  }
}

/**
 * Invocation aborted by the run's cancellation signal
 */
export class CancelledError extends CapflowError {
  constructor(reason = 'Execution cancelled', code: CapflowErrorCode.EXECUTION_CANCELLED | CapflowErrorCode.EXECUTION_TIMEOUT = CapflowErrorCode.EXECUTION_CANCELLED) {
    super({
      code,
      message: reason,
      severity: ErrorSeverity.NODE,
    });
  }
}

/**
 * Run exceeded its time limit. A timeout is a cancellation with a known cause,
 * so it is also a CancelledError.
 */
export class TimeoutError extends CancelledError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Run timed out after ${timeoutMs}ms`, CapflowErrorCode.EXECUTION_TIMEOUT);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The CancelledError to report for an aborted signal: the abort reason when
 * it already is one, otherwise a fresh error carrying the reason text.
 */
export function cancellationFromSignal(signal: AbortSignal): CancelledError {
  const reason: unknown = signal.reason;
  if (reason instanceof CancelledError) {
    return reason;
  }
  if (reason instanceof Error) {
    return new CancelledError(reason.message);
  }
  return new CancelledError(typeof reason === 'string' && reason.length > 0 ? reason : undefined);
}
