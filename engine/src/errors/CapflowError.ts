/**
 * Base Capflow Error Class
 *
 * Foundation for every error the engine raises. Carries a structured
 * diagnostic so the CLI, JSON output and log sinks can all render the same
 * information without string parsing.
 *
 * @module errors
 */

import { ExitCodes } from './ExitCodes.js';
import {
  CapflowErrorCode,
  ErrorSeverity,
  getErrorCategory,
  getErrorDescription,
  getExitCodeForError,
  getSuggestedAction,
  isRetryable,
  isUserError,
} from './ErrorCodes.js';

/**
 * Diagnostic error information
 */
export interface CapflowErrorDiagnostic {
  /** Structured error code (e.g., CFW-G-002) */
  code: CapflowErrorCode;

  /** Human-readable error message */
  message: string;

  /** Process exit code for the CLI; derived from the code when omitted */
  exitCode?: ExitCodes;

  /** Location of the problem (e.g., "nodes[2].inputBindings.text") */
  path?: string;

  /** Suggestion for fixing the error */
  hint?: string;

  severity: ErrorSeverity;

  /** Additional context data for debugging */
  context?: Record<string, unknown>;

  /** Underlying error, when this one wraps another */
  cause?: unknown;
}

/**
 * Base error class for all Capflow errors
 *
 * @example
 * ```typescript
 * throw new CapflowError({
 *   code: CapflowErrorCode.REGISTRY_NOT_FOUND,
 *   message: 'Capability "core.chat" is not registered',
 *   severity: ErrorSeverity.ERROR,
 * });
 * ```
 */
export class CapflowError extends Error {
  public readonly diagnostic: Readonly<CapflowErrorDiagnostic & { exitCode: ExitCodes }>;

  public readonly timestamp: Date;

  constructor(diagnostic: CapflowErrorDiagnostic) {
    super(diagnostic.message, diagnostic.cause === undefined ? undefined : { cause: diagnostic.cause });
    this.name = new.target.name;
    this.diagnostic = Object.freeze({
      ...diagnostic,
      exitCode: diagnostic.exitCode ?? getExitCodeForError(diagnostic.code),
      hint: diagnostic.hint ?? getSuggestedAction(diagnostic.code),
    });
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get code(): CapflowErrorCode {
    return this.diagnostic.code;
  }

  get exitCode(): ExitCodes {
    return this.diagnostic.exitCode;
  }

  get path(): string | undefined {
    return this.diagnostic.path;
  }

  get hint(): string | undefined {
    return this.diagnostic.hint;
  }

  get severity(): ErrorSeverity {
    return this.diagnostic.severity;
  }

  get description(): string {
    return getErrorDescription(this.code);
  }

  /**
   * True if the user can fix this by editing a flow or config
   */
  get isUserError(): boolean {
    return isUserError(this.code);
  }

  get isRetryable(): boolean {
    return isRetryable(this.code);
  }

  get category(): string {
    return getErrorCategory(this.code);
  }

  /**
   * Single-block rendering for logs
   */
  toString(): string {
    let msg = `${this.name} [${this.code}]`;

    if (this.path) {
      msg += ` at ${this.path}`;
    }

    msg += `: ${this.message}`;

    if (this.hint) {
      msg += `\nHint: ${this.hint}`;
    }

    return msg;
  }

  /**
   * Multi-line rendering with every diagnostic field, for verbose output
   */
  toDetailedString(): string {
    const lines = [
      '─'.repeat(60),
      `${this.name}`,
      '─'.repeat(60),
      `Error Code:    ${this.code}`,
      `Exit Code:     ${this.exitCode}`,
      `Severity:      ${this.severity}`,
      `Category:      ${this.category}`,
      `Timestamp:     ${this.timestamp.toISOString()}`,
      `User Fixable:  ${this.isUserError ? 'Yes' : 'No'}`,
      `Retryable:     ${this.isRetryable ? 'Yes' : 'No'}`,
    ];

    if (this.path) {
      lines.push(`Location:      ${this.path}`);
    }

    lines.push('', 'Message:', `   ${this.message}`, '', 'Description:', `   ${this.description}`);

    if (this.hint) {
      lines.push('', 'Hint:', `   ${this.hint}`);
    }

    const context = this.diagnostic.context;
    if (context && Object.keys(context).length > 0) {
      lines.push('', 'Context:');
      for (const [key, value] of Object.entries(context)) {
        lines.push(`   ${key}: ${JSON.stringify(value)}`);
      }
    }

    if (this.cause instanceof Error) {
      lines.push('', 'Caused by:', `   ${this.cause.message}`);
    }

    lines.push('─'.repeat(60));
    return lines.join('\n');
  }

  /**
   * Structured form for JSON output and log sinks
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      code: this.code,
      exitCode: this.exitCode,
      message: this.message,
      path: this.path,
      hint: this.hint,
      severity: this.severity,
      context: this.diagnostic.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Normalise anything thrown into an Error instance.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
