/**
 * Definition Errors
 *
 * Problems reading or parsing flow and config documents.
 *
 * @module errors
 */

import type { ZodError } from 'zod';
import { CapflowError } from './CapflowError.js';
import { formatIssuePath } from './ConfigError.js';
import { CapflowErrorCode, ErrorSeverity } from './ErrorCodes.js';

export class DefinitionError extends CapflowError {
  static parseError(source: string, cause: unknown): DefinitionError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new DefinitionError({
      code: CapflowErrorCode.DEFINITION_PARSE_ERROR,
      message: `Failed to parse ${source}: ${reason}`,
      severity: ErrorSeverity.ERROR,
      context: { source },
      cause,
    });
  }

  static fileNotFound(filePath: string): DefinitionError {
    return new DefinitionError({
      code: CapflowErrorCode.DEFINITION_FILE_NOT_FOUND,
      message: `File not found: ${filePath}`,
      severity: ErrorSeverity.ERROR,
      context: { filePath },
    });
  }

  /**
   * One error for the first zod issue; the rest are listed in context.
   */
  static fromZodError(source: string, error: ZodError): DefinitionError {
    const [first] = error.issues;
    const path = first ? formatIssuePath(first.path) : '';
    const message = first ? first.message : 'Invalid document';
    return new DefinitionError({
      code: CapflowErrorCode.DEFINITION_INVALID,
      message: `Invalid ${source}${path ? ` at ${path}` : ''}: ${message}`,
      severity: ErrorSeverity.ERROR,
      path: path || undefined,
      context: {
        source,
        issues: error.issues.map(issue => `${formatIssuePath(issue.path) || '(root)'}: ${issue.message}`),
      },
    });
  }
}
