/**
 * Config Errors
 *
 * Raised when provider or engine configuration fails field validation.
 * Always returned before any resource is allocated.
 *
 * @module errors
 */

import type { ZodError } from 'zod';
import { CapflowError } from './CapflowError.js';
import { CapflowErrorCode, ErrorSeverity } from './ErrorCodes.js';

/**
 * A single offending field
 */
export interface ConfigViolation {
  readonly field: string;
  readonly message: string;
}

/**
 * Render a zod issue path as `a.b[0].c`.
 */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out.length === 0 ? segment : `.${segment}`;
    }
  }
  return out;
}

export class ConfigError extends CapflowError {
  readonly violations: readonly ConfigViolation[];

  constructor(subject: string, violations: readonly ConfigViolation[]) {
    const summary = violations.map(v => `${v.field}: ${v.message}`).join('; ');
    super({
      code: CapflowErrorCode.CONFIG_INVALID,
      message: `Invalid ${subject} config: ${summary}`,
      severity: ErrorSeverity.ERROR,
      context: { subject, fields: violations.map(v => v.field) },
    });
    this.violations = Object.freeze([...violations]);
  }

  /**
   * Names of the offending fields, in report order
   */
  get fields(): string[] {
    return this.violations.map(v => v.field);
  }

  /**
   * Build from a zod failure. Issues on the root object are reported under
   * the field name "(root)".
   */
  static fromZodError(subject: string, error: ZodError): ConfigError {
    const violations = error.issues.map(issue => ({
      field: formatIssuePath(issue.path) || '(root)',
      message: issue.message,
    }));
    return new ConfigError(subject, violations);
  }

  static single(subject: string, field: string, message: string): ConfigError {
    return new ConfigError(subject, [{ field, message }]);
  }
}
