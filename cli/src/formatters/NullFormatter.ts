/**
 * Null Formatter
 *
 * Produces no output. For tests, scripts that only read the exit code
 * and background jobs.
 */

import type { Formatter } from './Formatter.js';

export class NullFormatter implements Formatter {
  onEvent(): void {}

  showResult(): void {}

  showValidation(): void {}

  showCapabilities(): void {}

  showError(_error: Error): void {}

  showWarning(): void {}

  showInfo(_message: string): void {}
}
