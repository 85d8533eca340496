/**
 * Process exit codes for run outcomes and CLI errors
 *
 * @module utils
 */

import { CapflowError, ExitCodes, RunStatus, type FinalRunStatus } from '@capflow/engine';

export function exitCodeForStatus(status: FinalRunStatus): ExitCodes {
  switch (status) {
    case RunStatus.SUCCEEDED:
      return ExitCodes.SUCCESS;
    case RunStatus.TIMED_OUT:
      return ExitCodes.TIMED_OUT;
    case RunStatus.CANCELLED:
      return ExitCodes.CANCELLED;
    case RunStatus.PARTIAL:
    case RunStatus.FAILED:
      return ExitCodes.RUN_FAILED;
  }
}

/**
 * Capflow errors carry their own exit code; anything else is a bug
 */
export function exitCodeForError(error: unknown): ExitCodes {
  return error instanceof CapflowError ? error.exitCode : ExitCodes.INTERNAL_ERROR;
}
