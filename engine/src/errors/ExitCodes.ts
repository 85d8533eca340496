/**
 * Process exit codes used by the CLI.
 *
 * @module errors
 */
export enum ExitCodes {
  SUCCESS = 0,
  /** Flow, config or arguments rejected before anything ran */
  INVALID_INPUT = 1,
  /** Run finished with failed or skipped nodes */
  RUN_FAILED = 2,
  TIMED_OUT = 3,
  INTERNAL_ERROR = 4,
  /** Conventional 128 + SIGINT */
  CANCELLED = 130,
}
