/**
 * Capflow Error Codes
 *
 * Structured diagnostic codes for the registry, graph builder and scheduler.
 * Kept separate from process exit codes (see ExitCodes.ts): a diagnostic code
 * identifies the problem, an exit code tells a shell script how the CLI ended.
 *
 * Format: CFW-[Category]-[Number]
 *
 * Categories:
 * - C: Configuration (provider or engine config violations)
 * - R: Registry (registration, lookup, provider construction)
 * - G: Graph (flow structure problems found before any run)
 * - E: Execution (node invocation, cancellation, timeouts)
 * - D: Definition (flow/config file reading and parsing)
 *
 * ADDING NEW ERRORS:
 * 1. Add the enum value below
 * 2. Add a description in getErrorDescription()
 * 3. Add the exit code mapping in getExitCodeForError()
 *
 * @module errors
 */

import { ExitCodes } from './ExitCodes.js';

export enum CapflowErrorCode {
  // ============================================================================
  // CONFIG ERRORS (C)
  // ============================================================================

  /** Config failed field validation */
  CONFIG_INVALID = 'CFW-C-001',

  // ============================================================================
  // REGISTRY ERRORS (R)
  // ============================================================================

  /** Capability ID already registered */
  REGISTRY_CONFLICT = 'CFW-R-001',

  /** Capability ID not registered */
  REGISTRY_NOT_FOUND = 'CFW-R-002',

  /** Provider construction or initialization failed */
  PROVIDER_INIT_FAILED = 'CFW-R-003',

  // ============================================================================
  // GRAPH ERRORS (G)
  // ============================================================================

  /** Node references a capability the registry does not know */
  GRAPH_UNKNOWN_CAPABILITY = 'CFW-G-001',

  /** Reference bindings form a cycle */
  GRAPH_CYCLE_DETECTED = 'CFW-G-002',

  /** Binding references a node absent from the graph */
  GRAPH_DANGLING_REFERENCE = 'CFW-G-003',

  /** Two nodes share an ID */
  GRAPH_DUPLICATE_NODE = 'CFW-G-004',

  // ============================================================================
  // EXECUTION ERRORS (E)
  // ============================================================================

  /** Provider invocation failed */
  EXECUTION_FAILED = 'CFW-E-001',

  /** Invocation aborted by the run's cancellation signal */
  EXECUTION_CANCELLED = 'CFW-E-002',

  /** Run exceeded its time limit */
  EXECUTION_TIMEOUT = 'CFW-E-003',

  /** Provider returned without a declared output */
  EXECUTION_OUTPUT_MISSING = 'CFW-E-004',

  /** Node input could not be resolved */
  EXECUTION_INPUT_MISSING = 'CFW-E-005',

  // ============================================================================
  // DEFINITION ERRORS (D)
  // ============================================================================

  /** Malformed YAML/JSON */
  DEFINITION_PARSE_ERROR = 'CFW-D-001',

  /** Document does not match the flow/config schema */
  DEFINITION_INVALID = 'CFW-D-002',

  /** File does not exist or cannot be read */
  DEFINITION_FILE_NOT_FOUND = 'CFW-D-003',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  /** Stops whatever was about to start (registration, graph build, run) */
  ERROR = 'error',

  /** Confined to a single node; the run carries on */
  NODE = 'node',

  /** Reported but harmless */
  WARNING = 'warning',
}

/**
 * Human-readable category name for an error code.
 *
 * @example
 * ```typescript
 * getErrorCategory(CapflowErrorCode.GRAPH_CYCLE_DETECTED); // "Graph Error"
 * ```
 */
export function getErrorCategory(code: CapflowErrorCode): string {
  if (code.startsWith('CFW-C-')) return 'Config Error';
  if (code.startsWith('CFW-R-')) return 'Registry Error';
  if (code.startsWith('CFW-G-')) return 'Graph Error';
  if (code.startsWith('CFW-E-')) return 'Execution Error';
  if (code.startsWith('CFW-D-')) return 'Definition Error';
  return 'Unknown Error';
}

const DESCRIPTIONS: Record<CapflowErrorCode, string> = {
  [CapflowErrorCode.CONFIG_INVALID]: 'One or more configuration fields are missing or out of range.',
  [CapflowErrorCode.REGISTRY_CONFLICT]: 'A capability with this ID is already registered. The first registration stays active.',
  [CapflowErrorCode.REGISTRY_NOT_FOUND]: 'No capability is registered under this ID.',
  [CapflowErrorCode.PROVIDER_INIT_FAILED]: 'The provider could not be constructed or initialized.',
  [CapflowErrorCode.GRAPH_UNKNOWN_CAPABILITY]: 'A node is bound to a capability the registry does not know.',
  [CapflowErrorCode.GRAPH_CYCLE_DETECTED]: 'Nodes depend on each other in a cycle, so no execution order exists.',
  [CapflowErrorCode.GRAPH_DANGLING_REFERENCE]: 'An input binding references a node that is not part of the flow.',
  [CapflowErrorCode.GRAPH_DUPLICATE_NODE]: 'Two or more nodes share the same ID.',
  [CapflowErrorCode.EXECUTION_FAILED]: 'The provider failed while executing the node.',
  [CapflowErrorCode.EXECUTION_CANCELLED]: 'The invocation was cancelled before it completed.',
  [CapflowErrorCode.EXECUTION_TIMEOUT]: 'The run exceeded its time limit and was cancelled.',
  [CapflowErrorCode.EXECUTION_OUTPUT_MISSING]: 'The provider did not return an output its capability declares as required.',
  [CapflowErrorCode.EXECUTION_INPUT_MISSING]: 'A node input could not be resolved from the run inputs or upstream outputs.',
  [CapflowErrorCode.DEFINITION_PARSE_ERROR]: 'The document is not valid YAML or JSON.',
  [CapflowErrorCode.DEFINITION_INVALID]: 'The document does not match the expected structure.',
  [CapflowErrorCode.DEFINITION_FILE_NOT_FOUND]: 'The file does not exist or cannot be read.',
};

const SUGGESTED_ACTIONS: Partial<Record<CapflowErrorCode, string>> = {
  [CapflowErrorCode.CONFIG_INVALID]: 'Fix the listed fields and try again',
  [CapflowErrorCode.REGISTRY_CONFLICT]: 'Register the capability under a different ID',
  [CapflowErrorCode.REGISTRY_NOT_FOUND]: 'Register the capability before looking it up',
  [CapflowErrorCode.GRAPH_UNKNOWN_CAPABILITY]: 'Check the node capabilityId against `capflow capabilities`',
  [CapflowErrorCode.GRAPH_CYCLE_DETECTED]: 'Remove one of the references in the cycle',
  [CapflowErrorCode.GRAPH_DANGLING_REFERENCE]: 'Point sourceNodeId at a node defined in the same flow',
  [CapflowErrorCode.GRAPH_DUPLICATE_NODE]: 'Give every node a unique id',
  [CapflowErrorCode.EXECUTION_TIMEOUT]: 'Raise the timeout or reduce the work per node',
  [CapflowErrorCode.DEFINITION_PARSE_ERROR]: 'Fix the YAML/JSON syntax',
  [CapflowErrorCode.DEFINITION_FILE_NOT_FOUND]: 'Check the file path',
};

/**
 * Detailed description for an error code
 */
export function getErrorDescription(code: CapflowErrorCode): string {
  return DESCRIPTIONS[code];
}

/**
 * Suggested action for an error code, if one exists
 */
export function getSuggestedAction(code: CapflowErrorCode): string | undefined {
  return SUGGESTED_ACTIONS[code];
}

/**
 * Map a diagnostic code to the CLI process exit code.
 */
export function getExitCodeForError(code: CapflowErrorCode): ExitCodes {
  switch (code) {
    case CapflowErrorCode.EXECUTION_TIMEOUT:
      return ExitCodes.TIMED_OUT;
    case CapflowErrorCode.EXECUTION_CANCELLED:
      return ExitCodes.CANCELLED;
    case CapflowErrorCode.EXECUTION_FAILED:
    case CapflowErrorCode.EXECUTION_INPUT_MISSING:
    case CapflowErrorCode.EXECUTION_OUTPUT_MISSING:
      return ExitCodes.RUN_FAILED;
    case CapflowErrorCode.PROVIDER_INIT_FAILED:
      return ExitCodes.INTERNAL_ERROR;
    default:
      return ExitCodes.INVALID_INPUT;
  }
}

/**
 * User errors are fixable by editing a flow or config file.
 */
export function isUserError(code: CapflowErrorCode): boolean {
  return code.startsWith('CFW-C-') || code.startsWith('CFW-G-') || code.startsWith('CFW-D-');
}

/**
 * Whether re-invoking the run might succeed. The engine never retries on its
 * own; this is a hint for callers.
 */
export function isRetryable(code: CapflowErrorCode): boolean {
  return (
    code === CapflowErrorCode.EXECUTION_FAILED ||
    code === CapflowErrorCode.EXECUTION_TIMEOUT ||
    code === CapflowErrorCode.PROVIDER_INIT_FAILED
  );
}
