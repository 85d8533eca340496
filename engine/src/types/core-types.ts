/**
 * Shared data types: JSON values, flow definitions and graph analysis results.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Plain-object check (arrays and null excluded)
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Freeze a tree of plain objects and arrays in place
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    Object.freeze(value);
    Object.values(value).forEach(deepFreeze);
  }
  return value;
}

/**
 * Deep copy that shares nothing with `value` and can't be changed
 */
export function frozenCopy<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}

// ============================================================================
// Flow definitions
// ============================================================================

/**
 * Constant value passed through unchanged
 */
export interface LiteralBinding {
  readonly kind: 'literal';
  readonly value: JsonValue;
}

/**
 * Output of another node in the same flow; creates a dependency edge
 */
export interface ReferenceBinding {
  readonly kind: 'reference';
  readonly sourceNodeId: string;
  readonly outputKey: string;
}

/**
 * Value from the run's initial inputs
 */
export interface RunInputBinding {
  readonly kind: 'input';
  readonly key: string;
}

export type InputBinding = LiteralBinding | ReferenceBinding | RunInputBinding;

export interface FlowNodeDefinition {
  readonly id: string;
  readonly capabilityId: string;
  readonly config?: JsonObject;
  readonly inputBindings?: Readonly<Record<string, InputBinding>>;
}

/**
 * Per-flow overrides of engine scheduling settings
 */
export interface FlowSettings {
  readonly concurrency?: number;
  readonly timeoutMs?: number;
}

export interface FlowDefinition {
  readonly id: string;
  readonly name?: string;
  readonly description?: string;
  readonly settings?: FlowSettings;
  readonly nodes: readonly FlowNodeDefinition[];
}

export const literal = (value: JsonValue): LiteralBinding => ({ kind: 'literal', value });

export const ref = (sourceNodeId: string, outputKey: string): ReferenceBinding => ({
  kind: 'reference',
  sourceNodeId,
  outputKey,
});

export const runInput = (key: string): RunInputBinding => ({ kind: 'input', key });

// ============================================================================
// Graph analysis
// ============================================================================

/**
 * DFS colouring used by cycle detection
 */
export enum VisitState {
  /** Not yet explored */
  WHITE = 'white',
  /** On the current DFS path */
  GRAY = 'gray',
  /** Fully explored */
  BLACK = 'black',
}

export interface CycleDetectionResult {
  readonly hasCycle: boolean;
  /** Cycle in traversal order with the first node repeated at the end */
  readonly cyclePath?: readonly string[];
}
