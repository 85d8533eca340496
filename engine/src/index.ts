/**
 * Capflow Engine
 *
 * Capability registry plus a dependency-ordered, concurrent workflow engine.
 *
 * @example
 * ```ts
 * import {
 *   CapabilityRegistry,
 *   WorkflowEngine,
 *   WorkflowGraph,
 *   FlowLoader,
 *   registerBuiltinCapabilities,
 * } from '@capflow/engine';
 *
 * const registry = new CapabilityRegistry({ configStore });
 * registerBuiltinCapabilities(registry);
 *
 * const graph = WorkflowGraph.build(await FlowLoader.fromFile('./flow.yaml'), registry);
 * const result = await new WorkflowEngine(registry).run(graph, { inputs: { audio } });
 * ```
 */

// ============================================================================
// CORE
// ============================================================================

export * from './capabilities/index.js';
export * from './graph/index.js';
export * from './execution/index.js';
export * from './state/index.js';
export * from './events/index.js';

// ============================================================================
// CONFIGURATION AND DEFINITIONS
// ============================================================================

export * from './core/EngineConfig.js';
export * from './config/index.js';
export * from './parser/index.js';
export * from './loader/index.js';

// ============================================================================
// SUPPORT
// ============================================================================

export * from './errors/index.js';
export * from './logging/index.js';
export * from './providers/index.js';
export * from './types/core-types.js';
export * from './types/log-types.js';
