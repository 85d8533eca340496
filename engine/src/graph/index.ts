/**
 * Graph Analysis
 *
 * - DependencyResolver: Build the dependency graph from reference bindings
 * - CycleDetector: Reject circular dependencies
 * - TopologicalSorter: Group nodes into Kahn phases
 * - WorkflowGraph: The validated, immutable flow the engine runs
 */

export * from './DependencyResolver.js';
export * from './CycleDetector.js';
export * from './TopologicalSorter.js';
export * from './WorkflowGraph.js';
