/**
 * TopologicalSorter
 *
 * Groups an acyclic dependency graph into phases with Kahn's algorithm.
 * Every node in a phase depends only on nodes in earlier phases, so a phase
 * is a set of nodes that may run concurrently.
 *
 * Result: [['asr'], ['chat', 'summary'], ['tts']]
 *
 * The engine does not run phase by phase (a slow node would hold back
 * unrelated work); it promotes nodes as their own dependencies finish. The
 * phases are used for plans, `capflow validate` output and sanity checks.
 */

import { GraphError } from '../errors/GraphError.js';
import { DependencyResolver, type DependencyGraph } from './DependencyResolver.js';

export interface TopologicalSortResult {
  /** Phases in order; nodes keep definition order within a phase */
  readonly phases: readonly (readonly string[])[];
  readonly phaseCount: number;
  /** nodeId → phase index (0-based) */
  readonly nodePhases: ReadonlyMap<string, number>;
}

export class TopologicalSorter {
  /**
   * @throws GraphError(CycleDetected) if the graph still has a cycle
   */
  static sort(graph: DependencyGraph): TopologicalSortResult {
    const inDegrees = DependencyResolver.calculateInDegrees(graph);
    const processed = new Set<string>();
    const phases: string[][] = [];
    const nodePhases = new Map<string, number>();

    while (processed.size < graph.nodes.size) {
      const currentPhase: string[] = [];

      for (const [nodeId, inDegree] of inDegrees) {
        if (inDegree === 0 && !processed.has(nodeId)) {
          currentPhase.push(nodeId);
        }
      }

      if (currentPhase.length === 0) {
        const remaining = Array.from(graph.nodes.keys()).filter(id => !processed.has(id));
        throw GraphError.cycleDetected([...remaining, ...remaining.slice(0, 1)]);
      }

      for (const nodeId of currentPhase) {
        processed.add(nodeId);
        nodePhases.set(nodeId, phases.length);

        for (const dependent of graph.reverseDependencies.get(nodeId) ?? []) {
          inDegrees.set(dependent, (inDegrees.get(dependent) ?? 0) - 1);
        }
      }

      phases.push(currentPhase);
    }

    return {
      phases: Object.freeze(phases.map(phase => Object.freeze([...phase]))),
      phaseCount: phases.length,
      nodePhases,
    };
  }

  /**
   * Flatten the phases into one valid execution order
   */
  static sortLinear(graph: DependencyGraph): string[] {
    return this.sort(graph).phases.flat();
  }
}
