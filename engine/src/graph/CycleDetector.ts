/**
 * CycleDetector
 *
 * Detects cycles in the dependency graph using depth-first search with
 * three-colour marking:
 * - WHITE: not yet explored
 * - GRAY: on the current DFS path (the recursion stack)
 * - BLACK: fully explored
 *
 * Reaching a GRAY node is a back-edge, so a cycle exists.
 */

import { GraphError } from '../errors/GraphError.js';
import { VisitState, type CycleDetectionResult } from '../types/core-types.js';
import type { DependencyGraph } from './DependencyResolver.js';

export class CycleDetector {
  /**
   * Check the graph for a cycle. Roots are visited in definition order, so
   * the reported path is deterministic.
   */
  static detect(graph: DependencyGraph): CycleDetectionResult {
    const visitState = new Map<string, VisitState>();
    const parent = new Map<string, string>();

    for (const nodeId of graph.nodes.keys()) {
      visitState.set(nodeId, VisitState.WHITE);
    }

    for (const nodeId of graph.nodes.keys()) {
      if (visitState.get(nodeId) === VisitState.WHITE) {
        const result = this.dfs(nodeId, graph, visitState, parent);
        if (result.hasCycle) {
          return result;
        }
      }
    }

    return { hasCycle: false };
  }

  private static dfs(
    nodeId: string,
    graph: DependencyGraph,
    visitState: Map<string, VisitState>,
    parent: Map<string, string>
  ): CycleDetectionResult {
    visitState.set(nodeId, VisitState.GRAY);

    for (const dependency of graph.adjacencyList.get(nodeId) ?? []) {
      const state = visitState.get(dependency);

      if (state === VisitState.GRAY) {
        const cyclePath = this.reconstructCycle(nodeId, dependency, parent);
        return {
          hasCycle: true,
          cyclePath: Object.freeze([...cyclePath, dependency]),
        };
      }

      if (state === VisitState.WHITE) {
        parent.set(dependency, nodeId);
        const result = this.dfs(dependency, graph, visitState, parent);
        if (result.hasCycle) {
          return result;
        }
      }
    }

    visitState.set(nodeId, VisitState.BLACK);
    return { hasCycle: false };
  }

  /**
   * Walk parent pointers from `start` back to `cycleNode`.
   */
  private static reconstructCycle(
    start: string,
    cycleNode: string,
    parent: Map<string, string>
  ): string[] {
    const cycle: string[] = [start];
    let current = start;

    while (current !== cycleNode) {
      const parentNode = parent.get(current);
      if (parentNode === undefined) {
        break;
      }
      cycle.unshift(parentNode);
      current = parentNode;
    }

    return cycle;
  }

  /**
   * @throws GraphError(CycleDetected) naming the nodes on the cycle
   */
  static detectAndThrow(graph: DependencyGraph): void {
    const result = this.detect(graph);
    if (result.hasCycle && result.cyclePath) {
      throw GraphError.cycleDetected(result.cyclePath);
    }
  }
}
