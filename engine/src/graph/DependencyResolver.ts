/**
 * DependencyResolver
 *
 * Builds the dependency graph from flow nodes. Edges come from reference
 * bindings: a node depends on every node whose output it reads.
 *
 * Responsibilities:
 * 1. Index nodes by ID (duplicate IDs fail fast)
 * 2. Derive edges from `{ sourceNodeId, outputKey }` bindings
 * 3. Record references to nodes that are not in the flow
 *
 * It does not check for cycles (CycleDetector) or order nodes
 * (TopologicalSorter). Dangling references are collected rather than
 * thrown so the caller decides the order validation errors surface in.
 */

import { GraphError } from '../errors/GraphError.js';
import type { FlowNodeDefinition } from '../types/core-types.js';

/**
 * Directed edge: `from` reads an output of `to`
 */
export interface DependencyEdge {
  readonly from: string;
  readonly to: string;
  /** Input name on `from` that carries the reference */
  readonly binding: string;
}

export interface DanglingReference {
  readonly nodeId: string;
  readonly binding: string;
  readonly sourceNodeId: string;
}

export interface DependencyGraph {
  /** Nodes indexed by ID, in definition order */
  readonly nodes: ReadonlyMap<string, FlowNodeDefinition>;
  readonly edges: readonly DependencyEdge[];
  /** nodeId → IDs it depends on (unique, in binding order) */
  readonly adjacencyList: ReadonlyMap<string, readonly string[]>;
  /** nodeId → IDs that depend on it */
  readonly reverseDependencies: ReadonlyMap<string, readonly string[]>;
  readonly danglingReferences: readonly DanglingReference[];
}

export class DependencyResolver {
  /**
   * Index nodes by ID.
   *
   * @throws GraphError(DuplicateNode) on the first repeated ID
   */
  static indexNodes(nodes: readonly FlowNodeDefinition[]): Map<string, FlowNodeDefinition> {
    const nodeMap = new Map<string, FlowNodeDefinition>();
    for (const node of nodes) {
      if (nodeMap.has(node.id)) {
        throw GraphError.duplicateNode(node.id);
      }
      nodeMap.set(node.id, node);
    }
    return nodeMap;
  }

  /**
   * Build the dependency graph. A node referencing itself produces a
   * self-edge, which CycleDetector reports as a cycle.
   */
  static resolve(nodes: readonly FlowNodeDefinition[]): DependencyGraph {
    const nodeMap = this.indexNodes(nodes);

    const edges: DependencyEdge[] = [];
    const danglingReferences: DanglingReference[] = [];
    const adjacencyList = new Map<string, string[]>();
    const reverseDependencies = new Map<string, string[]>();

    for (const id of nodeMap.keys()) {
      adjacencyList.set(id, []);
      reverseDependencies.set(id, []);
    }

    for (const node of nodeMap.values()) {
      const dependencies = adjacencyList.get(node.id) ?? [];

      for (const [binding, value] of Object.entries(node.inputBindings ?? {})) {
        if (value.kind !== 'reference') {
          continue;
        }

        const source = value.sourceNodeId;
        if (!nodeMap.has(source)) {
          danglingReferences.push({ nodeId: node.id, binding, sourceNodeId: source });
          continue;
        }

        edges.push({ from: node.id, to: source, binding });

        if (!dependencies.includes(source)) {
          dependencies.push(source);
          reverseDependencies.get(source)?.push(node.id);
        }
      }
    }

    const frozenAdjacency = new Map<string, readonly string[]>();
    for (const [id, deps] of adjacencyList) {
      frozenAdjacency.set(id, Object.freeze([...deps]));
    }

    const frozenReverse = new Map<string, readonly string[]>();
    for (const [id, dependents] of reverseDependencies) {
      frozenReverse.set(id, Object.freeze([...dependents]));
    }

    return {
      nodes: nodeMap,
      edges: Object.freeze(edges),
      adjacencyList: frozenAdjacency,
      reverseDependencies: frozenReverse,
      danglingReferences: Object.freeze(danglingReferences),
    };
  }

  /**
   * Nodes with no dependencies
   */
  static getEntryPoints(graph: DependencyGraph): string[] {
    return Array.from(graph.adjacencyList)
      .filter(([, deps]) => deps.length === 0)
      .map(([id]) => id);
  }

  /**
   * Nodes nothing depends on
   */
  static getExitPoints(graph: DependencyGraph): string[] {
    return Array.from(graph.reverseDependencies)
      .filter(([, dependents]) => dependents.length === 0)
      .map(([id]) => id);
  }

  /**
   * Number of dependencies per node
   */
  static calculateInDegrees(graph: DependencyGraph): Map<string, number> {
    const inDegrees = new Map<string, number>();
    for (const [id, deps] of graph.adjacencyList) {
      inDegrees.set(id, deps.length);
    }
    return inDegrees;
  }
}
