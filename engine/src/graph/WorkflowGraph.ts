/**
 * WorkflowGraph
 *
 * A validated, immutable flow. Built once with `WorkflowGraph.build` and
 * reusable across any number of runs.
 *
 * Validation order:
 * 1. Duplicate node IDs
 * 2. Unknown capabilities
 * 3. Cycles
 * 4. References to missing nodes
 * 5. Flow settings
 *
 * The first problem found is thrown; nothing runs on an invalid flow.
 * Node config and bindings are copied and frozen, so later changes to the
 * definition don't reach the graph.
 */

import { ConfigError } from '../errors/ConfigError.js';
import { GraphError } from '../errors/GraphError.js';
import { flowSettingsSchema } from '../parser/FlowParser.js';
import {
  frozenCopy,
  type FlowDefinition,
  type FlowNodeDefinition,
  type FlowSettings,
  type InputBinding,
  type JsonObject,
} from '../types/core-types.js';
import { CycleDetector } from './CycleDetector.js';
import { DependencyResolver, type DependencyGraph } from './DependencyResolver.js';
import { TopologicalSorter, type TopologicalSortResult } from './TopologicalSorter.js';

/**
 * What graph validation needs from a registry
 */
export interface CapabilityLookup {
  has(capabilityId: string): boolean;
  getIds(): string[];
}

export interface WorkflowNode {
  readonly id: string;
  readonly capabilityId: string;
  readonly config: Readonly<JsonObject>;
  readonly inputBindings: Readonly<Record<string, InputBinding>>;
}

export class WorkflowGraph {
  readonly id: string;
  readonly name?: string;
  readonly description?: string;
  readonly settings: Readonly<FlowSettings>;

  private readonly nodes: ReadonlyMap<string, WorkflowNode>;
  private readonly dependencies: DependencyGraph;
  private readonly order: TopologicalSortResult;

  private constructor(
    definition: FlowDefinition,
    settings: FlowSettings,
    nodes: ReadonlyMap<string, WorkflowNode>,
    dependencies: DependencyGraph,
    order: TopologicalSortResult
  ) {
    this.id = definition.id;
    this.name = definition.name;
    this.description = definition.description;
    this.settings = settings;
    this.nodes = nodes;
    this.dependencies = dependencies;
    this.order = order;
    Object.freeze(this);
  }

  /**
   * Validate a flow definition against the registry.
   *
   * @throws GraphError on the first structural problem
   * @throws ConfigError for invalid flow settings
   */
  static build(definition: FlowDefinition, registry: CapabilityLookup): WorkflowGraph {
    const definitions: FlowNodeDefinition[] = definition.nodes.map(node => ({
      id: node.id,
      capabilityId: node.capabilityId,
      config: frozenCopy(node.config ?? {}),
      inputBindings: frozenCopy(node.inputBindings ?? {}),
    }));

    DependencyResolver.indexNodes(definitions);

    for (const node of definitions) {
      if (!registry.has(node.capabilityId)) {
        throw GraphError.unknownCapability(node.id, node.capabilityId, registry.getIds());
      }
    }

    const dependencies = DependencyResolver.resolve(definitions);

    CycleDetector.detectAndThrow(dependencies);

    const [dangling] = dependencies.danglingReferences;
    if (dangling) {
      throw GraphError.danglingReference(dangling.nodeId, dangling.binding, dangling.sourceNodeId);
    }

    const settings = flowSettingsSchema.safeParse(definition.settings ?? {});
    if (!settings.success) {
      throw ConfigError.fromZodError(`flow '${definition.id}' settings`, settings.error);
    }

    const order = TopologicalSorter.sort(dependencies);

    const nodes = new Map<string, WorkflowNode>();
    for (const node of definitions) {
      nodes.set(node.id, Object.freeze({
        id: node.id,
        capabilityId: node.capabilityId,
        config: node.config ?? {},
        inputBindings: node.inputBindings ?? {},
      }));
    }

    return new WorkflowGraph(definition, Object.freeze(settings.data), nodes, dependencies, order);
  }

  get size(): number {
    return this.nodes.size;
  }

  getNode(nodeId: string): WorkflowNode | undefined {
    return this.nodes.get(nodeId);
  }

  /**
   * Nodes in definition order
   */
  getNodes(): WorkflowNode[] {
    return Array.from(this.nodes.values());
  }

  getNodeIds(): string[] {
    return Array.from(this.nodes.keys());
  }

  /**
   * Nodes whose outputs `nodeId` reads
   */
  getDependencies(nodeId: string): readonly string[] {
    return this.dependencies.adjacencyList.get(nodeId) ?? [];
  }

  /**
   * Nodes that read outputs of `nodeId`
   */
  getDependents(nodeId: string): readonly string[] {
    return this.dependencies.reverseDependencies.get(nodeId) ?? [];
  }

  getEntryPoints(): string[] {
    return DependencyResolver.getEntryPoints(this.dependencies);
  }

  getExitPoints(): string[] {
    return DependencyResolver.getExitPoints(this.dependencies);
  }

  /**
   * Kahn phases: every node depends only on nodes of earlier phases
   */
  getPhases(): readonly (readonly string[])[] {
    return this.order.phases;
  }

  getPhaseOf(nodeId: string): number | undefined {
    return this.order.nodePhases.get(nodeId);
  }
}
