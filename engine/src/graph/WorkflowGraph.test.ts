import { describe, it, expect } from 'vitest';
import { ConfigError } from '../errors/ConfigError.js';
import { CapflowErrorCode } from '../errors/ErrorCodes.js';
import { GraphError, GraphErrorKind } from '../errors/GraphError.js';
import { literal, ref, runInput, type FlowDefinition, type FlowNodeDefinition } from '../types/core-types.js';
import { CycleDetector } from './CycleDetector.js';
import { DependencyResolver } from './DependencyResolver.js';
import { TopologicalSorter } from './TopologicalSorter.js';
import { WorkflowGraph, type CapabilityLookup } from './WorkflowGraph.js';

const KNOWN = ['test.echo', 'test.other'];
const lookup: CapabilityLookup = {
  has: id => KNOWN.includes(id),
  getIds: () => [...KNOWN],
};

function node(id: string, deps: string[] = [], capabilityId = 'test.echo'): FlowNodeDefinition {
  const inputBindings: Record<string, ReturnType<typeof ref>> = {};
  deps.forEach((dep, i) => {
    inputBindings[`in${i}`] = ref(dep, 'out');
  });
  return { id, capabilityId, inputBindings };
}

function flow(...nodes: FlowNodeDefinition[]): FlowDefinition {
  return { id: 'test-flow', nodes };
}

function buildError(definition: FlowDefinition): GraphError {
  try {
    WorkflowGraph.build(definition, lookup);
  } catch (error) {
    if (error instanceof GraphError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected GraphError');
}

describe('WorkflowGraph.build', () => {
  it('rejects an unknown capability', () => {
    const error = buildError(flow(node('a'), node('n', [], 'test.missing')));

    expect(error.kind).toBe(GraphErrorKind.UNKNOWN_CAPABILITY);
    expect(error.code).toBe(CapflowErrorCode.GRAPH_UNKNOWN_CAPABILITY);
    expect(error.message).toBe("Node 'n' uses unknown capability 'test.missing'");
    expect(error.path).toBe('nodes.n.capabilityId');
    expect(error.hint).toBe('Registered capabilities: test.echo, test.other');
    expect(error.nodeIds).toEqual(['n']);
  });

  it('reports a two-node cycle with its path', () => {
    const error = buildError(flow(node('A', ['B']), node('B', ['A'])));

    expect(error.kind).toBe(GraphErrorKind.CYCLE_DETECTED);
    expect(error.nodeIds).toEqual(['A', 'B', 'A']);
    expect(error.message).toBe('Circular dependency detected: A → B → A');
  });

  it('reports a longer cycle in traversal order', () => {
    const error = buildError(flow(node('A', ['B']), node('B', ['C']), node('C', ['A'])));
    expect(error.nodeIds).toEqual(['A', 'B', 'C', 'A']);
  });

  it('treats a self-reference as a cycle', () => {
    const error = buildError(flow(node('A', ['A'])));
    expect(error.kind).toBe(GraphErrorKind.CYCLE_DETECTED);
    expect(error.nodeIds).toEqual(['A', 'A']);
  });

  it('rejects a reference to a missing node', () => {
    const definition = flow({
      id: 'n',
      capabilityId: 'test.echo',
      inputBindings: { a: literal(1), b: ref('ghost', 'text') },
    });
    const error = buildError(definition);

    expect(error.kind).toBe(GraphErrorKind.DANGLING_REFERENCE);
    expect(error.code).toBe(CapflowErrorCode.GRAPH_DANGLING_REFERENCE);
    expect(error.message).toBe("Node 'n' input 'b' references missing node 'ghost'");
    expect(error.path).toBe('nodes.n.inputBindings.b');
  });

  it('rejects duplicate node IDs before anything else', () => {
    const error = buildError(flow(node('a', [], 'test.missing'), node('a')));
    expect(error.kind).toBe(GraphErrorKind.DUPLICATE_NODE);
    expect(error.message).toBe("Duplicate node ID 'a'");
  });

  it('reports an unknown capability before a cycle', () => {
    const error = buildError(flow(node('A', ['B']), node('B', ['A'], 'test.missing')));
    expect(error.kind).toBe(GraphErrorKind.UNKNOWN_CAPABILITY);
  });

  it('reports a cycle before a dangling reference', () => {
    const error = buildError(flow(node('A', ['B']), node('B', ['A']), node('C', ['ghost'])));
    expect(error.kind).toBe(GraphErrorKind.CYCLE_DETECTED);
  });

  it('accepts an empty flow', () => {
    const graph = WorkflowGraph.build(flow(), lookup);
    expect(graph.size).toBe(0);
    expect(graph.getPhases()).toEqual([]);
  });
});

describe('WorkflowGraph queries', () => {
  const diamond = WorkflowGraph.build(
    {
      id: 'diamond',
      name: 'Diamond',
      settings: { concurrency: 2 },
      nodes: [node('a'), node('b', ['a']), node('c', ['a'], 'test.other'), node('d', ['b', 'c'])],
    },
    lookup
  );

  it('groups nodes into phases', () => {
    expect(diamond.getPhases()).toEqual([['a'], ['b', 'c'], ['d']]);
    expect(diamond.getPhaseOf('d')).toBe(2);
    expect(diamond.getPhaseOf('nope')).toBeUndefined();
  });

  it('exposes dependencies in both directions', () => {
    expect(diamond.getDependencies('d')).toEqual(['b', 'c']);
    expect(diamond.getDependents('a')).toEqual(['b', 'c']);
    expect(diamond.getEntryPoints()).toEqual(['a']);
    expect(diamond.getExitPoints()).toEqual(['d']);
  });

  it('keeps flow metadata and node order', () => {
    expect(diamond.id).toBe('diamond');
    expect(diamond.name).toBe('Diamond');
    expect(diamond.settings).toEqual({ concurrency: 2 });
    expect(diamond.getNodeIds()).toEqual(['a', 'b', 'c', 'd']);
    expect(diamond.getNode('c')?.capabilityId).toBe('test.other');
  });

  it('is immutable', () => {
    expect(Object.isFrozen(diamond)).toBe(true);
    expect(Object.isFrozen(diamond.getNode('a'))).toBe(true);
    expect(Object.isFrozen(diamond.getNode('b')?.inputBindings)).toBe(true);
    expect(Object.isFrozen(diamond.getNode('b')?.inputBindings.in0)).toBe(true);
  });

  it('shares nothing with the definition it was built from', () => {
    const binding = { kind: 'reference' as const, sourceNodeId: 'a', outputKey: 'out' };
    const config = { nested: { v: 1 }, tags: ['x'] };
    const graph = WorkflowGraph.build(
      flow({ id: 'a', capabilityId: 'test.echo', config }, { id: 'b', capabilityId: 'test.echo', inputBindings: { in0: binding } }),
      lookup
    );

    binding.sourceNodeId = 'ghost';
    config.nested.v = 999;
    config.tags.push('y');

    expect(graph.getNode('b')?.inputBindings.in0).toEqual(ref('a', 'out'));
    expect(graph.getNode('a')?.config).toEqual({ nested: { v: 1 }, tags: ['x'] });
    expect(Object.isFrozen(graph.getNode('a')?.config.nested)).toBe(true);
    expect(graph.getDependencies('b')).toEqual(['a']);
  });

  it('records one edge per source even with several bindings to it', () => {
    const graph = WorkflowGraph.build(
      flow(node('a'), {
        id: 'b',
        capabilityId: 'test.echo',
        inputBindings: { x: ref('a', 'text'), y: ref('a', 'lang'), z: runInput('audio') },
      }),
      lookup
    );
    expect(graph.getDependencies('b')).toEqual(['a']);
    expect(graph.getDependents('a')).toEqual(['b']);
  });
});

describe('graph helpers', () => {
  it('DependencyResolver collects dangling references instead of throwing', () => {
    const deps = DependencyResolver.resolve([node('a', ['x']), node('b', ['a', 'y'])]);
    expect(deps.danglingReferences).toEqual([
      { nodeId: 'a', binding: 'in0', sourceNodeId: 'x' },
      { nodeId: 'b', binding: 'in1', sourceNodeId: 'y' },
    ]);
    expect(deps.edges).toEqual([{ from: 'b', to: 'a', binding: 'in0' }]);
  });

  it('CycleDetector reports no cycle for a chain', () => {
    const deps = DependencyResolver.resolve([node('a'), node('b', ['a']), node('c', ['b'])]);
    expect(CycleDetector.detect(deps)).toEqual({ hasCycle: false });
  });

  it('TopologicalSorter flattens phases into one order', () => {
    const deps = DependencyResolver.resolve([node('c', ['b']), node('b', ['a']), node('a')]);
    expect(TopologicalSorter.sortLinear(deps)).toEqual(['a', 'b', 'c']);
  });
});

describe('flow settings', () => {
  it('keeps valid settings', () => {
    const graph = WorkflowGraph.build({ ...flow(node('a')), settings: { concurrency: 3, timeoutMs: 500 } }, lookup);
    expect(graph.settings).toEqual({ concurrency: 3, timeoutMs: 500 });
    expect(Object.isFrozen(graph.settings)).toBe(true);
  });

  it.each([
    [{ concurrency: 0 }, 'concurrency'],
    [{ concurrency: 1.5 }, 'concurrency'],
    [{ timeoutMs: -1 }, 'timeoutMs'],
  ])('rejects %o', (settings, field) => {
    let failure: unknown;
    try {
      WorkflowGraph.build({ ...flow(node('a')), settings }, lookup);
    } catch (error) {
      failure = error;
    }
    expect(failure).toBeInstanceOf(ConfigError);
    expect(failure instanceof ConfigError && failure.fields).toEqual([field]);
    expect(failure instanceof ConfigError && failure.message).toMatch(
      new RegExp(`^Invalid flow 'test-flow' settings config: ${field}: `)
    );
  });
});
