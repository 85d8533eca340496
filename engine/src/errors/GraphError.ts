/**
 * Graph Errors
 *
 * Structural problems found while building a workflow graph. They surface
 * before any node runs and are never retried.
 *
 * @module errors
 */

import { CapflowError } from './CapflowError.js';
import { CapflowErrorCode, ErrorSeverity } from './ErrorCodes.js';

export enum GraphErrorKind {
  UNKNOWN_CAPABILITY = 'UnknownCapability',
  CYCLE_DETECTED = 'CycleDetected',
  DANGLING_REFERENCE = 'DanglingReference',
  DUPLICATE_NODE = 'DuplicateNode',
}

const KIND_CODES: Record<GraphErrorKind, CapflowErrorCode> = {
  [GraphErrorKind.UNKNOWN_CAPABILITY]: CapflowErrorCode.GRAPH_UNKNOWN_CAPABILITY,
  [GraphErrorKind.CYCLE_DETECTED]: CapflowErrorCode.GRAPH_CYCLE_DETECTED,
  [GraphErrorKind.DANGLING_REFERENCE]: CapflowErrorCode.GRAPH_DANGLING_REFERENCE,
  [GraphErrorKind.DUPLICATE_NODE]: CapflowErrorCode.GRAPH_DUPLICATE_NODE,
};

export class GraphError extends CapflowError {
  readonly kind: GraphErrorKind;

  /** Nodes involved, e.g. the cycle path or the node holding a bad reference */
  readonly nodeIds: readonly string[];

  private constructor(
    kind: GraphErrorKind,
    message: string,
    nodeIds: readonly string[],
    options: { path?: string; hint?: string; context?: Record<string, unknown> } = {}
  ) {
    super({
      code: KIND_CODES[kind],
      message,
      severity: ErrorSeverity.ERROR,
      path: options.path,
      hint: options.hint,
      context: { kind, nodeIds: [...nodeIds], ...options.context },
    });
    this.kind = kind;
    this.nodeIds = Object.freeze([...nodeIds]);
  }

  static unknownCapability(nodeId: string, capabilityId: string, available: readonly string[]): GraphError {
    return new GraphError(
      GraphErrorKind.UNKNOWN_CAPABILITY,
      `Node '${nodeId}' uses unknown capability '${capabilityId}'`,
      [nodeId],
      {
        path: `nodes.${nodeId}.capabilityId`,
        hint: available.length > 0 ? `Registered capabilities: ${available.join(', ')}` : undefined,
        context: { capabilityId },
      }
    );
  }

  /**
   * @param cyclePath - Nodes in traversal order, first node repeated at the end
   */
  static cycleDetected(cyclePath: readonly string[]): GraphError {
    return new GraphError(
      GraphErrorKind.CYCLE_DETECTED,
      `Circular dependency detected: ${cyclePath.join(' → ')}`,
      cyclePath
    );
  }

  static danglingReference(nodeId: string, binding: string, sourceNodeId: string): GraphError {
    return new GraphError(
      GraphErrorKind.DANGLING_REFERENCE,
      `Node '${nodeId}' input '${binding}' references missing node '${sourceNodeId}'`,
      [nodeId],
      {
        path: `nodes.${nodeId}.inputBindings.${binding}`,
        context: { sourceNodeId },
      }
    );
  }

  static duplicateNode(nodeId: string): GraphError {
    return new GraphError(
      GraphErrorKind.DUPLICATE_NODE,
      `Duplicate node ID '${nodeId}'`,
      [nodeId]
    );
  }
}
