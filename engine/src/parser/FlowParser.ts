/**
 * Flow Parser
 *
 * Turns a raw document (already decoded from YAML or JSON) into a
 * FlowDefinition. Only the document shape is checked here; capability
 * IDs, cycles and references are WorkflowGraph's concern.
 *
 * Binding shorthand in documents:
 * - `{ sourceNodeId: a, outputKey: text }` reads another node's output
 * - `{ input: audio }` reads a run input
 * - `{ literal: X }` is X, whatever its shape
 * - anything else is taken as it is
 *
 * @module parser
 */

import { z } from 'zod';
import { DefinitionError } from '../errors/DefinitionError.js';
import {
  isJsonObject,
  literal,
  ref,
  runInput,
  type FlowDefinition,
  type InputBinding,
  type JsonObject,
  type JsonValue,
} from '../types/core-types.js';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

function hasExactKeys(value: JsonObject, keys: readonly string[]): boolean {
  const actual = Object.keys(value);
  return actual.length === keys.length && keys.every(key => actual.includes(key));
}

/**
 * Decode one binding from its document form
 */
export function toBinding(value: JsonValue): InputBinding {
  if (!isJsonObject(value)) {
    return literal(value);
  }

  if (hasExactKeys(value, ['sourceNodeId', 'outputKey'])) {
    const { sourceNodeId, outputKey } = value;
    if (typeof sourceNodeId === 'string' && typeof outputKey === 'string') {
      return ref(sourceNodeId, outputKey);
    }
  }

  if (hasExactKeys(value, ['input']) && typeof value.input === 'string') {
    return runInput(value.input);
  }

  if (hasExactKeys(value, ['literal'])) {
    return literal(value.literal ?? null);
  }

  return literal(value);
}

/**
 * Encode a binding back to its document form
 */
export function fromBinding(binding: InputBinding): JsonValue {
  switch (binding.kind) {
    case 'reference':
      return { sourceNodeId: binding.sourceNodeId, outputKey: binding.outputKey };
    case 'input':
      return { input: binding.key };
    case 'literal': {
      const decoded = toBinding(binding.value);
      // Values that would read back as something else need the wrapper
      return decoded.kind === 'literal' && decoded.value === binding.value
        ? binding.value
        : { literal: binding.value };
    }
  }
}

const nodeSchema = z
  .object({
    id: z.string().min(1, 'node id must not be empty'),
    capabilityId: z.string().min(1, 'capabilityId must not be empty'),
    config: z.record(jsonValueSchema).optional(),
    inputBindings: z.record(jsonValueSchema.transform(toBinding)).optional(),
  })
  .strict();

/**
 * Per-flow scheduling overrides; also checked for flows built in code
 */
export const flowSettingsSchema = z
  .object({
    concurrency: z.number().int().min(1).optional(),
    timeoutMs: z.number().int().min(1).optional(),
  })
  .strict();

export const flowDocumentSchema = z
  .object({
    id: z.string().min(1, 'flow id must not be empty'),
    name: z.string().optional(),
    description: z.string().optional(),
    settings: flowSettingsSchema.optional(),
    nodes: z.array(nodeSchema),
  })
  .strict();

export class FlowParser {
  /**
   * @param source - Names the document in error messages
   * @throws DefinitionError(CFW-D-002) with the path of the first issue
   */
  static parse(raw: unknown, source = 'flow definition'): FlowDefinition {
    const result = flowDocumentSchema.safeParse(raw);
    if (!result.success) {
      throw DefinitionError.fromZodError(source, result.error);
    }
    return result.data;
  }

  static isValid(raw: unknown): boolean {
    return flowDocumentSchema.safeParse(raw).success;
  }

  /**
   * Plain document form of a definition, suitable for YAML or JSON output
   */
  static toDocument(definition: FlowDefinition): JsonObject {
    const doc: JsonObject = { id: definition.id };
    if (definition.name !== undefined) doc.name = definition.name;
    if (definition.description !== undefined) doc.description = definition.description;
    if (definition.settings) {
      const settings: JsonObject = {};
      if (definition.settings.concurrency !== undefined) settings.concurrency = definition.settings.concurrency;
      if (definition.settings.timeoutMs !== undefined) settings.timeoutMs = definition.settings.timeoutMs;
      doc.settings = settings;
    }

    doc.nodes = definition.nodes.map(node => {
      const out: JsonObject = { id: node.id, capabilityId: node.capabilityId };
      if (node.config) {
        out.config = { ...node.config };
      }
      if (node.inputBindings) {
        const bindings: JsonObject = {};
        for (const [name, binding] of Object.entries(node.inputBindings)) {
          bindings[name] = fromBinding(binding);
        }
        out.inputBindings = bindings;
      }
      return out;
    });

    return doc;
  }
}
