import { describe, it, expect } from 'vitest';
import { DefinitionError } from '../errors/DefinitionError.js';
import { CapflowErrorCode } from '../errors/ErrorCodes.js';
import { literal, ref, runInput, type FlowDefinition } from '../types/core-types.js';
import { FlowParser, fromBinding, toBinding } from './FlowParser.js';

function parseError(raw: unknown): DefinitionError {
  try {
    FlowParser.parse(raw);
  } catch (error) {
    if (error instanceof DefinitionError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected DefinitionError');
}

describe('toBinding', () => {
  it('decodes the binding shorthands', () => {
    expect(toBinding({ sourceNodeId: 'asr', outputKey: 'text' })).toEqual(ref('asr', 'text'));
    expect(toBinding({ input: 'audio' })).toEqual(runInput('audio'));
    expect(toBinding({ literal: { input: 'audio' } })).toEqual(literal({ input: 'audio' }));
    expect(toBinding({ literal: null })).toEqual(literal(null));
  });

  it('takes anything else as a literal', () => {
    expect(toBinding('hello')).toEqual(literal('hello'));
    expect(toBinding(0.5)).toEqual(literal(0.5));
    expect(toBinding([1, 2])).toEqual(literal([1, 2]));
    expect(toBinding({ sourceNodeId: 'asr', outputKey: 5 })).toEqual(
      literal({ sourceNodeId: 'asr', outputKey: 5 })
    );
    expect(toBinding({ input: 'audio', extra: true })).toEqual(literal({ input: 'audio', extra: true }));
  });
});

describe('fromBinding', () => {
  it('wraps literals that would read back as another binding', () => {
    expect(fromBinding(literal({ input: 'audio' }))).toEqual({ literal: { input: 'audio' } });
    expect(fromBinding(literal({ literal: 1 }))).toEqual({ literal: { literal: 1 } });
  });

  it('leaves plain literals bare', () => {
    expect(fromBinding(literal('hi'))).toBe('hi');
    expect(fromBinding(literal({ temperature: 1 }))).toEqual({ temperature: 1 });
  });

  it('encodes references and run inputs', () => {
    expect(fromBinding(ref('a', 'b'))).toEqual({ sourceNodeId: 'a', outputKey: 'b' });
    expect(fromBinding(runInput('audio'))).toEqual({ input: 'audio' });
  });
});

describe('FlowParser.parse', () => {
  it('parses a complete document', () => {
    const definition = FlowParser.parse({
      id: 'greet',
      name: 'Greeting',
      description: 'Say hello',
      settings: { concurrency: 2, timeoutMs: 5000 },
      nodes: [
        { id: 'chat', capabilityId: 'core.chat', config: { model: 'm1' }, inputBindings: { text: { input: 'prompt' } } },
        { id: 'speak', capabilityId: 'core.tts', inputBindings: { text: { sourceNodeId: 'chat', outputKey: 'text' } } },
      ],
    });

    const expected: FlowDefinition = {
      id: 'greet',
      name: 'Greeting',
      description: 'Say hello',
      settings: { concurrency: 2, timeoutMs: 5000 },
      nodes: [
        { id: 'chat', capabilityId: 'core.chat', config: { model: 'm1' }, inputBindings: { text: runInput('prompt') } },
        { id: 'speak', capabilityId: 'core.tts', inputBindings: { text: ref('chat', 'text') } },
      ],
    };
    expect(definition).toEqual(expected);
  });

  it('reports a missing field with its path', () => {
    const error = parseError({ nodes: [] });
    expect(error.code).toBe(CapflowErrorCode.DEFINITION_INVALID);
    expect(error.message).toBe('Invalid flow definition at id: Required');
    expect(error.path).toBe('id');
  });

  it('reports an empty capability ID inside a node', () => {
    const error = parseError({ id: 'f', nodes: [{ id: 'a', capabilityId: '' }] });
    expect(error.message).toBe('Invalid flow definition at nodes[0].capabilityId: capabilityId must not be empty');
  });

  it('rejects unknown top-level keys', () => {
    const error = parseError({ id: 'f', nodes: [], steps: [] });
    expect(error.message).toBe("Invalid flow definition: Unrecognized key(s) in object: 'steps'");
  });

  it('rejects a non-positive concurrency setting', () => {
    const error = parseError({ id: 'f', nodes: [], settings: { concurrency: 0 } });
    expect(error.path).toBe('settings.concurrency');
  });

  it('names the source in the message', () => {
    expect(() => FlowParser.parse('nope', 'flows/a.yaml')).toThrow(
      'Invalid flows/a.yaml: Expected object, received string'
    );
  });

  it('isValid mirrors parse', () => {
    expect(FlowParser.isValid({ id: 'f', nodes: [] })).toBe(true);
    expect(FlowParser.isValid({ id: '', nodes: [] })).toBe(false);
  });
});

describe('FlowParser.toDocument', () => {
  it('produces a document that parses back to the same definition', () => {
    const definition: FlowDefinition = {
      id: 'round',
      settings: { timeoutMs: 1000 },
      nodes: [
        { id: 'a', capabilityId: 'x', inputBindings: { v: literal({ input: 'not-a-run-input' }) } },
        { id: 'b', capabilityId: 'x', config: { n: 1 }, inputBindings: { v: ref('a', 'v'), w: runInput('w') } },
      ],
    };

    const document = FlowParser.toDocument(definition);

    expect(document).toEqual({
      id: 'round',
      settings: { timeoutMs: 1000 },
      nodes: [
        { id: 'a', capabilityId: 'x', inputBindings: { v: { literal: { input: 'not-a-run-input' } } } },
        {
          id: 'b',
          capabilityId: 'x',
          config: { n: 1 },
          inputBindings: { v: { sourceNodeId: 'a', outputKey: 'v' }, w: { input: 'w' } },
        },
      ],
    });
    expect(FlowParser.parse(document)).toEqual(definition);
  });
});
