import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { CapabilityRegistry } from '../capabilities/CapabilityRegistry.js';
import { DefinitionError } from '../errors/DefinitionError.js';
import { CapflowErrorCode } from '../errors/ErrorCodes.js';
import { WorkflowGraph } from '../graph/WorkflowGraph.js';
import { registerBuiltinCapabilities } from '../providers/index.js';
import { ref, runInput } from '../types/core-types.js';
import { DEFAULT_CONVERSATION_FLOW_ID, createDefaultConversationFlow } from './DefaultFlows.js';
import { FlowLoader, detectFlowFormat } from './FlowLoader.js';

const GREETING_YAML = `
id: greet
name: Greeting
settings:
  concurrency: 2
nodes:
  - id: chat
    capabilityId: core.chat
    inputBindings:
      text: { input: prompt }
  - id: speak
    capabilityId: core.tts
    config:
      voice: calm
    inputBindings:
      text: { sourceNodeId: chat, outputKey: text }
`;

const GREETING = {
  id: 'greet',
  name: 'Greeting',
  settings: { concurrency: 2 },
  nodes: [
    { id: 'chat', capabilityId: 'core.chat', inputBindings: { text: runInput('prompt') } },
    { id: 'speak', capabilityId: 'core.tts', config: { voice: 'calm' }, inputBindings: { text: ref('chat', 'text') } },
  ],
};

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), 'capflow-loader-'));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeFixture(name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content, 'utf-8');
  return path;
}

async function loadError(path: string): Promise<DefinitionError> {
  try {
    await FlowLoader.fromFile(path);
  } catch (error) {
    if (error instanceof DefinitionError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected DefinitionError');
}

describe('detectFlowFormat', () => {
  it('maps extensions to formats', () => {
    expect(detectFlowFormat('a.yaml')).toBe('yaml');
    expect(detectFlowFormat('a.YML')).toBe('yaml');
    expect(detectFlowFormat('a.json')).toBe('json');
    expect(detectFlowFormat('a.flow')).toBeUndefined();
  });
});

describe('FlowLoader.fromFile', () => {
  it('loads a YAML flow', async () => {
    const path = writeFixture('greet.yaml', GREETING_YAML);
    expect(await FlowLoader.fromFile(path)).toEqual(GREETING);
  });

  it('loads a JSON flow', async () => {
    const path = writeFixture('greet.json', JSON.stringify({
      id: 'greet',
      name: 'Greeting',
      settings: { concurrency: 2 },
      nodes: [
        { id: 'chat', capabilityId: 'core.chat', inputBindings: { text: { input: 'prompt' } } },
        {
          id: 'speak',
          capabilityId: 'core.tts',
          config: { voice: 'calm' },
          inputBindings: { text: { sourceNodeId: 'chat', outputKey: 'text' } },
        },
      ],
    }));
    expect(await FlowLoader.fromFile(path)).toEqual(GREETING);
  });

  it('decodes files with other extensions', async () => {
    const path = writeFixture('greet.flow', GREETING_YAML);
    expect((await FlowLoader.fromFile(path)).id).toBe('greet');
  });

  it('reports a missing file', async () => {
    const path = join(dir, 'absent.yaml');
    const error = await loadError(path);
    expect(error.code).toBe(CapflowErrorCode.DEFINITION_FILE_NOT_FOUND);
    expect(error.message).toBe(`File not found: ${path}`);
  });

  it('reports malformed YAML', async () => {
    const path = writeFixture('broken.yaml', 'id: [unclosed\n');
    const error = await loadError(path);
    expect(error.code).toBe(CapflowErrorCode.DEFINITION_PARSE_ERROR);
    expect(error.message.startsWith(`Failed to parse ${path}: `)).toBe(true);
  });

  it('reports malformed JSON', async () => {
    const path = writeFixture('broken.json', '{"id": ');
    const error = await loadError(path);
    expect(error.code).toBe(CapflowErrorCode.DEFINITION_PARSE_ERROR);
  });

  it('reports a document of the wrong shape with the file name', async () => {
    const path = writeFixture('shape.yaml', 'id: x\nnodes:\n  - id: a\n');
    const error = await loadError(path);
    expect(error.code).toBe(CapflowErrorCode.DEFINITION_INVALID);
    expect(error.message).toBe(`Invalid ${path} at nodes[0].capabilityId: Required`);
  });
});

describe('FlowLoader text sources', () => {
  it('parses YAML and JSON strings', () => {
    expect(FlowLoader.fromYAML(GREETING_YAML)).toEqual(GREETING);
    expect(FlowLoader.fromJSON('{"id":"e","nodes":[]}')).toEqual({ id: 'e', nodes: [] });
  });

  it('names the default sources in errors', () => {
    expect(() => FlowLoader.fromYAML('just text')).toThrow('Invalid YAML content: Expected object, received string');
    expect(() => FlowLoader.fromJSON('{bad')).toThrow(/^Failed to parse JSON content: /);
    expect(() => FlowLoader.fromObject({ id: 'x' })).toThrow('Invalid flow object at nodes: Required');
  });
});

describe('createDefaultConversationFlow', () => {
  it('chains speech recognition, chat and speech synthesis', () => {
    const registry = new CapabilityRegistry();
    registerBuiltinCapabilities(registry);
    const graph = WorkflowGraph.build(createDefaultConversationFlow(), registry);

    expect(graph.id).toBe(DEFAULT_CONVERSATION_FLOW_ID);
    expect(graph.getPhases()).toEqual([['asr'], ['llm'], ['tts']]);
    expect(graph.getNode('asr')?.inputBindings).toEqual({ audio: runInput('audio') });
  });

  it('returns a fresh definition on every call', () => {
    expect(createDefaultConversationFlow()).not.toBe(createDefaultConversationFlow());
  });
});
