import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, afterEach, beforeAll, describe, it, expect } from 'vitest';
import {
  CancelledError,
  ConfigError,
  EngineLogger,
  ExecutionError,
  ExitCodes,
  LogLevel,
  LoggerManager,
  RunStatus,
  TimeoutError,
  silentSink,
} from '@capflow/engine';
import { parseKeyValuePairs } from '../types/CliRunOptions.js';
import { exitCodeForError, exitCodeForStatus } from './exit.js';
import { divider, formatDuration, plural } from './format.js';
import { collectInputs, readInputsFile } from './inputs.js';
import { cliLogLevel } from './logger.js';
import { createRuntime } from './runtime.js';

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), 'capflow-cli-'));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

function write(name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('parseKeyValuePairs', () => {
  it('splits on the first equals sign and trims', () => {
    expect(parseKeyValuePairs([' audio = aGk= ', 'lang=en-US', 'lang=fr-FR'])).toEqual({
      audio: 'aGk=',
      lang: 'fr-FR',
    });
  });

  it('keeps empty values', () => {
    expect(parseKeyValuePairs(['note='])).toEqual({ note: '' });
  });

  it('rejects a pair without a key or an equals sign', () => {
    expect(() => parseKeyValuePairs(['oops'])).toThrow('Invalid key=value format: oops');
    expect(() => parseKeyValuePairs(['=value'])).toThrow('Empty key in: =value');
  });
});

describe('format helpers', () => {
  it.each([
    [0, '0ms'],
    [850, '850ms'],
    [1520, '1.5s'],
    [75_000, '1m 15s'],
  ])('formatDuration(%s) is %s', (ms, text) => {
    expect(formatDuration(ms)).toBe(text);
  });

  it('pluralizes and draws dividers', () => {
    expect(plural(1, 'node')).toBe('1 node');
    expect(plural(3, 'node')).toBe('3 nodes');
    expect(divider(3, '=')).toBe('===');
  });
});

describe('exit codes', () => {
  it.each([
    [RunStatus.SUCCEEDED, ExitCodes.SUCCESS],
    [RunStatus.PARTIAL, ExitCodes.RUN_FAILED],
    [RunStatus.FAILED, ExitCodes.RUN_FAILED],
    [RunStatus.TIMED_OUT, ExitCodes.TIMED_OUT],
    [RunStatus.CANCELLED, ExitCodes.CANCELLED],
  ] as const)('%s exits with %s', (status, code) => {
    expect(exitCodeForStatus(status)).toBe(code);
  });

  it('takes error exit codes from the error', () => {
    expect(exitCodeForError(ConfigError.single('run', 'input', 'bad'))).toBe(ExitCodes.INVALID_INPUT);
    expect(exitCodeForError(new ExecutionError('boom'))).toBe(ExitCodes.RUN_FAILED);
    expect(exitCodeForError(new TimeoutError(5))).toBe(ExitCodes.TIMED_OUT);
    expect(exitCodeForError(new CancelledError())).toBe(ExitCodes.CANCELLED);
    expect(exitCodeForError(new Error('bug'))).toBe(ExitCodes.INTERNAL_ERROR);
  });
});

describe('run inputs', () => {
  it('reads YAML and JSON input files', async () => {
    expect(await readInputsFile(write('inputs.yaml', 'audio: aGk=\nlang: en-US\n'))).toEqual({
      audio: 'aGk=',
      lang: 'en-US',
    });
    expect(await readInputsFile(write('inputs.json', '{"count": 2}'))).toEqual({ count: 2 });
    expect(await readInputsFile(write('blank.yaml', ''))).toEqual({});
  });

  it('rejects input files that are not mappings', async () => {
    const path = write('list.yaml', '- a\n');
    await expect(readInputsFile(path)).rejects.toThrow(`Failed to parse ${path}: inputs must be a mapping`);
  });

  it('lets --input pairs override file values', async () => {
    const inputsFile = write('merge.yaml', 'audio: from-file\nlang: en-US\n');
    expect(await collectInputs({ inputsFile, input: ['audio=from-flag'] })).toEqual({
      audio: 'from-flag',
      lang: 'en-US',
    });
  });

  it('reports a malformed pair as a config error', async () => {
    const pending = collectInputs({ input: ['oops'] });
    await expect(pending).rejects.toBeInstanceOf(ConfigError);
    await expect(pending).rejects.toThrow('Invalid run config: input: Invalid key=value format: oops');
  });
});

describe('createRuntime', () => {
  afterEach(() => {
    LoggerManager.reset();
  });

  it('registers the built-in capabilities with loopback config', async () => {
    const { registry, engineConfig } = createRuntime(undefined);

    expect(registry.getIds()).toEqual(['core.asr', 'core.chat', 'core.tts']);
    expect(engineConfig).toEqual({});
    await expect(registry.getExecutor('core.chat')).resolves.toMatchObject({ capabilityId: 'core.chat' });
    await registry.closeAll();
  });

  it('reads the engine section of a config file', () => {
    const path = write('capflow.yaml', 'engine:\n  concurrency: 2\n  historyLimit: 3\n');
    expect(createRuntime(path).engineConfig).toEqual({ concurrency: 2, historyLimit: 3 });
  });

  it('logs at the engine.logLevel of the config file', () => {
    const path = write('info.yaml', 'engine:\n  logLevel: info\n');
    const { logger, engineConfig } = createRuntime(path, { format: 'human', color: false });

    expect(engineConfig.logLevel).toBe(LogLevel.INFO);
    expect(logger).toBeInstanceOf(EngineLogger);
    expect(logger instanceof EngineLogger && logger.getConfig().level).toBe(LogLevel.INFO);
  });

  it('stays silent without output options or under the null format', () => {
    expect(createRuntime(undefined).logger).toBe(silentSink);
    expect(createRuntime(undefined, { format: 'null', verbose: true }).logger).toBe(silentSink);
  });

  it('rejects an invalid engine section', () => {
    const path = write('bad-engine.yaml', 'engine:\n  concurrency: 0\n');
    expect(() => createRuntime(path)).toThrow(/^Invalid engine config: concurrency: /);
  });
});

describe('cliLogLevel', () => {
  it('is silent for the null format and chatty only when verbose', () => {
    expect(cliLogLevel({ format: 'null', verbose: true })).toBe(LogLevel.SILENT);
    expect(cliLogLevel({ format: 'human' })).toBe(LogLevel.WARN);
    expect(cliLogLevel({ format: 'json', verbose: true })).toBe(LogLevel.DEBUG);
  });

  it('uses the configured level unless verbose or silent', () => {
    expect(cliLogLevel({ format: 'human' }, LogLevel.INFO)).toBe(LogLevel.INFO);
    expect(cliLogLevel({ format: 'human', verbose: true }, LogLevel.ERROR)).toBe(LogLevel.DEBUG);
    expect(cliLogLevel({ format: 'null' }, LogLevel.DEBUG)).toBe(LogLevel.SILENT);
  });
});
