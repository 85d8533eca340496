import { describe, it, expect } from 'vitest';
import { CapflowError, toError } from './CapflowError.js';
import { ConfigError, formatIssuePath } from './ConfigError.js';
import { CapflowErrorCode, ErrorSeverity, getErrorCategory, getExitCodeForError } from './ErrorCodes.js';
import { CancelledError, ExecutionError, TimeoutError, cancellationFromSignal } from './ExecutionErrors.js';
import { ExitCodes } from './ExitCodes.js';
import { GraphError } from './GraphError.js';
import { ConflictError, InitError } from './RegistryErrors.js';

describe('CapflowError', () => {
  it('fills the hint and exit code from the error code', () => {
    const error = GraphError.danglingReference('n', 'b', 's');

    expect(error.name).toBe('GraphError');
    expect(error.hint).toBe('Point sourceNodeId at a node defined in the same flow');
    expect(error.exitCode).toBe(ExitCodes.INVALID_INPUT);
    expect(error.isUserError).toBe(true);
    expect(error.category).toBe('Graph Error');
    expect(error.toString()).toBe(
      "GraphError [CFW-G-003] at nodes.n.inputBindings.b: Node 'n' input 'b' references missing node 's'\n" +
        'Hint: Point sourceNodeId at a node defined in the same flow'
    );
  });

  it('serializes to JSON with its cause message', () => {
    const error = new InitError('loopback-chat', new Error('socket closed'));
    const json = error.toJSON();

    expect(json).toMatchObject({
      name: 'InitError',
      code: CapflowErrorCode.PROVIDER_INIT_FAILED,
      exitCode: ExitCodes.INTERNAL_ERROR,
      message: "Provider 'loopback-chat' failed to initialize: socket closed",
      severity: ErrorSeverity.ERROR,
      cause: 'socket closed',
    });
    expect(error.isRetryable).toBe(true);
  });

  it('includes every diagnostic field in the detailed rendering', () => {
    const detailed = new ConflictError('core.chat').toDetailedString();
    expect(detailed).toContain('Error Code:    CFW-R-001');
    expect(detailed).toContain('   capabilityId: "core.chat"');
  });

  it('lets an explicit exit code win', () => {
    const error = new CapflowError({
      code: CapflowErrorCode.CONFIG_INVALID,
      message: 'custom',
      severity: ErrorSeverity.WARNING,
      exitCode: ExitCodes.RUN_FAILED,
    });
    expect(error.exitCode).toBe(ExitCodes.RUN_FAILED);
  });

  it('toError wraps non-errors', () => {
    const original = new Error('x');
    expect(toError(original)).toBe(original);
    expect(toError(42).message).toBe('42');
  });
});

describe('exit code mapping', () => {
  it.each([
    [CapflowErrorCode.CONFIG_INVALID, ExitCodes.INVALID_INPUT],
    [CapflowErrorCode.GRAPH_CYCLE_DETECTED, ExitCodes.INVALID_INPUT],
    [CapflowErrorCode.EXECUTION_FAILED, ExitCodes.RUN_FAILED],
    [CapflowErrorCode.EXECUTION_TIMEOUT, ExitCodes.TIMED_OUT],
    [CapflowErrorCode.EXECUTION_CANCELLED, ExitCodes.CANCELLED],
    [CapflowErrorCode.PROVIDER_INIT_FAILED, ExitCodes.INTERNAL_ERROR],
  ])('%s exits with %s', (code, exit) => {
    expect(getExitCodeForError(code)).toBe(exit);
  });

  it('names categories by prefix', () => {
    expect(getErrorCategory(CapflowErrorCode.DEFINITION_INVALID)).toBe('Definition Error');
    expect(getErrorCategory(CapflowErrorCode.REGISTRY_NOT_FOUND)).toBe('Registry Error');
  });
});

describe('ConfigError', () => {
  it('summarizes every violation', () => {
    const error = new ConfigError('loopback-tts', [
      { field: 'speed', message: 'too fast' },
      { field: 'format', message: 'unknown' },
    ]);
    expect(error.message).toBe('Invalid loopback-tts config: speed: too fast; format: unknown');
    expect(error.fields).toEqual(['speed', 'format']);
  });

  it('formats issue paths', () => {
    expect(formatIssuePath(['nodes', 2, 'inputBindings', 'text'])).toBe('nodes[2].inputBindings.text');
    expect(formatIssuePath([])).toBe('');
  });
});

describe('execution errors', () => {
  it('a timeout is a cancellation', () => {
    const error = new TimeoutError(250);
    expect(error).toBeInstanceOf(CancelledError);
    expect(error.timeoutMs).toBe(250);
    expect(error.exitCode).toBe(ExitCodes.TIMED_OUT);
  });

  it('wrap keeps the message of anything thrown', () => {
    expect(ExecutionError.wrap('plain string').message).toBe('plain string');
    expect(ExecutionError.wrap(new TypeError('bad type'), { nodeId: 'n' }).path).toBe('nodes.n');
  });

  it('cancellationFromSignal reuses or derives the reason', () => {
    const own = new CancelledError('own');
    const reuse = new AbortController();
    reuse.abort(own);
    expect(cancellationFromSignal(reuse.signal)).toBe(own);

    const fromError = new AbortController();
    fromError.abort(new Error('gone'));
    expect(cancellationFromSignal(fromError.signal).message).toBe('gone');

    const fromText = new AbortController();
    fromText.abort('bye');
    expect(cancellationFromSignal(fromText.signal).message).toBe('bye');

    const empty = new AbortController();
    empty.abort('');
    expect(cancellationFromSignal(empty.signal).message).toBe('Execution cancelled');
  });
});
