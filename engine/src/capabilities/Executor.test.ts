import { describe, it, expect } from 'vitest';
import { ConfigError } from '../errors/ConfigError.js';
import { CapflowErrorCode } from '../errors/ErrorCodes.js';
import { CancelledError, ExecutionError } from '../errors/ExecutionErrors.js';
import { MockProvider } from '../testing/MockProvider.js';
import type { Provider } from './ProviderFactory.js';
import { BoundExecutor } from './Executor.js';

function throwingProvider(error: unknown): Provider {
  return {
    name: 'thrower',
    initialize: async () => undefined,
    close: async () => undefined,
    execute: () => {
      throw error;
    },
  };
}

describe('BoundExecutor', () => {
  it('passes config and inputs through to the provider', async () => {
    const provider = MockProvider.createSuccess('echo');
    const executor = new BoundExecutor('test.echo', provider);

    const output = await executor.execute(
      { signal: new AbortController().signal, nodeId: 'n', runId: 'r' },
      { mode: 'fast' },
      { text: 'hi' }
    );

    expect(output).toEqual({ text: 'hi' });
    expect(provider.getLastCall()).toMatchObject({ nodeId: 'n', runId: 'r', config: { mode: 'fast' } });
    expect(executor.providerName).toBe('echo');
  });

  it('refuses to start on an aborted signal', async () => {
    const provider = MockProvider.createSuccess('echo');
    const executor = new BoundExecutor('test.echo', provider);
    const controller = new AbortController();
    controller.abort('shutting down');

    await expect(executor.execute({ signal: controller.signal }, {}, {})).rejects.toThrow(
      new CancelledError('shutting down')
    );
    expect(provider.getCallCount()).toBe(0);
  });

  it('wraps a plain provider error and keeps its message', async () => {
    const executor = new BoundExecutor('test.fail', MockProvider.createFailure('fail', new Error('quota exceeded')));

    try {
      await executor.execute({ signal: new AbortController().signal, nodeId: 'n' }, {}, {});
      expect.fail('expected ExecutionError');
    } catch (error) {
      expect(error).toBeInstanceOf(ExecutionError);
      if (error instanceof ExecutionError) {
        expect(error.message).toBe('quota exceeded');
        expect(error.nodeId).toBe('n');
        expect(error.code).toBe(CapflowErrorCode.EXECUTION_FAILED);
        expect(error.diagnostic.context).toEqual({ nodeId: 'n', capabilityId: 'test.fail' });
        expect(error.cause).toEqual(new Error('quota exceeded'));
      }
    }
  });

  it('wraps a synchronous throw', async () => {
    const executor = new BoundExecutor('test.sync', throwingProvider('not an error object'));
    await expect(executor.execute({ signal: new AbortController().signal }, {}, {})).rejects.toThrow(
      'not an error object'
    );
  });

  it('rethrows engine errors unchanged', async () => {
    const original = ConfigError.single('p call', 'temperature', 'too high');
    const executor = new BoundExecutor('test.cfg', throwingProvider(original));

    await expect(executor.execute({ signal: new AbortController().signal }, {}, {})).rejects.toBe(original);
  });

  it('rejects with the abort reason when cancelled mid-call', async () => {
    const provider = new MockProvider({ name: 'stubborn', delay: 500, ignoreSignal: true });
    const executor = new BoundExecutor('test.slow', provider);
    const controller = new AbortController();
    const reason = new CancelledError('user left');

    const call = executor.execute({ signal: controller.signal }, {}, {});
    setTimeout(() => controller.abort(reason), 10);

    await expect(call).rejects.toBe(reason);
  });
});
