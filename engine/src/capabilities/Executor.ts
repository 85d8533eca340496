/**
 * Executor
 *
 * The invocation contract the engine calls for every node. A BoundExecutor
 * ties one provider instance to that contract and adds the cancellation and
 * error-wrapping behaviour every provider gets for free.
 *
 * @module capabilities
 */

import { CapflowError } from '../errors/CapflowError.js';
import { ExecutionError, cancellationFromSignal } from '../errors/ExecutionErrors.js';
import type { JsonObject } from '../types/core-types.js';
import type { LogSink } from '../types/log-types.js';
import type { Provider } from './ProviderFactory.js';

/**
 * Per-invocation context handed to the provider
 */
export interface InvocationContext {
  /** Aborted when the run is cancelled or times out */
  readonly signal: AbortSignal;
  readonly runId?: string;
  readonly nodeId?: string;
  readonly logger?: LogSink;
}

export interface Executor {
  readonly capabilityId: string;

  /**
   * Run the capability once.
   *
   * @param config - Per-node config overrides
   * @param inputs - Resolved node inputs
   * @throws CancelledError if the signal is aborted before or during the call
   * @throws ExecutionError wrapping any other provider failure
   */
  execute(context: InvocationContext, config: JsonObject, inputs: JsonObject): Promise<JsonObject>;
}

/**
 * Settle with `promise`, or reject with the cancellation error as soon as
 * `signal` aborts. The losing side is still observed, so a late rejection
 * from the provider is never unhandled.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(cancellationFromSignal(signal));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class BoundExecutor implements Executor {
  readonly capabilityId: string;
  private readonly provider: Provider;

  constructor(capabilityId: string, provider: Provider) {
    this.capabilityId = capabilityId;
    this.provider = provider;
  }

  get providerName(): string {
    return this.provider.name;
  }

  async execute(context: InvocationContext, config: JsonObject, inputs: JsonObject): Promise<JsonObject> {
    const { signal } = context;
    if (signal.aborted) {
      throw cancellationFromSignal(signal);
    }

    try {
      // async wrapper turns a synchronous throw into a rejection
      const call = (async () => this.provider.execute(context, config, inputs))();
      return await raceAbort(call, signal);
    } catch (error) {
      if (error instanceof CapflowError) {
        throw error;
      }
      if (signal.aborted) {
        throw cancellationFromSignal(signal);
      }
      throw ExecutionError.wrap(error, { nodeId: context.nodeId, capabilityId: this.capabilityId });
    }
  }
}
