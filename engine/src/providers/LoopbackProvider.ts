/**
 * Loopback provider base
 *
 * Shared plumbing for the built-in offline providers: lifecycle state,
 * per-call config overrides and input checks. Subclasses only implement
 * `run`, which must be deterministic for a given config and input.
 *
 * @module providers
 */

import type { z } from 'zod';
import type { InvocationContext } from '../capabilities/Executor.js';
import type { Provider, ProviderOptions } from '../capabilities/ProviderFactory.js';
import { ConfigError } from '../errors/ConfigError.js';
import { ExecutionError, cancellationFromSignal } from '../errors/ExecutionErrors.js';
import type { JsonObject } from '../types/core-types.js';
import { LogLevel, silentSink, type LogSink } from '../types/log-types.js';

type ProviderState = 'created' | 'ready' | 'closed';

export abstract class LoopbackProvider<TConfig extends object> implements Provider {
  abstract readonly name: string;

  protected readonly config: TConfig;
  protected readonly logger: LogSink;
  private readonly overrideSchema: z.ZodType<Partial<TConfig>, z.ZodTypeDef, unknown>;
  private state: ProviderState = 'created';

  /**
   * @param overrideSchema - Partial form of the factory schema, used for per-call config
   */
  constructor(
    config: TConfig,
    overrideSchema: z.ZodType<Partial<TConfig>, z.ZodTypeDef, unknown>,
    options: ProviderOptions
  ) {
    this.config = config;
    this.overrideSchema = overrideSchema;
    this.logger = options.logger ?? silentSink;
  }

  async initialize(): Promise<void> {
    if (this.state === 'closed') {
      throw new Error(`${this.name} provider has been closed`);
    }
    this.state = 'ready';
  }

  async execute(context: InvocationContext, config: JsonObject, inputs: JsonObject): Promise<JsonObject> {
    if (this.state !== 'ready') {
      throw new ExecutionError(`Provider '${this.name}' is ${this.state === 'closed' ? 'closed' : 'not initialized'}`, {
        nodeId: context.nodeId,
      });
    }
    if (context.signal.aborted) {
      throw cancellationFromSignal(context.signal);
    }

    const effective = this.resolveConfig(config);
    (context.logger ?? this.logger).log(LogLevel.DEBUG, `${this.name} invoked`, {
      nodeId: context.nodeId,
      runId: context.runId,
      inputs: Object.keys(inputs),
    });
    return this.run(effective, inputs, context);
  }

  async close(): Promise<void> {
    this.state = 'closed';
  }

  protected abstract run(config: TConfig, inputs: JsonObject, context: InvocationContext): JsonObject;

  /**
   * Merge per-call overrides over the provider config.
   *
   * @throws ConfigError if an override is out of range
   */
  protected resolveConfig(overrides: JsonObject): TConfig {
    if (Object.keys(overrides).length === 0) {
      return this.config;
    }
    const parsed = this.overrideSchema.safeParse(overrides);
    if (!parsed.success) {
      throw ConfigError.fromZodError(`${this.name} call`, parsed.error);
    }
    return { ...this.config, ...parsed.data };
  }

  protected requireString(inputs: JsonObject, key: string, context: InvocationContext): string {
    const value = inputs[key];
    if (typeof value !== 'string') {
      throw new ExecutionError(`${this.name}: input '${key}' must be a string`, { nodeId: context.nodeId });
    }
    return value;
  }
}

export function countWords(text: string): number {
  return splitWords(text).length;
}

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter(word => word.length > 0);
}
