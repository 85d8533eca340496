/**
 * Provider Factory contract
 *
 * A factory knows how to validate a provider's configuration and how to
 * build a ready-to-use provider from it. The registry calls the two steps
 * in order on first use of a capability:
 *
 * 1. validateConfig(raw) - pure, allocates nothing
 * 2. createProvider(config) - builds and initializes the provider
 *
 * Factories never receive a concrete logger, only a `LogSink`.
 *
 * @module capabilities
 */

import type { z } from 'zod';
import type { ConfigStore } from '../config/ConfigStore.js';
import { ConfigError } from '../errors/ConfigError.js';
import { InitError } from '../errors/RegistryErrors.js';
import type { JsonObject } from '../types/core-types.js';
import type { LogSink } from '../types/log-types.js';
import type { CapabilitySchema, CapabilityType } from './Capability.js';
import type { InvocationContext } from './Executor.js';

/**
 * A live provider instance. The registry owns it and closes it on shutdown.
 */
export interface Provider {
  readonly name: string;
  initialize(): Promise<void>;
  execute(context: InvocationContext, config: JsonObject, inputs: JsonObject): Promise<JsonObject>;
  close(): Promise<void>;
}

export interface ProviderOptions {
  logger?: LogSink;
}

export type ConfigValidationResult<TConfig> =
  | { success: true; config: TConfig }
  | { success: false; error: ConfigError };

export interface ProviderFactory<TConfig = unknown> {
  /** Non-empty provider name, e.g. `loopback-chat` */
  getProviderName(): string;
  readonly type: CapabilityType;
  readonly description: string;
  readonly inputSchema: CapabilitySchema;
  readonly outputSchema: CapabilitySchema;

  validateConfig(raw: unknown): ConfigValidationResult<TConfig>;

  /**
   * @throws InitError if the provider cannot be built or initialized
   */
  createProvider(config: TConfig, options?: ProviderOptions): Promise<Provider>;

  /**
   * Pull this factory's section out of the platform configuration. When
   * absent the registry reads `capabilities.<capabilityId>`.
   */
  extractConfig?(store: ConfigStore): unknown;
}

/**
 * Factory base backed by a zod schema.
 *
 * Subclasses supply the schema and `instantiate`; validation, error
 * mapping and initialization are handled here.
 */
export abstract class BaseProviderFactory<TConfig> implements ProviderFactory<TConfig> {
  abstract readonly type: CapabilityType;
  abstract readonly description: string;
  abstract readonly inputSchema: CapabilitySchema;
  abstract readonly outputSchema: CapabilitySchema;

  protected abstract readonly configSchema: z.ZodType<TConfig, z.ZodTypeDef, unknown>;

  abstract getProviderName(): string;

  /**
   * Build the provider object. Initialization happens afterwards.
   */
  protected abstract instantiate(config: TConfig, options: ProviderOptions): Provider;

  validateConfig(raw: unknown): ConfigValidationResult<TConfig> {
    const parsed = this.configSchema.safeParse(raw ?? {});
    if (parsed.success) {
      return { success: true, config: parsed.data };
    }
    return { success: false, error: ConfigError.fromZodError(this.getProviderName(), parsed.error) };
  }

  async createProvider(config: TConfig, options: ProviderOptions = {}): Promise<Provider> {
    try {
      const provider = this.instantiate(config, options);
      await provider.initialize();
      return provider;
    } catch (error) {
      if (error instanceof InitError) {
        throw error;
      }
      throw new InitError(this.getProviderName(), error);
    }
  }
}
