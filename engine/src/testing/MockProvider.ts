/**
 * Mock Provider
 *
 * Provider and factory doubles for testing flows without real providers.
 * Responses, delays and failures are configurable and every call is
 * recorded.
 *
 * @module testing
 */

import type { CapabilitySchema, CapabilityType } from '../capabilities/Capability.js';
import type { InvocationContext } from '../capabilities/Executor.js';
import type {
  ConfigValidationResult,
  Provider,
  ProviderFactory,
  ProviderOptions,
} from '../capabilities/ProviderFactory.js';
import { ConfigError } from '../errors/ConfigError.js';
import { cancellationFromSignal } from '../errors/ExecutionErrors.js';
import { isJsonObject, type JsonObject } from '../types/core-types.js';

/**
 * Mock provider configuration
 */
export interface MockProviderConfig {
  name: string;

  /** Simulated latency (ms) */
  delay?: number;

  /** Fixed response, or a function of the inputs */
  response?: JsonObject | ((inputs: JsonObject, config: JsonObject) => JsonObject);

  shouldFail?: boolean;

  /** Error to throw when failing */
  error?: Error;

  /** Keep running after the signal aborts (simulates a provider that ignores cancellation) */
  ignoreSignal?: boolean;
}

export interface MockCall {
  nodeId?: string;
  runId?: string;
  inputs: JsonObject;
  config: JsonObject;
  startedAt: number;
  completedAt?: number;
}

export class MockProvider implements Provider {
  readonly name: string;
  private readonly settings: MockProviderConfig;
  private calls: MockCall[] = [];
  private active = 0;
  private peakActive = 0;
  initialized = false;
  closed = false;

  constructor(settings: MockProviderConfig) {
    this.name = settings.name;
    this.settings = settings;
  }

  async initialize(): Promise<void> {
    this.initialized = true;
  }

  async execute(context: InvocationContext, config: JsonObject, inputs: JsonObject): Promise<JsonObject> {
    const call: MockCall = {
      nodeId: context.nodeId,
      runId: context.runId,
      inputs,
      config,
      startedAt: Date.now(),
    };
    this.calls.push(call);
    this.active++;
    this.peakActive = Math.max(this.peakActive, this.active);

    try {
      if (this.settings.delay) {
        await this.sleep(this.settings.delay, this.settings.ignoreSignal ? undefined : context.signal);
      }

      if (this.settings.shouldFail) {
        throw this.settings.error ?? new Error(`Mock provider failed: ${this.name}`);
      }

      const { response } = this.settings;
      if (typeof response === 'function') {
        return response(inputs, config);
      }
      return response ?? { ...inputs };
    } finally {
      this.active--;
      call.completedAt = Date.now();
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  getCallCount(): number {
    return this.calls.length;
  }

  getCalls(): MockCall[] {
    return [...this.calls];
  }

  getLastCall(): MockCall | undefined {
    return this.calls[this.calls.length - 1];
  }

  /**
   * Highest number of overlapping calls seen
   */
  getPeakConcurrency(): number {
    return this.peakActive;
  }

  reset(): void {
    this.calls = [];
    this.peakActive = 0;
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(signal ? cancellationFromSignal(signal) : new Error('aborted'));
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  static createSuccess(name: string, response?: MockProviderConfig['response']): MockProvider {
    return new MockProvider({ name, response });
  }

  static createFailure(name: string, error?: Error): MockProvider {
    return new MockProvider({
      name,
      shouldFail: true,
      error: error ?? new Error(`${name} failed`),
    });
  }

  static createSlow(name: string, delay: number, response?: MockProviderConfig['response']): MockProvider {
    return new MockProvider({ name, delay, response });
  }
}

export interface MockFactoryOptions {
  type?: CapabilityType;
  providerName?: string;
  inputSchema?: CapabilitySchema;
  outputSchema?: CapabilitySchema;
  /** Make createProvider reject */
  failCreate?: Error;
  /** Field names that must be present in the raw config */
  requiredConfig?: string[];
}

const OPEN_SCHEMA: CapabilitySchema = { type: 'object', properties: {} };

/**
 * Factory that hands out one pre-built provider and counts creations
 */
export class MockProviderFactory implements ProviderFactory<JsonObject> {
  readonly type: CapabilityType;
  readonly description = 'Mock capability';
  readonly inputSchema: CapabilitySchema;
  readonly outputSchema: CapabilitySchema;
  readonly provider: MockProvider;
  createCount = 0;
  lastConfig?: JsonObject;
  private readonly options: MockFactoryOptions;

  constructor(provider: MockProvider, options: MockFactoryOptions = {}) {
    this.provider = provider;
    this.options = options;
    this.type = options.type ?? 'tool';
    this.inputSchema = options.inputSchema ?? OPEN_SCHEMA;
    this.outputSchema = options.outputSchema ?? OPEN_SCHEMA;
  }

  getProviderName(): string {
    return this.options.providerName ?? this.provider.name;
  }

  validateConfig(raw: unknown): ConfigValidationResult<JsonObject> {
    const config = isJsonObject(raw) ? raw : {};
    const missing = (this.options.requiredConfig ?? []).filter(field => config[field] === undefined);
    if (missing.length > 0) {
      return {
        success: false,
        error: new ConfigError(
          this.getProviderName(),
          missing.map(field => ({ field, message: 'is required' }))
        ),
      };
    }
    return { success: true, config };
  }

  async createProvider(config: JsonObject, _options?: ProviderOptions): Promise<Provider> {
    this.createCount++;
    this.lastConfig = config;
    if (this.options.failCreate) {
      throw this.options.failCreate;
    }
    await this.provider.initialize();
    return this.provider;
  }
}
