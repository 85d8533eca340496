/**
 * Capability Registry
 *
 * Maps capability IDs to provider factories and hands out executors.
 * Providers are created lazily on first `getExecutor` call and then cached
 * for the life of the registry.
 *
 * The registry is an ordinary object: construct one, register factories,
 * pass it to the engine. There is no process-wide instance.
 *
 * @module capabilities
 */

import { InMemoryConfigStore, type ConfigStore } from '../config/ConfigStore.js';
import { CapflowError } from '../errors/CapflowError.js';
import { ConfigError } from '../errors/ConfigError.js';
import { ConflictError, InitError, NotFoundError } from '../errors/RegistryErrors.js';
import { LogLevel, silentSink, type LogSink } from '../types/log-types.js';
import { isCapabilityType, type CapabilityDescriptor } from './Capability.js';
import { BoundExecutor, type Executor } from './Executor.js';
import type { Provider, ProviderFactory, ProviderOptions } from './ProviderFactory.js';

export interface CapabilityRegistryOptions {
  /** Source of raw provider config; defaults to an empty store */
  configStore?: ConfigStore;
  logger?: LogSink;
}

export interface RegistryStats {
  registered: number;
  instantiated: number;
  capabilities: Array<{
    id: string;
    type: string;
    providerName: string;
    instantiated: boolean;
  }>;
}

/**
 * Registration record. The closures capture the factory's own config type,
 * so entries of different factories can share one map.
 */
interface RegistryEntry {
  readonly descriptor: CapabilityDescriptor;
  readonly readConfig: (store: ConfigStore) => unknown;
  readonly build: (raw: unknown, options: ProviderOptions) => Promise<Provider>;
}

export class CapabilityRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly executors = new Map<string, Promise<BoundExecutor>>();
  private readonly providers = new Map<string, Provider>();
  private readonly configStore: ConfigStore;
  private readonly logger: LogSink;

  constructor(options: CapabilityRegistryOptions = {}) {
    this.configStore = options.configStore ?? new InMemoryConfigStore();
    this.logger = options.logger ?? silentSink;
  }

  /**
   * Register a capability backed by `factory`.
   *
   * @throws ConfigError if the factory's descriptor is incomplete
   * @throws ConflictError if the ID is taken; the existing entry is kept
   */
  register<TConfig>(capabilityId: string, factory: ProviderFactory<TConfig>): CapabilityDescriptor {
    if (capabilityId.trim().length === 0) {
      throw ConfigError.single('capability', 'id', 'must be non-empty');
    }
    if (this.entries.has(capabilityId)) {
      throw new ConflictError(capabilityId);
    }

    const descriptor = this.describe(capabilityId, factory);

    this.entries.set(capabilityId, {
      descriptor,
      readConfig: store =>
        factory.extractConfig?.(store) ?? store.getCapabilityConfig(capabilityId) ?? {},
      build: async (raw, options) => {
        const validation = factory.validateConfig(raw);
        if (!validation.success) {
          throw validation.error;
        }
        try {
          return await factory.createProvider(validation.config, options);
        } catch (error) {
          throw error instanceof InitError ? error : new InitError(descriptor.providerName, error);
        }
      },
    });

    this.logger.log(LogLevel.DEBUG, 'Capability registered', {
      capabilityId,
      type: descriptor.type,
      provider: descriptor.providerName,
    });
    return descriptor;
  }

  /**
   * Descriptors in registration order
   */
  listCapabilities(): readonly CapabilityDescriptor[] {
    return Object.freeze(Array.from(this.entries.values(), entry => entry.descriptor));
  }

  has(capabilityId: string): boolean {
    return this.entries.has(capabilityId);
  }

  getCapability(capabilityId: string): CapabilityDescriptor | undefined {
    return this.entries.get(capabilityId)?.descriptor;
  }

  /**
   * @throws NotFoundError for an unregistered ID
   */
  requireCapability(capabilityId: string): CapabilityDescriptor {
    const entry = this.entries.get(capabilityId);
    if (!entry) {
      throw new NotFoundError(capabilityId, this.getIds());
    }
    return entry.descriptor;
  }

  getIds(): string[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Executor for a capability, creating its provider on first use.
   * Concurrent first calls share one creation. A failed creation is not
   * cached, so a later call tries again.
   *
   * @throws NotFoundError for an unregistered ID
   * @throws ConfigError if the stored config fails validation
   * @throws InitError if the provider cannot be created
   */
  async getExecutor(capabilityId: string): Promise<Executor> {
    const entry = this.entries.get(capabilityId);
    if (!entry) {
      throw new NotFoundError(capabilityId, this.getIds());
    }

    const cached = this.executors.get(capabilityId);
    if (cached) {
      return cached;
    }

    const created = this.instantiate(capabilityId, entry).catch((error: unknown) => {
      if (this.executors.get(capabilityId) === created) {
        this.executors.delete(capabilityId);
      }
      throw error;
    });
    this.executors.set(capabilityId, created);
    return created;
  }

  /**
   * Close every created provider, including ones still being created.
   * Close failures are logged, not thrown.
   */
  async closeAll(): Promise<void> {
    const pending = Array.from(this.executors.values());
    this.executors.clear();
    await Promise.allSettled(pending);

    const open = Array.from(this.providers.entries());
    this.providers.clear();

    const results = await Promise.allSettled(open.map(([, provider]) => provider.close()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const [capabilityId] = open[index] ?? ['unknown'];
        this.logger.log(LogLevel.WARN, 'Provider close failed', {
          capabilityId,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    });
  }

  getStats(): RegistryStats {
    return {
      registered: this.entries.size,
      instantiated: this.providers.size,
      capabilities: Array.from(this.entries.values(), ({ descriptor }) => ({
        id: descriptor.id,
        type: descriptor.type,
        providerName: descriptor.providerName,
        instantiated: this.providers.has(descriptor.id),
      })),
    };
  }

  private async instantiate(capabilityId: string, entry: RegistryEntry): Promise<BoundExecutor> {
    const raw = entry.readConfig(this.configStore);
    try {
      const provider = await entry.build(raw, { logger: this.logger });
      this.providers.set(capabilityId, provider);
      this.logger.log(LogLevel.INFO, 'Provider created', {
        capabilityId,
        provider: provider.name,
      });
      return new BoundExecutor(capabilityId, provider);
    } catch (error) {
      this.logger.log(LogLevel.ERROR, 'Provider creation failed', {
        capabilityId,
        code: error instanceof CapflowError ? error.code : undefined,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private describe<TConfig>(capabilityId: string, factory: ProviderFactory<TConfig>): CapabilityDescriptor {
    const providerName = factory.getProviderName();
    const violations: Array<{ field: string; message: string }> = [];

    if (providerName.trim().length === 0) {
      violations.push({ field: 'providerName', message: 'must be non-empty' });
    }
    // Factories written in plain JS can still hand over anything here
    const type: string = factory.type;
    if (!isCapabilityType(type)) {
      violations.push({ field: 'type', message: `unknown capability type '${type}'` });
    }
    const schemas: Array<[string, string]> = [
      ['inputSchema', factory.inputSchema.type],
      ['outputSchema', factory.outputSchema.type],
    ];
    for (const [field, schemaType] of schemas) {
      if (schemaType !== 'object') {
        violations.push({ field, message: 'must be an object schema' });
      }
    }
    if (violations.length > 0) {
      throw new ConfigError(`capability '${capabilityId}'`, violations);
    }

    return Object.freeze({
      id: capabilityId,
      type: factory.type,
      providerName,
      description: factory.description,
      inputSchema: factory.inputSchema,
      outputSchema: factory.outputSchema,
    });
  }
}
