/**
 * Registry and engine settings for a CLI invocation
 *
 * @module utils
 */

import {
  CapabilityRegistry,
  FileConfigStore,
  InMemoryConfigStore,
  registerBuiltinCapabilities,
  silentSink,
  validateEngineConfig,
  type ConfigStore,
  type EngineConfig,
  type JsonObject,
  type LogSink,
} from '@capflow/engine';
import { createCliLogger, type CliLoggerOptions } from './logger.js';

/**
 * Used when no --config is given: enough for the loopback providers to
 * pass validation. The values are placeholders, never sent anywhere.
 */
export const LOOPBACK_CONFIG: JsonObject = {
  capabilities: {
    'core.asr': { appId: 'loopback', accessToken: 'loopback-token', host: 'localhost' },
    'core.chat': { apiKey: 'loopback-key', model: 'loopback-1' },
  },
};

export interface CliRuntime {
  readonly store: ConfigStore;
  readonly registry: CapabilityRegistry;
  readonly engineConfig: EngineConfig;
  readonly logger: LogSink;
}

/**
 * Load config, read the `engine` section, set up logging and register the
 * built-in capabilities. Without `output` nothing is logged.
 *
 * @throws DefinitionError for an unreadable config file
 * @throws ConfigError for an invalid `engine` section
 */
export function createRuntime(configPath: string | undefined, output?: CliLoggerOptions): CliRuntime {
  const store = configPath ? FileConfigStore.load(configPath) : new InMemoryConfigStore(LOOPBACK_CONFIG);
  const engineConfig = validateEngineConfig(store.getSection('engine') ?? {});
  const logger = output ? createCliLogger(output, engineConfig.logLevel) : silentSink;
  const registry = new CapabilityRegistry({ configStore: store, logger });
  registerBuiltinCapabilities(registry);
  return { store, registry, engineConfig, logger };
}
