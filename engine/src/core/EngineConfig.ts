/**
 * Engine Configuration
 *
 * Scheduling defaults for WorkflowEngine. Per-run options and flow
 * settings take precedence over these values.
 *
 * @module core
 */

import { z } from 'zod';
import { ConfigError } from '../errors/ConfigError.js';
import { LogLevel } from '../types/log-types.js';

/**
 * Engine configuration options
 *
 * @example
 * ```ts
 * const engine = new WorkflowEngine(registry, {
 *   concurrency: 4,
 *   defaultTimeoutMs: 60_000,
 * });
 * ```
 */
export interface EngineConfig {
  /**
   * Maximum number of nodes running at once within a run
   * @default 5
   */
  concurrency?: number;

  /**
   * Run time limit (milliseconds)
   * @default 300000 (5 minutes)
   */
  defaultTimeoutMs?: number;

  /**
   * Fail a node whose outputs lack a key its capability declares required
   * @default true
   */
  validateOutputs?: boolean;

  /**
   * Finished runs kept for `getRun` lookups
   * @default 50
   */
  historyLimit?: number;

  /**
   * @default 'info'
   */
  logLevel?: LogLevel;
}

export type ResolvedEngineConfig = Required<EngineConfig>;

export const DEFAULT_ENGINE_CONFIG: Readonly<ResolvedEngineConfig> = Object.freeze({
  concurrency: 5,
  defaultTimeoutMs: 300_000,
  validateOutputs: true,
  historyLimit: 50,
  logLevel: LogLevel.INFO,
});

const engineConfigSchema = z
  .object({
    concurrency: z.number().int().min(1),
    defaultTimeoutMs: z.number().int().min(1),
    validateOutputs: z.boolean(),
    historyLimit: z.number().int().min(0),
    logLevel: z.nativeEnum(LogLevel),
  })
  .partial()
  .strict();

export function applyConfigDefaults(config: EngineConfig = {}): ResolvedEngineConfig {
  return {
    concurrency: config.concurrency ?? DEFAULT_ENGINE_CONFIG.concurrency,
    defaultTimeoutMs: config.defaultTimeoutMs ?? DEFAULT_ENGINE_CONFIG.defaultTimeoutMs,
    validateOutputs: config.validateOutputs ?? DEFAULT_ENGINE_CONFIG.validateOutputs,
    historyLimit: config.historyLimit ?? DEFAULT_ENGINE_CONFIG.historyLimit,
    logLevel: config.logLevel ?? DEFAULT_ENGINE_CONFIG.logLevel,
  };
}

/**
 * Parse and check engine configuration. Accepts untyped input so the
 * `engine` section of a config file can be passed straight in.
 *
 * @throws ConfigError listing every offending field
 */
export function validateEngineConfig(config: unknown): EngineConfig {
  const parsed = engineConfigSchema.safeParse(config ?? {});
  if (!parsed.success) {
    throw ConfigError.fromZodError('engine', parsed.error);
  }
  return parsed.data;
}
