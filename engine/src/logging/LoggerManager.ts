import { EngineLogger, type EngineLoggerConfig } from './EngineLogger.js';
import { LogLevel } from '../types/log-types.js';

/**
 * Singleton Logger Manager
 *
 * Process-wide access to one EngineLogger for hosts (like the CLI) that do
 * not want to thread a logger through every call. Library code never reads
 * from here; it takes a `LogSink` explicitly.
 *
 * ```typescript
 * LoggerManager.initialize({ level: LogLevel.DEBUG, source: 'capflow-cli' });
 * const logger = LoggerManager.getLogger();
 * ```
 */
export class LoggerManager {
  private static instance: EngineLogger | null = null;

  /**
   * Initialize the logger instance. A second call returns the existing
   * instance unchanged.
   */
  static initialize(config: Partial<EngineLoggerConfig> = {}): EngineLogger {
    if (this.instance) {
      this.instance.warn('LoggerManager already initialized; keeping existing logger');
      return this.instance;
    }

    this.instance = new EngineLogger({
      level: LogLevel.INFO,
      format: 'text',
      colors: true,
      timestamp: true,
      source: 'capflow',
      ...config,
    });
    this.instance.debug('LoggerManager initialized', {
      level: this.instance.getConfig().level,
      format: this.instance.getConfig().format,
    });
    return this.instance;
  }

  /**
   * @throws Error if called before initialize()
   */
  static getLogger(): EngineLogger {
    if (!this.instance) {
      throw new Error('[LoggerManager] Logger accessed before initialization. Call LoggerManager.initialize() first.');
    }
    return this.instance;
  }

  static isReady(): boolean {
    return this.instance !== null;
  }

  /**
   * Drop the instance (tests)
   */
  static reset(): void {
    this.instance = null;
  }
}
