/**
 * CLI Logger
 *
 * The engine and registry log through the process-wide EngineLogger held
 * by LoggerManager. The formatter already reports progress, so only
 * warnings and errors reach the terminal unless --verbose is given or the
 * config file sets `engine.logLevel`.
 *
 * @module utils
 */

import { LogLevel, LoggerManager, silentSink, type LogSink } from '@capflow/engine';
import type { FormatterType } from '../formatters/createFormatter.js';

export interface CliLoggerOptions {
  format?: FormatterType;
  verbose?: boolean;
  /** False when `--no-color` is given */
  color?: boolean;
}

/**
 * Level the engine logs at for the given output options
 */
export function cliLogLevel(options: CliLoggerOptions, configured?: LogLevel): LogLevel {
  if (options.format === 'null') {
    return LogLevel.SILENT;
  }
  if (options.verbose) {
    return LogLevel.DEBUG;
  }
  return configured ?? LogLevel.WARN;
}

/**
 * Initialise the process logger, or a silent sink when nothing should be
 * logged.
 *
 * @param configured - `engine.logLevel` from the config file
 */
export function createCliLogger(options: CliLoggerOptions, configured?: LogLevel): LogSink {
  const level = cliLogLevel(options, configured);
  if (level === LogLevel.SILENT) {
    return silentSink;
  }

  if (LoggerManager.isReady()) {
    const logger = LoggerManager.getLogger();
    logger.setLevel(level);
    return logger;
  }

  return LoggerManager.initialize({
    level,
    format: options.format === 'json' ? 'json' : 'text',
    colors: options.color !== false,
    timestamp: options.verbose === true,
    source: 'capflow',
  });
}
