/**
 * Logging types
 *
 * The registry, provider factories and the engine only ever see `LogSink`.
 * Concrete loggers (EngineLogger, a test spy, a host application's logger)
 * plug in behind it.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent',
}

/**
 * Numeric severity; higher is more severe
 */
export const LogLevelSeverity: Readonly<Record<LogLevel, number>> = Object.freeze({
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.SILENT]: 4,
});

/**
 * Structured key/value pairs attached to a log call
 */
export type LogFields = Readonly<Record<string, unknown>>;

/**
 * Minimal logging capability set: level + message + key/value pairs.
 */
export interface LogSink {
  log(level: LogLevel, message: string, fields?: LogFields): void;
}

/**
 * Engine log output format
 */
export type EngineLogFormat = 'text' | 'json';

/**
 * Sink that drops everything
 */
export const silentSink: LogSink = Object.freeze({
  log(): void {},
});

export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

export function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
  return level !== LogLevel.SILENT && LogLevelSeverity[level] >= LogLevelSeverity[threshold];
}
