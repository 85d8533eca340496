/**
 * Engine Logger
 *
 * Console implementation of `LogSink`. Text output is coloured with chalk;
 * JSON output emits one object per line for log shippers.
 *
 * @module logging
 */

import { Chalk, type ChalkInstance } from 'chalk';
import {
  LogLevel,
  shouldLog,
  type EngineLogFormat,
  type LogFields,
  type LogSink,
} from '../types/log-types.js';

/**
 * Line writer; receives the rendered line and its level
 */
export type LogWriter = (line: string, level: LogLevel) => void;

/**
 * Engine logger configuration
 */
export interface EngineLoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  format?: EngineLogFormat;
  colors?: boolean;
  timestamp?: boolean;
  /** Source tag printed with every line */
  source?: string;
  /** Output target; defaults to stdout, stderr for warn/error */
  write?: LogWriter;
}

const defaultWriter: LogWriter = (line, level) => {
  if (level === LogLevel.WARN || level === LogLevel.ERROR) {
    console.error(line);
  } else {
    console.log(line);
  }
};

/**
 * Render one field value for `key=value` output.
 */
export function formatFieldValue(value: unknown): string {
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  if (typeof value === 'string') {
    return /[\s="]/.test(value) || value.length === 0 ? JSON.stringify(value) : value;
  }
  if (value === undefined) {
    return 'undefined';
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return JSON.stringify(value) ?? String(value);
}

function toJsonSafe(fields: LogFields): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

export class EngineLogger implements LogSink {
  private config: Required<Omit<EngineLoggerConfig, 'write'>>;
  private readonly write: LogWriter;
  private readonly chalk: ChalkInstance;

  constructor(config: EngineLoggerConfig) {
    this.config = {
      level: config.level,
      format: config.format ?? 'text',
      colors: config.colors ?? true,
      timestamp: config.timestamp ?? true,
      source: config.source ?? 'capflow',
    };
    this.write = config.write ?? defaultWriter;
    this.chalk = new Chalk({ level: this.config.colors ? 1 : 0 });
  }

  log(level: LogLevel, message: string, fields?: LogFields): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }
    const line = this.config.format === 'json'
      ? this.renderJson(level, message, fields)
      : this.renderText(level, message, fields);
    this.write(line, level);
  }

  debug(message: string, fields?: LogFields): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, error?: Error, fields?: LogFields): void {
    this.log(LogLevel.ERROR, message, error ? { ...fields, error } : fields);
  }

  /**
   * Logger sharing this configuration and writer under another source tag
   */
  child(source: string): EngineLogger {
    return new EngineLogger({ ...this.config, source, write: this.write });
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  willLog(level: LogLevel): boolean {
    return shouldLog(level, this.config.level);
  }

  getConfig(): Readonly<Required<Omit<EngineLoggerConfig, 'write'>>> {
    return { ...this.config };
  }

  private renderText(level: LogLevel, message: string, fields?: LogFields): string {
    const parts: string[] = [];
    if (this.config.timestamp) {
      parts.push(this.chalk.gray(new Date().toISOString()));
    }
    parts.push(this.levelTag(level));
    parts.push(this.chalk.cyan(`[${this.config.source}]`));
    parts.push(message);

    if (fields) {
      for (const [key, value] of Object.entries(fields)) {
        parts.push(this.chalk.dim(`${key}=`) + formatFieldValue(value));
      }
    }
    return parts.join(' ');
  }

  private renderJson(level: LogLevel, message: string, fields?: LogFields): string {
    return JSON.stringify({
      ...(this.config.timestamp ? { timestamp: new Date().toISOString() } : {}),
      level,
      source: this.config.source,
      message,
      ...(fields ? toJsonSafe(fields) : {}),
    });
  }

  private levelTag(level: LogLevel): string {
    const tag = level.toUpperCase().padEnd(5);
    switch (level) {
      case LogLevel.DEBUG:
        return this.chalk.magenta(tag);
      case LogLevel.INFO:
        return this.chalk.blue(tag);
      case LogLevel.WARN:
        return this.chalk.yellow(tag);
      case LogLevel.ERROR:
        return this.chalk.red.bold(tag);
      default:
        return tag;
    }
  }
}

/**
 * Create a logger for the given level; `silent` yields no logger at all.
 */
export function createEngineLogger(
  level: LogLevel,
  options: Omit<EngineLoggerConfig, 'level'> = {}
): EngineLogger | undefined {
  if (level === LogLevel.SILENT) {
    return undefined;
  }
  return new EngineLogger({ source: 'capflow', ...options, level });
}
