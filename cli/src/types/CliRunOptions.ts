/**
 * CLI Run Command Options
 *
 * Options of `capflow run`, as commander hands them to the action.
 */

import type { FormatterType } from '../formatters/createFormatter.js';

export interface CliRunOptions {
  /**
   * Run inputs in key=value form
   * Example: ['audio=aGVsbG8=', 'lang=en-US']
   */
  input?: string[];

  /** JSON or YAML file with run inputs; `--input` wins on conflicts */
  inputsFile?: string;

  /** Platform config file (engine settings, capability config) */
  config?: string;

  concurrency?: number;

  /** Run timeout in seconds */
  timeout?: number;

  format?: FormatterType;

  verbose?: boolean;

  /** False when `--no-color` is given */
  color?: boolean;
}

/**
 * Parse key=value pairs into an object. Later pairs win.
 *
 * @throws Error on a pair without `=` or with an empty key
 */
export function parseKeyValuePairs(pairs: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};

  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index === -1) {
      throw new Error(`Invalid key=value format: ${pair}`);
    }

    const key = pair.slice(0, index).trim();
    const value = pair.slice(index + 1).trim();

    if (!key) {
      throw new Error(`Empty key in: ${pair}`);
    }

    result[key] = value;
  }

  return result;
}
