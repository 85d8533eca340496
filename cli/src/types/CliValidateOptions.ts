/**
 * Options of `capflow validate` and `capflow capabilities`
 */

import type { FormatterType } from '../formatters/createFormatter.js';

export interface CliValidateOptions {
  /** Platform config file; only its capability section matters here */
  config?: string;
  format?: FormatterType;
  verbose?: boolean;
  color?: boolean;
}
