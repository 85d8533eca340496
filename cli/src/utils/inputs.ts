/**
 * Run inputs from the command line
 *
 * @module utils
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { extname } from 'node:path';
import YAML from 'yaml';
import { ConfigError, DefinitionError, isJsonObject, toError, type JsonObject } from '@capflow/engine';
import { parseKeyValuePairs } from '../types/CliRunOptions.js';

/**
 * Read a JSON or YAML mapping of run inputs
 *
 * @throws DefinitionError if the file is missing, malformed or not a mapping
 */
export async function readInputsFile(filePath: string): Promise<JsonObject> {
  if (!existsSync(filePath)) {
    throw DefinitionError.fileNotFound(filePath);
  }

  let parsed: unknown;
  try {
    const content = await readFile(filePath, 'utf-8');
    parsed = extname(filePath).toLowerCase() === '.json' ? JSON.parse(content) : YAML.parse(content);
  } catch (error) {
    throw DefinitionError.parseError(filePath, error);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isJsonObject(parsed)) {
    throw DefinitionError.parseError(filePath, new Error('inputs must be a mapping'));
  }
  return parsed;
}

/**
 * Merge `--inputs-file` and `--input` pairs; pairs win
 *
 * @throws DefinitionError for a bad file, ConfigError for a malformed pair
 */
export async function collectInputs(options: { input?: string[]; inputsFile?: string }): Promise<JsonObject> {
  const fromFile = options.inputsFile ? await readInputsFile(options.inputsFile) : {};

  let fromPairs: Record<string, string> = {};
  try {
    fromPairs = parseKeyValuePairs(options.input ?? []);
  } catch (error) {
    throw ConfigError.single('run', 'input', toError(error).message);
  }

  return { ...fromFile, ...fromPairs };
}
