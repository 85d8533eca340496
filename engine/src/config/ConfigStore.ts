/**
 * Configuration stores
 *
 * Read-only access to the platform configuration that feeds provider
 * factories. Capability config lives under `capabilities.<capabilityId>`;
 * any other section can be reached by dotted path.
 *
 * @module config
 */

import { existsSync, readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse as parseYAML } from 'yaml';
import { DefinitionError } from '../errors/DefinitionError.js';
import { isJsonObject, type JsonObject } from '../types/core-types.js';

export interface ConfigStore {
  /** Raw config of one capability, if present */
  getCapabilityConfig(capabilityId: string): JsonObject | undefined;
  /** Object at a dotted path, e.g. `engine` or `chat.openai` */
  getSection(path: string): JsonObject | undefined;
}

export class InMemoryConfigStore implements ConfigStore {
  private readonly data: JsonObject;

  constructor(data: JsonObject = {}) {
    this.data = data;
  }

  getCapabilityConfig(capabilityId: string): JsonObject | undefined {
    const capabilities = this.data.capabilities;
    if (!isJsonObject(capabilities)) {
      return undefined;
    }
    // Capability IDs contain dots, so they are looked up as a single key
    const section = capabilities[capabilityId];
    return isJsonObject(section) ? section : undefined;
  }

  getSection(path: string): JsonObject | undefined {
    let current: JsonObject = this.data;
    for (const segment of path.split('.')) {
      const next = current[segment];
      if (!isJsonObject(next)) {
        return undefined;
      }
      current = next;
    }
    return current;
  }
}

export class FileConfigStore {
  /**
   * Load a YAML or JSON config file. `.json` files are parsed as JSON,
   * everything else as YAML (a superset of JSON).
   *
   * @throws DefinitionError if the file is missing, malformed or not an object
   */
  static load(filePath: string): InMemoryConfigStore {
    if (!existsSync(filePath)) {
      throw DefinitionError.fileNotFound(filePath);
    }

    let parsed: unknown;
    try {
      const content = readFileSync(filePath, 'utf-8');
      parsed = extname(filePath).toLowerCase() === '.json' ? JSON.parse(content) : parseYAML(content);
    } catch (error) {
      throw DefinitionError.parseError(filePath, error);
    }

    if (parsed === null || parsed === undefined) {
      return new InMemoryConfigStore();
    }
    if (!isJsonObject(parsed)) {
      throw DefinitionError.parseError(filePath, new Error('top level must be a mapping'));
    }
    return new InMemoryConfigStore(parsed);
  }
}
