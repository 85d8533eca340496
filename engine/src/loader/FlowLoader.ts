/**
 * Flow Loader
 *
 * File and text front end for FlowParser. I/O-aware but knows nothing
 * about registries or runs: the result is a plain FlowDefinition that
 * the caller turns into a WorkflowGraph.
 *
 * ```ts
 * const definition = await FlowLoader.fromFile('./flows/conversation.yaml');
 * const graph = WorkflowGraph.build(definition, registry);
 * ```
 *
 * @module loader
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import YAML from 'yaml';
import { DefinitionError } from '../errors/DefinitionError.js';
import { FlowParser } from '../parser/FlowParser.js';
import type { FlowDefinition } from '../types/core-types.js';

export type FlowFormat = 'yaml' | 'json';

/**
 * Format implied by a file name, if any
 */
export function detectFlowFormat(filePath: string): FlowFormat | undefined {
  switch (extname(filePath).toLowerCase()) {
    case '.yaml':
    case '.yml':
      return 'yaml';
    case '.json':
      return 'json';
    default:
      return undefined;
  }
}

export class FlowLoader {
  /**
   * Load a flow from disk.
   *
   * PIPELINE:
   * 1. Check the file exists
   * 2. Read it
   * 3. Decode by extension; unknown extensions try YAML, then JSON
   * 4. Validate the document shape
   *
   * @throws DefinitionError for a missing, unreadable, malformed or invalid file
   */
  static async fromFile(filePath: string): Promise<FlowDefinition> {
    const resolvedPath = resolve(filePath);
    if (!existsSync(resolvedPath)) {
      throw DefinitionError.fileNotFound(filePath);
    }

    let content: string;
    try {
      content = await readFile(resolvedPath, 'utf-8');
    } catch (error) {
      throw DefinitionError.parseError(filePath, error);
    }

    return FlowParser.parse(this.decode(content, filePath, detectFlowFormat(filePath)), filePath);
  }

  static fromYAML(content: string, source = 'YAML content'): FlowDefinition {
    return FlowParser.parse(this.parseYAMLToObject(content, source), source);
  }

  static fromJSON(content: string, source = 'JSON content'): FlowDefinition {
    return FlowParser.parse(this.parseJSONToObject(content, source), source);
  }

  /**
   * Validate an already decoded document (an API body, a test fixture)
   */
  static fromObject(document: unknown, source = 'flow object'): FlowDefinition {
    return FlowParser.parse(document, source);
  }

  private static decode(content: string, source: string, format?: FlowFormat): unknown {
    if (format === 'yaml') {
      return this.parseYAMLToObject(content, source);
    }
    if (format === 'json') {
      return this.parseJSONToObject(content, source);
    }
    try {
      return this.parseYAMLToObject(content, source);
    } catch {
      return this.parseJSONToObject(content, source);
    }
  }

  private static parseYAMLToObject(content: string, source: string): unknown {
    try {
      const parsed: unknown = YAML.parse(content);
      return parsed;
    } catch (error) {
      throw DefinitionError.parseError(source, error);
    }
  }

  private static parseJSONToObject(content: string, source: string): unknown {
    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      throw DefinitionError.parseError(source, error);
    }
  }
}
