/**
 * Capability descriptors
 *
 * A capability is a unit of AI functionality (chat completion, speech
 * synthesis, ...) backed by one provider. The descriptor is built by the
 * registry at registration time and never changes afterwards.
 *
 * @module capabilities
 */

import type { JsonValue } from '../types/core-types.js';

export type CapabilityType =
  | 'chat'
  | 'speech-synthesis'
  | 'speech-recognition'
  | 'voice-activity'
  | 'tool';

export const CAPABILITY_TYPES: readonly CapabilityType[] = Object.freeze([
  'chat',
  'speech-synthesis',
  'speech-recognition',
  'voice-activity',
  'tool',
]);

export interface SchemaProperty {
  readonly type: 'string' | 'number' | 'boolean' | 'object' | 'array';
  readonly description?: string;
  readonly default?: JsonValue;
  readonly enum?: readonly JsonValue[];
  /** Value must never be printed (API keys, tokens) */
  readonly secret?: boolean;
}

/**
 * Object schema describing a capability's inputs or outputs
 */
export interface CapabilitySchema {
  readonly type: 'object';
  readonly properties: Readonly<Record<string, SchemaProperty>>;
  readonly required?: readonly string[];
}

export interface CapabilityDescriptor {
  readonly id: string;
  readonly type: CapabilityType;
  readonly providerName: string;
  readonly description: string;
  readonly inputSchema: CapabilitySchema;
  readonly outputSchema: CapabilitySchema;
}

/**
 * Keys listed as required by the schema that `value` lacks
 */
export function missingRequiredKeys(
  schema: CapabilitySchema,
  value: Readonly<Record<string, unknown>>
): string[] {
  return (schema.required ?? []).filter(key => !Object.hasOwn(value, key) || value[key] === undefined);
}

export function isCapabilityType(value: string): value is CapabilityType {
  return CAPABILITY_TYPES.some(type => type === value);
}
