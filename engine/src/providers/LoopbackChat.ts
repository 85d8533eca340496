/**
 * Loopback chat provider
 *
 * Offline stand-in for a chat-completion vendor. Echoes the input prefixed
 * with the model name and cuts the reply to `maxTokens` words.
 *
 * @module providers
 */

import { z } from 'zod';
import type { CapabilitySchema } from '../capabilities/Capability.js';
import { BaseProviderFactory, type Provider, type ProviderOptions } from '../capabilities/ProviderFactory.js';
import type { JsonObject } from '../types/core-types.js';
import type { InvocationContext } from '../capabilities/Executor.js';
import { LoopbackProvider, splitWords } from './LoopbackProvider.js';

export const chatConfigSchema = z.object({
  apiKey: z.string().min(1, 'apiKey is required'),
  model: z.string().min(1, 'model is required'),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().min(1).max(8192).default(1024),
  systemPrompt: z.string().optional(),
});

export type ChatConfig = z.infer<typeof chatConfigSchema>;

const chatOverrideSchema = chatConfigSchema.partial();

export class LoopbackChatProvider extends LoopbackProvider<ChatConfig> {
  readonly name = 'loopback-chat';

  constructor(config: ChatConfig, options: ProviderOptions = {}) {
    super(config, chatOverrideSchema, options);
  }

  protected run(config: ChatConfig, inputs: JsonObject, context: InvocationContext): JsonObject {
    const input = this.requireString(inputs, 'text', context);
    const words = splitWords(`${config.model}: ${input}`).slice(0, config.maxTokens);
    return {
      text: words.join(' '),
      model: config.model,
      tokens: words.length,
    };
  }
}

export class LoopbackChatFactory extends BaseProviderFactory<ChatConfig> {
  readonly type = 'chat';
  readonly description = 'Offline chat completion that echoes its input';
  readonly inputSchema: CapabilitySchema = {
    type: 'object',
    properties: {
      text: { type: 'string', description: 'User message' },
    },
    required: ['text'],
  };
  readonly outputSchema: CapabilitySchema = {
    type: 'object',
    properties: {
      text: { type: 'string', description: 'Reply text' },
      model: { type: 'string' },
      tokens: { type: 'number', description: 'Words in the reply' },
    },
    required: ['text', 'model', 'tokens'],
  };

  protected readonly configSchema = chatConfigSchema;

  getProviderName(): string {
    return 'loopback-chat';
  }

  protected instantiate(config: ChatConfig, options: ProviderOptions): Provider {
    return new LoopbackChatProvider(config, options);
  }
}
