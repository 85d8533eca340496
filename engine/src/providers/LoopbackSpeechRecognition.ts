/**
 * Loopback speech recognition provider
 *
 * Decodes a base64 payload back into text, the inverse of the loopback
 * speech synthesis provider.
 *
 * @module providers
 */

import { z } from 'zod';
import type { CapabilitySchema } from '../capabilities/Capability.js';
import type { InvocationContext } from '../capabilities/Executor.js';
import { BaseProviderFactory, type Provider, type ProviderOptions } from '../capabilities/ProviderFactory.js';
import type { JsonObject } from '../types/core-types.js';
import { LoopbackProvider } from './LoopbackProvider.js';

export const speechRecognitionConfigSchema = z.object({
  appId: z.string().min(1, 'appId is required'),
  accessToken: z.string().min(1, 'accessToken is required'),
  host: z.string().min(1, 'host is required'),
  language: z.string().min(1).default('en-US'),
  enablePunctuation: z.boolean().default(true),
});

export type SpeechRecognitionConfig = z.infer<typeof speechRecognitionConfigSchema>;

export class LoopbackSpeechRecognitionProvider extends LoopbackProvider<SpeechRecognitionConfig> {
  readonly name = 'loopback-asr';

  constructor(config: SpeechRecognitionConfig, options: ProviderOptions = {}) {
    super(config, speechRecognitionConfigSchema.partial(), options);
  }

  protected run(config: SpeechRecognitionConfig, inputs: JsonObject, context: InvocationContext): JsonObject {
    const audio = this.requireString(inputs, 'audio', context);
    let text = Buffer.from(audio, 'base64').toString('utf-8').trim();

    if (config.enablePunctuation && text.length > 0 && !/[.?!]$/.test(text)) {
      text += '.';
    }

    return { text, language: config.language };
  }
}

export class LoopbackSpeechRecognitionFactory extends BaseProviderFactory<SpeechRecognitionConfig> {
  readonly type = 'speech-recognition';
  readonly description = 'Offline speech recognition that decodes base64 audio';
  readonly inputSchema: CapabilitySchema = {
    type: 'object',
    properties: {
      audio: { type: 'string', description: 'Base64 audio payload' },
    },
    required: ['audio'],
  };
  readonly outputSchema: CapabilitySchema = {
    type: 'object',
    properties: {
      text: { type: 'string', description: 'Transcript' },
      language: { type: 'string' },
    },
    required: ['text', 'language'],
  };

  protected readonly configSchema = speechRecognitionConfigSchema;

  getProviderName(): string {
    return 'loopback-asr';
  }

  protected instantiate(config: SpeechRecognitionConfig, options: ProviderOptions): Provider {
    return new LoopbackSpeechRecognitionProvider(config, options);
  }
}
