/**
 * Loopback speech synthesis provider
 *
 * "Synthesizes" text by base64-encoding its UTF-8 bytes. The reported
 * duration assumes 400ms per word at speed 1.
 *
 * @module providers
 */

import { z } from 'zod';
import type { CapabilitySchema } from '../capabilities/Capability.js';
import type { InvocationContext } from '../capabilities/Executor.js';
import { BaseProviderFactory, type Provider, type ProviderOptions } from '../capabilities/ProviderFactory.js';
import type { JsonObject } from '../types/core-types.js';
import { LoopbackProvider, countWords } from './LoopbackProvider.js';

const MS_PER_WORD = 400;

export const AUDIO_FORMATS = ['pcm', 'wav', 'mp3'] as const;

export const speechSynthesisConfigSchema = z.object({
  voice: z.string().min(1).default('neutral'),
  sampleRate: z.number().int().min(8000).max(48000).default(16000),
  speed: z.number().min(0.25).max(3.0).default(1),
  pitch: z.number().min(-20).max(20).default(0),
  volume: z.number().min(0).max(1).default(1),
  format: z.enum(AUDIO_FORMATS).default('wav'),
});

export type SpeechSynthesisConfig = z.infer<typeof speechSynthesisConfigSchema>;

export class LoopbackSpeechSynthesisProvider extends LoopbackProvider<SpeechSynthesisConfig> {
  readonly name = 'loopback-tts';

  constructor(config: SpeechSynthesisConfig, options: ProviderOptions = {}) {
    super(config, speechSynthesisConfigSchema.partial(), options);
  }

  protected run(config: SpeechSynthesisConfig, inputs: JsonObject, context: InvocationContext): JsonObject {
    const text = this.requireString(inputs, 'text', context);
    return {
      audio: Buffer.from(text, 'utf-8').toString('base64'),
      format: config.format,
      sampleRate: config.sampleRate,
      durationMs: Math.round((countWords(text) * MS_PER_WORD) / config.speed),
    };
  }
}

export class LoopbackSpeechSynthesisFactory extends BaseProviderFactory<SpeechSynthesisConfig> {
  readonly type = 'speech-synthesis';
  readonly description = 'Offline text-to-speech that encodes text as base64';
  readonly inputSchema: CapabilitySchema = {
    type: 'object',
    properties: {
      text: { type: 'string', description: 'Text to speak' },
    },
    required: ['text'],
  };
  readonly outputSchema: CapabilitySchema = {
    type: 'object',
    properties: {
      audio: { type: 'string', description: 'Base64 audio payload' },
      format: { type: 'string', enum: [...AUDIO_FORMATS] },
      sampleRate: { type: 'number' },
      durationMs: { type: 'number' },
    },
    required: ['audio', 'format', 'sampleRate', 'durationMs'],
  };

  protected readonly configSchema = speechSynthesisConfigSchema;

  getProviderName(): string {
    return 'loopback-tts';
  }

  protected instantiate(config: SpeechSynthesisConfig, options: ProviderOptions): Provider {
    return new LoopbackSpeechSynthesisProvider(config, options);
  }
}
