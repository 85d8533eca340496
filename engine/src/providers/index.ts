/**
 * Built-in offline providers
 *
 * @module providers
 */

import type { CapabilityRegistry } from '../capabilities/CapabilityRegistry.js';
import { LoopbackChatFactory } from './LoopbackChat.js';
import { LoopbackSpeechRecognitionFactory } from './LoopbackSpeechRecognition.js';
import { LoopbackSpeechSynthesisFactory } from './LoopbackSpeechSynthesis.js';

export * from './LoopbackProvider.js';
export * from './LoopbackChat.js';
export * from './LoopbackSpeechSynthesis.js';
export * from './LoopbackSpeechRecognition.js';

export const BUILTIN_CAPABILITY_IDS = Object.freeze({
  speechRecognition: 'core.asr',
  chat: 'core.chat',
  speechSynthesis: 'core.tts',
});

/**
 * Register the loopback providers under the `core.*` IDs
 */
export function registerBuiltinCapabilities(registry: CapabilityRegistry): void {
  registry.register(BUILTIN_CAPABILITY_IDS.speechRecognition, new LoopbackSpeechRecognitionFactory());
  registry.register(BUILTIN_CAPABILITY_IDS.chat, new LoopbackChatFactory());
  registry.register(BUILTIN_CAPABILITY_IDS.speechSynthesis, new LoopbackSpeechSynthesisFactory());
}
