/**
 * Built-in flow definitions
 *
 * @module loader
 */

import { BUILTIN_CAPABILITY_IDS } from '../providers/index.js';
import { ref, runInput, type FlowDefinition } from '../types/core-types.js';

export const DEFAULT_CONVERSATION_FLOW_ID = 'default-conversation';

/**
 * Speech in, speech out: recognise the `audio` run input, answer it with
 * the chat capability and synthesise the reply.
 *
 * Needs `core.asr`, `core.chat` and `core.tts` registered.
 */
export function createDefaultConversationFlow(): FlowDefinition {
  return {
    id: DEFAULT_CONVERSATION_FLOW_ID,
    name: 'Default conversation',
    description: 'Speech recognition, chat reply, speech synthesis',
    nodes: [
      {
        id: 'asr',
        capabilityId: BUILTIN_CAPABILITY_IDS.speechRecognition,
        inputBindings: { audio: runInput('audio') },
      },
      {
        id: 'llm',
        capabilityId: BUILTIN_CAPABILITY_IDS.chat,
        inputBindings: { text: ref('asr', 'text') },
      },
      {
        id: 'tts',
        capabilityId: BUILTIN_CAPABILITY_IDS.speechSynthesis,
        inputBindings: { text: ref('llm', 'text') },
      },
    ],
  };
}
