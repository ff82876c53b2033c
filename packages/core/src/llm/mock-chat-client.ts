import { createChildLogger } from '@searchwise/shared/src/logger.js';
import type { ChatTranscript } from '@searchwise/shared/src/types/chat.types.js';
import type { ChatClient } from './chat-client.js';

const log = createChildLogger('llm:mock-chat');

function createMockReply(history: ChatTranscript, searchContext?: string): string {
  const lastUser = [...history].reverse().find((message) => message.role === 'user');
  const topic = lastUser?.content ?? '';
  const grounding = searchContext ? '（検索結果を参照しました）' : '';
  return `モック応答: ${topic}${grounding}`;
}

export function createMockChatClient(): ChatClient {
  log.info('Using mock chat client');

  return {
    respond(history: ChatTranscript, searchContext?: string): Promise<string> {
      log.debug({ messageCount: history.length }, 'Mock chat invocation');
      return Promise.resolve(createMockReply(history, searchContext));
    },

    respondWithRetry(history: ChatTranscript, searchContext?: string): Promise<string> {
      return Promise.resolve(createMockReply(history, searchContext));
    },
  };
}
