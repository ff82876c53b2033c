import type { OpenAPIHono } from '@hono/zod-openapi';
import type { ChatClient } from '@searchwise/core/src/llm/chat-client.js';
import { createMockChatClient } from '@searchwise/core/src/llm/mock-chat-client.js';
import {
  createChatOrchestrator,
  type OrchestratorSettings,
} from '@searchwise/core/src/orchestration/chat-orchestrator.js';
import { createMockSearchClient } from '@searchwise/core/src/services/web-search/mock-web-search-client.js';
import type { SearchClient } from '@searchwise/core/src/services/web-search/types.js';
import { createInMemoryTranscriptStore } from '@searchwise/core/src/session/in-memory-transcript-store.js';
import type { TranscriptStore } from '@searchwise/core/src/session/transcript-store.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

export const TEST_SETTINGS: OrchestratorSettings = {
  autoSearch: true,
  contextDetail: 'detailed',
  search: { count: 10, languageHint: 'auto', safesearch: 'moderate', maxRetries: 0 },
};

export interface TestAppOverrides {
  readonly searchClient?: SearchClient;
  readonly chatClient?: ChatClient;
  readonly transcriptStore?: TranscriptStore;
  readonly now?: () => Date;
}

/**
 * Builds the full app on mock provider clients and an in-memory transcript store.
 * For use in unit tests only.
 */
export function createTestApp(overrides: TestAppOverrides = {}): OpenAPIHono<AppEnv> {
  const orchestrator = createChatOrchestrator({
    searchClient: overrides.searchClient ?? createMockSearchClient(),
    chatClient: overrides.chatClient ?? createMockChatClient(),
    settings: TEST_SETTINGS,
    now: overrides.now,
  });

  return createApp({
    orchestrator,
    transcriptStore: overrides.transcriptStore ?? createInMemoryTranscriptStore(),
  });
}

export function jsonPost(body: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}
