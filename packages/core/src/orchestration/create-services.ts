import type { AppConfig } from '@searchwise/schemas/src/app-config.schema.js';
import { createChildLogger } from '@searchwise/shared/src/logger.js';
import { createChatClient, type ChatClient } from '../llm/chat-client.js';
import { createMockChatClient } from '../llm/mock-chat-client.js';
import { createOpenAiCompletions } from '../llm/openai-completions.js';
import { createBraveSearchClient } from '../services/web-search/brave-search-client.js';
import { createMockSearchClient } from '../services/web-search/mock-web-search-client.js';
import type { SearchClient } from '../services/web-search/types.js';
import { createFileTranscriptStore } from '../session/file-transcript-store.js';
import type { TranscriptStore } from '../session/transcript-store.js';
import { createChatOrchestrator, type ChatOrchestrator } from './chat-orchestrator.js';

const log = createChildLogger('orchestration:services');

export interface Services {
  readonly searchClient: SearchClient;
  readonly chatClient: ChatClient;
  readonly orchestrator: ChatOrchestrator;
  readonly transcriptStore: TranscriptStore;
}

/** Wires the provider clients, the orchestrator and the transcript store from loaded config. */
export function createServices(config: AppConfig): Services {
  const { search, chat } = config;

  const searchClient = config.mock
    ? createMockSearchClient()
    : createBraveSearchClient({
        apiKey: search.apiKey,
        endpoint: search.endpoint,
        timeoutMs: search.timeoutMs,
        maxRetries: search.maxRetries,
        retryBaseDelayMs: config.retryBaseDelayMs,
      });

  const chatClient = config.mock
    ? createMockChatClient()
    : createChatClient(
        {
          model: chat.model,
          maxTokens: chat.maxTokens,
          temperature: chat.temperature,
          systemPrompt: chat.systemPrompt,
          contextTokenBudget: chat.contextTokenBudget,
          promptTokenBudget: chat.promptTokenBudget,
          maxRetries: chat.maxRetries,
          retryBaseDelayMs: config.retryBaseDelayMs,
        },
        { completions: createOpenAiCompletions({ apiKey: chat.apiKey, timeoutMs: chat.timeoutMs }) },
      );

  const orchestrator = createChatOrchestrator({
    searchClient,
    chatClient,
    settings: {
      autoSearch: config.autoSearch,
      contextDetail: config.contextDetail,
      search: {
        count: search.count,
        languageHint: search.languageHint,
        safesearch: search.safesearch,
        freshness: search.freshness,
        country: search.country,
        maxRetries: search.maxRetries,
      },
    },
  });

  log.info(
    { mock: config.mock, model: chat.model, transcriptDir: config.transcriptDir },
    'Services created',
  );

  return {
    searchClient,
    chatClient,
    orchestrator,
    transcriptStore: createFileTranscriptStore({ directory: config.transcriptDir }),
  };
}
