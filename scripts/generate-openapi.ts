import { createApp } from '../packages/api/src/app.js';
import { createMockChatClient } from '../packages/core/src/llm/mock-chat-client.js';
import { createChatOrchestrator } from '../packages/core/src/orchestration/chat-orchestrator.js';
import { createMockSearchClient } from '../packages/core/src/services/web-search/mock-web-search-client.js';
import { createInMemoryTranscriptStore } from '../packages/core/src/session/in-memory-transcript-store.js';
import { API_VERSION } from '../packages/api/src/routes/health.js';

// Route definitions do not depend on the clients, so mocks are enough to build the document.
const app = createApp({
  orchestrator: createChatOrchestrator({
    searchClient: createMockSearchClient(),
    chatClient: createMockChatClient(),
    settings: {
      autoSearch: true,
      contextDetail: 'detailed',
      search: { count: 10, languageHint: 'auto', safesearch: 'moderate', maxRetries: 0 },
    },
  }),
  transcriptStore: createInMemoryTranscriptStore(),
});

const doc = app.getOpenAPI31Document({
  openapi: '3.1.0',
  info: {
    title: 'Searchwise API',
    version: API_VERSION,
    description: 'Chat assistant that grounds its answers in live web search results',
  },
  servers: [
    { url: 'http://localhost:3000', description: 'Local development' },
  ],
});

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');
