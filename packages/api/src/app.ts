import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { ChatOrchestrator } from '@searchwise/core/src/orchestration/chat-orchestrator.js';
import type { TranscriptStore } from '@searchwise/core/src/session/transcript-store.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';
import { health, API_VERSION } from './routes/health.js';
import { createChatRoutes } from './routes/chat.js';
import { createSearchRoutes } from './routes/search.js';
import { createTranscriptRoutes } from './routes/transcripts.js';

export interface AppDeps {
  readonly orchestrator: ChatOrchestrator;
  readonly transcriptStore: TranscriptStore;
}

export function createApp(deps: AppDeps): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);
  app.use('*', requestLogger);

  app.onError(errorHandler);

  app.route('/health', health);

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'Searchwise API',
        version: API_VERSION,
        description: 'Chat assistant that grounds its answers in live web search results',
      },
    });
    return c.json(spec);
  });

  app.route('/chat', createChatRoutes(deps.orchestrator));
  app.route('/search', createSearchRoutes(deps.orchestrator));
  app.route('/transcripts', createTranscriptRoutes(deps.transcriptStore));

  return app;
}
