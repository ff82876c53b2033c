import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import {
  createSessionState,
  type ChatOrchestrator,
} from '@searchwise/core/src/orchestration/chat-orchestrator.js';
import { createRouter, type AppEnv } from '../types.js';
import { ExplainSearchRequestSchema, SearchRequestSchema } from '../schemas/requests.js';
import {
  ChatTurnResponseSchema,
  ErrorResponseSchema,
  SearchReportSchema,
} from '../schemas/responses.js';
import { toMessageBodies, toSearchReportBody } from './serialize.js';

const searchRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Search'],
  summary: 'Run a web search and return it formatted for display',
  request: {
    body: {
      content: {
        'application/json': {
          schema: SearchRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Search outcome with display markdown and a one-line summary',
      content: {
        'application/json': {
          schema: SearchReportSchema,
        },
      },
    },
    400: {
      description: 'Validation error',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

const explainRoute = createRoute({
  method: 'post',
  path: '/explain',
  tags: ['Search'],
  summary: 'Ask the assistant to explain a search response',
  request: {
    body: {
      content: {
        'application/json': {
          schema: ExplainSearchRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Assistant explanation and the updated transcript',
      content: {
        'application/json': {
          schema: ChatTurnResponseSchema,
        },
      },
    },
    400: {
      description: 'Validation error',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

export function createSearchRoutes(orchestrator: ChatOrchestrator): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(searchRoute, async (c) => {
    const body = c.req.valid('json');

    const result = await orchestrator.search(createSessionState(), body.query, body.options);

    return c.json(toSearchReportBody(result.search), 200);
  });

  routes.openapi(explainRoute, async (c) => {
    const body = c.req.valid('json');

    const result = await orchestrator.explainLastSearch({
      transcript: body.transcript,
      lastSearch: { query: body.query, outcome: { status: 'success', response: body.response } },
    });

    return c.json(
      {
        reply: result.reply,
        transcript: toMessageBodies(result.state.transcript),
      },
      200,
    );
  });

  return routes;
}
