import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { ChatOrchestrator } from '@searchwise/core/src/orchestration/chat-orchestrator.js';
import { createRouter, type AppEnv } from '../types.js';
import { ChatTurnRequestSchema } from '../schemas/requests.js';
import { ChatTurnResponseSchema, ErrorResponseSchema } from '../schemas/responses.js';
import { toMessageBodies, toSearchReportBody } from './serialize.js';

const createTurnRoute = createRoute({
  method: 'post',
  path: '/turns',
  tags: ['Chat'],
  summary: 'Answer one chat turn, searching the web when the message calls for it',
  request: {
    body: {
      content: {
        'application/json': {
          schema: ChatTurnRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Assistant reply and the updated transcript',
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

export function createChatRoutes(orchestrator: ChatOrchestrator): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(createTurnRoute, async (c) => {
    const body = c.req.valid('json');

    const result = await orchestrator.handleTurn(
      { transcript: body.transcript },
      body.message,
      body.options,
    );

    return c.json(
      {
        reply: result.reply,
        transcript: toMessageBodies(result.state.transcript),
        ...(result.search ? { search: toSearchReportBody(result.search) } : {}),
      },
      200,
    );
  });

  return routes;
}
