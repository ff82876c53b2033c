import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { TranscriptStore } from '@searchwise/core/src/session/transcript-store.js';
import { createRouter, type AppEnv } from '../types.js';
import { SaveTranscriptRequestSchema, TranscriptNameParamSchema } from '../schemas/requests.js';
import {
  ErrorResponseSchema,
  TranscriptListResponseSchema,
  TranscriptResponseSchema,
  TranscriptSavedResponseSchema,
} from '../schemas/responses.js';
import { toMessageBodies } from './serialize.js';

const saveTranscriptRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Transcripts'],
  summary: 'Save a chat transcript',
  request: {
    body: {
      content: {
        'application/json': {
          schema: SaveTranscriptRequestSchema,
        },
      },
    },
  },
  responses: {
    201: {
      description: 'Transcript saved',
      content: {
        'application/json': {
          schema: TranscriptSavedResponseSchema,
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

const listTranscriptsRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Transcripts'],
  summary: 'List saved transcripts',
  responses: {
    200: {
      description: 'Saved transcript names',
      content: {
        'application/json': {
          schema: TranscriptListResponseSchema,
        },
      },
    },
  },
});

const getTranscriptRoute = createRoute({
  method: 'get',
  path: '/{name}',
  tags: ['Transcripts'],
  summary: 'Load a saved transcript',
  request: {
    params: TranscriptNameParamSchema,
  },
  responses: {
    200: {
      description: 'The stored transcript',
      content: {
        'application/json': {
          schema: TranscriptResponseSchema,
        },
      },
    },
    404: {
      description: 'Transcript not found',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

export function createTranscriptRoutes(store: TranscriptStore): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(saveTranscriptRoute, async (c) => {
    const body = c.req.valid('json');
    const name = await store.save(body.transcript, body.name);

    return c.json({ name, messageCount: body.transcript.length }, 201);
  });

  routes.openapi(listTranscriptsRoute, async (c) => {
    const names = await store.list();
    return c.json({ names }, 200);
  });

  routes.openapi(getTranscriptRoute, async (c) => {
    const { name } = c.req.valid('param');
    const transcript = await store.load(name);

    return c.json({ name, transcript: toMessageBodies(transcript) }, 200);
  });

  return routes;
}
