import { z } from '@hono/zod-openapi';
import { ChatMessageBodySchema, SearchResponseBodySchema } from './responses.js';

export const TurnOptionsSchema = z
  .object({
    autoSearch: z.boolean().optional(),
    contextDetail: z.enum(['detailed', 'simple']).optional(),
    count: z.number().int().min(1).max(20).optional(),
    languageHint: z.string().optional(),
    safesearch: z.enum(['off', 'moderate', 'strict']).optional(),
    freshness: z.enum(['day', 'week', 'month', 'year']).optional(),
    country: z.string().length(2).optional(),
  })
  .openapi('TurnOptions');

export const ChatTurnRequestSchema = z
  .object({
    transcript: z.array(ChatMessageBodySchema).default([]),
    message: z.string().trim().min(1),
    options: TurnOptionsSchema.optional(),
  })
  .openapi('ChatTurnRequest');

export type ChatTurnRequest = z.infer<typeof ChatTurnRequestSchema>;

export const SearchRequestSchema = z
  .object({
    query: z.string().trim().min(1),
    options: TurnOptionsSchema.optional(),
  })
  .openapi('SearchRequest');

export const ExplainSearchRequestSchema = z
  .object({
    transcript: z.array(ChatMessageBodySchema).default([]),
    query: z.string().trim().min(1),
    response: SearchResponseBodySchema,
  })
  .openapi('ExplainSearchRequest');

export const SaveTranscriptRequestSchema = z
  .object({
    transcript: z.array(ChatMessageBodySchema),
    name: z.string().min(1).optional(),
  })
  .openapi('SaveTranscriptRequest');

export const TranscriptNameParamSchema = z.object({
  name: z.string().min(1),
});
