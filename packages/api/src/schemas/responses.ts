import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

// Chat messages
export const ChatMessageBodySchema = z
  .object({
    role: z.enum(['system', 'user', 'assistant']),
    content: z.string(),
    timestamp: z.string().datetime({ offset: true }),
  })
  .openapi('ChatMessage');

export type ChatMessageBody = z.infer<typeof ChatMessageBodySchema>;

// Search
export const SearchResultItemBodySchema = z
  .object({
    title: z.string(),
    url: z.string(),
    description: z.string(),
    hostname: z.string(),
    age: z.string(),
    contentType: z.string(),
    extraSnippets: z.array(z.string()),
    articleAuthor: z.string().optional(),
    articleDate: z.string().optional(),
    rating: z.object({ value: z.string(), reviewCount: z.string().optional() }).optional(),
    videoInfo: z.object({ duration: z.string().optional(), views: z.string().optional() }).optional(),
    schemaTypes: z.array(z.string()),
  })
  .openapi('SearchResultItem');

export const SearchResponseBodySchema = z
  .object({
    originalQuery: z.string(),
    items: z.array(SearchResultItemBodySchema),
  })
  .openapi('SearchResponse');

export type SearchResponseBody = z.infer<typeof SearchResponseBodySchema>;

export const SearchFailureBodySchema = z
  .object({
    kind: z.enum([
      'network_timeout',
      'network_unreachable',
      'rate_limited',
      'auth_failed',
      'malformed_response',
      'provider_error',
    ]),
    message: z.string(),
    retryable: z.boolean(),
    httpStatus: z.number().int().optional(),
  })
  .openapi('SearchFailure');

export const SearchOutcomeBodySchema = z
  .object({
    status: z.enum(['success', 'failure']),
    response: SearchResponseBodySchema.optional(),
    failure: SearchFailureBodySchema.optional(),
  })
  .openapi('SearchOutcome');

export const SearchReportSchema = z
  .object({
    query: z.string(),
    outcome: SearchOutcomeBodySchema,
    markdown: z.string(),
    summary: z.string(),
  })
  .openapi('SearchReport');

export type SearchReportBody = z.infer<typeof SearchReportSchema>;

// Chat
export const ChatTurnResponseSchema = z
  .object({
    reply: z.string(),
    transcript: z.array(ChatMessageBodySchema),
    search: SearchReportSchema.optional(),
  })
  .openapi('ChatTurnResponse');

export type ChatTurnResponseBody = z.infer<typeof ChatTurnResponseSchema>;

// Transcripts
export const TranscriptSavedResponseSchema = z
  .object({
    name: z.string(),
    messageCount: z.number().int(),
  })
  .openapi('TranscriptSavedResponse');

export const TranscriptListResponseSchema = z
  .object({
    names: z.array(z.string()),
  })
  .openapi('TranscriptListResponse');

export const TranscriptResponseSchema = z
  .object({
    name: z.string(),
    transcript: z.array(ChatMessageBodySchema),
  })
  .openapi('TranscriptResponse');
