import { z } from 'zod';
import { FreshnessSchema, LanguageHintSchema, SafeSearchSchema } from './search-query.schema.js';

export const BRAVE_SEARCH_ENDPOINT = 'https://api.search.brave.com/res/v1/web/search';

export const DEFAULT_SYSTEM_PROMPT =
  'あなたは親切で知識豊富なAIアシスタントです。日本語で丁寧に回答してください。';

const SearchSettingsSchema = z.object({
  apiKey: z.string().default(''),
  endpoint: z.string().url().default(BRAVE_SEARCH_ENDPOINT),
  count: z.number().int().min(1).max(20).default(10),
  languageHint: LanguageHintSchema.default('auto'),
  safesearch: SafeSearchSchema.default('moderate'),
  freshness: FreshnessSchema.optional(),
  country: z.string().length(2).optional(),
  timeoutMs: z.number().int().positive().default(15_000),
  maxRetries: z.number().int().min(0).max(10).default(2),
});

const ChatSettingsSchema = z.object({
  apiKey: z.string().default(''),
  model: z.string().min(1).default('gpt-3.5-turbo'),
  maxTokens: z.number().int().positive().default(1000),
  temperature: z.number().min(0).max(2).default(0.7),
  systemPrompt: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
  contextTokenBudget: z.number().int().positive().default(2000),
  promptTokenBudget: z.number().int().positive().default(4000),
  timeoutMs: z.number().int().positive().default(60_000),
  maxRetries: z.number().int().min(0).max(10).default(2),
});

export const AppConfigSchema = z.object({
  search: SearchSettingsSchema.default({}),
  chat: ChatSettingsSchema.default({}),
  /** One backoff "time unit". */
  retryBaseDelayMs: z.number().int().min(0).default(1000),
  contextDetail: z.enum(['detailed', 'simple']).default('detailed'),
  autoSearch: z.boolean().default(true),
  /** Directory where saved transcripts are written. */
  transcriptDir: z.string().min(1).default('./transcripts'),
  mock: z.boolean().default(false),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type SearchSettings = z.infer<typeof SearchSettingsSchema>;
export type ChatSettings = z.infer<typeof ChatSettingsSchema>;
