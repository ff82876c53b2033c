import { z } from 'zod';

export const SafeSearchSchema = z.enum(['off', 'moderate', 'strict']);

export const FreshnessSchema = z.enum(['day', 'week', 'month', 'year']);

// Empty input means "let the provider decide", same as `auto`.
export const LanguageHintSchema = z.preprocess(
  (value) => (value === '' ? 'auto' : value),
  z.union([z.literal('auto'), z.string().regex(/^[a-z]{2,3}(-[a-z]{2,4})?$/i)]),
);

export const SearchQuerySchema = z.object({
  text: z.string().trim().min(1),
  count: z.number().int().min(1).max(20).default(10),
  languageHint: LanguageHintSchema.default('auto'),
  safesearch: SafeSearchSchema.default('moderate'),
  freshness: FreshnessSchema.optional(),
  country: z.string().length(2).optional(),
});

export type SearchQueryInput = z.input<typeof SearchQuerySchema>;
