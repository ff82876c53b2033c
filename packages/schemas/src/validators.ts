import type { ZodError } from 'zod';
import type { SearchQuery } from '@searchwise/shared/src/types/search.types.js';
import type { ChatTranscript } from '@searchwise/shared/src/types/chat.types.js';
import { SchemaValidationError } from '@searchwise/shared/src/utils/errors.js';
import { AppConfigSchema } from './app-config.schema.js';
import type { AppConfig } from './app-config.schema.js';
import { SearchQuerySchema } from './search-query.schema.js';
import type { SearchQueryInput } from './search-query.schema.js';
import { TranscriptSchema } from './transcript.schema.js';

function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateAppConfig(data: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid application configuration', formatZodErrors(result.error));
  }

  return result.data;
}

/**
 * Builds an immutable search query, filling in provider defaults.
 */
export function createSearchQuery(input: SearchQueryInput): SearchQuery {
  const result = SearchQuerySchema.safeParse(input);

  if (!result.success) {
    throw new SchemaValidationError('Invalid search query', formatZodErrors(result.error));
  }

  return Object.freeze(result.data);
}

export function validateTranscript(data: unknown): ChatTranscript {
  const result = TranscriptSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid chat transcript', formatZodErrors(result.error));
  }

  return result.data;
}
