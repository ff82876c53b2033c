import { z } from 'zod';
import type { SearchResponse, SearchResultItem } from '@searchwise/shared/src/types/search.types.js';

const TextSchema = z.union([z.string(), z.number()]).transform(String);

// Missing or null text fields read as empty strings; one sparse item must not void the page.
const OptionalTextSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const BraveResultSchema = z.object({
  title: OptionalTextSchema,
  url: OptionalTextSchema,
  description: OptionalTextSchema,
  age: z.string().optional(),
  content_type: z.string().optional(),
  meta_url: z.object({ hostname: z.string().optional() }).optional(),
  extra_snippets: z.array(z.string()).optional(),
  article: z
    .object({
      author: z.array(z.object({ name: z.string().optional() })).optional(),
      date: z.string().optional(),
    })
    .optional(),
  rating: z
    .object({
      ratingValue: TextSchema.optional(),
      reviewCount: TextSchema.optional(),
    })
    .optional(),
  video: z
    .object({
      duration: z.string().optional(),
      views: TextSchema.optional(),
    })
    .optional(),
  schemas: z.array(z.unknown()).optional(),
});

// `web` is omitted by the provider when nothing matched.
const BravePayloadSchema = z.object({
  query: z.object({ original: z.string() }),
  web: z.object({ results: z.array(BraveResultSchema) }).optional(),
});

type BraveResult = z.infer<typeof BraveResultSchema>;

export type PayloadParseResult =
  | { readonly success: true; readonly response: SearchResponse }
  | { readonly success: false; readonly message: string };

function extractSchemaTypes(schemas: readonly unknown[]): string[] {
  const types: string[] = [];
  for (const schema of schemas) {
    if (typeof schema !== 'object' || schema === null || !('@type' in schema)) {
      continue;
    }
    const type: unknown = schema['@type'];
    if (typeof type === 'string' && type) {
      types.push(type);
    }
  }
  return types;
}

function toResultItem(raw: BraveResult): SearchResultItem {
  const author = raw.article?.author?.[0]?.name;
  const ratingValue = raw.rating?.ratingValue;
  const video = raw.video;

  return {
    title: raw.title,
    url: raw.url,
    description: raw.description,
    hostname: raw.meta_url?.hostname ?? '',
    age: raw.age ?? '',
    contentType: raw.content_type ?? '',
    extraSnippets: raw.extra_snippets ?? [],
    articleAuthor: author || undefined,
    articleDate: raw.article?.date || undefined,
    rating: ratingValue
      ? { value: ratingValue, reviewCount: raw.rating?.reviewCount || undefined }
      : undefined,
    videoInfo:
      video && (video.duration || video.views)
        ? { duration: video.duration || undefined, views: video.views || undefined }
        : undefined,
    schemaTypes: extractSchemaTypes(raw.schemas ?? []),
  };
}

export function parseBravePayload(body: unknown): PayloadParseResult {
  const result = BravePayloadSchema.safeParse(body);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return { success: false, message: `Malformed search payload: ${issues.join('; ')}` };
  }

  return {
    success: true,
    response: {
      originalQuery: result.data.query.original,
      items: (result.data.web?.results ?? []).map(toResultItem),
    },
  };
}
