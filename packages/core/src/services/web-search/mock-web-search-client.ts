import { createChildLogger } from '@searchwise/shared/src/logger.js';
import type {
  SearchOutcome,
  SearchQuery,
  SearchResultItem,
} from '@searchwise/shared/src/types/search.types.js';
import type { SearchClient } from './types.js';

const log = createChildLogger('web-search:mock');

function defaultItems(queryText: string): readonly SearchResultItem[] {
  return [1, 2].map((n) => ({
    title: `Mock result ${String(n)} for ${queryText}`,
    url: `https://example.com/source${String(n)}`,
    description: 'Mock web search result with general information about the topic.',
    hostname: 'example.com',
    age: '',
    contentType: '',
    extraSnippets: [],
    schemaTypes: [],
  }));
}

export function createMockSearchClient(
  responses?: Map<string, readonly SearchResultItem[]>,
): SearchClient {
  log.info('Using mock web search client');

  function fetch(query: SearchQuery): Promise<SearchOutcome> {
    log.debug({ query: query.text }, 'Mock web search');

    const items = responses?.get(query.text) ?? defaultItems(query.text);
    return Promise.resolve({
      status: 'success',
      response: { originalQuery: query.text, items: items.slice(0, query.count) },
    });
  }

  return {
    fetch,
    fetchWithRetry: (query: SearchQuery) => fetch(query),
  };
}
