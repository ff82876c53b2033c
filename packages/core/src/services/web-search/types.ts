import type { SearchOutcome, SearchQuery } from '@searchwise/shared/src/types/search.types.js';

export interface SearchClient {
  /** Exactly one provider request; never rejects. */
  fetch(query: SearchQuery): Promise<SearchOutcome>;
  /** Retries transient failures with exponential backoff; never rejects. */
  fetchWithRetry(query: SearchQuery, maxRetries?: number): Promise<SearchOutcome>;
}
