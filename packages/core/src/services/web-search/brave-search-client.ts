import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { createChildLogger } from '@searchwise/shared/src/logger.js';
import { ConfigurationError } from '@searchwise/shared/src/utils/errors.js';
import type {
  Freshness,
  SearchFailure,
  SearchOutcome,
  SearchQuery,
} from '@searchwise/shared/src/types/search.types.js';
import { BRAVE_SEARCH_ENDPOINT } from '@searchwise/schemas/src/app-config.schema.js';
import { parseBravePayload } from './brave-payload.js';
import type { SearchClient } from './types.js';

const log = createChildLogger('web-search:brave');

const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_MAX_RETRIES = 2;
const BASE_DELAY_MS = 1000;
const ERROR_BODY_EXCERPT = 300;

const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 502, 503, 504]);
const TIMEOUT_CODES: ReadonlySet<string> = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const FRESHNESS_PARAMS: Record<Freshness, string> = {
  day: 'pd',
  week: 'pw',
  month: 'pm',
  year: 'py',
};

export interface BraveSearchClientConfig {
  readonly apiKey: string;
  readonly endpoint?: string;
  readonly timeoutMs?: number;
  readonly maxRetries?: number;
  /** One backoff unit; the first retry waits this long, then it doubles. */
  readonly retryBaseDelayMs?: number;
}

export interface BraveSearchClientDeps {
  readonly http?: AxiosInstance;
  readonly sleep?: (ms: number) => Promise<void>;
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Only a concrete language code is forwarded: the provider mishandles some
 * language values, so leaving the parameter out is safer than guessing.
 */
export function buildSearchParams(query: SearchQuery): Record<string, string | number> {
  const params: Record<string, string | number> = {
    q: query.text,
    count: query.count,
    safesearch: query.safesearch,
  };

  const language = query.languageHint.trim();
  if (language && language !== 'auto') {
    params['search_lang'] = language;
  }
  if (query.country) {
    params['country'] = query.country;
  }
  if (query.freshness) {
    params['freshness'] = FRESHNESS_PARAMS[query.freshness];
  }

  return params;
}

function bodyExcerpt(data: unknown): string {
  const text = typeof data === 'string' ? data : JSON.stringify(data) ?? '';
  return text.slice(0, ERROR_BODY_EXCERPT);
}

function classifyResponse(response: AxiosResponse<unknown>): SearchOutcome {
  const { status } = response;

  if (status === 200) {
    const parsed = parseBravePayload(response.data);
    if (parsed.success) {
      return { status: 'success', response: parsed.response };
    }
    return {
      status: 'failure',
      failure: { kind: 'malformed_response', message: parsed.message, retryable: false, httpStatus: status },
    };
  }

  const message = `HTTP ${String(status)}: ${bodyExcerpt(response.data)}`;

  if (status === 401 || status === 403) {
    return {
      status: 'failure',
      failure: { kind: 'auth_failed', message, retryable: false, httpStatus: status },
    };
  }

  if (status === 429) {
    return {
      status: 'failure',
      failure: { kind: 'rate_limited', message, retryable: true, httpStatus: status },
    };
  }

  return {
    status: 'failure',
    failure: {
      kind: 'provider_error',
      message,
      retryable: RETRYABLE_STATUSES.has(status),
      httpStatus: status,
    },
  };
}

function classifyRequestError(error: unknown): SearchFailure {
  if (axios.isAxiosError(error)) {
    if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
      return { kind: 'network_timeout', message: 'Search request timed out', retryable: true };
    }
    return {
      kind: 'network_unreachable',
      message: `Could not reach the search provider: ${error.message}`,
      retryable: false,
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { kind: 'provider_error', message: `Unexpected search error: ${message}`, retryable: false };
}

export function createBraveSearchClient(
  config: BraveSearchClientConfig,
  deps: BraveSearchClientDeps = {},
): SearchClient {
  if (!config.apiKey) {
    throw new ConfigurationError('API key is required for the Brave search client');
  }

  const endpoint = config.endpoint ?? BRAVE_SEARCH_ENDPOINT;
  const timeout = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const defaultMaxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
  const baseDelayMs = config.retryBaseDelayMs ?? BASE_DELAY_MS;
  const http = deps.http ?? axios.create();
  const wait = deps.sleep ?? sleep;

  log.info({ endpoint, timeout }, 'Creating Brave search client');

  async function fetchOnce(query: SearchQuery): Promise<SearchOutcome> {
    const params = buildSearchParams(query);
    log.debug({ params }, 'Executing web search');

    let outcome: SearchOutcome;
    try {
      const response = await http.get<unknown>(endpoint, {
        params,
        timeout,
        headers: {
          Accept: 'application/json',
          'Accept-Encoding': 'gzip',
          'X-Subscription-Token': config.apiKey,
        },
        validateStatus: () => true,
      });
      outcome = classifyResponse(response);
    } catch (error) {
      outcome = { status: 'failure', failure: classifyRequestError(error) };
    }

    if (outcome.status === 'success') {
      log.debug({ query: query.text, resultCount: outcome.response.items.length }, 'Web search completed');
    } else {
      log.warn(
        { query: query.text, kind: outcome.failure.kind, httpStatus: outcome.failure.httpStatus },
        'Web search failed',
      );
    }

    return outcome;
  }

  return {
    fetch: fetchOnce,

    async fetchWithRetry(query: SearchQuery, maxRetries = defaultMaxRetries): Promise<SearchOutcome> {
      let backoffMs = baseDelayMs;
      let outcome = await fetchOnce(query);

      for (
        let attempt = 0;
        attempt < maxRetries && outcome.status === 'failure' && outcome.failure.retryable;
        attempt++
      ) {
        log.warn(
          { attempt: attempt + 1, maxRetries, delayMs: backoffMs, kind: outcome.failure.kind },
          'Transient web search error, retrying',
        );
        await wait(backoffMs);
        backoffMs *= 2;
        outcome = await fetchOnce(query);
      }

      return outcome;
    },
  };
}
