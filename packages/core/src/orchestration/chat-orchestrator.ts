import { createChildLogger } from '@searchwise/shared/src/logger.js';
import type {
  ChatSessionState,
  ContextDetail,
  LastSearch,
} from '@searchwise/shared/src/types/chat.types.js';
import type {
  Freshness,
  SafeSearchLevel,
  SearchOutcome,
} from '@searchwise/shared/src/types/search.types.js';
import { SearchwiseError } from '@searchwise/shared/src/utils/errors.js';
import { createSearchQuery } from '@searchwise/schemas/src/validators.js';
import { extractQuery, shouldSearch } from '../agents/search-trigger.js';
import type { ChatClient } from '../llm/chat-client.js';
import {
  summarizeSearch,
  toDetailedContext,
  toDisplayMarkdown,
  toSimpleContext,
} from '../services/web-search/result-formatter.js';
import type { SearchClient } from '../services/web-search/types.js';
import { appendMessage } from '../session/transcript.js';

const log = createChildLogger('orchestration:chat');

/** Searches triggered from chat never ask for more results than the detailed context shows. */
const CHAT_SEARCH_COUNT_LIMIT = 8;

export interface SearchDefaults {
  readonly count: number;
  readonly languageHint: string;
  readonly safesearch: SafeSearchLevel;
  readonly freshness?: Freshness;
  readonly country?: string;
  readonly maxRetries: number;
}

export interface OrchestratorSettings {
  readonly autoSearch: boolean;
  readonly contextDetail: ContextDetail;
  readonly search: SearchDefaults;
}

export interface TurnOptions {
  readonly autoSearch?: boolean;
  readonly contextDetail?: ContextDetail;
  readonly count?: number;
  readonly languageHint?: string;
  readonly safesearch?: SafeSearchLevel;
  readonly freshness?: Freshness;
  readonly country?: string;
}

export interface SearchReport {
  readonly query: string;
  readonly outcome: SearchOutcome;
  readonly markdown: string;
  readonly summary: string;
}

export interface TurnResult {
  readonly state: ChatSessionState;
  readonly reply: string;
  readonly search?: SearchReport;
}

export interface SearchResult {
  readonly state: ChatSessionState;
  readonly search: SearchReport;
}

export interface ChatOrchestrator {
  handleTurn(state: ChatSessionState, utterance: string, options?: TurnOptions): Promise<TurnResult>;
  search(state: ChatSessionState, queryText: string, options?: TurnOptions): Promise<SearchResult>;
  /** Asks the model to explain the last successful search. */
  explainLastSearch(state: ChatSessionState): Promise<TurnResult>;
}

export interface ChatOrchestratorDeps {
  readonly searchClient: SearchClient;
  readonly chatClient: ChatClient;
  readonly settings: OrchestratorSettings;
  readonly now?: () => Date;
}

export function createSessionState(): ChatSessionState {
  return { transcript: [] };
}

export function clearTranscript(state: ChatSessionState): ChatSessionState {
  return { ...state, transcript: [] };
}

export function clearSearch(state: ChatSessionState): ChatSessionState {
  return { transcript: state.transcript };
}

export function explainPrompt(query: string): string {
  return `「${query}」について、検索結果を踏まえて説明してください。`;
}

function formatContext(outcome: SearchOutcome, detail: ContextDetail): string {
  return detail === 'simple' ? toSimpleContext(outcome) : toDetailedContext(outcome);
}

function toReport(query: string, outcome: SearchOutcome): SearchReport {
  return {
    query,
    outcome,
    markdown: toDisplayMarkdown(outcome),
    summary: summarizeSearch(outcome),
  };
}

export function createChatOrchestrator(deps: ChatOrchestratorDeps): ChatOrchestrator {
  const { searchClient, chatClient, settings } = deps;
  const now = deps.now ?? (() => new Date());

  async function runSearch(queryText: string, options: TurnOptions, countLimit?: number): Promise<SearchOutcome> {
    const requested = options.count ?? settings.search.count;
    const query = createSearchQuery({
      text: queryText,
      count: countLimit === undefined ? requested : Math.min(requested, countLimit),
      languageHint: options.languageHint ?? settings.search.languageHint,
      safesearch: options.safesearch ?? settings.search.safesearch,
      freshness: options.freshness ?? settings.search.freshness,
      country: options.country ?? settings.search.country,
    });

    return searchClient.fetchWithRetry(query, settings.search.maxRetries);
  }

  return {
    async handleTurn(state, utterance, options = {}): Promise<TurnResult> {
      let transcript = appendMessage(state.transcript, 'user', utterance, now());
      let lastSearch: LastSearch | undefined = state.lastSearch;
      let report: SearchReport | undefined;
      let searchContext: string | undefined;

      const autoSearch = options.autoSearch ?? settings.autoSearch;
      if (autoSearch && shouldSearch(utterance)) {
        const queryText = extractQuery(utterance);
        log.info({ query: queryText }, 'Utterance triggered a web search');

        const outcome = await runSearch(queryText, options, CHAT_SEARCH_COUNT_LIMIT);
        report = toReport(queryText, outcome);

        if (outcome.status === 'success') {
          searchContext = formatContext(outcome, options.contextDetail ?? settings.contextDetail);
          lastSearch = { query: queryText, outcome };
        } else {
          log.warn({ query: queryText, kind: outcome.failure.kind }, 'Continuing without search context');
        }
      }

      const reply = await chatClient.respondWithRetry(transcript, searchContext);
      transcript = appendMessage(transcript, 'assistant', reply, now());

      return {
        state: { transcript, ...(lastSearch ? { lastSearch } : {}) },
        reply,
        ...(report ? { search: report } : {}),
      };
    },

    async search(state, queryText, options = {}): Promise<SearchResult> {
      const text = queryText.trim();
      const outcome = await runSearch(text, options);
      log.info({ query: text, status: outcome.status }, 'Direct search finished');

      return {
        state: { ...state, lastSearch: { query: text, outcome } },
        search: toReport(text, outcome),
      };
    },

    async explainLastSearch(state): Promise<TurnResult> {
      const last = state.lastSearch;
      if (!last || last.outcome.status !== 'success') {
        throw new SearchwiseError('There is no successful search to explain', 'NO_SEARCH_RESULTS');
      }

      let transcript = appendMessage(state.transcript, 'user', explainPrompt(last.query), now());
      const reply = await chatClient.respondWithRetry(transcript, toDetailedContext(last.outcome));
      transcript = appendMessage(transcript, 'assistant', reply, now());

      return { state: { ...state, transcript }, reply };
    },
  };
}
