import { describe, it, expect, vi } from 'vitest';
import type { ChatTranscript } from '@searchwise/shared/src/types/chat.types.js';
import type { SearchOutcome, SearchQuery } from '@searchwise/shared/src/types/search.types.js';
import { SearchwiseError } from '@searchwise/shared/src/utils/errors.js';
import type { ChatClient } from '../llm/chat-client.js';
import { createMockSearchClient } from '../services/web-search/mock-web-search-client.js';
import type { SearchClient } from '../services/web-search/types.js';
import {
  clearSearch,
  clearTranscript,
  createChatOrchestrator,
  createSessionState,
} from './chat-orchestrator.js';
import type { OrchestratorSettings } from './chat-orchestrator.js';

const fixedNow = new Date('2024-05-01T09:00:00.000Z');

const settings: OrchestratorSettings = {
  autoSearch: true,
  contextDetail: 'detailed',
  search: { count: 10, languageHint: 'auto', safesearch: 'moderate', maxRetries: 2 },
};

function createFakeChatClient(reply = 'assistant reply') {
  const respondWithRetry = vi.fn(
    (_history: ChatTranscript, _searchContext?: string): Promise<string> => Promise.resolve(reply),
  );
  const client: ChatClient = {
    respond: (history, searchContext) => respondWithRetry(history, searchContext),
    respondWithRetry,
  };
  return { client, respondWithRetry };
}

function createSpySearchClient(outcome?: SearchOutcome) {
  const mock = createMockSearchClient();
  const fetchWithRetry = vi.fn(
    (query: SearchQuery, _maxRetries?: number): Promise<SearchOutcome> =>
      outcome ? Promise.resolve(outcome) : mock.fetch(query),
  );
  const client: SearchClient = { fetch: mock.fetch, fetchWithRetry };
  return { client, fetchWithRetry };
}

const failure: SearchOutcome = {
  status: 'failure',
  failure: { kind: 'auth_failed', message: 'HTTP 401: nope', retryable: false, httpStatus: 401 },
};

describe('createChatOrchestrator', () => {
  describe('handleTurn', () => {
    it('should answer without searching when the trigger does not fire', async () => {
      const search = createSpySearchClient();
      const chat = createFakeChatClient('Hi!');
      const orchestrator = createChatOrchestrator({
        searchClient: search.client,
        chatClient: chat.client,
        settings,
        now: () => fixedNow,
      });

      const result = await orchestrator.handleTurn(createSessionState(), 'hello');

      expect(search.fetchWithRetry).not.toHaveBeenCalled();
      expect(chat.respondWithRetry).toHaveBeenCalledWith(
        [{ role: 'user', content: 'hello', timestamp: '2024-05-01T09:00:00.000Z' }],
        undefined,
      );
      expect(result.reply).toBe('Hi!');
      expect(result.search).toBeUndefined();
      expect(result.state).toEqual({
        transcript: [
          { role: 'user', content: 'hello', timestamp: '2024-05-01T09:00:00.000Z' },
          { role: 'assistant', content: 'Hi!', timestamp: '2024-05-01T09:00:00.000Z' },
        ],
      });
    });

    it('should search, ground the reply, and record the search', async () => {
      const search = createSpySearchClient();
      const chat = createFakeChatClient();
      const orchestrator = createChatOrchestrator({
        searchClient: search.client,
        chatClient: chat.client,
        settings,
      });

      const result = await orchestrator.handleTurn(createSessionState(), '東京の天気について教えて');

      const [query, maxRetries] = search.fetchWithRetry.mock.calls[0] ?? [];
      expect(query?.text).toBe('東京の天気');
      expect(query?.count).toBe(8);
      expect(maxRetries).toBe(2);

      const [, context] = chat.respondWithRetry.mock.calls[0] ?? [];
      expect(context?.startsWith('検索クエリ: 東京の天気\n検索結果数: 2件')).toBe(true);

      expect(result.search?.query).toBe('東京の天気');
      expect(result.search?.summary).toBe('「東京の天気」の検索結果 2件');
      expect(result.search?.markdown.startsWith('### 🔍 検索結果: "東京の天気" (2件)')).toBe(true);
      expect(result.state.lastSearch?.query).toBe('東京の天気');
      expect(result.state.transcript).toHaveLength(2);
    });

    it('should use the simple context when asked', async () => {
      const search = createSpySearchClient();
      const chat = createFakeChatClient();
      const orchestrator = createChatOrchestrator({
        searchClient: search.client,
        chatClient: chat.client,
        settings,
      });

      await orchestrator.handleTurn(createSessionState(), '最新ニュース', { contextDetail: 'simple' });

      const [, context] = chat.respondWithRetry.mock.calls[0] ?? [];
      expect(context?.startsWith('検索結果:\n1. Mock result 1 for 最新ニュース')).toBe(true);
    });

    it('should continue without context when the search fails', async () => {
      const search = createSpySearchClient(failure);
      const chat = createFakeChatClient();
      const orchestrator = createChatOrchestrator({
        searchClient: search.client,
        chatClient: chat.client,
        settings,
      });

      const result = await orchestrator.handleTurn(createSessionState(), '今日のニュース');

      const [, context] = chat.respondWithRetry.mock.calls[0] ?? [];
      expect(context).toBeUndefined();
      expect(result.reply).toBe('assistant reply');
      expect(result.search?.summary).toBe('検索結果なし');
      expect(result.search?.markdown).toBe('🔍 検索結果が見つかりませんでした。');
      expect(result.state.lastSearch).toBeUndefined();
    });

    it('should skip the trigger when auto search is off', async () => {
      const search = createSpySearchClient();
      const chat = createFakeChatClient();
      const orchestrator = createChatOrchestrator({
        searchClient: search.client,
        chatClient: chat.client,
        settings: { ...settings, autoSearch: false },
      });

      await orchestrator.handleTurn(createSessionState(), '最新ニュース');

      expect(search.fetchWithRetry).not.toHaveBeenCalled();
    });

    it('should not modify the incoming state', async () => {
      const search = createSpySearchClient();
      const chat = createFakeChatClient();
      const orchestrator = createChatOrchestrator({
        searchClient: search.client,
        chatClient: chat.client,
        settings,
      });
      const state = createSessionState();

      await orchestrator.handleTurn(state, 'hello');

      expect(state.transcript).toEqual([]);
    });
  });

  describe('search', () => {
    it('should run a direct search with the full count and overrides', async () => {
      const search = createSpySearchClient();
      const orchestrator = createChatOrchestrator({
        searchClient: search.client,
        chatClient: createFakeChatClient().client,
        settings: { ...settings, search: { ...settings.search, count: 15 } },
      });

      const result = await orchestrator.search(createSessionState(), '  typescript  ', {
        languageHint: 'en',
        freshness: 'week',
      });

      const [query] = search.fetchWithRetry.mock.calls[0] ?? [];
      expect(query).toMatchObject({ text: 'typescript', count: 15, languageHint: 'en', freshness: 'week' });
      expect(result.search.summary).toBe('「typescript」の検索結果 2件');
      expect(result.state.lastSearch?.query).toBe('typescript');
      expect(result.state.transcript).toEqual([]);
    });

    it('should record failed searches too', async () => {
      const orchestrator = createChatOrchestrator({
        searchClient: createSpySearchClient(failure).client,
        chatClient: createFakeChatClient().client,
        settings,
      });

      const result = await orchestrator.search(createSessionState(), 'x');

      expect(result.state.lastSearch?.outcome).toEqual(failure);
    });
  });

  describe('explainLastSearch', () => {
    it('should ask about the last search with its detailed context', async () => {
      const chat = createFakeChatClient('explanation');
      const orchestrator = createChatOrchestrator({
        searchClient: createSpySearchClient().client,
        chatClient: chat.client,
        settings,
        now: () => fixedNow,
      });
      const searched = await orchestrator.search(createSessionState(), 'vitest');

      const result = await orchestrator.explainLastSearch(searched.state);

      const [history, context] = chat.respondWithRetry.mock.calls[0] ?? [];
      expect(history).toEqual([
        {
          role: 'user',
          content: '「vitest」について、検索結果を踏まえて説明してください。',
          timestamp: '2024-05-01T09:00:00.000Z',
        },
      ]);
      expect(context?.startsWith('検索クエリ: vitest')).toBe(true);
      expect(result.reply).toBe('explanation');
      expect(result.state.transcript).toHaveLength(2);
      expect(result.state.lastSearch?.query).toBe('vitest');
    });

    it('should refuse when there is no successful search', async () => {
      const orchestrator = createChatOrchestrator({
        searchClient: createSpySearchClient(failure).client,
        chatClient: createFakeChatClient().client,
        settings,
      });
      const searched = await orchestrator.search(createSessionState(), 'x');

      await expect(orchestrator.explainLastSearch(createSessionState())).rejects.toBeInstanceOf(
        SearchwiseError,
      );
      await expect(orchestrator.explainLastSearch(searched.state)).rejects.toMatchObject({
        code: 'NO_SEARCH_RESULTS',
      });
    });
  });
});

describe('session state helpers', () => {
  it('should clear the transcript or the search independently', () => {
    const state = {
      transcript: [{ role: 'user' as const, content: 'hi', timestamp: '2024-05-01T09:00:00.000Z' }],
      lastSearch: { query: 'q', outcome: failure },
    };

    expect(clearTranscript(state)).toEqual({ transcript: [], lastSearch: state.lastSearch });
    expect(clearSearch(state)).toEqual({ transcript: state.transcript });
  });
});
