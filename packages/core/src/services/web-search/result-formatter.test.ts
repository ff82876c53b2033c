import { describe, it, expect } from 'vitest';
import type {
  SearchOutcome,
  SearchResponse,
  SearchResultItem,
} from '@searchwise/shared/src/types/search.types.js';
import {
  NO_RESULTS_MARKDOWN,
  NO_RESULTS_SUMMARY,
  NO_RESULTS_TEXT,
  summarizeSearch,
  toDetailedContext,
  toDisplayMarkdown,
  toSimpleContext,
} from './result-formatter.js';

function createItem(overrides: Partial<SearchResultItem> = {}): SearchResultItem {
  return {
    title: 'Result',
    url: 'https://example.com/r',
    description: 'A description',
    hostname: '',
    age: '',
    contentType: '',
    extraSnippets: [],
    schemaTypes: [],
    ...overrides,
  };
}

function createResponse(items: readonly SearchResultItem[], originalQuery = 'tokyo weather'): SearchResponse {
  return { originalQuery, items };
}

function numberedItems(count: number): SearchResultItem[] {
  return Array.from({ length: count }, (_, i) =>
    createItem({ title: `Title ${String(i + 1)}`, url: `https://example.com/${String(i + 1)}` }),
  );
}

const failure: SearchOutcome = {
  status: 'failure',
  failure: { kind: 'network_timeout', message: 'Search request timed out', retryable: true },
};

describe('toDetailedContext', () => {
  it('should render the header and every available field of an item', () => {
    const item = createItem({
      title: 'Weather today',
      url: 'https://example.com/weather',
      description: 'Sunny with clouds',
      hostname: 'example.com',
      age: '1 hour ago',
      contentType: 'article',
      extraSnippets: ['a', 'b', 'c', 'd'],
      articleAuthor: 'Test Author',
      articleDate: '2024-06-01',
      rating: { value: '4.5', reviewCount: '10' },
      videoInfo: { duration: '3:00', views: '500' },
      schemaTypes: ['Article', 'NewsArticle', 'WebPage', 'Thing'],
    });

    const context = toDetailedContext(createResponse([item]));

    expect(context).toBe(
      [
        '検索クエリ: tokyo weather',
        '検索結果数: 1件',
        '='.repeat(50),
        '',
        '【結果 1】',
        'タイトル: Weather today',
        'URL: https://example.com/weather',
        'サイト: example.com',
        '説明: Sunny with clouds',
        '追加情報: a | b | c',
        '更新時期: 1 hour ago',
        'コンテンツタイプ: article',
        '著者: Test Author',
        '公開日: 2024-06-01',
        '評価: 4.5 (10件のレビュー)',
        '動画時間: 3:00',
        '再生回数: 500',
        '構造化データ: Article, NewsArticle, WebPage',
      ].join('\n'),
    );
  });

  it('should omit empty optional fields', () => {
    const context = toDetailedContext(createResponse([createItem({ description: '' })]));

    expect(context).toBe(
      [
        '検索クエリ: tokyo weather',
        '検索結果数: 1件',
        '='.repeat(50),
        '',
        '【結果 1】',
        'タイトル: Result',
        'URL: https://example.com/r',
      ].join('\n'),
    );
  });

  it('should show a rating without a review count', () => {
    const context = toDetailedContext(createResponse([createItem({ rating: { value: '3' } })]));
    expect(context.split('\n')).toContain('評価: 3');
  });

  it('should cap the context at eight items but report the full count', () => {
    const context = toDetailedContext(createResponse(numberedItems(10)));

    expect(context.match(/【結果 /g)).toHaveLength(8);
    expect(context).toContain('検索結果数: 10件');
    expect(context).toContain('【結果 8】');
    expect(context).not.toContain('【結果 9】');
  });

  it('should cut long descriptions to 300 characters', () => {
    const context = toDetailedContext(createResponse([createItem({ description: 'a'.repeat(400) })]));
    expect(context.split('\n')).toContain(`説明: ${'a'.repeat(300)}...`);
  });

  it('should label untitled items', () => {
    const context = toDetailedContext(createResponse([createItem({ title: '' })]));
    expect(context.split('\n')).toContain('タイトル: タイトルなし');
  });

  it('should accept a successful outcome', () => {
    const outcome: SearchOutcome = { status: 'success', response: createResponse([createItem()]) };
    expect(toDetailedContext(outcome)).toBe(toDetailedContext(createResponse([createItem()])));
  });

  it('should return the sentinel for failures and empty results', () => {
    expect(toDetailedContext(failure)).toBe(NO_RESULTS_TEXT);
    expect(toDetailedContext(createResponse([]))).toBe('検索結果が見つかりませんでした。');
  });
});

describe('toSimpleContext', () => {
  it('should render numbered blocks with URL and summary', () => {
    const context = toSimpleContext(
      createResponse([
        createItem({ title: 'One', url: 'https://example.com/1', description: 'First' }),
        createItem({ title: 'Two', url: 'https://example.com/2', description: '' }),
      ]),
    );

    expect(context).toBe(
      '検索結果:\n' +
        '1. One\nURL: https://example.com/1\n概要: First\n' +
        '\n' +
        '2. Two\nURL: https://example.com/2\n概要: 説明なし\n',
    );
  });

  it('should include at most five items', () => {
    const context = toSimpleContext(createResponse(numberedItems(7)));

    expect(context).toContain('5. Title 5');
    expect(context).not.toContain('6. Title 6');
  });

  it('should cut descriptions to 200 characters', () => {
    const context = toSimpleContext(createResponse([createItem({ description: 'b'.repeat(250) })]));
    expect(context.split('\n')).toContain(`概要: ${'b'.repeat(200)}...`);
  });

  it('should return the sentinel when there is nothing to show', () => {
    expect(toSimpleContext(failure)).toBe(NO_RESULTS_TEXT);
    expect(toSimpleContext(createResponse([]))).toBe(NO_RESULTS_TEXT);
  });
});

describe('toDisplayMarkdown', () => {
  it('should render a heading and a linked entry per item', () => {
    const markdown = toDisplayMarkdown(
      createResponse([
        createItem({ title: 'One', url: 'https://example.com/1', description: 'First' }),
        createItem({ title: '', url: 'https://example.com/2', description: '' }),
      ]),
    );

    expect(markdown).toBe(
      '### 🔍 検索結果: "tokyo weather" (2件)\n\n' +
        '**1. [One](https://example.com/1)**\nFirst\n\n' +
        '**2. [タイトルなし](https://example.com/2)**\n説明なし\n\n',
    );
  });

  it('should list every item regardless of count', () => {
    const markdown = toDisplayMarkdown(createResponse(numberedItems(12)));

    expect(markdown).toContain('(12件)');
    expect(markdown).toContain('**12. [Title 12](https://example.com/12)**');
  });

  it('should cut descriptions to 150 characters', () => {
    const markdown = toDisplayMarkdown(createResponse([createItem({ description: 'c'.repeat(151) })]));
    expect(markdown.split('\n')).toContain(`${'c'.repeat(150)}...`);
  });

  it('should produce the same output for the same input', () => {
    const response = createResponse(numberedItems(3));
    expect(toDisplayMarkdown(response)).toBe(toDisplayMarkdown(response));
  });

  it('should return the markdown sentinel when there is nothing to show', () => {
    expect(toDisplayMarkdown(failure)).toBe(NO_RESULTS_MARKDOWN);
    expect(toDisplayMarkdown(createResponse([]))).toBe('🔍 検索結果が見つかりませんでした。');
  });
});

describe('summarizeSearch', () => {
  it('should describe the query and result count', () => {
    expect(summarizeSearch(createResponse(numberedItems(3)))).toBe('「tokyo weather」の検索結果 3件');
  });

  it('should still count an empty successful search', () => {
    expect(summarizeSearch({ status: 'success', response: createResponse([]) })).toBe(
      '「tokyo weather」の検索結果 0件',
    );
  });

  it('should report failures as no results', () => {
    expect(summarizeSearch(failure)).toBe(NO_RESULTS_SUMMARY);
  });
});
