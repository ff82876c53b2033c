import type {
  SearchOutcome,
  SearchResponse,
  SearchResultItem,
} from '@searchwise/shared/src/types/search.types.js';
import { truncateText } from '@searchwise/shared/src/utils/text.js';

export const NO_RESULTS_TEXT = '検索結果が見つかりませんでした。';
export const NO_RESULTS_MARKDOWN = `🔍 ${NO_RESULTS_TEXT}`;
export const NO_RESULTS_SUMMARY = '検索結果なし';

const UNTITLED = 'タイトルなし';
const NO_DESCRIPTION = '説明なし';

const DETAILED_ITEM_LIMIT = 8;
const DETAILED_DESCRIPTION_LIMIT = 300;
const SNIPPET_LIMIT = 3;
const SNIPPET_TEXT_LIMIT = 200;
const SCHEMA_TYPE_LIMIT = 3;

const SIMPLE_ITEM_LIMIT = 5;
const SIMPLE_DESCRIPTION_LIMIT = 200;

const DISPLAY_DESCRIPTION_LIMIT = 150;

type FormatterInput = SearchOutcome | SearchResponse;

function responseOf(input: FormatterInput): SearchResponse | undefined {
  if ('status' in input) {
    return input.status === 'success' ? input.response : undefined;
  }
  return input;
}

/** Failures and empty responses both collapse to `undefined`. */
function resultsOf(input: FormatterInput): SearchResponse | undefined {
  const response = responseOf(input);
  if (!response || response.items.length === 0) {
    return undefined;
  }
  return response;
}

function formatDetailedItem(item: SearchResultItem, index: number): string {
  const lines = [`\n【結果 ${String(index)}】`, `タイトル: ${item.title || UNTITLED}`, `URL: ${item.url}`];

  if (item.hostname) {
    lines.push(`サイト: ${item.hostname}`);
  }
  if (item.description) {
    lines.push(`説明: ${truncateText(item.description, DETAILED_DESCRIPTION_LIMIT)}`);
  }
  if (item.extraSnippets.length > 0) {
    const snippets = item.extraSnippets.slice(0, SNIPPET_LIMIT).join(' | ');
    lines.push(`追加情報: ${truncateText(snippets, SNIPPET_TEXT_LIMIT)}`);
  }
  if (item.age) {
    lines.push(`更新時期: ${item.age}`);
  }
  if (item.contentType) {
    lines.push(`コンテンツタイプ: ${item.contentType}`);
  }
  if (item.articleAuthor) {
    lines.push(`著者: ${item.articleAuthor}`);
  }
  if (item.articleDate) {
    lines.push(`公開日: ${item.articleDate}`);
  }
  if (item.rating) {
    const reviews = item.rating.reviewCount ? ` (${item.rating.reviewCount}件のレビュー)` : '';
    lines.push(`評価: ${item.rating.value}${reviews}`);
  }
  if (item.videoInfo?.duration) {
    lines.push(`動画時間: ${item.videoInfo.duration}`);
  }
  if (item.videoInfo?.views) {
    lines.push(`再生回数: ${item.videoInfo.views}`);
  }
  if (item.schemaTypes.length > 0) {
    lines.push(`構造化データ: ${item.schemaTypes.slice(0, SCHEMA_TYPE_LIMIT).join(', ')}`);
  }

  return lines.join('\n');
}

/**
 * High-fidelity model context: the first eight results with every piece of
 * metadata the provider returned.
 */
export function toDetailedContext(input: FormatterInput): string {
  const response = resultsOf(input);
  if (!response) {
    return NO_RESULTS_TEXT;
  }

  const blocks = [
    `検索クエリ: ${response.originalQuery}`,
    `検索結果数: ${String(response.items.length)}件`,
    '='.repeat(50),
    ...response.items
      .slice(0, DETAILED_ITEM_LIMIT)
      .map((item, i) => formatDetailedItem(item, i + 1)),
  ];

  return blocks.join('\n');
}

export function toSimpleContext(input: FormatterInput): string {
  const response = resultsOf(input);
  if (!response) {
    return NO_RESULTS_TEXT;
  }

  const blocks = response.items.slice(0, SIMPLE_ITEM_LIMIT).map((item, i) => {
    const description = truncateText(item.description || NO_DESCRIPTION, SIMPLE_DESCRIPTION_LIMIT);
    return `${String(i + 1)}. ${item.title || UNTITLED}\nURL: ${item.url}\n概要: ${description}\n`;
  });

  return `検索結果:\n${blocks.join('\n')}`;
}

/** Markdown for people, not for the model: every item, short descriptions. */
export function toDisplayMarkdown(input: FormatterInput): string {
  const response = resultsOf(input);
  if (!response) {
    return NO_RESULTS_MARKDOWN;
  }

  let markdown = `### 🔍 検索結果: "${response.originalQuery}" (${String(response.items.length)}件)\n\n`;

  response.items.forEach((item, i) => {
    const description = truncateText(item.description || NO_DESCRIPTION, DISPLAY_DESCRIPTION_LIMIT);
    markdown += `**${String(i + 1)}. [${item.title || UNTITLED}](${item.url})**\n`;
    markdown += `${description}\n\n`;
  });

  return markdown;
}

export function summarizeSearch(input: FormatterInput): string {
  const response = responseOf(input);
  if (!response) {
    return NO_RESULTS_SUMMARY;
  }
  return `「${response.originalQuery}」の検索結果 ${String(response.items.length)}件`;
}
