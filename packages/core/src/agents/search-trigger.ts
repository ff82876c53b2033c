/**
 * Keyword heuristic deciding whether a chat utterance warrants a web search.
 * The vocabulary is Japanese-biased; English questions are caught only by
 * the ASCII question mark.
 */

export const SEARCH_KEYWORDS: readonly string[] = [
  '検索',
  '調べて',
  '探して',
  '最新',
  'ニュース',
  '情報',
  'について教えて',
  'とは',
  '方法',
  'やり方',
  'どうやって',
  'いつ',
  'どこ',
  '誰',
  'なぜ',
  '何',
  '現在',
  '今',
  '今日',
  '2024',
  '2025',
  '最近',
  '今年',
  '今月',
  '今週',
];

export const QUESTION_MARKERS: readonly string[] = ['？', '?', '教えて', '知りたい', '分からない'];

/** Removed in this order, so longer phrases must precede their fragments. */
export const FILLER_PHRASES: readonly string[] = [
  '検索して',
  '調べて',
  '探して',
  'について教えて',
  'とは何ですか',
  'を教えて',
  'について知りたい',
  'どうですか',
  'はどう',
  '？',
  '?',
];

export function shouldSearch(utterance: string): boolean {
  const lowered = utterance.toLowerCase();
  if (SEARCH_KEYWORDS.some((keyword) => lowered.includes(keyword))) {
    return true;
  }
  return QUESTION_MARKERS.some((marker) => utterance.includes(marker));
}

export function extractQuery(utterance: string): string {
  let query = utterance;
  for (const phrase of FILLER_PHRASES) {
    query = query.split(phrase).join('');
  }
  query = query.replace(/\s+/g, ' ').trim();
  return query || utterance.trim();
}
