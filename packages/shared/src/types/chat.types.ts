import type { SearchOutcome } from './search.types.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
  /** ISO-8601 */
  readonly timestamp: string;
}

export type ChatTranscript = readonly ChatMessage[];

export type ContextDetail = 'detailed' | 'simple';

export interface LastSearch {
  readonly query: string;
  readonly outcome: SearchOutcome;
}

/**
 * Everything the orchestrator needs to know about a conversation. Owned by
 * the caller and replaced, never mutated, on every turn.
 */
export interface ChatSessionState {
  readonly transcript: ChatTranscript;
  readonly lastSearch?: LastSearch;
}
