import type { ChatTranscript } from '@searchwise/shared/src/types/chat.types.js';

export interface TranscriptStore {
  /** Returns the name the transcript was stored under. */
  save(transcript: ChatTranscript, name?: string): Promise<string>;
  /** Rejects with a PersistenceError when nothing is stored under `name`. */
  load(name: string): Promise<ChatTranscript>;
  list(): Promise<string[]>;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `chat_history_YYYYMMDD_HHMMSS.json`, in local time. */
export function defaultTranscriptName(now: Date = new Date()): string {
  const date = `${String(now.getFullYear())}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `chat_history_${date}_${time}.json`;
}
