import type { ChatTranscript } from '@searchwise/shared/src/types/chat.types.js';
import { PersistenceError } from '@searchwise/shared/src/utils/errors.js';
import { defaultTranscriptName } from './transcript-store.js';
import type { TranscriptStore } from './transcript-store.js';

export function createInMemoryTranscriptStore(): TranscriptStore {
  const transcripts = new Map<string, ChatTranscript>();

  return {
    save(transcript: ChatTranscript, name?: string): Promise<string> {
      const key = name ?? defaultTranscriptName();
      transcripts.set(key, [...transcript]);
      return Promise.resolve(key);
    },

    load(name: string): Promise<ChatTranscript> {
      const transcript = transcripts.get(name);
      if (!transcript) {
        return Promise.reject(
          new PersistenceError(`Transcript not found: ${name}`, 'TRANSCRIPT_NOT_FOUND'),
        );
      }
      return Promise.resolve([...transcript]);
    },

    list(): Promise<string[]> {
      return Promise.resolve([...transcripts.keys()].sort());
    },
  };
}
