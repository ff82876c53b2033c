import type { ChatMessage, ChatRole, ChatTranscript } from '@searchwise/shared/src/types/chat.types.js';

/** Returns a new transcript; the input is never modified. */
export function appendMessage(
  transcript: ChatTranscript,
  role: ChatRole,
  content: string,
  now: Date = new Date(),
): ChatTranscript {
  const message: ChatMessage = { role, content, timestamp: now.toISOString() };
  return [...transcript, message];
}

export function lastUserMessage(transcript: ChatTranscript): ChatMessage | undefined {
  for (let i = transcript.length - 1; i >= 0; i--) {
    const message = transcript[i];
    if (message?.role === 'user') {
      return message;
    }
  }
  return undefined;
}

export function messageCount(transcript: ChatTranscript): number {
  return transcript.length;
}
