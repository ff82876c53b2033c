import { describe, it, expect } from 'vitest';
import type { ChatMessage, ChatRole } from '@searchwise/shared/src/types/chat.types.js';
import { TRUNCATION_NOTICE, createTokenBudgeter } from './token-budget.js';

function message(role: ChatRole, content: string): ChatMessage {
  return { role, content, timestamp: '2024-01-01T00:00:00.000Z' };
}

describe('createTokenBudgeter', () => {
  describe('estimate', () => {
    it('should approximate four characters per token for unknown models', () => {
      const budgeter = createTokenBudgeter();

      expect(budgeter.estimate('')).toBe(0);
      expect(budgeter.estimate('abc')).toBe(0);
      expect(budgeter.estimate('a'.repeat(400))).toBe(100);
      expect(budgeter.estimate('a'.repeat(403))).toBe(100);
    });

    it('should count exact tokens for models with a known encoding', () => {
      const budgeter = createTokenBudgeter({ model: 'gpt-4o-mini' });

      expect(budgeter.estimate('')).toBe(0);
      expect(budgeter.estimate('hello world')).toBe(2);
    });

    it('should count special-token markers in plain text instead of throwing', () => {
      expect(createTokenBudgeter({ model: 'gpt-3.5-turbo' }).estimate('<|endoftext|>')).toBe(1);
      expect(createTokenBudgeter({ model: 'gpt-4o' }).estimate('<|endoftext|>')).toBe(1);
    });
  });

  describe('trimToBudget', () => {
    const budgeter = createTokenBudgeter();

    it('should return text that fits unchanged', () => {
      expect(budgeter.trimToBudget('short text', 10)).toBe('short text');
    });

    it('should keep the leading lines that fit and append the notice', () => {
      const text = ['a'.repeat(7), 'b'.repeat(7), 'c'.repeat(7)].join('\n');

      expect(budgeter.trimToBudget(text, 3)).toBe(`${'a'.repeat(7)}\n${TRUNCATION_NOTICE}`);
    });

    it('should return only the notice when the first line does not fit', () => {
      expect(budgeter.trimToBudget('x'.repeat(40), 5)).toBe('\n[検索結果が長いため一部を省略しました]');
    });
  });

  describe('trimTranscript', () => {
    const budgeter = createTokenBudgeter();

    it('should keep the system message and the newest messages that fit', () => {
      const system = message('system', 's'.repeat(200));
      const turns = [1, 2, 3, 4, 5].map((n) =>
        message(n % 2 === 1 ? 'user' : 'assistant', String(n).repeat(400)),
      );

      const trimmed = budgeter.trimTranscript([system, ...turns], 250);

      expect(trimmed).toEqual([system, turns[3], turns[4]]);
    });

    it('should not mutate the input', () => {
      const transcript = [message('user', 'a'.repeat(400)), message('assistant', 'b'.repeat(400))];

      const trimmed = budgeter.trimTranscript(transcript, 100);

      expect(trimmed).toEqual([transcript[1]]);
      expect(transcript).toHaveLength(2);
      expect(trimmed).not.toBe(transcript);
    });

    it('should drop everything older than the first message that does not fit', () => {
      const oldest = message('user', 'a'.repeat(40));
      const large = message('assistant', 'b'.repeat(400));
      const newest = message('user', 'c'.repeat(40));

      expect(budgeter.trimTranscript([oldest, large, newest], 50)).toEqual([newest]);
    });

    it('should return everything when the transcript fits', () => {
      const transcript = [message('system', 'rules'), message('user', 'hi')];
      expect(budgeter.trimTranscript(transcript, 100)).toEqual(transcript);
    });

    it('should handle an empty transcript', () => {
      expect(budgeter.trimTranscript([], 100)).toEqual([]);
    });
  });
});
