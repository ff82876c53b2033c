import { getEncoding } from 'js-tiktoken';
import { createChildLogger } from '@searchwise/shared/src/logger.js';
import type { ChatRole } from '@searchwise/shared/src/types/chat.types.js';
import { resolveModelCapabilities } from './model-capabilities.js';
import type { TokenEncodingName } from './model-capabilities.js';

const log = createChildLogger('llm:token-budget');

export const TRUNCATION_NOTICE = '\n[検索結果が長いため一部を省略しました]';

const APPROX_CHARS_PER_TOKEN = 4;

export interface BudgetedMessage {
  readonly role: ChatRole;
  readonly content: string;
}

export interface TokenBudgeter {
  estimate(text: string): number;
  /** Keeps whole leading lines that fit and appends the truncation notice. */
  trimToBudget(text: string, budget: number): string;
  /** Drops the oldest non-system messages until the rest fits. */
  trimTranscript<T extends BudgetedMessage>(messages: readonly T[], budget: number): T[];
}

export interface TokenBudgeterConfig {
  readonly model?: string;
}

type Encoder = ReturnType<typeof getEncoding>;

// Rank tables are large; build each encoder once per process.
const encoders = new Map<TokenEncodingName, Encoder>();

function encoderFor(name: TokenEncodingName): Encoder {
  let encoder = encoders.get(name);
  if (!encoder) {
    encoder = getEncoding(name);
    encoders.set(name, encoder);
  }
  return encoder;
}

export function createTokenBudgeter(config: TokenBudgeterConfig = {}): TokenBudgeter {
  const encodingName = config.model ? resolveModelCapabilities(config.model).encoding : undefined;

  function estimate(text: string): number {
    if (encodingName) {
      try {
        // Special-token markers in user text or snippets count as tokens instead of throwing.
        return encoderFor(encodingName).encode(text, 'all').length;
      } catch (error) {
        log.warn(
          { encoding: encodingName, error: error instanceof Error ? error.message : String(error) },
          'Tokenizer failed, approximating the count',
        );
      }
    }
    return Math.floor(text.length / APPROX_CHARS_PER_TOKEN);
  }

  return {
    estimate,

    trimToBudget(text: string, budget: number): string {
      if (estimate(text) <= budget) {
        return text;
      }

      let kept = '';
      for (const line of text.split('\n')) {
        const candidate = `${kept}${line}\n`;
        if (estimate(candidate) > budget) {
          break;
        }
        kept = candidate;
      }

      log.debug({ budget, originalLength: text.length, keptLength: kept.length }, 'Trimmed text to budget');
      return kept + TRUNCATION_NOTICE;
    },

    trimTranscript<T extends BudgetedMessage>(messages: readonly T[], budget: number): T[] {
      const [first, ...others] = messages;
      const system = first?.role === 'system' ? first : undefined;
      const rest = system ? others : [...messages];

      let total = system ? estimate(system.content) : 0;
      const kept: T[] = [];

      for (let i = rest.length - 1; i >= 0; i--) {
        const message = rest[i];
        if (!message) continue;
        const tokens = estimate(message.content);
        if (total + tokens > budget) {
          break;
        }
        total += tokens;
        kept.unshift(message);
      }

      if (kept.length < rest.length) {
        log.debug(
          { budget, dropped: rest.length - kept.length, kept: kept.length },
          'Dropped oldest messages to fit the prompt budget',
        );
      }

      return system ? [system, ...kept] : kept;
    },
  };
}
