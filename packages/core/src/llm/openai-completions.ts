import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { createChildLogger } from '@searchwise/shared/src/logger.js';
import { ConfigurationError } from '@searchwise/shared/src/utils/errors.js';
import type { ChatCompletionsPort } from './chat-client.js';
import type { PromptMessage } from './prompt-builder.js';

const log = createChildLogger('llm:openai');

const DEFAULT_TIMEOUT_MS = 60_000;

export interface OpenAiCompletionsConfig {
  readonly apiKey: string;
  readonly timeoutMs?: number;
}

function toMessageParam(message: PromptMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export function createOpenAiCompletions(config: OpenAiCompletionsConfig): ChatCompletionsPort {
  if (!config.apiKey) {
    throw new ConfigurationError('API key is required for the OpenAI chat client');
  }

  const timeout = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  // Retries belong to the chat client; the SDK's own would multiply them.
  const client = new OpenAI({ apiKey: config.apiKey, timeout, maxRetries: 0 });

  log.info({ timeout }, 'Using OpenAI chat completions');

  return {
    async create(request) {
      return client.chat.completions.create({
        model: request.model,
        messages: request.messages.map(toMessageParam),
        max_completion_tokens: request.max_completion_tokens,
        stream: false,
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      });
    },
  };
}
