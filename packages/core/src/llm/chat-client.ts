import { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import { createChildLogger } from '@searchwise/shared/src/logger.js';
import type { ChatTranscript } from '@searchwise/shared/src/types/chat.types.js';
import { DEFAULT_SYSTEM_PROMPT } from '@searchwise/schemas/src/app-config.schema.js';
import { resolveModelCapabilities } from './model-capabilities.js';
import { buildChatMessages } from './prompt-builder.js';
import type { PromptMessage } from './prompt-builder.js';
import { createTokenBudgeter } from './token-budget.js';
import type { TokenBudgeter } from './token-budget.js';

const log = createChildLogger('llm:chat-client');

const DEFAULT_MODEL = 'gpt-3.5-turbo';
const DEFAULT_MAX_TOKENS = 1000;
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_CONTEXT_TOKEN_BUDGET = 2000;
const DEFAULT_PROMPT_TOKEN_BUDGET = 4000;
const DEFAULT_MAX_RETRIES = 2;
const BASE_DELAY_MS = 1000;

export const RATE_LIMIT_EXHAUSTED_MESSAGE =
  '⚠️ レート制限に達しました。しばらく待ってから再試行してください。';

export interface ChatCompletionRequest {
  readonly model: string;
  readonly messages: readonly PromptMessage[];
  readonly max_completion_tokens: number;
  readonly stream: false;
  readonly temperature?: number;
}

/** The slice of a chat completion the client reads. */
export interface ChatCompletionResult {
  readonly choices: ReadonlyArray<{
    readonly message?: { readonly content: string | null } | null;
    readonly finish_reason?: string | null;
  }>;
}

/** Seam over the provider SDK; tests pass a fake. */
export interface ChatCompletionsPort {
  create(request: ChatCompletionRequest): Promise<ChatCompletionResult>;
}

export type ProviderFailure =
  | { readonly kind: 'rate_limited'; readonly message: string }
  | { readonly kind: 'auth_failed'; readonly message: string }
  | { readonly kind: 'network_timeout'; readonly message: string }
  | { readonly kind: 'network_unreachable'; readonly message: string }
  | { readonly kind: 'provider_error'; readonly message: string; readonly status?: number }
  | { readonly kind: 'unexpected'; readonly message: string };

export type MalformedResponse =
  | { readonly reason: 'no_choices' }
  | { readonly reason: 'no_message' }
  | { readonly reason: 'null_content'; readonly finishReason: string }
  | { readonly reason: 'blank_content' };

type CompletionAttempt =
  | { readonly status: 'success'; readonly content: string }
  | { readonly status: 'malformed'; readonly malformed: MalformedResponse }
  | { readonly status: 'failure'; readonly failure: ProviderFailure };

export interface ChatClient {
  /** One provider call. Never rejects: failures come back as diagnostic text. */
  respond(history: ChatTranscript, searchContext?: string): Promise<string>;
  respondWithRetry(history: ChatTranscript, searchContext?: string, maxRetries?: number): Promise<string>;
}

export interface ChatClientConfig {
  readonly model?: string;
  readonly maxTokens?: number;
  readonly temperature?: number;
  readonly systemPrompt?: string;
  readonly contextTokenBudget?: number;
  readonly promptTokenBudget?: number;
  readonly maxRetries?: number;
  /** One backoff unit for rate-limit and transient retries. */
  readonly retryBaseDelayMs?: number;
}

export interface ChatClientDeps {
  readonly completions: ChatCompletionsPort;
  readonly budgeter?: TokenBudgeter;
  readonly sleep?: (ms: number) => Promise<void>;
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function classifyProviderError(error: unknown): ProviderFailure {
  const message = error instanceof Error ? error.message : String(error);

  // Timeout first: it is a subclass of the connection error.
  if (error instanceof APIConnectionTimeoutError) {
    return { kind: 'network_timeout', message };
  }
  if (error instanceof APIConnectionError) {
    return { kind: 'network_unreachable', message };
  }

  const status = statusOf(error);
  if (status === 429) {
    return { kind: 'rate_limited', message };
  }
  if (status === 401 || status === 403) {
    return { kind: 'auth_failed', message };
  }
  if (error instanceof APIError || status !== undefined) {
    return { kind: 'provider_error', message, status };
  }
  return { kind: 'unexpected', message };
}

export function renderProviderFailure(failure: ProviderFailure): string {
  switch (failure.kind) {
    case 'rate_limited':
      return '⚠️ APIのレート制限に達しました。しばらく待ってから再試行してください。';
    case 'auth_failed':
      return '⚠️ OpenAI APIキーが無効です。設定を確認してください。';
    case 'network_timeout':
    case 'network_unreachable':
    case 'provider_error':
      return `⚠️ OpenAI APIエラー: ${failure.message}`;
    case 'unexpected':
      return `⚠️ 予期しないエラーが発生しました: ${failure.message}`;
    default: {
      const unreachable: never = failure;
      return unreachable;
    }
  }
}

export function renderMalformedResponse(malformed: MalformedResponse): string {
  switch (malformed.reason) {
    case 'no_choices':
      return '⚠️ APIレスポンスにchoicesが含まれていません。';
    case 'no_message':
      return '⚠️ APIレスポンスにmessageが含まれていません。';
    case 'null_content':
      return `⚠️ APIレスポンスのcontentがNoneです。finish_reason: ${malformed.finishReason}`;
    case 'blank_content':
      return '⚠️ APIレスポンスが空の文字列です。';
    default: {
      const unreachable: never = malformed;
      return unreachable;
    }
  }
}

function readCompletion(result: ChatCompletionResult): CompletionAttempt {
  const choice = result.choices[0];
  if (!choice) {
    return { status: 'malformed', malformed: { reason: 'no_choices' } };
  }
  if (!choice.message) {
    return { status: 'malformed', malformed: { reason: 'no_message' } };
  }

  const { content } = choice.message;
  if (content === null) {
    return {
      status: 'malformed',
      malformed: { reason: 'null_content', finishReason: choice.finish_reason ?? 'unknown' },
    };
  }
  if (!content.trim()) {
    return { status: 'malformed', malformed: { reason: 'blank_content' } };
  }
  return { status: 'success', content };
}

export function createChatClient(config: ChatClientConfig, deps: ChatClientDeps): ChatClient {
  const model = config.model ?? DEFAULT_MODEL;
  const capabilities = resolveModelCapabilities(model);
  const promptOptions = {
    systemPrompt: config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
    contextTokenBudget: config.contextTokenBudget ?? DEFAULT_CONTEXT_TOKEN_BUDGET,
    promptTokenBudget: config.promptTokenBudget ?? DEFAULT_PROMPT_TOKEN_BUDGET,
  };
  const maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
  const temperature = config.temperature ?? DEFAULT_TEMPERATURE;
  const defaultMaxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
  const unitMs = config.retryBaseDelayMs ?? BASE_DELAY_MS;
  const budgeter = deps.budgeter ?? createTokenBudgeter({ model });
  const wait = deps.sleep ?? sleep;

  log.info({ model, supportsTemperature: capabilities.supportsTemperature }, 'Creating chat client');

  async function attempt(history: ChatTranscript, searchContext?: string): Promise<CompletionAttempt> {
    try {
      const messages = buildChatMessages(history, searchContext, promptOptions, budgeter);
      const request: ChatCompletionRequest = {
        model,
        messages,
        max_completion_tokens: maxTokens,
        stream: false,
        ...(capabilities.supportsTemperature ? { temperature } : {}),
      };

      log.debug(
        { model, messageCount: messages.length, withSearchContext: Boolean(searchContext) },
        'Requesting chat completion',
      );

      return readCompletion(await deps.completions.create(request));
    } catch (error) {
      const failure = classifyProviderError(error);
      log.warn({ kind: failure.kind, error: failure.message }, 'Chat completion failed');
      return { status: 'failure', failure };
    }
  }

  return {
    async respond(history: ChatTranscript, searchContext?: string): Promise<string> {
      const result = await attempt(history, searchContext);
      switch (result.status) {
        case 'success':
          return result.content;
        case 'malformed':
          return renderMalformedResponse(result.malformed);
        case 'failure':
          return renderProviderFailure(result.failure);
      }
    },

    async respondWithRetry(
      history: ChatTranscript,
      searchContext?: string,
      maxRetries = defaultMaxRetries,
    ): Promise<string> {
      let retriesUsed = 0;
      let flatRetryUsed = false;

      for (;;) {
        const result = await attempt(history, searchContext);
        if (result.status === 'success') {
          return result.content;
        }
        if (result.status === 'malformed') {
          return renderMalformedResponse(result.malformed);
        }

        const { failure } = result;
        const canRetry = retriesUsed < maxRetries;

        if (failure.kind === 'auth_failed') {
          return renderProviderFailure(failure);
        }

        if (failure.kind === 'rate_limited') {
          if (!canRetry) {
            return RATE_LIMIT_EXHAUSTED_MESSAGE;
          }
          const delayMs = unitMs * 2 ** retriesUsed;
          log.warn({ attempt: retriesUsed + 1, maxRetries, delayMs }, 'Rate limited, retrying');
          await wait(delayMs);
          retriesUsed++;
          continue;
        }

        if (!canRetry || flatRetryUsed) {
          return `⚠️ 複数回試行しましたが、エラーが発生しました: ${failure.message}`;
        }
        log.warn({ attempt: retriesUsed + 1, kind: failure.kind }, 'Transient chat error, retrying once');
        await wait(unitMs);
        flatRetryUsed = true;
        retriesUsed++;
      }
    },
  };
}
