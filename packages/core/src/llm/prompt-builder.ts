import type { ChatTranscript } from '@searchwise/shared/src/types/chat.types.js';
import type { BudgetedMessage, TokenBudgeter } from './token-budget.js';

export const SEARCH_CONTEXT_HEADING = '\n\n以下の最新の検索結果を参考にして回答してください：\n';

export type PromptMessage = BudgetedMessage;

export interface PromptOptions {
  readonly systemPrompt: string;
  readonly contextTokenBudget: number;
  readonly promptTokenBudget: number;
}

/**
 * System instructions (plus bounded search context) first and exactly once,
 * followed by as much of the conversation as the prompt budget allows.
 */
export function buildChatMessages(
  history: ChatTranscript,
  searchContext: string | undefined,
  options: PromptOptions,
  budgeter: TokenBudgeter,
): PromptMessage[] {
  let systemContent = options.systemPrompt;
  if (searchContext) {
    systemContent += SEARCH_CONTEXT_HEADING + budgeter.trimToBudget(searchContext, options.contextTokenBudget);
  }

  const messages: PromptMessage[] = [
    { role: 'system', content: systemContent },
    ...history
      .filter((message) => message.role !== 'system')
      .map(({ role, content }) => ({ role, content })),
  ];

  const total = messages.reduce((sum, message) => sum + budgeter.estimate(message.content), 0);
  if (total > options.promptTokenBudget) {
    return budgeter.trimTranscript(messages, options.promptTokenBudget);
  }
  return messages;
}
