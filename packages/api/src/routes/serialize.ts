import type { ChatTranscript } from '@searchwise/shared/src/types/chat.types.js';
import type { SearchOutcome, SearchResponse } from '@searchwise/shared/src/types/search.types.js';
import type { SearchReport } from '@searchwise/core/src/orchestration/chat-orchestrator.js';
import type { z } from '@hono/zod-openapi';
import type {
  ChatMessageBody,
  SearchOutcomeBodySchema,
  SearchReportBody,
  SearchResponseBody,
} from '../schemas/responses.js';

export function toMessageBodies(transcript: ChatTranscript): ChatMessageBody[] {
  return transcript.map(({ role, content, timestamp }) => ({ role, content, timestamp }));
}

export function toSearchResponseBody(response: SearchResponse): SearchResponseBody {
  return {
    originalQuery: response.originalQuery,
    items: response.items.map((item) => ({
      ...item,
      extraSnippets: [...item.extraSnippets],
      schemaTypes: [...item.schemaTypes],
    })),
  };
}

function toOutcomeBody(outcome: SearchOutcome): z.infer<typeof SearchOutcomeBodySchema> {
  if (outcome.status === 'success') {
    return { status: 'success', response: toSearchResponseBody(outcome.response) };
  }
  return { status: 'failure', failure: { ...outcome.failure } };
}

export function toSearchReportBody(report: SearchReport): SearchReportBody {
  return {
    query: report.query,
    outcome: toOutcomeBody(report.outcome),
    markdown: report.markdown,
    summary: report.summary,
  };
}
