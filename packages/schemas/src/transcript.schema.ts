import { z } from 'zod';

export const ChatRoleSchema = z.enum(['system', 'user', 'assistant']);

export const ChatMessageSchema = z.object({
  role: ChatRoleSchema,
  content: z.string(),
  timestamp: z.string().datetime({ offset: true }),
});

export const TranscriptSchema = z.array(ChatMessageSchema);
