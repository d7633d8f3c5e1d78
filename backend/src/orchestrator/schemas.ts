import { z } from 'zod';
import type { ConversationMessage } from '../../../shared/types.js';

export const toolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.record(z.unknown())
});

export const conversationMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('system'), content: z.string() }),
  z.object({ type: z.literal('human'), content: z.string() }),
  z.object({
    type: z.literal('assistant'),
    content: z.string(),
    toolCalls: z.array(toolCallSchema).optional()
  }),
  z.object({
    type: z.literal('tool_result'),
    toolCallId: z.string(),
    content: z.string(),
    status: z.enum(['success', 'error']).optional()
  })
]);

export const conversationHistorySchema = z.array(conversationMessageSchema);

export function parseConversationHistory(value: unknown): ConversationMessage[] | null {
  const result = conversationHistorySchema.safeParse(value);
  return result.success ? result.data : null;
}
