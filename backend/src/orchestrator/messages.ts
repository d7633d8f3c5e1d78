import type {
  AssistantMessage,
  ConversationMessage,
  HumanMessage,
  SystemMessage,
  ToolCall,
  ToolResultMessage,
  ToolResultPayload
} from '../../../shared/types.js';

export function systemMessage(content: string): SystemMessage {
  return { type: 'system', content };
}

export function humanMessage(content: string): HumanMessage {
  return { type: 'human', content };
}

export function assistantMessage(content: string, toolCalls?: ToolCall[]): AssistantMessage {
  return toolCalls?.length ? { type: 'assistant', content, toolCalls } : { type: 'assistant', content };
}

export function toolResultMessage(
  toolCallId: string,
  payload: ToolResultPayload,
  status: 'success' | 'error' = payload.error ? 'error' : 'success'
): ToolResultMessage {
  return { type: 'tool_result', toolCallId, content: JSON.stringify(payload), status };
}

export function hasToolCalls(message: ConversationMessage): message is AssistantMessage & { toolCalls: ToolCall[] } {
  return message.type === 'assistant' && Array.isArray(message.toolCalls) && message.toolCalls.length > 0;
}

export function isToolResult(message: ConversationMessage): message is ToolResultMessage {
  return message.type === 'tool_result';
}

export function findLastIndex(
  history: readonly ConversationMessage[],
  predicate: (message: ConversationMessage) => boolean
): number {
  for (let index = history.length - 1; index >= 0; index -= 1) {
    if (predicate(history[index])) {
      return index;
    }
  }
  return -1;
}

export function lastHumanMessage(history: readonly ConversationMessage[]): HumanMessage | undefined {
  const index = findLastIndex(history, (message) => message.type === 'human');
  const message = index >= 0 ? history[index] : undefined;
  return message?.type === 'human' ? message : undefined;
}

export function lastAssistantMessage(history: readonly ConversationMessage[]): AssistantMessage | undefined {
  const index = findLastIndex(history, (message) => message.type === 'assistant');
  const message = index >= 0 ? history[index] : undefined;
  return message?.type === 'assistant' ? message : undefined;
}

export function cloneMessage<T extends ConversationMessage>(message: T): T {
  return structuredClone(message);
}
