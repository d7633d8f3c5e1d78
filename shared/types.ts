export const INTENTS = ['GREETING', 'TECHNICAL', 'OUT_OF_DOMAIN'] as const;

export type Intent = (typeof INTENTS)[number];

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface SystemMessage {
  type: 'system';
  content: string;
}

export interface HumanMessage {
  type: 'human';
  content: string;
}

export interface AssistantMessage {
  type: 'assistant';
  content: string;
  toolCalls?: ToolCall[];
}

export interface ToolResultMessage {
  type: 'tool_result';
  toolCallId: string;
  content: string;
  status?: 'success' | 'error';
}

export type ConversationMessage = SystemMessage | HumanMessage | AssistantMessage | ToolResultMessage;

export interface RetrievedDocument {
  title?: string;
  source?: string;
  page?: number;
  url?: string;
}

export interface SearchToolOutput {
  content: string;
  documents: RetrievedDocument[];
}

// Serialized into ToolResultMessage.content
export interface ToolResultPayload {
  content: string;
  documents: RetrievedDocument[];
  error?: string;
  message?: string;
  tool_name?: string;
  error_type?: string;
}

export interface Citation {
  title: string;
  page?: number;
  url?: string;
}

export interface IntentClassification {
  intent: Intent;
  reasoning: string;
}

export interface ChatQueryRequest {
  text: string;
  thread_id?: string;
}

export interface ChatQueryResponse {
  thread_id: string;
  intention: Intent;
  response: string;
  sources: Citation[];
  status: 'success';
}

export interface SessionTranscriptResponse {
  sessionId: string;
  messages: ConversationMessage[];
  updatedAt: string;
}
