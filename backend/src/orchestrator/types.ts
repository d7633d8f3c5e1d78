import type {
  AssistantMessage,
  Citation,
  ConversationMessage,
  Intent,
  IntentClassification
} from '../../../shared/types.js';
import type { ToolRegistry } from '../tools/index.js';

export interface CallOptions {
  signal?: AbortSignal;
}

export interface GenerationService {
  invoke(messages: ConversationMessage[], tools: ToolRegistry, options?: CallOptions): Promise<AssistantMessage>;
}

export interface IntentClassifier {
  classify(text: string, options?: CallOptions): Promise<IntentClassification>;
}

export type TurnStage = 'classify' | 'reject' | 'generate' | 'execute_tools' | 'finalize';

export type TurnEventEmitter = (event: 'status', data: { stage: TurnStage; iteration?: number }) => void;

export interface ConversationState {
  turnInput: string;
  intent?: Intent;
  history: ConversationMessage[];
  sources: Citation[];
  answer: string;
}

export interface TurnResult {
  intent: Intent;
  answer: string;
  sources: Citation[];
  history: ConversationMessage[];
  toolIterations: number;
}
