import type { AssistantMessage, ConversationMessage } from '../../../shared/types.js';
import type { ToolRegistry } from '../tools/index.js';
import { describeError } from '../utils/errors.js';
import { sanitizeLogMessage } from '../utils/openai.js';
import { repairHistoryLogged } from './history.js';
import { assistantMessage, humanMessage, systemMessage } from './messages.js';
import type { GenerationService } from './types.js';

export type GenerationErrorCategory = 'tool' | 'timeout' | 'connectivity' | 'unknown';

const USER_MESSAGES: Record<GenerationErrorCategory, string> = {
  tool: 'There was a problem running the research tools for this question. Please try rephrasing it.',
  timeout: 'The request took too long to complete. Please try a more specific question.',
  connectivity: 'The assistant could not reach the Azure services. Please try again in a moment.',
  unknown: 'An internal error occurred. Please try rephrasing your question.'
};

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_HEADERS_TIMEOUT']);
const CONNECTIVITY_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE']);

export function classifyGenerationError(error: unknown): GenerationErrorCategory {
  const details = describeError(error);
  const message = details.message.toLowerCase();
  const name = details.name.toLowerCase();
  const code = details.code?.toUpperCase();

  if (message.includes('tool') || name.includes('tool_calls')) {
    return 'tool';
  }
  if (message.includes('timeout') || message.includes('timed out') || (code !== undefined && TIMEOUT_CODES.has(code))) {
    return 'timeout';
  }
  if (
    message.includes('connection') ||
    message.includes('network') ||
    message.includes('fetch failed') ||
    (code !== undefined && CONNECTIVITY_CODES.has(code))
  ) {
    return 'connectivity';
  }
  return 'unknown';
}

export function userMessageFor(category: GenerationErrorCategory): string {
  return USER_MESSAGES[category];
}

export function buildInstruction(question: string): string {
  return [
    'You are a technical assistant specialised in Microsoft Azure.',
    `CURRENT QUESTION: "${question}"`,
    '',
    'Instructions:',
    '- Answer only the CURRENT QUESTION above.',
    '- Use the search_technical_docs tool to find documentation before answering technical questions. Always search with the CURRENT QUESTION, never an earlier topic.',
    '- Use only tool results that are relevant to the CURRENT QUESTION. Ignore results retrieved for earlier topics in the conversation.',
    '- Cite the documents you rely on inline by their file name (for example: according to vnet-overview.pdf, page 3).',
    '- If a tool result reports an error or the documentation does not cover the question, say so instead of guessing.',
    '- For greetings, reply briefly and explain that you answer Azure technical questions.'
  ].join('\n');
}

export interface GenerateNodeDeps {
  generation: GenerationService;
  tools: ToolRegistry;
  signal?: AbortSignal;
}

/**
 * Produces the next assistant message for the current question. Never throws:
 * a failed call becomes a tool-free assistant message with a user-safe text.
 */
export async function generateNode(
  history: readonly ConversationMessage[],
  question: string,
  deps: GenerateNodeDeps
): Promise<AssistantMessage> {
  const validated = repairHistoryLogged(history, 'generate');

  const conversation = validated.some((message) => message.type === 'human')
    ? validated
    : [humanMessage(question), ...validated];

  try {
    return await deps.generation.invoke([systemMessage(buildInstruction(question)), ...conversation], deps.tools, {
      signal: deps.signal
    });
  } catch (error) {
    const category = classifyGenerationError(error);
    console.error(
      JSON.stringify({
        event: 'generation.failed',
        category,
        error: sanitizeLogMessage(describeError(error).message)
      })
    );
    return assistantMessage(userMessageFor(category));
  }
}
