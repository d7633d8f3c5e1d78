import type { AssistantMessage, ConversationMessage } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { createResponse, type ResponseInputItem } from './openaiClient.js';
import { linkAbortSignals, withRetry } from '../utils/resilience.js';
import { extractOutputText, extractToolCalls } from '../utils/openai.js';
import { toFunctionTools, type ToolRegistry } from '../tools/index.js';
import { assistantMessage } from '../orchestrator/messages.js';
import type { CallOptions, GenerationService } from '../orchestrator/types.js';

export function toResponseInput(messages: readonly ConversationMessage[]): ResponseInputItem[] {
  const input: ResponseInputItem[] = [];

  for (const message of messages) {
    switch (message.type) {
      case 'system':
        input.push({ type: 'message', role: 'system', content: message.content });
        break;
      case 'human':
        input.push({ type: 'message', role: 'user', content: message.content });
        break;
      case 'assistant':
        if (message.content) {
          input.push({ type: 'message', role: 'assistant', content: message.content });
        }
        for (const call of message.toolCalls ?? []) {
          input.push({
            type: 'function_call',
            call_id: call.id,
            name: call.name,
            arguments: JSON.stringify(call.arguments)
          });
        }
        break;
      case 'tool_result':
        input.push({ type: 'function_call_output', call_id: message.toolCallId, output: message.content });
        break;
    }
  }

  return input;
}

// A call that ran out its timeout is not repeated: the turn budget could not absorb another one
const RETRYABLE_GENERATION_ERRORS = ['ECONNRESET', '429', '503'];

export interface GenerationServiceOptions {
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  parallelToolCalls?: boolean;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

export function createAzureGenerationService(options: GenerationServiceOptions = {}): GenerationService {
  const {
    model = config.AZURE_OPENAI_GPT_DEPLOYMENT,
    temperature = config.GENERATION_TEMPERATURE,
    maxOutputTokens = config.GENERATION_MAX_OUTPUT_TOKENS,
    parallelToolCalls = config.PARALLEL_TOOL_CALLS,
    timeoutMs = config.GENERATION_TIMEOUT_MS,
    maxRetries = config.GENERATION_MAX_RETRIES,
    retryDelayMs = 1000
  } = options;

  return {
    async invoke(
      messages: ConversationMessage[],
      tools: ToolRegistry,
      callOptions: CallOptions = {}
    ): Promise<AssistantMessage> {
      const input = toResponseInput(messages);
      const functionTools = toFunctionTools(tools);

      const response = await withRetry(
        'generation.invoke',
        async (retrySignal) => {
          const controller = new AbortController();
          const unlink = linkAbortSignals(controller, retrySignal, callOptions.signal);

          try {
            return await createResponse(
              {
                model,
                input,
                temperature,
                max_output_tokens: maxOutputTokens,
                tools: functionTools,
                tool_choice: 'auto',
                parallel_tool_calls: parallelToolCalls
              },
              { signal: controller.signal }
            );
          } finally {
            unlink();
          }
        },
        {
          maxRetries,
          timeoutMs,
          initialDelayMs: retryDelayMs,
          retryableErrors: RETRYABLE_GENERATION_ERRORS,
          signal: callOptions.signal
        }
      );

      return assistantMessage(extractOutputText(response), extractToolCalls(response));
    }
  };
}
