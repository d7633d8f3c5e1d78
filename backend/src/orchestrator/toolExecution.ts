import type { AssistantMessage, ToolCall, ToolResultMessage, ToolResultPayload } from '../../../shared/types.js';
import { config } from '../config/app.js';
import type { ToolOutput, ToolRegistry } from '../tools/index.js';
import { describeError } from '../utils/errors.js';
import { sanitizeLogMessage } from '../utils/openai.js';
import { linkAbortSignals, withRetry } from '../utils/resilience.js';
import { toolResultMessage } from './messages.js';

export const TOOL_ERROR = 'Tool execution failed';
export const TOOL_SYSTEM_ERROR = 'Tool execution system failure';
const MAX_ERROR_MESSAGE_CHARS = 500;

export interface ToolExecutionDeps {
  tools: ToolRegistry;
  signal?: AbortSignal;
  timeoutMs?: number;
}

class ToolCallError extends Error {
  constructor(
    message: string,
    readonly errorType: string
  ) {
    super(message);
    this.name = errorType;
  }
}

export function toToolPayload(output: ToolOutput): ToolResultPayload {
  if (typeof output === 'string') {
    return { content: output, documents: [] };
  }
  return { content: output.content, documents: output.documents };
}

export function toolErrorResult(
  call: ToolCall,
  error: unknown,
  errorLabel: string = TOOL_ERROR
): ToolResultMessage {
  const details = describeError(error);
  const errorType = error instanceof ToolCallError ? error.errorType : details.name;
  const message = details.message.slice(0, MAX_ERROR_MESSAGE_CHARS);

  return toolResultMessage(call.id, {
    error: errorLabel,
    message,
    tool_name: call.name,
    error_type: errorType,
    content: `The ${call.name || 'requested'} tool could not complete this request (${message}). Answer with what is available or ask the user to rephrase.`,
    documents: []
  });
}

async function executeToolCall(call: ToolCall, deps: ToolExecutionDeps): Promise<ToolResultMessage> {
  try {
    if (!call.id.trim()) {
      throw new ToolCallError('Tool call is missing an id', 'InvalidToolCall');
    }
    if (!call.name.trim()) {
      throw new ToolCallError(`Tool call ${call.id} is missing a tool name`, 'InvalidToolCall');
    }

    const tool = deps.tools.get(call.name);
    if (!tool) {
      throw new ToolCallError(`Unknown tool: ${call.name}`, 'UnknownTool');
    }

    const args = tool.normalizeArgs(call.arguments);
    const output = await withRetry(
      `tools.${call.name}`,
      async (retrySignal) => {
        const controller = new AbortController();
        const unlink = linkAbortSignals(controller, retrySignal, deps.signal);
        try {
          return await tool.invoke(args, { signal: controller.signal });
        } finally {
          unlink();
        }
      },
      { maxRetries: 0, timeoutMs: deps.timeoutMs ?? config.TOOL_TIMEOUT_MS }
    );

    console.info(JSON.stringify({ event: 'tools.call.completed', toolCallId: call.id, toolName: call.name }));
    return toolResultMessage(call.id, toToolPayload(output));
  } catch (error) {
    console.warn(
      JSON.stringify({
        event: 'tools.call.failed',
        toolCallId: call.id,
        toolName: call.name,
        error: sanitizeLogMessage(describeError(error).message)
      })
    );
    return toolErrorResult(call, error);
  }
}

/**
 * Runs every tool call of an assistant message and returns exactly one result
 * per call, in request order. Calls run concurrently. Never throws.
 */
export async function executeToolCalls(
  message: AssistantMessage,
  deps: ToolExecutionDeps
): Promise<ToolResultMessage[]> {
  const calls = message.toolCalls ?? [];
  if (calls.length === 0) {
    return [];
  }

  let results: ToolResultMessage[];
  try {
    results = await Promise.all(calls.map((call) => executeToolCall(call, deps)));
  } catch (error) {
    console.error(
      JSON.stringify({
        event: 'tools.execution.failed',
        toolCallIds: calls.map((call) => call.id),
        error: sanitizeLogMessage(describeError(error).message)
      })
    );
    return calls.map((call) => toolErrorResult(call, error, TOOL_SYSTEM_ERROR));
  }

  return calls.map((call, index) => {
    const result = results[index];
    if (result?.toolCallId === call.id) {
      return result;
    }
    console.error(JSON.stringify({ event: 'tools.result.missing', toolCallId: call.id, toolName: call.name }));
    return toolErrorResult(call, new ToolCallError('No result was produced for this tool call', 'MissingToolResult'));
  });
}
