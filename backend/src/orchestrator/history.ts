import type { ConversationMessage, ToolCall, ToolResultMessage } from '../../../shared/types.js';
import { cloneMessage, hasToolCalls, humanMessage, isToolResult, lastHumanMessage, toolResultMessage } from './messages.js';

export interface PendingToolCall {
  call: ToolCall;
  assistantIndex: number;
}

/**
 * Tool calls with no matching result anywhere after the assistant message that
 * requested them.
 */
export function findPendingToolCalls(history: readonly ConversationMessage[]): PendingToolCall[] {
  const pending: PendingToolCall[] = [];

  history.forEach((message, index) => {
    if (!hasToolCalls(message)) {
      return;
    }
    const answered = new Set(
      history
        .slice(index + 1)
        .filter(isToolResult)
        .map((result) => result.toolCallId)
    );
    for (const call of message.toolCalls) {
      if (!answered.has(call.id)) {
        pending.push({ call, assistantIndex: index });
      }
    }
  });

  return pending;
}

export type HistoryDecision = 'fresh' | 'continue' | 'continue_pending' | 'reset';

export interface HistorySeed {
  decision: HistoryDecision;
  history: ConversationMessage[];
}

/**
 * Seeds the turn's history from stored memory. A changed question drops prior
 * memory unless some tool call is still waiting for its result.
 */
export function decideHistorySeed(prior: readonly ConversationMessage[], newUserText: string): HistorySeed {
  const next = humanMessage(newUserText);

  if (prior.length === 0) {
    return { decision: 'fresh', history: [next] };
  }

  const lastHuman = lastHumanMessage(prior);
  if (!lastHuman) {
    return { decision: 'fresh', history: [next] };
  }

  if (lastHuman.content.trim() === newUserText.trim()) {
    return { decision: 'continue', history: [...prior, next] };
  }

  const pending = findPendingToolCalls(prior);
  if (pending.length > 0) {
    console.info(
      JSON.stringify({
        event: 'history.reset_deferred',
        pendingToolCalls: pending.map(({ call }) => call.id),
        priorMessages: prior.length
      })
    );
    return { decision: 'continue_pending', history: [...prior, next] };
  }

  console.info(JSON.stringify({ event: 'history.reset', discardedMessages: prior.length }));
  return { decision: 'reset', history: [next] };
}

export function decideHistory(prior: readonly ConversationMessage[], newUserText: string): ConversationMessage[] {
  return decideHistorySeed(prior, newUserText).history;
}

export const MISSING_RESULT_ERROR = 'missing tool result';

export function missingToolResult(call: ToolCall): ToolResultMessage {
  return toolResultMessage(call.id, {
    error: MISSING_RESULT_ERROR,
    message: `No result was recorded for tool call ${call.id}`,
    tool_name: call.name,
    error_type: 'MissingToolResult',
    content: 'The result of this tool call is not available.',
    documents: []
  });
}

export interface RepairOutcome {
  history: ConversationMessage[];
  synthesized: ToolCall[];
}

/**
 * Rebuilds the history so every assistant message with tool calls is followed
 * directly by one result per call, in call order. Results are copied from the
 * first match anywhere in the input, synthesized when absent. Results not
 * claimed by a call are dropped.
 */
export function repairHistoryDetailed(history: readonly ConversationMessage[]): RepairOutcome {
  const firstResultById = new Map<string, ToolResultMessage>();
  for (const message of history) {
    if (isToolResult(message) && !firstResultById.has(message.toolCallId)) {
      firstResultById.set(message.toolCallId, message);
    }
  }

  const repaired: ConversationMessage[] = [];
  const synthesized: ToolCall[] = [];

  let index = 0;
  while (index < history.length) {
    const message = history[index];

    if (hasToolCalls(message)) {
      repaired.push(cloneMessage(message));
      for (const call of message.toolCalls) {
        const match = firstResultById.get(call.id);
        if (match) {
          repaired.push(cloneMessage(match));
        } else {
          repaired.push(missingToolResult(call));
          synthesized.push(call);
        }
      }
      index += 1;
      // The results that followed have been re-emitted in call order
      while (index < history.length && isToolResult(history[index])) {
        index += 1;
      }
      continue;
    }

    if (!isToolResult(message)) {
      repaired.push(message);
    }
    index += 1;
  }

  return { history: repaired, synthesized };
}

export function repairHistory(history: readonly ConversationMessage[]): ConversationMessage[] {
  return repairHistoryDetailed(history).history;
}

export type RepairStage = 'generate' | 'store';

/** Repairs `history` and warns once per synthesized result. */
export function repairHistoryLogged(history: readonly ConversationMessage[], stage: RepairStage): ConversationMessage[] {
  const { history: repaired, synthesized } = repairHistoryDetailed(history);
  for (const call of synthesized) {
    console.warn(
      JSON.stringify({
        event: 'history.repair.synthesized_result',
        stage,
        toolCallId: call.id,
        toolName: call.name
      })
    );
  }
  return repaired;
}
