import { randomUUID } from 'node:crypto';
import type { ChatQueryRequest, ChatQueryResponse } from '../../../shared/types.js';
import { runTurn, type OrchestratorServices } from '../orchestrator/index.js';
import type { TurnEventEmitter, TurnResult } from '../orchestrator/types.js';
import { config } from '../config/app.js';
import { ServiceError } from '../utils/errors.js';
import { linkAbortSignals } from '../utils/resilience.js';
import { getSessionStore, type HistoryStore } from './sessionStore.js';

export interface ChatServiceDeps {
  store?: HistoryStore;
  services?: OrchestratorServices;
  emit?: TurnEventEmitter;
  /** Aborted when the caller no longer wants the answer; the turn is then not stored. */
  signal?: AbortSignal;
  turnTimeoutMs?: number;
}

export async function handleChatQuery(
  request: ChatQueryRequest,
  deps: ChatServiceDeps = {}
): Promise<ChatQueryResponse> {
  const text = request.text.trim();
  if (!text) {
    throw new Error('Question text is required.');
  }

  const threadId = request.thread_id?.trim() || randomUUID();
  const store = deps.store ?? getSessionStore();

  const priorHistory = store.load(threadId);
  const turnTimeoutMs = deps.turnTimeoutMs ?? config.TURN_TIMEOUT_MS;
  const controller = new AbortController();
  const unlink = linkAbortSignals(controller, deps.signal);
  const deadline = setTimeout(() => {
    controller.abort(new ServiceError(`Turn timed out after ${turnTimeoutMs}ms`, { code: 'ETIMEDOUT' }));
  }, turnTimeoutMs);

  let turn: TurnResult;
  try {
    turn = await runTurn(
      { text, priorHistory, sessionId: threadId, emit: deps.emit, signal: controller.signal },
      deps.services
    );
  } finally {
    clearTimeout(deadline);
    unlink();
  }

  if (deps.signal?.aborted) {
    console.warn(JSON.stringify({ event: 'chat.turn.abandoned', threadId }));
    throw deps.signal.reason;
  }

  // Written only once the turn has reached FINALIZE or REJECT
  store.save(threadId, turn.history);

  console.info(
    JSON.stringify({
      event: 'chat.turn.completed',
      threadId,
      intent: turn.intent,
      toolIterations: turn.toolIterations,
      citations: turn.sources.length
    })
  );

  return {
    thread_id: threadId,
    intention: turn.intent,
    response: turn.answer,
    sources: turn.sources,
    status: 'success'
  };
}
