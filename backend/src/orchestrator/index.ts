import { SpanStatusCode } from '@opentelemetry/api';
import type { ConversationMessage, Intent } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { createDefaultToolRegistry, type ToolRegistry } from '../tools/index.js';
import { createAzureGenerationService } from '../azure/generation.js';
import { describeError } from '../utils/errors.js';
import { sanitizeLogMessage } from '../utils/openai.js';
import { traced, withSpan } from './telemetry.js';
import { CLASSIFIER_FALLBACK, createIntentClassifier } from './classifier.js';
import { decideHistorySeed, repairHistoryLogged } from './history.js';
import { generateNode } from './generate.js';
import { executeToolCalls, toolErrorResult } from './toolExecution.js';
import { finalizeTurn } from './finalize.js';
import { assistantMessage, hasToolCalls, lastAssistantMessage } from './messages.js';
import type {
  ConversationState,
  GenerationService,
  IntentClassifier,
  TurnEventEmitter,
  TurnResult
} from './types.js';

export const REJECTION_MESSAGE = 'I can only help with Microsoft Azure technical topics.';
export const ITERATION_LIMIT_MESSAGE =
  'I could not complete the research for this question. Please try rephrasing it.';

export type OrchestratorNode = 'CLASSIFY' | 'REJECT' | 'GENERATE' | 'EXECUTE_TOOLS' | 'FINALIZE' | 'END';

export interface OrchestratorServices {
  classifier: IntentClassifier;
  generation: GenerationService;
  tools: ToolRegistry;
  maxToolIterations: number;
  toolTimeoutMs?: number;
}

export function createDefaultServices(): OrchestratorServices {
  return {
    classifier: createIntentClassifier(),
    generation: createAzureGenerationService(),
    tools: createDefaultToolRegistry(),
    maxToolIterations: config.MAX_TOOL_ITERATIONS,
    toolTimeoutMs: config.TOOL_TIMEOUT_MS
  };
}

export interface RunTurnOptions {
  text: string;
  priorHistory: readonly ConversationMessage[];
  sessionId?: string;
  emit?: TurnEventEmitter;
  signal?: AbortSignal;
}

class IterationLimitError extends Error {
  constructor(limit: number) {
    super(`Tool iteration limit of ${limit} reached`);
    this.name = 'IterationLimitExceeded';
  }
}

async function classifyTurn(classifier: IntentClassifier, text: string, signal?: AbortSignal): Promise<Intent> {
  try {
    const { intent } = await classifier.classify(text, { signal });
    return intent;
  } catch (error) {
    // Classifiers are expected to fail closed themselves; this covers injected ones that throw
    console.warn(
      JSON.stringify({
        event: 'classifier.fallback',
        intent: CLASSIFIER_FALLBACK.intent,
        error: sanitizeLogMessage(describeError(error).message)
      })
    );
    return CLASSIFIER_FALLBACK.intent;
  }
}

/**
 * Runs one turn: CLASSIFY, then REJECT or a GENERATE / EXECUTE_TOOLS loop
 * ending in FINALIZE. The returned history is the one to persist.
 */
export async function runTurn(
  options: RunTurnOptions,
  services: OrchestratorServices = createDefaultServices()
): Promise<TurnResult> {
  const { text, emit, signal } = options;
  const seed = decideHistorySeed(options.priorHistory, text);

  const state: ConversationState = {
    turnInput: text,
    history: seed.history,
    sources: [],
    answer: ''
  };

  return withSpan(
    'turn',
    async (turnSpan) => {
      let node: OrchestratorNode = 'CLASSIFY';
      let toolIterations = 0;

      while (node !== 'END') {
        switch (node) {
          case 'CLASSIFY': {
            emit?.('status', { stage: 'classify' });
            const intent = await traced('turn.classify', () =>
              classifyTurn(services.classifier, state.turnInput, signal)
            );
            state.intent = intent;
            turnSpan.setAttribute('turn.intent', intent);
            node = intent === 'OUT_OF_DOMAIN' ? 'REJECT' : 'GENERATE';
            break;
          }

          case 'REJECT': {
            emit?.('status', { stage: 'reject' });
            await traced('turn.reject', async () => {
              state.history.push(assistantMessage(REJECTION_MESSAGE));
              state.answer = REJECTION_MESSAGE;
              state.sources = [];
            });
            node = 'END';
            break;
          }

          case 'GENERATE': {
            emit?.('status', { stage: 'generate', iteration: toolIterations });
            const message = await traced(
              'turn.generate',
              () =>
                generateNode(state.history, state.turnInput, {
                  generation: services.generation,
                  tools: services.tools,
                  signal
                }),
              { 'turn.tool_iterations': toolIterations }
            );
            state.history.push(message);

            if (!hasToolCalls(message)) {
              node = 'FINALIZE';
              break;
            }

            if (toolIterations >= services.maxToolIterations) {
              console.warn(
                JSON.stringify({
                  event: 'turn.iteration_cap',
                  sessionId: options.sessionId,
                  limit: services.maxToolIterations,
                  pendingToolCalls: message.toolCalls.map((call) => call.id)
                })
              );
              const limitError = new IterationLimitError(services.maxToolIterations);
              for (const call of message.toolCalls) {
                state.history.push(toolErrorResult(call, limitError));
              }
              state.history.push(assistantMessage(ITERATION_LIMIT_MESSAGE));
              node = 'FINALIZE';
              break;
            }

            node = 'EXECUTE_TOOLS';
            break;
          }

          case 'EXECUTE_TOOLS': {
            emit?.('status', { stage: 'execute_tools', iteration: toolIterations });
            const requester = lastAssistantMessage(state.history);
            const results = requester
              ? await traced(
                  'turn.execute_tools',
                  () =>
                    executeToolCalls(requester, {
                      tools: services.tools,
                      signal,
                      timeoutMs: services.toolTimeoutMs
                    }),
                  { 'tools.requested': requester.toolCalls?.length ?? 0 }
                )
              : [];
            state.history.push(...results);
            toolIterations += 1;
            node = 'GENERATE';
            break;
          }

          case 'FINALIZE': {
            emit?.('status', { stage: 'finalize' });
            const finalized = await traced('turn.finalize', async () => finalizeTurn(state.history));
            state.answer = finalized.answer;
            state.sources = finalized.sources;
            node = 'END';
            break;
          }
        }
      }

      turnSpan.setAttribute('turn.tool_iterations', toolIterations);
      turnSpan.setAttribute('turn.citations', state.sources.length);
      turnSpan.setStatus({ code: SpanStatusCode.OK });

      return {
        intent: state.intent ?? CLASSIFIER_FALLBACK.intent,
        answer: state.answer,
        sources: state.sources,
        // Stored memory keeps synthesized results so a stranded call does not block later resets
        history: repairHistoryLogged(state.history, 'store'),
        toolIterations
      };
    },
    {
      'session.id': options.sessionId ?? 'anonymous',
      'turn.history_decision': seed.decision,
      'turn.prior_messages': options.priorHistory.length
    }
  );
}
