import { z } from 'zod';
import { INTENTS, type IntentClassification } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { createResponse, type ResponseTextFormat } from '../azure/openaiClient.js';
import { extractOutputText, sanitizeLogMessage } from '../utils/openai.js';
import { linkAbortSignals, withRetry } from '../utils/resilience.js';
import type { CallOptions, IntentClassifier } from './types.js';

const INTENT_CLASSIFICATION_SCHEMA: ResponseTextFormat = {
  type: 'json_schema',
  name: 'intent_classification',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    properties: {
      intent: {
        type: 'string',
        enum: [...INTENTS]
      },
      reasoning: {
        type: 'string'
      }
    },
    required: ['intent', 'reasoning']
  },
  description: 'Structured JSON describing the classified user intent and rationale.'
};

const classificationSchema = z.object({
  intent: z.enum(INTENTS),
  reasoning: z.string()
});

export const CLASSIFIER_FALLBACK: IntentClassification = {
  intent: 'TECHNICAL',
  reasoning: 'Classification error fallback'
};

const SYSTEM_PROMPT = `You are an intent classifier for an assistant that answers Microsoft Azure technical questions. Classify the user's message into exactly one intent:
- GREETING: greetings, thanks, small talk or questions about what the assistant can do.
- TECHNICAL: questions about Microsoft Azure services, configuration, networking, security, pricing, architecture or troubleshooting.
- OUT_OF_DOMAIN: anything else, including questions about AWS, Google Cloud or any other non-Azure technology.
Return strict JSON matching the provided schema.`;

export async function classifyIntent(text: string, options: CallOptions = {}): Promise<IntentClassification> {
  const trimmed = text.trim();
  if (!trimmed) {
    return { ...CLASSIFIER_FALLBACK };
  }

  try {
    const response = await withRetry(
      'classifier.classify',
      async (retrySignal) => {
        const controller = new AbortController();
        const unlink = linkAbortSignals(controller, retrySignal, options.signal);
        try {
          return await createResponse(
            {
              temperature: 0,
              max_output_tokens: config.INTENT_CLASSIFIER_MAX_TOKENS,
              text: { format: INTENT_CLASSIFICATION_SCHEMA },
              input: [
                { type: 'message', role: 'system', content: SYSTEM_PROMPT },
                { type: 'message', role: 'user', content: trimmed }
              ]
            },
            { signal: controller.signal }
          );
        } finally {
          unlink();
        }
      },
      { maxRetries: 0, timeoutMs: config.INTENT_CLASSIFIER_TIMEOUT_MS, signal: options.signal }
    );

    const parsed: unknown = JSON.parse(extractOutputText(response) || '{}');
    return classificationSchema.parse(parsed);
  } catch (error) {
    console.warn(
      JSON.stringify({
        event: 'classifier.fallback',
        intent: CLASSIFIER_FALLBACK.intent,
        error: sanitizeLogMessage(error instanceof Error ? error.message : String(error))
      })
    );
    return { ...CLASSIFIER_FALLBACK };
  }
}

export function createIntentClassifier(): IntentClassifier {
  return { classify: classifyIntent };
}
