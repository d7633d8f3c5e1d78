import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../azure/openaiClient.js', () => ({
  createResponse: vi.fn()
}));

const openaiClient = await import('../azure/openaiClient.js');
const { classifyIntent, CLASSIFIER_FALLBACK } = await import('../orchestrator/classifier.js');

const createResponse = vi.mocked(openaiClient.createResponse);

function responseWithText(text: string) {
  return {
    id: 'resp_1',
    object: 'response' as const,
    status: 'completed' as const,
    created_at: 0,
    model: 'test-model',
    output: [],
    output_text: text,
    error: null,
    incomplete_details: null
  };
}

describe('intent classifier', () => {
  beforeEach(() => {
    createResponse.mockReset();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the structured classification', async () => {
    createResponse.mockResolvedValueOnce(
      responseWithText(JSON.stringify({ intent: 'GREETING', reasoning: 'The user says hello' }))
    );

    await expect(classifyIntent('Hi there!')).resolves.toEqual({
      intent: 'GREETING',
      reasoning: 'The user says hello'
    });
  });

  it('requests strict json_schema output with the three intents', async () => {
    createResponse.mockResolvedValueOnce(
      responseWithText(JSON.stringify({ intent: 'TECHNICAL', reasoning: 'Azure networking' }))
    );

    await classifyIntent('  How do I peer two VNets?  ');

    const [payload] = createResponse.mock.calls[0];
    expect(payload.text?.format).toMatchObject({ type: 'json_schema', name: 'intent_classification', strict: true });
    expect(payload.input.at(-1)).toEqual({ type: 'message', role: 'user', content: 'How do I peer two VNets?' });
    expect(payload.max_output_tokens).toBe(300);
  });

  it('classifies other clouds as out of domain when the model says so', async () => {
    createResponse.mockResolvedValueOnce(
      responseWithText(JSON.stringify({ intent: 'OUT_OF_DOMAIN', reasoning: 'AWS question' }))
    );

    const result = await classifyIntent('How do I configure an S3 bucket policy?');

    expect(result.intent).toBe('OUT_OF_DOMAIN');
  });

  it('fails closed to TECHNICAL when the call fails', async () => {
    createResponse.mockRejectedValueOnce(new Error('network error'));

    await expect(classifyIntent('Explain Azure Front Door.')).resolves.toEqual({
      intent: 'TECHNICAL',
      reasoning: 'Classification error fallback'
    });
  });

  it('gives up on a hanging call after the classifier timeout', async () => {
    vi.useFakeTimers();
    let callSignal: AbortSignal | undefined;
    createResponse.mockImplementationOnce(
      (_payload, options) =>
        new Promise<never>((_resolve, reject) => {
          callSignal = options?.signal;
          options?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        })
    );

    const pending = classifyIntent('Explain Azure Front Door.');
    await vi.advanceTimersByTimeAsync(15000);

    await expect(pending).resolves.toEqual(CLASSIFIER_FALLBACK);
    expect(callSignal?.aborted).toBe(true);
  });

  it('fails closed to TECHNICAL on an unknown label or invalid JSON', async () => {
    createResponse.mockResolvedValueOnce(responseWithText(JSON.stringify({ intent: 'SMALL_TALK', reasoning: 'x' })));
    createResponse.mockResolvedValueOnce(responseWithText('{not json'));

    await expect(classifyIntent('first')).resolves.toEqual(CLASSIFIER_FALLBACK);
    await expect(classifyIntent('second')).resolves.toEqual(CLASSIFIER_FALLBACK);
  });

  it('does not call the model for blank input', async () => {
    await expect(classifyIntent('   ')).resolves.toEqual(CLASSIFIER_FALLBACK);
    expect(createResponse).not.toHaveBeenCalled();
  });
});
