import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { ConversationMessage } from '../../../shared/types.js';
import { buildServer } from '../app.js';
import { SessionStore } from '../services/sessionStore.js';
import type { OrchestratorServices } from '../orchestrator/index.js';
import type { CallOptions } from '../orchestrator/types.js';
import { assistantMessage, humanMessage } from '../orchestrator/messages.js';
import { createSearchTool, createToolRegistry } from '../tools/index.js';

function createServices(): OrchestratorServices {
  return {
    classifier: { classify: vi.fn(async () => ({ intent: 'TECHNICAL' as const, reasoning: 'test' })) },
    generation: {
      invoke: vi.fn(async (messages: ConversationMessage[]) =>
        assistantMessage(`Answer to: ${messages[messages.length - 1].content}`)
      )
    },
    tools: createToolRegistry([createSearchTool(vi.fn())]),
    maxToolIterations: 3
  };
}

class UnavailableStore extends SessionStore {
  override load(): ConversationMessage[] {
    throw new Error('database is locked');
  }
}

describe('HTTP routes', () => {
  let app: FastifyInstance;
  let store: SessionStore;

  beforeEach(async () => {
    store = new SessionStore(':memory:');
    app = await buildServer({ store, services: createServices(), logger: false });
  });

  afterEach(async () => {
    await app.close();
    store.close();
  });

  it('reports health', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('healthy');
  });

  it('answers a sanitized question and stores the thread', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/chat/query',
      payload: { text: '<b>What</b> is a VNet?', thread_id: 'thread-1' }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      thread_id: 'thread-1',
      intention: 'TECHNICAL',
      response: 'Answer to: What is a VNet?',
      sources: [],
      status: 'success'
    });
    expect(store.load('thread-1')[0]).toEqual(humanMessage('What is a VNet?'));
  });

  it('validates the request body', async () => {
    const missing = await app.inject({ method: 'POST', url: '/chat/query', payload: { thread_id: 'x' } });
    const tooLong = await app.inject({ method: 'POST', url: '/chat/query', payload: { text: 'a'.repeat(4001) } });
    const markupOnly = await app.inject({ method: 'POST', url: '/chat/query', payload: { text: '<div></div>' } });

    expect(missing.statusCode).toBe(400);
    expect(tooLong.statusCode).toBe(400);
    expect(markupOnly.statusCode).toBe(400);
    expect(markupOnly.json()).toEqual({ error: 'Question text is empty after sanitization.' });
  });

  it('returns and deletes stored transcripts', async () => {
    store.save('thread-1', [humanMessage('What is a VNet?'), assistantMessage('A VNet is ...')]);

    const found = await app.inject({ method: 'GET', url: '/sessions/thread-1' });
    expect(found.statusCode).toBe(200);
    expect(found.json().messages).toEqual([humanMessage('What is a VNet?'), assistantMessage('A VNet is ...')]);

    const removed = await app.inject({ method: 'DELETE', url: '/sessions/thread-1' });
    expect(removed.statusCode).toBe(204);

    const missing = await app.inject({ method: 'GET', url: '/sessions/thread-1' });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: 'Session not found' });

    const removedAgain = await app.inject({ method: 'DELETE', url: '/sessions/thread-1' });
    expect(removedAgain.statusCode).toBe(404);
  });
});

describe('HTTP routes with unavailable persistence', () => {
  it('surfaces a turn-level failure as a 500 with a safe message', async () => {
    const store = new UnavailableStore(':memory:');
    const app = await buildServer({ store, services: createServices(), logger: false });

    const response = await app.inject({ method: 'POST', url: '/chat/query', payload: { text: 'What is a VNet?' } });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      error: 'Internal server error',
      message: 'An internal error occurred. Please try rephrasing your question.'
    });

    await app.close();
    store.close();
  });
});

describe('HTTP routes with a hanging model call', () => {
  it('answers with the timeout message once the turn deadline passes, before the request watchdog', async () => {
    const store = new SessionStore(':memory:');
    const services = createServices();
    services.generation.invoke = vi.fn(
      (_messages: ConversationMessage[], _tools: unknown, options?: CallOptions) =>
        new Promise<never>((_resolve, reject) => {
          options?.signal?.addEventListener('abort', () => reject(options.signal?.reason), { once: true });
        })
    );
    const app = await buildServer({ store, services, logger: false, turnTimeoutMs: 50 });

    const response = await app.inject({
      method: 'POST',
      url: '/chat/query',
      payload: { text: 'How do I size an App Service plan?', thread_id: 'slow-thread' }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      thread_id: 'slow-thread',
      intention: 'TECHNICAL',
      response: 'The request took too long to complete. Please try a more specific question.',
      sources: [],
      status: 'success'
    });
    expect(store.load('slow-thread').at(-1)).toEqual(
      assistantMessage('The request took too long to complete. Please try a more specific question.')
    );

    await app.close();
    store.close();
  });
});
