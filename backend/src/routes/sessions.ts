import type { FastifyInstance, FastifySchema } from 'fastify';
import type { SessionTranscriptResponse } from '../../../shared/types.js';
import type { SessionStore } from '../services/sessionStore.js';

interface SessionParams {
  id: string;
}

const sessionSchema: FastifySchema = {
  params: {
    type: 'object',
    required: ['id'],
    properties: {
      id: { type: 'string', minLength: 1 }
    }
  }
};

export async function setupSessionRoutes(app: FastifyInstance, store: SessionStore) {
  app.get<{ Params: SessionParams }>('/sessions/:id', { schema: sessionSchema }, async (request, reply) => {
    const sessionId = request.params.id.trim();
    if (!sessionId) {
      return reply.code(400).send({ error: 'Session id required' });
    }

    const transcript = store.loadTranscript(sessionId);
    if (!transcript) {
      return reply.code(404).send({ error: 'Session not found' });
    }

    const body: SessionTranscriptResponse = {
      sessionId: transcript.sessionId,
      messages: transcript.messages,
      updatedAt: transcript.updatedAt
    };
    return body;
  });

  app.delete<{ Params: SessionParams }>('/sessions/:id', { schema: sessionSchema }, async (request, reply) => {
    const sessionId = request.params.id.trim();
    if (!sessionId) {
      return reply.code(400).send({ error: 'Session id required' });
    }

    if (!store.removeSession(sessionId)) {
      return reply.code(404).send({ error: 'Session not found' });
    }
    return reply.code(204).send();
  });
}
