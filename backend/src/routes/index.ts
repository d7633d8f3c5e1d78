import type { FastifyInstance, FastifySchema } from 'fastify';
import type { ChatQueryRequest } from '../../../shared/types.js';
import { config, isDevelopment } from '../config/app.js';
import { handleChatQuery } from '../services/chatService.js';
import type { SessionStore } from '../services/sessionStore.js';
import type { OrchestratorServices } from '../orchestrator/index.js';
import { classifyGenerationError, userMessageFor } from '../orchestrator/generate.js';
import { ServiceError, describeError } from '../utils/errors.js';
import { setupSessionRoutes } from './sessions.js';

export interface RouteDeps {
  store: SessionStore;
  services?: OrchestratorServices;
  turnTimeoutMs?: number;
}

const chatQuerySchema: FastifySchema = {
  body: {
    type: 'object',
    required: ['text'],
    additionalProperties: false,
    properties: {
      text: { type: 'string', minLength: 1, maxLength: config.MAX_INPUT_CHARS },
      thread_id: { type: 'string', minLength: 1, maxLength: 128 }
    }
  }
};

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps) {
  app.get('/', async () => ({
    name: config.PROJECT_NAME,
    status: 'ok',
    uptimeSeconds: Math.round(process.uptime()),
    endpoints: {
      health: '/health',
      chatQuery: '/chat/query',
      session: '/sessions/:id'
    }
  }));

  app.get('/health', async () => ({
    status: 'healthy',
    timestamp: new Date().toISOString()
  }));

  app.post<{ Body: ChatQueryRequest }>('/chat/query', { schema: chatQuerySchema }, async (request, reply) => {
    const controller = new AbortController();
    reply.raw.once('close', () => {
      controller.abort(
        new ServiceError('Client closed the request before the answer was ready', { code: 'ABORT_ERR' })
      );
    });

    try {
      const result = await handleChatQuery(request.body, {
        store: deps.store,
        services: deps.services,
        signal: controller.signal,
        turnTimeoutMs: deps.turnTimeoutMs
      });
      // The request watchdog may already have answered
      if (reply.sent) {
        return reply;
      }
      return result;
    } catch (error) {
      request.log.error({ err: error }, 'chat query failed');
      if (reply.sent) {
        return reply;
      }
      const details = describeError(error);
      const message = isDevelopment ? details.message : userMessageFor(classifyGenerationError(error));
      return reply.code(500).send({ error: 'Internal server error', message });
    }
  });

  await setupSessionRoutes(app, deps.store);
}
