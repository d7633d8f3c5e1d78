import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { config, isDevelopment, isTest } from './config/app.js';
import { allowedOrigins, isOriginAllowed } from './config/cors.js';
import { sanitizeInput } from './middleware/sanitize.js';
import { registerRoutes, type RouteDeps } from './routes/index.js';
import { getSessionStore } from './services/sessionStore.js';

export interface BuildServerOptions extends Partial<RouteDeps> {
  logger?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger:
      options.logger === false || isTest
        ? false
        : {
            level: config.LOG_LEVEL,
            transport: isDevelopment
              ? {
                  target: 'pino-pretty',
                  options: {
                    translateTime: 'HH:MM:ss Z',
                    ignore: 'pid,hostname'
                  }
                }
              : undefined
          }
  });

  await app.register(cors, {
    origin: (origin, cb) => {
      if (isOriginAllowed(origin)) {
        cb(null, true);
        return;
      }
      app.log.warn({ origin, allowedOrigins }, 'CORS origin rejected');
      cb(new Error('Not allowed by CORS'), false);
    },
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.RATE_LIMIT_MAX_REQUESTS,
    timeWindow: config.RATE_LIMIT_WINDOW_MS,
    errorResponseBuilder: () => ({
      error: 'Too many requests',
      message: 'Please try again later.'
    })
  });

  app.addHook('preHandler', sanitizeInput);

  app.addHook('onRequest', async (_request, reply) => {
    const timer = setTimeout(() => {
      if (!reply.sent) {
        reply.code(408).send({ error: 'Request timeout' });
      }
    }, config.REQUEST_TIMEOUT_MS);

    reply.raw.on('close', () => clearTimeout(timer));
    reply.raw.on('finish', () => clearTimeout(timer));
  });

  await registerRoutes(app, {
    store: options.store ?? getSessionStore(),
    services: options.services,
    turnTimeoutMs: options.turnTimeoutMs
  });

  return app;
}
