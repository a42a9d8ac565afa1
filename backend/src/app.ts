import Fastify, { type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { config, isDevelopment } from './config/app.js';
import { createOriginPolicy } from './config/cors.js';
import { sanitizeInput } from './middleware/sanitize.js';
import { registerRoutes } from './routes/index.js';
import type { ChatService } from './services/chatService.js';

export interface BuildAppOptions {
  chatService: ChatService;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp({ chatService, logger = false }: BuildAppOptions) {
  const app = Fastify({ logger });
  const originPolicy = createOriginPolicy(config.CORS_ORIGIN, isDevelopment);

  await app.register(cors, {
    origin: (origin, cb) => {
      if (originPolicy.isOriginAllowed(origin)) {
        cb(null, true);
        return;
      }
      app.log.warn({ origin, allowedOrigins: originPolicy.allowedOrigins }, 'CORS origin rejected');
      cb(new Error('Not allowed by CORS'), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.RATE_LIMIT_MAX_REQUESTS,
    timeWindow: config.RATE_LIMIT_WINDOW_MS,
    errorResponseBuilder: () => ({
      statusCode: 429,
      error: 'rate_limited',
      message: 'Too many requests. Please try again later.'
    })
  });

  app.addHook('preHandler', sanitizeInput);

  app.addHook('onRequest', async (request, reply) => {
    const timer = setTimeout(() => {
      if (!reply.sent) {
        request.log.warn({ url: request.url }, 'request timed out');
        void reply.code(408).send({ error: 'request_timeout', message: 'The request took too long.' });
      }
    }, config.REQUEST_TIMEOUT_MS);

    reply.raw.on('close', () => clearTimeout(timer));
    reply.raw.on('finish', () => clearTimeout(timer));
  });

  await registerRoutes(app, { chatService });

  return app;
}
