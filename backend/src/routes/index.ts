import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import { z } from 'zod';
import { config, isDevelopment } from '../config/app.js';
import type { ChatService } from '../services/chatService.js';
import { formatErrorResponse, type ErrorResponse } from '../utils/errors.js';

const sessionIdSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9_-]+$/, 'sessionId may contain letters, digits, "-" and "_" only');

const chatRequestSchema = z
  .object({
    message: z.string().trim().min(1, 'message must not be empty'),
    sessionId: sessionIdSchema.optional(),
    imagePath: z.string().min(1).optional()
  })
  .strict();

export interface RouteDependencies {
  chatService: ChatService;
  /** Error messages of unexpected failures are only returned when true. */
  exposeErrors?: boolean;
}

function logAndFormat(log: FastifyBaseLogger, error: unknown, exposeErrors: boolean) {
  const formatted = formatErrorResponse(error, exposeErrors);
  if (formatted.statusCode >= 500) {
    log.error({ err: error }, 'request failed');
  } else {
    log.warn({ err: error }, 'request rejected');
  }
  return formatted;
}

function invalidRequest(error: z.ZodError): ErrorResponse {
  return {
    error: 'invalid_request',
    message: error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
  };
}

export async function registerRoutes(app: FastifyInstance, deps: RouteDependencies) {
  const { chatService } = deps;
  const exposeErrors = deps.exposeErrors ?? isDevelopment;

  app.get('/', async () => ({
    name: config.PROJECT_NAME,
    status: 'ok',
    uptimeSeconds: Math.round(process.uptime()),
    endpoints: {
      health: '/health',
      chat: '/chat',
      session: '/sessions/:id',
      resetSession: '/sessions/:id/reset'
    }
  }));

  app.get('/health', async () => ({
    status: 'healthy',
    timestamp: new Date().toISOString()
  }));

  app.post('/chat', async (request, reply) => {
    const parsed = chatRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(invalidRequest(parsed.error));
    }

    try {
      return await chatService.chat(parsed.data);
    } catch (error) {
      const { statusCode, body } = logAndFormat(request.log, error, exposeErrors);
      return reply.code(statusCode).send(body);
    }
  });

  app.get<{ Params: { id: string } }>('/sessions/:id', async (request, reply) => {
    const id = sessionIdSchema.safeParse(request.params.id);
    if (!id.success) {
      return reply.code(400).send(invalidRequest(id.error));
    }

    const transcript = chatService.getSession(id.data);
    if (!transcript) {
      return reply.code(404).send({ error: 'not_found', message: `Session ${id.data} not found` });
    }
    return transcript;
  });

  app.post<{ Params: { id: string } }>('/sessions/:id/reset', async (request, reply) => {
    const id = sessionIdSchema.safeParse(request.params.id);
    if (!id.success) {
      return reply.code(400).send(invalidRequest(id.error));
    }

    try {
      return await chatService.reset(id.data);
    } catch (error) {
      const { statusCode, body } = logAndFormat(request.log, error, exposeErrors);
      return reply.code(statusCode).send(body);
    }
  });
}
