import type { FastifyReply, FastifyRequest, HookHandlerDoneFunction } from 'fastify';

const HTML_TAG_REGEX = /<[^>]*>/g;
const SCRIPT_REGEX = /<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi;
export const MAX_MESSAGE_LENGTH = 4000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function sanitizeMessage(raw: string): string {
  let content = raw.replace(SCRIPT_REGEX, '');
  content = content.replace(/<\/?(code|pre)>/gi, '`');
  content = content.replace(HTML_TAG_REGEX, '');
  content = content.replace(/\r\n?/g, '\n');
  content = content.replace(/\u00a0/g, ' ');
  content = content
    .split('\n')
    .map((line) => line.replace(/\s+$/g, ''))
    .join('\n');
  return content.replace(/\n{3,}/g, '\n\n').trim();
}

/** Cleans the farmer's `message` before any handler sees it. Shape checks happen in the route. */
export function sanitizeInput(request: FastifyRequest, reply: FastifyReply, done: HookHandlerDoneFunction) {
  const body: unknown = request.body;

  if (isRecord(body) && 'message' in body) {
    if (typeof body.message !== 'string') {
      reply.code(400).send({ error: 'invalid_request', message: 'Message must be a string.' });
      return done();
    }
    if (body.message.length > MAX_MESSAGE_LENGTH) {
      reply
        .code(400)
        .send({ error: 'invalid_request', message: `Message too long. Maximum ${MAX_MESSAGE_LENGTH} characters.` });
      return done();
    }
    body.message = sanitizeMessage(body.message);
  }

  done();
}
