import type { FastifyReply, FastifyRequest, HookHandlerDoneFunction } from 'fastify';
import { config } from '../config/app.js';

const HTML_TAG_REGEX = /<[^>]*>/g;
const SCRIPT_REGEX = /<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function sanitizeText(value: string): string {
  let content = value.replace(SCRIPT_REGEX, '');
  content = content.replace(/<\/?(code|pre)>/gi, '`');
  content = content.replace(HTML_TAG_REGEX, '');
  content = content.replace(/\r\n?/g, '\n');
  content = content.replace(/\u00a0/g, ' ');
  const lines = content.split('\n').map((line) => line.replace(/\s+$/g, ''));
  content = lines.join('\n');
  return content.replace(/\n{3,}/g, '\n\n').trim();
}

export function sanitizeInput(request: FastifyRequest, reply: FastifyReply, done: HookHandlerDoneFunction) {
  const body = request.body;

  if (isRecord(body) && 'text' in body) {
    if (typeof body.text !== 'string') {
      reply.code(400).send({ error: 'Question text must be a string.' });
      return done();
    }

    if (body.text.length > config.MAX_INPUT_CHARS) {
      reply.code(400).send({ error: `Question too long. Maximum ${config.MAX_INPUT_CHARS} characters.` });
      return done();
    }

    const text = sanitizeText(body.text);
    if (!text) {
      reply.code(400).send({ error: 'Question text is empty after sanitization.' });
      return done();
    }
    body.text = text;
  }

  done();
}
