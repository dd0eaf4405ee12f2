import type { FastifyReply } from 'fastify';
import type { ZodIssue } from 'zod';

export const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** 400 with the zod issues, the shape every route uses for bad input. */
export function sendValidationError(reply: FastifyReply, issues: readonly ZodIssue[]) {
  return reply.status(400).send({ error: 'Validation failed', issues });
}
