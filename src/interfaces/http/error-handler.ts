import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';

/**
 * Fastify error handler.
 *
 * Errors Fastify raised for the request itself (malformed JSON, body too
 * large) keep their 4xx status. Everything else is logged with `err` and
 * answered with a generic 500.
 */
export function errorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply) {
  const status = error.statusCode;
  if (status !== undefined && status >= 400 && status < 500) {
    return reply.status(status).send({ error: error.message });
  }

  request.log.error({ err: error, url: request.url, method: request.method }, 'Unhandled request error');
  return reply.status(500).send({ error: 'Internal Server Error' });
}
