import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { listEvents, getEvent } from '../../application/query-events.js';
import { eventListQuerySchema } from '../../application/query-schema.js';
import { sendValidationError, UUID_RE } from './validation.js';

/**
 * Read-only event query routes.
 *
 * GET /api/v1/events            — paginated event list with filters
 * GET /api/v1/events/:event_id  — single event by ID
 */
async function queryRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Query params: limit, offset, subject_id, event_type, source, from, to
   */
  fastify.get(
    '/api/v1/events',
    async (request: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) => {
      const parsed = eventListQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error.issues);
      }

      const result = await listEvents(fastify.db, parsed.data);
      return reply.status(200).send(result);
    },
  );

  fastify.get(
    '/api/v1/events/:event_id',
    async (
      request: FastifyRequest<{ Params: { event_id: string } }>,
      reply: FastifyReply,
    ) => {
      const { event_id } = request.params;
      if (!UUID_RE.test(event_id)) {
        return reply.status(400).send({ error: 'event_id must be a valid UUID' });
      }

      const event = await getEvent(fastify.db, event_id);
      if (event === null) {
        return reply.status(404).send({ error: 'Event not found' });
      }

      return reply.status(200).send(event);
    },
  );
}

export default fp(queryRoutes, {
  name: 'query-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
