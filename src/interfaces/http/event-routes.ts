import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { validateEvent, validateBatch } from '../../application/event-intake.js';
import { enqueueEvent, enqueueEvents } from '../../infrastructure/redis/event-producer.js';
import { readHeartbeat } from '../../infrastructure/redis/stats-repository.js';
import { sendValidationError } from './validation.js';

export interface EventRoutesOptions {
  maxClockSkewSeconds: number;
}

/**
 * Registers the event intake routes.
 *
 * POST /api/v1/events        — single event intake
 * POST /api/v1/events/batch  — batch intake (1..500 events, all or nothing)
 * GET  /api/v1/events/health — Redis connectivity + worker heartbeat
 */
async function eventRoutes(fastify: FastifyInstance, opts: EventRoutesOptions): Promise<void> {
  const intake = { maxClockSkewSeconds: opts.maxClockSkewSeconds };

  /**
   * Single event intake.
   *
   * Validates → normalizes → appends to the stream → 202 with the id.
   */
  fastify.post(
    '/api/v1/events',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const result = validateEvent(request.body, intake);
      if (!result.ok) {
        return sendValidationError(reply, result.issues);
      }

      const event = result.value;
      try {
        await enqueueEvent(fastify.redis, event);
      } catch (err: unknown) {
        fastify.log.error({ err, event_id: event.event_id }, 'Failed to enqueue event');
        return reply.status(503).send({ error: 'Event stream unavailable' });
      }

      return reply.status(202).send({
        status: 'accepted',
        event_id: event.event_id,
      });
    },
  );

  /**
   * Batch event intake.
   *
   * Validates the full array up-front. On any validation failure the
   * entire batch is rejected; no partial success.
   */
  fastify.post(
    '/api/v1/events/batch',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const result = validateBatch(request.body, intake);
      if (!result.ok) {
        return sendValidationError(reply, result.issues);
      }

      const events = result.value;
      try {
        await enqueueEvents(fastify.redis, events);
      } catch (err: unknown) {
        fastify.log.error({ err, count: events.length }, 'Failed to enqueue event batch');
        return reply.status(503).send({ error: 'Event stream unavailable' });
      }

      return reply.status(202).send({
        status: 'accepted',
        count: events.length,
        event_ids: events.map((e) => e.event_id),
      });
    },
  );

  /**
   * Health check: verifies Redis is reachable via PING and reports the
   * worker heartbeat (`worker:health`, written every tick with a TTL;
   * missing means the worker is down).
   */
  fastify.get(
    '/api/v1/events/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      let pong: string;
      try {
        pong = await fastify.redis.ping();
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Redis health check failed');
        return reply.status(503).send({ status: 'degraded', redis: 'unreachable', worker: 'unknown' });
      }

      const heartbeat = await readHeartbeat(fastify.redis);
      return reply.status(200).send({
        status: heartbeat === null ? 'degraded' : 'ok',
        redis: pong,
        worker: heartbeat === null ? 'unknown' : 'ok',
        heartbeat,
      });
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['redis'],
  fastify: '5.x',
});
