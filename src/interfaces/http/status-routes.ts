import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { listRules } from '../../application/rule-crud.js';
import { listSubjects } from '../../application/subject-crud.js';
import { readStats, resetStats, readHeartbeat } from '../../infrastructure/redis/stats-repository.js';

/**
 * Monitoring status routes.
 *
 * GET  /api/v1/status        — Redis, worker heartbeat, counters, rule/subject counts
 * POST /api/v1/status/reset  — reset the counters
 */
async function statusRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/status',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      let redis = 'ok';
      try {
        await fastify.redis.ping();
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Redis status check failed');
        redis = 'unreachable';
      }

      const [heartbeat, stats] = redis === 'ok'
        ? await Promise.all([readHeartbeat(fastify.redis), readStats(fastify.redis)])
        : [null, null];

      const [rules, subjects] = await Promise.all([listRules(fastify.db), listSubjects(fastify.db, {})]);

      return reply.status(200).send({
        redis,
        worker: heartbeat === null ? 'unknown' : 'ok',
        heartbeat,
        stats,
        rules: {
          total: rules.length,
          enabled: rules.filter((rule) => rule.enabled).length,
        },
        subjects: {
          total: subjects.length,
          active: subjects.filter((subject) => subject.active).length,
        },
      });
    },
  );

  fastify.post(
    '/api/v1/status/reset',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      await resetStats(fastify.redis);
      fastify.log.info('Monitoring stats reset');
      return reply.status(200).send({ status: 'reset' });
    },
  );
}

export default fp(statusRoutes, {
  name: 'status-routes',
  dependencies: ['db', 'redis'],
  fastify: '5.x',
});
