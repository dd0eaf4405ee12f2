import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { listAlerts, getAlert, acknowledgeAlert } from '../../application/query-alerts.js';
import { alertListQuerySchema } from '../../application/query-schema.js';
import { sendValidationError, UUID_RE } from './validation.js';

type AlertParams = { Params: { alert_id: string } };

/**
 * Alert routes.
 *
 * GET  /api/v1/alerts                        — paginated alert list with filters
 * GET  /api/v1/alerts/:alert_id              — single alert
 * POST /api/v1/alerts/:alert_id/acknowledge  — mark acknowledged (idempotent)
 */
async function alertRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Query params: limit, offset, rule_id, subject_id, severity, status, from, to
   */
  fastify.get(
    '/api/v1/alerts',
    async (request: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) => {
      const parsed = alertListQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error.issues);
      }

      const result = await listAlerts(fastify.db, parsed.data);
      return reply.status(200).send(result);
    },
  );

  fastify.get(
    '/api/v1/alerts/:alert_id',
    async (request: FastifyRequest<AlertParams>, reply: FastifyReply) => {
      const { alert_id } = request.params;
      if (!UUID_RE.test(alert_id)) {
        return reply.status(400).send({ error: 'alert_id must be a valid UUID' });
      }

      const row = await getAlert(fastify.db, alert_id);
      if (row === null) {
        return reply.status(404).send({ error: 'Alert not found' });
      }

      return reply.status(200).send(row);
    },
  );

  fastify.post(
    '/api/v1/alerts/:alert_id/acknowledge',
    async (request: FastifyRequest<AlertParams>, reply: FastifyReply) => {
      const { alert_id } = request.params;
      if (!UUID_RE.test(alert_id)) {
        return reply.status(400).send({ error: 'alert_id must be a valid UUID' });
      }

      const row = await acknowledgeAlert(fastify.db, alert_id);
      if (row === null) {
        return reply.status(404).send({ error: 'Alert not found' });
      }

      return reply.status(200).send(row);
    },
  );
}

export default fp(alertRoutes, {
  name: 'alert-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
