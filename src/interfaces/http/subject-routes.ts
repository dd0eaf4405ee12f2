import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  createSubjectSchema,
  patchSubjectSchema,
  subjectListQuerySchema,
} from '../../application/subject-schema.js';
import {
  registerSubject,
  listSubjects,
  getSubject,
  updateSubjectProfile,
  removeSubject,
} from '../../application/subject-crud.js';
import type { ConfigDeps } from '../../application/config-change.js';
import { createConfigNotifier } from '../../infrastructure/redis/config-notifier.js';
import { sendValidationError } from './validation.js';

type SubjectParams = { Params: { subject_id: string } };

/**
 * Monitored subject routes.
 *
 * POST   /api/v1/subjects              — register (409 on duplicate id)
 * GET    /api/v1/subjects              — list, filters subject_type and profile
 * GET    /api/v1/subjects/:subject_id  — get one
 * PATCH  /api/v1/subjects/:subject_id  — profile change
 * DELETE /api/v1/subjects/:subject_id  — unregister
 */
async function subjectRoutes(fastify: FastifyInstance): Promise<void> {
  const deps: ConfigDeps = {
    db: fastify.db,
    notify: createConfigNotifier(fastify.redis, fastify.log),
  };

  fastify.post(
    '/api/v1/subjects',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = createSubjectSchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error.issues);
      }

      const row = await registerSubject(deps, parsed.data);
      if (row === null) {
        return reply.status(409).send({ error: 'Subject already registered' });
      }

      return reply.status(201).send(row);
    },
  );

  fastify.get(
    '/api/v1/subjects',
    async (request: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) => {
      const parsed = subjectListQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error.issues);
      }

      const rows = await listSubjects(fastify.db, parsed.data);
      return reply.status(200).send(rows);
    },
  );

  fastify.get(
    '/api/v1/subjects/:subject_id',
    async (request: FastifyRequest<SubjectParams>, reply: FastifyReply) => {
      const row = await getSubject(fastify.db, request.params.subject_id);
      if (row === null) {
        return reply.status(404).send({ error: 'Subject not found' });
      }

      return reply.status(200).send(row);
    },
  );

  fastify.patch(
    '/api/v1/subjects/:subject_id',
    async (request: FastifyRequest<SubjectParams & { Body: unknown }>, reply: FastifyReply) => {
      const parsed = patchSubjectSchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error.issues);
      }

      const row = await updateSubjectProfile(deps, request.params.subject_id, parsed.data);
      if (row === null) {
        return reply.status(404).send({ error: 'Subject not found' });
      }

      return reply.status(200).send(row);
    },
  );

  fastify.delete(
    '/api/v1/subjects/:subject_id',
    async (request: FastifyRequest<SubjectParams>, reply: FastifyReply) => {
      const deleted = await removeSubject(deps, request.params.subject_id);
      if (!deleted) {
        return reply.status(404).send({ error: 'Subject not found' });
      }

      return reply.status(204).send();
    },
  );
}

export default fp(subjectRoutes, {
  name: 'subject-routes',
  dependencies: ['db', 'redis'],
  fastify: '5.x',
});
