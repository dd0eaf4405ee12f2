import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  createRuleSchema,
  updateRuleSchema,
  patchRuleSchema,
} from '../../application/rule-schema.js';
import {
  createRule,
  listRules,
  getRule,
  replaceRule,
  patchRule,
  removeRule,
} from '../../application/rule-crud.js';
import type { ConfigDeps } from '../../application/config-change.js';
import { createConfigNotifier } from '../../infrastructure/redis/config-notifier.js';
import { sendValidationError, UUID_RE } from './validation.js';

type RuleParams = { Params: { rule_id: string } };

/**
 * Rule CRUD routes. Every successful write publishes a config change so
 * workers reload their rule snapshot.
 *
 * POST   /api/v1/rules           — create rule
 * GET    /api/v1/rules           — list all rules
 * GET    /api/v1/rules/:rule_id  — get single rule
 * PUT    /api/v1/rules/:rule_id  — full replace
 * PATCH  /api/v1/rules/:rule_id  — partial update
 * DELETE /api/v1/rules/:rule_id  — delete rule
 */
async function ruleRoutes(fastify: FastifyInstance): Promise<void> {
  const deps: ConfigDeps = {
    db: fastify.db,
    notify: createConfigNotifier(fastify.redis, fastify.log),
  };

  // ── POST /api/v1/rules ───────────────────────────────────
  fastify.post(
    '/api/v1/rules',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = createRuleSchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error.issues);
      }

      const row = await createRule(deps, parsed.data);
      return reply.status(201).send(row);
    },
  );

  // ── GET /api/v1/rules ────────────────────────────────────
  fastify.get(
    '/api/v1/rules',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const rows = await listRules(fastify.db);
      return reply.status(200).send(rows);
    },
  );

  // ── GET /api/v1/rules/:rule_id ───────────────────────────
  fastify.get(
    '/api/v1/rules/:rule_id',
    async (request: FastifyRequest<RuleParams>, reply: FastifyReply) => {
      const { rule_id } = request.params;
      if (!UUID_RE.test(rule_id)) {
        return reply.status(400).send({ error: 'rule_id must be a valid UUID' });
      }

      const row = await getRule(fastify.db, rule_id);
      if (row === null) {
        return reply.status(404).send({ error: 'Rule not found' });
      }

      return reply.status(200).send(row);
    },
  );

  // ── PUT /api/v1/rules/:rule_id ───────────────────────────
  fastify.put(
    '/api/v1/rules/:rule_id',
    async (request: FastifyRequest<RuleParams & { Body: unknown }>, reply: FastifyReply) => {
      const { rule_id } = request.params;
      if (!UUID_RE.test(rule_id)) {
        return reply.status(400).send({ error: 'rule_id must be a valid UUID' });
      }

      const parsed = updateRuleSchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error.issues);
      }

      const row = await replaceRule(deps, rule_id, parsed.data);
      if (row === null) {
        return reply.status(404).send({ error: 'Rule not found' });
      }

      return reply.status(200).send(row);
    },
  );

  // ── PATCH /api/v1/rules/:rule_id ─────────────────────────
  fastify.patch(
    '/api/v1/rules/:rule_id',
    async (request: FastifyRequest<RuleParams & { Body: unknown }>, reply: FastifyReply) => {
      const { rule_id } = request.params;
      if (!UUID_RE.test(rule_id)) {
        return reply.status(400).send({ error: 'rule_id must be a valid UUID' });
      }

      const parsed = patchRuleSchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error.issues);
      }

      const row = await patchRule(deps, rule_id, parsed.data);
      if (row === null) {
        return reply.status(404).send({ error: 'Rule not found' });
      }

      return reply.status(200).send(row);
    },
  );

  // ── DELETE /api/v1/rules/:rule_id ────────────────────────
  fastify.delete(
    '/api/v1/rules/:rule_id',
    async (request: FastifyRequest<RuleParams>, reply: FastifyReply) => {
      const { rule_id } = request.params;
      if (!UUID_RE.test(rule_id)) {
        return reply.status(400).send({ error: 'rule_id must be a valid UUID' });
      }

      const deleted = await removeRule(deps, rule_id);
      if (!deleted) {
        return reply.status(404).send({ error: 'Rule not found' });
      }

      return reply.status(204).send();
    },
  );
}

export default fp(ruleRoutes, {
  name: 'rule-routes',
  dependencies: ['db', 'redis'],
  fastify: '5.x',
});
