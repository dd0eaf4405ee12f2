import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { AppConfig } from './config.js';
import { redisPlugin, dbPlugin } from './infrastructure/index.js';
import {
  eventRoutes,
  queryRoutes,
  ruleRoutes,
  subjectRoutes,
  alertRoutes,
  statusRoutes,
  errorHandler,
} from './interfaces/http/index.js';

/**
 * Builds the Fastify app without listening.
 *
 * Order:
 * 1) Infrastructure plugins
 * 2) Error handler
 * 3) HTTP routes
 */
export async function buildServer(config: AppConfig): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin, { redisUrl: config.redisUrl });
  await fastify.register(dbPlugin, { databaseUrl: config.databaseUrl });

  fastify.setErrorHandler(errorHandler);

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(eventRoutes, { maxClockSkewSeconds: config.maxClockSkewSeconds });
  await fastify.register(queryRoutes);
  await fastify.register(ruleRoutes);
  await fastify.register(subjectRoutes);
  await fastify.register(alertRoutes);
  await fastify.register(statusRoutes);

  return fastify;
}
