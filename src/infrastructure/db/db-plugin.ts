import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { createDbClient } from './client.js';
import type { Database } from './client.js';

export interface DbPluginOptions {
  databaseUrl: string;
}

/**
 * Fastify plugin that manages the Drizzle/postgres.js connection lifecycle.
 *
 * Decorates `fastify.db` for use by routes.
 * Closes the connection pool on server shutdown.
 */
async function dbPlugin(fastify: FastifyInstance, opts: DbPluginOptions): Promise<void> {
  const { sql, db } = createDbClient(opts.databaseUrl);

  fastify.decorate('db', db);

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    db: Database;
  }
}
