import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { createDbClient, ensureSchema } from './client.js';
import type { Database } from './client.js';

export interface DbPluginOptions {
  url: string;
}

/**
 * Fastify plugin that manages the Drizzle/postgres.js connection lifecycle.
 *
 * Decorates `fastify.db` for the subscription registry.
 * Closes the connection pool on server shutdown.
 */
async function dbPlugin(fastify: FastifyInstance, opts: DbPluginOptions): Promise<void> {
  const { sql, db } = createDbClient(opts.url);

  await ensureSchema(sql);
  fastify.log.info('Database ready (webhook_subscriptions table)');

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

/** Extend Fastify's type system so `fastify.db` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    db: Database;
  }
}
