import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { DataContext } from '../lib/db/index.js';

export interface DbPluginOptions {
  db: DataContext;
}

declare module 'fastify' {
  interface FastifyInstance {
    db: DataContext;
  }
}

/**
 * Exposes the data context as `fastify.db` and closes it with the server.
 */
async function dbPlugin(fastify: FastifyInstance, options: DbPluginOptions): Promise<void> {
  fastify.decorate('db', options.db);

  fastify.addHook('onClose', async () => {
    await options.db.close();
  });
}

export default fp(dbPlugin, {
  name: 'db',
});
