import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import cookie from '@fastify/cookie';
import type { AppConfig } from './lib/config/app.js';
import type { DataContext } from './lib/db/index.js';
import { registerErrorHandler } from './lib/error-handler.js';
import authPlugin from './plugins/auth.plugin.js';
import dbPlugin from './plugins/db.plugin.js';
import { authRoutes } from './routes/auth.js';
import { workItemsRoutes } from './routes/work-items.js';

export interface BuildAppOptions {
  config: AppConfig;
  db: DataContext;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp({ config, db, logger }: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: logger ?? { level: config.logLevel },
  });

  // CORS with credentials support
  await fastify.register(cors, {
    origin: config.corsOrigin,
    credentials: true,
  });

  await fastify.register(cookie);
  await fastify.register(dbPlugin, { db });
  await fastify.register(authPlugin, { jwtSecret: config.jwtSecret });

  registerErrorHandler(fastify);

  fastify.get('/health', async (request, reply) => {
    try {
      await fastify.db.ping();
      return reply.send({ status: 'ok', store: fastify.db.kind });
    } catch (err) {
      request.log.error({ err }, 'Health check failed');
      return reply.status(503).send({ status: 'unavailable', store: fastify.db.kind });
    }
  });

  await fastify.register(authRoutes, {
    jwtSecret: config.jwtSecret,
    jwtExpiresIn: config.jwtExpiresIn,
    secureCookies: config.isProduction,
  });
  await fastify.register(workItemsRoutes);

  return fastify;
}
