import 'dotenv/config';
import { buildApp } from './app.js';
import { loadAppConfig } from './lib/config/app.js';
import { createDataContext } from './lib/db/index.js';

const config = loadAppConfig();
const db = createDataContext(config.databaseUrl);
const fastify = await buildApp({ config, db });

if (db.kind === 'memory') {
  fastify.log.warn('DATABASE_URL not set: using the in-memory store, data is lost on restart');
} else {
  fastify.log.info('Using PostgreSQL store');
}

const shutdown = async (signal: string) => {
  fastify.log.info(`Received ${signal}, shutting down`);
  try {
    await fastify.close();
    process.exit(0);
  } catch (err) {
    fastify.log.error({ err }, 'Error during shutdown');
    process.exit(1);
  }
};

process.once('SIGINT', (signal) => void shutdown(signal));
process.once('SIGTERM', (signal) => void shutdown(signal));

const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error({ err }, 'Failed to start server');
    process.exit(1);
  }
};

await start();
