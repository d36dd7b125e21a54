import Fastify from 'fastify';

import { dbPlugin } from './infrastructure/db/index.js';
import { loadQueryConfig } from './infrastructure/config/index.js';
import { readingRoutes, metricsRoutes, healthRoutes } from './interfaces/http/index.js';
import { liveFeed } from './interfaces/ws/index.js';

/**
 * Query service bootstrap.
 *
 * Order:
 * 1) Config
 * 2) Infrastructure plugins
 * 3) HTTP routes and live feed
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadQueryConfig();

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(dbPlugin, { databaseUrl: config.databaseUrl });

  // --------------------------------------------------
  // HTTP / WebSocket interface
  // --------------------------------------------------

  await fastify.register(readingRoutes);
  await fastify.register(metricsRoutes);
  await fastify.register(healthRoutes);

  if (config.liveFeedEnabled) {
    await fastify.register(liveFeed, { redisUrl: config.redisUrl });
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      fastify.log.info({ signal }, 'Shutting down query service...');
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          fastify.log.error({ err }, 'Error during shutdown');
          process.exit(1);
        },
      );
    });
  }

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start query service', err);
  process.exit(1);
});
