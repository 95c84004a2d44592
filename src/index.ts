import Fastify from 'fastify';
import { ProcessorRegistry } from './application/index.js';
import { loadSyncConfig, storePlugin } from './infrastructure/index.js';
import { queryRoutes, webhookRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap Fastify server.
 *
 * Order:
 * 1) Configuration (fails fast on invalid env)
 * 2) Store plugin
 * 3) HTTP routes
 * 4) Shutdown hooks
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadSyncConfig();

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(storePlugin, { config });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  const registry = ProcessorRegistry.withDefaults(config.eventDomain);

  await fastify.register(webhookRoutes, { registry, config });
  await fastify.register(queryRoutes);

  // --------------------------------------------------
  // Graceful shutdown
  // --------------------------------------------------

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.host,
    port: config.port,
  });

  fastify.log.info(
    {
      storeDriver: config.storeDriver,
      unsupportedEventPolicy: config.unsupportedEventPolicy,
      deletePolicy: config.deletePolicy,
      stalenessMode: config.stalenessMode,
    },
    'Sync policies loaded',
  );
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
