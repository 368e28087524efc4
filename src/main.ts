import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createServer } from './server.js';

async function start() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const app = await createServer(config, { logger });

  await app.listen({ port: config.port, host: config.host });
  app.log.info(
    { port: config.port, workers: config.batch.workers, store: config.redis ? 'redis' : 'memory' },
    'Report batch service started',
  );

  // Graceful shutdown
  const signals = ['SIGINT', 'SIGTERM'] as const;
  for (const signal of signals) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        },
      );
    });
  }
}

start().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
