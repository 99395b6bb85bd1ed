import { ConfigError, loadConfig } from '../../src/config.js';
import { createLogger } from '../../src/logger.js';
import { createServer } from './server.js';

async function start() {
  const config = loadConfig();
  const { app } = await createServer({ config });

  await app.listen({ port: config.WORKER_PORT, host: config.HOST });
  app.log.info({ port: config.WORKER_PORT, concurrency: config.WORKER_CONCURRENCY }, 'Worker service started');

  // Graceful shutdown
  let closing = false;
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      if (closing) return;
      closing = true;
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'Error during shutdown');
          process.exit(1);
        },
      );
    });
  }
}

start().catch((error: unknown) => {
  const logger = createLogger('worker');
  if (error instanceof ConfigError) {
    logger.fatal({ issues: error.issues }, 'invalid configuration');
  } else {
    logger.fatal({ err: error }, 'Failed to start worker service');
  }
  process.exit(1);
});
