import { ConfigError, loadConfig } from './config.js';
import { createServer } from './createServer.js';
import { createLogger } from './logger.js';
import { getTaskCounters, p95Ms, p99Ms, eventLoopDelayMs, snapshot } from './metrics.js';

async function start() {
  const config = loadConfig();
  const { app, instanceId } = await createServer({ config });
  let closing = false;

  await app.listen({ port: config.PORT, host: config.HOST });
  app.log.info({ port: config.PORT, instance_id: instanceId, worker: config.WORKER_ENABLED }, 'server started');

  // Health snapshot on SIGUSR2
  process.on('SIGUSR2', () => {
    const mem = process.memoryUsage();
    app.log.info({
      runtime: {
        node: process.version,
        uptime_s: Math.round(process.uptime()),
        rss_mb: Math.round(mem.rss / 1024 / 1024),
        eventloop_delay_ms: eventLoopDelayMs(),
        p95_ms: p95Ms(),
        p99_ms: p99Ms(),
      },
      ...snapshot(),
      counters: getTaskCounters(),
    }, 'SIGUSR2 health snapshot');
  });

  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.on(sig, () => {
      if (closing) return;
      closing = true;
      app.log.info({ sig }, 'shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'error during shutdown');
          process.exit(1);
        },
      );
    });
  }
}

start().catch((error: unknown) => {
  const logger = createLogger('task-relay');
  if (error instanceof ConfigError) {
    logger.fatal({ issues: error.issues }, 'invalid configuration');
  } else {
    logger.fatal({ err: error }, 'failed to start server');
  }
  process.exit(1);
});
