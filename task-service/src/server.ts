import Fastify, { type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import { ulid } from 'ulid';
import type { AppConfig } from '../../src/config.js';
import { appErrorHandler } from '../../src/errors.js';
import { loggerOptions } from '../../src/logger.js';
import type { TaskHandlerRegistry } from './handlers/index.js';
import { FanoutPublisher, GatewayNotifier, type CompletionPublisher } from './notifier/index.js';
import { createTaskStore, type TaskStore } from './repositories/index.js';
import type { QueueStats } from './types/task.js';
import type { TaskWorker } from './worker/index.js';
import { createServiceClient, createWorker } from './worker/setup.js';

export interface WorkerServerDeps {
  config: AppConfig;
  store?: TaskStore;
  publisher?: CompletionPublisher;
  handlers?: TaskHandlerRegistry;
  fetchImpl?: typeof fetch;
  logger?: boolean;
}

export interface WorkerServer {
  app: FastifyInstance;
  worker: TaskWorker;
  store: TaskStore;
}

/**
 * Standalone worker process: drains the queue store and publishes task events
 * to the gateway's internal channel. HTTP only serves health.
 */
export async function createServer(deps: WorkerServerDeps): Promise<WorkerServer> {
  const { config } = deps;
  const app = Fastify({
    logger: deps.logger === false ? false : loggerOptions({
      level: config.LOG_LEVEL,
      pretty: config.NODE_ENV === 'development',
    }),
    genReqId: () => ulid(),
    disableRequestLogging: true,
  });
  app.setErrorHandler(appErrorHandler);

  await app.register(helmet, { contentSecurityPolicy: false });

  // Echo X-Request-ID
  app.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
  });

  const store = deps.store ?? createTaskStore(config);
  const publisher = deps.publisher ?? new FanoutPublisher(
    config.GATEWAY_INTERNAL_URLS.map((url) => new GatewayNotifier({
      url,
      token: config.INTERNAL_TOKEN,
      sourceService: 'worker',
      logger: app.log.child({ component: 'notifier', url }),
    })),
  );
  const bundle = createServiceClient(config, app.log.child({ component: 'service-client' }), deps.fetchImpl);
  const worker = createWorker(config, {
    store,
    publisher,
    logger: app.log.child({ component: 'worker' }),
    bundle,
    handlers: deps.handlers,
  });

  // Health endpoint with store and worker stats
  app.get('/health', async (_request, reply) => {
    let queue: QueueStats | null = null;
    try {
      queue = await store.getStats();
    } catch (err) {
      app.log.warn({ err }, 'queue stats unavailable');
      reply.code(503);
    }
    return {
      status: queue ? 'ok' : 'degraded',
      repo: { kind: config.REPO_KIND },
      queue,
      worker: worker.getStats(),
      breakers: bundle.breakers.snapshot(),
      concurrency: config.WORKER_CONCURRENCY,
    };
  });

  app.addHook('onReady', async () => {
    worker.start();
  });

  app.addHook('onClose', async () => {
    await worker.stop();
    await publisher.close();
  });

  return { app, worker, store };
}
