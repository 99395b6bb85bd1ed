import Fastify, { type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { ulid } from 'ulid';
import type { AppConfig } from './config.js';
import { appErrorHandler } from './errors.js';
import { parseCorsCsv } from './lib/corsParser.js';
import { checkServiceHealth } from './lib/service-client.js';
import { loggerOptions } from './logger.js';
import { eventLoopDelayMs, getTaskCounters, p95Ms, p99Ms, recordDurationMs, recordStatus, snapshot } from './metrics.js';
import { cancelTask, type AcceptedCancel } from '../task-service/src/cancel.js';
import type { TaskHandlerRegistry } from '../task-service/src/handlers/index.js';
import { TenantRateLimiter } from '../task-service/src/middleware/rate-limit.js';
import { LocalPublisher, completionEvent } from '../task-service/src/notifier/index.js';
import { TaskProducer } from '../task-service/src/producer/index.js';
import { createTaskStore, type TaskStore } from '../task-service/src/repositories/index.js';
import { taskRoutes } from '../task-service/src/routes.js';
import type { TaskWorker } from '../task-service/src/worker/index.js';
import { createServiceClient, createWorker, serviceUrls } from '../task-service/src/worker/setup.js';
import { TaskRegistry, WebSocketGateway, createRegistryStore, type RegistryStore } from '../edge-gateway/src/index.js';

export interface ServerDeps {
  config: AppConfig;
  store?: TaskStore;
  registryStore?: RegistryStore;
  handlers?: TaskHandlerRegistry;
  fetchImpl?: typeof fetch;
  /** False silences the HTTP logger. */
  logger?: boolean;
}

export interface TaskRelayServer {
  app: FastifyInstance;
  store: TaskStore;
  producer: TaskProducer;
  registry: TaskRegistry;
  gateway: WebSocketGateway;
  worker: TaskWorker | null;
  instanceId: string;
}

/**
 * Orchestrator: task HTTP API and the WebSocket gateway on one server,
 * optionally with an in-process worker publishing straight to the gateway.
 */
export async function createServer(deps: ServerDeps): Promise<TaskRelayServer> {
  const { config } = deps;
  const instanceId = config.INSTANCE_ID ?? ulid();

  const app = Fastify({
    logger: deps.logger === false ? false : loggerOptions({
      level: config.LOG_LEVEL,
      pretty: config.NODE_ENV === 'development',
    }),
    genReqId: () => ulid(),
    bodyLimit: 1024 * 1024,
    disableRequestLogging: true,
  });

  app.decorateRequest('tenantContext', null);
  app.setErrorHandler(appErrorHandler);

  await app.register(helmet, { global: true, contentSecurityPolicy: false });

  // CORS: closed unless origins are configured
  const origins = parseCorsCsv(config.CORS_ORIGINS, { allowWildcardDev: config.CORS_DEV });
  if (origins.length > 0) {
    await app.register(cors, { origin: origins.includes('*') ? true : origins, credentials: true });
  } else if (config.CORS_DEV) {
    await app.register(cors, { origin: ['http://localhost:3000', 'http://localhost:5173'], credentials: true });
  }

  app.addHook('onSend', async (request, reply, payload) => {
    reply.header('X-Request-ID', request.id);
    return payload;
  });
  app.addHook('onResponse', async (request, reply) => {
    recordDurationMs(reply.elapsedTime);
    recordStatus(reply.statusCode);
    request.log.info({ route: request.routeOptions.url, statusCode: reply.statusCode, durationMs: Math.round(reply.elapsedTime) }, 'request completed');
  });

  const log = app.log;
  const store = deps.store ?? createTaskStore(config);
  const producer = new TaskProducer(store, log.child({ component: 'producer' }), {
    retentionMs: config.RESULT_RETENTION_MS,
    defaultMaxAttempts: config.RETRY_MAX_ATTEMPTS,
  });

  const registry = new TaskRegistry(deps.registryStore ?? createRegistryStore(config), store, {
    instanceId,
    deliveredTtlMs: config.REGISTRY_TTL_MS,
    logger: log.child({ component: 'registry' }),
  });

  let worker: TaskWorker | null = null;

  const afterCancel = async (result: AcceptedCancel): Promise<void> => {
    if (result.outcome === 'cancel_requested') {
      worker?.abortLocal(result.record.envelope.task_id, 'cancelled');
      return;
    }
    const event = completionEvent(result.record);
    if (event) await gateway.handleTaskEvent(event);
  };

  const gateway: WebSocketGateway = new WebSocketGateway({
    registry,
    logger: log.child({ component: 'gateway' }),
    heartbeatMs: config.WS_HEARTBEAT_MS,
    outboundQueueMax: config.WS_OUTBOUND_QUEUE_MAX,
    registryTtlMs: config.REGISTRY_TTL_MS,
    sweepIntervalMs: config.REGISTRY_SWEEP_MS,
    internalToken: config.INTERNAL_TOKEN,
    hooks: {
      cancel: async (tenantId, taskId) => {
        const result = await cancelTask(store, tenantId, taskId);
        await afterCancel(result);
        return { status: result.record.envelope.status, cancelRequested: result.outcome === 'cancel_requested' };
      },
      submitToolResult: async (tenantId, data, correlationId) => {
        const submitted = await producer.submit({
          type: 'tool_result',
          tenantId,
          payload: {
            tool_call_id: data.tool_call_id,
            result: data.result,
            is_error: data.is_error,
            execution_id: data.execution_id,
          },
          metadata: { source: 'websocket', ...(correlationId ? { correlation_id: correlationId } : {}) },
          priority: data.priority,
        });
        return submitted.taskId;
      },
    },
  });
  gateway.attach(app.server);

  const bundle = createServiceClient(config, log.child({ component: 'service-client' }), deps.fetchImpl);
  const publisher = new LocalPublisher(gateway);
  if (config.WORKER_ENABLED) {
    worker = createWorker(config, {
      store,
      publisher,
      logger: log.child({ component: 'worker' }),
      bundle,
      handlers: deps.handlers,
    });
  }

  await app.register(taskRoutes, {
    producer,
    store,
    rateLimit: config.RATE_LIMIT_ENABLED
      ? { limiter: new TenantRateLimiter({ burst: config.RATE_LIMIT_BURST, perMinute: config.RATE_LIMIT_RPM }), burst: config.RATE_LIMIT_BURST }
      : undefined,
    onSubmitted: (connectionId, tenantId, taskId) => gateway.subscribeConnection(connectionId, tenantId, taskId),
    onCancelled: async (record) => afterCancel({ outcome: 'cancelled', record }),
    onCancelRequested: (taskId) => {
      worker?.abortLocal(taskId, 'cancelled');
    },
  });

  app.get('/health', async (_request, reply) => {
    const mem = process.memoryUsage();
    let queue: Awaited<ReturnType<TaskStore['getStats']>> | null = null;
    let subscriptions: number | null = null;
    try {
      queue = await store.getStats();
      subscriptions = await registry.size();
    } catch (err) {
      log.warn({ err }, 'health probe failed');
    }
    if (!queue) reply.code(503);
    return {
      status: queue ? 'ok' : 'degraded',
      instance_id: instanceId,
      p95_ms: p95Ms(),
      ...snapshot(),
      queue,
      worker: worker?.getStats() ?? null,
      gateway: { connections: gateway.connectionCount(), subscriptions },
      breakers: bundle.breakers.snapshot(),
      counters: getTaskCounters(),
      runtime: {
        node: process.version,
        uptime_s: Math.round(process.uptime()),
        rss_mb: Math.round(mem.rss / 1024 / 1024),
        heap_used_mb: Math.round(mem.heapUsed / 1024 / 1024),
        eventloop_delay_ms: eventLoopDelayMs(),
        p95_ms: p95Ms(),
        p99_ms: p99Ms(),
      },
    };
  });

  app.get('/health/services', async () => ({
    services: await checkServiceHealth(bundle.client, { ...serviceUrls(config) }),
  }));

  app.addHook('onReady', async () => {
    gateway.start();
    worker?.start();
  });

  app.addHook('onClose', async () => {
    if (worker) await worker.stop();
    await publisher.close();
    await gateway.stop();
  });

  return { app, store, producer, registry, gateway, worker, instanceId };
}
