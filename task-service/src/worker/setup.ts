import type { AppConfig } from '../../../src/config.js';
import { ResponseCache } from '../../../src/cache/response-cache.js';
import type { ServiceResponse } from '../../../src/errors.js';
import { CircuitBreakerRegistry } from '../../../src/lib/circuit-breaker.js';
import { RetryPolicy } from '../../../src/lib/retry.js';
import { ServiceClient } from '../../../src/lib/service-client.js';
import type { BaseLogger } from '../../../src/logger.js';
import { createTaskHandlers, type ServiceUrls, type TaskHandlerRegistry } from '../handlers/index.js';
import type { CompletionPublisher } from '../notifier/index.js';
import type { TaskStore } from '../repositories/base.js';
import { SERVICES } from '../schemas/task.js';
import { TaskWorker } from './index.js';

export function retryPolicyFrom(config: AppConfig): RetryPolicy {
  return new RetryPolicy({
    maxAttempts: config.RETRY_MAX_ATTEMPTS,
    baseDelayMs: config.RETRY_BASE_DELAY_MS,
    multiplier: config.RETRY_MULTIPLIER,
    maxDelayMs: config.RETRY_MAX_DELAY_MS,
    jitter: config.RETRY_JITTER,
  });
}

export function serviceUrls(config: AppConfig): ServiceUrls {
  return {
    embedding: config.EMBEDDING_SERVICE_URL,
    query: config.QUERY_SERVICE_URL,
    agentExecution: config.AGENT_EXECUTION_SERVICE_URL,
    ingestion: config.INGESTION_SERVICE_URL,
  };
}

export interface ClientBundle {
  client: ServiceClient;
  breakers: CircuitBreakerRegistry;
  retryPolicy: RetryPolicy;
}

export function createServiceClient(config: AppConfig, logger: BaseLogger, fetchImpl?: typeof fetch): ClientBundle {
  const retryPolicy = retryPolicyFrom(config);
  const breakers = new CircuitBreakerRegistry({
    windowSize: config.BREAKER_WINDOW_SIZE,
    failureRatio: config.BREAKER_FAILURE_RATIO,
    cooldownMs: config.BREAKER_COOLDOWN_MS,
  });
  const client = new ServiceClient({
    retryPolicy,
    breakers,
    cache: new ResponseCache<ServiceResponse>({ maxEntries: 5000 }),
    fetchImpl,
    logger,
  });
  return { client, breakers, retryPolicy };
}

export interface WorkerSetup {
  store: TaskStore;
  publisher: CompletionPublisher;
  logger: BaseLogger;
  bundle: ClientBundle;
  /** Overrides the service-backed handlers. */
  handlers?: TaskHandlerRegistry;
}

export function createWorker(config: AppConfig, setup: WorkerSetup): TaskWorker {
  const handlers = setup.handlers ?? createTaskHandlers(setup.bundle.client, {
    urls: serviceUrls(config),
    embeddingCacheTtlMs: config.EMBEDDING_CACHE_TTL_MS,
  });
  return new TaskWorker(
    {
      store: setup.store,
      handlers,
      publisher: setup.publisher,
      retryPolicy: setup.bundle.retryPolicy,
      logger: setup.logger,
    },
    {
      services: [...SERVICES],
      concurrency: config.WORKER_CONCURRENCY,
      leaseMs: config.LEASE_MS,
      pollIntervalMs: config.POLL_INTERVAL_MS,
      pollMaxIntervalMs: config.POLL_MAX_INTERVAL_MS,
      maintenanceIntervalMs: config.MAINTENANCE_INTERVAL_MS,
      retentionMs: config.RESULT_RETENTION_MS,
      shutdownGraceMs: config.SHUTDOWN_GRACE_MS,
    },
  );
}
