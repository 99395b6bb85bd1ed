import { AppError, classifyError } from '../../../src/errors.js';
import { fmt, msg } from '../../../src/lib/error-messages.js';
import { runWithContext, type RequestContext } from '../../../src/lib/context.js';
import { RetryPolicy } from '../../../src/lib/retry.js';
import type { BaseLogger } from '../../../src/logger.js';
import type { TaskEvent } from '../../../edge-gateway/src/messages.js';
import type { HandlerContext, TaskHandlerRegistry } from '../handlers/base.js';
import { completionEvent, type CompletionPublisher } from '../notifier/index.js';
import type { TaskStore } from '../repositories/base.js';
import { timeoutError } from '../repositories/records.js';
import { TASK_TYPES, isTaskType } from '../schemas/task.js';
import type { Lease, LeasedTask, TaskEnvelope, TaskError, TaskRecord } from '../types/task.js';
import { loggableTask } from '../utils/payload-scrubber.js';

export interface WorkerConfig {
  /** Services whose queues this worker drains, in rotation. */
  services: string[];
  concurrency: number;
  leaseMs: number;
  pollIntervalMs: number;
  pollMaxIntervalMs: number;
  maintenanceIntervalMs: number;
  retentionMs: number;
  shutdownGraceMs: number;
  /** Restricts dequeues to one tenant. */
  tenantId?: string;
  defaultExecutionTimeoutMs?: number;
}

export interface WorkerDeps {
  store: TaskStore;
  handlers: TaskHandlerRegistry;
  publisher: CompletionPublisher;
  retryPolicy: RetryPolicy;
  logger: BaseLogger;
  now?: () => number;
}

export interface WorkerStats {
  running: number;
  processed: number;
  failed: number;
  cancelled: number;
  retried: number;
  leaseLost: number;
}

export type AbortCause = 'cancelled' | 'timeout' | 'lease_lost' | 'shutdown';

export class TaskAbortError extends Error {
  constructor(readonly abortCause: AbortCause) {
    super(`Task aborted: ${abortCause}`);
    this.name = 'TaskAbortError';
  }
}

function abortCauseOf(signal: AbortSignal): AbortCause {
  return signal.reason instanceof TaskAbortError ? signal.reason.abortCause : 'shutdown';
}

/** Settles with the handler, or rejects as soon as the signal aborts. */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export function toTaskError(error: unknown): TaskError {
  if (error instanceof AppError) {
    return { type: error.type, error_code: error.code, error_message: error.message, retryable: error.retryable };
  }
  return { type: 'INTERNAL', error_code: 'HANDLER_ERROR', error_message: msg('INTERNAL_UNEXPECTED'), retryable: false };
}

function contextOf(envelope: TaskEnvelope): RequestContext {
  const str = (key: string): string | undefined => {
    const value = envelope.metadata[key];
    return typeof value === 'string' ? value : undefined;
  };
  return {
    tenantId: envelope.tenant_id,
    agentId: str('agent_id'),
    conversationId: str('conversation_id') ?? str('session_id'),
    collectionId: str('collection_id'),
    correlationId: str('correlation_id') ?? envelope.task_id,
  };
}

/**
 * Consumer loops for one or more services. Each loop holds at most one lease;
 * a renewal timer keeps it alive and watches the cancel flag.
 */
export class TaskWorker {
  private isRunning = false;
  private loops: Promise<void>[] = [];
  private stopController = new AbortController();
  private running = new Map<string, AbortController>();
  private pendingPublishes = new Set<Promise<void>>();
  private maintenanceTimer?: NodeJS.Timeout;
  private maintenanceRunning = false;
  private rotation = 0;
  private readonly idlePolicy: RetryPolicy;
  private readonly now: () => number;
  private stats: WorkerStats = { running: 0, processed: 0, failed: 0, cancelled: 0, retried: 0, leaseLost: 0 };

  constructor(private readonly deps: WorkerDeps, private readonly config: WorkerConfig) {
    this.now = deps.now ?? Date.now;
    this.idlePolicy = deps.retryPolicy.withOverrides({
      baseDelayMs: config.pollIntervalMs,
      maxDelayMs: config.pollMaxIntervalMs,
      multiplier: 2,
      jitter: 0.2,
    });
  }

  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;
    this.stopController = new AbortController();

    for (let i = 0; i < this.config.concurrency; i++) {
      this.loops.push(this.loop(i));
    }
    this.maintenanceTimer = setInterval(() => {
      this.runMaintenance().catch((err: unknown) => {
        this.deps.logger.error({ err }, 'maintenance failed');
      });
    }, this.config.maintenanceIntervalMs);
    this.deps.logger.info({ services: this.config.services, concurrency: this.config.concurrency }, 'worker started');
  }

  async stop(): Promise<void> {
    if (!this.isRunning) return;
    this.isRunning = false;
    this.stopController.abort();
    if (this.maintenanceTimer) clearInterval(this.maintenanceTimer);

    // Give in-flight handlers the grace period, then hand their tasks back
    const graceTimer = setTimeout(() => {
      for (const controller of this.running.values()) {
        controller.abort(new TaskAbortError('shutdown'));
      }
    }, this.config.shutdownGraceMs);

    await Promise.all(this.loops);
    clearTimeout(graceTimer);
    this.loops = [];
    await Promise.all(this.pendingPublishes);
    this.deps.logger.info(this.stats, 'worker stopped');
  }

  getStats(): WorkerStats {
    return { ...this.stats };
  }

  /** Aborts a task running in this process, if any. */
  abortLocal(taskId: string, cause: AbortCause): boolean {
    const controller = this.running.get(taskId);
    if (!controller) return false;
    controller.abort(new TaskAbortError(cause));
    return true;
  }

  /** Waits for fire-and-forget publishes; used by tests and shutdown. */
  async flush(): Promise<void> {
    await Promise.all(this.pendingPublishes);
  }

  /** Dequeues and executes at most one task. Returns whether work was found. */
  async runOnce(): Promise<boolean> {
    const { services } = this.config;
    for (let i = 0; i < services.length; i++) {
      const service = services[(this.rotation + i) % services.length];
      if (!service) continue;

      let leased: LeasedTask | null;
      try {
        leased = await this.deps.store.dequeue(service, { tenantId: this.config.tenantId, leaseMs: this.config.leaseMs });
      } catch (err) {
        // An unreachable store is the same as an empty queue
        this.deps.logger.warn({ err, service }, 'dequeue failed');
        continue;
      }
      if (!leased) continue;

      this.rotation = (this.rotation + i + 1) % services.length;
      await this.execute(leased);
      return true;
    }
    return false;
  }

  async runMaintenance(): Promise<void> {
    if (this.maintenanceRunning) return;
    this.maintenanceRunning = true;
    try {
      const now = this.now();
      const sweep = await this.deps.store.requeueExpiredLeases(now);
      if (sweep.requeued > 0) this.deps.logger.warn({ count: sweep.requeued }, 'requeued tasks with expired leases');
      for (const record of sweep.terminal) this.publishCompletion(record);

      const expired = await this.deps.store.failExpired(now);
      for (const record of expired) {
        this.abortLocal(record.envelope.task_id, 'lease_lost');
        this.deps.logger.warn({ task_id: record.envelope.task_id, type: record.envelope.type }, 'task exceeded max lifetime');
        this.publishCompletion(record);
      }

      const pruned = await this.deps.store.prune(now - this.config.retentionMs);
      if (pruned > 0) this.deps.logger.debug({ count: pruned }, 'pruned finished tasks');
    } finally {
      this.maintenanceRunning = false;
    }
  }

  private async loop(index: number): Promise<void> {
    let idle = 0;
    while (this.isRunning) {
      let worked = false;
      try {
        worked = await this.runOnce();
      } catch (err) {
        this.deps.logger.error({ err, loop: index }, 'worker loop error');
      }
      if (worked) {
        idle = 0;
        continue;
      }
      idle++;
      await this.idle(this.idlePolicy.delayFor(Math.min(idle, 16)));
    }
  }

  private idle(ms: number): Promise<void> {
    const signal = this.stopController.signal;
    if (signal.aborted) return Promise.resolve();
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal.addEventListener('abort', done, { once: true });
    });
  }

  private async execute(leased: LeasedTask): Promise<void> {
    const { envelope } = leased;
    const log = loggableTask(envelope);
    const handler = this.deps.handlers.get(envelope.type);

    if (!handler) {
      const record = await this.deps.store.ack(leased.lease, {
        status: 'failed',
        error: {
          type: 'BAD_INPUT',
          error_code: 'UNKNOWN_TASK_TYPE',
          error_message: fmt('UNKNOWN_TASK_TYPE', { type: envelope.type }),
          retryable: false,
        },
      });
      this.stats.failed++;
      this.deps.logger.error(log, 'no handler registered for task type');
      if (record) this.publishCompletion(record);
      return;
    }

    const controller = new AbortController();
    const abort = (cause: AbortCause) => {
      if (!controller.signal.aborted) controller.abort(new TaskAbortError(cause));
    };
    this.running.set(envelope.task_id, controller);
    this.stats.running++;

    let lease: Lease = leased.lease;
    let sequence = 0;

    const renew = async () => {
      const renewal = await this.deps.store.extendLease(lease, this.config.leaseMs);
      if (!renewal) {
        abort('lease_lost');
        return;
      }
      lease = renewal.lease;
      if (renewal.cancelRequested) abort('cancelled');
    };

    const timeoutMs = isTaskType(envelope.type)
      ? TASK_TYPES[envelope.type].executionTimeoutMs
      : this.config.defaultExecutionTimeoutMs ?? 60_000;
    const timeoutTimer = setTimeout(() => abort('timeout'), timeoutMs);
    const renewTimer = setInterval(() => {
      renew().catch((err: unknown) => {
        this.deps.logger.warn({ err, task_id: envelope.task_id }, 'lease renewal failed');
      });
    }, Math.max(10, Math.floor(this.config.leaseMs / 3)));

    const context: HandlerContext = {
      signal: controller.signal,
      heartbeat: renew,
      reportProgress: async (progress, statusMessage) => {
        this.publish({
          kind: 'progress',
          task_id: envelope.task_id,
          tenant_id: envelope.tenant_id,
          status: 'processing',
          progress: Math.min(Math.max(progress, 0), 1),
          status_message: statusMessage,
        });
      },
      streamChunk: async (chunk, isFinal = false) => {
        this.publish({
          kind: 'stream',
          task_id: envelope.task_id,
          tenant_id: envelope.tenant_id,
          chunk,
          sequence_number: sequence++,
          is_final: isFinal,
        });
      },
    };

    this.deps.logger.info(log, 'task started');
    const started = this.now();

    try {
      const result = await runWithContext(contextOf(envelope), () =>
        raceAbort(handler(envelope, context), controller.signal),
      );
      clearTimeout(timeoutTimer);
      clearInterval(renewTimer);
      if (controller.signal.aborted) {
        await this.settleAborted(abortCauseOf(controller.signal), lease, envelope);
        return;
      }
      const record = await this.deps.store.ack(lease, { status: 'completed', result: result ?? null });
      if (!record) {
        this.stats.leaseLost++;
        this.deps.logger.warn({ task_id: envelope.task_id }, 'lease lost before ack, result discarded');
        return;
      }
      this.stats.processed++;
      this.deps.logger.info({ task_id: envelope.task_id, duration_ms: this.now() - started }, 'task completed');
      this.publishCompletion(record);
    } catch (error) {
      clearTimeout(timeoutTimer);
      clearInterval(renewTimer);
      if (controller.signal.aborted) {
        await this.settleAborted(abortCauseOf(controller.signal), lease, envelope);
        return;
      }
      await this.settleFailed(error, lease, envelope);
    } finally {
      this.running.delete(envelope.task_id);
      this.stats.running--;
    }
  }

  private async settleFailed(error: unknown, lease: Lease, envelope: TaskEnvelope): Promise<void> {
    const taskError = toTaskError(error);
    if (!(error instanceof AppError)) {
      this.deps.logger.error({ err: error, task_id: envelope.task_id }, 'handler threw an untagged error');
    }

    if (classifyError(error) === 'transient') {
      const retryAt = this.now() + this.deps.retryPolicy.delayFor(envelope.attempt_count);
      const nacked = await this.deps.store.nack(lease, taskError, { retryAt });
      if (!nacked) return;
      if (nacked.outcome === 'requeued') {
        this.stats.retried++;
        this.deps.logger.warn(
          { task_id: envelope.task_id, attempt: envelope.attempt_count, code: taskError.error_code, retry_at: retryAt },
          'task failed, requeued',
        );
        return;
      }
      this.countTerminal(nacked.record);
      this.deps.logger.error({ task_id: envelope.task_id, code: nacked.record.error?.error_code }, 'task failed permanently');
      this.publishCompletion(nacked.record);
      return;
    }

    const record = await this.deps.store.ack(lease, { status: 'failed', error: taskError });
    if (!record) return;
    this.stats.failed++;
    this.deps.logger.error({ task_id: envelope.task_id, code: taskError.error_code }, 'task failed');
    this.publishCompletion(record);
  }

  private async settleAborted(cause: AbortCause, lease: Lease, envelope: TaskEnvelope): Promise<void> {
    switch (cause) {
      case 'cancelled': {
        const record = await this.deps.store.ack(lease, { status: 'cancelled' });
        if (!record) return;
        this.stats.cancelled++;
        this.deps.logger.info({ task_id: envelope.task_id }, 'task cancelled');
        this.publishCompletion(record);
        return;
      }
      case 'timeout': {
        const record = await this.deps.store.ack(lease, { status: 'failed', error: timeoutError() });
        if (!record) return;
        this.stats.failed++;
        this.deps.logger.warn({ task_id: envelope.task_id }, 'task timed out');
        this.publishCompletion(record);
        return;
      }
      case 'lease_lost':
        this.stats.leaseLost++;
        this.deps.logger.warn({ task_id: envelope.task_id }, 'lease lost, abandoning task');
        return;
      case 'shutdown':
        await this.deps.store.release(lease);
        this.deps.logger.info({ task_id: envelope.task_id }, 'task released on shutdown');
        return;
    }
  }

  private countTerminal(record: TaskRecord): void {
    if (record.envelope.status === 'cancelled') this.stats.cancelled++;
    else this.stats.failed++;
  }

  private publishCompletion(record: TaskRecord): void {
    const event = completionEvent(record);
    if (event) this.publish(event);
  }

  /** Fire-and-forget: a failed publish is logged and never undoes the task. */
  private publish(event: TaskEvent): void {
    const pending = this.deps.publisher.publish(event).catch((err: unknown) => {
      this.deps.logger.warn({ err, task_id: event.task_id, kind: event.kind }, 'notification publish failed');
    });
    this.pendingPublishes.add(pending);
    void pending.finally(() => this.pendingPublishes.delete(pending));
  }
}
