import { AuthorizationError, NotFoundError } from '../../src/errors.js';
import type { BaseLogger } from '../../src/logger.js';
import { recordDelivery, type DeliveryOutcome } from '../../src/metrics.js';
import { completionEvent } from '../../task-service/src/notifier/index.js';
import { TASK_TYPES, isTaskType } from '../../task-service/src/schemas/task.js';
import type { TaskRecord, TaskStatus } from '../../task-service/src/types/task.js';
import {
  createMessage,
  type CompletionEvent,
  type ProgressEvent,
  type StreamEvent,
  type WsMessage,
} from './messages.js';
import type { RegistryEntry, RegistryStore } from './registry-store.js';

/** Read access to the queue store; `TaskStore` satisfies it. */
export interface TaskLookup {
  getOwner(taskId: string): Promise<string | null>;
  peekStatus(tenantId: string, taskId: string): Promise<TaskRecord | null>;
}

/** A live client connection held by this gateway instance. */
export interface DeliveryTarget {
  readonly id: string;
  readonly tenantId: string;
  isOpen(): boolean;
  /** False when the message could not be queued. */
  send(message: WsMessage): boolean;
}

export interface SubscribeResult {
  status: TaskStatus;
  /** A terminal result was delivered during the subscribe. */
  replayed: boolean;
}

export type SyncStatus = TaskStatus | 'not_found' | 'forbidden';

export interface SyncReport {
  tasks: Array<{ task_id: string; status: SyncStatus; replayed: boolean }>;
}

export interface TaskRegistryOptions {
  instanceId: string;
  /** How long delivered-markers are kept. */
  deliveredTtlMs: number;
  logger: BaseLogger;
  now?: () => number;
}

// --- Rendering of task events into client messages ---

export function renderCompletion(event: CompletionEvent): WsMessage {
  const options = { tenantId: event.tenant_id, correlationId: event.correlation_id };
  if (event.status === 'failed') {
    return createMessage('system', 'error', {
      task_id: event.task_id,
      status: event.status,
      error_code: event.error?.error_code ?? 'TASK_FAILED',
      error_message: event.error?.error_message ?? 'Task failed',
      severity: 'error',
      is_recoverable: event.error?.retryable ?? false,
    }, options);
  }
  if (event.status === 'cancelled') {
    return createMessage('workflow', 'status_update', {
      task_id: event.task_id,
      type: event.type,
      status: event.status,
      completed_at: event.completed_at,
    }, options);
  }
  const frame = isTaskType(event.type) ? TASK_TYPES[event.type].notify : { domain: 'workflow' as const, action: 'status_update' as const };
  return createMessage(frame.domain, frame.action, {
    task_id: event.task_id,
    type: event.type,
    status: event.status,
    result: event.result,
    completed_at: event.completed_at,
  }, options);
}

export function renderProgress(event: ProgressEvent): WsMessage {
  return createMessage('chat', 'status_update', {
    task_id: event.task_id,
    status: event.status,
    progress: event.progress,
    ...(event.status_message !== undefined ? { status_message: event.status_message } : {}),
  }, { tenantId: event.tenant_id });
}

export function renderStream(event: StreamEvent): WsMessage {
  return createMessage('chat', 'stream', {
    task_id: event.task_id,
    chunk: event.chunk,
    sequence_number: event.sequence_number,
    is_final: event.is_final,
  }, { tenantId: event.tenant_id });
}

/**
 * Correlates task ids with waiting connections. Entries live in the
 * RegistryStore; connections are local to this instance.
 */
export class TaskRegistry {
  private connections = new Map<string, DeliveryTarget>();
  private readonly now: () => number;

  constructor(
    private readonly store: RegistryStore,
    private readonly tasks: TaskLookup,
    private readonly options: TaskRegistryOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  attach(connection: DeliveryTarget): void {
    this.connections.set(connection.id, connection);
  }

  /** Forgets a closed connection and drops its subscriptions. */
  async detach(connectionId: string): Promise<number> {
    this.connections.delete(connectionId);
    return this.unsubscribeConnection(connectionId);
  }

  connection(connectionId: string): DeliveryTarget | undefined {
    return this.connections.get(connectionId);
  }

  localConnections(): DeliveryTarget[] {
    return Array.from(this.connections.values());
  }

  async subscribe(taskId: string, tenantId: string, connection: DeliveryTarget): Promise<SubscribeResult> {
    if (connection.tenantId !== tenantId) throw new AuthorizationError();
    const owner = await this.tasks.getOwner(taskId);
    if (owner === null) throw new NotFoundError();
    if (owner !== tenantId) throw new AuthorizationError();

    const previous = await this.store.put({
      taskId,
      tenantId,
      connectionId: connection.id,
      instanceId: this.options.instanceId,
      subscribedAt: this.now(),
      lastSequence: -1,
    });
    if (previous && previous.connectionId !== connection.id) {
      this.options.logger.debug({ task_id: taskId, replaced: previous.connectionId }, 'subscription replaced');
    }

    const record = await this.tasks.peekStatus(tenantId, taskId);
    if (!record) throw new NotFoundError();

    const event = completionEvent(record);
    if (!event) return { status: record.envelope.status, replayed: false };
    const outcome = await this.onCompletion(event);
    return { status: record.envelope.status, replayed: outcome === 'delivered' };
  }

  /** Delivers a completion at most once per connection. */
  async onCompletion(event: CompletionEvent): Promise<DeliveryOutcome> {
    const outcome = await this.deliverCompletion(event);
    recordDelivery(outcome);
    this.options.logger.debug({ task_id: event.task_id, status: event.status, outcome }, 'completion routed');
    return outcome;
  }

  /** Relays progress and stream chunks; stale stream sequences are dropped. */
  async relay(event: ProgressEvent | StreamEvent): Promise<DeliveryOutcome> {
    const route = await this.route(event.task_id, event.tenant_id);
    if (route.outcome !== 'delivered') return route.outcome;

    if (event.kind === 'stream') {
      const fresh = await this.store.advanceSequence(event.task_id, event.sequence_number);
      if (!fresh) return 'duplicate';
      return route.target.send(renderStream(event)) ? 'delivered' : 'connection_gone';
    }
    return route.target.send(renderProgress(event)) ? 'delivered' : 'connection_gone';
  }

  /** Resolves a reconnecting client's tasks: replays terminal ones, resubscribes the rest. */
  async sync(connection: DeliveryTarget, taskIds: string[]): Promise<SyncReport> {
    const report: SyncReport = { tasks: [] };
    for (const taskId of new Set(taskIds)) {
      try {
        const result = await this.subscribe(taskId, connection.tenantId, connection);
        report.tasks.push({ task_id: taskId, status: result.status, replayed: result.replayed });
      } catch (error) {
        if (error instanceof NotFoundError) {
          report.tasks.push({ task_id: taskId, status: 'not_found', replayed: false });
        } else if (error instanceof AuthorizationError) {
          this.options.logger.warn({ task_id: taskId, connection_id: connection.id }, 'sync for foreign task rejected');
          report.tasks.push({ task_id: taskId, status: 'forbidden', replayed: false });
        } else {
          throw error;
        }
      }
    }
    return report;
  }

  async unsubscribeConnection(connectionId: string): Promise<number> {
    const entries = await this.store.listByConnection(connectionId);
    let removed = 0;
    for (const entry of entries) {
      if (await this.store.delete(entry.taskId, connectionId)) removed++;
    }
    return removed;
  }

  /** Drops entries that never saw a completion within `maxAgeMs`. */
  async expireUnclaimed(maxAgeMs: number, batchSize = 500): Promise<number> {
    const stale = await this.store.listOlderThan(this.now() - maxAgeMs, batchSize);
    let removed = 0;
    for (const entry of stale) {
      if (await this.store.delete(entry.taskId, entry.connectionId)) removed++;
    }
    if (removed > 0) this.options.logger.info({ count: removed }, 'expired unclaimed subscriptions');
    return removed;
  }

  size(): Promise<number> {
    return this.store.size();
  }

  private async deliverCompletion(event: CompletionEvent): Promise<DeliveryOutcome> {
    const route = await this.route(event.task_id, event.tenant_id);
    if (route.outcome !== 'delivered') return route.outcome;

    const { entry, target } = route;
    const claimed = await this.store.claimDelivery(event.task_id, target.id, this.options.deliveredTtlMs);
    if (!claimed) {
      await this.store.delete(event.task_id, entry.connectionId);
      return 'duplicate';
    }

    const sent = target.send(renderCompletion(event));
    await this.store.delete(event.task_id, entry.connectionId);
    return sent ? 'delivered' : 'connection_gone';
  }

  private async route(
    taskId: string,
    tenantId: string,
  ): Promise<{ outcome: 'delivered'; entry: RegistryEntry; target: DeliveryTarget } | { outcome: Exclude<DeliveryOutcome, 'delivered'> }> {
    const entry = await this.store.get(taskId);
    if (!entry) return { outcome: 'no_subscriber' };
    if (entry.tenantId !== tenantId) {
      this.options.logger.warn({ task_id: taskId }, 'event tenant does not match subscription');
      return { outcome: 'rejected' };
    }
    if (entry.instanceId !== this.options.instanceId) return { outcome: 'remote_subscriber' };

    const target = this.connections.get(entry.connectionId);
    if (!target || !target.isOpen()) {
      // Result stays readable through peek_status; the client resyncs
      await this.store.delete(taskId, entry.connectionId);
      return { outcome: 'connection_gone' };
    }
    return { outcome: 'delivered', entry, target };
  }
}
