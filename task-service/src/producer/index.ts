import { randomUUID } from 'node:crypto';
import { AppError, TransientInfraError, ValidationError } from '../../../src/errors.js';
import { msg } from '../../../src/lib/error-messages.js';
import type { BaseLogger } from '../../../src/logger.js';
import { taskSubmitted } from '../../../src/metrics.js';
import type { TaskStore } from '../repositories/base.js';
import { TASK_TYPES, decodePayload, requireTaskType, type ServiceName, type TaskType } from '../schemas/task.js';
import type { EnqueueResult, TaskEnvelope, TaskMetadata } from '../types/task.js';

export interface SubmitRequest {
  type: string;
  tenantId: string;
  payload: unknown;
  metadata?: TaskMetadata;
  priority?: number;
  idempotencyKey?: string;
  maxAttempts?: number;
}

export interface SubmitResult {
  taskId: string;
  duplicate: boolean;
  type: TaskType;
  service: ServiceName;
}

export interface ProducerOptions {
  /** How long a finished task keeps its idempotency key bound. */
  retentionMs: number;
  defaultMaxAttempts?: number;
  now?: () => number;
  newId?: () => string;
}

/**
 * Validates and enqueues; never waits for a consumer. A store failure is
 * surfaced as a retryable error so the caller can resubmit.
 */
export class TaskProducer {
  private readonly now: () => number;
  private readonly newId: () => string;

  constructor(
    private readonly store: TaskStore,
    private readonly logger: BaseLogger,
    private readonly options: ProducerOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.newId = options.newId ?? randomUUID;
  }

  async submit(request: SubmitRequest): Promise<SubmitResult> {
    const tenantId = request.tenantId.trim();
    if (!tenantId) throw new ValidationError(msg('TENANT_REQUIRED'), { code: 'TENANT_REQUIRED' });

    const type = requireTaskType(request.type);
    const payload = decodePayload(type, request.payload);
    const priority = request.priority ?? 5;
    if (!Number.isInteger(priority) || priority < 0 || priority > 9) {
      throw new ValidationError('priority must be an integer between 0 and 9');
    }

    const definition = TASK_TYPES[type];
    const envelope: TaskEnvelope = {
      task_id: this.newId(),
      tenant_id: tenantId,
      type,
      status: 'pending',
      priority,
      created_at: new Date(this.now()).toISOString(),
      started_at: null,
      completed_at: null,
      metadata: request.metadata ?? {},
      payload,
      idempotency_key: request.idempotencyKey ?? null,
      attempt_count: 0,
    };

    let result: EnqueueResult;
    try {
      result = await this.store.enqueue(envelope, {
        service: definition.service,
        maxAttempts: request.maxAttempts ?? this.options.defaultMaxAttempts,
        maxLifetimeMs: definition.maxLifetimeMs,
        idempotencyTtlMs: definition.maxLifetimeMs + this.options.retentionMs,
      });
    } catch (error) {
      if (error instanceof AppError && !error.retryable) throw error;
      this.logger.error({ err: error, tenant_id: tenantId, type }, 'enqueue failed');
      throw new TransientInfraError(msg('QUEUE_UNAVAILABLE'), { code: 'QUEUE_UNAVAILABLE', cause: error });
    }

    taskSubmitted(!result.created);
    this.logger.info(
      { task_id: result.taskId, tenant_id: tenantId, type, priority, duplicate: !result.created },
      result.created ? 'task submitted' : 'duplicate submission resolved',
    );
    return { taskId: result.taskId, duplicate: !result.created, type, service: definition.service };
  }

  /**
   * Resubmits a dead-lettered task as a new task linked to the old one. The
   * entry leaves the dead-letter queue only after the new task is queued;
   * concurrent requeues of one entry resolve to the same new task.
   */
  async requeueDeadLetter(tenantId: string, taskId: string): Promise<SubmitResult | null> {
    if (!(await this.store.inDeadLetter(tenantId, taskId))) return null;
    const record = await this.store.peekStatus(tenantId, taskId);
    if (!record) return null;

    const { envelope } = record;
    const result = await this.submit({
      type: envelope.type,
      tenantId,
      payload: envelope.payload,
      metadata: { ...envelope.metadata, requeued_from: envelope.task_id },
      priority: envelope.priority,
      idempotencyKey: `requeue:${envelope.task_id}`,
      maxAttempts: record.maxAttempts,
    });
    await this.store.takeDeadLetter(tenantId, taskId);
    return result;
  }
}
