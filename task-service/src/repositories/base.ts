import type {
  CancelResult,
  DequeueOptions,
  EnqueueOptions,
  EnqueueResult,
  Lease,
  LeaseRenewal,
  LeaseSweep,
  LeasedTask,
  NackOptions,
  NackResult,
  QueueStats,
  TaskEnvelope,
  TaskError,
  TaskOutcome,
  TaskRecord,
} from '../types/task.js';

export const DEFAULT_MAX_ATTEMPTS = 3;

/** How long an idempotency key stays bound when the caller gives no TTL. */
export const DEFAULT_IDEMPOTENCY_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * Tenant-partitioned priority queue with result slots. Lease-holding calls
 * (extendLease, ack, nack, release) answer null when the lease is stale.
 */
export interface TaskStore {
  enqueue(envelope: TaskEnvelope, options: EnqueueOptions): Promise<EnqueueResult>;
  dequeue(service: string, options: DequeueOptions): Promise<LeasedTask | null>;
  extendLease(lease: Lease, leaseMs: number): Promise<LeaseRenewal | null>;
  ack(lease: Lease, outcome: TaskOutcome): Promise<TaskRecord | null>;
  nack(lease: Lease, error: TaskError, options: NackOptions): Promise<NackResult | null>;
  /** Hands a task back without counting the attempt (worker shutdown). */
  release(lease: Lease): Promise<boolean>;

  peekStatus(tenantId: string, taskId: string): Promise<TaskRecord | null>;
  getOwner(taskId: string): Promise<string | null>;
  cancel(tenantId: string, taskId: string): Promise<CancelResult>;

  requeueExpiredLeases(now?: number): Promise<LeaseSweep>;
  failExpired(now?: number): Promise<TaskRecord[]>;
  prune(olderThan: number): Promise<number>;

  listDeadLetter(tenantId: string, limit: number): Promise<TaskRecord[]>;
  inDeadLetter(tenantId: string, taskId: string): Promise<boolean>;
  /** Removes a dead-lettered record so it can be submitted again. */
  takeDeadLetter(tenantId: string, taskId: string): Promise<TaskRecord | null>;

  getStats(): Promise<QueueStats>;
}
