import type { ErrorType } from '../../../src/errors.js';

export type TaskStatus = 'pending' | 'processing' | 'completed' | 'failed' | 'cancelled';
export type TerminalStatus = Extract<TaskStatus, 'completed' | 'failed' | 'cancelled'>;

export const TERMINAL_STATUSES: readonly TerminalStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminal(status: TaskStatus): status is TerminalStatus {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}

/**
 * Carried opaquely; the queue layer never reads it. Conventional keys:
 * source, correlation_id, agent_id, session_id, conversation_id,
 * collection_id, requeued_from.
 */
export type TaskMetadata = Record<string, unknown>;

/** Wire format shared by queue storage and notifications. */
export interface TaskEnvelope<TType extends string = string, TPayload = unknown> {
  task_id: string;
  tenant_id: string;
  type: TType;
  status: TaskStatus;
  priority: number;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  metadata: TaskMetadata;
  payload: TPayload;
  idempotency_key: string | null;
  attempt_count: number;
}

export interface TaskError {
  error_code: string;
  error_message: string;
  retryable: boolean;
  type?: ErrorType;
  /** Last underlying failure when retries ran out. */
  cause?: { error_code: string; error_message: string };
}

/** Queue entry: envelope plus lease and outcome, owned by the store. */
export interface TaskRecord {
  envelope: TaskEnvelope;
  service: string;
  maxAttempts: number;
  /** Earliest time (ms) the entry may be dequeued again. */
  runAt: number;
  leaseToken: string | null;
  leaseExpiresAt: number | null;
  cancelRequested: boolean;
  /** Time (ms) after which a non-terminal task is swept to failed. */
  deadlineAt: number | null;
  result: unknown;
  error: TaskError | null;
  updatedAt: number;
}

export interface Lease {
  taskId: string;
  tenantId: string;
  token: string;
  expiresAt: number;
}

export interface LeasedTask {
  envelope: TaskEnvelope;
  lease: Lease;
  maxAttempts: number;
}

export type TaskOutcome =
  | { status: 'completed'; result: unknown }
  | { status: 'failed'; error: TaskError }
  | { status: 'cancelled'; error?: TaskError };

export interface EnqueueOptions {
  service: string;
  maxAttempts?: number;
  maxLifetimeMs?: number;
  /** Upper bound for how long an idempotency key stays bound. */
  idempotencyTtlMs?: number;
}

export interface EnqueueResult {
  taskId: string;
  created: boolean;
}

export interface DequeueOptions {
  tenantId?: string;
  leaseMs: number;
}

export interface NackOptions {
  retryAt: number;
}

export type NackResult =
  | { outcome: 'requeued'; record: TaskRecord }
  | { outcome: 'terminal'; record: TaskRecord };

export interface LeaseRenewal {
  lease: Lease;
  cancelRequested: boolean;
}

export interface LeaseSweep {
  requeued: number;
  /** Records that became terminal during the sweep. */
  terminal: TaskRecord[];
}

export type CancelResult =
  | { outcome: 'cancelled'; record: TaskRecord }
  | { outcome: 'cancel_requested'; record: TaskRecord }
  | { outcome: 'already_terminal'; record: TaskRecord }
  | { outcome: 'not_found' };

export interface QueueStats {
  pending: number;
  processing: number;
  completed: number;
  failed: number;
  cancelled: number;
  deadLetter: number;
  byService: Record<string, { pending: number; processing: number }>;
}

/** What `peek_status` exposes to polling and reconnecting clients. */
export interface TaskStatusView {
  task_id: string;
  tenant_id: string;
  type: string;
  status: TaskStatus;
  priority: number;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  attempt_count: number;
  metadata: TaskMetadata;
  result: unknown;
  error: TaskError | null;
}

export function toStatusView(record: TaskRecord): TaskStatusView {
  const e = record.envelope;
  return {
    task_id: e.task_id,
    tenant_id: e.tenant_id,
    type: e.type,
    status: e.status,
    priority: e.priority,
    created_at: e.created_at,
    started_at: e.started_at,
    completed_at: e.completed_at,
    attempt_count: e.attempt_count,
    metadata: e.metadata,
    result: record.result ?? null,
    error: record.error,
  };
}
