import { ValidationError } from '../../../src/errors.js';
import { fmt, msg } from '../../../src/lib/error-messages.js';
import type {
  EnqueueOptions,
  Lease,
  NackResult,
  TaskEnvelope,
  TaskError,
  TaskOutcome,
  TaskRecord,
} from '../types/task.js';
import { isTerminal } from '../types/task.js';
import { DEFAULT_MAX_ATTEMPTS } from './base.js';

// Record transitions shared by every store implementation. All of them return
// new objects; callers decide how to persist.

const PRIORITY_WEIGHT = 1e13;

/** Lower score drains first: priority desc, then created_at asc. */
export function priorityScore(envelope: TaskEnvelope): number {
  return (9 - envelope.priority) * PRIORITY_WEIGHT + Date.parse(envelope.created_at);
}

export function createdAtOfScore(score: number): number {
  return score % PRIORITY_WEIGHT;
}

export function assertEnqueueable(envelope: TaskEnvelope): void {
  if (!envelope.tenant_id || !envelope.tenant_id.trim()) {
    throw new ValidationError(msg('TENANT_REQUIRED'), { code: 'TENANT_REQUIRED' });
  }
  if (!envelope.task_id) {
    throw new ValidationError('task_id is required');
  }
  if (!Number.isInteger(envelope.priority) || envelope.priority < 0 || envelope.priority > 9) {
    throw new ValidationError('priority must be an integer between 0 and 9');
  }
  if (envelope.status !== 'pending') {
    throw new ValidationError('Only pending envelopes can be enqueued');
  }
}

export function newRecord(envelope: TaskEnvelope, options: EnqueueOptions, now: number): TaskRecord {
  const createdAt = Date.parse(envelope.created_at);
  return {
    envelope: { ...envelope, attempt_count: 0, started_at: null, completed_at: null },
    service: options.service,
    maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    runAt: now,
    leaseToken: null,
    leaseExpiresAt: null,
    cancelRequested: false,
    deadlineAt: options.maxLifetimeMs ? (Number.isNaN(createdAt) ? now : createdAt) + options.maxLifetimeMs : null,
    result: null,
    error: null,
    updatedAt: now,
  };
}

export function leaseRecord(record: TaskRecord, token: string, leaseMs: number, now: number): TaskRecord {
  const nowIso = new Date(now).toISOString();
  return {
    ...record,
    envelope: {
      ...record.envelope,
      status: 'processing',
      started_at: nowIso,
      attempt_count: record.envelope.attempt_count + 1,
    },
    leaseToken: token,
    leaseExpiresAt: now + leaseMs,
    updatedAt: now,
  };
}

export function leaseOf(record: TaskRecord): Lease | null {
  if (!record.leaseToken || record.leaseExpiresAt === null) return null;
  return {
    taskId: record.envelope.task_id,
    tenantId: record.envelope.tenant_id,
    token: record.leaseToken,
    expiresAt: record.leaseExpiresAt,
  };
}

/** The single-writer rule: only the current, processing lease holder may write. */
export function holdsLease(record: TaskRecord, lease: Lease): boolean {
  return (
    record.envelope.status === 'processing' &&
    record.envelope.tenant_id === lease.tenantId &&
    record.leaseToken === lease.token
  );
}

function terminal(record: TaskRecord, patch: Partial<TaskRecord>, status: TaskRecord['envelope']['status'], now: number): TaskRecord {
  return {
    ...record,
    ...patch,
    envelope: { ...record.envelope, status, completed_at: new Date(now).toISOString() },
    leaseToken: null,
    leaseExpiresAt: null,
    updatedAt: now,
  };
}

export function cancelledError(): TaskError {
  return { error_code: 'TASK_CANCELLED', error_message: msg('TASK_CANCELLED'), retryable: false };
}

export function timeoutError(): TaskError {
  return { type: 'TIMEOUT', error_code: 'TASK_TIMEOUT', error_message: msg('TASK_TIMEOUT'), retryable: false };
}

export function retriesExhaustedError(attempts: number, last: TaskError): TaskError {
  return {
    error_code: 'RETRIES_EXHAUSTED',
    error_message: fmt('RETRIES_EXHAUSTED', { attempts }),
    retryable: false,
    cause: { error_code: last.error_code, error_message: last.error_message },
  };
}

export function applyOutcome(record: TaskRecord, outcome: TaskOutcome, now: number): TaskRecord {
  switch (outcome.status) {
    case 'completed':
      return terminal(record, { result: outcome.result ?? null, error: null }, 'completed', now);
    case 'failed':
      return terminal(record, { error: outcome.error }, 'failed', now);
    case 'cancelled':
      return terminal(record, { error: outcome.error ?? cancelledError() }, 'cancelled', now);
  }
}

export function retriesExhausted(record: TaskRecord): boolean {
  return record.envelope.attempt_count >= record.maxAttempts;
}

export function applyNack(
  record: TaskRecord,
  error: TaskError,
  retryAt: number,
  now: number,
): NackResult {
  if (record.cancelRequested) {
    return { outcome: 'terminal', record: applyOutcome(record, { status: 'cancelled' }, now) };
  }
  if (retriesExhausted(record)) {
    const failed = applyOutcome(record, {
      status: 'failed',
      error: retriesExhaustedError(record.envelope.attempt_count, error),
    }, now);
    return { outcome: 'terminal', record: failed };
  }
  return { outcome: 'requeued', record: requeued(record, retryAt, error, now) };
}

export function requeued(record: TaskRecord, runAt: number, lastError: TaskError | null, now: number): TaskRecord {
  return {
    ...record,
    envelope: { ...record.envelope, status: 'pending', started_at: null },
    runAt,
    leaseToken: null,
    leaseExpiresAt: null,
    error: lastError,
    updatedAt: now,
  };
}

/** A lease that ran out: redeliver, or fail once the attempt budget is spent. */
export function expireLease(record: TaskRecord, now: number): TaskRecord {
  if (record.cancelRequested) return applyOutcome(record, { status: 'cancelled' }, now);
  if (retriesExhausted(record)) {
    return applyOutcome(record, {
      status: 'failed',
      error: retriesExhaustedError(record.envelope.attempt_count, {
        error_code: 'LEASE_EXPIRED',
        error_message: 'Worker lost the task lease before finishing',
        retryable: true,
      }),
    }, now);
  }
  return requeued(record, now, record.error, now);
}

export function isDeadLetter(record: TaskRecord): boolean {
  return record.envelope.status === 'failed' && record.error?.error_code === 'RETRIES_EXHAUSTED';
}

export function isPastDeadline(record: TaskRecord, now: number): boolean {
  return !isTerminal(record.envelope.status) && record.deadlineAt !== null && record.deadlineAt <= now;
}

export function completedAtMs(record: TaskRecord): number | null {
  return record.envelope.completed_at ? Date.parse(record.envelope.completed_at) : null;
}
