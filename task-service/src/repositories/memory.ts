import { ulid } from 'ulid';
import { ValidationError } from '../../../src/errors.js';
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
import { isTerminal } from '../types/task.js';
import { DEFAULT_IDEMPOTENCY_TTL_MS, type TaskStore } from './base.js';
import {
  applyNack,
  applyOutcome,
  assertEnqueueable,
  completedAtMs,
  expireLease,
  holdsLease,
  isDeadLetter,
  isPastDeadline,
  leaseOf,
  leaseRecord,
  newRecord,
  timeoutError,
} from './records.js';

interface Entry {
  record: TaskRecord;
  seq: number;
}

interface IdempotencyBinding {
  taskId: string;
  expiresAt: number;
}

function copy(record: TaskRecord): TaskRecord {
  return structuredClone(record);
}

/**
 * Process-local store for development and tests. Every operation completes
 * synchronously inside one call, so check-then-insert is atomic here.
 */
export class InMemoryTaskStore implements TaskStore {
  private entries = new Map<string, Entry>();
  private idempotency = new Map<string, IdempotencyBinding>();
  private deadLetter = new Map<string, string[]>();
  private seq = 0;

  constructor(private readonly now: () => number = Date.now) {}

  private idemKey(tenantId: string, key: string): string {
    return `${tenantId}\u0000${key}`;
  }

  async enqueue(envelope: TaskEnvelope, options: EnqueueOptions): Promise<EnqueueResult> {
    assertEnqueueable(envelope);
    if (this.entries.has(envelope.task_id)) {
      throw new ValidationError(`task_id ${envelope.task_id} already exists`);
    }

    if (envelope.idempotency_key) {
      const key = this.idemKey(envelope.tenant_id, envelope.idempotency_key);
      const existing = this.idempotency.get(key);
      if (existing && existing.expiresAt > this.now() && this.entries.has(existing.taskId)) {
        return { taskId: existing.taskId, created: false };
      }
      const ttlMs = options.idempotencyTtlMs ?? DEFAULT_IDEMPOTENCY_TTL_MS;
      this.idempotency.set(key, { taskId: envelope.task_id, expiresAt: this.now() + ttlMs });
    }

    this.entries.set(envelope.task_id, {
      record: newRecord(envelope, options, this.now()),
      seq: this.seq++,
    });
    return { taskId: envelope.task_id, created: true };
  }

  async dequeue(service: string, options: DequeueOptions): Promise<LeasedTask | null> {
    const now = this.now();
    const candidates = Array.from(this.entries.values()).filter(({ record }) =>
      record.service === service &&
      record.envelope.status === 'pending' &&
      record.runAt <= now &&
      (options.tenantId === undefined || record.envelope.tenant_id === options.tenantId)
    );
    if (candidates.length === 0) return null;

    // Head of each tenant queue: priority desc, created_at asc, insertion order
    const heads = new Map<string, Entry>();
    for (const entry of candidates) {
      const tenant = entry.record.envelope.tenant_id;
      const head = heads.get(tenant);
      if (!head || compareEntries(entry, head) < 0) heads.set(tenant, entry);
    }

    // Across tenants the oldest head goes first
    let selected: Entry | null = null;
    for (const head of heads.values()) {
      if (!selected || compareAge(head, selected) < 0) selected = head;
    }
    if (!selected) return null;

    const leased = leaseRecord(selected.record, ulid(), options.leaseMs, now);
    selected.record = leased;
    const lease = leaseOf(leased);
    if (!lease) return null;
    return { envelope: copy(leased).envelope, lease, maxAttempts: leased.maxAttempts };
  }

  async extendLease(lease: Lease, leaseMs: number): Promise<LeaseRenewal | null> {
    const entry = this.entries.get(lease.taskId);
    if (!entry || !holdsLease(entry.record, lease)) return null;
    const expiresAt = this.now() + leaseMs;
    entry.record = { ...entry.record, leaseExpiresAt: expiresAt, updatedAt: this.now() };
    return { lease: { ...lease, expiresAt }, cancelRequested: entry.record.cancelRequested };
  }

  async ack(lease: Lease, outcome: TaskOutcome): Promise<TaskRecord | null> {
    const entry = this.entries.get(lease.taskId);
    if (!entry || !holdsLease(entry.record, lease)) return null;
    entry.record = applyOutcome(entry.record, outcome, this.now());
    return copy(entry.record);
  }

  async nack(lease: Lease, error: TaskError, options: NackOptions): Promise<NackResult | null> {
    const entry = this.entries.get(lease.taskId);
    if (!entry || !holdsLease(entry.record, lease)) return null;
    const next = applyNack(entry.record, error, options.retryAt, this.now());
    entry.record = next.record;
    if (isDeadLetter(next.record)) this.pushDeadLetter(next.record);
    return { ...next, record: copy(next.record) };
  }

  async release(lease: Lease): Promise<boolean> {
    const entry = this.entries.get(lease.taskId);
    if (!entry || !holdsLease(entry.record, lease)) return false;
    const { record } = entry;
    entry.record = {
      ...record,
      envelope: {
        ...record.envelope,
        status: 'pending',
        started_at: null,
        attempt_count: Math.max(0, record.envelope.attempt_count - 1),
      },
      runAt: this.now(),
      leaseToken: null,
      leaseExpiresAt: null,
      updatedAt: this.now(),
    };
    return true;
  }

  async peekStatus(tenantId: string, taskId: string): Promise<TaskRecord | null> {
    const entry = this.entries.get(taskId);
    if (!entry || entry.record.envelope.tenant_id !== tenantId) return null;
    return copy(entry.record);
  }

  async getOwner(taskId: string): Promise<string | null> {
    return this.entries.get(taskId)?.record.envelope.tenant_id ?? null;
  }

  async cancel(tenantId: string, taskId: string): Promise<CancelResult> {
    const entry = this.entries.get(taskId);
    if (!entry || entry.record.envelope.tenant_id !== tenantId) return { outcome: 'not_found' };

    const { status } = entry.record.envelope;
    if (isTerminal(status)) return { outcome: 'already_terminal', record: copy(entry.record) };

    if (status === 'pending') {
      entry.record = applyOutcome(entry.record, { status: 'cancelled' }, this.now());
      return { outcome: 'cancelled', record: copy(entry.record) };
    }

    entry.record = { ...entry.record, cancelRequested: true, updatedAt: this.now() };
    return { outcome: 'cancel_requested', record: copy(entry.record) };
  }

  async requeueExpiredLeases(now = this.now()): Promise<LeaseSweep> {
    const sweep: LeaseSweep = { requeued: 0, terminal: [] };
    for (const entry of this.entries.values()) {
      const { record } = entry;
      if (record.envelope.status !== 'processing' || record.leaseExpiresAt === null || record.leaseExpiresAt > now) {
        continue;
      }
      entry.record = expireLease(record, now);
      if (isTerminal(entry.record.envelope.status)) {
        if (isDeadLetter(entry.record)) this.pushDeadLetter(entry.record);
        sweep.terminal.push(copy(entry.record));
      } else {
        sweep.requeued++;
      }
    }
    return sweep;
  }

  async failExpired(now = this.now()): Promise<TaskRecord[]> {
    const failed: TaskRecord[] = [];
    for (const entry of this.entries.values()) {
      if (!isPastDeadline(entry.record, now)) continue;
      entry.record = applyOutcome(entry.record, { status: 'failed', error: timeoutError() }, now);
      failed.push(copy(entry.record));
    }
    return failed;
  }

  async prune(olderThan: number): Promise<number> {
    let removed = 0;
    for (const [id, entry] of this.entries) {
      const completedAt = completedAtMs(entry.record);
      if (completedAt === null || completedAt >= olderThan) continue;

      this.entries.delete(id);
      const { tenant_id, idempotency_key } = entry.record.envelope;
      if (idempotency_key) {
        const key = this.idemKey(tenant_id, idempotency_key);
        if (this.idempotency.get(key)?.taskId === id) this.idempotency.delete(key);
      }
      const dlq = this.deadLetter.get(tenant_id);
      if (dlq) this.deadLetter.set(tenant_id, dlq.filter((d) => d !== id));
      removed++;
    }
    return removed;
  }

  async listDeadLetter(tenantId: string, limit: number): Promise<TaskRecord[]> {
    const ids = this.deadLetter.get(tenantId) ?? [];
    const out: TaskRecord[] = [];
    for (const id of [...ids].reverse()) {
      const entry = this.entries.get(id);
      if (entry) out.push(copy(entry.record));
      if (out.length >= limit) break;
    }
    return out;
  }

  async inDeadLetter(tenantId: string, taskId: string): Promise<boolean> {
    return (this.deadLetter.get(tenantId) ?? []).includes(taskId);
  }

  async takeDeadLetter(tenantId: string, taskId: string): Promise<TaskRecord | null> {
    const ids = this.deadLetter.get(tenantId) ?? [];
    if (!ids.includes(taskId)) return null;
    this.deadLetter.set(tenantId, ids.filter((id) => id !== taskId));
    const entry = this.entries.get(taskId);
    return entry ? copy(entry.record) : null;
  }

  async getStats(): Promise<QueueStats> {
    const stats: QueueStats = {
      pending: 0,
      processing: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
      deadLetter: 0,
      byService: {},
    };
    for (const { record } of this.entries.values()) {
      const status = record.envelope.status;
      stats[status]++;
      if (status === 'pending' || status === 'processing') {
        const svc = stats.byService[record.service] ?? { pending: 0, processing: 0 };
        svc[status]++;
        stats.byService[record.service] = svc;
      }
    }
    for (const ids of this.deadLetter.values()) stats.deadLetter += ids.length;
    return stats;
  }

  private pushDeadLetter(record: TaskRecord): void {
    const tenant = record.envelope.tenant_id;
    const ids = this.deadLetter.get(tenant) ?? [];
    if (!ids.includes(record.envelope.task_id)) ids.push(record.envelope.task_id);
    this.deadLetter.set(tenant, ids);
  }
}

function compareEntries(a: Entry, b: Entry): number {
  const pa = a.record.envelope.priority;
  const pb = b.record.envelope.priority;
  if (pa !== pb) return pb - pa;
  return compareAge(a, b);
}

function compareAge(a: Entry, b: Entry): number {
  const ca = Date.parse(a.record.envelope.created_at);
  const cb = Date.parse(b.record.envelope.created_at);
  if (ca !== cb) return ca - cb;
  return a.seq - b.seq;
}
