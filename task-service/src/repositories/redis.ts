import { ulid } from 'ulid';
import { TransientInfraError, ValidationError } from '../../../src/errors.js';
import { type RedisClient, asHash, asNumber, asString, asStringArray, type RedisArg } from '../../../src/lib/upstash.js';
import { parseStoredRecord } from '../schemas/task.js';
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
  priorityScore,
  timeoutError,
} from './records.js';

// Claims an idempotency key and writes the task with its index entries in one
// step. A key bound to a task whose owner key is gone (pruned) is taken over.
// KEYS: owner, record, score hash, queue, service tenants, services, tenants, deadlines, idempotency
// ARGV: id, tenant, record json, score, deadline ('' for none), key ttl sec, service, keyed ('1'/'0')
const ENQUEUE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then return { 'exists' } end
if ARGV[8] == '1' then
  local bound = redis.call('GET', KEYS[9])
  if bound and redis.call('EXISTS', 'task:' .. bound) == 1 then return { 'duplicate', bound } end
  redis.call('SET', KEYS[9], ARGV[1], 'EX', ARGV[6])
end
redis.call('SET', KEYS[1], ARGV[2])
redis.call('SET', KEYS[2], ARGV[3])
redis.call('HSET', KEYS[3], ARGV[1], ARGV[4])
redis.call('ZADD', KEYS[4], ARGV[4], ARGV[1])
redis.call('SADD', KEYS[5], ARGV[2])
redis.call('SADD', KEYS[6], ARGV[7])
redis.call('SADD', KEYS[7], ARGV[2])
if ARGV[5] ~= '' then redis.call('ZADD', KEYS[8], ARGV[5], ARGV[1]) end
return { 'created', ARGV[1] }
`;

// Promotes due retries, then claims the oldest tenant head for one service
// and binds the lease token to it.
// ARGV: service, now, lease expiry, tenant filter ('' for any), lease token
const CLAIM_SCRIPT = `
local service = ARGV[1]
local now = tonumber(ARGV[2])
local filter = ARGV[4]
local tenants
if filter ~= '' then tenants = { filter } else tenants = redis.call('SMEMBERS', KEYS[1]) end
local bestId, bestTenant, bestCreated
for _, t in ipairs(tenants) do
  local dkey = 'delayed:' .. service .. ':' .. t
  local qkey = 'tasks:' .. service .. ':' .. t
  local due = redis.call('ZRANGEBYSCORE', dkey, '-inf', now)
  for _, id in ipairs(due) do
    redis.call('ZREM', dkey, id)
    local score = redis.call('HGET', 'qscore:' .. service, id)
    if score then redis.call('ZADD', qkey, score, id) end
  end
  local head = redis.call('ZRANGE', qkey, 0, 0, 'WITHSCORES')
  if head[1] then
    local created = tonumber(head[2]) % 1e13
    if not bestCreated or created < bestCreated then
      bestId = head[1]
      bestTenant = t
      bestCreated = created
    end
  end
end
if not bestId then return nil end
redis.call('ZREM', 'tasks:' .. service .. ':' .. bestTenant, bestId)
redis.call('ZADD', KEYS[2], ARGV[3], bestId)
redis.call('SET', 'lease:' .. bestId, ARGV[5])
return { bestId, bestTenant }
`;

// Writes the record only while the caller's lease token is current.
// KEYS: lease key, record key. ARGV: expected token, record json, next token ('' releases)
const LEASED_WRITE_SCRIPT = `
if redis.call('GET', KEYS[1]) ~= ARGV[1] then return 0 end
redis.call('SET', KEYS[2], ARGV[2])
if ARGV[3] == '' then redis.call('DEL', KEYS[1]) else redis.call('SET', KEYS[1], ARGV[3]) end
return 1
`;

// Flags a cancel only while a worker holds the lease; a terminal or
// requeued task has no lease key.
// KEYS: lease key, cancel flag key
const FLAG_CANCEL_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then return 0 end
redis.call('SET', KEYS[2], '1')
return 1
`;

export const STORE_SCRIPTS = {
  enqueue: ENQUEUE_SCRIPT,
  claim: CLAIM_SCRIPT,
  leasedWrite: LEASED_WRITE_SCRIPT,
  flagCancel: FLAG_CANCEL_SCRIPT,
} as const;

const CANCEL_ATTEMPTS = 3;

/**
 * Store over Upstash Redis REST. Queue membership and leases are claimed
 * atomically in scripts. Record writes after a claim go through the lease
 * token, and a cancel request lives in its own key so it never races a
 * record write.
 */
export class RedisTaskStore implements TaskStore {
  constructor(private readonly client: RedisClient, private readonly now: () => number = Date.now) {}

  private ownerKey(id: string): string {
    return `task:${id}`;
  }

  private recordKey(tenantId: string, id: string): string {
    return `results:${tenantId}:${id}`;
  }

  private queueKey(service: string, tenantId: string): string {
    return `tasks:${service}:${tenantId}`;
  }

  private delayedKey(service: string, tenantId: string): string {
    return `delayed:${service}:${tenantId}`;
  }

  private scoreKey(service: string): string {
    return `qscore:${service}`;
  }

  private leasesKey(service: string): string {
    return `leases:${service}`;
  }

  private leaseKey(id: string): string {
    return `lease:${id}`;
  }

  private tenantsKey(service: string): string {
    return `tenants:${service}`;
  }

  private idemKey(tenantId: string, key: string): string {
    return `idem:${tenantId}:${key}`;
  }

  private cancelKey(id: string): string {
    return `cancel:${id}`;
  }

  private dlqKey(tenantId: string): string {
    return `dlq:${tenantId}`;
  }

  private readonly servicesKey = 'services';
  private readonly allTenantsKey = 'tenants';
  private readonly deadlinesKey = 'deadlines';
  private readonly terminalKey = 'terminal';
  private readonly statsKey = 'stats:terminal';

  private async load(tenantId: string, id: string): Promise<TaskRecord | null> {
    const [rawRecord, flag] = await this.client.pipeline([
      ['GET', this.recordKey(tenantId, id)],
      ['EXISTS', this.cancelKey(id)],
    ]);
    const raw = asString(rawRecord);
    if (!raw) return null;
    const record = parseStoredRecord(raw);
    return asNumber(flag) === 1 ? { ...record, cancelRequested: true } : record;
  }

  private async loadById(id: string): Promise<TaskRecord | null> {
    const tenantId = await this.getOwner(id);
    return tenantId ? this.load(tenantId, id) : null;
  }

  private async leasedWrite(lease: Lease, record: TaskRecord, nextToken: string): Promise<boolean> {
    const written = await this.client.eval(
      LEASED_WRITE_SCRIPT,
      [this.leaseKey(lease.taskId), this.recordKey(lease.tenantId, lease.taskId)],
      [lease.token, JSON.stringify(record), nextToken],
    );
    return asNumber(written) === 1;
  }

  /** Index updates that follow a record reaching a terminal status. */
  private terminalCommands(record: TaskRecord): RedisArg[][] {
    const { task_id: id, tenant_id: tenantId, status } = record.envelope;
    const commands: RedisArg[][] = [
      ['ZREM', this.queueKey(record.service, tenantId), id],
      ['ZREM', this.delayedKey(record.service, tenantId), id],
      ['ZREM', this.leasesKey(record.service), id],
      ['ZREM', this.deadlinesKey, id],
      ['ZADD', this.terminalKey, completedAtMs(record) ?? this.now(), id],
      ['HINCRBY', this.statsKey, status, 1],
      ['DEL', this.cancelKey(id)],
    ];
    if (isDeadLetter(record)) commands.push(['ZADD', this.dlqKey(tenantId), this.now(), id]);
    return commands;
  }

  async enqueue(envelope: TaskEnvelope, options: EnqueueOptions): Promise<EnqueueResult> {
    assertEnqueueable(envelope);
    const { task_id: id, tenant_id: tenantId, idempotency_key: idemKey } = envelope;

    const record = newRecord(envelope, options, this.now());
    const score = priorityScore(record.envelope);
    const ttlSec = Math.ceil((options.idempotencyTtlMs ?? DEFAULT_IDEMPOTENCY_TTL_MS) / 1000);
    const reply = asStringArray(await this.client.eval(
      ENQUEUE_SCRIPT,
      [
        this.ownerKey(id),
        this.recordKey(tenantId, id),
        this.scoreKey(options.service),
        this.queueKey(options.service, tenantId),
        this.tenantsKey(options.service),
        this.servicesKey,
        this.allTenantsKey,
        this.deadlinesKey,
        this.idemKey(tenantId, idemKey ?? ''),
      ],
      [id, tenantId, JSON.stringify(record), score, record.deadlineAt ?? '', ttlSec, options.service, idemKey ? '1' : '0'],
    ));

    const [outcome, boundId] = reply;
    if (outcome === 'exists') throw new ValidationError(`task_id ${id} already exists`);
    if (outcome === 'duplicate' && boundId) return { taskId: boundId, created: false };
    if (outcome !== 'created') throw new TransientInfraError('Unexpected enqueue reply from Redis');
    return { taskId: id, created: true };
  }

  async dequeue(service: string, options: DequeueOptions): Promise<LeasedTask | null> {
    const now = this.now();
    const token = ulid();
    const claimed = asStringArray(await this.client.eval(
      CLAIM_SCRIPT,
      [this.tenantsKey(service), this.leasesKey(service)],
      [service, now, now + options.leaseMs, options.tenantId ?? '', token],
    ));
    const [id, tenantId] = claimed;
    if (!id || !tenantId) return null;

    const record = await this.load(tenantId, id);
    if (!record || record.envelope.status !== 'pending') {
      await this.client.pipeline([
        ['ZREM', this.leasesKey(service), id],
        ['DEL', this.leaseKey(id)],
      ]);
      return null;
    }

    const leased = leaseRecord(record, token, options.leaseMs, now);
    const lease = leaseOf(leased);
    if (!lease) return null;
    if (!(await this.leasedWrite(lease, leased, token))) return null;
    return { envelope: leased.envelope, lease, maxAttempts: leased.maxAttempts };
  }

  async extendLease(lease: Lease, leaseMs: number): Promise<LeaseRenewal | null> {
    const record = await this.load(lease.tenantId, lease.taskId);
    if (!record || !holdsLease(record, lease)) return null;

    const expiresAt = this.now() + leaseMs;
    const next: TaskRecord = { ...record, leaseExpiresAt: expiresAt, updatedAt: this.now() };
    if (!(await this.leasedWrite(lease, next, lease.token))) return null;
    await this.client.command(['ZADD', this.leasesKey(record.service), expiresAt, lease.taskId]);
    return { lease: { ...lease, expiresAt }, cancelRequested: record.cancelRequested };
  }

  async ack(lease: Lease, outcome: TaskOutcome): Promise<TaskRecord | null> {
    const record = await this.load(lease.tenantId, lease.taskId);
    if (!record || !holdsLease(record, lease)) return null;

    const next = applyOutcome(record, outcome, this.now());
    if (!(await this.leasedWrite(lease, next, ''))) return null;
    await this.client.pipeline(this.terminalCommands(next));
    return next;
  }

  async nack(lease: Lease, error: TaskError, options: NackOptions): Promise<NackResult | null> {
    const record = await this.load(lease.tenantId, lease.taskId);
    if (!record || !holdsLease(record, lease)) return null;

    const result = applyNack(record, error, options.retryAt, this.now());
    if (!(await this.leasedWrite(lease, result.record, ''))) return null;

    if (result.outcome === 'terminal') {
      await this.client.pipeline(this.terminalCommands(result.record));
    } else {
      await this.client.pipeline([
        ['ZREM', this.leasesKey(record.service), lease.taskId],
        ['ZADD', this.delayedKey(record.service, lease.tenantId), options.retryAt, lease.taskId],
      ]);
    }
    return result;
  }

  async release(lease: Lease): Promise<boolean> {
    const record = await this.load(lease.tenantId, lease.taskId);
    if (!record || !holdsLease(record, lease)) return false;

    const next: TaskRecord = {
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
    if (!(await this.leasedWrite(lease, next, ''))) return false;
    await this.client.pipeline([
      ['ZREM', this.leasesKey(record.service), lease.taskId],
      ['ZADD', this.queueKey(record.service, lease.tenantId), priorityScore(next.envelope), lease.taskId],
    ]);
    return true;
  }

  async peekStatus(tenantId: string, taskId: string): Promise<TaskRecord | null> {
    const owner = await this.getOwner(taskId);
    if (owner !== tenantId) return null;
    return this.load(tenantId, taskId);
  }

  async getOwner(taskId: string): Promise<string | null> {
    return asString(await this.client.command(['GET', this.ownerKey(taskId)]));
  }

  async cancel(tenantId: string, taskId: string): Promise<CancelResult> {
    for (let attempt = 0; attempt < CANCEL_ATTEMPTS; attempt++) {
      const record = await this.peekStatus(tenantId, taskId);
      if (!record) return { outcome: 'not_found' };
      if (isTerminal(record.envelope.status)) return { outcome: 'already_terminal', record };

      if (record.envelope.status === 'pending') {
        // Whoever removes the queue entry owns the transition
        const [fromQueue, fromDelayed] = await this.client.pipeline([
          ['ZREM', this.queueKey(record.service, tenantId), taskId],
          ['ZREM', this.delayedKey(record.service, tenantId), taskId],
        ]);
        if (asNumber(fromQueue) + asNumber(fromDelayed) > 0) {
          const owned = (await this.load(tenantId, taskId)) ?? record;
          const cancelled = applyOutcome(owned, { status: 'cancelled' }, this.now());
          await this.client.pipeline([
            ['SET', this.recordKey(tenantId, taskId), JSON.stringify(cancelled)],
            ...this.terminalCommands(cancelled),
          ]);
          return { outcome: 'cancelled', record: cancelled };
        }
      }

      // Held by a worker: cancellation is advisory and read back on renewal
      const flagged = await this.client.eval(FLAG_CANCEL_SCRIPT, [this.leaseKey(taskId), this.cancelKey(taskId)]);
      if (asNumber(flagged) === 1) {
        const current = (await this.load(tenantId, taskId)) ?? { ...record, cancelRequested: true };
        if (isTerminal(current.envelope.status)) return { outcome: 'already_terminal', record: current };
        return { outcome: 'cancel_requested', record: current };
      }
    }
    throw new TransientInfraError('Task kept changing state during cancel, please retry');
  }

  async requeueExpiredLeases(now = this.now()): Promise<LeaseSweep> {
    const sweep: LeaseSweep = { requeued: 0, terminal: [] };
    const services = asStringArray(await this.client.command(['SMEMBERS', this.servicesKey]));

    for (const service of services) {
      const expired = asStringArray(await this.client.command(['ZRANGEBYSCORE', this.leasesKey(service), '-inf', now]));
      for (const id of expired) {
        // Only the sweeper that removes the lease entry handles it
        if (asNumber(await this.client.command(['ZREM', this.leasesKey(service), id])) !== 1) continue;
        const record = await this.loadById(id);
        if (!record || record.envelope.status !== 'processing') continue;
        if (record.leaseExpiresAt !== null && record.leaseExpiresAt > now) {
          await this.client.command(['ZADD', this.leasesKey(service), record.leaseExpiresAt, id]);
          continue;
        }

        const lease = leaseOf(record);
        if (!lease) continue;
        const next = expireLease(record, now);
        // An ack that landed after the read wins
        if (!(await this.leasedWrite(lease, next, ''))) continue;

        const tenantId = record.envelope.tenant_id;
        const commands: RedisArg[][] = [];
        if (isTerminal(next.envelope.status)) {
          commands.push(...this.terminalCommands(next));
          sweep.terminal.push(next);
        } else {
          commands.push(['ZADD', this.queueKey(service, tenantId), priorityScore(next.envelope), id]);
          sweep.requeued++;
        }
        await this.client.pipeline(commands);
      }
    }
    return sweep;
  }

  async failExpired(now = this.now()): Promise<TaskRecord[]> {
    const failed: TaskRecord[] = [];
    const due = asStringArray(await this.client.command(['ZRANGEBYSCORE', this.deadlinesKey, '-inf', now]));

    for (const id of due) {
      if (asNumber(await this.client.command(['ZREM', this.deadlinesKey, id])) !== 1) continue;
      const record = await this.loadById(id);
      if (!record || !isPastDeadline(record, now)) continue;

      const next = applyOutcome(record, { status: 'failed', error: timeoutError() }, now);
      if (!(await this.settleExpired(record, next))) {
        // Claimed or finished meanwhile; the next sweep looks again
        await this.client.command(['ZADD', this.deadlinesKey, record.deadlineAt ?? now, id]);
        continue;
      }
      await this.client.pipeline(this.terminalCommands(next));
      failed.push(next);
    }
    return failed;
  }

  /** Writes a deadline failure only while the task is still where it was read. */
  private async settleExpired(record: TaskRecord, next: TaskRecord): Promise<boolean> {
    const lease = leaseOf(record);
    if (lease) return this.leasedWrite(lease, next, '');

    const { task_id: id, tenant_id: tenantId } = record.envelope;
    const [fromQueue, fromDelayed] = await this.client.pipeline([
      ['ZREM', this.queueKey(record.service, tenantId), id],
      ['ZREM', this.delayedKey(record.service, tenantId), id],
    ]);
    if (asNumber(fromQueue) + asNumber(fromDelayed) === 0) return false;
    await this.client.command(['SET', this.recordKey(tenantId, id), JSON.stringify(next)]);
    return true;
  }

  async prune(olderThan: number): Promise<number> {
    const ids = asStringArray(await this.client.command(['ZRANGEBYSCORE', this.terminalKey, '-inf', olderThan]));
    let removed = 0;

    for (const id of ids) {
      const record = await this.loadById(id);
      const commands: RedisArg[][] = [
        ['ZREM', this.terminalKey, id],
        ['DEL', this.ownerKey(id)],
        ['DEL', this.cancelKey(id)],
      ];
      if (record) {
        const { tenant_id: tenantId, idempotency_key: idemKey, status } = record.envelope;
        commands.push(
          ['DEL', this.recordKey(tenantId, id)],
          ['ZREM', this.dlqKey(tenantId), id],
          ['HDEL', this.scoreKey(record.service), id],
          ['HINCRBY', this.statsKey, status, -1],
        );
        if (idemKey) {
          const key = this.idemKey(tenantId, idemKey);
          if (asString(await this.client.command(['GET', key])) === id) commands.push(['DEL', key]);
        }
      }
      await this.client.pipeline(commands);
      removed++;
    }
    return removed;
  }

  async listDeadLetter(tenantId: string, limit: number): Promise<TaskRecord[]> {
    const ids = asStringArray(await this.client.command(['ZREVRANGE', this.dlqKey(tenantId), 0, limit - 1]));
    if (ids.length === 0) return [];
    const raws = await this.client.command(['MGET', ...ids.map((id) => this.recordKey(tenantId, id))]);
    return asStringArray(raws).map(parseStoredRecord);
  }

  async inDeadLetter(tenantId: string, taskId: string): Promise<boolean> {
    return (await this.client.command(['ZSCORE', this.dlqKey(tenantId), taskId])) !== null;
  }

  async takeDeadLetter(tenantId: string, taskId: string): Promise<TaskRecord | null> {
    const removed = asNumber(await this.client.command(['ZREM', this.dlqKey(tenantId), taskId]));
    if (removed !== 1) return null;
    return this.load(tenantId, taskId);
  }

  async getStats(): Promise<QueueStats> {
    const terminal = asHash(await this.client.command(['HGETALL', this.statsKey]));
    const stats: QueueStats = {
      pending: 0,
      processing: 0,
      completed: asNumber(terminal.completed),
      failed: asNumber(terminal.failed),
      cancelled: asNumber(terminal.cancelled),
      deadLetter: 0,
      byService: {},
    };

    const services = asStringArray(await this.client.command(['SMEMBERS', this.servicesKey]));
    for (const service of services) {
      const tenants = asStringArray(await this.client.command(['SMEMBERS', this.tenantsKey(service)]));
      const counts = await this.client.pipeline([
        ['ZCARD', this.leasesKey(service)],
        ...tenants.flatMap((t): RedisArg[][] => [
          ['ZCARD', this.queueKey(service, t)],
          ['ZCARD', this.delayedKey(service, t)],
        ]),
      ]);
      const [processing, ...pendingCounts] = counts.map(asNumber);
      const pending = pendingCounts.reduce((sum, n) => sum + n, 0);
      stats.byService[service] = { pending, processing: processing ?? 0 };
      stats.pending += pending;
      stats.processing += processing ?? 0;
    }

    const tenants = asStringArray(await this.client.command(['SMEMBERS', this.allTenantsKey]));
    const dlqCounts = await this.client.pipeline(tenants.map((t): RedisArg[] => ['ZCARD', this.dlqKey(t)]));
    stats.deadLetter = dlqCounts.map(asNumber).reduce((sum, n) => sum + n, 0);
    return stats;
  }
}
