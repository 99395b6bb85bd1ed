import { describe, it, expect, beforeEach } from 'vitest';
import { RedisTaskStore } from './redis.js';
import { FakeRedis } from '../../../tests/helpers/fake-redis.js';
import { T0, at, makeEnvelope, manualClock } from '../../../tests/helpers/tasks.js';
import type { LeasedTask } from '../types/task.js';

const LEASE_MS = 1000;
const opts = { service: 'embedding' };

describe('RedisTaskStore', () => {
  let clock: ReturnType<typeof manualClock>;
  let redis: FakeRedis;
  let store: RedisTaskStore;

  beforeEach(() => {
    clock = manualClock();
    redis = new FakeRedis(clock.now);
    store = new RedisTaskStore(redis, clock.now);
  });

  async function lease(leaseMs = LEASE_MS): Promise<LeasedTask> {
    const leased = await store.dequeue('embedding', { leaseMs });
    if (!leased) throw new Error('expected a task');
    return leased;
  }

  describe('enqueue', () => {
    it('writes the record and queues it under its tenant', async () => {
      expect(await store.enqueue(makeEnvelope({ task_id: 'a' }), opts)).toEqual({ taskId: 'a', created: true });

      expect(redis.members('tasks:embedding:tenant-a')).toEqual(['a']);
      expect(redis.get('task:a')).toBe('tenant-a');
      expect((await store.peekStatus('tenant-a', 'a'))?.envelope.status).toBe('pending');
    });

    it('rejects a task id that is already taken', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'a' }), opts);
      await expect(store.enqueue(makeEnvelope({ task_id: 'a' }), opts)).rejects.toMatchObject({ type: 'BAD_INPUT' });
    });

    it('resolves a repeated idempotency key to the first task', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'a', idempotency_key: 'batch-42' }), opts);
      const second = await store.enqueue(makeEnvelope({ task_id: 'b', idempotency_key: 'batch-42' }), opts);

      expect(second).toEqual({ taskId: 'a', created: false });
      expect(await store.peekStatus('tenant-a', 'b')).toBeNull();
      expect(redis.members('tasks:embedding:tenant-a')).toEqual(['a']);
    });

    it('binds a key once under concurrent submissions', async () => {
      const results = await Promise.all(
        ['a', 'b', 'c'].map((id) => store.enqueue(makeEnvelope({ task_id: id, idempotency_key: 'batch-7' }), opts)),
      );

      expect(results.filter((r) => r.created)).toEqual([{ taskId: 'a', created: true }]);
      expect(results.map((r) => r.taskId)).toEqual(['a', 'a', 'a']);
      expect(redis.get('idem:tenant-a:batch-7')).toBe('a');
      expect(await store.peekStatus('tenant-a', 'b')).toBeNull();
      expect(await store.peekStatus('tenant-a', 'c')).toBeNull();
    });

    it('takes over a key whose task no longer exists', async () => {
      redis.set('idem:tenant-a:k', 'pruned-task');

      expect(await store.enqueue(makeEnvelope({ task_id: 'a', idempotency_key: 'k' }), opts)).toEqual({ taskId: 'a', created: true });
      expect(redis.get('idem:tenant-a:k')).toBe('a');
    });

    it('expires the idempotency key on its TTL', async () => {
      const ttl = { service: 'embedding', idempotencyTtlMs: 1000 };
      await store.enqueue(makeEnvelope({ task_id: 'a', idempotency_key: 'k' }), ttl);
      clock.advance(1000);

      expect(await store.enqueue(makeEnvelope({ task_id: 'b', idempotency_key: 'k' }), ttl)).toEqual({ taskId: 'b', created: true });
    });
  });

  describe('claim', () => {
    it('picks the oldest tenant head and binds the lease token', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'b-urgent', tenant_id: 'tenant-b', priority: 9, created_at: at(T0 + 50) }), opts);
      await store.enqueue(makeEnvelope({ task_id: 'a-normal', priority: 5, created_at: at(T0) }), opts);

      const first = await lease();
      expect(first.envelope.task_id).toBe('a-normal');
      expect(first.envelope.status).toBe('processing');
      expect(first.envelope.attempt_count).toBe(1);
      expect(redis.get('lease:a-normal')).toBe(first.lease.token);
      expect(redis.members('leases:embedding')).toEqual(['a-normal']);

      expect((await lease()).envelope.task_id).toBe('b-urgent');
      expect(await store.dequeue('embedding', { leaseMs: LEASE_MS })).toBeNull();
    });
  });

  describe('ack and nack', () => {
    it('stores the result and drops the lease', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'a' }), opts);
      const leased = await lease();

      const record = await store.ack(leased.lease, { status: 'completed', result: { vector: [1] } });

      expect(record?.envelope.status).toBe('completed');
      expect(redis.get('lease:a')).toBeNull();
      expect(redis.members('leases:embedding')).toEqual([]);
      expect(redis.members('terminal')).toEqual(['a']);
      expect((await store.peekStatus('tenant-a', 'a'))?.result).toEqual({ vector: [1] });
    });

    it('ignores a stale lease token', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'a' }), opts);
      const leased = await lease();

      expect(await store.ack({ ...leased.lease, token: 'someone-else' }, { status: 'completed', result: 1 })).toBeNull();
      expect((await store.peekStatus('tenant-a', 'a'))?.envelope.status).toBe('processing');
    });

    it('holds a nacked task in the delayed set until retryAt', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'a' }), opts);
      const leased = await lease();
      const error = { error_code: 'UPSTREAM_ERROR', error_message: 'boom', retryable: true };

      expect((await store.nack(leased.lease, error, { retryAt: T0 + 500 }))?.outcome).toBe('requeued');
      expect(redis.members('delayed:embedding:tenant-a')).toEqual(['a']);
      expect(await store.dequeue('embedding', { leaseMs: LEASE_MS })).toBeNull();

      clock.advance(500);
      expect((await lease()).envelope.attempt_count).toBe(2);
    });

    it('dead-letters a task that ran out of attempts', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'a' }), { service: 'embedding', maxAttempts: 1 });
      const error = { error_code: 'UPSTREAM_ERROR', error_message: 'boom', retryable: true };

      const result = await store.nack((await lease()).lease, error, { retryAt: T0 });

      expect(result?.outcome).toBe('terminal');
      expect((await store.listDeadLetter('tenant-a', 10)).map((r) => r.envelope.task_id)).toEqual(['a']);
      expect(await store.inDeadLetter('tenant-a', 'a')).toBe(true);
      expect(await store.inDeadLetter('tenant-b', 'a')).toBe(false);
      expect(await store.getStats()).toEqual({
        pending: 0,
        processing: 0,
        completed: 0,
        failed: 1,
        cancelled: 0,
        deadLetter: 1,
        byService: { embedding: { pending: 0, processing: 0 } },
      });
    });
  });

  describe('cancel', () => {
    it('cancels a pending task and takes it off the queue', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'a' }), opts);

      expect((await store.cancel('tenant-a', 'a')).outcome).toBe('cancelled');
      expect(redis.members('tasks:embedding:tenant-a')).toEqual([]);
      expect(await store.dequeue('embedding', { leaseMs: LEASE_MS })).toBeNull();
    });

    it('flags a running task in its own key and reports it on renewal', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'a' }), opts);
      const leased = await lease();

      const result = await store.cancel('tenant-a', 'a');
      expect(result).toMatchObject({ outcome: 'cancel_requested', record: { cancelRequested: true } });
      expect(redis.get('cancel:a')).toBe('1');
      expect((await store.extendLease(leased.lease, LEASE_MS))?.cancelRequested).toBe(true);

      const nacked = await store.nack(leased.lease, { error_code: 'X', error_message: 'x', retryable: true }, { retryAt: T0 });
      expect(nacked?.record.envelope.status).toBe('cancelled');
      expect(redis.get('cancel:a')).toBeNull();
    });

    it('leaves a completion alone when the ack lands mid-cancel', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'a' }), opts);
      const leased = await lease();
      redis.before('flagCancel', () => store.ack(leased.lease, { status: 'completed', result: 'done' }));

      const result = await store.cancel('tenant-a', 'a');

      expect(result).toMatchObject({ outcome: 'already_terminal', record: { envelope: { status: 'completed' } } });
      const record = await store.peekStatus('tenant-a', 'a');
      expect(record?.envelope.status).toBe('completed');
      expect(record?.result).toBe('done');
      expect(record?.cancelRequested).toBe(false);
      expect(redis.get('cancel:a')).toBeNull();
    });

    it('does not touch other tenants', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'a' }), opts);
      expect(await store.cancel('tenant-b', 'a')).toEqual({ outcome: 'not_found' });
    });
  });

  describe('sweeps', () => {
    it('requeues an expired lease', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'a' }), opts);
      const first = await lease();
      clock.advance(LEASE_MS);

      expect(await store.requeueExpiredLeases()).toEqual({ requeued: 1, terminal: [] });
      expect(redis.get('lease:a')).toBeNull();

      const second = await lease();
      expect(second.envelope.attempt_count).toBe(2);
      expect(await store.ack(first.lease, { status: 'completed', result: 'late' })).toBeNull();
    });

    it('keeps an ack that lands while the lease sweep runs', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'a' }), opts);
      const leased = await lease();
      clock.advance(LEASE_MS);
      redis.before('leasedWrite', () => store.ack(leased.lease, { status: 'completed', result: 'done' }));

      expect(await store.requeueExpiredLeases()).toEqual({ requeued: 0, terminal: [] });

      expect((await store.peekStatus('tenant-a', 'a'))?.envelope.status).toBe('completed');
      expect(redis.members('tasks:embedding:tenant-a')).toEqual([]);
    });

    it('fails a pending task past its deadline', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'a', created_at: at(T0) }), { service: 'embedding', maxLifetimeMs: 1000 });
      clock.advance(1000);

      const failed = await store.failExpired();

      expect(failed.map((r) => r.envelope.task_id)).toEqual(['a']);
      expect(failed[0]?.error?.error_code).toBe('TASK_TIMEOUT');
      expect(await store.dequeue('embedding', { leaseMs: LEASE_MS })).toBeNull();
    });

    it('keeps an ack that lands while the deadline sweep runs', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'a', created_at: at(T0) }), { service: 'embedding', maxLifetimeMs: 1000 });
      const leased = await lease(5000);
      clock.advance(1000);
      redis.before('leasedWrite', () => store.ack(leased.lease, { status: 'completed', result: 'done' }));

      expect(await store.failExpired()).toEqual([]);
      expect((await store.peekStatus('tenant-a', 'a'))?.envelope.status).toBe('completed');

      // The deadline entry was put back; the next sweep drops it
      expect(await store.failExpired()).toEqual([]);
      expect(redis.members('deadlines')).toEqual([]);
    });
  });

  describe('prune', () => {
    it('removes finished records and frees their idempotency keys', async () => {
      await store.enqueue(makeEnvelope({ task_id: 'a', idempotency_key: 'k' }), opts);
      await store.ack((await lease()).lease, { status: 'completed', result: null });
      clock.advance(10);

      expect(await store.prune(T0 + 1)).toBe(1);
      expect(await store.peekStatus('tenant-a', 'a')).toBeNull();
      expect(redis.get('idem:tenant-a:k')).toBeNull();
      expect(await store.enqueue(makeEnvelope({ task_id: 'c', idempotency_key: 'k' }), opts)).toEqual({ taskId: 'c', created: true });
    });
  });
});
