import { describe, it, expect, beforeEach } from 'vitest';
import { TaskProducer } from './index.js';
import { InMemoryTaskStore } from '../repositories/memory.js';
import { TransientInfraError } from '../../../src/errors.js';
import { silentLogger } from '../../../src/logger.js';
import { T0, manualClock } from '../../../tests/helpers/tasks.js';

describe('TaskProducer', () => {
  let store: InMemoryTaskStore;
  let producer: TaskProducer;
  let ids: number;

  beforeEach(() => {
    const clock = manualClock();
    ids = 0;
    store = new InMemoryTaskStore(clock.now);
    producer = new TaskProducer(store, silentLogger(), {
      retentionMs: 60_000,
      defaultMaxAttempts: 4,
      now: clock.now,
      newId: () => `id-${++ids}`,
    });
  });

  it('builds a pending envelope routed to the type service', async () => {
    const result = await producer.submit({
      type: 'rag_query',
      tenantId: ' tenant-a ',
      payload: { query: 'what is a lease?' },
      metadata: { conversation_id: 'c1' },
      priority: 7,
    });

    expect(result).toEqual({ taskId: 'id-1', duplicate: false, type: 'rag_query', service: 'query' });
    const record = await store.peekStatus('tenant-a', 'id-1');
    expect(record?.service).toBe('query');
    expect(record?.maxAttempts).toBe(4);
    expect(record?.deadlineAt).toBe(T0 + 5 * 60_000);
    expect(record?.envelope).toMatchObject({
      tenant_id: 'tenant-a',
      status: 'pending',
      priority: 7,
      created_at: new Date(T0).toISOString(),
      metadata: { conversation_id: 'c1' },
      // Defaults from the payload schema are applied
      payload: { query: 'what is a lease?', collection_ids: [], top_k: 5 },
      idempotency_key: null,
    });
  });

  it('defaults priority to 5', async () => {
    await producer.submit({ type: 'single_embedding', tenantId: 'tenant-a', payload: { text: 'hi' } });
    expect((await store.peekStatus('tenant-a', 'id-1'))?.envelope.priority).toBe(5);
  });

  it('rejects a blank tenant before touching the store', async () => {
    await expect(producer.submit({ type: 'single_embedding', tenantId: '  ', payload: { text: 'hi' } }))
      .rejects.toMatchObject({ code: 'TENANT_REQUIRED' });
    expect((await store.getStats()).pending).toBe(0);
  });

  it('rejects a document ingestion without content or source', async () => {
    await expect(producer.submit({
      type: 'document_ingestion',
      tenantId: 'tenant-a',
      payload: { document_id: 'd1', collection_id: 'c1' },
    })).rejects.toMatchObject({ type: 'BAD_INPUT', details: { issues: [{ path: 'content', message: 'source_url or content is required' }] } });
  });

  it('reports a duplicate submission', async () => {
    const request = { type: 'single_embedding', tenantId: 'tenant-a', payload: { text: 'hi' }, idempotencyKey: 'k1' };
    await producer.submit(request);
    const again = await producer.submit(request);

    expect(again).toMatchObject({ taskId: 'id-1', duplicate: true });
  });

  it('surfaces a store outage as retryable', async () => {
    store.enqueue = async () => {
      throw new Error('connection refused');
    };

    const error = await producer.submit({ type: 'single_embedding', tenantId: 'tenant-a', payload: { text: 'hi' } })
      .catch((e: unknown) => e);
    if (!(error instanceof TransientInfraError)) throw new Error('expected TransientInfraError');
    expect(error.code).toBe('QUEUE_UNAVAILABLE');
    expect(error.retryable).toBe(true);
  });

  describe('requeueDeadLetter', () => {
    async function deadLettered(): Promise<string> {
      const { taskId } = await producer.submit({ type: 'single_embedding', tenantId: 'tenant-a', payload: { text: 'hi' }, maxAttempts: 1 });
      const leased = await store.dequeue('embedding', { leaseMs: 1000 });
      if (!leased) throw new Error('expected a task');
      await store.nack(leased.lease, { error_code: 'UPSTREAM_ERROR', error_message: 'down', retryable: true }, { retryAt: T0 });
      return taskId;
    }

    it('queues a linked task and clears the entry', async () => {
      const taskId = await deadLettered();

      const result = await producer.requeueDeadLetter('tenant-a', taskId);

      expect(result).toEqual({ taskId: 'id-2', duplicate: false, type: 'single_embedding', service: 'embedding' });
      expect((await store.peekStatus('tenant-a', 'id-2'))?.envelope.metadata).toEqual({ requeued_from: 'id-1' });
      expect(await store.inDeadLetter('tenant-a', taskId)).toBe(false);
      expect(await producer.requeueDeadLetter('tenant-a', taskId)).toBeNull();
    });

    it('keeps the entry when the new task cannot be queued', async () => {
      const taskId = await deadLettered();
      store.enqueue = async () => {
        throw new Error('connection refused');
      };

      await expect(producer.requeueDeadLetter('tenant-a', taskId)).rejects.toBeInstanceOf(TransientInfraError);
      expect((await store.listDeadLetter('tenant-a', 10)).map((r) => r.envelope.task_id)).toEqual([taskId]);
    });
  });
});
