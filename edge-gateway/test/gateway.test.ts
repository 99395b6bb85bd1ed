import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import WebSocket from 'ws';
import { createServer, type TaskRelayServer } from '../../src/createServer.js';
import { loadConfig } from '../../src/config.js';
import { silentLogger } from '../../src/logger.js';
import { TaskHandlerRegistry } from '../../task-service/src/handlers/index.js';
import { GatewayNotifier } from '../../task-service/src/notifier/index.js';
import { TaskRelayClient, type RelayMessage } from '../../sdk/node/index.js';
import { eventually } from '../../tests/helpers/tasks.js';

interface Running {
  server: TaskRelayServer;
  httpUrl: string;
  wsUrl: string;
}

async function start(env: Record<string, string>, handlers?: TaskHandlerRegistry): Promise<Running> {
  const config = loadConfig({
    NODE_ENV: 'test',
    LOG_LEVEL: 'silent',
    RATE_LIMIT_ENABLED: '0',
    POLL_INTERVAL_MS: '5',
    POLL_MAX_INTERVAL_MS: '20',
    WS_HEARTBEAT_MS: '60000',
    ...env,
  });
  const server = await createServer({ config, handlers, logger: false });
  await server.app.listen({ port: 0, host: '127.0.0.1' });
  const address = server.app.server.address();
  if (!address || typeof address === 'string') throw new Error('expected a TCP address');
  return { server, httpUrl: `http://127.0.0.1:${address.port}`, wsUrl: `ws://127.0.0.1:${address.port}/ws` };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function upgradeStatus(url: string, headers: Record<string, string> = {}): Promise<number> {
  return new Promise((resolve, reject) => {
    const socket = new WebSocket(url, { headers });
    socket.once('unexpected-response', (_req, res) => {
      resolve(res.statusCode ?? 0);
      socket.terminate();
    });
    socket.once('open', () => {
      socket.close();
      reject(new Error('upgrade unexpectedly accepted'));
    });
    socket.on('error', (err) => reject(err));
  });
}

describe('WebSocket gateway with in-process worker', () => {
  let running: Running;
  let client: TaskRelayClient;
  let received: RelayMessage[];
  let gate: ReturnType<typeof deferred>;
  let started: string[];

  beforeEach(async () => {
    received = [];
    started = [];
    gate = deferred();
    const handlers = new TaskHandlerRegistry()
      .register('single_embedding', {
        execute: async ({ task }) => ({ embedding: [task.payload.text.length, 0.5], model: 'test-model' }),
      })
      .register('rag_query', {
        execute: async ({ task, signal }) => {
          started.push(task.task_id);
          await Promise.race([
            gate.promise,
            new Promise((_, reject) => signal.addEventListener('abort', () => reject(signal.reason), { once: true })),
          ]);
          return { answer: `answer to ${task.payload.query}` };
        },
      });
    running = await start({ WORKER_CONCURRENCY: '2' }, handlers);
    client = new TaskRelayClient({
      wsUrl: running.wsUrl,
      httpUrl: running.httpUrl,
      tenantId: 'tenant-a',
      reconnect: { baseDelayMs: 20, maxDelayMs: 50, jitter: 0 },
      onMessage: (message) => received.push(message),
    });
    await client.connect();
  });

  afterEach(async () => {
    gate.resolve();
    client.close();
    await running.server.app.close();
  });

  it('delivers an embedding result to the submitting connection', async () => {
    const submitted = await client.submitTask({ type: 'single_embedding', payload: { text: 'hello' } });
    expect(submitted.subscribed).toBe(true);
    expect(submitted.duplicate).toBe(false);

    const message = await client.waitFor(submitted.task_id, 2000);

    expect(message.type).toEqual({ domain: 'chat', action: 'completed' });
    expect(message.tenant_id).toBe('tenant-a');
    expect(message.data).toMatchObject({
      task_id: submitted.task_id,
      type: 'single_embedding',
      status: 'completed',
      result: { embedding: [5, 0.5], model: 'test-model' },
    });
  });

  it('collapses a repeated idempotency key into one task', async () => {
    const first = await client.submitTask({ type: 'single_embedding', payload: { text: 'a' }, idempotencyKey: 'batch-42' });
    const second = await client.submitTask({ type: 'single_embedding', payload: { text: 'a' }, idempotencyKey: 'batch-42' });

    expect(second.task_id).toBe(first.task_id);
    expect(second.duplicate).toBe(true);
    await client.waitFor(first.task_id, 2000);
    const completions = received.filter((m) => m.data.task_id === first.task_id && m.data.status === 'completed');
    expect(completions).toHaveLength(1);
  });

  it('answers a ping', async () => {
    const messageId = client.send('system', 'ping', {});

    await eventually(() => received.some((m) => m.correlation_id === messageId));
    const pong = received.find((m) => m.correlation_id === messageId);
    expect(pong?.type).toEqual({ domain: 'system', action: 'status_update' });
    expect(pong?.data.status).toBe('pong');
  });

  it('reports an unsupported action as an error frame', async () => {
    const messageId = client.send('chat', 'execute', { text: 'hi' });

    await eventually(() => received.some((m) => m.correlation_id === messageId));
    const reply = received.find((m) => m.correlation_id === messageId);
    expect(reply?.type).toEqual({ domain: 'system', action: 'error' });
    expect(reply?.data.error_code).toBe('UNSUPPORTED_ACTION');
  });

  it('cancels a running task from the socket', async () => {
    const submitted = await client.submitTask({ type: 'rag_query', payload: { query: 'leases' } });
    await eventually(() => started.includes(submitted.task_id));

    const messageId = client.cancel(submitted.task_id);
    const message = await client.waitFor(submitted.task_id, 2000);

    await eventually(() => received.some((m) => m.correlation_id === messageId));
    const ack = received.find((m) => m.correlation_id === messageId);
    expect(ack?.data).toMatchObject({ task_id: submitted.task_id, cancel_requested: true });
    expect(message.type).toEqual({ domain: 'workflow', action: 'status_update' });
    expect(message.data.status).toBe('cancelled');
  });

  it('replays a result that finished while the client was away', async () => {
    const submitted = await client.submitTask({ type: 'rag_query', payload: { query: 'leases' } });
    await eventually(() => started.includes(submitted.task_id));
    const firstConnection = client.id;

    client.simulateDrop();
    await eventually(() => running.server.gateway.connectionCount() === 0);
    gate.resolve();

    const message = await client.waitFor(submitted.task_id, 3000);

    expect(client.id).not.toBe(firstConnection);
    expect(message.data).toMatchObject({ task_id: submitted.task_id, status: 'completed', result: { answer: 'answer to leases' } });
    const results = received.filter((m) => m.data.task_id === submitted.task_id && m.data.status === 'completed');
    expect(results).toHaveLength(1);
  });

  it('refuses a client upgrade without a tenant', async () => {
    expect(await upgradeStatus(running.wsUrl)).toBe(401);
  });
});

describe('Internal worker channel', () => {
  let running: Running;

  beforeEach(async () => {
    running = await start({ WORKER_ENABLED: '0', INTERNAL_TOKEN: 'test-secret' });
  });

  afterEach(async () => {
    await running.server.app.close();
  });

  it('requires the internal token', async () => {
    const internalUrl = running.wsUrl.replace('/ws', '/internal/ws');
    expect(await upgradeStatus(internalUrl, { 'x-internal-token': 'wrong' })).toBe(401);
    expect(await upgradeStatus(internalUrl)).toBe(401);
  });

  it('routes an event from a remote worker to the subscriber', async () => {
    const client = new TaskRelayClient({ wsUrl: running.wsUrl, httpUrl: running.httpUrl, tenantId: 'tenant-a' });
    const notifier = new GatewayNotifier({
      url: running.wsUrl.replace('/ws', '/internal/ws'),
      token: 'test-secret',
      sourceService: 'embedding-worker',
      logger: silentLogger(),
    });
    try {
      await client.connect();
      const submitted = await client.submitTask({ type: 'single_embedding', payload: { text: 'hi' } });
      expect(submitted.subscribed).toBe(true);

      await notifier.publish({
        kind: 'completion',
        task_id: submitted.task_id,
        tenant_id: 'tenant-a',
        type: 'single_embedding',
        status: 'completed',
        result: { embedding: [1, 2] },
        error: null,
        completed_at: new Date().toISOString(),
        correlation_id: null,
      });

      const message = await client.waitFor(submitted.task_id, 2000);
      expect(message.data.result).toEqual({ embedding: [1, 2] });
    } finally {
      await notifier.close();
      client.close();
    }
  });

  it('keeps a foreign tenant from subscribing over the socket', async () => {
    const owner = new TaskRelayClient({ wsUrl: running.wsUrl, httpUrl: running.httpUrl, tenantId: 'tenant-a' });
    const seen: RelayMessage[] = [];
    const intruder = new TaskRelayClient({
      wsUrl: running.wsUrl,
      httpUrl: running.httpUrl,
      tenantId: 'tenant-b',
      onMessage: (m) => seen.push(m),
    });
    try {
      await owner.connect();
      await intruder.connect();
      const submitted = await owner.submitTask({ type: 'single_embedding', payload: { text: 'hi' } });

      const messageId = intruder.send('session', 'sync', { task_ids: [submitted.task_id] });

      await eventually(() => seen.some((m) => m.correlation_id === messageId));
      const reply = seen.find((m) => m.correlation_id === messageId);
      expect(reply?.data.tasks).toEqual([{ task_id: submitted.task_id, status: 'forbidden', replayed: false }]);
    } finally {
      owner.close();
      intruder.close();
    }
  });
});

describe('Internal worker channel without a configured token', () => {
  let running: Running;

  beforeEach(async () => {
    running = await start({ WORKER_ENABLED: '0' });
  });

  afterEach(async () => {
    await running.server.app.close();
  });

  it('stays closed to every caller', async () => {
    const internalUrl = running.wsUrl.replace('/ws', '/internal/ws');
    expect(await upgradeStatus(internalUrl)).toBe(403);
    expect(await upgradeStatus(internalUrl, { 'x-internal-token': 'test-secret' })).toBe(403);
  });
});
