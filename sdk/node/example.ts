import { TaskRelayClient } from './index.js';

async function main() {
  const port = Number(process.env.PORT || 4311);
  const client = new TaskRelayClient({
    wsUrl: `ws://127.0.0.1:${port}/ws`,
    httpUrl: `http://127.0.0.1:${port}`,
    tenantId: process.env.TENANT_ID || 'tenant-demo',
    onMessage: (m) => { console.log('message', `${m.type.domain}.${m.type.action}`, m.data); },
    onReconnecting: ({ attempt, delayMs }) => { console.log('reconnecting', attempt, delayMs); },
    onFatal: (err) => { console.error('gave up', err.message); },
  });

  const connectionId = await client.connect();
  console.log('connected', connectionId);

  const submitted = await client.submitTask({
    type: 'single_embedding',
    payload: { text: 'What is a lease?' },
    idempotencyKey: 'example-1',
  });
  console.log('submitted', submitted);

  const done = await client.waitFor(submitted.task_id, 60_000);
  console.log('done', done.data);
  client.close();
}

main().catch((e) => { console.error(e); process.exit(1); });
