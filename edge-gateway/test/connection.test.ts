import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import WebSocket, { WebSocketServer } from 'ws';
import { CLOSE_TRY_AGAIN_LATER, ClientConnection } from '../src/connection.js';
import { createMessage } from '../src/messages.js';
import { silentLogger } from '../../src/logger.js';
import { eventually } from '../../tests/helpers/tasks.js';

describe('ClientConnection', () => {
  let wss: WebSocketServer;
  let connection: Promise<ClientConnection>;
  let peer: WebSocket;
  let frames: string[];
  let closeCode: number | null;

  beforeEach(async () => {
    wss = new WebSocketServer({ port: 0, host: '127.0.0.1' });
    await new Promise<void>((resolve) => wss.once('listening', () => resolve()));
    connection = new Promise((resolve) => {
      wss.once('connection', (socket) => {
        resolve(new ClientConnection(socket, {
          tenantId: 'tenant-a',
          sessionId: null,
          maxQueue: 3,
          heartbeatMs: 60_000,
          logger: silentLogger(),
        }));
      });
    });

    const address = wss.address();
    if (typeof address === 'string') throw new Error('expected a TCP address');
    frames = [];
    closeCode = null;
    peer = new WebSocket(`ws://127.0.0.1:${address.port}`);
    peer.on('message', (data) => frames.push(String(data)));
    peer.on('close', (code) => {
      closeCode = code;
    });
    await new Promise<void>((resolve) => peer.once('open', () => resolve()));
  });

  afterEach(async () => {
    peer.terminate();
    await new Promise<void>((resolve) => wss.close(() => resolve()));
  });

  const frame = (n: number) => createMessage('chat', 'stream', { n }, { tenantId: 'tenant-a' });

  it('delivers frames in order', async () => {
    const conn = await connection;
    expect(conn.send(frame(1))).toBe(true);
    expect(conn.send(frame(2))).toBe(true);

    await eventually(() => frames.length === 2);
    expect(frames.map((f) => JSON.parse(f).data.n)).toEqual([1, 2]);
    await eventually(() => conn.sentCount() === 2);
    expect(conn.queued()).toBe(0);
  });

  it('closes a client that cannot keep up', async () => {
    const conn = await connection;
    // One frame is in flight, three wait in the queue
    for (let n = 1; n <= 4; n++) expect(conn.send(frame(n))).toBe(true);

    expect(conn.send(frame(5))).toBe(false);
    expect(conn.isOpen()).toBe(false);
    expect(conn.signal.aborted).toBe(true);
    await eventually(() => closeCode !== null);
    expect(closeCode).toBe(CLOSE_TRY_AGAIN_LATER);
  });

  it('refuses to send once closed', async () => {
    const conn = await connection;
    conn.close(1000, 'bye');

    expect(conn.send(frame(1))).toBe(false);
    await eventually(() => closeCode !== null);
    expect(closeCode).toBe(1000);
  });

  it('notices the peer going away', async () => {
    const conn = await connection;
    peer.close();

    await eventually(() => conn.signal.aborted);
    expect(conn.isOpen()).toBe(false);
  });
});
