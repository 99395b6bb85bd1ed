// Node client for the task relay: HTTP submit plus a reconnecting WebSocket.
// After a reconnect it sends session.sync with every task still awaited, so
// results that completed while offline are replayed once.

import { randomUUID } from 'node:crypto';
import WebSocket from 'ws';

export interface ReconnectOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Fraction of the capped delay added as random jitter. */
  jitter: number;
  /** Consecutive failed attempts before giving up. */
  maxAttempts: number;
  random?: () => number;
}

export const DEFAULT_RECONNECT: ReconnectOptions = {
  baseDelayMs: 500,
  maxDelayMs: 30_000,
  multiplier: 2,
  jitter: 0.2,
  maxAttempts: 10,
};

/** Delay before reconnect attempt `attempt` (1-based). */
export function reconnectDelay(attempt: number, opts: ReconnectOptions = DEFAULT_RECONNECT): number {
  const exp = opts.baseDelayMs * Math.pow(opts.multiplier, Math.max(0, attempt - 1));
  const capped = Math.min(exp, opts.maxDelayMs);
  const random = opts.random ?? Math.random;
  return Math.round(capped + random() * opts.jitter * capped);
}

export interface RelayMessage {
  message_id: string;
  correlation_id: string | null;
  type: { domain: string; action: string };
  schema_version: string;
  created_at: string;
  tenant_id: string | null;
  source_service: string;
  data: Record<string, unknown>;
}

export interface SubmitOptions {
  type: string;
  payload: unknown;
  priority?: number;
  metadata?: Record<string, unknown>;
  idempotencyKey?: string;
}

export interface SubmitResponse {
  task_id: string;
  status: string;
  duplicate: boolean;
  subscribed: boolean;
}

export type TerminalStatus = 'completed' | 'failed' | 'cancelled';

export interface TaskRelayClientOptions {
  /** WebSocket endpoint, e.g. ws://127.0.0.1:4311/ws */
  wsUrl: string;
  /** HTTP base, e.g. http://127.0.0.1:4311 */
  httpUrl: string;
  tenantId: string;
  sessionId?: string;
  reconnect?: Partial<ReconnectOptions>;
  headers?: Record<string, string>;
  fetchImpl?: typeof fetch;
  onMessage?: (message: RelayMessage) => void;
  onReconnecting?: (info: { attempt: number; delayMs: number }) => void;
  /** Reconnect attempts ran out; the client is closed. */
  onFatal?: (error: Error) => void;
  onError?: (error: unknown) => void;
}

const TERMINAL = new Set<string>(['completed', 'failed', 'cancelled']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseRelayMessage(raw: string): RelayMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(json) || typeof json.message_id !== 'string' || !isRecord(json.type) || !isRecord(json.data)) return null;
  const { domain, action } = json.type;
  if (typeof domain !== 'string' || typeof action !== 'string') return null;
  return {
    message_id: json.message_id,
    correlation_id: typeof json.correlation_id === 'string' ? json.correlation_id : null,
    type: { domain, action },
    schema_version: typeof json.schema_version === 'string' ? json.schema_version : '1.0',
    created_at: typeof json.created_at === 'string' ? json.created_at : new Date().toISOString(),
    tenant_id: typeof json.tenant_id === 'string' ? json.tenant_id : null,
    source_service: typeof json.source_service === 'string' ? json.source_service : 'gateway',
    data: json.data,
  };
}

/** Task id of a message that ends a task, or null. */
export function terminalTaskId(message: RelayMessage): string | null {
  const { task_id, status } = message.data;
  if (typeof task_id !== 'string' || typeof status !== 'string') return null;
  return TERMINAL.has(status) ? task_id : null;
}

interface Waiter {
  resolve: (message: RelayMessage) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class TaskRelayClient {
  private socket: WebSocket | null = null;
  private connectionId: string | null = null;
  private lastMessageId: string | null = null;
  private tracked = new Set<string>();
  private results = new Map<string, RelayMessage>();
  private waiters = new Map<string, Waiter[]>();
  private reconnectTimer?: NodeJS.Timeout;
  private attempts = 0;
  private closed = false;
  private hasConnected = false;
  private readonly reconnect: ReconnectOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly sessionId: string;

  constructor(private readonly options: TaskRelayClientOptions) {
    this.reconnect = { ...DEFAULT_RECONNECT, ...options.reconnect };
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sessionId = options.sessionId ?? randomUUID();
  }

  get id(): string | null {
    return this.connectionId;
  }

  /** Opens the socket and resolves once the gateway assigned a connection id. */
  connect(): Promise<string> {
    this.closed = false;
    return this.open();
  }

  async submitTask(opts: SubmitOptions): Promise<SubmitResponse> {
    const headers: Record<string, string> = {
      'content-type': 'application/json',
      'x-tenant-id': this.options.tenantId,
      ...this.options.headers,
    };
    if (this.connectionId) headers['x-connection-id'] = this.connectionId;
    if (opts.idempotencyKey) headers['idempotency-key'] = opts.idempotencyKey;

    const res = await this.fetchImpl(`${this.options.httpUrl.replace(/\/$/, '')}/tasks`, {
      method: 'POST',
      headers,
      body: JSON.stringify({ type: opts.type, payload: opts.payload, priority: opts.priority, metadata: opts.metadata }),
    });
    const body: unknown = await res.json();
    if (!res.ok || !isRecord(body) || !isRecord(body.data) || typeof body.data.task_id !== 'string') {
      const error = isRecord(body) && isRecord(body.error) && typeof body.error.error_code === 'string' ? body.error.error_code : `HTTP_${res.status}`;
      throw new Error(`submit failed: ${error}`);
    }
    const data = body.data;
    const taskId = typeof data.task_id === 'string' ? data.task_id : '';
    this.tracked.add(taskId);
    return {
      task_id: taskId,
      status: typeof data.status === 'string' ? data.status : 'pending',
      duplicate: data.duplicate === true,
      subscribed: data.subscribed === true,
    };
  }

  /** Resolves with the message that ended the task. */
  waitFor(taskId: string, timeoutMs = 30_000): Promise<RelayMessage> {
    const done = this.results.get(taskId);
    if (done) return Promise.resolve(done);
    this.tracked.add(taskId);
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.dropWaiter(taskId, waiter);
        reject(new Error(`timed out waiting for task ${taskId}`));
      }, timeoutMs);
      const waiter: Waiter = { resolve, reject, timer };
      const list = this.waiters.get(taskId) ?? [];
      list.push(waiter);
      this.waiters.set(taskId, list);
    });
  }

  send(domain: string, action: string, data: Record<string, unknown>): string {
    const messageId = randomUUID();
    const frame = {
      message_id: messageId,
      correlation_id: null,
      type: { domain, action },
      schema_version: '1.0',
      created_at: new Date().toISOString(),
      tenant_id: this.options.tenantId,
      source_service: 'client',
      data,
    };
    if (this.socket?.readyState !== WebSocket.OPEN) throw new Error('socket is not open');
    this.socket.send(JSON.stringify(frame));
    return messageId;
  }

  cancel(taskId: string): string {
    return this.send('workflow', 'cancel', { task_id: taskId });
  }

  sync(): string {
    return this.send('session', 'sync', {
      task_ids: Array.from(this.tracked),
      ...(this.lastMessageId ? { last_message_id: this.lastMessageId } : {}),
    });
  }

  /** Drops the socket without closing the client, as a network failure would. */
  simulateDrop(): void {
    this.socket?.terminate();
  }

  close(): void {
    this.closed = true;
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.socket?.close(1000, 'client closed');
    this.socket = null;
    this.failWaiters(new Error('client closed'));
  }

  private open(): Promise<string> {
    const url = new URL(this.options.wsUrl);
    url.searchParams.set('tenant_id', this.options.tenantId);
    url.searchParams.set('session_id', this.sessionId);

    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url, { headers: this.options.headers });
      this.socket = socket;
      let settled = false;

      socket.on('message', (data) => {
        const message = parseRelayMessage(String(data));
        if (!message) return;
        if (!settled && message.type.domain === 'session' && message.type.action === 'status_update'
          && typeof message.data.connection_id === 'string') {
          settled = true;
          this.connectionId = message.data.connection_id;
          this.attempts = 0;
          if (this.hasConnected && this.tracked.size > 0) this.sync();
          this.hasConnected = true;
          resolve(message.data.connection_id);
          return;
        }
        this.onMessage(message);
      });

      socket.on('error', (err) => {
        if (!settled) {
          settled = true;
          reject(err);
        }
      });

      socket.on('close', () => {
        if (this.socket === socket) this.socket = null;
        this.connectionId = null;
        if (!settled) {
          settled = true;
          reject(new Error('socket closed before handshake'));
        }
        if (!this.closed && this.hasConnected) this.scheduleReconnect();
      });
    });
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;
    this.attempts++;
    if (this.attempts > this.reconnect.maxAttempts) {
      const error = new Error(`reconnect failed after ${this.reconnect.maxAttempts} attempts`);
      this.close();
      this.options.onFatal?.(error);
      return;
    }
    const delayMs = reconnectDelay(this.attempts, this.reconnect);
    this.options.onReconnecting?.({ attempt: this.attempts, delayMs });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      if (this.closed) return;
      // A failed attempt closes the socket, which schedules the next one
      this.open().catch((err: unknown) => this.options.onError?.(err));
    }, delayMs);
  }

  private onMessage(message: RelayMessage): void {
    this.lastMessageId = message.message_id;
    this.options.onMessage?.(message);

    const taskId = terminalTaskId(message);
    if (!taskId || this.results.has(taskId)) return;
    this.results.set(taskId, message);
    this.tracked.delete(taskId);
    for (const waiter of this.waiters.get(taskId) ?? []) {
      clearTimeout(waiter.timer);
      waiter.resolve(message);
    }
    this.waiters.delete(taskId);
  }

  private dropWaiter(taskId: string, waiter: Waiter): void {
    const list = (this.waiters.get(taskId) ?? []).filter((w) => w !== waiter);
    if (list.length > 0) this.waiters.set(taskId, list);
    else this.waiters.delete(taskId);
  }

  private failWaiters(error: Error): void {
    for (const list of this.waiters.values()) {
      for (const waiter of list) {
        clearTimeout(waiter.timer);
        waiter.reject(error);
      }
    }
    this.waiters.clear();
  }
}
