import WebSocket from 'ws';
import { TransientInfraError } from '../../../src/errors.js';
import type { BaseLogger } from '../../../src/logger.js';
import { taskEventToMessage, type CompletionEvent, type TaskEvent } from '../../../edge-gateway/src/messages.js';
import type { TaskRecord } from '../types/task.js';
import { isTerminal } from '../types/task.js';

/** Worker side of the notification path. Publishing is best-effort. */
export interface CompletionPublisher {
  publish(event: TaskEvent): Promise<void>;
  close(): Promise<void>;
}

export function completionEvent(record: TaskRecord): CompletionEvent | null {
  const { envelope } = record;
  if (!isTerminal(envelope.status)) return null;
  const correlation = envelope.metadata.correlation_id;
  return {
    kind: 'completion',
    task_id: envelope.task_id,
    tenant_id: envelope.tenant_id,
    type: envelope.type,
    status: envelope.status,
    result: envelope.status === 'completed' ? record.result ?? null : null,
    error: record.error,
    completed_at: envelope.completed_at ?? new Date().toISOString(),
    correlation_id: typeof correlation === 'string' ? correlation : null,
  };
}

export interface TaskEventSink {
  handleTaskEvent(event: TaskEvent): Promise<unknown>;
}

/** Worker and gateway in one process: events go straight to the gateway. */
export class LocalPublisher implements CompletionPublisher {
  constructor(private readonly sink: TaskEventSink) {}

  async publish(event: TaskEvent): Promise<void> {
    await this.sink.handleTaskEvent(event);
  }

  async close(): Promise<void> {}
}

export interface GatewayNotifierOptions {
  url: string;
  token?: string;
  sourceService: string;
  logger: BaseLogger;
  connectTimeoutMs?: number;
}

/** Sends task events to the gateway's internal WebSocket channel. */
export class GatewayNotifier implements CompletionPublisher {
  private socket: WebSocket | null = null;
  private connecting: Promise<WebSocket> | null = null;
  private closed = false;

  constructor(private readonly options: GatewayNotifierOptions) {}

  async publish(event: TaskEvent): Promise<void> {
    const socket = await this.connect();
    const frame = JSON.stringify(taskEventToMessage(event, this.options.sourceService));
    await new Promise<void>((resolve, reject) => {
      socket.send(frame, (err) => (err ? reject(err) : resolve()));
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    const socket = this.socket;
    this.socket = null;
    if (socket && socket.readyState === WebSocket.OPEN) {
      await new Promise<void>((resolve) => {
        socket.once('close', () => resolve());
        socket.close(1000, 'worker shutdown');
      });
    }
  }

  private connect(): Promise<WebSocket> {
    if (this.closed) return Promise.reject(new TransientInfraError('Notifier closed'));
    if (this.socket && this.socket.readyState === WebSocket.OPEN) return Promise.resolve(this.socket);
    if (this.connecting) return this.connecting;

    const headers: Record<string, string> = {};
    if (this.options.token) headers['x-internal-token'] = this.options.token;

    this.connecting = new Promise<WebSocket>((resolve, reject) => {
      const socket = new WebSocket(this.options.url, { headers });
      const timer = setTimeout(() => {
        socket.terminate();
        reject(new TransientInfraError('Gateway connection timed out'));
      }, this.options.connectTimeoutMs ?? 5000);

      socket.once('open', () => {
        clearTimeout(timer);
        this.socket = socket;
        resolve(socket);
      });
      socket.on('error', (err) => {
        clearTimeout(timer);
        this.options.logger.warn({ err: err.message }, 'gateway channel error');
        reject(new TransientInfraError('Gateway unreachable', { cause: err }));
      });
      socket.on('close', (code) => {
        if (this.socket === socket) this.socket = null;
        this.options.logger.debug({ code }, 'gateway channel closed');
      });
    }).finally(() => {
      this.connecting = null;
    });
    return this.connecting;
  }
}

/**
 * Publishes to every gateway instance; succeeds when at least one accepted
 * the event, since only the instance holding the subscriber delivers it.
 */
export class FanoutPublisher implements CompletionPublisher {
  constructor(private readonly publishers: CompletionPublisher[]) {}

  async publish(event: TaskEvent): Promise<void> {
    const results = await Promise.allSettled(this.publishers.map((p) => p.publish(event)));
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (rejected.length === results.length && rejected[0]) throw rejected[0].reason;
  }

  async close(): Promise<void> {
    await Promise.all(this.publishers.map((p) => p.close()));
  }
}
