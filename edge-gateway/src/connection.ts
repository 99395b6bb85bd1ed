import { randomUUID } from 'node:crypto';
import WebSocket from 'ws';
import type { BaseLogger } from '../../src/logger.js';
import type { WsMessage } from './messages.js';
import type { DeliveryTarget } from './registry.js';

/** Close code sent when a slow client overflows its outbound queue. */
export const CLOSE_TRY_AGAIN_LATER = 1013;

export interface ConnectionOptions {
  tenantId: string;
  sessionId: string | null;
  maxQueue: number;
  heartbeatMs: number;
  logger: BaseLogger;
}

/**
 * One client WebSocket. Outbound frames go through a bounded queue that is
 * drained one send at a time; the AbortController stops every timer on close.
 */
export class ClientConnection implements DeliveryTarget {
  readonly id = randomUUID();
  readonly tenantId: string;
  readonly sessionId: string | null;
  readonly controller = new AbortController();
  readonly connectedAt = Date.now();

  private queue: string[] = [];
  private sending = false;
  private alive = true;
  private sent = 0;

  constructor(private readonly socket: WebSocket, private readonly options: ConnectionOptions) {
    this.tenantId = options.tenantId;
    this.sessionId = options.sessionId;

    socket.on('pong', () => {
      this.alive = true;
    });
    socket.once('close', () => this.controller.abort());

    const heartbeat = setInterval(() => this.beat(), options.heartbeatMs);
    this.controller.signal.addEventListener('abort', () => {
      clearInterval(heartbeat);
      this.queue = [];
    }, { once: true });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  isOpen(): boolean {
    return !this.controller.signal.aborted && this.socket.readyState === WebSocket.OPEN;
  }

  queued(): number {
    return this.queue.length;
  }

  sentCount(): number {
    return this.sent;
  }

  send(message: WsMessage): boolean {
    if (!this.isOpen()) return false;
    if (this.queue.length >= this.options.maxQueue) {
      this.options.logger.warn({ connection_id: this.id, queued: this.queue.length }, 'outbound queue overflow, closing');
      this.close(CLOSE_TRY_AGAIN_LATER, 'outbound queue overflow');
      return false;
    }
    this.queue.push(JSON.stringify(message));
    this.pump();
    return true;
  }

  close(code = 1000, reason = ''): void {
    if (this.controller.signal.aborted) return;
    this.controller.abort();
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(code, reason);
    }
  }

  private pump(): void {
    if (this.sending || !this.isOpen()) return;
    const frame = this.queue.shift();
    if (frame === undefined) return;

    this.sending = true;
    this.socket.send(frame, (err) => {
      this.sending = false;
      if (err) {
        this.options.logger.warn({ connection_id: this.id, err: err.message }, 'send failed');
        this.close(1011, 'send failed');
        return;
      }
      this.sent++;
      this.pump();
    });
  }

  private beat(): void {
    if (!this.alive) {
      this.options.logger.info({ connection_id: this.id }, 'heartbeat missed, terminating');
      this.controller.abort();
      this.socket.terminate();
      return;
    }
    this.alive = false;
    this.socket.ping();
  }
}
