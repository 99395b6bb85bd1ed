import type { IncomingMessage, Server } from 'node:http';
import type { Duplex } from 'node:stream';
import WebSocket, { WebSocketServer, type RawData } from 'ws';
import { AppError, toErrorBody } from '../../src/errors.js';
import { CONTEXT_HEADERS } from '../../src/lib/context.js';
import type { BaseLogger } from '../../src/logger.js';
import { decConnections, incConnections, recordDelivery, type DeliveryOutcome } from '../../src/metrics.js';
import { tokensMatch } from '../../task-service/src/middleware/auth.js';
import type { TaskStatus } from '../../task-service/src/types/task.js';
import { ClientConnection } from './connection.js';
import {
  CancelDataSchema,
  SyncDataSchema,
  ToolResultDataSchema,
  createMessage,
  messageKind,
  parseMessage,
  parseTaskEvent,
  type TaskEvent,
  type WsMessage,
} from './messages.js';
import type { TaskRegistry } from './registry.js';
import type { z } from 'zod';

export type ToolResultData = z.infer<typeof ToolResultDataSchema>;

/** Operations the gateway delegates to the task layer. */
export interface GatewayHooks {
  cancel(tenantId: string, taskId: string): Promise<{ status: TaskStatus; cancelRequested: boolean }>;
  /** Submits a client tool result as a task; returns its id. */
  submitToolResult(tenantId: string, data: ToolResultData, correlationId: string | null): Promise<string>;
}

export interface GatewayOptions {
  registry: TaskRegistry;
  hooks: GatewayHooks;
  logger: BaseLogger;
  heartbeatMs: number;
  outboundQueueMax: number;
  registryTtlMs: number;
  sweepIntervalMs: number;
  /** Shared secret for the internal channel; without one the channel stays closed. */
  internalToken?: string;
  clientPath?: string;
  internalPath?: string;
}

function rejectUpgrade(socket: Duplex, status: number, reason: string): void {
  socket.write(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  socket.destroy();
}

function frameText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function errorMessage(error: unknown, tenantId: string | null, correlationId: string | null): WsMessage {
  const body = toErrorBody(error);
  return createMessage('system', 'error', {
    error_code: body.error_code,
    error_message: body.error_message,
    severity: body.retryable ? 'warning' : 'error',
    is_recoverable: body.retryable,
  }, { tenantId, correlationId });
}

/**
 * Client WebSocket endpoint plus the internal channel workers publish task
 * events on. Both share the HTTP server through `noServer` upgrades.
 */
export class WebSocketGateway {
  private readonly clients = new WebSocketServer({ noServer: true });
  private readonly internal = new WebSocketServer({ noServer: true });
  private readonly clientPath: string;
  private readonly internalPath: string;
  private sweepTimer?: NodeJS.Timeout;
  private server?: Server;

  constructor(private readonly options: GatewayOptions) {
    this.clientPath = options.clientPath ?? '/ws';
    this.internalPath = options.internalPath ?? '/internal/ws';
  }

  attach(server: Server): void {
    this.server = server;
    server.on('upgrade', this.onUpgrade);
  }

  start(): void {
    this.sweepTimer = setInterval(() => {
      this.options.registry.expireUnclaimed(this.options.registryTtlMs).catch((err: unknown) => {
        this.options.logger.warn({ err }, 'registry sweep failed');
      });
    }, this.options.sweepIntervalMs);
  }

  async stop(): Promise<void> {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.server?.off('upgrade', this.onUpgrade);
    for (const socket of this.clients.clients) socket.close(1001, 'server shutdown');
    for (const socket of this.internal.clients) socket.close(1001, 'server shutdown');
    await Promise.all([
      new Promise<void>((resolve) => this.clients.close(() => resolve())),
      new Promise<void>((resolve) => this.internal.close(() => resolve())),
    ]);
  }

  connectionCount(): number {
    return this.clients.clients.size;
  }

  /** Routes one task event from a worker to its subscriber. */
  async handleTaskEvent(event: TaskEvent): Promise<DeliveryOutcome> {
    if (event.kind === 'completion') return this.options.registry.onCompletion(event);
    const outcome = await this.options.registry.relay(event);
    recordDelivery(outcome);
    return outcome;
  }

  /** Subscribes a local connection to a task submitted over HTTP. */
  async subscribeConnection(connectionId: string, tenantId: string, taskId: string): Promise<boolean> {
    const connection = this.options.registry.connection(connectionId);
    if (!connection) return false;
    try {
      await this.options.registry.subscribe(taskId, tenantId, connection);
      return true;
    } catch (error) {
      if (!(error instanceof AppError)) throw error;
      this.options.logger.warn({ connection_id: connectionId, task_id: taskId, code: error.code }, 'subscribe rejected');
      return false;
    }
  }

  private readonly onUpgrade = (request: IncomingMessage, socket: Duplex, head: Buffer): void => {
    const url = new URL(request.url ?? '/', 'http://gateway.local');

    if (url.pathname === this.clientPath) {
      const header = request.headers[CONTEXT_HEADERS.tenantId];
      const tenantId = (url.searchParams.get('tenant_id') ?? (Array.isArray(header) ? header[0] : header) ?? '').trim();
      if (!tenantId) {
        rejectUpgrade(socket, 401, 'Unauthorized');
        return;
      }
      const sessionId = url.searchParams.get('session_id');
      this.clients.handleUpgrade(request, socket, head, (ws) => this.onClient(ws, tenantId, sessionId));
      return;
    }

    if (url.pathname === this.internalPath) {
      if (!this.options.internalToken) {
        this.options.logger.warn('internal channel refused: INTERNAL_TOKEN is not configured');
        rejectUpgrade(socket, 403, 'Forbidden');
        return;
      }
      const raw = request.headers['x-internal-token'];
      const token = Array.isArray(raw) ? raw[0] : raw;
      if (!tokensMatch(token, this.options.internalToken)) {
        rejectUpgrade(socket, 401, 'Unauthorized');
        return;
      }
      this.internal.handleUpgrade(request, socket, head, (ws) => this.onInternal(ws));
      return;
    }

    rejectUpgrade(socket, 404, 'Not Found');
  };

  private onClient(ws: WebSocket, tenantId: string, sessionId: string | null): void {
    const { registry, logger } = this.options;
    const connection = new ClientConnection(ws, {
      tenantId,
      sessionId,
      maxQueue: this.options.outboundQueueMax,
      heartbeatMs: this.options.heartbeatMs,
      logger,
    });
    registry.attach(connection);
    incConnections();
    logger.info({ connection_id: connection.id, tenant_id: tenantId }, 'client connected');

    connection.send(createMessage('session', 'status_update', {
      status: 'connected',
      connection_id: connection.id,
      session_id: sessionId,
      heartbeat_ms: this.options.heartbeatMs,
    }, { tenantId }));

    ws.on('message', (data, isBinary) => {
      if (isBinary) {
        connection.send(errorMessage(new UnsupportedFrame('Binary frames are not supported'), tenantId, null));
        return;
      }
      this.onClientFrame(connection, frameText(data)).catch((err: unknown) => {
        logger.error({ err, connection_id: connection.id }, 'client frame failed');
        connection.send(errorMessage(err, tenantId, null));
      });
    });

    ws.once('close', (code) => {
      decConnections();
      logger.info({ connection_id: connection.id, code }, 'client disconnected');
      registry.detach(connection.id).catch((err: unknown) => {
        logger.warn({ err, connection_id: connection.id }, 'unsubscribe on close failed');
      });
    });
  }

  private async onClientFrame(connection: ClientConnection, raw: string): Promise<void> {
    const parsed = parseMessage(raw);
    if (!parsed.ok) {
      connection.send(errorMessage(new UnsupportedFrame(parsed.reason, 'BAD_FRAME'), connection.tenantId, null));
      return;
    }
    const message = parsed.message;
    const reply = { tenantId: connection.tenantId, correlationId: message.message_id };

    if (message.tenant_id !== null && message.tenant_id !== connection.tenantId) {
      connection.send(createMessage('system', 'error', {
        error_code: 'TENANT_MISMATCH',
        error_message: 'Message tenant does not match the connection',
        severity: 'error',
        is_recoverable: false,
      }, reply));
      return;
    }

    try {
      switch (messageKind(message)) {
        case 'system.ping':
          connection.send(createMessage('system', 'status_update', { status: 'pong', server_time: new Date().toISOString() }, reply));
          return;

        case 'workflow.cancel': {
          const { task_id } = decode(CancelDataSchema, message.data);
          const result = await this.options.hooks.cancel(connection.tenantId, task_id);
          connection.send(createMessage('workflow', 'status_update', {
            task_id,
            status: result.status,
            cancel_requested: result.cancelRequested,
          }, reply));
          return;
        }

        case 'session.sync': {
          const data = decode(SyncDataSchema, message.data);
          const report = await this.options.registry.sync(connection, data.task_ids);
          connection.send(createMessage('session', 'sync', {
            connection_id: connection.id,
            last_message_id: data.last_message_id ?? null,
            tasks: report.tasks,
          }, reply));
          return;
        }

        case 'tool.result': {
          const data = decode(ToolResultDataSchema, message.data);
          const taskId = await this.options.hooks.submitToolResult(connection.tenantId, data, message.correlation_id);
          await this.options.registry.subscribe(taskId, connection.tenantId, connection);
          connection.send(createMessage('workflow', 'status_update', {
            task_id: taskId,
            status: 'pending',
            tool_call_id: data.tool_call_id,
          }, reply));
          return;
        }

        default:
          throw new UnsupportedFrame(`Unsupported action ${messageKind(message)}`, 'UNSUPPORTED_ACTION');
      }
    } catch (error) {
      if (!(error instanceof AppError)) throw error;
      connection.send(errorMessage(error, connection.tenantId, message.message_id));
    }
  }

  private onInternal(ws: WebSocket): void {
    const { logger } = this.options;
    logger.info('worker channel connected');

    ws.on('message', (data) => {
      const parsed = parseMessage(frameText(data));
      if (!parsed.ok) {
        logger.warn({ reason: parsed.reason }, 'dropping malformed internal frame');
        return;
      }
      const event = parseTaskEvent(parsed.message.data);
      if (!event) {
        logger.warn({ kind: messageKind(parsed.message) }, 'dropping internal frame without a task event');
        return;
      }
      this.handleTaskEvent(event).catch((err: unknown) => {
        logger.error({ err, task_id: event.task_id }, 'task event delivery failed');
      });
    });
    ws.on('error', (err) => logger.warn({ err: err.message }, 'worker channel error'));
  }
}

class UnsupportedFrame extends AppError {
  readonly type = 'BAD_INPUT';
  constructor(message: string, code = 'UNSUPPORTED_FRAME') {
    super(message, code);
  }
}

function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new UnsupportedFrame(parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; '), 'BAD_FRAME');
  }
  return parsed.data;
}
