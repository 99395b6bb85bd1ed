import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { TaskErrorSchema } from '../../task-service/src/schemas/task.js';
import type { TaskError, TaskStatus, TerminalStatus } from '../../task-service/src/types/task.js';

export const SCHEMA_VERSION = '1.0';

export const MESSAGE_DOMAINS = ['chat', 'tool', 'workflow', 'system', 'session'] as const;
export const MESSAGE_ACTIONS = [
  'stream', 'completed', 'status_update', 'execute', 'result', 'error', 'cancel', 'ping', 'sync',
] as const;

export type MessageDomain = (typeof MESSAGE_DOMAINS)[number];
export type MessageAction = (typeof MESSAGE_ACTIONS)[number];

export const MessageTypeSchema = z.object({
  domain: z.enum(MESSAGE_DOMAINS),
  action: z.enum(MESSAGE_ACTIONS),
});

export const WsMessageSchema = z.object({
  message_id: z.string().min(1),
  correlation_id: z.string().min(1).nullable().default(null),
  type: MessageTypeSchema,
  schema_version: z.string().default(SCHEMA_VERSION),
  created_at: z.string().default(() => new Date().toISOString()),
  tenant_id: z.string().min(1).nullable().default(null),
  source_service: z.string().default('client'),
  data: z.record(z.unknown()).default({}),
});

export type WsMessage = z.infer<typeof WsMessageSchema>;

export interface MessageOptions {
  tenantId?: string | null;
  correlationId?: string | null;
  sourceService?: string;
}

export function createMessage(
  domain: MessageDomain,
  action: MessageAction,
  data: Record<string, unknown>,
  options: MessageOptions = {},
): WsMessage {
  return {
    message_id: randomUUID(),
    correlation_id: options.correlationId ?? null,
    type: { domain, action },
    schema_version: SCHEMA_VERSION,
    created_at: new Date().toISOString(),
    tenant_id: options.tenantId ?? null,
    source_service: options.sourceService ?? 'gateway',
    data,
  };
}

export function messageKind(message: WsMessage): `${MessageDomain}.${MessageAction}` {
  return `${message.type.domain}.${message.type.action}`;
}

/** Parses one text frame; null when it is not JSON or not an envelope. */
export function parseMessage(raw: string): { ok: true; message: WsMessage } | { ok: false; reason: string } {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'Frame is not valid JSON' };
  }
  const parsed = WsMessageSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ') };
  }
  return { ok: true, message: parsed.data };
}

// --- Client -> gateway action data ---

export const CancelDataSchema = z.object({
  task_id: z.string().min(1),
});

export const SyncDataSchema = z.object({
  task_ids: z.array(z.string().min(1)).max(500).default([]),
  last_message_id: z.string().min(1).optional(),
});

export const ToolResultDataSchema = z.object({
  tool_call_id: z.string().min(1),
  result: z.unknown(),
  is_error: z.boolean().default(false),
  execution_id: z.string().min(1).optional(),
  priority: z.number().int().min(0).max(9).default(5),
});

// --- Worker -> gateway task events ---

const CompletionEventSchema = z.object({
  kind: z.literal('completion'),
  task_id: z.string().min(1),
  tenant_id: z.string().min(1),
  type: z.string().min(1),
  status: z.enum(['completed', 'failed', 'cancelled']),
  result: z.unknown(),
  error: TaskErrorSchema.nullable(),
  completed_at: z.string(),
  correlation_id: z.string().nullable().default(null),
}).transform((e) => ({ ...e, result: e.result ?? null }));

const ProgressEventSchema = z.object({
  kind: z.literal('progress'),
  task_id: z.string().min(1),
  tenant_id: z.string().min(1),
  status: z.enum(['pending', 'processing']).default('processing'),
  progress: z.number().min(0).max(1),
  status_message: z.string().optional(),
});

const StreamEventSchema = z.object({
  kind: z.literal('stream'),
  task_id: z.string().min(1),
  tenant_id: z.string().min(1),
  chunk: z.string(),
  sequence_number: z.number().int().min(0),
  is_final: z.boolean().default(false),
});

export const TaskEventSchema = z.union([CompletionEventSchema, ProgressEventSchema, StreamEventSchema]);

export interface CompletionEvent {
  kind: 'completion';
  task_id: string;
  tenant_id: string;
  type: string;
  status: TerminalStatus;
  result: unknown;
  error: TaskError | null;
  completed_at: string;
  correlation_id: string | null;
}

export interface ProgressEvent {
  kind: 'progress';
  task_id: string;
  tenant_id: string;
  status: Extract<TaskStatus, 'pending' | 'processing'>;
  progress: number;
  status_message?: string;
}

export interface StreamEvent {
  kind: 'stream';
  task_id: string;
  tenant_id: string;
  chunk: string;
  sequence_number: number;
  is_final: boolean;
}

export type TaskEvent = CompletionEvent | ProgressEvent | StreamEvent;

/** Frame kind each task event travels as on the internal channel. */
export const TASK_EVENT_FRAMES: Record<TaskEvent['kind'], { domain: MessageDomain; action: MessageAction }> = {
  completion: { domain: 'workflow', action: 'result' },
  progress: { domain: 'chat', action: 'status_update' },
  stream: { domain: 'chat', action: 'stream' },
};

export function taskEventToMessage(event: TaskEvent, sourceService: string): WsMessage {
  const frame = TASK_EVENT_FRAMES[event.kind];
  return createMessage(frame.domain, frame.action, { ...event }, {
    tenantId: event.tenant_id,
    correlationId: event.kind === 'completion' ? event.correlation_id : null,
    sourceService,
  });
}

export function parseTaskEvent(data: Record<string, unknown>): TaskEvent | null {
  const parsed = TaskEventSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}
