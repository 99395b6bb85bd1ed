import { z } from 'zod';
import { ValidationError } from '../../../src/errors.js';
import { fmt } from '../../../src/lib/error-messages.js';
import type { MessageAction, MessageDomain } from '../../../edge-gateway/src/messages.js';
import type { TaskRecord } from '../types/task.js';

export const TaskStatusSchema = z.enum(['pending', 'processing', 'completed', 'failed', 'cancelled']);

// --- Payload variants, one per task type ---

export const SingleEmbeddingPayload = z.object({
  text: z.string().min(1).max(32_000),
  model: z.string().min(1).optional(),
  collection_id: z.string().min(1).optional(),
});

export const BatchEmbeddingsPayload = z.object({
  texts: z.array(z.string().min(1)).min(1).max(2048),
  model: z.string().min(1).optional(),
  collection_id: z.string().min(1).optional(),
  document_id: z.string().min(1).optional(),
});

export const RagQueryPayload = z.object({
  query: z.string().min(1).max(8_000),
  collection_ids: z.array(z.string().min(1)).max(20).default([]),
  top_k: z.number().int().min(1).max(50).default(5),
  conversation_id: z.string().min(1).optional(),
});

export const ToolExecutionPayload = z.object({
  tool_name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
  execution_id: z.string().min(1).optional(),
  agent_id: z.string().min(1).optional(),
});

export const ToolResultPayload = z.object({
  tool_call_id: z.string().min(1),
  result: z.unknown(),
  is_error: z.boolean().default(false),
  execution_id: z.string().min(1).optional(),
});

export const DocumentIngestionPayload = z.object({
  document_id: z.string().min(1),
  collection_id: z.string().min(1),
  source_url: z.string().url().optional(),
  content: z.string().min(1).optional(),
}).refine((p) => p.source_url !== undefined || p.content !== undefined, {
  message: 'source_url or content is required',
  path: ['content'],
});

export interface TaskPayloadMap {
  single_embedding: z.infer<typeof SingleEmbeddingPayload>;
  batch_embeddings: z.infer<typeof BatchEmbeddingsPayload>;
  rag_query: z.infer<typeof RagQueryPayload>;
  tool_execution: z.infer<typeof ToolExecutionPayload>;
  tool_result: z.infer<typeof ToolResultPayload>;
  document_ingestion: z.infer<typeof DocumentIngestionPayload>;
}

export type TaskType = keyof TaskPayloadMap;
export type TaskPayload = TaskPayloadMap[TaskType];

export const TASK_PAYLOAD_SCHEMAS: { [K in TaskType]: z.ZodType<TaskPayloadMap[K], z.ZodTypeDef, unknown> } = {
  single_embedding: SingleEmbeddingPayload,
  batch_embeddings: BatchEmbeddingsPayload,
  rag_query: RagQueryPayload,
  tool_execution: ToolExecutionPayload,
  tool_result: ToolResultPayload,
  document_ingestion: DocumentIngestionPayload,
};

export type ServiceName = 'embedding' | 'query' | 'agent_execution' | 'ingestion';

export interface TaskTypeDefinition {
  service: ServiceName;
  /** Message a subscribed client receives when the task completes. */
  notify: { domain: MessageDomain; action: MessageAction };
  executionTimeoutMs: number;
  /** Age after which a non-terminal task is swept to failed. */
  maxLifetimeMs: number;
}

export const TASK_TYPES: Record<TaskType, TaskTypeDefinition> = {
  single_embedding: {
    service: 'embedding',
    notify: { domain: 'chat', action: 'completed' },
    executionTimeoutMs: 30_000,
    maxLifetimeMs: 2 * 60_000,
  },
  batch_embeddings: {
    service: 'embedding',
    notify: { domain: 'workflow', action: 'status_update' },
    executionTimeoutMs: 120_000,
    maxLifetimeMs: 10 * 60_000,
  },
  rag_query: {
    service: 'query',
    notify: { domain: 'chat', action: 'completed' },
    executionTimeoutMs: 120_000,
    maxLifetimeMs: 5 * 60_000,
  },
  tool_execution: {
    service: 'agent_execution',
    notify: { domain: 'tool', action: 'result' },
    executionTimeoutMs: 60_000,
    maxLifetimeMs: 5 * 60_000,
  },
  tool_result: {
    service: 'agent_execution',
    notify: { domain: 'chat', action: 'completed' },
    executionTimeoutMs: 120_000,
    maxLifetimeMs: 5 * 60_000,
  },
  document_ingestion: {
    service: 'ingestion',
    notify: { domain: 'workflow', action: 'status_update' },
    executionTimeoutMs: 5 * 60_000,
    maxLifetimeMs: 30 * 60_000,
  },
};

export const SERVICES: readonly ServiceName[] = ['embedding', 'query', 'agent_execution', 'ingestion'];

export function isTaskType(value: string): value is TaskType {
  return Object.prototype.hasOwnProperty.call(TASK_TYPES, value);
}

export const TASK_TYPE_LIST: readonly TaskType[] = [
  'single_embedding',
  'batch_embeddings',
  'rag_query',
  'tool_execution',
  'tool_result',
  'document_ingestion',
];

export function taskTypesForService(service: string): TaskType[] {
  return TASK_TYPE_LIST.filter((t) => TASK_TYPES[t].service === service);
}

export function formatZodIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }));
}

/** Decodes a payload for its variant; unknown types and bad payloads are ValidationErrors. */
export function decodePayload<K extends TaskType>(type: K, raw: unknown): TaskPayloadMap[K] {
  const parsed = TASK_PAYLOAD_SCHEMAS[type].safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid payload for task type ${type}`, {
      details: { issues: formatZodIssues(parsed.error) },
    });
  }
  return parsed.data;
}

export function requireTaskType(type: string): TaskType {
  if (!isTaskType(type)) {
    throw new ValidationError(fmt('UNKNOWN_TASK_TYPE', { type }), { code: 'UNKNOWN_TASK_TYPE' });
  }
  return type;
}

// --- HTTP request schemas ---

export const SubmitTaskSchema = z.object({
  type: z.string().min(1),
  payload: z.unknown(),
  metadata: z.record(z.unknown()).default({}),
  priority: z.number().int().min(0).max(9).default(5),
  idempotency_key: z.string().min(1).max(256).optional(),
  max_attempts: z.number().int().min(1).max(10).optional(),
});

export const TaskParamsSchema = z.object({
  taskId: z.string().min(1).max(128),
});

export const DeadLetterQuerySchema = z.object({
  limit: z.preprocess(
    (val) => val === undefined ? 50 : Number(val),
    z.number().int().min(1).max(200)
  ).default(50),
});

export type SubmitTaskRequest = z.infer<typeof SubmitTaskSchema>;
export type TaskParams = z.infer<typeof TaskParamsSchema>;

// --- Stored record (Redis) ---

export const TaskErrorSchema = z.object({
  error_code: z.string(),
  error_message: z.string(),
  retryable: z.boolean(),
  type: z.enum(['BAD_INPUT', 'TIMEOUT', 'RETRYABLE', 'INTERNAL', 'RATE_LIMIT', 'BREAKER_OPEN', 'UNAUTHORIZED', 'FORBIDDEN', 'NOT_FOUND', 'CONFLICT', 'UPSTREAM']).optional(),
  cause: z.object({ error_code: z.string(), error_message: z.string() }).optional(),
});

export const TaskEnvelopeSchema = z.object({
  task_id: z.string().min(1),
  tenant_id: z.string().min(1),
  type: z.string().min(1),
  status: TaskStatusSchema,
  priority: z.number().int().min(0).max(9),
  created_at: z.string(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
  metadata: z.record(z.unknown()),
  payload: z.unknown(),
  idempotency_key: z.string().nullable(),
  attempt_count: z.number().int().min(0),
}).transform((e) => ({ ...e, payload: e.payload }));

const StoredTaskRecordSchema = z.object({
  envelope: TaskEnvelopeSchema,
  service: z.string(),
  maxAttempts: z.number().int().min(1),
  runAt: z.number(),
  leaseToken: z.string().nullable(),
  leaseExpiresAt: z.number().nullable(),
  cancelRequested: z.boolean(),
  deadlineAt: z.number().nullable(),
  result: z.unknown(),
  error: TaskErrorSchema.nullable(),
  updatedAt: z.number(),
}).transform((r) => ({ ...r, result: r.result ?? null }));

export function parseStoredRecord(raw: string): TaskRecord {
  return StoredTaskRecordSchema.parse(JSON.parse(raw));
}
