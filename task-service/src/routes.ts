import type { FastifyInstance, FastifyPluginAsync, FastifyRequest, preHandlerHookHandler } from 'fastify';
import { ConflictError, success } from '../../src/errors.js';
import type { RequestContext } from '../../src/lib/context.js';
import { cancelTask, ownedRecord } from './cancel.js';
import { requireTenant, tenantOf } from './middleware/auth.js';
import { tenantRateLimit, type TenantRateLimiter } from './middleware/rate-limit.js';
import { parseRequest } from './middleware/validation.js';
import type { TaskProducer } from './producer/index.js';
import type { TaskStore } from './repositories/base.js';
import { DeadLetterQuerySchema, SubmitTaskSchema, TaskParamsSchema } from './schemas/task.js';
import { toStatusView, type TaskMetadata, type TaskRecord } from './types/task.js';

export interface TaskRoutesOptions {
  producer: TaskProducer;
  store: TaskStore;
  rateLimit?: { limiter: TenantRateLimiter; burst: number };
  /** Subscribes the submitting WebSocket connection (x-connection-id) to the task. */
  onSubmitted?: (connectionId: string, tenantId: string, taskId: string) => Promise<boolean>;
  /** A pending task was cancelled without reaching a worker. */
  onCancelled?: (record: TaskRecord) => Promise<void>;
  /** A running task was flagged for cancellation. */
  onCancelRequested?: (taskId: string) => void;
}

function singleHeader(request: FastifyRequest, name: string): string | undefined {
  const raw = request.headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value && value.trim() ? value.trim() : undefined;
}

/** Context headers become metadata unless the body already sets them. */
function withContext(metadata: TaskMetadata, context: RequestContext): TaskMetadata {
  const merged: TaskMetadata = { ...metadata };
  const pairs: Array<[string, string | undefined]> = [
    ['agent_id', context.agentId],
    ['conversation_id', context.conversationId],
    ['collection_id', context.collectionId],
    ['correlation_id', context.correlationId],
  ];
  for (const [key, value] of pairs) {
    if (value !== undefined && merged[key] === undefined) merged[key] = value;
  }
  return merged;
}

export const taskRoutes: FastifyPluginAsync<TaskRoutesOptions> = async (app: FastifyInstance, opts) => {
  const { producer, store } = opts;

  const guards: preHandlerHookHandler[] = [requireTenant];
  if (opts.rateLimit) guards.push(tenantRateLimit(opts.rateLimit.limiter, opts.rateLimit.burst));

  // POST /tasks - submit a task
  app.post('/tasks', { preHandler: guards }, async (request, reply) => {
    const context = tenantOf(request);
    const body = parseRequest(SubmitTaskSchema, request.body, 'body');

    const submitted = await producer.submit({
      type: body.type,
      tenantId: context.tenantId,
      payload: body.payload,
      metadata: withContext(body.metadata, context),
      priority: body.priority,
      idempotencyKey: singleHeader(request, 'idempotency-key') ?? body.idempotency_key,
      maxAttempts: body.max_attempts,
    });

    let status = 'pending';
    if (submitted.duplicate) {
      const existing = await store.peekStatus(context.tenantId, submitted.taskId);
      if (existing) status = existing.envelope.status;
    }

    let subscribed = false;
    const connectionId = singleHeader(request, 'x-connection-id');
    if (connectionId && opts.onSubmitted) {
      subscribed = await opts.onSubmitted(connectionId, context.tenantId, submitted.taskId);
    }

    reply.code(202);
    return success({
      task_id: submitted.taskId,
      type: submitted.type,
      status,
      duplicate: submitted.duplicate,
      subscribed,
    }, submitted.duplicate ? 'Task already submitted' : 'Task accepted');
  });

  // GET /tasks/dead-letter - list dead-lettered tasks for the tenant
  app.get('/tasks/dead-letter', { preHandler: [requireTenant] }, async (request) => {
    const { tenantId } = tenantOf(request);
    const { limit } = parseRequest(DeadLetterQuerySchema, request.query, 'query');
    const records = await store.listDeadLetter(tenantId, limit);
    return success({ tasks: records.map(toStatusView) });
  });

  // GET /tasks/:taskId - task status
  app.get('/tasks/:taskId', { preHandler: [requireTenant] }, async (request) => {
    const { tenantId } = tenantOf(request);
    const { taskId } = parseRequest(TaskParamsSchema, request.params, 'params');
    const record = await ownedRecord(store, tenantId, taskId);
    return success(toStatusView(record));
  });

  // POST /tasks/:taskId/cancel - cancel a pending or running task
  app.post('/tasks/:taskId/cancel', { preHandler: [requireTenant] }, async (request, reply) => {
    const { tenantId } = tenantOf(request);
    const { taskId } = parseRequest(TaskParamsSchema, request.params, 'params');
    const result = await cancelTask(store, tenantId, taskId);
    if (result.outcome === 'cancelled' && opts.onCancelled) {
      await opts.onCancelled(result.record).catch((err: unknown) => {
        request.log.warn({ err, task_id: taskId }, 'cancel notification failed');
      });
    }
    if (result.outcome === 'cancel_requested') opts.onCancelRequested?.(taskId);

    reply.code(202);
    return success({
      task_id: taskId,
      status: result.record.envelope.status,
      cancel_requested: result.outcome === 'cancel_requested',
    }, 'Cancel request accepted');
  });

  // POST /tasks/:taskId/requeue - resubmit a dead-lettered task
  app.post('/tasks/:taskId/requeue', { preHandler: guards }, async (request, reply) => {
    const { tenantId } = tenantOf(request);
    const { taskId } = parseRequest(TaskParamsSchema, request.params, 'params');
    await ownedRecord(store, tenantId, taskId);

    const requeued = await producer.requeueDeadLetter(tenantId, taskId);
    if (!requeued) {
      throw new ConflictError('Task is not in the dead-letter queue');
    }
    reply.code(202);
    return success({ task_id: requeued.taskId, requeued_from: taskId, status: 'pending' }, 'Task requeued');
  });
};
