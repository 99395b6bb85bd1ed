import { AuthorizationError, ConflictError, NotFoundError } from '../../src/errors.js';
import type { TaskStore } from './repositories/base.js';
import type { CancelResult, TaskRecord } from './types/task.js';

export type AcceptedCancel = Extract<CancelResult, { outcome: 'cancelled' | 'cancel_requested' }>;

export async function ownedRecord(store: TaskStore, tenantId: string, taskId: string): Promise<TaskRecord> {
  const owner = await store.getOwner(taskId);
  if (owner === null) throw new NotFoundError();
  if (owner !== tenantId) throw new AuthorizationError();
  const record = await store.peekStatus(tenantId, taskId);
  if (!record) throw new NotFoundError();
  return record;
}

/**
 * Cancels a pending task outright or flags a running one. Shared by the HTTP
 * route and the gateway's workflow.cancel action.
 */
export async function cancelTask(store: TaskStore, tenantId: string, taskId: string): Promise<AcceptedCancel> {
  await ownedRecord(store, tenantId, taskId);
  const result = await store.cancel(tenantId, taskId);
  switch (result.outcome) {
    case 'not_found':
      throw new NotFoundError();
    case 'already_terminal':
      throw new ConflictError(`Task cannot be cancelled in ${result.record.envelope.status} state`, {
        details: { status: result.record.envelope.status },
      });
    default:
      return result;
  }
}
