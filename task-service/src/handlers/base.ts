import { decodePayload, type TaskPayloadMap, type TaskType } from '../schemas/task.js';
import type { TaskEnvelope } from '../types/task.js';

export type TypedEnvelope<K extends TaskType> = TaskEnvelope<K, TaskPayloadMap[K]>;

/** What a running handler may do besides returning its result. */
export interface HandlerContext {
  /** Aborts on cancellation, timeout, lost lease or shutdown. */
  signal: AbortSignal;
  reportProgress: (progress: number, statusMessage?: string) => Promise<void>;
  streamChunk: (chunk: string, isFinal?: boolean) => Promise<void>;
  heartbeat: () => Promise<void>;
}

export interface TaskContext<K extends TaskType> extends HandlerContext {
  task: TypedEnvelope<K>;
}

/**
 * Handlers must tag failures: throw a retryable AppError for transient
 * problems. Anything else fails the task without retry.
 */
export interface TaskHandler<K extends TaskType> {
  execute(context: TaskContext<K>): Promise<unknown>;
}

export type BoundHandler = (task: TaskEnvelope, context: HandlerContext) => Promise<unknown>;

export class TaskHandlerRegistry {
  private handlers = new Map<string, BoundHandler>();

  register<K extends TaskType>(type: K, handler: TaskHandler<K>): this {
    this.handlers.set(type, (task, context) =>
      handler.execute({
        ...context,
        task: { ...task, type, payload: decodePayload(type, task.payload) },
      }),
    );
    return this;
  }

  get(type: string): BoundHandler | undefined {
    return this.handlers.get(type);
  }

  has(type: string): boolean {
    return this.handlers.has(type);
  }

  types(): string[] {
    return Array.from(this.handlers.keys());
  }
}
