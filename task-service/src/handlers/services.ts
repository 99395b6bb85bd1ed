import { DownstreamError, type ServiceResponse } from '../../../src/errors.js';
import type { ServiceClient } from '../../../src/lib/service-client.js';
import type { TaskContext, TaskHandler } from './base.js';

export interface ServiceUrls {
  embedding: string;
  query: string;
  agentExecution: string;
  ingestion: string;
}

export const EMBEDDING_BATCH_SIZE = 100;

/** Returns the data of a successful response or throws a tagged error. */
export function unwrap(response: ServiceResponse): unknown {
  if (response.success) return response.data;
  const error = response.error;
  const rawStatus = error?.details?.status;
  const status = typeof rawStatus === 'number' ? rawStatus : undefined;
  throw new DownstreamError(error?.error_message ?? response.message, status, {
    code: error?.error_code ?? 'DOWNSTREAM_ERROR',
    retryable: error?.retryable ?? false,
  });
}

function join(base: string, path: string): string {
  return `${base.replace(/\/$/, '')}${path}`;
}

export class SingleEmbeddingHandler implements TaskHandler<'single_embedding'> {
  constructor(private client: ServiceClient, private urls: ServiceUrls, private cacheTtlMs: number) {}

  async execute({ task, signal }: TaskContext<'single_embedding'>) {
    const { text, model, collection_id } = task.payload;
    const response = await this.client.call({
      url: join(this.urls.embedding, '/embeddings'),
      payload: { texts: [text], model, collection_id },
      operationType: 'embedding',
      cache: this.cacheTtlMs > 0 ? { ttlMs: this.cacheTtlMs } : undefined,
      signal,
    });
    return unwrap(response);
  }
}

export class BatchEmbeddingsHandler implements TaskHandler<'batch_embeddings'> {
  constructor(private client: ServiceClient, private urls: ServiceUrls) {}

  async execute({ task, signal, reportProgress }: TaskContext<'batch_embeddings'>) {
    const { texts, model, collection_id, document_id } = task.payload;
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += EMBEDDING_BATCH_SIZE) {
      batches.push(texts.slice(i, i + EMBEDDING_BATCH_SIZE));
    }

    const results: unknown[] = [];
    for (const [index, batch] of batches.entries()) {
      signal.throwIfAborted();
      const response = await this.client.call({
        url: join(this.urls.embedding, '/embeddings'),
        payload: { texts: batch, model, collection_id, document_id },
        operationType: 'embedding',
        signal,
      });
      results.push(unwrap(response));
      await reportProgress((index + 1) / batches.length, `batch ${index + 1}/${batches.length}`);
    }
    return { count: texts.length, batches: results };
  }
}

export class RagQueryHandler implements TaskHandler<'rag_query'> {
  constructor(private client: ServiceClient, private urls: ServiceUrls) {}

  async execute({ task, signal }: TaskContext<'rag_query'>) {
    const response = await this.client.call({
      url: join(this.urls.query, '/query'),
      payload: { ...task.payload },
      operationType: 'rag_query',
      signal,
    });
    return unwrap(response);
  }
}

export class ToolExecutionHandler implements TaskHandler<'tool_execution'> {
  constructor(private client: ServiceClient, private urls: ServiceUrls) {}

  async execute({ task, signal }: TaskContext<'tool_execution'>) {
    const response = await this.client.call({
      url: join(this.urls.agentExecution, '/tools/execute'),
      payload: { ...task.payload, task_id: task.task_id },
      signal,
    });
    return unwrap(response);
  }
}

export class ToolResultHandler implements TaskHandler<'tool_result'> {
  constructor(private client: ServiceClient, private urls: ServiceUrls) {}

  async execute({ task, signal }: TaskContext<'tool_result'>) {
    const response = await this.client.call({
      url: join(this.urls.agentExecution, '/tools/result'),
      payload: { ...task.payload, task_id: task.task_id },
      operationType: 'llm_generation',
      signal,
    });
    return unwrap(response);
  }
}

export class DocumentIngestionHandler implements TaskHandler<'document_ingestion'> {
  constructor(private client: ServiceClient, private urls: ServiceUrls) {}

  async execute({ task, signal, reportProgress }: TaskContext<'document_ingestion'>) {
    await reportProgress(0, 'processing');
    const response = await this.client.call({
      url: join(this.urls.ingestion, '/documents/process'),
      payload: { ...task.payload },
      signal,
    });
    const data = unwrap(response);
    await reportProgress(1, 'processed');
    return data;
  }
}
