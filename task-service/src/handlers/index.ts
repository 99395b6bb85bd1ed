import type { ServiceClient } from '../../../src/lib/service-client.js';
import { TaskHandlerRegistry } from './base.js';
import {
  BatchEmbeddingsHandler,
  DocumentIngestionHandler,
  RagQueryHandler,
  SingleEmbeddingHandler,
  ToolExecutionHandler,
  ToolResultHandler,
  type ServiceUrls,
} from './services.js';

export * from './base.js';
export * from './services.js';

export interface HandlerOptions {
  urls: ServiceUrls;
  embeddingCacheTtlMs?: number;
}

export function createTaskHandlers(client: ServiceClient, options: HandlerOptions): TaskHandlerRegistry {
  const { urls } = options;
  return new TaskHandlerRegistry()
    .register('single_embedding', new SingleEmbeddingHandler(client, urls, options.embeddingCacheTtlMs ?? 0))
    .register('batch_embeddings', new BatchEmbeddingsHandler(client, urls))
    .register('rag_query', new RagQueryHandler(client, urls))
    .register('tool_execution', new ToolExecutionHandler(client, urls))
    .register('tool_result', new ToolResultHandler(client, urls))
    .register('document_ingestion', new DocumentIngestionHandler(client, urls));
}
