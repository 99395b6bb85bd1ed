import { AsyncLocalStorage } from 'node:async_hooks';

/** Identifiers that follow a unit of work across service calls. */
export interface RequestContext {
  tenantId: string;
  agentId?: string;
  conversationId?: string;
  collectionId?: string;
  correlationId?: string;
}

export const CONTEXT_HEADERS = {
  tenantId: 'x-tenant-id',
  agentId: 'x-agent-id',
  conversationId: 'x-conversation-id',
  collectionId: 'x-collection-id',
  correlationId: 'x-correlation-id',
} as const satisfies Record<keyof RequestContext, string>;

const CONTEXT_KEYS = ['tenantId', 'agentId', 'conversationId', 'collectionId', 'correlationId'] as const;

const storage = new AsyncLocalStorage<RequestContext>();

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function currentContext(): RequestContext | undefined {
  return storage.getStore();
}

export function contextHeaders(context: RequestContext | undefined = currentContext()): Record<string, string> {
  const headers: Record<string, string> = {};
  if (!context) return headers;
  for (const key of CONTEXT_KEYS) {
    const value = context[key];
    if (value) headers[CONTEXT_HEADERS[key]] = value;
  }
  return headers;
}

function headerValue(headers: Record<string, string | string[] | undefined>, name: string): string | undefined {
  const raw = headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value && value.trim() ? value.trim() : undefined;
}

/** Builds a context from inbound headers; null when the tenant header is absent. */
export function contextFromHeaders(headers: Record<string, string | string[] | undefined>): RequestContext | null {
  const tenantId = headerValue(headers, CONTEXT_HEADERS.tenantId);
  if (!tenantId) return null;
  return {
    tenantId,
    agentId: headerValue(headers, CONTEXT_HEADERS.agentId),
    conversationId: headerValue(headers, CONTEXT_HEADERS.conversationId),
    collectionId: headerValue(headers, CONTEXT_HEADERS.collectionId),
    correlationId: headerValue(headers, CONTEXT_HEADERS.correlationId),
  };
}
