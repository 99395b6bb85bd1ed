import {
  AppError,
  BreakerOpenError,
  DownstreamError,
  TimeoutError,
  TransientInfraError,
  failure,
  success,
  toErrorBody,
  type ErrorBody,
  type ServiceResponse,
} from '../errors.js';
import type { BaseLogger } from '../logger.js';
import { makeCallCacheKey } from '../cache/key.js';
import { ResponseCache } from '../cache/response-cache.js';
import { CircuitBreakerRegistry } from './circuit-breaker.js';
import { contextHeaders, currentContext, type RequestContext } from './context.js';
import { msg } from './error-messages.js';
import { RetryPolicy } from './retry.js';

export type OperationType = 'default' | 'rag_query' | 'embedding' | 'llm_generation' | 'health_check';

export const OPERATION_TIMEOUTS_MS: Record<OperationType, number> = {
  default: 60_000,
  rag_query: 120_000,
  embedding: 60_000,
  llm_generation: 120_000,
  health_check: 5_000,
};

export interface CallOptions {
  url: string;
  method?: 'GET' | 'POST';
  payload?: Record<string, unknown>;
  operationType?: OperationType;
  timeoutMs?: number;
  /** Total attempts including the first one. */
  maxRetries?: number;
  headers?: Record<string, string>;
  /** Explicit context; defaults to the ambient one. */
  context?: RequestContext;
  /** Only for idempotent calls. */
  cache?: { ttlMs: number };
  signal?: AbortSignal;
}

export interface ServiceClientDeps {
  retryPolicy: RetryPolicy;
  breakers: CircuitBreakerRegistry;
  cache?: ResponseCache<ServiceResponse>;
  fetchImpl?: typeof fetch;
  logger?: BaseLogger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toErrorBodyFrom(value: unknown, fallbackMessage: string): ErrorBody {
  if (isRecord(value)) {
    const message = typeof value.error_message === 'string' ? value.error_message
      : typeof value.message === 'string' ? value.message : fallbackMessage;
    return {
      type: 'UPSTREAM',
      error_code: typeof value.error_code === 'string' ? value.error_code : 'DOWNSTREAM_ERROR',
      error_message: message,
      retryable: typeof value.retryable === 'boolean' ? value.retryable : false,
    };
  }
  return { type: 'UPSTREAM', error_code: 'DOWNSTREAM_ERROR', error_message: fallbackMessage, retryable: false };
}

/**
 * Coerces whatever a service answered into the standard envelope. Bodies that
 * already carry a boolean `success` keep their fields; anything else is data.
 */
export function standardizeResponse(body: unknown): ServiceResponse {
  if (isRecord(body) && typeof body.success === 'boolean') {
    const metadata = isRecord(body.metadata) ? body.metadata : {};
    const message = typeof body.message === 'string' ? body.message : body.success ? 'ok' : msg('DOWNSTREAM_FAILED');
    if (body.success) {
      return { success: true, message, data: body.data ?? null, metadata, error: null };
    }
    return failure(toErrorBodyFrom(body.error, message), metadata);
  }
  return success(body ?? null);
}

function isRetryableCallError(error: unknown): boolean {
  return error instanceof AppError && error.retryable && !(error instanceof BreakerOpenError);
}

/**
 * Request/response helper for calls between services. Never throws: every
 * outcome is returned in the standard envelope.
 */
export class ServiceClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly deps: ServiceClientDeps) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
  }

  async call(options: CallOptions): Promise<ServiceResponse> {
    const context = options.context ?? currentContext();
    const method = options.method ?? 'POST';
    const body = method === 'POST' ? this.withTenant(options.payload ?? {}, context) : undefined;
    const cacheKey = options.cache && this.deps.cache
      ? makeCallCacheKey({ url: options.url, tenantId: context?.tenantId, payload: body ?? null })
      : null;

    if (cacheKey && this.deps.cache) {
      const cached = this.deps.cache.get(cacheKey);
      if (cached) return { ...cached, metadata: { ...cached.metadata, cached: true } };
    }

    const policy = this.deps.retryPolicy.withOverrides({
      maxAttempts: options.maxRetries ?? 3,
      isRetryable: isRetryableCallError,
    });
    let attempts = 0;

    try {
      const response = await policy.execute(
        (attempt) => {
          attempts = attempt;
          return this.attempt(options, method, body, context);
        },
        {
          signal: options.signal,
          onRetry: ({ attempt, delayMs, error }) => {
            this.deps.logger?.warn(
              { url: options.url, attempt, delay_ms: delayMs, code: error instanceof AppError ? error.code : undefined },
              'service call failed, retrying',
            );
          },
        },
      );
      const withMeta = { ...response, metadata: { ...response.metadata, attempts } };
      if (cacheKey && options.cache && this.deps.cache && withMeta.success) {
        this.deps.cache.set(cacheKey, withMeta, options.cache.ttlMs);
      }
      return withMeta;
    } catch (error) {
      if (!(error instanceof AppError)) {
        this.deps.logger?.error({ err: error, url: options.url }, 'service call crashed');
      }
      return failure(toErrorBody(error), { attempts, url: options.url });
    }
  }

  /** GET {baseUrl}/health with the short health-check deadline and no retries. */
  async checkHealth(baseUrl: string): Promise<{ healthy: boolean; latency_ms: number; error: ErrorBody | null }> {
    const started = Date.now();
    const response = await this.call({
      url: `${baseUrl.replace(/\/$/, '')}/health`,
      method: 'GET',
      operationType: 'health_check',
      maxRetries: 1,
    });
    return { healthy: response.success, latency_ms: Date.now() - started, error: response.error };
  }

  private withTenant(payload: Record<string, unknown>, context: RequestContext | undefined): Record<string, unknown> {
    if (!context || payload.tenant_id !== undefined) return payload;
    return { ...payload, tenant_id: context.tenantId };
  }

  private async attempt(
    options: CallOptions,
    method: 'GET' | 'POST',
    body: Record<string, unknown> | undefined,
    context: RequestContext | undefined,
  ): Promise<ServiceResponse> {
    const breaker = this.deps.breakers.forUrl(options.url);
    breaker.acquire();

    const timeoutMs = options.timeoutMs ?? OPERATION_TIMEOUTS_MS[options.operationType ?? 'default'];
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new TimeoutError(msg('TIMEOUT_UPSTREAM'), { code: 'CALL_TIMEOUT', retryable: true })), timeoutMs);
    const onOuterAbort = () => controller.abort(options.signal?.reason);
    options.signal?.addEventListener('abort', onOuterAbort, { once: true });

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(options.url, {
          method,
          headers: {
            'Content-Type': 'application/json',
            ...contextHeaders(context),
            ...options.headers,
          },
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        breaker.recordFailure();
        if (controller.signal.reason instanceof TimeoutError) throw controller.signal.reason;
        if (options.signal?.aborted) throw error;
        throw new TransientInfraError(msg('RETRYABLE_UPSTREAM'), { code: 'NETWORK_ERROR', cause: error });
      }

      let parsed: unknown;
      try {
        parsed = await this.readBody(response);
      } catch (error) {
        // A body that dies mid-read counts against the endpoint like a dropped connection
        breaker.recordFailure();
        if (controller.signal.reason instanceof TimeoutError) throw controller.signal.reason;
        if (options.signal?.aborted) throw error;
        throw new TransientInfraError(msg('RETRYABLE_UPSTREAM'), { code: 'NETWORK_ERROR', cause: error });
      }
      if (response.status >= 500) {
        breaker.recordFailure();
        const err = toErrorBodyFrom(isRecord(parsed) ? parsed.error ?? parsed : parsed, msg('DOWNSTREAM_FAILED'));
        throw new DownstreamError(err.error_message, response.status, { details: { status: response.status } });
      }

      // A 4xx means the endpoint is healthy and the request was wrong
      breaker.recordSuccess();
      if (!response.ok) {
        const err = toErrorBodyFrom(isRecord(parsed) ? parsed.error ?? parsed : parsed, msg('DOWNSTREAM_FAILED'));
        throw new DownstreamError(err.error_message, response.status, {
          code: err.error_code,
          details: { status: response.status },
        });
      }
      return standardizeResponse(parsed);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onOuterAbort);
    }
  }

  private async readBody(response: Response): Promise<unknown> {
    const text = await response.text();
    if (!text) return null;
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      return text;
    }
  }
}

/** Probes each named service; a failed probe never throws. */
export async function checkServiceHealth(client: ServiceClient, services: Record<string, string>) {
  const entries = await Promise.all(
    Object.entries(services).map(async ([name, url]) => [name, await client.checkHealth(url)] as const),
  );
  return Object.fromEntries(entries);
}
