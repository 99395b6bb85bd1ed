import { describe, it, expect, beforeEach } from 'vitest';
import { ReadableStream } from 'node:stream/web';
import { ServiceClient, checkServiceHealth, standardizeResponse } from '../src/lib/service-client.js';
import { CircuitBreakerRegistry } from '../src/lib/circuit-breaker.js';
import { RetryPolicy } from '../src/lib/retry.js';
import { ResponseCache } from '../src/cache/response-cache.js';
import { runWithContext } from '../src/lib/context.js';
import type { ServiceResponse } from '../src/errors.js';
import { manualClock } from './helpers/tasks.js';

type Reply = (init: RequestInit | undefined) => Response | Promise<Response>;

interface RecordedCall {
  url: string;
  init: RequestInit | undefined;
}

function json(body: unknown, status = 200): Reply {
  return () => new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function fakeFetch(replies: Reply[]) {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    const reply = replies.shift();
    if (!reply) throw new Error('no reply queued');
    return reply(init);
  };
  return { calls, fetchImpl };
}

describe('ServiceClient', () => {
  let breakers: CircuitBreakerRegistry;

  beforeEach(() => {
    breakers = new CircuitBreakerRegistry({ windowSize: 2, failureRatio: 0.5, cooldownMs: 60_000 });
  });

  function client(fetchImpl: typeof fetch, cache?: ResponseCache<ServiceResponse>) {
    return new ServiceClient({
      retryPolicy: new RetryPolicy({ baseDelayMs: 1, jitter: 0 }),
      breakers,
      cache,
      fetchImpl,
    });
  }

  it('propagates tenant context in headers and body', async () => {
    const { calls, fetchImpl } = fakeFetch([json({ success: true, message: 'ok', data: { vector: [1, 2] } })]);

    const response = await runWithContext({ tenantId: 'tenant-a', correlationId: 'corr-1' }, () =>
      client(fetchImpl).call({ url: 'http://embedding/embed', payload: { text: 'hi' } }),
    );

    expect(response).toEqual({ success: true, message: 'ok', data: { vector: [1, 2] }, metadata: { attempts: 1 }, error: null });
    const headers = new Headers(calls[0]?.init?.headers);
    expect(headers.get('x-tenant-id')).toBe('tenant-a');
    expect(headers.get('x-correlation-id')).toBe('corr-1');
    expect(JSON.parse(String(calls[0]?.init?.body))).toEqual({ text: 'hi', tenant_id: 'tenant-a' });
  });

  it('wraps a bare body as data', async () => {
    const { fetchImpl } = fakeFetch([json({ answer: 42 })]);

    const response = await client(fetchImpl).call({ url: 'http://query/query' });
    expect(response.success).toBe(true);
    expect(response.data).toEqual({ answer: 42 });
  });

  it('retries a 5xx and succeeds', async () => {
    const { calls, fetchImpl } = fakeFetch([json({ error: 'overloaded' }, 503), json({ success: true, data: 'ok' })]);

    const response = await client(fetchImpl).call({ url: 'http://svc-a/run' });

    expect(response.success).toBe(true);
    expect(response.metadata.attempts).toBe(2);
    expect(calls).toHaveLength(2);
  });

  it('does not retry a 4xx and keeps its error code', async () => {
    const { calls, fetchImpl } = fakeFetch([
      json({ success: false, error: { error_code: 'TEXT_TOO_LONG', error_message: 'text too long' } }, 422),
    ]);

    const response = await client(fetchImpl).call({ url: 'http://svc-b/run' });

    expect(calls).toHaveLength(1);
    expect(response.success).toBe(false);
    expect(response.error).toMatchObject({ type: 'UPSTREAM', error_code: 'TEXT_TOO_LONG', error_message: 'text too long', retryable: false });
    expect(response.metadata).toEqual({ attempts: 1, url: 'http://svc-b/run' });
  });

  it('reports network failures as retryable after the last attempt', async () => {
    const refuse: Reply = () => {
      throw new TypeError('fetch failed');
    };
    const { calls, fetchImpl } = fakeFetch([refuse, refuse]);

    const response = await client(fetchImpl).call({ url: 'http://svc-c/run', maxRetries: 2 });

    expect(calls).toHaveLength(2);
    expect(response.error).toMatchObject({ type: 'RETRYABLE', error_code: 'NETWORK_ERROR', retryable: true });
  });

  it('times out a slow call', async () => {
    const hang: Reply = (init) => new Promise((_, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
    const { fetchImpl } = fakeFetch([hang]);

    const response = await client(fetchImpl).call({ url: 'http://svc-d/run', timeoutMs: 20, maxRetries: 1 });

    expect(response.error).toMatchObject({ type: 'TIMEOUT', error_code: 'CALL_TIMEOUT' });
  });

  it('refuses calls while the endpoint breaker is open', async () => {
    const { calls, fetchImpl } = fakeFetch([json({}, 500), json({}, 500)]);
    const c = client(fetchImpl);

    await c.call({ url: 'http://svc-e/run', maxRetries: 1 });
    await c.call({ url: 'http://svc-e/run', maxRetries: 1 });
    const refused = await c.call({ url: 'http://svc-e/run', maxRetries: 1 });

    expect(calls).toHaveLength(2);
    expect(refused.error).toMatchObject({ type: 'BREAKER_OPEN', error_code: 'BREAKER_OPEN', details: { endpoint: 'http://svc-e/run' } });
  });

  it('re-opens the breaker when a half-open call fails while reading the body', async () => {
    const clock = manualClock();
    breakers = new CircuitBreakerRegistry({ windowSize: 2, failureRatio: 0.5, cooldownMs: 1000, now: clock.now });
    const brokenBody: Reply = () => new Response(new ReadableStream({
      start(controller) {
        controller.error(new Error('connection reset'));
      },
    }), { status: 200 });
    const { calls, fetchImpl } = fakeFetch([json({}, 500), json({}, 500), brokenBody, json({ success: true, data: 'ok' })]);
    const c = client(fetchImpl);
    const call = () => c.call({ url: 'http://svc-f/run', maxRetries: 1 });

    await call();
    await call();
    clock.advance(1000);
    const broken = await call();
    expect(broken.error).toMatchObject({ error_code: 'NETWORK_ERROR' });
    expect(breakers.forUrl('http://svc-f/run').getState()).toBe('open');

    clock.advance(1000);
    const recovered = await call();

    expect(calls).toHaveLength(4);
    expect(recovered.success).toBe(true);
    expect(breakers.forUrl('http://svc-f/run').getState()).toBe('closed');
  });

  it('serves a cached answer for the same tenant and payload', async () => {
    const { calls, fetchImpl } = fakeFetch([json({ success: true, data: [0.1] })]);
    const c = client(fetchImpl, new ResponseCache<ServiceResponse>());
    const call = () => c.call({
      url: 'http://embedding/embed',
      payload: { text: 'hi' },
      context: { tenantId: 'tenant-a' },
      cache: { ttlMs: 1000 },
    });

    await call();
    const second = await call();

    expect(calls).toHaveLength(1);
    expect(second.data).toEqual([0.1]);
    expect(second.metadata.cached).toBe(true);
  });
});

describe('standardizeResponse', () => {
  it('turns a failed body into the error envelope', () => {
    expect(standardizeResponse({ success: false, message: 'nope' })).toEqual({
      success: false,
      message: 'nope',
      data: null,
      metadata: {},
      error: { type: 'UPSTREAM', error_code: 'DOWNSTREAM_ERROR', error_message: 'nope', retryable: false },
    });
  });
});

describe('checkServiceHealth', () => {
  it('probes each service without throwing', async () => {
    const { calls, fetchImpl } = fakeFetch([json({ status: 'ok' }), json({}, 404)]);
    const c = new ServiceClient({
      retryPolicy: new RetryPolicy({ baseDelayMs: 1, jitter: 0 }),
      breakers: new CircuitBreakerRegistry({ windowSize: 5, failureRatio: 0.5, cooldownMs: 1000 }),
      fetchImpl,
    });

    const report = await checkServiceHealth(c, { embedding: 'http://embedding/', query: 'http://query' });

    expect(calls.map((call) => call.url)).toEqual(['http://embedding/health', 'http://query/health']);
    expect(report.embedding?.healthy).toBe(true);
    expect(report.query?.healthy).toBe(false);
  });
});
