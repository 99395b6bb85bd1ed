import { describe, it, expect, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import {
  AuthorizationError,
  BreakerOpenError,
  DownstreamError,
  RateLimitError,
  TransientInfraError,
  ValidationError,
  appErrorHandler,
  classifyError,
  errorTypeToStatus,
  failure,
  success,
  toErrorBody,
} from '../src/errors.js';

describe('error taxonomy', () => {
  it('maps types to HTTP statuses', () => {
    expect(errorTypeToStatus('BAD_INPUT')).toBe(400);
    expect(errorTypeToStatus('FORBIDDEN')).toBe(403);
    expect(errorTypeToStatus('RATE_LIMIT')).toBe(429);
    expect(errorTypeToStatus('UPSTREAM')).toBe(502);
    expect(errorTypeToStatus('BREAKER_OPEN')).toBe(503);
    expect(errorTypeToStatus('TIMEOUT')).toBe(504);
    expect(errorTypeToStatus('INTERNAL')).toBe(500);
  });

  it('classifies only retryable app errors as transient', () => {
    expect(classifyError(new TransientInfraError())).toBe('transient');
    expect(classifyError(new RateLimitError(1))).toBe('transient');
    expect(classifyError(new DownstreamError('down', 503))).toBe('transient');
    expect(classifyError(new DownstreamError('bad', 404))).toBe('permanent');
    expect(classifyError(new ValidationError())).toBe('permanent');
    expect(classifyError(new Error('untagged'))).toBe('permanent');
  });

  it('lets options override retryability', () => {
    expect(new TransientInfraError('x', { retryable: false }).retryable).toBe(false);
    expect(new ValidationError('x', { retryable: true }).retryable).toBe(true);
  });

  it('renders app errors with their code and details', () => {
    expect(new BreakerOpenError('http://svc/run').toBody()).toEqual({
      type: 'BREAKER_OPEN',
      error_code: 'BREAKER_OPEN',
      error_message: 'Service temporarily unavailable, please try again shortly',
      retryable: true,
      details: { endpoint: 'http://svc/run' },
    });
  });

  it('hides the message of unknown errors', () => {
    expect(toErrorBody(new Error('db password is test-secret'))).toEqual({
      type: 'INTERNAL',
      error_code: 'INTERNAL_ERROR',
      error_message: 'Something went wrong',
      retryable: false,
    });
  });

  it('builds the response envelope', () => {
    expect(success({ id: 1 }, 'done')).toEqual({ success: true, message: 'done', data: { id: 1 }, metadata: {}, error: null });
    const body = new AuthorizationError().toBody();
    expect(failure(body)).toEqual({ success: false, message: 'Task belongs to another tenant', data: null, metadata: {}, error: body });
  });
});

describe('appErrorHandler', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  async function build() {
    app = Fastify({ logger: false });
    app.setErrorHandler(appErrorHandler);
    app.get('/bad', async () => {
      throw new ValidationError('field missing', { details: { field: 'text' } });
    });
    app.get('/limited', async () => {
      throw new RateLimitError(7);
    });
    app.get('/crash', async () => {
      throw new Error('secret internals');
    });
    app.post('/json', async () => ({ ok: true }));
    await app.ready();
  }

  it('renders an app error in the envelope', async () => {
    await build();
    const response = await app.inject({ method: 'GET', url: '/bad' });

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body)).toEqual({
      success: false,
      message: 'field missing',
      data: null,
      metadata: {},
      error: {
        type: 'BAD_INPUT',
        error_code: 'VALIDATION_ERROR',
        error_message: 'field missing',
        retryable: false,
        details: { field: 'text' },
      },
    });
  });

  it('sets Retry-After on rate limit errors', async () => {
    await build();
    const response = await app.inject({ method: 'GET', url: '/limited' });

    expect(response.statusCode).toBe(429);
    expect(response.headers['retry-after']).toBe('7');
  });

  it('turns framework 4xx errors into BAD_REQUEST', async () => {
    await build();
    const response = await app.inject({
      method: 'POST',
      url: '/json',
      headers: { 'content-type': 'application/json' },
      payload: '{not json',
    });

    expect(response.statusCode).toBe(400);
    const body = JSON.parse(response.body);
    expect(body.error.error_code).toBe('BAD_REQUEST');
    expect(body.error.error_message).toBe('Request validation failed');
  });

  it('never leaks unexpected error messages', async () => {
    await build();
    const response = await app.inject({ method: 'GET', url: '/crash' });

    expect(response.statusCode).toBe(500);
    const body = JSON.parse(response.body);
    expect(body.error.error_code).toBe('INTERNAL_ERROR');
    expect(body.error.error_message).toBe('Something went wrong');
  });
});
