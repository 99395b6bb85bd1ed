import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { toPublicError } from './lib/error-normaliser.js';
import { msg, type ErrKey } from './lib/error-messages.js';

export type ErrorType =
  | 'BAD_INPUT'
  | 'TIMEOUT'
  | 'RETRYABLE'
  | 'INTERNAL'
  | 'RATE_LIMIT'
  | 'BREAKER_OPEN'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'UPSTREAM';

/** Error body carried by task records, WebSocket errors and internal responses. */
export interface ErrorBody {
  type: ErrorType;
  error_code: string;
  error_message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

/** Envelope every internal endpoint answers with; `error` is set iff `success` is false. */
export interface ServiceResponse<T = unknown> {
  success: boolean;
  message: string;
  data: T | null;
  metadata: Record<string, unknown>;
  error: ErrorBody | null;
}

export function errorTypeToStatus(type: ErrorType): number {
  switch (type) {
    case 'BAD_INPUT': return 400;
    case 'UNAUTHORIZED': return 401;
    case 'FORBIDDEN': return 403;
    case 'NOT_FOUND': return 404;
    case 'CONFLICT': return 409;
    case 'RATE_LIMIT': return 429;
    case 'UPSTREAM': return 502;
    case 'RETRYABLE': return 503;
    case 'BREAKER_OPEN': return 503;
    case 'TIMEOUT': return 504;
    case 'INTERNAL':
    default: return 500;
  }
}

export interface AppErrorOptions {
  code?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export abstract class AppError extends Error {
  abstract readonly type: ErrorType;
  readonly code: string;
  readonly details?: Record<string, unknown>;
  private readonly retryableOverride?: boolean;

  constructor(message: string, defaultCode: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code ?? defaultCode;
    this.details = options.details;
    this.retryableOverride = options.retryable;
  }

  protected get defaultRetryable(): boolean {
    return false;
  }

  get retryable(): boolean {
    return this.retryableOverride ?? this.defaultRetryable;
  }

  toBody(): ErrorBody {
    return {
      type: this.type,
      error_code: this.code,
      error_message: this.message,
      retryable: this.retryable,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

/** Bad envelope, payload or request. Never retried. */
export class ValidationError extends AppError {
  readonly type = 'BAD_INPUT';
  constructor(message = msg('BAD_INPUT_SCHEMA'), options: AppErrorOptions = {}) {
    super(message, 'VALIDATION_ERROR', options);
  }
}

/** Queue or store unreachable, network blip. Retried with backoff. */
export class TransientInfraError extends AppError {
  readonly type = 'RETRYABLE';
  constructor(message = msg('RETRYABLE_UPSTREAM'), options: AppErrorOptions = {}) {
    super(message, 'INFRA_UNAVAILABLE', options);
  }
  protected override get defaultRetryable(): boolean {
    return true;
  }
}

/** Lease, task lifetime or call deadline exceeded. */
export class TimeoutError extends AppError {
  readonly type = 'TIMEOUT';
  constructor(message = msg('TASK_TIMEOUT'), options: AppErrorOptions = {}) {
    super(message, 'TASK_TIMEOUT', options);
  }
}

/** Error answered by a called service; 5xx is retryable, 4xx is not. */
export class DownstreamError extends AppError {
  readonly type = 'UPSTREAM';
  readonly status: number | undefined;
  constructor(message: string, status?: number, options: AppErrorOptions = {}) {
    super(message, 'DOWNSTREAM_ERROR', options);
    this.status = status;
  }
  protected override get defaultRetryable(): boolean {
    return this.status === undefined || this.status >= 500;
  }
}

export class AuthenticationError extends AppError {
  readonly type = 'UNAUTHORIZED';
  constructor(message = msg('UNAUTHORIZED'), options: AppErrorOptions = {}) {
    super(message, 'UNAUTHORIZED', options);
  }
}

/** Tenant mismatch on subscribe, read or cancel. Never retried. */
export class AuthorizationError extends AppError {
  readonly type = 'FORBIDDEN';
  constructor(message = msg('TENANT_MISMATCH'), options: AppErrorOptions = {}) {
    super(message, 'TENANT_MISMATCH', options);
  }
}

export class NotFoundError extends AppError {
  readonly type = 'NOT_FOUND';
  constructor(message = msg('TASK_NOT_FOUND'), options: AppErrorOptions = {}) {
    super(message, 'TASK_NOT_FOUND', options);
  }
}

export class ConflictError extends AppError {
  readonly type = 'CONFLICT';
  constructor(message = msg('INVALID_STATE'), options: AppErrorOptions = {}) {
    super(message, 'INVALID_STATE', options);
  }
}

export class RateLimitError extends AppError {
  readonly type = 'RATE_LIMIT';
  readonly retryAfterSec: number;
  constructor(retryAfterSec: number, options: AppErrorOptions = {}) {
    super(msg('RATE_LIMIT_RPM'), 'RATE_LIMIT_EXCEEDED', options);
    this.retryAfterSec = retryAfterSec;
  }
  protected override get defaultRetryable(): boolean {
    return true;
  }
}

/** Raised without a network attempt while an endpoint's breaker is open. */
export class BreakerOpenError extends AppError {
  readonly type = 'BREAKER_OPEN';
  constructor(endpoint: string, options: AppErrorOptions = {}) {
    super(msg('BREAKER_OPEN'), 'BREAKER_OPEN', { details: { endpoint }, ...options });
  }
  protected override get defaultRetryable(): boolean {
    return true;
  }
}

export type ErrorClass = 'transient' | 'permanent';

/**
 * Transient errors go back to the queue; everything else, including errors a
 * handler did not tag, fails the task at once.
 */
export function classifyError(error: unknown): ErrorClass {
  if (error instanceof AppError && error.retryable) return 'transient';
  return 'permanent';
}

export function errorBody(key: ErrKey, code: string, type: ErrorType, retryable = false): ErrorBody {
  return { type, error_code: code, error_message: msg(key), retryable };
}

/** Converts anything thrown into a public body. Unknown errors never leak their message. */
export function toErrorBody(error: unknown): ErrorBody {
  if (error instanceof AppError) return error.toBody();
  const pub = toPublicError('INTERNAL');
  return { type: 'INTERNAL', error_code: 'INTERNAL_ERROR', error_message: pub.message, retryable: false };
}

export function success<T>(data: T, message = 'ok', metadata: Record<string, unknown> = {}): ServiceResponse<T> {
  return { success: true, message, data, metadata, error: null };
}

export function failure(error: ErrorBody, metadata: Record<string, unknown> = {}): ServiceResponse<never> {
  return { success: false, message: error.error_message, data: null, metadata, error };
}

type ReplyLike = Pick<FastifyReply, 'code' | 'header' | 'send'>;

export function replyWithAppError(reply: ReplyLike, error: AppError) {
  if (error instanceof RateLimitError) {
    reply.header('Retry-After', String(error.retryAfterSec));
  }
  return reply.code(errorTypeToStatus(error.type)).send(failure(error.toBody()));
}

/** Fastify error handler rendering every failure in the internal response envelope. */
export function appErrorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) {
  if (error instanceof AppError) {
    if (errorTypeToStatus(error.type) >= 500) {
      request.log.warn({ code: error.code, type: error.type }, 'request failed');
    }
    return replyWithAppError(reply, error);
  }

  const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;
  if (statusCode >= 400 && statusCode < 500) {
    const pub = toPublicError('BAD_INPUT');
    const body: ErrorBody = { type: 'BAD_INPUT', error_code: 'BAD_REQUEST', error_message: pub.message, retryable: false };
    return reply.code(statusCode).send(failure(body));
  }

  request.log.error({ err: error }, 'unhandled error');
  return reply.code(500).send(failure(toErrorBody(error)));
}
