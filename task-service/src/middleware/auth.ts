import { timingSafeEqual } from 'node:crypto';
import type { FastifyRequest } from 'fastify';
import { AuthenticationError } from '../../../src/errors.js';
import { contextFromHeaders, type RequestContext } from '../../../src/lib/context.js';
import { msg } from '../../../src/lib/error-messages.js';

declare module 'fastify' {
  interface FastifyRequest {
    tenantContext: RequestContext | null;
  }
}

/** preHandler: every task route is scoped by the x-tenant-id header. */
export async function requireTenant(request: FastifyRequest) {
  const context = contextFromHeaders(request.headers);
  if (!context) {
    throw new AuthenticationError(msg('TENANT_REQUIRED'), { code: 'TENANT_REQUIRED' });
  }
  request.tenantContext = context;
}

export function tenantOf(request: FastifyRequest): RequestContext {
  if (!request.tenantContext) {
    throw new AuthenticationError(msg('TENANT_REQUIRED'), { code: 'TENANT_REQUIRED' });
  }
  return request.tenantContext;
}

/** Constant-time comparison; nothing matches when no token is configured. */
export function tokensMatch(provided: string | undefined, expected: string | undefined): boolean {
  if (!expected || !provided) return false;
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}
