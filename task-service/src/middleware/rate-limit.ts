import type { FastifyReply, FastifyRequest } from 'fastify';
import { RateLimitError } from '../../../src/errors.js';
import { tenantOf } from './auth.js';

interface TokenBucket {
  tokens: number;
  lastRefill: number;
}

export interface RateLimiterOptions {
  burst: number;
  perMinute: number;
  now?: () => number;
}

export interface ConsumeResult {
  allowed: boolean;
  remaining: number;
  retryAfterSec: number;
}

/** Token bucket per tenant. */
export class TenantRateLimiter {
  private buckets = new Map<string, TokenBucket>();
  private readonly now: () => number;

  constructor(private readonly options: RateLimiterOptions) {
    this.now = options.now ?? Date.now;
  }

  private getBucket(key: string): TokenBucket {
    const now = this.now();
    let bucket = this.buckets.get(key);

    if (!bucket) {
      bucket = { tokens: this.options.burst, lastRefill: now };
      this.buckets.set(key, bucket);
    }

    // Refill tokens based on time passed
    const minutes = (now - bucket.lastRefill) / 60_000;
    const tokensToAdd = Math.floor(minutes * this.options.perMinute);
    if (tokensToAdd > 0) {
      bucket.tokens = Math.min(this.options.burst, bucket.tokens + tokensToAdd);
      bucket.lastRefill = now;
    }

    return bucket;
  }

  tryConsume(key: string): ConsumeResult {
    const bucket = this.getBucket(key);
    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { allowed: true, remaining: bucket.tokens, retryAfterSec: 0 };
    }
    return { allowed: false, remaining: 0, retryAfterSec: Math.max(1, Math.ceil(60 / this.options.perMinute)) };
  }

  size(): number {
    return this.buckets.size;
  }
}

/** preHandler placed after requireTenant. */
export function tenantRateLimit(limiter: TenantRateLimiter, burst: number) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const result = limiter.tryConsume(tenantOf(request).tenantId);
    reply.header('X-RateLimit-Limit', String(burst));
    reply.header('X-RateLimit-Remaining', String(result.remaining));
    if (!result.allowed) throw new RateLimitError(result.retryAfterSec);
  };
}
