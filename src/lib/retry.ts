import { classifyError } from '../errors.js';

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** Fraction of the capped delay added as random jitter (0..1). */
  jitter: number;
  isRetryable: (error: unknown) => boolean;
  random?: () => number;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export const DEFAULT_RETRY_OPTIONS: RetryPolicyOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 60_000,
  jitter: 0.1,
  isRetryable: (error) => classifyError(error) === 'transient',
};

export function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Aborted');
}

/** Resolves after `ms`, or rejects with the signal's reason once it aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * One backoff policy shared by the worker loop and the service client.
 * Attempts are 1-based: `delayFor(1)` is the wait after the first failure.
 */
export class RetryPolicy {
  readonly options: RetryPolicyOptions;
  private readonly random: () => number;

  constructor(options: Partial<RetryPolicyOptions> = {}) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
    this.random = this.options.random ?? Math.random;
  }

  withOverrides(overrides: Partial<RetryPolicyOptions>): RetryPolicy {
    return new RetryPolicy({ ...this.options, ...overrides });
  }

  delayFor(attempt: number): number {
    const { baseDelayMs, multiplier, maxDelayMs, jitter } = this.options;
    const exp = baseDelayMs * Math.pow(multiplier, Math.max(0, attempt - 1));
    const capped = Math.min(exp, maxDelayMs);
    return Math.round(capped + this.random() * jitter * capped);
  }

  canRetry(attempt: number, error: unknown): boolean {
    return attempt < this.options.maxAttempts && this.options.isRetryable(error);
  }

  async execute<T>(fn: (attempt: number) => Promise<T>, opts: ExecuteOptions = {}): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        if (opts.signal?.aborted || !this.canRetry(attempt, error)) throw error;
        const delayMs = this.delayFor(attempt);
        opts.onRetry?.({ attempt, delayMs, error });
        await sleep(delayMs, opts.signal);
      }
    }
  }
}
