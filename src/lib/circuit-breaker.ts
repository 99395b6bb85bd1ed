import { BreakerOpenError } from '../errors.js';

export type BreakerState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerOptions {
  /** Rolling window of most recent call outcomes. */
  windowSize: number;
  /** Calls required in the window before the ratio is evaluated. */
  minimumCalls?: number;
  failureRatio: number;
  cooldownMs: number;
  now?: () => number;
}

export interface BreakerSnapshot {
  state: BreakerState;
  calls: number;
  failures: number;
  openedAt: number | null;
}

/**
 * Opens once the failure ratio over the last `windowSize` calls reaches the
 * threshold. While open every call is refused; after the cooldown one probe is
 * let through and its outcome closes or re-opens the breaker.
 */
export class CircuitBreaker {
  private outcomes: boolean[] = [];
  private state: BreakerState = 'closed';
  private openedAt: number | null = null;
  private probeInFlight = false;
  private readonly minimumCalls: number;
  private readonly now: () => number;

  constructor(readonly endpoint: string, private readonly options: CircuitBreakerOptions) {
    this.minimumCalls = options.minimumCalls ?? options.windowSize;
    this.now = options.now ?? Date.now;
  }

  getState(): BreakerState {
    if (this.state === 'open' && this.openedAt !== null && this.now() - this.openedAt >= this.options.cooldownMs) {
      this.state = 'half_open';
      this.probeInFlight = false;
    }
    return this.state;
  }

  /** Throws BreakerOpenError when the call must not reach the network. */
  acquire(): void {
    const state = this.getState();
    if (state === 'open') throw new BreakerOpenError(this.endpoint);
    if (state === 'half_open') {
      if (this.probeInFlight) throw new BreakerOpenError(this.endpoint);
      this.probeInFlight = true;
    }
  }

  recordSuccess(): void {
    if (this.state === 'half_open') {
      this.reset();
      return;
    }
    this.push(true);
  }

  recordFailure(): void {
    if (this.state === 'half_open') {
      this.trip();
      return;
    }
    this.push(false);
    const failures = this.outcomes.filter((ok) => !ok).length;
    if (this.outcomes.length >= this.minimumCalls && failures / this.outcomes.length >= this.options.failureRatio) {
      this.trip();
    }
  }

  /** Releases a half-open probe slot without recording an outcome. */
  release(): void {
    if (this.state === 'half_open') this.probeInFlight = false;
  }

  snapshot(): BreakerSnapshot {
    return {
      state: this.getState(),
      calls: this.outcomes.length,
      failures: this.outcomes.filter((ok) => !ok).length,
      openedAt: this.openedAt,
    };
  }

  private push(ok: boolean): void {
    this.outcomes.push(ok);
    if (this.outcomes.length > this.options.windowSize) this.outcomes.shift();
  }

  private trip(): void {
    this.state = 'open';
    this.openedAt = this.now();
    this.probeInFlight = false;
    this.outcomes = [];
  }

  private reset(): void {
    this.state = 'closed';
    this.openedAt = null;
    this.probeInFlight = false;
    this.outcomes = [];
  }
}

/** One breaker per downstream endpoint (origin + path). */
export class CircuitBreakerRegistry {
  private breakers = new Map<string, CircuitBreaker>();

  constructor(private readonly options: CircuitBreakerOptions) {}

  static endpointOf(url: string): string {
    const u = new URL(url);
    return `${u.origin}${u.pathname}`;
  }

  forUrl(url: string): CircuitBreaker {
    const endpoint = CircuitBreakerRegistry.endpointOf(url);
    let breaker = this.breakers.get(endpoint);
    if (!breaker) {
      breaker = new CircuitBreaker(endpoint, this.options);
      this.breakers.set(endpoint, breaker);
    }
    return breaker;
  }

  snapshot(): Record<string, BreakerSnapshot> {
    const out: Record<string, BreakerSnapshot> = {};
    for (const [endpoint, breaker] of this.breakers) out[endpoint] = breaker.snapshot();
    return out;
  }
}
