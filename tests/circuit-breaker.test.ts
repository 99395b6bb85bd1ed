import { describe, it, expect, beforeEach } from 'vitest';
import { CircuitBreaker, CircuitBreakerRegistry } from '../src/lib/circuit-breaker.js';
import { BreakerOpenError } from '../src/errors.js';

describe('CircuitBreaker', () => {
  let now: number;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    now = 0;
    breaker = new CircuitBreaker('http://embedding/embed', {
      windowSize: 4,
      failureRatio: 0.5,
      cooldownMs: 1000,
      now: () => now,
    });
  });

  function trip() {
    breaker.recordSuccess();
    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordFailure();
  }

  it('stays closed until the window is full', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();
    expect(breaker.getState()).toBe('closed');
  });

  it('opens once the failure ratio is reached', () => {
    trip();

    expect(breaker.getState()).toBe('open');
    expect(() => breaker.acquire()).toThrow(BreakerOpenError);
    expect(breaker.snapshot()).toEqual({ state: 'open', calls: 0, failures: 0, openedAt: 0 });
  });

  it('lets a single probe through after the cooldown', () => {
    trip();
    now = 1000;

    expect(breaker.getState()).toBe('half_open');
    breaker.acquire();
    expect(() => breaker.acquire()).toThrow(BreakerOpenError);

    breaker.recordSuccess();
    expect(breaker.getState()).toBe('closed');
  });

  it('re-opens when the probe fails', () => {
    trip();
    now = 1500;
    breaker.acquire();
    breaker.recordFailure();

    expect(breaker.snapshot()).toMatchObject({ state: 'open', openedAt: 1500 });
    now = 2000;
    expect(breaker.getState()).toBe('open');
  });

  it('frees the probe slot on release', () => {
    trip();
    now = 1000;
    breaker.acquire();
    breaker.release();

    expect(() => breaker.acquire()).not.toThrow();
  });

  it('forgets outcomes that left the window', () => {
    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordSuccess();
    breaker.recordSuccess();
    breaker.recordSuccess();

    expect(breaker.snapshot()).toMatchObject({ calls: 4, failures: 0 });
  });
});

describe('CircuitBreakerRegistry', () => {
  it('keys breakers by origin and path', () => {
    const registry = new CircuitBreakerRegistry({ windowSize: 2, failureRatio: 0.5, cooldownMs: 10 });

    const a = registry.forUrl('http://svc:8003/embed?x=1');
    const b = registry.forUrl('http://svc:8003/embed');
    const c = registry.forUrl('http://svc:8003/embed/batch');

    expect(a).toBe(b);
    expect(a).not.toBe(c);
    expect(Object.keys(registry.snapshot())).toEqual(['http://svc:8003/embed', 'http://svc:8003/embed/batch']);
  });
});
