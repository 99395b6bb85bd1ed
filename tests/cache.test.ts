import { describe, it, expect } from 'vitest';
import { canonicalStringify, makeCallCacheKey } from '../src/cache/key.js';
import { ResponseCache } from '../src/cache/response-cache.js';

describe('canonicalStringify', () => {
  it('sorts keys recursively and drops undefined members', () => {
    const value = { b: 1, a: { d: undefined, c: [1, { y: 2, x: 1 }] } };
    expect(canonicalStringify(value)).toBe('{"a":{"c":[1,{"x":1,"y":2}]},"b":1}');
  });

  it('renders undefined as null', () => {
    expect(canonicalStringify(undefined)).toBe('null');
    expect(canonicalStringify([undefined])).toBe('[null]');
  });
});

describe('makeCallCacheKey', () => {
  it('ignores key order', () => {
    const a = makeCallCacheKey({ url: 'http://e/embed', tenantId: 't', payload: { text: 'x', model: 'm' } });
    const b = makeCallCacheKey({ url: 'http://e/embed', tenantId: 't', payload: { model: 'm', text: 'x' } });
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
  });

  it('separates tenants', () => {
    const a = makeCallCacheKey({ url: 'http://e/embed', tenantId: 'tenant-a', payload: { text: 'x' } });
    const b = makeCallCacheKey({ url: 'http://e/embed', tenantId: 'tenant-b', payload: { text: 'x' } });
    expect(a).not.toBe(b);
  });
});

describe('ResponseCache', () => {
  it('expires entries after their TTL', () => {
    let now = 0;
    const cache = new ResponseCache<string>({ now: () => now });
    cache.set('k', 'v', 100);

    now = 99;
    expect(cache.get('k')).toBe('v');
    now = 100;
    expect(cache.get('k')).toBeUndefined();
    expect(cache.stats()).toEqual({ size: 0, hits: 1, misses: 1 });
  });

  it('evicts the least recently used entry', () => {
    const cache = new ResponseCache<number>({ maxEntries: 2 });
    cache.set('a', 1, 1000);
    cache.set('b', 2, 1000);
    cache.get('a');
    cache.set('c', 3, 1000);

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBe(1);
    expect(cache.get('c')).toBe(3);
  });

  it('skips non-positive TTLs', () => {
    const cache = new ResponseCache<number>();
    cache.set('a', 1, 0);
    expect(cache.size).toBe(0);
  });
});
