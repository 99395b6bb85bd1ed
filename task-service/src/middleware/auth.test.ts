import { describe, it, expect } from 'vitest';
import { tokensMatch } from './auth.js';

describe('tokensMatch', () => {
  it('accepts only the configured token', () => {
    expect(tokensMatch('test-secret', 'test-secret')).toBe(true);
    expect(tokensMatch('test-secreT', 'test-secret')).toBe(false);
    expect(tokensMatch('test', 'test-secret')).toBe(false);
    expect(tokensMatch(undefined, 'test-secret')).toBe(false);
  });

  it('matches nothing when no token is configured', () => {
    expect(tokensMatch(undefined, undefined)).toBe(false);
    expect(tokensMatch('anything', undefined)).toBe(false);
  });
});
