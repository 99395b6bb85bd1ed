import { describe, it, expect } from 'vitest';
import { REDACTED_VALUE, isCredentialKey, isCredentialValue, loggableTask, summarizeForLog } from './payload-scrubber.js';
import { makeEnvelope } from '../../../tests/helpers/tasks.js';

describe('Payload Scrubber', () => {
  describe('summarizeForLog', () => {
    it('redacts credential keys', () => {
      const result = summarizeForLog({ apiKey: 'abc', password: 'hunter', auth_token: 'x', text: 'ok' });

      expect(result).toEqual({ apiKey: REDACTED_VALUE, password: REDACTED_VALUE, auth_token: REDACTED_VALUE, text: 'ok' });
    });

    it('redacts values that look like credentials', () => {
      const result = summarizeForLog({ header: 'Bearer test-secret', key: 'sk-testsecret123', note: 'sk-short' });

      expect(result).toEqual({ header: REDACTED_VALUE, key: REDACTED_VALUE, note: 'sk-short' });
    });

    it('replaces long text by its length', () => {
      expect(summarizeForLog({ text: 'a'.repeat(200) })).toEqual({ text: '[200 chars]' });
      expect(summarizeForLog('abcdef', { maxStringLength: 3 })).toBe('[6 chars]');
    });

    it('replaces large arrays by their size', () => {
      const texts = Array.from({ length: 11 }, (_, i) => `t${i}`);

      expect(summarizeForLog({ texts })).toEqual({ texts: '[11 items]' });
      expect(summarizeForLog({ texts: ['a', 'b'] })).toEqual({ texts: ['a', 'b'] });
    });

    it('stops at maxDepth', () => {
      const result = summarizeForLog({ a: { b: { c: 1 } }, list: [[1]] }, { maxDepth: 2 });

      expect(result).toEqual({ a: { b: '[object]' }, list: ['[1 items]'] });
    });

    it('passes primitives through', () => {
      expect(summarizeForLog(42)).toBe(42);
      expect(summarizeForLog(null)).toBeNull();
      expect(summarizeForLog(true)).toBe(true);
    });
  });

  describe('matchers', () => {
    it('recognises credential keys', () => {
      expect(isCredentialKey('X-Api-Key')).toBe(true);
      expect(isCredentialKey('private_key')).toBe(true);
      expect(isCredentialKey('collection_id')).toBe(false);
    });

    it('recognises credential values', () => {
      expect(isCredentialValue('bearer abc')).toBe(true);
      expect(isCredentialValue('hello world')).toBe(false);
    });
  });

  describe('loggableTask', () => {
    it('summarizes the payload and never includes it raw', () => {
      const envelope = makeEnvelope({
        task_id: 't1',
        priority: 7,
        attempt_count: 2,
        metadata: { agent_id: 'agent-1', api_key: 'test-secret' },
        payload: { text: 'x'.repeat(500) },
      });

      const bindings = loggableTask(envelope);

      expect(bindings).toEqual({
        task_id: 't1',
        tenant_id: 'tenant-a',
        type: 'single_embedding',
        priority: 7,
        attempt: 2,
        metadata: { agent_id: 'agent-1', api_key: REDACTED_VALUE },
        payload_summary: { text: '[500 chars]' },
      });
      expect('payload' in bindings).toBe(false);
    });
  });
});
