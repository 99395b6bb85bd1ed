/**
 * Shrinks task payloads and metadata into something safe to log: credential
 * keys are redacted, long text and large arrays are replaced by their size.
 */
import type { TaskEnvelope } from '../types/task.js';

const CREDENTIAL_KEY = /(api[_-]?key|secret|password|passwd|token|authorization|bearer|credential|private[_-]?key)/i;

const CREDENTIAL_VALUE = [
  /^Bearer\s+/i,
  /^sk-[a-zA-Z0-9]{8,}$/,
];

export const REDACTED_VALUE = '[REDACTED]';

export interface SummarizeOptions {
  maxDepth?: number;
  maxStringLength?: number;
  maxArrayItems?: number;
}

export function isCredentialKey(key: string): boolean {
  return CREDENTIAL_KEY.test(key);
}

export function isCredentialValue(value: string): boolean {
  return CREDENTIAL_VALUE.some((pattern) => pattern.test(value));
}

export function summarizeForLog(value: unknown, options: SummarizeOptions = {}): unknown {
  const { maxDepth = 4, maxStringLength = 120, maxArrayItems = 10 } = options;

  function walk(node: unknown, depth: number): unknown {
    if (typeof node === 'string') {
      if (isCredentialValue(node)) return REDACTED_VALUE;
      return node.length > maxStringLength ? `[${node.length} chars]` : node;
    }
    if (node === null || typeof node !== 'object') return node;
    if (depth >= maxDepth) return Array.isArray(node) ? `[${node.length} items]` : '[object]';

    if (Array.isArray(node)) {
      if (node.length > maxArrayItems) return `[${node.length} items]`;
      return node.map((item) => walk(item, depth + 1));
    }

    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(node)) {
      out[key] = isCredentialKey(key) ? REDACTED_VALUE : walk(child, depth + 1);
    }
    return out;
  }

  return walk(value, 0);
}

/** Log bindings for a task; never includes the raw payload. */
export function loggableTask(envelope: TaskEnvelope, options?: SummarizeOptions) {
  return {
    task_id: envelope.task_id,
    tenant_id: envelope.tenant_id,
    type: envelope.type,
    priority: envelope.priority,
    attempt: envelope.attempt_count,
    metadata: summarizeForLog(envelope.metadata, options),
    payload_summary: summarizeForLog(envelope.payload, options),
  };
}
