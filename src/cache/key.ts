import { createHash } from 'node:crypto';

export interface CallCacheKeyInput {
  url: string;
  tenantId?: string;
  payload: unknown;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Canonical JSON stringify - ensures deterministic string representation.
 * Sorts keys recursively; undefined members are dropped like JSON.stringify does.
 */
export function canonicalStringify(value: unknown): string {
  if (value === undefined) return 'null';
  if (value === null || typeof value !== 'object') return JSON.stringify(value);
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalStringify).join(',') + ']';
  }
  if (!isPlainObject(value)) return JSON.stringify(value);

  const keys = Object.keys(value).filter((k) => value[k] !== undefined).sort();
  const pairs = keys.map((key) => `${JSON.stringify(key)}:${canonicalStringify(value[key])}`);
  return '{' + pairs.join(',') + '}';
}

export function sha256Hex(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Deterministic key for a cached inter-service call. Tenant is part of the key
 * so two tenants never share a cached answer.
 */
export function makeCallCacheKey(input: CallCacheKeyInput): string {
  const keyData = {
    url: input.url,
    tenant_id: input.tenantId ?? null,
    payload: input.payload,
  };
  return sha256Hex(canonicalStringify(keyData));
}
