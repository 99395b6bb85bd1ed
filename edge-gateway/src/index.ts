import type { AppConfig } from '../../src/config.js';
import { upstashCredentials } from '../../src/config.js';
import { UpstashClient } from '../../src/lib/upstash.js';
import { InMemoryRegistryStore, RedisRegistryStore, type RegistryStore } from './registry-store.js';

export * from './connection.js';
export * from './gateway.js';
export * from './messages.js';
export * from './registry.js';
export * from './registry-store.js';

/** REGISTRY_KIND defaults to the queue store's kind. */
export function createRegistryStore(
  config: Pick<AppConfig, 'REGISTRY_KIND' | 'REPO_KIND' | 'REGISTRY_TTL_MS' | 'UPSTASH_REDIS_REST_URL' | 'UPSTASH_REDIS_REST_TOKEN'>,
): RegistryStore {
  const kind = config.REGISTRY_KIND ?? config.REPO_KIND;
  if (kind === 'memory') return new InMemoryRegistryStore();

  const creds = upstashCredentials(config);
  if (!creds) {
    throw new Error('UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set when REGISTRY_KIND=redis');
  }
  return new RedisRegistryStore(new UpstashClient(creds.url, creds.token), config.REGISTRY_TTL_MS);
}
