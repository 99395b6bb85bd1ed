import type { AppConfig } from '../../../src/config.js';
import { upstashCredentials } from '../../../src/config.js';
import { UpstashClient } from '../../../src/lib/upstash.js';
import type { TaskStore } from './base.js';
import { InMemoryTaskStore } from './memory.js';
import { RedisTaskStore } from './redis.js';

export * from './base.js';
export * from './memory.js';
export * from './redis.js';

export function createTaskStore(config: Pick<AppConfig, 'REPO_KIND' | 'UPSTASH_REDIS_REST_URL' | 'UPSTASH_REDIS_REST_TOKEN'>): TaskStore {
  switch (config.REPO_KIND) {
    case 'memory':
      return new InMemoryTaskStore();

    case 'redis': {
      const creds = upstashCredentials(config);
      if (!creds) {
        throw new Error('UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set when REPO_KIND=redis');
      }
      return new RedisTaskStore(new UpstashClient(creds.url, creds.token));
    }
  }
}
