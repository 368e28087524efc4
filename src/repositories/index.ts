import { AppConfig } from '../config.js';
import { JobBackend } from './base.js';
import { InMemoryJobQueue, InMemoryJobStore } from './memory.js';
import { RedisJobQueue, RedisJobStore, UpstashClient } from './redis.js';

export * from './base.js';
export * from './memory.js';
export * from './redis.js';

/**
 * Picks the external store when Upstash credentials are configured, else
 * the in-process pair (single-process deployments only).
 */
export function createJobBackend(config: Pick<AppConfig, 'redis' | 'batch'>): JobBackend {
  if (config.redis) {
    const client = new UpstashClient(config.redis.url, config.redis.token);
    return {
      store: new RedisJobStore(client, { ttlSeconds: config.batch.jobTtlSeconds }),
      queue: new RedisJobQueue(client),
    };
  }

  return {
    store: new InMemoryJobStore({ ttlSeconds: config.batch.jobTtlSeconds }),
    queue: new InMemoryJobQueue(),
  };
}
