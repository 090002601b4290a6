/**
 * Redis Configuration
 */

import type { RedisOptions } from 'ioredis';
import { intEnv, optionalEnv } from '../lib/config.js';

export interface BridgeRedisConfig {
  connection: RedisOptions;
  cache: {
    /** User event TTL in seconds */
    userEventTTL: number;
  };
}

/**
 * Get Redis configuration from environment
 */
export function getRedisConfig(): BridgeRedisConfig {
  const parsed = new URL(optionalEnv('REDIS_URL', 'redis://localhost:6379'));

  return {
    connection: {
      host: parsed.hostname,
      port: parseInt(parsed.port, 10) || 6379,
      username: parsed.username || undefined,
      password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
      db: parseInt(parsed.pathname.slice(1), 10) || 0,
      tls: parsed.protocol === 'rediss:' ? {} : undefined,
      retryStrategy: (times: number) => {
        if (times > 10) return null; // Stop retrying
        return Math.min(times * 100, 3000);
      },
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      enableOfflineQueue: true,
      lazyConnect: true,
    },

    cache: {
      userEventTTL: intEnv('CACHE_USER_EVENT_TTL', 24 * 60 * 60, 1),
    },
  };
}

/**
 * Redis key prefixes
 */
export const RedisKeys = {
  userEvent: (userId: string) => `user:event:${userId}`,
  testUser: (userId: string) => `test:user:${userId}`,
} as const;
