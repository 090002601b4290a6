/**
 * Redis Cache Service
 *
 * Thin wrapper over ioredis string commands. Client errors are logged
 * and reported as `null` / `false`; nothing here throws.
 */

import Redis from 'ioredis';
import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import type { HealthStatus, StringCache } from '../types.js';
import { getRedisConfig, RedisKeys, type BridgeRedisConfig } from './config.js';

const log = createLogger('redis.cache');

export class CacheService implements StringCache {
  private redis: Redis;
  private config: BridgeRedisConfig;

  constructor(redis?: Redis, config?: BridgeRedisConfig) {
    this.config = config || getRedisConfig();
    this.redis = redis || new Redis(this.config.connection);
  }

  // ==================== Strings ====================

  async setString(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    log.debug({ key, length: value.length, ttlSeconds }, 'Storing string');
    try {
      if (ttlSeconds === undefined) {
        await this.redis.set(key, value);
      } else {
        await this.redis.setex(key, ttlSeconds, value);
      }
      log.debug({ key, ttlSeconds }, 'String stored');
      return true;
    } catch (error) {
      log.error({ err: error, key, ttlSeconds }, `Failed to store string: ${errorMessage(error)}`);
      return false;
    }
  }

  async getString(key: string): Promise<string | null> {
    try {
      const value = await this.redis.get(key);
      log.debug({ key, found: value !== null }, 'String lookup');
      return value;
    } catch (error) {
      log.error({ err: error, key }, `Failed to read string: ${errorMessage(error)}`);
      return null;
    }
  }

  // ==================== Objects ====================

  async setObject(key: string, value: unknown, ttlSeconds?: number): Promise<boolean> {
    let json: string;
    try {
      const encoded: string | undefined = JSON.stringify(value);
      json = encoded ?? 'null';
    } catch (error) {
      log.error({ err: error, key }, `Failed to serialize object: ${errorMessage(error)}`);
      return false;
    }
    return this.setString(key, json, ttlSeconds);
  }

  /**
   * Read a JSON value back; `parse` checks and narrows the decoded value
   */
  async getObject<T>(key: string, parse: (value: unknown) => T): Promise<T | null> {
    const json = await this.getString(key);
    if (json === null) return null;

    try {
      const decoded: unknown = JSON.parse(json);
      return parse(decoded);
    } catch (error) {
      log.error({ err: error, key }, `Failed to decode object: ${errorMessage(error)}`);
      return null;
    }
  }

  // ==================== Keys ====================

  async exists(key: string): Promise<boolean> {
    try {
      const count = await this.redis.exists(key);
      return count > 0;
    } catch (error) {
      log.error({ err: error, key }, `Failed to check key: ${errorMessage(error)}`);
      return false;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      const removed = await this.redis.del(key);
      log.debug({ key, removed }, 'Key deleted');
      return removed > 0;
    } catch (error) {
      log.error({ err: error, key }, `Failed to delete key: ${errorMessage(error)}`);
      return false;
    }
  }

  async setExpiration(key: string, ttlSeconds: number): Promise<boolean> {
    try {
      const applied = await this.redis.expire(key, ttlSeconds);
      return applied === 1;
    } catch (error) {
      log.error({ err: error, key, ttlSeconds }, `Failed to set expiration: ${errorMessage(error)}`);
      return false;
    }
  }

  // ==================== User Events ====================

  async cacheUserEvent(userId: string, eventData: string): Promise<boolean> {
    const key = RedisKeys.userEvent(userId);
    log.info({ userId, key }, 'Caching user event');
    return this.setString(key, eventData, this.config.cache.userEventTTL);
  }

  async getUserEvent(userId: string): Promise<string | null> {
    return this.getString(RedisKeys.userEvent(userId));
  }

  // ==================== Health ====================

  async healthCheck(): Promise<HealthStatus> {
    const start = Date.now();
    try {
      await this.redis.ping();
      return { healthy: true, latencyMs: Date.now() - start };
    } catch (error) {
      log.warn({ err: error }, 'Redis health check failed');
      return { healthy: false, latencyMs: Date.now() - start };
    }
  }

  /**
   * Close connection
   */
  async disconnect(): Promise<void> {
    await this.redis.quit();
  }
}

// Singleton instance
let cacheInstance: CacheService | null = null;

export function getCache(): CacheService {
  if (!cacheInstance) {
    cacheInstance = new CacheService();
  }
  return cacheInstance;
}
