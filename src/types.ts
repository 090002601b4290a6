/**
 * Kafka-Redis Bridge Core Types
 */

import type { RecordMetadata } from 'kafkajs';

// ============================================================================
// Configuration
// ============================================================================

export interface RateLimitConfig {
  max: number;
  timeWindow: number;
}

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  corsOrigin: string | boolean;
  /** Disabled when RATE_LIMIT_MAX is 0 */
  rateLimit?: RateLimitConfig;
  /** Upper bound on each readiness check, in ms */
  healthCheckTimeout: number;
}

// ============================================================================
// Service Contracts
// ============================================================================

export interface HealthStatus {
  healthy: boolean;
  latencyMs: number;
}

/**
 * Publishing side used by the HTTP layer.
 * Sends resolve to `null` on failure and never reject.
 */
export interface MessagePublisher {
  sendMessage(topic: string, message: unknown, key?: string): Promise<RecordMetadata[] | null>;
  sendStringMessage(topic: string, message: string): Promise<RecordMetadata[] | null>;
  healthCheck(): Promise<HealthStatus>;
}

/**
 * String cache used by the HTTP layer and the user-event listener.
 * Failures are reported as `null` / `false`, never thrown.
 */
export interface StringCache {
  setString(key: string, value: string, ttlSeconds?: number): Promise<boolean>;
  getString(key: string): Promise<string | null>;
  exists(key: string): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  setExpiration(key: string, ttlSeconds: number): Promise<boolean>;
  cacheUserEvent(userId: string, eventData: string): Promise<boolean>;
  getUserEvent(userId: string): Promise<string | null>;
  healthCheck(): Promise<HealthStatus>;
}

// ============================================================================
// API Types
// ============================================================================

export interface IntegrationTestResult {
  status: 'success' | 'error';
  message: string;
  userId: string;
  redisKey?: string;
}

export interface HealthResponse {
  status: 'UP';
  service: string;
  timestamp: string;
}
