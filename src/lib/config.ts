/**
 * Service Configuration
 * Environment-based configuration loader
 */

import type { AppConfig, RateLimitConfig } from '../types.js';
import { ConfigurationError } from './errors.js';

export function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] ?? defaultValue;
}

/**
 * Non-negative integer from the environment; `min` raises the lower bound
 */
export function intEnv(name: string, defaultValue: number, min: number = 0): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return defaultValue;

  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(name, `expected an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min) {
    throw new ConfigurationError(name, `expected an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function loadRateLimitConfig(): RateLimitConfig | undefined {
  const max = intEnv('RATE_LIMIT_MAX', 100);
  if (max <= 0) return undefined;

  return {
    max,
    timeWindow: intEnv('RATE_LIMIT_WINDOW', 60000, 1),
  };
}

function parseCorsOrigin(value: string | undefined): string | boolean {
  if (value === undefined || value === '' || value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

export function loadConfig(): AppConfig {
  return {
    port: intEnv('PORT', 3000),
    host: optionalEnv('HOST', '0.0.0.0'),
    logLevel: optionalEnv('LOG_LEVEL', 'info'),
    corsOrigin: parseCorsOrigin(process.env['CORS_ORIGIN']),
    rateLimit: loadRateLimitConfig(),
    healthCheckTimeout: intEnv('HEALTH_CHECK_TIMEOUT', 3000, 1),
  };
}

export const config = loadConfig();
