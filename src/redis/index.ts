/**
 * Redis Module
 *
 * String cache with a fixed-TTL user event path.
 */

export * from './config.js';
export * from './cache.js';
