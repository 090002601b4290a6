/**
 * Kafka-Redis Bridge
 *
 * Publishes string payloads to Kafka topics and mirrors them into Redis,
 * behind a small REST API.
 *
 * @packageDocumentation
 */

// Types
export * from './types.js';

// Errors
export * from './lib/errors.js';

// Config
export { loadConfig, config } from './lib/config.js';

// Kafka
export * from './kafka/index.js';

// Redis
export * from './redis/index.js';

// API
export { createServer, startServer } from './api/server.js';
