/**
 * Kafka Module
 *
 * Producer, listeners and topic provisioning.
 */

export * from './config.js';
export * from './topics.js';
export * from './producer.js';
export * from './consumer.js';
