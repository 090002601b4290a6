/**
 * Kafka Configuration
 *
 * Broker connection, producer options and the two listener
 * definitions (topic + consumer group) the service runs.
 */

import type { KafkaConfig, ProducerConfig } from 'kafkajs';
import { intEnv, optionalEnv } from '../lib/config.js';
import { pinoLogCreator, toKafkaLogLevel } from './logger.js';

export interface ListenerConfig {
  topic: string;
  groupId: string;
}

export interface BridgeKafkaConfig {
  kafka: KafkaConfig;
  producer: ProducerConfig;
  listeners: {
    test: ListenerConfig;
    userEvents: ListenerConfig;
  };
}

/**
 * Get Kafka configuration from environment
 */
export function getKafkaConfig(): BridgeKafkaConfig {
  const brokers = optionalEnv('KAFKA_BROKERS', 'localhost:9092')
    .split(',')
    .map((broker) => broker.trim())
    .filter((broker) => broker.length > 0);

  const username = process.env['KAFKA_SASL_USERNAME'];
  const password = process.env['KAFKA_SASL_PASSWORD'];

  return {
    kafka: {
      clientId: optionalEnv('KAFKA_CLIENT_ID', 'kafka-redis-bridge'),
      brokers,
      logLevel: toKafkaLogLevel(optionalEnv('LOG_LEVEL', 'info')),
      logCreator: pinoLogCreator,
      ssl: process.env['KAFKA_SSL'] === 'true',
      sasl: username && password ? { mechanism: 'plain', username, password } : undefined,
      connectionTimeout: intEnv('KAFKA_CONNECTION_TIMEOUT', 10000, 1),
      requestTimeout: intEnv('KAFKA_REQUEST_TIMEOUT', 30000, 1),
      retry: {
        initialRetryTime: 100,
        retries: 8,
        maxRetryTime: 30000,
        factor: 2,
      },
    },

    producer: {
      allowAutoTopicCreation: false,
    },

    listeners: {
      test: {
        topic: optionalEnv('KAFKA_TOPIC_TEST', 'test-topic'),
        groupId: optionalEnv('KAFKA_GROUP_TEST', 'test-group'),
      },
      userEvents: {
        topic: optionalEnv('KAFKA_TOPIC_USER_EVENTS', 'user-events'),
        groupId: optionalEnv('KAFKA_GROUP_USER_EVENTS', 'user-group'),
      },
    },
  };
}
