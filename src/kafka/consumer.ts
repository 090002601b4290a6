/**
 * Kafka Consumer Service
 *
 * Runs one consumer per listener (topic + group) with auto-commit off.
 * An offset is committed only after its message was processed; on
 * failure the offset stays uncommitted and the broker redelivers it.
 */

import { Kafka, type Consumer, type EachMessagePayload, type IHeaders } from 'kafkajs';
import { createLogger } from '../lib/logger.js';
import { AppError, errorMessage } from '../lib/errors.js';
import type { StringCache } from '../types.js';
import { getKafkaConfig, type BridgeKafkaConfig, type ListenerConfig } from './config.js';

const log = createLogger('kafka.consumer');

export interface MessageMetadata {
  topic: string;
  partition: number;
  offset: string;
  key: string | null;
  timestamp: string;
  headers: Record<string, string>;
}

export type MessageHandler = (message: string, metadata: MessageMetadata) => Promise<void>;

interface Listener extends ListenerConfig {
  name: string;
  handle: MessageHandler;
}

export class KafkaConsumerService {
  private kafka: Kafka;
  private config: BridgeKafkaConfig;
  private cache: StringCache;
  private consumers: Consumer[] = [];
  private isRunning: boolean = false;

  constructor(cache: StringCache, config?: BridgeKafkaConfig) {
    this.cache = cache;
    this.config = config || getKafkaConfig();
    this.kafka = new Kafka(this.config.kafka);
  }

  /**
   * Connect every listener and start consuming
   */
  async start(): Promise<void> {
    if (this.isRunning) return;
    this.isRunning = true;

    try {
      for (const listener of this.listeners()) {
        const consumer = this.kafka.consumer({ groupId: listener.groupId });
        this.consumers.push(consumer);

        await consumer.connect();
        await consumer.subscribe({ topics: [listener.topic], fromBeginning: false });
        await consumer.run({
          autoCommit: false,
          eachMessage: (payload) => this.dispatch(listener, consumer, payload),
        });

        log.info({ topic: listener.topic, groupId: listener.groupId }, `${listener.name} listener started`);
      }
    } catch (error) {
      await this.stop();
      throw error;
    }
  }

  /**
   * Stop consuming and disconnect every listener
   */
  async stop(): Promise<void> {
    if (!this.isRunning) return;
    this.isRunning = false;

    const consumers = this.consumers;
    this.consumers = [];

    for (const consumer of consumers) {
      try {
        await consumer.disconnect();
      } catch (error) {
        log.warn({ err: error }, 'Consumer disconnect failed');
      }
    }
    log.info('Consumers stopped');
  }

  private listeners(): Listener[] {
    return [
      {
        name: 'Test message',
        ...this.config.listeners.test,
        handle: (message, metadata) => this.handleTestMessage(message, metadata),
      },
      {
        name: 'User event',
        ...this.config.listeners.userEvents,
        handle: (message, metadata) => this.handleUserEvent(message, metadata),
      },
    ];
  }

  private async dispatch(
    listener: Listener,
    consumer: Consumer,
    payload: EachMessagePayload
  ): Promise<void> {
    const { topic, partition, message } = payload;

    const metadata: MessageMetadata = {
      topic,
      partition,
      offset: message.offset,
      key: message.key ? message.key.toString() : null,
      timestamp: message.timestamp,
      headers: parseHeaders(message.headers),
    };
    const value = message.value ? message.value.toString() : '';

    log.info({ topic, partition, offset: message.offset, key: metadata.key }, `${listener.name} received`);
    log.debug({ payload: value }, 'Received payload');

    try {
      await listener.handle(value, metadata);
    } catch (error) {
      log.error(
        { err: error, topic, partition, offset: message.offset },
        `${listener.name} processing failed, offset left uncommitted: ${errorMessage(error)}`
      );
      return;
    }

    try {
      await consumer.commitOffsets([
        { topic, partition, offset: (BigInt(message.offset) + BigInt(1)).toString() },
      ]);
      log.debug({ topic, partition, offset: message.offset }, 'Offset committed');
    } catch (error) {
      log.error(
        { err: error, topic, partition, offset: message.offset },
        `Offset commit failed: ${errorMessage(error)}`
      );
    }
  }

  /**
   * Fixed processing step for the test topic; nothing to do beyond logging
   */
  private async handleTestMessage(message: string, metadata: MessageMetadata): Promise<void> {
    log.debug({ offset: metadata.offset, length: message.length }, 'Processing test message');
  }

  /**
   * Cache a user event under its user id (the message key)
   */
  private async handleUserEvent(message: string, metadata: MessageMetadata): Promise<void> {
    const userId = metadata.key ?? '';

    const cached = await this.cache.cacheUserEvent(userId, message);
    if (!cached) {
      throw new AppError('CACHE_WRITE_FAILED', `User event for ${userId} was not cached`, 500, {
        userId,
      });
    }
    log.info({ userId }, 'User event cached');
  }
}

/**
 * Parse message headers to string map
 */
export function parseHeaders(headers?: IHeaders): Record<string, string> {
  const result: Record<string, string> = {};
  if (!headers) return result;

  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    result[key] = Array.isArray(value)
      ? value.map((item) => item.toString()).join(',')
      : value.toString();
  }
  return result;
}
