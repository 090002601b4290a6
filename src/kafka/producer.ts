/**
 * Kafka Producer Service
 *
 * Publishes string payloads to Kafka topics. Delivery outcome is
 * logged; callers get the record metadata back, or null when the
 * send failed. Sends never reject.
 */

import { Kafka, type Producer, type RecordMetadata } from 'kafkajs';
import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import type { HealthStatus, MessagePublisher } from '../types.js';
import { getKafkaConfig, type BridgeKafkaConfig } from './config.js';

const log = createLogger('kafka.producer');

export class KafkaProducerService implements MessagePublisher {
  private kafka: Kafka;
  private producer: Producer;
  private isConnected: boolean = false;

  constructor(config?: BridgeKafkaConfig) {
    const resolved = config || getKafkaConfig();
    this.kafka = new Kafka(resolved.kafka);
    this.producer = this.kafka.producer(resolved.producer);
  }

  /**
   * Connect to Kafka
   */
  async connect(): Promise<void> {
    if (this.isConnected) return;

    await this.producer.connect();
    this.isConnected = true;
    log.info('Producer connected');
  }

  /**
   * Disconnect from Kafka
   */
  async disconnect(): Promise<void> {
    if (!this.isConnected) return;

    await this.producer.disconnect();
    this.isConnected = false;
    log.info('Producer disconnected');
  }

  /**
   * Publish a JSON-serialized value, routed by `key` when it is non-blank
   */
  async sendMessage(
    topic: string,
    message: unknown,
    key?: string
  ): Promise<RecordMetadata[] | null> {
    log.info({ topic, key, messageType: typeof message }, 'Publishing message');

    let payload: string;
    try {
      payload = serialize(message);
    } catch (error) {
      log.error({ err: error, topic }, `Message serialization failed: ${errorMessage(error)}`);
      return null;
    }

    const routingKey = key !== undefined && key.trim().length > 0 ? key : null;
    return this.publish(topic, payload, routingKey);
  }

  /**
   * Publish a raw string as-is, without key
   */
  async sendStringMessage(topic: string, message: string): Promise<RecordMetadata[] | null> {
    log.info({ topic, length: message.length }, 'Publishing string message');
    return this.publish(topic, message, null);
  }

  private async publish(
    topic: string,
    value: string,
    key: string | null
  ): Promise<RecordMetadata[] | null> {
    const messageId = uuidv4();

    try {
      if (!this.isConnected) {
        await this.connect();
      }

      const metadata = await this.producer.send({
        topic,
        messages: [{ key, value, headers: { messageId } }],
      });

      const [first] = metadata;
      log.info(
        {
          topic,
          messageId,
          partition: first?.partition,
          offset: first?.baseOffset ?? first?.offset,
        },
        'Message published'
      );
      log.debug({ messageId, payload: value }, 'Published payload');
      return metadata;
    } catch (error) {
      log.error({ err: error, topic, messageId }, `Message publish failed: ${errorMessage(error)}`);
      log.debug({ messageId, payload: value }, 'Unpublished payload');
      return null;
    }
  }

  /**
   * Health check
   */
  async healthCheck(): Promise<HealthStatus> {
    const start = Date.now();
    const admin = this.kafka.admin();
    try {
      await admin.connect();
      await admin.listTopics();
      return { healthy: true, latencyMs: Date.now() - start };
    } catch (error) {
      log.warn({ err: error }, 'Kafka health check failed');
      return { healthy: false, latencyMs: Date.now() - start };
    } finally {
      await admin.disconnect().catch((error: unknown) => {
        log.warn({ err: error }, 'Admin client disconnect failed');
      });
    }
  }
}

/**
 * JSON text of a value; `undefined` serializes as `null`
 */
export function serialize(message: unknown): string {
  const json: string | undefined = JSON.stringify(message);
  return json ?? 'null';
}

// Singleton instance
let producerInstance: KafkaProducerService | null = null;

export function getKafkaProducer(): KafkaProducerService {
  if (!producerInstance) {
    producerInstance = new KafkaProducerService();
  }
  return producerInstance;
}
