/**
 * Kafka Topic Definitions
 *
 * Topics provisioned at startup and the admin call that creates them.
 */

import { Kafka, type ITopicConfig } from 'kafkajs';
import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { getKafkaConfig, type BridgeKafkaConfig } from './config.js';

const log = createLogger('kafka.topics');

/**
 * Partition/replication settings for a single-broker setup
 */
export const TOPIC_PARTITIONS = 3;
export const TOPIC_REPLICATION_FACTOR = 1;

export function topicConfigs(config: BridgeKafkaConfig): ITopicConfig[] {
  return [config.listeners.test.topic, config.listeners.userEvents.topic].map((topic) => ({
    topic,
    numPartitions: TOPIC_PARTITIONS,
    replicationFactor: TOPIC_REPLICATION_FACTOR,
  }));
}

/**
 * Create the service's topics if they do not exist yet.
 * Returns false when the broker could not be reached; startup carries on.
 */
export async function provisionTopics(config: BridgeKafkaConfig = getKafkaConfig()): Promise<boolean> {
  const topics = topicConfigs(config);
  const admin = new Kafka(config.kafka).admin();

  log.info({ brokers: config.kafka.brokers }, 'Provisioning Kafka topics');

  try {
    await admin.connect();
    const created = await admin.createTopics({ topics, waitForLeaders: true });

    log.info(
      {
        topics: topics.map((t) => t.topic),
        numPartitions: TOPIC_PARTITIONS,
        replicationFactor: TOPIC_REPLICATION_FACTOR,
      },
      created ? 'Kafka topics created' : 'Kafka topics already present'
    );
    return true;
  } catch (error) {
    log.error({ err: error }, `Topic provisioning failed: ${errorMessage(error)}`);
    return false;
  } finally {
    await admin.disconnect().catch((error: unknown) => {
      log.warn({ err: error }, 'Admin client disconnect failed');
    });
  }
}
