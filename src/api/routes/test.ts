/**
 * Test Routes
 * Manual endpoints for publishing to Kafka and reading/writing Redis
 */

import type { FastifyPluginAsync, FastifyRequest } from 'fastify';

import { getKafkaProducer } from '../../kafka/producer.js';
import { getKafkaConfig } from '../../kafka/config.js';
import { getCache } from '../../redis/cache.js';
import { RedisKeys } from '../../redis/config.js';
import { config } from '../../lib/config.js';
import { AppError, errorMessage } from '../../lib/errors.js';
import { withTimeout } from '../../lib/timeout.js';
import type {
  HealthResponse,
  HealthStatus,
  IntegrationTestResult,
  MessagePublisher,
  StringCache,
} from '../../types.js';

// ============================================================================
// Request Types
// ============================================================================

interface SendQuery {
  topic: string;
  key?: string;
}

interface KeyQuery {
  key: string;
}

interface UserQuery {
  userId: string;
}

export interface TestRoutesOptions {
  producer?: MessagePublisher;
  cache?: StringCache;
  /** Topic the integration endpoint publishes to */
  userEventsTopic?: string;
  /** Upper bound on each readiness check, in ms */
  healthTimeoutMs?: number;
}

export const SERVICE_NAME = 'kafka-redis-test';

const TEXT = 'text/plain; charset=utf-8';

function stringQuery(required: string[], names: string[]) {
  return {
    type: 'object',
    required,
    properties: Object.fromEntries(names.map((name) => [name, { type: 'string' }])),
  };
}

// ============================================================================
// Routes
// ============================================================================

export const testRoutes: FastifyPluginAsync<TestRoutesOptions> = async (fastify, options) => {
  const producer = options.producer ?? getKafkaProducer();
  const cache = options.cache ?? getCache();
  const userEventsTopic = options.userEventsTopic ?? getKafkaConfig().listeners.userEvents.topic;
  const healthTimeoutMs = options.healthTimeoutMs ?? config.healthCheckTimeout;

  async function timedCheck(name: string, check: () => Promise<HealthStatus>): Promise<HealthStatus> {
    const start = Date.now();
    try {
      return await withTimeout(check(), healthTimeoutMs, `${name} health check`);
    } catch (error) {
      fastify.log.warn({ err: error }, `${name} health check did not complete`);
      return { healthy: false, latencyMs: Date.now() - start };
    }
  }

  // Bodies are opaque strings whatever their content type
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser(
    '*',
    { parseAs: 'string' },
    async (_request: FastifyRequest, body: string) => body
  );

  /**
   * POST /api/test/kafka/send?topic=&key=
   * Publish the body to a topic, keyed when `key` is non-blank.
   * Replies once the send is started; the producer logs the delivery outcome.
   */
  fastify.post<{ Querystring: SendQuery; Body: string | undefined }>(
    '/kafka/send',
    { schema: { querystring: stringQuery(['topic'], ['topic', 'key']) } },
    async (request, reply) => {
      const { topic, key } = request.query;
      const message = request.body ?? '';

      request.log.info({ topic, key, length: message.length }, 'Kafka send requested');

      try {
        void producer.sendMessage(topic, message, key).catch((error: unknown) => {
          request.log.error({ err: error, topic }, 'Kafka send failed');
        });
        return reply.type(TEXT).send(`Message sent to Kafka topic: ${topic}`);
      } catch (error) {
        request.log.error({ err: error, topic }, 'Kafka send failed');
        return reply.status(500).type(TEXT).send(`Error sending message: ${errorMessage(error)}`);
      }
    }
  );

  /**
   * POST /api/test/redis/set?key=
   * Store the body under `key` without expiry
   */
  fastify.post<{ Querystring: KeyQuery; Body: string | undefined }>(
    '/redis/set',
    { schema: { querystring: stringQuery(['key'], ['key']) } },
    async (request, reply) => {
      const { key } = request.query;
      const value = request.body ?? '';

      request.log.info({ key, length: value.length }, 'Redis set requested');

      try {
        const stored = await cache.setString(key, value);
        if (!stored) {
          throw new AppError('REDIS_WRITE_FAILED', `Redis write failed for key: ${key}`);
        }
        return reply.type(TEXT).send(`Value set in Redis for key: ${key}`);
      } catch (error) {
        request.log.error({ err: error, key }, 'Redis set failed');
        return reply.status(500).type(TEXT).send(`Error setting value: ${errorMessage(error)}`);
      }
    }
  );

  /**
   * GET /api/test/redis/get?key=
   * Read a value; 404 when the key is absent
   */
  fastify.get<{ Querystring: KeyQuery }>(
    '/redis/get',
    { schema: { querystring: stringQuery(['key'], ['key']) } },
    async (request, reply) => {
      const { key } = request.query;

      try {
        const value = await cache.getString(key);
        if (value === null) {
          request.log.info({ key }, 'Redis key not found');
          return reply.status(404).send();
        }
        return reply.type(TEXT).send(value);
      } catch (error) {
        request.log.error({ err: error, key }, 'Redis get failed');
        return reply.status(500).type(TEXT).send(`Error getting value: ${errorMessage(error)}`);
      }
    }
  );

  /**
   * POST /api/test/integration/test?userId=
   * Publish the body as a user event without waiting for delivery,
   * and store a copy under test:user:<userId>
   */
  fastify.post<{ Querystring: UserQuery; Body: string | undefined }>(
    '/integration/test',
    { schema: { querystring: stringQuery(['userId'], ['userId']) } },
    async (request, reply) => {
      const { userId } = request.query;
      const data = request.body ?? '';
      const redisKey = RedisKeys.testUser(userId);

      request.log.info({ userId, length: data.length }, 'Integration test requested');

      try {
        void producer.sendMessage(userEventsTopic, data, userId).catch((error: unknown) => {
          request.log.error({ err: error, userId }, 'User event send failed');
        });

        const stored = await cache.setString(redisKey, data);
        if (!stored) {
          throw new AppError('REDIS_WRITE_FAILED', `Redis write failed for key: ${redisKey}`);
        }

        const result: IntegrationTestResult = {
          status: 'success',
          message: 'Data sent to Kafka and stored in Redis',
          userId,
          redisKey,
        };
        return reply.send(result);
      } catch (error) {
        request.log.error({ err: error, userId }, 'Integration test failed');
        const result: IntegrationTestResult = {
          status: 'error',
          message: errorMessage(error),
          userId,
        };
        return reply.status(500).send(result);
      }
    }
  );

  /**
   * GET /api/test/health
   */
  fastify.get('/health', async (): Promise<HealthResponse> => {
    return {
      status: 'UP',
      service: SERVICE_NAME,
      timestamp: String(Date.now()),
    };
  });

  /**
   * GET /api/test/health/ready
   * Broker and cache reachability
   */
  fastify.get('/health/ready', async (_request, reply) => {
    const [kafka, redis] = await Promise.all([
      timedCheck('Kafka', () => producer.healthCheck()),
      timedCheck('Redis', () => cache.healthCheck()),
    ]);
    const ready = kafka.healthy && redis.healthy;

    return reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'degraded',
      checks: { kafka, redis },
      timestamp: new Date().toISOString(),
    });
  });
};
