/**
 * Kafka-Redis Bridge API Server
 * Fastify-based REST API
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';

import { config } from '../lib/config.js';
import { AppError } from '../lib/errors.js';
import { logger, loggerOptions } from '../lib/logger.js';
import { getKafkaProducer } from '../kafka/producer.js';
import { KafkaConsumerService } from '../kafka/consumer.js';
import { provisionTopics } from '../kafka/topics.js';
import { getCache } from '../redis/cache.js';
import { testRoutes, type TestRoutesOptions } from './routes/index.js';

export async function createServer(services: TestRoutesOptions = {}): Promise<FastifyInstance> {
  const server = Fastify({ logger: loggerOptions });

  // ============================================================================
  // Plugins
  // ============================================================================

  await server.register(cors, {
    origin: config.corsOrigin,
    credentials: true,
  });

  await server.register(helmet, {
    contentSecurityPolicy: false, // API doesn't serve HTML
  });

  if (config.rateLimit) {
    await server.register(rateLimit, {
      max: config.rateLimit.max,
      timeWindow: config.rateLimit.timeWindow,
    });
  }

  // ============================================================================
  // Error Handler
  // ============================================================================

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      request.log.warn({ err: error }, 'Application error');
      return reply.status(error.statusCode).send(error.toJSON());
    }

    // Fastify validation errors
    if (error.validation) {
      request.log.warn({ err: error }, 'Validation error');
      return reply.status(400).send({
        code: 'VALIDATION_ERROR',
        message: error.message,
        details: error.validation,
      });
    }

    // Client errors raised by Fastify itself (unsupported media type, body too large)
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      request.log.warn({ err: error }, 'Client error');
      return reply.status(statusCode).send({
        code: error.code,
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Unexpected error');
    return reply.status(500).send({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
  });

  // ============================================================================
  // API Info
  // ============================================================================

  server.get('/', async () => {
    return {
      name: 'kafka-redis-bridge',
      description: 'Publishes payloads to Kafka and mirrors them into Redis',
      health: '/api/test/health',
      api: {
        kafkaSend: 'POST /api/test/kafka/send',
        redisSet: 'POST /api/test/redis/set',
        redisGet: 'GET /api/test/redis/get',
        integration: 'POST /api/test/integration/test',
      },
    };
  });

  // ============================================================================
  // Register Routes
  // ============================================================================

  await server.register(testRoutes, { prefix: '/api/test', ...services });

  return server;
}

export async function startServer(): Promise<void> {
  const cache = getCache();
  const producer = getKafkaProducer();
  const consumers = new KafkaConsumerService(cache);

  await provisionTopics();

  const server = await createServer({ producer, cache });

  server.addHook('onClose', async () => {
    await consumers.stop();
    await producer.disconnect();
    await cache.disconnect();
  });

  try {
    await consumers.start();
  } catch (err) {
    // HTTP endpoints stay available without listeners
    server.log.error({ err }, 'Kafka listeners failed to start');
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      server.log.info({ signal }, 'Shutting down');
      server.close().then(
        () => process.exit(0),
        (err: unknown) => {
          server.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        }
      );
    });
  }

  try {
    await server.listen({ port: config.port, host: config.host });
    server.log.info(`Kafka-Redis bridge listening on ${config.host}:${config.port}`);
  } catch (err) {
    server.log.error({ err }, 'Server failed to listen');
    process.exit(1);
  }
}

// Run if executed directly
if (require.main === module) {
  startServer().catch((err: unknown) => {
    logger.fatal({ err }, 'Startup failed');
    process.exit(1);
  });
}
