/**
 * Logging
 *
 * One set of pino options shared by the Fastify server and the
 * Kafka/Redis modules, so every line lands in the same stream.
 */

import pino, { type Logger } from 'pino';

export const loggerOptions = {
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
};

export const logger = pino(loggerOptions);

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
