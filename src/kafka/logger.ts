/**
 * kafkajs Logging
 * Routes the client's internal log entries through pino
 */

import { logLevel, type logCreator } from 'kafkajs';
import { createLogger } from '../lib/logger.js';

const log = createLogger('kafkajs');

/**
 * kafkajs level matching a pino level name
 */
export function toKafkaLogLevel(level: string): logLevel {
  switch (level) {
    case 'silent':
      return logLevel.NOTHING;
    case 'fatal':
    case 'error':
      return logLevel.ERROR;
    case 'warn':
      return logLevel.WARN;
    case 'debug':
    case 'trace':
      return logLevel.DEBUG;
    default:
      return logLevel.INFO;
  }
}

export const pinoLogCreator: logCreator = () => ({ namespace, level, log: entry }) => {
  const { message, ...fields } = entry;
  const bindings = { namespace, ...fields };

  switch (level) {
    case logLevel.ERROR:
    case logLevel.NOTHING:
      log.error(bindings, message);
      break;
    case logLevel.WARN:
      log.warn(bindings, message);
      break;
    case logLevel.INFO:
      log.info(bindings, message);
      break;
    default:
      log.debug(bindings, message);
  }
};
