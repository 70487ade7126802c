import Redis from 'ioredis';
import type { RedisSettings } from '../config/settings';
import { buildProducerOptions } from '../queues/types/queue-configs';
import { Logger } from '../logging/logger';

const logger = new Logger('redis');

let producerConnection: Redis | undefined;

function attachListeners(connection: Redis, role: string): Redis {
  connection.on('connect', () => {
    logger.info(`Redis ${role} connection established`);
  });

  connection.on('error', (err) => {
    logger.logError(`Redis ${role} connection error`, err);
  });

  return connection;
}

/**
 * Shared connection used to publish envelopes. Commands fail immediately while
 * Redis is unreachable.
 */
export function getProducerConnection(settings: RedisSettings): Redis {
  if (!producerConnection) {
    producerConnection = attachListeners(new Redis(buildProducerOptions(settings)), 'producer');
  }
  return producerConnection;
}

export async function closeRedisConnections(): Promise<void> {
  if (producerConnection) {
    const connection = producerConnection;
    producerConnection = undefined;
    await connection.quit();
  }
}
