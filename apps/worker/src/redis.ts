/**
 * Redis connection for the checkpoint store
 */
import Redis from 'ioredis';

import { parseRedisUrl } from './config';
import { componentLogger, type Logger } from './logger';

export interface RedisConfig {
  url?: string;
  /**
   * Max retry attempts per command and for reconnecting
   * @default 3
   */
  maxRetries?: number;
  logger?: Logger;
}

export function createRedisClient(config: RedisConfig = {}): Redis {
  const { url, maxRetries = 3 } = config;
  if (!url) {
    throw new Error('Redis URL is required');
  }
  const log = config.logger ?? componentLogger('redis');

  const client = new Redis({
    ...parseRedisUrl(url),
    maxRetriesPerRequest: maxRetries,
    enableOfflineQueue: true,
    retryStrategy: (times: number) => {
      if (times > maxRetries) {
        return null;
      }
      // 50ms, 100ms, 150ms... capped at 2s
      return Math.min(times * 50, 2000);
    },
  });

  client.on('error', (err: Error) => {
    log.error({ err }, 'redis connection error');
  });
  client.on('connect', () => {
    log.debug('redis connected');
  });
  client.on('reconnecting', () => {
    log.warn('redis reconnecting');
  });

  return client;
}
