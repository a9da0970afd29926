import type { WorkerConfig } from '../config';
import { FileCheckpointStore } from './fileStore';
import { RedisCheckpointStore, type CheckpointRedisClient } from './redisStore';
import { InMemoryCheckpointStore, type CheckpointStore } from './store';

export * from './store';
export * from './fileStore';
export * from './redisStore';
export * from './log';

/**
 * Picks the checkpoint backend named in the worker config.
 * `connectRedis` is only called for the redis backend.
 */
export function createCheckpointStore(
  config: WorkerConfig['checkpoint'],
  connectRedis: (url: string) => CheckpointRedisClient,
): CheckpointStore {
  switch (config.backend) {
    case 'redis':
      if (!config.redisUrl) {
        throw new Error('Redis URL is required when backend is "redis"');
      }
      return new RedisCheckpointStore(connectRedis(config.redisUrl));
    case 'memory':
      return new InMemoryCheckpointStore();
    case 'file':
      return new FileCheckpointStore(config.dir);
  }
}
