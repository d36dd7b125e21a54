import { Redis } from 'ioredis';

/**
 * ioredis client with the options used across the project. Call
 * `connect()` explicitly; subscribers need a dedicated client because a
 * connection in subscriber mode cannot issue regular commands.
 */
export function createRedisClient(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}
