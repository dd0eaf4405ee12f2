import { Redis } from 'ioredis';

/**
 * Creates an ioredis client with the options every connection in this
 * service uses. Call `connect()` before issuing commands.
 */
export function createRedisClient(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    maxRetriesPerRequest: null,   // required for blocking stream reads (no auto-fail)
    enableReadyCheck: true,
    lazyConnect: true,
  });
}
