import { createClient } from 'redis';
import { env } from './env';
import { logger } from '../utils/logger';
import { RedisKeyValue } from '../services/session/redis.store';

export const redis = createClient({ url: env.REDIS_URL });

redis.on('error', (err: Error) => {
  logger.error('Redis error', { error: err.message });
});

redis.on('connect', () => {
  logger.info('Redis connected');
});

export async function connectRedis(): Promise<void> {
  if (!redis.isOpen) {
    await redis.connect();
  }
}

/** Narrows the client to the commands the session store uses. */
export function redisKeyValue(): RedisKeyValue {
  return {
    get: async (key) => {
      const value = await redis.get(key);
      return value === null || value === undefined ? null : String(value);
    },
    set: async (key, value) => {
      await redis.set(key, value);
    },
    quit: async () => {
      if (redis.isOpen) await redis.quit();
    },
  };
}
