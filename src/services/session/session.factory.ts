import { Env } from '../../config/env';
import { logger } from '../../utils/logger';
import { MemorySessionStore } from './memory.store';
import { PostgresSessionStore } from './postgres.store';
import { RedisSessionStore } from './redis.store';
import { SessionStore } from './session.store';

/**
 * Builds the store named by SESSION_STORE. The Redis and Postgres clients are
 * loaded on demand so the in-memory default never opens a connection.
 */
export async function createSessionStore(kind: Env['SESSION_STORE']): Promise<SessionStore> {
  switch (kind) {
    case 'redis': {
      const { connectRedis, redisKeyValue } = await import('../../config/redis');
      await connectRedis();
      logger.info('Session store: redis');
      return new RedisSessionStore(redisKeyValue());
    }
    case 'postgres': {
      const { query, pool } = await import('../../config/database');
      logger.info('Session store: postgres');
      return new PostgresSessionStore(query, () => pool.end());
    }
    case 'memory':
      logger.warn('Session store: memory (sessions are lost on restart)');
      return new MemorySessionStore();
  }
}
