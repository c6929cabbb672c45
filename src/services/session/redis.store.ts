import { Session } from '../../types/conversation';
import { logger } from '../../utils/logger';
import { SessionStore, parseStoredSession, withPersistence } from './session.store';

const KEY_PREFIX = 'session:';

/** The two commands the store needs, so tests can hand in a map-backed fake. */
export interface RedisKeyValue {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  quit?(): Promise<void>;
}

/** Sessions are long-lived records: keys are written without an expiry. */
export class RedisSessionStore implements SessionStore {
  readonly kind = 'redis' as const;

  constructor(private readonly client: RedisKeyValue) {}

  async load(conversationId: string): Promise<Session | null> {
    return withPersistence('load', conversationId, async () => {
      const data = await this.client.get(`${KEY_PREFIX}${conversationId}`);
      if (!data) return null;
      return parseStoredSession(JSON.parse(data));
    });
  }

  async save(session: Session): Promise<void> {
    await withPersistence('save', session.conversationId, async () => {
      await this.client.set(`${KEY_PREFIX}${session.conversationId}`, JSON.stringify(session));
    });
  }

  async close(): Promise<void> {
    if (this.client.quit) {
      await this.client.quit();
      logger.info('Redis session store closed');
    }
  }
}
