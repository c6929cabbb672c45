import { Session } from '../../types/conversation';
import { SessionStore } from './session.store';

/**
 * Process-local store. Sessions are copied in and out so callers never share
 * a reference with the stored value.
 */
export class MemorySessionStore implements SessionStore {
  readonly kind = 'memory' as const;
  private readonly sessions = new Map<string, Session>();

  async load(conversationId: string): Promise<Session | null> {
    const stored = this.sessions.get(conversationId);
    return stored ? structuredClone(stored) : null;
  }

  async save(session: Session): Promise<void> {
    this.sessions.set(session.conversationId, structuredClone(session));
  }

  get size(): number {
    return this.sessions.size;
  }
}
