import { z } from 'zod';
import { Session } from '../../types/conversation';
import { SessionStore, sessionSchema, withPersistence } from './session.store';

export type QueryFn = (text: string, params?: unknown[]) => Promise<{ rows: unknown[] }>;

const rowSchema = z.object({ data: sessionSchema });

/** One JSONB row per conversation in `sessions` (migrations/001_sessions.sql). */
export class PostgresSessionStore implements SessionStore {
  readonly kind = 'postgres' as const;

  constructor(
    private readonly query: QueryFn,
    private readonly end?: () => Promise<void>
  ) {}

  async load(conversationId: string): Promise<Session | null> {
    return withPersistence('load', conversationId, async () => {
      const result = await this.query('SELECT data FROM sessions WHERE conversation_id = $1', [conversationId]);
      if (result.rows.length === 0) return null;
      return rowSchema.parse(result.rows[0]).data;
    });
  }

  async save(session: Session): Promise<void> {
    await withPersistence('save', session.conversationId, async () => {
      await this.query(
        `INSERT INTO sessions (conversation_id, funnel_stage, data, updated_at)
         VALUES ($1, $2, $3, NOW())
         ON CONFLICT (conversation_id)
         DO UPDATE SET funnel_stage = EXCLUDED.funnel_stage, data = EXCLUDED.data, updated_at = NOW()`,
        [session.conversationId, session.funnelStage, JSON.stringify(session)]
      );
    });
  }

  async close(): Promise<void> {
    if (this.end) await this.end();
  }
}
