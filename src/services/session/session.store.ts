import { z } from 'zod';
import { FUNNEL_STAGES, Session } from '../../types/conversation';
import { PersistenceFailure, toError } from '../../utils/errors';

export interface SessionStore {
  readonly kind: 'memory' | 'redis' | 'postgres';
  load(conversationId: string): Promise<Session | null>;
  save(session: Session): Promise<void>;
  close?(): Promise<void>;
}

const turnSchema = z.object({
  role: z.enum(['customer', 'bot', 'agent']),
  text: z.string(),
  at: z.string(),
  messageId: z.string().optional(),
});

export const sessionSchema = z.object({
  conversationId: z.string().min(1),
  turnCount: z.number().int().nonnegative(),
  funnelStage: z.enum(FUNNEL_STAGES),
  createdAt: z.string(),
  lastInteractionAt: z.string(),
  silencedUntil: z.string().nullable().default(null),
  pausedByOperator: z.boolean().default(false),
  history: z.array(turnSchema).default([]),
  uiState: z.record(z.unknown()).default({}),
  crmLeadId: z.string().nullable().default(null),
});

export function createSession(conversationId: string, now: string): Session {
  return {
    conversationId,
    turnCount: 0,
    funnelStage: 'New',
    createdAt: now,
    lastInteractionAt: now,
    silencedUntil: null,
    pausedByOperator: false,
    history: [],
    uiState: {},
    crmLeadId: null,
  };
}

/** Stored documents are validated on the way in; a corrupt row is a load failure. */
export function parseStoredSession(raw: unknown): Session {
  return sessionSchema.parse(raw);
}

export async function withPersistence<T>(
  operation: 'load' | 'save',
  conversationId: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof PersistenceFailure) throw error;
    throw new PersistenceFailure(operation, conversationId, toError(error));
  }
}
