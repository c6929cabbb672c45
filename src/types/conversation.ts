export const FUNNEL_STAGES = ['New', 'Engaged', 'Interested', 'Appointment', 'NoShow', 'Closed'] as const;
export type FunnelStage = (typeof FUNNEL_STAGES)[number];

export const FUNNEL_TRIGGERS = [
  'FirstContact',
  'Reply',
  'ModelMentioned',
  'AppointmentConfirmed',
  'ManualNoShow',
  'ManualClosed',
] as const;
export type FunnelTrigger = (typeof FUNNEL_TRIGGERS)[number];

export type ManualTrigger = Extract<FunnelTrigger, 'ManualNoShow' | 'ManualClosed'>;

export type TurnRole = 'customer' | 'bot' | 'agent';

export interface Turn {
  role: TurnRole;
  text: string;
  at: string;
  messageId?: string;
}

export type UiState = Record<string, unknown>;

export interface Session {
  conversationId: string;
  turnCount: number;
  funnelStage: FunnelStage;
  createdAt: string;
  lastInteractionAt: string;
  // Human-handoff window end (ISO). Null when the bot is active.
  silencedUntil: string | null;
  // Set by an operator; only an explicit reactivation clears it.
  pausedByOperator: boolean;
  history: Turn[];
  uiState: UiState;
  crmLeadId: string | null;
}

export interface FunnelTransition {
  from: FunnelStage;
  trigger: FunnelTrigger;
  to: FunnelStage;
  note: string;
}

/**
 * Facts the reply generator extracted from the conversation. The orchestrator
 * derives funnel triggers from these and never infers them on its own.
 */
export interface ExtractedIntent {
  model?: string;
  appointment?: { confirmed: boolean; when?: string };
  customerName?: string;
  wantsPhotos?: boolean;
}

export interface GeneratedReply {
  replyText: string;
  intent: ExtractedIntent;
}
