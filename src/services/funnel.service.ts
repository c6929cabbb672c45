import { FunnelStage, FunnelTransition, FunnelTrigger, Session } from '../types/conversation';

export interface FunnelAdvance {
  stage: FunnelStage;
  transitions: FunnelTransition[];
}

type FunnelContext = Pick<Session, 'funnelStage' | 'turnCount'>;

export interface TriggerDetail {
  model?: string;
  appointmentWhen?: string;
}

const TERMINAL_STAGES: ReadonlySet<FunnelStage> = new Set(['NoShow', 'Closed']);

/**
 * Sales funnel: New → Engaged → Interested → Appointment, with NoShow and
 * Closed reachable from anywhere by an operator. Automatic triggers only move
 * forward and do nothing once a terminal stage is reached.
 */
export class FunnelStateMachine {
  advance(session: FunnelContext, trigger: FunnelTrigger, detail: TriggerDetail = {}): FunnelAdvance {
    const from = session.funnelStage;
    const to = this.next(from, trigger, session.turnCount);

    if (to === null) {
      return { stage: from, transitions: [] };
    }

    return {
      stage: to,
      transitions: [{ from, trigger, to, note: this.note(to, trigger, session.turnCount, detail) }],
    };
  }

  /** Applies the triggers of one turn in order, each seeing the stage the previous one left. */
  advanceAll(session: FunnelContext, triggers: FunnelTrigger[], detail: TriggerDetail = {}): FunnelAdvance {
    let stage = session.funnelStage;
    const transitions: FunnelTransition[] = [];

    for (const trigger of triggers) {
      const result = this.advance({ funnelStage: stage, turnCount: session.turnCount }, trigger, detail);
      stage = result.stage;
      transitions.push(...result.transitions);
    }

    return { stage, transitions };
  }

  isTerminal(stage: FunnelStage): boolean {
    return TERMINAL_STAGES.has(stage);
  }

  private next(from: FunnelStage, trigger: FunnelTrigger, turnCount: number): FunnelStage | null {
    switch (trigger) {
      case 'ManualNoShow':
        return from === 'NoShow' ? null : 'NoShow';
      case 'ManualClosed':
        return from === 'Closed' ? null : 'Closed';
      case 'FirstContact':
        return from === 'New' && turnCount > 1 ? 'Engaged' : null;
      case 'ModelMentioned':
        return from === 'Engaged' ? 'Interested' : null;
      case 'AppointmentConfirmed':
        return from === 'Interested' ? 'Appointment' : null;
      case 'Reply':
        return null;
    }
  }

  private note(to: FunnelStage, trigger: FunnelTrigger, turnCount: number, detail: TriggerDetail): string {
    switch (to) {
      case 'Engaged':
        return `Customer engaged (turn ${turnCount})`;
      case 'Interested':
        return `Interested in: ${detail.model ?? 'unspecified model'}`;
      case 'Appointment':
        return `Appointment confirmed: ${detail.appointmentWhen ?? 'time to be agreed'}`;
      case 'NoShow':
        return 'Marked as no-show by operator';
      case 'Closed':
        return 'Closed by operator';
      case 'New':
        return `Stage reset by ${trigger}`;
    }
  }
}
