import { FunnelStateMachine } from '../../src/services/funnel.service';
import { FUNNEL_STAGES, FUNNEL_TRIGGERS, FunnelStage } from '../../src/types/conversation';

describe('FunnelStateMachine', () => {
  const funnel = new FunnelStateMachine();
  const order: Record<FunnelStage, number> = { New: 0, Engaged: 1, Interested: 2, Appointment: 3, NoShow: 4, Closed: 4 };

  it('should not engage on the first turn', () => {
    const result = funnel.advance({ funnelStage: 'New', turnCount: 1 }, 'FirstContact');
    expect(result).toEqual({ stage: 'New', transitions: [] });
  });

  it('should engage on the second turn', () => {
    const result = funnel.advance({ funnelStage: 'New', turnCount: 2 }, 'FirstContact');
    expect(result).toEqual({
      stage: 'Engaged',
      transitions: [{ from: 'New', trigger: 'FirstContact', to: 'Engaged', note: 'Customer engaged (turn 2)' }],
    });
  });

  it('should move Engaged to Interested on a model mention', () => {
    const result = funnel.advance({ funnelStage: 'Engaged', turnCount: 3 }, 'ModelMentioned', { model: 'Tunland G9' });
    expect(result.stage).toBe('Interested');
    expect(result.transitions[0].note).toBe('Interested in: Tunland G9');
  });

  it('should move Interested to Appointment when confirmed', () => {
    const result = funnel.advance({ funnelStage: 'Interested', turnCount: 5 }, 'AppointmentConfirmed', {
      appointmentWhen: 'lunes 10 AM',
    });
    expect(result.stage).toBe('Appointment');
    expect(result.transitions[0].note).toBe('Appointment confirmed: lunes 10 AM');
  });

  it('should not skip stages', () => {
    expect(funnel.advance({ funnelStage: 'New', turnCount: 1 }, 'ModelMentioned').stage).toBe('New');
    expect(funnel.advance({ funnelStage: 'Engaged', turnCount: 4 }, 'AppointmentConfirmed').stage).toBe('Engaged');
  });

  it('should treat Reply as a no-op', () => {
    expect(funnel.advance({ funnelStage: 'Engaged', turnCount: 4 }, 'Reply').transitions).toEqual([]);
  });

  it('should fold several triggers of one turn in order', () => {
    const result = funnel.advanceAll({ funnelStage: 'New', turnCount: 2 }, ['FirstContact', 'ModelMentioned'], {
      model: 'Miller',
    });

    expect(result.stage).toBe('Interested');
    expect(result.transitions.map((t) => `${t.from}->${t.to}`)).toEqual(['New->Engaged', 'Engaged->Interested']);
  });

  it('should apply manual terminals from any stage', () => {
    for (const stage of FUNNEL_STAGES) {
      if (stage !== 'Closed') {
        expect(funnel.advance({ funnelStage: stage, turnCount: 3 }, 'ManualClosed').stage).toBe('Closed');
      }
      if (stage !== 'NoShow') {
        expect(funnel.advance({ funnelStage: stage, turnCount: 3 }, 'ManualNoShow').stage).toBe('NoShow');
      }
    }
  });

  it('should ignore automatic triggers once terminal', () => {
    for (const stage of ['NoShow', 'Closed'] as const) {
      for (const trigger of ['FirstContact', 'Reply', 'ModelMentioned', 'AppointmentConfirmed'] as const) {
        expect(funnel.advance({ funnelStage: stage, turnCount: 9 }, trigger)).toEqual({ stage, transitions: [] });
      }
    }
  });

  it('should never move backward on automatic triggers', () => {
    const automatic = FUNNEL_TRIGGERS.filter((t) => t !== 'ManualNoShow' && t !== 'ManualClosed');
    for (const stage of FUNNEL_STAGES) {
      for (const trigger of automatic) {
        for (const turnCount of [1, 2, 7]) {
          const { stage: next } = funnel.advance({ funnelStage: stage, turnCount }, trigger);
          expect(order[next]).toBeGreaterThanOrEqual(order[stage]);
        }
      }
    }
  });

  it('should report terminal stages', () => {
    expect(funnel.isTerminal('Closed')).toBe(true);
    expect(funnel.isTerminal('NoShow')).toBe(true);
    expect(funnel.isTerminal('Appointment')).toBe(false);
  });
});
