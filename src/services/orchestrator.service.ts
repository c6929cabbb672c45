import { InboundEvent, OutboundAction, eventText } from '../types/agent';
import { CRMAdapter, LeadDetails } from '../types/crm';
import {
  ExtractedIntent,
  FunnelTransition,
  FunnelTrigger,
  GeneratedReply,
  ManualTrigger,
  Session,
  Turn,
  TurnRole,
} from '../types/conversation';
import { CatalogItem } from './catalog.service';
import { ConversationLocks } from './lock.service';
import { DedupLedger } from './dedup.service';
import { FunnelStateMachine } from './funnel.service';
import { HumanHandoffDetector } from './handoff.service';
import { OwnerNotice, OwnerNotifier } from './notification.service';
import { ReplyGenerator } from './reply/reply.generator';
import { RetryExecutor } from './retry.service';
import { SendActivity } from './delivery.service';
import { SessionStore, createSession } from './session/session.store';
import { DateTime } from 'luxon';
import { logger } from '../utils/logger';
import { NotFoundError, errorMessage } from '../utils/errors';

export const RESEND_AUDIO_MESSAGE = 'Tuve un problema escuchando el audio. ¿Me lo puedes escribir o mandar de nuevo?';
export const PAUSE_CONFIRMATION = 'Bot desactivado. Un asesor humano te atenderá en breve.';
export const RESUME_CONFIRMATION = 'Bot activado de nuevo. ¿En qué te ayudo?';
const IMAGE_WITHOUT_CAPTION = '(Envió una foto)';
const VOICE_NOTE_PLACEHOLDER = '(Nota de voz)';

const PAUSE_COMMAND = '/silencio';
const RESUME_COMMAND = '/activar';

export interface CatalogSource {
  currentCatalog(): readonly CatalogItem[];
  findByModel(name: string): CatalogItem | undefined;
}

export interface AudioResolver {
  resolve(remoteJid: string, messageId: string): Promise<string>;
}

export interface EngineLedgers {
  inbound: DedupLedger;
  outbound: DedupLedger;
  crm: DedupLedger;
}

export interface OrchestratorConfig {
  windowSeconds: number;
  reactivateMinutes: number;
  historyMaxTurns: number;
  fallbackMessage: string;
  humanPhrases?: string[];
  photosPerRequest?: number;
}

export interface OrchestratorDeps {
  store: SessionStore;
  replyGenerator: ReplyGenerator;
  catalog: CatalogSource;
  retry: RetryExecutor;
  ledgers: EngineLedgers;
  crm?: CRMAdapter | null;
  audio?: AudioResolver | null;
  notifier?: OwnerNotifier | null;
  sends?: SendActivity | null;
  locks?: ConversationLocks;
  funnel?: FunnelStateMachine;
  clock?: () => Date;
}

/** The reply for the customer plus the owner alerts the turn raised. */
export interface TurnOutcome {
  action: OutboundAction | null;
  notices: OwnerNotice[];
}

export interface ManualTriggerResult {
  session: Session;
  transitions: FunnelTransition[];
}

export interface EngineStats {
  activeConversations: number;
  ledgers: { inbound: number; outbound: number; crm: number };
}

function uiString(session: Session, key: string): string | undefined {
  const value = session.uiState[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function uiNumber(session: Session, key: string): number {
  const value = session.uiState[key];
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : 0;
}

function isBefore(a: string, b: string): boolean {
  return DateTime.fromISO(a).toMillis() < DateTime.fromISO(b).toMillis();
}

/**
 * Per-conversation processing of gateway events.
 *
 * `handle` admits the event id and enqueues it on the conversation lock in the
 * same synchronous step, so events of one conversation run strictly in
 * admission order while different conversations proceed independently.
 */
export class SessionOrchestrator {
  private readonly store: SessionStore;
  private readonly replyGenerator: ReplyGenerator;
  private readonly catalog: CatalogSource;
  private readonly retry: RetryExecutor;
  private readonly ledgers: EngineLedgers;
  private readonly crm: CRMAdapter | null;
  private readonly audio: AudioResolver | null;
  private readonly notifier: OwnerNotifier | null;
  private readonly sends: SendActivity | null;
  private readonly locks: ConversationLocks;
  private readonly funnel: FunnelStateMachine;
  private readonly detector: HumanHandoffDetector;
  private readonly clock: () => Date;

  constructor(
    deps: OrchestratorDeps,
    private readonly config: OrchestratorConfig
  ) {
    this.store = deps.store;
    this.replyGenerator = deps.replyGenerator;
    this.catalog = deps.catalog;
    this.retry = deps.retry;
    this.ledgers = deps.ledgers;
    this.crm = deps.crm ?? null;
    this.audio = deps.audio ?? null;
    this.notifier = deps.notifier ?? null;
    this.sends = deps.sends ?? null;
    this.locks = deps.locks ?? new ConversationLocks();
    this.funnel = deps.funnel ?? new FunnelStateMachine();
    this.clock = deps.clock ?? (() => new Date());
    this.detector = new HumanHandoffDetector({
      windowSeconds: config.windowSeconds,
      reactivateMinutes: config.reactivateMinutes,
      humanPhrases: config.humanPhrases,
      isBotMessageId: (id) => this.ledgers.outbound.seen(id),
    });
  }

  /** Runs the turn, then sends its owner alerts once the conversation lock is released. */
  async handle(event: InboundEvent): Promise<OutboundAction | null> {
    const { action, notices } = await this.handleTurn(event);
    await this.notify(notices);
    return action;
  }

  handleTurn(event: InboundEvent): Promise<TurnOutcome> {
    // 1. Dedup and enqueue in one synchronous step
    if (!this.ledgers.inbound.admitIfAbsent(event.eventId)) {
      logger.debug('Duplicate event ignored', { eventId: event.eventId, conversationId: event.conversationId });
      return Promise.resolve({ action: null, notices: [] });
    }

    return this.locks.runExclusive(event.conversationId, () => this.process(event));
  }

  async notify(notices: OwnerNotice[]): Promise<void> {
    if (!this.notifier) return;
    for (const notice of notices) {
      await this.notifier.notify(notice);
    }
  }

  async applyManualTrigger(conversationId: string, trigger: ManualTrigger): Promise<ManualTriggerResult> {
    return this.locks.runExclusive(conversationId, async () => {
      const session = await this.requireSession(conversationId);
      const { stage, transitions } = this.funnel.advance(session, trigger);
      session.funnelStage = stage;

      await this.syncCrm(session, transitions, {});
      await this.store.save(session);

      logger.info('Manual funnel trigger applied', { conversationId, trigger, stage });
      return { session, transitions };
    });
  }

  /** Pauses the bot for `minutes`, or until reactivated when no duration is given. */
  async silence(conversationId: string, minutes?: number): Promise<Session> {
    return this.locks.runExclusive(conversationId, async () => {
      const session = await this.requireSession(conversationId);
      if (minutes === undefined) {
        session.pausedByOperator = true;
      } else {
        session.silencedUntil = DateTime.fromJSDate(this.clock()).plus({ minutes }).toUTC().toISO();
      }
      await this.store.save(session);

      logger.info('Conversation silenced by operator', { conversationId, minutes: minutes ?? 'indefinite' });
      return session;
    });
  }

  async reactivate(conversationId: string): Promise<Session> {
    return this.locks.runExclusive(conversationId, async () => {
      const session = await this.requireSession(conversationId);
      session.pausedByOperator = false;
      session.silencedUntil = null;
      await this.store.save(session);

      logger.info('Conversation reactivated', { conversationId });
      return session;
    });
  }

  async getSession(conversationId: string): Promise<Session | null> {
    return this.store.load(conversationId);
  }

  stats(): EngineStats {
    return {
      activeConversations: this.locks.size,
      ledgers: {
        inbound: this.ledgers.inbound.size,
        outbound: this.ledgers.outbound.size,
        crm: this.ledgers.crm.size,
      },
    };
  }

  private async process(event: InboundEvent): Promise<TurnOutcome> {
    // 2. Load or create the session
    const session =
      (await this.store.load(event.conversationId)) ?? createSession(event.conversationId, event.timestamp);
    const notices: OwnerNotice[] = [];

    // 3. Business-side messages: bot echo, automated greeting or a person
    if (event.fromMe) {
      await this.handleBusinessMessage(session, event, notices);
      return { action: null, notices };
    }

    const action = await this.handleCustomerMessage(session, event, notices);
    return { action, notices };
  }

  private async handleBusinessMessage(session: Session, event: InboundEvent, notices: OwnerNotice[]): Promise<void> {
    const assessment = this.detector.assess({
      event,
      history: session.history,
      lastUnattributedAt: uiString(session, 'lastUnattributedAt'),
      lastSentAt: this.sends?.lastSentAt(session.conversationId),
    });

    switch (assessment.origin) {
      case 'customer':
      case 'bot':
      case 'automated':
        return;
      case 'unattributed':
        if (!eventText(event)) return;
        session.uiState.lastUnattributedAt = event.timestamp;
        await this.store.save(session);
        return;
      case 'human': {
        const until = assessment.silencedUntil;
        if (until && (!session.silencedUntil || isBefore(session.silencedUntil, until))) {
          session.silencedUntil = until;
        }
        delete session.uiState.lastUnattributedAt;
        this.appendTurn(session, 'agent', eventText(event), event);
        await this.store.save(session);

        logger.info('Bot silenced after human takeover', {
          conversationId: session.conversationId,
          signal: assessment.signal,
          silencedUntil: session.silencedUntil,
        });
        notices.push({ kind: 'handoff', conversationId: session.conversationId, silencedUntil: session.silencedUntil });
        return;
      }
    }
  }

  private async handleCustomerMessage(
    session: Session,
    event: InboundEvent,
    notices: OwnerNotice[]
  ): Promise<OutboundAction | null> {
    const conversationId = session.conversationId;
    let text = eventText(event);
    let audioFailed = false;

    if (event.payload.kind === 'audio') {
      text = this.audio ? await this.audio.resolve(event.remoteJid, event.payload.messageId) : '';
      audioFailed = text === '';
    } else if (event.payload.kind === 'image' && !text) {
      text = IMAGE_WITHOUT_CAPTION;
    } else if (!text) {
      logger.debug('Event without text ignored', { conversationId, kind: event.payload.kind });
      return null;
    }

    const command = text.trim().toLowerCase();
    const isCommand = command === PAUSE_COMMAND || command === RESUME_COMMAND;

    // 4. A silence window outranks everything, chat commands included
    if (session.silencedUntil) {
      if (isBefore(event.timestamp, session.silencedUntil)) {
        if (isCommand) {
          logger.info('Chat command ignored while silenced', { conversationId, command });
          return null;
        }
        this.recordCustomerTurn(session, event, audioFailed ? VOICE_NOTE_PLACEHOLDER : text);
        await this.store.save(session);
        logger.info('Human handling conversation, bot silent', {
          conversationId,
          silencedUntil: session.silencedUntil,
        });
        return null;
      }
      logger.info('Silence window expired, bot resumes', { conversationId, silencedUntil: session.silencedUntil });
      session.silencedUntil = null;
    }

    // Chat commands toggle the operator pause without counting as a turn
    if (isCommand) {
      return this.applyChatCommand(session, event, command === PAUSE_COMMAND, notices);
    }

    // 5. Bookkeeping happens even while paused
    this.recordCustomerTurn(session, event, audioFailed ? VOICE_NOTE_PLACEHOLDER : text);
    if (session.pausedByOperator) {
      await this.store.save(session);
      logger.info('Bot paused by operator, message recorded', { conversationId });
      return null;
    }

    if (audioFailed) {
      this.appendTurn(session, 'bot', RESEND_AUDIO_MESSAGE);
      await this.store.save(session);
      return this.action(event, RESEND_AUDIO_MESSAGE, [], false);
    }

    // 6. Reply, falling back when the generator keeps failing
    const { reply, degraded } = await this.generateReply(session, event);
    const intent = reply.intent;
    this.rememberIntent(session, intent);

    // 7. Funnel triggers from this turn
    const triggers: FunnelTrigger[] = [];
    if (session.turnCount > 1) triggers.push('FirstContact');
    if (intent.model) triggers.push('ModelMentioned');
    if (intent.appointment?.confirmed) triggers.push('AppointmentConfirmed');

    const { stage, transitions } = this.funnel.advanceAll(session, triggers, {
      model: intent.model ?? uiString(session, 'lastInterest'),
      appointmentWhen: intent.appointment?.when,
    });
    session.funnelStage = stage;

    // 8. CRM sync per transition
    await this.syncCrm(session, transitions, {
      name: uiString(session, 'customerName'),
      interest: uiString(session, 'lastInterest'),
      appointment: intent.appointment?.when,
    });

    // 9. Photo carousel
    const mediaUrls = intent.wantsPhotos ? this.nextPhotos(session, intent) : [];

    // 10. Record the reply and persist
    this.appendTurn(session, 'bot', reply.replyText);
    await this.store.save(session);

    const booked = transitions.find((t) => t.to === 'Appointment');
    notices.push(
      booked
        ? { kind: 'appointment', conversationId, note: booked.note }
        : { kind: 'interest', conversationId, customerText: text, botReply: reply.replyText }
    );

    logger.info('Reply prepared', {
      conversationId,
      turn: session.turnCount,
      stage: session.funnelStage,
      transitions: transitions.length,
      photos: mediaUrls.length,
      degraded,
    });

    return this.action(event, reply.replyText, mediaUrls, degraded);
  }

  private async applyChatCommand(
    session: Session,
    event: InboundEvent,
    pause: boolean,
    notices: OwnerNotice[]
  ): Promise<OutboundAction> {
    session.pausedByOperator = pause;
    session.lastInteractionAt = event.timestamp;

    const confirmation = pause ? PAUSE_CONFIRMATION : RESUME_CONFIRMATION;
    this.appendTurn(session, 'bot', confirmation);
    await this.store.save(session);

    logger.info(pause ? 'Bot paused by chat command' : 'Bot resumed by chat command', {
      conversationId: session.conversationId,
    });
    if (pause) notices.push({ kind: 'handoff', conversationId: session.conversationId, silencedUntil: null });

    return this.action(event, confirmation, [], false);
  }

  private async generateReply(
    session: Session,
    event: InboundEvent
  ): Promise<{ reply: GeneratedReply; degraded: boolean }> {
    try {
      const reply = await this.retry.execute(
        () =>
          this.replyGenerator.generate({
            history: session.history,
            catalog: this.catalog.currentCatalog(),
            turnCount: session.turnCount,
            stage: session.funnelStage,
            now: event.timestamp,
          }),
        { service: 'reply', operation: 'generate' }
      );
      return { reply, degraded: false };
    } catch (error) {
      logger.error('Reply generation failed, sending fallback', {
        conversationId: session.conversationId,
        error: errorMessage(error),
      });
      return { reply: { replyText: this.config.fallbackMessage, intent: {} }, degraded: true };
    }
  }

  private rememberIntent(session: Session, intent: ExtractedIntent): void {
    if (intent.model) session.uiState.lastInterest = intent.model;
    if (intent.customerName) session.uiState.customerName = intent.customerName;
  }

  /** Stage keys already synced are skipped; a key is recorded only after the CRM accepted it. */
  private async syncCrm(session: Session, transitions: FunnelTransition[], details: LeadDetails): Promise<void> {
    if (!this.crm) return;
    const crm = this.crm;

    for (const transition of transitions) {
      const key = `${session.conversationId}|${transition.to}`;
      if (this.ledgers.crm.seen(key)) {
        logger.debug('CRM stage already synced', { key });
        continue;
      }

      try {
        const leadId = await this.retry.execute(
          () => crm.upsertLead(session.conversationId, transition.to, transition.note, details),
          { service: 'crm', operation: 'upsertLead' }
        );
        this.ledgers.crm.admit(key);
        session.crmLeadId = leadId;
      } catch (error) {
        logger.error('CRM sync failed', {
          conversationId: session.conversationId,
          stage: transition.to,
          error: errorMessage(error),
        });
      }
    }
  }

  private nextPhotos(session: Session, intent: ExtractedIntent): string[] {
    const model = intent.model ?? uiString(session, 'lastInterest');
    if (!model) return [];

    const item = this.catalog.findByModel(model);
    if (!item || item.photos.length === 0) return [];

    const sameModel = uiString(session, 'photoModel') === item.model;
    const cursor = sameModel ? uiNumber(session, 'photoCursor') % item.photos.length : 0;
    const count = Math.min(this.config.photosPerRequest ?? 1, item.photos.length);

    const urls: string[] = [];
    for (let i = 0; i < count; i++) {
      urls.push(item.photos[(cursor + i) % item.photos.length]);
    }

    session.uiState.photoModel = item.model;
    session.uiState.photoCursor = (cursor + count) % item.photos.length;
    return urls;
  }

  private recordCustomerTurn(session: Session, event: InboundEvent, text: string): void {
    session.turnCount += 1;
    session.lastInteractionAt = event.timestamp;
    this.appendTurn(session, 'customer', text, event);
  }

  private appendTurn(session: Session, role: TurnRole, text: string, event?: InboundEvent): void {
    const turn: Turn = { role, text, at: event ? event.timestamp : this.clock().toISOString() };
    if (event) turn.messageId = event.eventId;
    session.history.push(turn);

    const overflow = session.history.length - this.config.historyMaxTurns;
    if (overflow > 0) session.history.splice(0, overflow);
  }

  private action(event: InboundEvent, text: string, mediaUrls: string[], degraded: boolean): OutboundAction {
    return { conversationId: event.conversationId, remoteJid: event.remoteJid, text, mediaUrls, degraded };
  }

  private async requireSession(conversationId: string): Promise<Session> {
    const session = await this.store.load(conversationId);
    if (!session) throw new NotFoundError(`Conversation ${conversationId} not found`);
    return session;
  }
}
