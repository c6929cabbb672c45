import { DateTime } from 'luxon';
import { InboundEvent, eventText } from '../types/agent';
import { Turn } from '../types/conversation';
import { logger } from '../utils/logger';

/** Where a business-side (fromMe) message came from, as far as the detector can tell. */
export type OutboundOrigin = 'customer' | 'bot' | 'automated' | 'unattributed' | 'human';

export type HandoffSignal = 'origin' | 'emoji' | 'human-phrase' | 'timing';

export interface HandoffAssessment {
  origin: OutboundOrigin;
  humanActive: boolean;
  signal: HandoffSignal | null;
  silencedUntil: string | null;
}

export interface HandoffInput {
  event: InboundEvent;
  history: Turn[];
  // Timestamp of the last fromMe message that landed inside the detection window without a signal
  lastUnattributedAt?: string | null;
  // When the gateway last sent for this conversation; echoes trail the send, not the reply
  lastSentAt?: string | null;
}

export interface HandoffDetectorOptions {
  windowSeconds: number;
  reactivateMinutes: number;
  isBotMessageId: (messageId: string) => boolean;
  humanPhrases?: string[];
}

export const DEFAULT_HUMAN_PHRASES = [
  // Things a sales rep says that the bot never does
  'un momento', 'déjame verificar', 'déjame revisar', 'te marco', 'te llamo',
  'te hablo', 'estoy revisando', 'dame un segundo', 'te contacto', 'te escribo',
  'ahora te', 'espérame', 'un sec',
  // Informal spellings
  'aver', 'haber si', 'ps si', 'nel', 'simon', 'sisas', 'ok ok', 'oks',
];

const RECENT_BOT_TEXTS = 10;

const EMOJI_PATTERN = /\p{Extended_Pictographic}/u;

interface SignalContext {
  text: string;
  inWindow: boolean;
  lastUnattributedAt: DateTime | null;
  at: DateTime;
}

type SignalEvaluator = {
  signal: HandoffSignal;
  matches: (ctx: SignalContext) => boolean;
};

/**
 * WhatsApp Business greeting and away messages go out from the business number
 * without anyone typing them.
 */
export function isAutomatedGreeting(text: string): boolean {
  if (!text) return false;
  const lower = text.toLowerCase();

  return (
    (lower.includes('bienvenido') && lower.includes('wa.me')) ||
    ((lower.includes('catálogo') || lower.includes('catalogo')) && lower.includes('wa.me')) ||
    lower.includes('wa.me/c/') ||
    lower.includes('no estamos disponibles') ||
    lower.includes('fuera de horario') ||
    (lower.includes('te contactaremos') && lower.includes('pronto')) ||
    (lower.startsWith('hola') && lower.includes('bienvenido') && text.length < 200)
  );
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function phraseMatcher(phrases: string[]): RegExp | null {
  const cleaned = phrases.map((p) => p.trim().toLowerCase()).filter((p) => p.length > 0);
  if (cleaned.length === 0) return null;
  // Whole words only: "nel" must not fire inside "panel"
  return new RegExp(`(?<![\\p{L}\\p{N}])(?:${cleaned.map(escapeRegExp).join('|')})(?![\\p{L}\\p{N}])`, 'u');
}

function latest(a: DateTime | null, b: DateTime | null): DateTime | null {
  if (!a) return b;
  if (!b) return a;
  return a.toMillis() >= b.toMillis() ? a : b;
}

export class HumanHandoffDetector {
  private readonly evaluators: SignalEvaluator[];
  private readonly phrasePattern: RegExp | null;

  constructor(private readonly options: HandoffDetectorOptions) {
    this.phrasePattern = phraseMatcher(options.humanPhrases ?? DEFAULT_HUMAN_PHRASES);

    // Order matters only for which signal is reported
    this.evaluators = [
      { signal: 'origin', matches: (ctx) => !ctx.inWindow },
      { signal: 'emoji', matches: (ctx) => EMOJI_PATTERN.test(ctx.text) },
      {
        signal: 'human-phrase',
        matches: (ctx) => this.phrasePattern !== null && this.phrasePattern.test(ctx.text.toLowerCase()),
      },
      {
        signal: 'timing',
        matches: (ctx) =>
          ctx.text.length > 0 &&
          ctx.lastUnattributedAt !== null &&
          ctx.at.diff(ctx.lastUnattributedAt, 'seconds').seconds <= this.options.windowSeconds,
      },
    ];
  }

  assess(input: HandoffInput): HandoffAssessment {
    const { event, history } = input;
    if (!event.fromMe) {
      return { origin: 'customer', humanActive: false, signal: null, silencedUntil: null };
    }

    const text = eventText(event);
    const botTurns = history.filter((turn) => turn.role === 'bot');

    if (this.isBotEcho(event.eventId, text, botTurns)) {
      return { origin: 'bot', humanActive: false, signal: null, silencedUntil: null };
    }

    if (isAutomatedGreeting(text)) {
      logger.info('Automated greeting from business account, not a handoff', {
        conversationId: event.conversationId,
        preview: text.substring(0, 80),
      });
      return { origin: 'automated', humanActive: false, signal: null, silencedUntil: null };
    }

    const at = DateTime.fromISO(event.timestamp, { setZone: true });
    const lastBot = latest(
      botTurns.length > 0 ? DateTime.fromISO(botTurns[botTurns.length - 1].at) : null,
      input.lastSentAt ? DateTime.fromISO(input.lastSentAt) : null
    );
    const secondsSinceBot = lastBot ? at.diff(lastBot, 'seconds').seconds : null;
    const lastUnattributedAt = input.lastUnattributedAt ? DateTime.fromISO(input.lastUnattributedAt) : null;

    const ctx: SignalContext = {
      text,
      inWindow: secondsSinceBot !== null && secondsSinceBot < this.options.windowSeconds,
      lastUnattributedAt:
        lastUnattributedAt && lastBot && lastUnattributedAt.toMillis() >= lastBot.toMillis()
          ? lastUnattributedAt
          : null,
      at,
    };

    const hit = this.evaluators.find((evaluator) => evaluator.matches(ctx));
    if (!hit) {
      return { origin: 'unattributed', humanActive: false, signal: null, silencedUntil: null };
    }

    const silencedUntil = at.plus({ minutes: this.options.reactivateMinutes }).toUTC().toISO();
    logger.info('Human takeover detected', {
      conversationId: event.conversationId,
      signal: hit.signal,
      secondsSinceBot,
      silencedUntil,
    });

    return { origin: 'human', humanActive: true, signal: hit.signal, silencedUntil };
  }

  private isBotEcho(messageId: string, text: string, botTurns: Turn[]): boolean {
    if (messageId && this.options.isBotMessageId(messageId)) return true;
    if (!text) return false;
    return botTurns.slice(-RECENT_BOT_TEXTS).some((turn) => turn.text.trim() === text);
  }
}
