import { HumanHandoffDetector, isAutomatedGreeting } from '../../src/services/handoff.service';
import { createInboundEvent, EventPayload } from '../../src/types/agent';
import { Turn } from '../../src/types/conversation';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const BOT_TEXT = 'Con gusto, la Tunland G9 está disponible.';

const history: Turn[] = [
  { role: 'customer', text: 'Hola, info de la Tunland', at: '2026-06-01T09:59:50.000Z' },
  { role: 'bot', text: BOT_TEXT, at: '2026-06-01T10:00:00.000Z' },
];

function outbound(timestamp: string, payload: EventPayload, eventId = `evt-${timestamp}`) {
  return createInboundEvent({
    eventId,
    conversationId: '5215512345678',
    remoteJid: '5215512345678@s.whatsapp.net',
    timestamp,
    fromMe: true,
    payload,
  });
}

function text(value: string): EventPayload {
  return { kind: 'text', text: value };
}

describe('HumanHandoffDetector', () => {
  const botIds = new Set(['bot-msg-1']);
  const detector = new HumanHandoffDetector({
    windowSeconds: 120,
    reactivateMinutes: 30,
    isBotMessageId: (id) => botIds.has(id),
  });

  it('should report customer messages as such', () => {
    const event = createInboundEvent({ ...outbound('2026-06-01T10:00:30.000Z', text('hola')), fromMe: false });

    expect(detector.assess({ event, history })).toEqual({
      origin: 'customer',
      humanActive: false,
      signal: null,
      silencedUntil: null,
    });
  });

  it('should recognise the bot own message by id', () => {
    const event = outbound('2026-06-01T10:30:00.000Z', text('anything'), 'bot-msg-1');
    expect(detector.assess({ event, history }).origin).toBe('bot');
  });

  it('should recognise the bot own message by text', () => {
    const event = outbound('2026-06-01T10:00:01.000Z', text(`  ${BOT_TEXT} `), 'unknown-id');
    expect(detector.assess({ event, history }).origin).toBe('bot');
  });

  it('should ignore automated greetings', () => {
    const event = outbound('2026-06-01T11:00:00.000Z', text('Hola, bienvenido. Mira nuestro catálogo: wa.me/c/5215500000000'));
    expect(detector.assess({ event, history })).toMatchObject({ origin: 'automated', humanActive: false });
  });

  it('should flag a message far from the last bot reply', () => {
    const event = outbound('2026-06-01T10:05:00.000Z', text('Claro, le confirmo'));

    expect(detector.assess({ event, history })).toEqual({
      origin: 'human',
      humanActive: true,
      signal: 'origin',
      silencedUntil: '2026-06-01T10:35:00.000Z',
    });
  });

  it('should flag a business message when the bot never replied', () => {
    const event = outbound('2026-06-01T10:00:10.000Z', text('Claro, le confirmo'));
    expect(detector.assess({ event, history: history.slice(0, 1) }).signal).toBe('origin');
  });

  it('should flag emoji inside the window', () => {
    const event = outbound('2026-06-01T10:00:30.000Z', text('Claro 👍'));
    expect(detector.assess({ event, history })).toMatchObject({ origin: 'human', signal: 'emoji' });
  });

  it('should flag human phrases inside the window', () => {
    const event = outbound('2026-06-01T10:00:30.000Z', text('Un momento, lo reviso'));
    expect(detector.assess({ event, history })).toMatchObject({ origin: 'human', signal: 'human-phrase' });
  });

  it('should match phrases on whole words only', () => {
    const event = outbound('2026-06-01T10:00:30.000Z', text('Tenemos la Toano Panel'));
    expect(detector.assess({ event, history })).toEqual({
      origin: 'unattributed',
      humanActive: false,
      signal: null,
      silencedUntil: null,
    });
  });

  it('should accept custom phrases', () => {
    const custom = new HumanHandoffDetector({
      windowSeconds: 120,
      reactivateMinutes: 30,
      isBotMessageId: () => false,
      humanPhrases: ['con permiso'],
    });
    const event = outbound('2026-06-01T10:00:30.000Z', text('Con permiso, le comparto'));

    expect(custom.assess({ event, history }).signal).toBe('human-phrase');
    expect(custom.assess({ event: outbound('2026-06-01T10:00:30.000Z', text('Un momento')), history }).origin).toBe(
      'unattributed'
    );
  });

  it('should flag a second unattributed message close to the first', () => {
    const event = outbound('2026-06-01T10:00:40.000Z', text('Sí, disponible'));

    expect(detector.assess({ event, history, lastUnattributedAt: '2026-06-01T10:00:20.000Z' })).toMatchObject({
      origin: 'human',
      signal: 'timing',
      silencedUntil: '2026-06-01T10:30:40.000Z',
    });
  });

  it('should ignore an unattributed message older than the last bot reply', () => {
    const event = outbound('2026-06-01T10:00:40.000Z', text('Sí, disponible'));
    expect(detector.assess({ event, history, lastUnattributedAt: '2026-06-01T09:59:55.000Z' }).origin).toBe(
      'unattributed'
    );
  });

  it('should measure the window from the last send when it trails the reply', () => {
    const photoEcho = outbound('2026-06-01T10:02:10.000Z', { kind: 'image', caption: '' }, 'out-photo');

    expect(detector.assess({ event: photoEcho, history }).signal).toBe('origin');
    expect(detector.assess({ event: photoEcho, history, lastSentAt: '2026-06-01T10:02:05.000Z' })).toEqual({
      origin: 'unattributed',
      humanActive: false,
      signal: null,
      silencedUntil: null,
    });
  });

  it('should keep the reply time as anchor when the last send is older', () => {
    const event = outbound('2026-06-01T10:01:00.000Z', text('Claro, le confirmo'));
    expect(detector.assess({ event, history, lastSentAt: '2026-06-01T09:50:00.000Z' }).origin).toBe('unattributed');
  });

  it('should not use timing for messages without text', () => {
    const event = outbound('2026-06-01T10:00:40.000Z', { kind: 'image', caption: '' });
    expect(detector.assess({ event, history, lastUnattributedAt: '2026-06-01T10:00:20.000Z' }).origin).toBe(
      'unattributed'
    );
  });
});

describe('isAutomatedGreeting', () => {
  it('should detect away messages', () => {
    expect(isAutomatedGreeting('En este momento no estamos disponibles')).toBe(true);
    expect(isAutomatedGreeting('Mensaje fuera de horario, gracias')).toBe(true);
  });

  it('should not match ordinary replies', () => {
    expect(isAutomatedGreeting('Hola, ¿qué modelo te interesa?')).toBe(false);
    expect(isAutomatedGreeting('')).toBe(false);
  });
});
