import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export interface TextSender {
  sendText(to: string, text: string): Promise<string | null>;
}

const INTEREST_KEYWORDS = [
  'precio', 'cuanto', 'cuánto', 'interesa', 'verlo', 'ubicacion', 'ubicación',
  'dónde', 'donde', 'trato', 'comprar', 'informes', 'info',
];

export type OwnerNotice =
  | { kind: 'appointment'; conversationId: string; note: string }
  | { kind: 'handoff'; conversationId: string; silencedUntil: string | null }
  | { kind: 'interest'; conversationId: string; customerText: string; botReply: string };

/**
 * Short WhatsApp alerts to the business owner. Alerts never fail the caller:
 * a send error is logged and dropped.
 */
export class OwnerNotifier {
  constructor(
    private readonly sender: TextSender,
    private readonly ownerPhone: string | undefined
  ) {}

  get enabled(): boolean {
    return Boolean(this.ownerPhone);
  }

  async notify(notice: OwnerNotice): Promise<void> {
    switch (notice.kind) {
      case 'appointment':
        return this.appointmentBooked(notice.conversationId, notice.note);
      case 'handoff':
        return this.humanTakeover(notice.conversationId, notice.silencedUntil);
      case 'interest':
        return this.interestDetected(notice.conversationId, notice.customerText, notice.botReply);
    }
  }

  async appointmentBooked(conversationId: string, note: string): Promise<void> {
    await this.send('appointment', `*NUEVA CITA*\n\nCliente: wa.me/${conversationId}\n${note}`);
  }

  async humanTakeover(conversationId: string, silencedUntil: string | null): Promise<void> {
    const until = silencedUntil ? `hasta ${silencedUntil}` : 'hasta reactivación manual';
    await this.send('handoff', `*ASESOR EN LÍNEA*\n\nEl bot quedó en pausa con wa.me/${conversationId} ${until}.`);
  }

  async interestDetected(conversationId: string, customerText: string, botReply: string): Promise<void> {
    const lower = customerText.toLowerCase();
    if (!INTEREST_KEYWORDS.some((keyword) => lower.includes(keyword))) return;

    await this.send(
      'interest',
      `*Interés detectado*\nCliente: wa.me/${conversationId}\nDijo: "${customerText}"\nBot: "${botReply.substring(0, 60)}..."`
    );
  }

  private async send(kind: string, text: string): Promise<void> {
    if (!this.ownerPhone) return;
    try {
      await this.sender.sendText(this.ownerPhone, text);
      logger.info('Owner notified', { kind });
    } catch (error) {
      logger.warn('Owner notification failed', { kind, error: errorMessage(error) });
    }
  }
}
