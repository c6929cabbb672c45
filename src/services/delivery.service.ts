import { OutboundAction } from '../types/agent';
import { GatewayAdapter } from './gateway/gateway.adapter';
import { RetryExecutor } from './retry.service';
import { DedupLedger } from './dedup.service';
import { ConversationLocks } from './lock.service';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export interface DeliveryResult {
  delivered: boolean;
  messageIds: string[];
  failedMedia: number;
}

/** When the bot last put a message on the wire for a conversation. */
export interface SendActivity {
  lastSentAt(conversationId: string): string | undefined;
}

/**
 * Sends outbound actions through the gateway. Every id the gateway returns is
 * recorded in the outbound ledger so the echo of our own send is recognized
 * as the bot's and never as a human takeover.
 */
export class OutboundDispatcher implements SendActivity {
  // Replies of one conversation go out in the order they were produced
  private readonly order = new ConversationLocks();
  private readonly sentAt = new Map<string, string>();

  constructor(
    private readonly gateway: GatewayAdapter,
    private readonly retry: RetryExecutor,
    private readonly outboundLedger: DedupLedger,
    private readonly clock: () => Date = () => new Date()
  ) {}

  lastSentAt(conversationId: string): string | undefined {
    return this.sentAt.get(conversationId);
  }

  async sendText(to: string, text: string): Promise<string | null> {
    const messageId = await this.retry.execute(() => this.gateway.sendText(to, text), {
      service: this.gateway.provider,
      operation: 'sendText',
    });
    if (messageId) this.outboundLedger.admit(messageId);
    return messageId;
  }

  async sendMedia(to: string, mediaUrl: string, caption?: string): Promise<string | null> {
    const messageId = await this.retry.execute(() => this.gateway.sendMedia(to, mediaUrl, caption), {
      service: this.gateway.provider,
      operation: 'sendMedia',
    });
    if (messageId) this.outboundLedger.admit(messageId);
    return messageId;
  }

  dispatch(action: OutboundAction): Promise<DeliveryResult> {
    return this.order.runExclusive(action.conversationId, () => this.deliver(action));
  }

  /**
   * Text first, then each photo. A failed photo does not undo the text.
   * Each send is stamped when it starts and again when it completes, since the
   * echo can arrive before the gateway call returns.
   */
  private async deliver(action: OutboundAction): Promise<DeliveryResult> {
    const result: DeliveryResult = { delivered: false, messageIds: [], failedMedia: 0 };

    try {
      this.stamp(action.conversationId);
      const textId = await this.sendText(action.remoteJid, action.text);
      this.stamp(action.conversationId);
      if (textId) result.messageIds.push(textId);
      result.delivered = true;
    } catch (error) {
      logger.error('Reply delivery failed', {
        conversationId: action.conversationId,
        degraded: action.degraded,
        error: errorMessage(error),
      });
      return result;
    }

    for (const url of action.mediaUrls) {
      try {
        this.stamp(action.conversationId);
        const mediaId = await this.sendMedia(action.remoteJid, url);
        this.stamp(action.conversationId);
        if (mediaId) result.messageIds.push(mediaId);
      } catch (error) {
        result.failedMedia += 1;
        logger.warn('Photo delivery failed', { conversationId: action.conversationId, url, error: errorMessage(error) });
      }
    }

    return result;
  }

  private stamp(conversationId: string): void {
    this.sentAt.set(conversationId, this.clock().toISOString());
  }
}
