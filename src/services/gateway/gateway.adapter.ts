import { InboundEvent } from '../../types/agent';

export interface DownloadedMedia {
  data: Buffer;
  mimeType: string;
}

export interface SkippedItem {
  reason: string;
  eventId?: string;
}

export interface ParsedWebhook {
  events: InboundEvent[];
  skipped: SkippedItem[];
}

/**
 * Messaging gateway: inbound webhook decoding and outbound delivery. Send
 * methods resolve to the gateway's message id (null when the gateway did not
 * report one) and throw HttpStatusError on non-2xx responses.
 */
export interface GatewayAdapter {
  readonly provider: string;
  sendText(to: string, text: string): Promise<string | null>;
  sendMedia(to: string, mediaUrl: string, caption?: string): Promise<string | null>;
  downloadMedia(remoteJid: string, messageId: string): Promise<DownloadedMedia>;
  parseWebhook(body: unknown, receivedAt?: Date): ParsedWebhook;
}

export interface GatewayConfig {
  provider: 'evolution';
  baseUrl: string;
  apiKey: string;
  instance: string;
}
