import { z } from 'zod';
import { DownloadedMedia, GatewayAdapter, GatewayConfig, ParsedWebhook } from './gateway.adapter';
import { EventPayload, createInboundEvent } from '../../types/agent';
import { logger } from '../../utils/logger';
import { HttpStatusError } from '../../utils/errors';
import { isGroupOrBroadcast, normalizeIdentity } from '../../utils/phone';
import { parseRetryAfter } from '../retry.service';

const REQUEST_TIMEOUT_MS = 15000;

const webhookBodySchema = z.object({ event: z.string().optional(), data: z.unknown() }).passthrough();

const messageContentSchema = z
  .object({
    conversation: z.string().optional(),
    extendedTextMessage: z.object({ text: z.string().optional() }).passthrough().optional(),
    imageMessage: z.object({ caption: z.string().optional() }).passthrough().optional(),
    audioMessage: z.unknown().optional(),
    pttMessage: z.unknown().optional(),
  })
  .passthrough();

const messageItemSchema = z
  .object({
    key: z
      .object({
        remoteJid: z.string().optional(),
        fromMe: z.boolean().optional(),
        id: z.string().optional(),
      })
      .passthrough(),
    message: messageContentSchema.nullish(),
    messageType: z.string().optional(),
    messageTimestamp: z.union([z.number(), z.string()]).optional(),
  })
  .passthrough();

const sendResponseSchema = z
  .object({ key: z.object({ id: z.string().optional() }).passthrough().optional() })
  .passthrough();

const mediaResponseSchema = z
  .object({
    base64: z.string().optional(),
    media: z.string().optional(),
    mimetype: z.string().optional(),
  })
  .passthrough();

type MessageContent = z.infer<typeof messageContentSchema>;

function toPayload(message: MessageContent | null | undefined, messageId: string, messageType?: string): EventPayload {
  if (!message) return { kind: 'other', type: messageType ?? 'empty' };

  if (message.conversation !== undefined) {
    return { kind: 'text', text: message.conversation };
  }
  if (message.extendedTextMessage?.text !== undefined) {
    return { kind: 'text', text: message.extendedTextMessage.text };
  }
  if (message.imageMessage) {
    return { kind: 'image', caption: message.imageMessage.caption ?? '' };
  }
  if (message.audioMessage !== undefined || message.pttMessage !== undefined) {
    return { kind: 'audio', messageId };
  }
  return { kind: 'other', type: messageType ?? Object.keys(message)[0] ?? 'unknown' };
}

function toIsoTimestamp(value: number | string | undefined, fallback: Date): string {
  const seconds = typeof value === 'string' ? Number(value) : value;
  if (seconds === undefined || !Number.isFinite(seconds) || seconds <= 0) {
    return fallback.toISOString();
  }
  return new Date(seconds * 1000).toISOString();
}

function isMessagesUpsert(event: string | undefined): boolean {
  if (!event) return true;
  return event.toLowerCase().replace(/_/g, '.') === 'messages.upsert';
}

/** Evolution API (Baileys-based WhatsApp gateway). */
export class EvolutionAdapter implements GatewayAdapter {
  readonly provider = 'evolution';
  private readonly baseUrl: string;

  constructor(private readonly config: GatewayConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  private async post<T>(path: string, body: Record<string, unknown>, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const res = await fetch(`${this.baseUrl}${path}/${encodeURIComponent(this.config.instance)}`, {
      method: 'POST',
      headers: {
        'apikey': this.config.apiKey,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (!res.ok) {
      const errorBody = await res.text();
      throw new HttpStatusError(res.status, errorBody, parseRetryAfter(res.headers.get('retry-after')));
    }

    return schema.parse(await res.json());
  }

  async sendText(to: string, text: string): Promise<string | null> {
    const result = await this.post('/message/sendText', { number: normalizeIdentity(to), text }, sendResponseSchema);
    const messageId = result.key?.id ?? null;
    logger.info('Message sent', { provider: this.provider, to: normalizeIdentity(to), messageId });
    return messageId;
  }

  async sendMedia(to: string, mediaUrl: string, caption: string = ''): Promise<string | null> {
    const result = await this.post(
      '/message/sendMedia',
      {
        number: normalizeIdentity(to),
        mediatype: 'image',
        mimetype: 'image/jpeg',
        caption,
        media: mediaUrl,
        fileName: 'photo.jpg',
      },
      sendResponseSchema
    );
    const messageId = result.key?.id ?? null;
    logger.info('Media sent', { provider: this.provider, to: normalizeIdentity(to), messageId });
    return messageId;
  }

  async downloadMedia(remoteJid: string, messageId: string): Promise<DownloadedMedia> {
    const result = await this.post(
      '/chat/getBase64FromMediaMessage',
      { message: { key: { remoteJid, id: messageId, fromMe: false } }, convertToMp4: false },
      mediaResponseSchema
    );

    const encoded = result.base64 ?? result.media;
    if (!encoded) {
      throw new SyntaxError('Gateway media response carried no base64 content');
    }
    // Some gateway versions return a data URI
    const base64 = encoded.includes(',') && encoded.startsWith('data:') ? encoded.split(',')[1] : encoded;
    return { data: Buffer.from(base64, 'base64'), mimeType: result.mimetype ?? 'audio/ogg' };
  }

  parseWebhook(body: unknown, receivedAt: Date = new Date()): ParsedWebhook {
    const parsed: ParsedWebhook = { events: [], skipped: [] };

    const envelope = webhookBodySchema.safeParse(body);
    if (!envelope.success) {
      parsed.skipped.push({ reason: 'invalid_body' });
      return parsed;
    }
    if (!isMessagesUpsert(envelope.data.event)) {
      parsed.skipped.push({ reason: `event:${envelope.data.event}` });
      return parsed;
    }

    const data = envelope.data.data;
    if (data === undefined || data === null) {
      parsed.skipped.push({ reason: 'no_data' });
      return parsed;
    }

    const items = Array.isArray(data) ? data : [data];
    for (const raw of items) {
      const item = messageItemSchema.safeParse(raw);
      if (!item.success) {
        parsed.skipped.push({ reason: 'invalid_item' });
        continue;
      }

      const remoteJid = (item.data.key.remoteJid ?? '').trim();
      const id = (item.data.key.id ?? '').trim();
      if (!remoteJid) {
        parsed.skipped.push({ reason: 'no_remote_jid', eventId: id || undefined });
        continue;
      }
      if (isGroupOrBroadcast(remoteJid)) {
        parsed.skipped.push({ reason: 'group_or_broadcast', eventId: id || undefined });
        continue;
      }

      const conversationId = normalizeIdentity(remoteJid);
      if (!conversationId) {
        parsed.skipped.push({ reason: 'no_identity', eventId: id || undefined });
        continue;
      }

      const timestamp = toIsoTimestamp(item.data.messageTimestamp, receivedAt);
      parsed.events.push(
        createInboundEvent({
          // Without a gateway id the event cannot be deduplicated reliably; key it by sender and time
          eventId: id || `${conversationId}:${timestamp}`,
          conversationId,
          remoteJid,
          timestamp,
          fromMe: item.data.key.fromMe ?? false,
          payload: toPayload(item.data.message, id, item.data.messageType),
        })
      );
    }

    return parsed;
  }
}
