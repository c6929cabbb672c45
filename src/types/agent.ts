export type EventPayload =
  | { kind: 'text'; text: string }
  | { kind: 'image'; caption: string }
  | { kind: 'audio'; messageId: string }
  | { kind: 'other'; type: string };

export interface InboundEvent {
  readonly eventId: string;
  readonly conversationId: string;
  // Gateway address the reply goes back to (e.g. 5215512345678@s.whatsapp.net)
  readonly remoteJid: string;
  readonly timestamp: string;
  // Sent from the business account: by the bot, or by a person using the same number
  readonly fromMe: boolean;
  readonly payload: EventPayload;
}

export interface OutboundAction {
  conversationId: string;
  remoteJid: string;
  text: string;
  mediaUrls: string[];
  // True when the reply generator failed and the fallback message was used
  degraded: boolean;
}

export function createInboundEvent(fields: InboundEvent): InboundEvent {
  return Object.freeze({ ...fields, payload: Object.freeze({ ...fields.payload }) });
}

export function eventText(event: InboundEvent): string {
  switch (event.payload.kind) {
    case 'text':
      return event.payload.text.trim();
    case 'image':
      return event.payload.caption.trim();
    default:
      return '';
  }
}
