/**
 * Conversation identity: the digits of the contact's number, taken from a
 * gateway JID (`5215512345678@s.whatsapp.net`), an E.164 string or free text.
 */
export function normalizeIdentity(raw: string): string {
  const local = raw.split('@')[0];
  // Multi-device JIDs carry a device suffix: 5215512345678:12@s.whatsapp.net
  return local.split(':')[0].replace(/\D/g, '');
}

export function toE164(identity: string): string {
  return `+${normalizeIdentity(identity)}`;
}

export function isGroupOrBroadcast(remoteJid: string): boolean {
  return remoteJid.endsWith('@g.us') || remoteJid.endsWith('@broadcast') || remoteJid.includes('status@');
}
