const SENSITIVE_KEYS = new Set(['apikey', 'api_key', 'password', 'token', 'secret', 'authorization', 'jpegthumbnail']);

const REDACTED = '***';
const TRUNCATED_MARKER = ' ...[TRUNCATED]';

/** Deep copy with credential-like fields masked. */
export function redactPayload(value: unknown, secrets: string[] = []): unknown {
  if (typeof value === 'string') {
    return secrets.reduce((text, secret) => (secret ? text.split(secret).join(REDACTED) : text), value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactPayload(item, secrets));
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      out[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : redactPayload(child, secrets);
    }
    return out;
  }
  return value;
}

/** Redacted JSON for a log line, cut at `maxChars`. */
export function payloadForLog(value: unknown, maxChars: number, secrets: string[] = []): string {
  const raw = JSON.stringify(redactPayload(value, secrets)) ?? String(value);
  return raw.length > maxChars ? `${raw.substring(0, maxChars)}${TRUNCATED_MARKER}` : raw;
}
