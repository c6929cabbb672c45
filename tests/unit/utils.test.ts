import { payloadForLog, redactPayload } from '../../src/utils/redact';
import { isGroupOrBroadcast, normalizeIdentity, toE164 } from '../../src/utils/phone';
import { RetryExhaustedError, TransientUpstreamFailure, errorMessage } from '../../src/utils/errors';

describe('phone utils', () => {
  it('should normalize gateway JIDs and formatted numbers to digits', () => {
    expect(normalizeIdentity('5215512345678@s.whatsapp.net')).toBe('5215512345678');
    expect(normalizeIdentity('5215512345678:3@s.whatsapp.net')).toBe('5215512345678');
    expect(normalizeIdentity('+52 1 55 1234 5678')).toBe('5215512345678');
  });

  it('should format E.164', () => {
    expect(toE164('5215512345678@s.whatsapp.net')).toBe('+5215512345678');
  });

  it('should detect groups and broadcasts', () => {
    expect(isGroupOrBroadcast('120363000000000000@g.us')).toBe(true);
    expect(isGroupOrBroadcast('status@broadcast')).toBe(true);
    expect(isGroupOrBroadcast('5215512345678@s.whatsapp.net')).toBe(false);
  });
});

describe('redactPayload', () => {
  it('should mask credential fields and thumbnails at any depth', () => {
    const redacted = redactPayload({
      apikey: 'test-gateway-key',
      data: { message: { imageMessage: { caption: 'foto', jpegThumbnail: 'AAAA' } } },
      list: [{ Authorization: 'Bearer x' }],
    });

    expect(redacted).toEqual({
      apikey: '***',
      data: { message: { imageMessage: { caption: 'foto', jpegThumbnail: '***' } } },
      list: [{ Authorization: '***' }],
    });
  });

  it('should mask known secrets inside strings', () => {
    expect(redactPayload({ url: 'https://gw.example.com/?key=test-secret' }, ['test-secret'])).toEqual({
      url: 'https://gw.example.com/?key=***',
    });
  });

  it('should truncate long payloads', () => {
    expect(payloadForLog({ text: 'abcdefghij' }, 10)).toBe('{"text":"a ...[TRUNCATED]');
    expect(payloadForLog({ ok: true }, 100)).toBe('{"ok":true}');
  });
});

describe('errors', () => {
  it('should describe exhausted retries', () => {
    const last = new TransientUpstreamFailure('reply', 'generate', new Error('overloaded'), 529);
    const error = new RetryExhaustedError('reply', 'generate', 3, last);

    expect(error.message).toBe('reply.generate failed after 3 attempts: overloaded');
    expect(error.retryable).toBe(false);
    expect(error).toBeInstanceOf(RetryExhaustedError);
  });

  it('should read messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
