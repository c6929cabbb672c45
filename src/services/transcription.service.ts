import OpenAI, { toFile } from 'openai';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { RetryExecutor } from './retry.service';

export interface Transcriber {
  transcribe(audio: Buffer, mimeType?: string): Promise<string>;
}

const EXTENSIONS: Record<string, string> = {
  'audio/ogg': 'ogg',
  'audio/ogg; codecs=opus': 'ogg',
  'audio/mpeg': 'mp3',
  'audio/mp4': 'm4a',
  'audio/wav': 'wav',
  'audio/webm': 'webm',
};

/** Voice notes through Whisper. Returns the trimmed text, possibly empty. */
export class OpenAITranscriptionService implements Transcriber {
  private readonly client: OpenAI;

  constructor(apiKey: string, private readonly language: string = 'es', client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey, maxRetries: 0, timeout: 30000 });
  }

  async transcribe(audio: Buffer, mimeType: string = 'audio/ogg'): Promise<string> {
    const extension = EXTENSIONS[mimeType.toLowerCase()] ?? 'ogg';
    const file = await toFile(audio, `voice-note.${extension}`, { type: mimeType });

    const result = await this.client.audio.transcriptions.create({
      file,
      model: 'whisper-1',
      language: this.language,
    });

    const text = result.text.trim();
    logger.debug('Audio transcribed', { bytes: audio.length, chars: text.length });
    return text;
  }
}

export interface MediaSource {
  readonly provider: string;
  downloadMedia(remoteJid: string, messageId: string): Promise<{ data: Buffer; mimeType: string }>;
}

/**
 * Fetches a voice note from the gateway and transcribes it. Resolves to an
 * empty string when either step fails, so the caller can ask the customer to
 * resend.
 */
export class VoiceNoteResolver {
  constructor(
    private readonly media: MediaSource,
    private readonly transcriber: Transcriber,
    private readonly retry: RetryExecutor
  ) {}

  async resolve(remoteJid: string, messageId: string): Promise<string> {
    try {
      const audio = await this.retry.execute(() => this.media.downloadMedia(remoteJid, messageId), {
        service: this.media.provider,
        operation: 'downloadMedia',
      });
      return await this.retry.execute(() => this.transcriber.transcribe(audio.data, audio.mimeType), {
        service: 'openai',
        operation: 'transcribe',
      });
    } catch (error) {
      logger.warn('Voice note could not be transcribed', { messageId, error: errorMessage(error) });
      return '';
    }
  }
}
