import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../../utils/logger';
import { GeneratedReply, Turn } from '../../types/conversation';
import { BusinessInfo, buildSystemPrompt } from '../../utils/prompts';
import { ReplyGenerator, ReplyRequest, parseModelOutput } from './reply.generator';

const DEFAULT_MODEL = 'claude-3-5-haiku-latest';
const HISTORY_WINDOW = 12;

type ChatMessage = { role: 'user' | 'assistant'; content: string };

/**
 * Maps session history onto the alternating user/assistant turns the Messages
 * API takes. Operator messages are shown to the model as assistant turns.
 */
export function toChatMessages(history: Turn[]): ChatMessage[] {
  const messages: ChatMessage[] = [];

  for (const turn of history.slice(-HISTORY_WINDOW)) {
    if (!turn.text) continue;
    const role = turn.role === 'customer' ? 'user' : 'assistant';
    const content = turn.role === 'agent' ? `[asesor] ${turn.text}` : turn.text;

    const last = messages[messages.length - 1];
    if (last && last.role === role) {
      last.content = `${last.content}\n${content}`;
    } else {
      messages.push({ role, content });
    }
  }

  // The conversation must open with a user turn
  while (messages.length > 0 && messages[0].role === 'assistant') {
    messages.shift();
  }
  return messages;
}

export class AnthropicReplyGenerator implements ReplyGenerator {
  private readonly client: Anthropic;

  constructor(
    apiKey: string,
    private readonly business: BusinessInfo = {},
    private readonly model: string = DEFAULT_MODEL,
    client?: Anthropic
  ) {
    // Retries are done by RetryExecutor, so the SDK makes a single attempt
    this.client = client ?? new Anthropic({ apiKey, maxRetries: 0, timeout: 20000 });
  }

  async generate(request: ReplyRequest): Promise<GeneratedReply> {
    const messages = toChatMessages(request.history);
    if (messages.length === 0) {
      throw new Error('No customer message to reply to');
    }

    const response = await this.client.messages.create({
      model: this.model,
      system: buildSystemPrompt(
        this.business,
        { turnCount: request.turnCount, stage: request.stage, now: request.now },
        request.catalog
      ),
      messages,
      temperature: 0.4,
      max_tokens: 400,
    });

    const raw = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();

    logger.debug('Anthropic reply generated', {
      tokens: { prompt: response.usage.input_tokens, completion: response.usage.output_tokens },
    });

    return parseModelOutput(raw);
  }
}
