import { z } from 'zod';
import { CatalogItem } from '../catalog.service';
import { ExtractedIntent, FunnelStage, GeneratedReply, Turn } from '../../types/conversation';
import { stripMarkdownLinks } from '../../utils/prompts';

export interface ReplyRequest {
  history: Turn[];
  catalog: readonly CatalogItem[];
  turnCount: number;
  stage: FunnelStage;
  now: string;
}

/**
 * Natural-language capability behind the orchestrator. Implementations throw
 * on failure; retry and fallback are the caller's concern.
 */
export interface ReplyGenerator {
  generate(request: ReplyRequest): Promise<GeneratedReply>;
}

const nullableText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const modelOutputSchema = z.object({
  reply: z.string().trim().min(1),
  intent: z
    .object({
      model: nullableText,
      appointment: z
        .object({ confirmed: z.boolean(), when: nullableText })
        .nullish()
        .transform((value) => value ?? undefined),
      customerName: nullableText,
      wantsPhotos: z.boolean().nullish().transform((value) => value ?? undefined),
    })
    .default({}),
});

function extractJsonObject(raw: string): string {
  const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const candidate = fenced ? fenced[1] : raw;
  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new SyntaxError('Model output contains no JSON object');
  }
  return candidate.slice(start, end + 1);
}

/**
 * Turns raw model text into a reply and extracted intent. Output that is not
 * the expected JSON throws (SyntaxError or ZodError), which the retry layer
 * treats as a malformed, non-retryable response.
 */
export function parseModelOutput(raw: string): GeneratedReply {
  const parsed = modelOutputSchema.parse(JSON.parse(extractJsonObject(raw)));

  const intent: ExtractedIntent = {};
  if (parsed.intent.model) intent.model = parsed.intent.model;
  if (parsed.intent.appointment) {
    intent.appointment = { confirmed: parsed.intent.appointment.confirmed };
    if (parsed.intent.appointment.when) intent.appointment.when = parsed.intent.appointment.when;
  }
  if (parsed.intent.customerName) intent.customerName = parsed.intent.customerName;
  if (parsed.intent.wantsPhotos !== undefined) intent.wantsPhotos = parsed.intent.wantsPhotos;

  return { replyText: stripMarkdownLinks(parsed.reply), intent };
}
