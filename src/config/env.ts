import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

const envSchema = z
  .object({
    PORT: z.string().default('3000'),
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),

    // Messaging gateway (required)
    GATEWAY_API_URL: z.string().url(),
    GATEWAY_API_KEY: z.string().min(1),
    GATEWAY_INSTANCE: z.string().min(1).default('main'),
    WEBHOOK_TOKEN: optionalString,

    // Reply generation / transcription
    ANTHROPIC_API_KEY: z.string().min(1),
    ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-latest'),
    OPENAI_API_KEY: optionalString,
    BUSINESS_NAME: z.string().default('nuestra agencia'),
    BUSINESS_HOURS: optionalString,
    BUSINESS_LOCATION: optionalString,

    // Session store
    SESSION_STORE: z.enum(['memory', 'redis', 'postgres']).default('memory'),
    DATABASE_URL: optionalString,
    REDIS_URL: optionalString,

    // CRM
    CRM_TYPE: optionalString,
    GHL_API_KEY: optionalString,
    GHL_LOCATION_ID: optionalString,

    // Catalog
    CATALOG_CSV_URL: optionalString,
    CATALOG_CSV_PATH: z.string().default('data/catalog.csv'),
    CATALOG_REFRESH_SECONDS: positiveInt(300),

    // Engine
    INBOUND_LEDGER_CAPACITY: positiveInt(4000),
    OUTBOUND_LEDGER_CAPACITY: positiveInt(2000),
    CRM_LEDGER_CAPACITY: positiveInt(8000),
    HUMAN_DETECTION_WINDOW_SECONDS: z.coerce.number().nonnegative().default(3),
    AUTO_REACTIVATE_MINUTES: positiveInt(60),
    HUMAN_PHRASES: optionalString,
    RETRY_MAX_ATTEMPTS: positiveInt(3),
    RETRY_BASE_DELAY_MS: positiveInt(500),
    RETRY_MAX_DELAY_MS: positiveInt(8000),
    RETRY_JITTER_RATIO: z.coerce.number().min(0).max(1).default(0.25),
    HISTORY_MAX_TURNS: positiveInt(20),
    FALLBACK_MESSAGE: z.string().min(1).default('Dame un momento, enseguida te respondo.'),

    // Misc
    OWNER_PHONE: optionalString,
    API_KEYS: optionalString,
    SENTRY_DSN: optionalString,
    LOG_WEBHOOK_PAYLOAD: booleanFlag(true),
    LOG_WEBHOOK_PAYLOAD_MAX_CHARS: positiveInt(6000),
  })
  .superRefine((value, ctx) => {
    if (value.SESSION_STORE === 'postgres' && !value.DATABASE_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['DATABASE_URL'], message: 'required when SESSION_STORE=postgres' });
    }
    if (value.SESSION_STORE === 'redis' && !value.REDIS_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['REDIS_URL'], message: 'required when SESSION_STORE=redis' });
    }
    if (value.CRM_TYPE && !(value.GHL_API_KEY && value.GHL_LOCATION_ID)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['GHL_API_KEY'], message: 'CRM credentials missing' });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export const env = parseEnv(process.env);
