import { Env } from '../config/env';
import { CatalogService } from '../services/catalog.service';
import { CRMFactory } from '../services/crm/crm.adapter';
import { DedupLedger } from '../services/dedup.service';
import { OutboundDispatcher } from '../services/delivery.service';
import { GatewayAdapter } from '../services/gateway/gateway.adapter';
import { GatewayFactory } from '../services/gateway/gateway.factory';
import { OwnerNotifier } from '../services/notification.service';
import { CatalogSource, SessionOrchestrator } from '../services/orchestrator.service';
import { AnthropicReplyGenerator } from '../services/reply/anthropic.service';
import { ReplyGenerator } from '../services/reply/reply.generator';
import { RetryExecutor, RetryHooks, RetryPolicy } from '../services/retry.service';
import { createSessionStore } from '../services/session/session.factory';
import { SessionStore } from '../services/session/session.store';
import { OpenAITranscriptionService, Transcriber, VoiceNoteResolver } from '../services/transcription.service';
import { CRMAdapter } from '../types/crm';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export interface EngineConfig {
  ledgers: { inbound: number; outbound: number; crm: number };
  windowSeconds: number;
  reactivateMinutes: number;
  humanPhrases?: string[];
  retry: RetryPolicy;
  historyMaxTurns: number;
  fallbackMessage: string;
  ownerPhone?: string;
  apiKeys: string[];
  webhookToken?: string;
  logPayloads: boolean;
  logPayloadMaxChars: number;
  // Values masked in logged payloads
  secrets: string[];
}

export interface EngineAdapters {
  store: SessionStore;
  gateway: GatewayAdapter;
  replyGenerator: ReplyGenerator;
  catalog: CatalogSource & { stop?(): void };
  crm?: CRMAdapter | null;
  transcriber?: Transcriber | null;
  retryHooks?: RetryHooks;
  clock?: () => Date;
}

export interface EngineContext {
  config: EngineConfig;
  orchestrator: SessionOrchestrator;
  dispatcher: OutboundDispatcher;
  gateway: GatewayAdapter;
  catalog: CatalogSource;
  /** Tracks background work started by the webhook so it can be awaited. */
  track(task: Promise<unknown>): void;
  drain(): Promise<void>;
  shutdown(): Promise<void>;
}

function splitList(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function engineConfigFromEnv(env: Env): EngineConfig {
  const phrases = splitList(env.HUMAN_PHRASES);
  return {
    ledgers: {
      inbound: env.INBOUND_LEDGER_CAPACITY,
      outbound: env.OUTBOUND_LEDGER_CAPACITY,
      crm: env.CRM_LEDGER_CAPACITY,
    },
    windowSeconds: env.HUMAN_DETECTION_WINDOW_SECONDS,
    reactivateMinutes: env.AUTO_REACTIVATE_MINUTES,
    humanPhrases: phrases.length > 0 ? phrases : undefined,
    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
      jitterRatio: env.RETRY_JITTER_RATIO,
    },
    historyMaxTurns: env.HISTORY_MAX_TURNS,
    fallbackMessage: env.FALLBACK_MESSAGE,
    ownerPhone: env.OWNER_PHONE,
    apiKeys: splitList(env.API_KEYS),
    webhookToken: env.WEBHOOK_TOKEN,
    logPayloads: env.LOG_WEBHOOK_PAYLOAD,
    logPayloadMaxChars: env.LOG_WEBHOOK_PAYLOAD_MAX_CHARS,
    secrets: [env.GATEWAY_API_KEY],
  };
}

/** Wires the engine from already-built adapters. Tests hand in fakes here. */
export function createEngineContext(config: EngineConfig, adapters: EngineAdapters): EngineContext {
  const retry = new RetryExecutor(config.retry, adapters.retryHooks);
  const ledgers = {
    inbound: new DedupLedger('inbound', config.ledgers.inbound),
    outbound: new DedupLedger('outbound', config.ledgers.outbound),
    crm: new DedupLedger('crm', config.ledgers.crm),
  };

  const dispatcher = new OutboundDispatcher(adapters.gateway, retry, ledgers.outbound, adapters.clock);
  const notifier = config.ownerPhone ? new OwnerNotifier(dispatcher, config.ownerPhone) : null;
  const audio = adapters.transcriber ? new VoiceNoteResolver(adapters.gateway, adapters.transcriber, retry) : null;

  const orchestrator = new SessionOrchestrator(
    {
      store: adapters.store,
      replyGenerator: adapters.replyGenerator,
      catalog: adapters.catalog,
      retry,
      ledgers,
      crm: adapters.crm,
      audio,
      notifier,
      sends: dispatcher,
      clock: adapters.clock,
    },
    {
      windowSeconds: config.windowSeconds,
      reactivateMinutes: config.reactivateMinutes,
      humanPhrases: config.humanPhrases,
      historyMaxTurns: config.historyMaxTurns,
      fallbackMessage: config.fallbackMessage,
    }
  );

  const inflight = new Set<Promise<unknown>>();

  const track = (task: Promise<unknown>): void => {
    const settled: Promise<void> = task.then(
      () => {
        inflight.delete(settled);
      },
      (error: unknown) => {
        logger.error('Background task failed', { error: errorMessage(error) });
        inflight.delete(settled);
      }
    );
    inflight.add(settled);
  };

  const drain = async (): Promise<void> => {
    while (inflight.size > 0) {
      await Promise.all(Array.from(inflight));
    }
  };

  return {
    config,
    orchestrator,
    dispatcher,
    gateway: adapters.gateway,
    catalog: adapters.catalog,
    track,
    drain,
    async shutdown() {
      await drain();
      adapters.catalog.stop?.();
      if (adapters.store.close) await adapters.store.close();
      logger.info('Engine shut down');
    },
  };
}

/** Production wiring from the environment. */
export async function buildEngineContext(env: Env): Promise<EngineContext> {
  const config = engineConfigFromEnv(env);

  const catalog = new CatalogService({
    csvUrl: env.CATALOG_CSV_URL,
    csvPath: env.CATALOG_CSV_PATH,
    refreshSeconds: env.CATALOG_REFRESH_SECONDS,
  });
  await catalog.start();

  const crm = env.CRM_TYPE
    ? CRMFactory.create(env.CRM_TYPE, { apiKey: env.GHL_API_KEY, locationId: env.GHL_LOCATION_ID })
    : null;
  if (!crm) logger.warn('CRM disabled (CRM_TYPE not set)');

  const transcriber = env.OPENAI_API_KEY ? new OpenAITranscriptionService(env.OPENAI_API_KEY) : null;
  if (!transcriber) logger.warn('Voice note transcription disabled (OPENAI_API_KEY not set)');

  return createEngineContext(config, {
    store: await createSessionStore(env.SESSION_STORE),
    gateway: GatewayFactory.create({
      provider: 'evolution',
      baseUrl: env.GATEWAY_API_URL,
      apiKey: env.GATEWAY_API_KEY,
      instance: env.GATEWAY_INSTANCE,
    }),
    replyGenerator: new AnthropicReplyGenerator(
      env.ANTHROPIC_API_KEY,
      { name: env.BUSINESS_NAME, hours: env.BUSINESS_HOURS, location: env.BUSINESS_LOCATION },
      env.ANTHROPIC_MODEL
    ),
    catalog,
    crm,
    transcriber,
  });
}
