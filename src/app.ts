import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { EngineContext } from './app/context';
import { errorHandler } from './middleware/errorHandler';
import { apiKeyAuth } from './middleware/auth';
import { createWebhookRouter } from './routes/webhook.routes';
import { createAdminRouter } from './routes/admin.routes';
import { logger } from './utils/logger';

export interface AppOptions {
  sentry?: boolean;
}

export function createApp(ctx: EngineContext, options: AppOptions = {}) {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());

  // Gateway payloads carry base64 thumbnails
  app.use('/webhook', express.json({ limit: '5mb' }));
  app.use('/webhook', (err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.warn('Webhook body is not valid JSON', { error: err.message });
    res.json({ status: 'ignored', reason: 'invalid_json' });
  });
  app.use(express.json());

  // Rate limiting
  const limiter = rateLimit({
    windowMs: 60 * 1000,
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  // Routes
  app.use('/webhook', createWebhookRouter(ctx));
  app.use('/api/admin', apiKeyAuth(ctx.config.apiKeys), createAdminRouter(ctx));

  // Health check (no auth)
  app.get('/health', (_req, res) => {
    const stats = ctx.orchestrator.stats();
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      activeConversations: stats.activeConversations,
      ledgers: stats.ledgers,
      catalogItems: ctx.catalog.currentCatalog().length,
    });
  });

  // Error handler
  if (options.sentry) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(errorHandler);

  return app;
}
