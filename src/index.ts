import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { buildEngineContext } from './app/context';
import { createApp } from './app';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

async function start() {
  try {
    const ctx = await buildEngineContext(env);
    const app = createApp(ctx, { sentry: Boolean(env.SENTRY_DSN) });

    const server = app.listen(parseInt(env.PORT, 10), () => {
      logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV });
    });

    const stop = (signal: string) => {
      logger.info('Shutting down', { signal });
      server.close();
      ctx
        .shutdown()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', { error: errorMessage(error) });
          process.exit(1);
        });
    };
    process.once('SIGTERM', () => stop('SIGTERM'));
    process.once('SIGINT', () => stop('SIGINT'));
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}

start().catch((error: unknown) => {
  logger.error('Startup crashed', { error: errorMessage(error) });
  process.exit(1);
});
