import { Router, Request, Response } from 'express';
import { EngineContext } from '../app/context';
import { InboundEvent } from '../types/agent';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { payloadForLog } from '../utils/redact';

/**
 * Hands every event to the orchestrator in payload order (the orchestrator
 * admits and enqueues synchronously), then delivers the resulting replies and
 * only after that the owner alerts.
 */
export function ingestEvents(ctx: EngineContext, events: InboundEvent[]): Promise<void> {
  const tasks = events.map((event) =>
    ctx.orchestrator
      .handleTurn(event)
      .then(async ({ action, notices }) => {
        if (action) await ctx.dispatcher.dispatch(action);
        await ctx.orchestrator.notify(notices);
      })
      .catch((error: unknown) => {
        logger.error('Event processing failed', {
          eventId: event.eventId,
          conversationId: event.conversationId,
          error: errorMessage(error),
        });
      })
  );
  return Promise.all(tasks).then(() => undefined);
}

export function createWebhookRouter(ctx: EngineContext): Router {
  const router = Router();

  // Every outcome except a bad token is a 200
  router.post('/', (req: Request, res: Response) => {
    if (ctx.config.webhookToken && req.get('x-webhook-token') !== ctx.config.webhookToken) {
      logger.warn('Webhook rejected: bad token', { ip: req.ip });
      return res.status(401).json({ status: 'rejected', reason: 'invalid_token' });
    }

    if (ctx.config.logPayloads) {
      logger.info('Webhook payload', {
        payload: payloadForLog(req.body, ctx.config.logPayloadMaxChars, ctx.config.secrets),
      });
    }

    try {
      const { events, skipped } = ctx.gateway.parseWebhook(req.body);
      if (skipped.length > 0) {
        logger.debug('Webhook items skipped', { skipped });
      }

      if (events.length === 0) {
        return res.json({ status: 'ignored', reason: skipped[0]?.reason ?? 'no_events' });
      }

      ctx.track(ingestEvents(ctx, events));
      return res.json({ status: 'accepted' });
    } catch (error) {
      logger.error('Webhook handling failed', { error: errorMessage(error) });
      return res.json({ status: 'error_but_acked' });
    }
  });

  return router;
}
