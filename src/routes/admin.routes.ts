import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { EngineContext } from '../app/context';
import { NotFoundError, ValidationError } from '../utils/errors';
import { normalizeIdentity } from '../utils/phone';

const stageBody = z.object({ trigger: z.enum(['ManualNoShow', 'ManualClosed']) });
const silenceBody = z.object({ minutes: z.number().int().positive().max(60 * 24 * 30).optional() });

function conversationId(req: Request): string {
  const id = normalizeIdentity(req.params.id ?? '');
  if (!id) throw new ValidationError('Conversation id must contain digits');
  return id;
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '));
  }
  return parsed.data;
}

type Handler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error handler
const asyncRoute = (handler: Handler) => (req: Request, res: Response, next: NextFunction) => {
  handler(req, res).catch(next);
};

export function createAdminRouter(ctx: EngineContext): Router {
  const router = Router();

  router.get('/conversations/:id', asyncRoute(async (req, res) => {
    const id = conversationId(req);
    const session = await ctx.orchestrator.getSession(id);
    if (!session) throw new NotFoundError(`Conversation ${id} not found`);
    res.json({ success: true, data: session });
  }));

  router.post('/conversations/:id/stage', asyncRoute(async (req, res) => {
    const { trigger } = parseBody(stageBody, req.body);
    const result = await ctx.orchestrator.applyManualTrigger(conversationId(req), trigger);
    res.json({ success: true, data: { stage: result.session.funnelStage, transitions: result.transitions } });
  }));

  router.post('/conversations/:id/silence', asyncRoute(async (req, res) => {
    const { minutes } = parseBody(silenceBody, req.body);
    const session = await ctx.orchestrator.silence(conversationId(req), minutes);
    res.json({
      success: true,
      data: { silencedUntil: session.silencedUntil, pausedByOperator: session.pausedByOperator },
    });
  }));

  router.post('/conversations/:id/reactivate', asyncRoute(async (req, res) => {
    const session = await ctx.orchestrator.reactivate(conversationId(req));
    res.json({
      success: true,
      data: { silencedUntil: session.silencedUntil, pausedByOperator: session.pausedByOperator },
    });
  }));

  router.get('/stats', (_req: Request, res: Response) => {
    res.json({ success: true, data: { ...ctx.orchestrator.stats(), catalogItems: ctx.catalog.currentCatalog().length } });
  });

  return router;
}
