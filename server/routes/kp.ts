import { Router, type Request, type Response } from 'express';
import { describeError } from '../feeds/errors.js';
import { fetchKp } from '../feeds/kp.js';
import type { RouteContext } from './context.js';

export function kpRouter(ctx: RouteContext): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response) => {
    try {
      const data = await ctx.cache.load('kp', 5 * 60_000, () => fetchKp(ctx.feeds)); // 5 min TTL
      res.json(data);
    } catch (err: unknown) {
      ctx.feeds.logger.warn({ err }, 'kp proxy failed');
      res.status(502).json({
        error: `Failed to fetch Kp index: ${describeError(err)}`,
        suggestion: 'Indices fall back to Kp 1.0 until the feed recovers.',
      });
    }
  });

  return router;
}
