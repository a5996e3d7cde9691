import { Router, type Request, type Response } from 'express';
import { describeError } from '../feeds/errors.js';
import { fetchQuakes } from '../feeds/usgs.js';
import type { RouteContext } from './context.js';

export function quakesRouter(ctx: RouteContext): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response) => {
    try {
      const data = await ctx.cache.load('quakes', 10 * 60_000, () => fetchQuakes(ctx.feeds, ctx.now()));
      res.json(data);
    } catch (err: unknown) {
      ctx.feeds.logger.warn({ err }, 'usgs proxy failed');
      res.status(502).json({
        error: `Failed to fetch earthquake catalogue: ${describeError(err)}`,
        suggestion: 'Retry after the next refresh.',
      });
    }
  });

  return router;
}
