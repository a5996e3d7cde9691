import { Router, type Request, type Response } from 'express';
import { describeError } from '../feeds/errors.js';
import { PLASMA_RANGES, fetchPlasma, isPlasmaRange } from '../feeds/solarWind.js';
import type { RouteContext } from './context.js';

export function solarWindRouter(ctx: RouteContext): Router {
  const router = Router();

  router.get('/plasma', async (req: Request, res: Response) => {
    const range = typeof req.query.range === 'string' && req.query.range ? req.query.range : '1-day';
    if (!isPlasmaRange(range)) {
      res.status(400).json({ error: `Invalid range. Allowed: ${PLASMA_RANGES.join(', ')}` });
      return;
    }

    try {
      const data = await ctx.cache.load(`plasma-${range}`, 45_000, () => fetchPlasma(ctx.feeds, range));
      res.json(data);
    } catch (err: unknown) {
      ctx.feeds.logger.warn({ err, range }, 'plasma proxy failed');
      res.status(502).json({
        error: `Failed to fetch solar wind plasma data: ${describeError(err)}`,
        suggestion: 'The dashboard keeps running on an empty drift series.',
      });
    }
  });

  return router;
}
