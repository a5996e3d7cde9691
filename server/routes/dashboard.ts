import { Router, type Request, type Response, type NextFunction } from 'express';
import type { RouteContext } from './context.js';

export function dashboardRouter(ctx: RouteContext): Router {
  const router = Router();

  // Feed failures are folded into the state, so only programming errors reach next()
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await ctx.dashboard.current());
    } catch (err: unknown) {
      next(err);
    }
  });

  router.post('/refresh', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await ctx.dashboard.refresh());
    } catch (err: unknown) {
      next(err);
    }
  });

  return router;
}
