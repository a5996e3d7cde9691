import express, { type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import { DashboardService } from './dashboard/service.js';
import type { FetchFn } from './feeds/http.js';
import type { StressTransform } from './stress/evaluator.js';
import { FeedCache } from './utils/cache.js';
import type { RouteContext } from './routes/context.js';
import { solarWindRouter } from './routes/solarWind.js';
import { kpRouter } from './routes/kp.js';
import { quakesRouter } from './routes/quakes.js';
import { dashboardRouter } from './routes/dashboard.js';

export interface CreateAppOptions {
  config: Pick<AppConfig, 'CORS_ORIGIN' | 'FEED_TIMEOUT_MS' | 'REFRESH_TTL_MS'>;
  logger: Logger;
  fetchFn?: FetchFn;
  now?: () => Date;
  transform?: StressTransform;
}

export interface AppInstance {
  app: express.Express;
  dashboard: DashboardService;
}

export function createApp(options: CreateAppOptions): AppInstance {
  const { config, logger } = options;
  const now = options.now ?? (() => new Date());
  const feeds = {
    fetchFn: options.fetchFn ?? ((input, init) => fetch(input, init)),
    timeoutMs: config.FEED_TIMEOUT_MS,
    logger: logger.child({ component: 'feeds' }),
  };
  const dashboard = new DashboardService({
    feeds,
    logger: logger.child({ component: 'dashboard' }),
    refreshTtlMs: config.REFRESH_TTL_MS,
    now,
    transform: options.transform,
  });
  const ctx: RouteContext = {
    feeds,
    cache: new FeedCache(() => now().getTime()),
    dashboard,
    now,
  };

  const app = express();

  app.use(cors({ origin: config.CORS_ORIGIN }));
  app.use(express.json());

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    // Routers rewrite req.url, so take the full path before routing
    const path = req.originalUrl.split('?')[0];
    res.on('finish', () => {
      logger.info(
        { method: req.method, path, status: res.statusCode, durationMs: Date.now() - start },
        'request',
      );
    });
    next();
  });

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', time: now().toISOString() });
  });

  // Routes
  app.use('/api/dashboard', dashboardRouter(ctx));
  app.use('/api/solar-wind', solarWindRouter(ctx));
  app.use('/api/quakes', quakesRouter(ctx));
  app.use('/api/kp', kpRouter(ctx));

  // 404 fallback
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err, path: req.path }, 'unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  });

  return { app, dashboard };
}
