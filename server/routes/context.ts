import type { DashboardService } from '../dashboard/service.js';
import type { FeedDeps } from '../feeds/http.js';
import type { FeedCache } from '../utils/cache.js';

export interface RouteContext {
  feeds: FeedDeps;
  cache: FeedCache;
  dashboard: DashboardService;
  now: () => Date;
}
