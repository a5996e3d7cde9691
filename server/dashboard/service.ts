import type { FeedDeps } from '../feeds/http.js';
import type { Logger } from '../logger.js';
import { refreshCycle, collectSnapshot, type RefreshOptions } from './refresh.js';
import type { DashboardState } from './types.js';

export interface DashboardServiceOptions extends RefreshOptions {
  feeds: FeedDeps;
  logger: Logger;
  /** Age after which `current()` runs a new refresh. */
  refreshTtlMs: number;
  now?: () => Date;
}

/**
 * Owns the last dashboard state. Each refresh passes that state and a fresh
 * snapshot through `refreshCycle`; concurrent callers share one refresh.
 */
export class DashboardService {
  private state: DashboardState | null = null;
  private pending: Promise<DashboardState> | null = null;
  private readonly now: () => Date;

  constructor(private readonly options: DashboardServiceOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async current(): Promise<DashboardState> {
    const state = this.state;
    if (state && this.now().getTime() - Date.parse(state.refreshedAt) < this.options.refreshTtlMs) {
      return state;
    }
    return this.refresh();
  }

  refresh(): Promise<DashboardState> {
    if (this.pending) return this.pending;
    this.pending = this.runCycle().finally(() => {
      this.pending = null;
    });
    return this.pending;
  }

  private async runCycle(): Promise<DashboardState> {
    const started = this.now();
    const snapshot = await collectSnapshot(this.options.feeds, started);
    const next = refreshCycle(this.state, snapshot, this.now(), {
      transform: this.options.transform,
    });
    this.state = next;

    const { logger } = this.options;
    logger.info(
      {
        cycle: next.cycle,
        stressPoints: next.stress.length,
        latestStress: next.latestStress,
        eii: next.indices.eii,
        rpam: next.indices.rpam,
      },
      'dashboard refreshed',
    );
    if (next.alert.active) {
      logger.warn(
        { latestStress: next.latestStress, threshold: next.alert.threshold, since: next.alert.since },
        'stress below ZFCM threshold',
      );
    }
    return next;
  }
}
