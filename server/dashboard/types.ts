import type { RpamPhase } from '../stress/indices.js';
import type {
  FeedName,
  FeedResult,
  FeedStatus,
  KpPoint,
  PlasmaPoint,
  QuakeEvent,
  Sample,
} from '../types.js';

/** One fetch of every feed, as consumed by a refresh cycle. */
export interface FeedSnapshot {
  plasma: FeedResult<PlasmaPoint[]>;
  quakes: FeedResult<QuakeEvent[]>;
  kp: FeedResult<KpPoint[]>;
}

export interface AlertState {
  active: boolean;
  threshold: number;
  /** Start of the current alert run; null while inactive. */
  since: string | null;
}

export interface Indices {
  eii: number;
  psi: number;
  kp: number;
  rpam: RpamPhase;
}

export interface DashboardState {
  cycle: number;
  refreshedAt: string;
  /** Latest plasma reading with a speed. */
  solar: PlasmaPoint | null;
  drift: Sample[];
  stress: Sample[];
  latestStress: number | null;
  alert: AlertState;
  quakes: QuakeEvent[];
  magnitudes: Sample[];
  depths: Sample[];
  kp: number | null;
  indices: Indices;
  feeds: Record<FeedName, FeedStatus>;
}
