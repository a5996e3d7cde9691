// --- Wire types served by /api/dashboard ---
export interface DataPoint {
  t: string;
  value: number;
}

export interface QuakeEvent {
  t: string;
  magnitude: number;
  depthKm: number;
  place: string;
}

export interface PlasmaPoint {
  t: string;
  density: number | null;
  speed: number | null;
  temperature: number | null;
}

export type RpamPhase = 'ACTIVE' | 'ELEVATED' | 'MONITORING';

export type FeedName = 'solarWind' | 'quakes' | 'kp';

export type FeedStatus = { status: 'ok' } | { status: 'failed'; reason: string };

export interface AlertState {
  active: boolean;
  threshold: number;
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
  solar: PlasmaPoint | null;
  drift: DataPoint[];
  stress: DataPoint[];
  latestStress: number | null;
  alert: AlertState;
  quakes: QuakeEvent[];
  magnitudes: DataPoint[];
  depths: DataPoint[];
  kp: number | null;
  indices: Indices;
  feeds: Record<FeedName, FeedStatus>;
}

// --- Display ---
export type ChartStream = 'drift' | 'stress' | 'magnitude' | 'depth';

export const STREAM_LABELS: Record<ChartStream, string> = {
  drift: 'ΔΦ Drift (Ψ coupling)',
  stress: 'k(ΔΦ) Stress',
  magnitude: 'Earthquake Magnitude (M≥2.5)',
  depth: 'Earthquake Depth (km)',
};

export const STREAM_COLORS: Record<ChartStream, string> = {
  drift: '#6ee7b7',
  stress: '#fbbf24',
  magnitude: '#60a5fa',
  depth: '#c084fc',
};

export const RPAM_LABELS: Record<RpamPhase, string> = {
  ACTIVE: 'ACTIVE – Collapse Window Initiated',
  ELEVATED: 'ELEVATED – Pressure Coupling',
  MONITORING: 'MONITORING',
};

export const FEED_LABELS: Record<FeedName, string> = {
  solarWind: 'NOAA Solar Wind',
  quakes: 'USGS Earthquakes',
  kp: 'NOAA Kp Index',
};
