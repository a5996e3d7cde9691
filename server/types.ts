// --- Series ---
export interface Sample<V = number> {
  /** ISO-8601 instant */
  t: string;
  value: V;
}

/** Timestamp-ascending sequence of samples. */
export type Series<V = number> = ReadonlyArray<Sample<V>>;

/** Drift readings as handed over by the solar-wind adapter, before cleanup. */
export type RawDrift = Sample<number | null>;

// --- Feed payloads ---
export interface PlasmaPoint {
  t: string;
  density: number | null;
  speed: number | null;
  temperature: number | null;
}

export interface KpPoint {
  t: string;
  kp: number;
}

export interface QuakeEvent {
  t: string;
  magnitude: number;
  depthKm: number;
  place: string;
}

export type FeedName = 'solarWind' | 'quakes' | 'kp';

export type FeedResult<T> =
  | { status: 'ok'; data: T }
  | { status: 'failed'; reason: string };

export type FeedStatus = { status: 'ok' } | { status: 'failed'; reason: string };
