import { z } from 'zod';
import type { FeedResult, QuakeEvent, Sample } from '../types.js';
import { FeedError } from './errors.js';
import { byTime, fetchJson, settleFeed, toIsoTime, type FeedDeps } from './http.js';

export const QUAKE_WINDOW_DAYS = 7;
export const MIN_MAGNITUDE = 2.5;

const DAY_MS = 86_400_000;

export function quakesUrl(now: Date): string {
  const day = (d: Date) => d.toISOString().slice(0, 10);
  const start = new Date(now.getTime() - QUAKE_WINDOW_DAYS * DAY_MS);
  return 'https://earthquake.usgs.gov/fdsnws/event/1/query'
    + `?format=geojson&starttime=${day(start)}&endtime=${day(now)}&minmagnitude=${MIN_MAGNITUDE}`;
}

const FeatureSchema = z.object({
  properties: z.object({
    time: z.number().nullable().optional(),
    mag: z.number().nullable().optional(),
    place: z.string().nullable().optional(),
  }),
  geometry: z
    .object({ coordinates: z.array(z.number().nullable()) })
    .nullable()
    .optional(),
});

const FeatureCollectionSchema = z.object({
  features: z.array(z.unknown()),
});

/** GeoJSON features → events; features without a time, magnitude or depth are skipped. */
export function parseQuakes(body: unknown): QuakeEvent[] {
  const parsed = FeatureCollectionSchema.safeParse(body);
  if (!parsed.success) throw new FeedError('quakes', 'USGS response is not a FeatureCollection');

  const events: QuakeEvent[] = [];
  for (const raw of parsed.data.features) {
    const feature = FeatureSchema.safeParse(raw);
    if (!feature.success) continue;
    const { time, mag, place } = feature.data.properties;
    const depth = feature.data.geometry?.coordinates[2];
    const t = toIsoTime(time);
    if (!t || typeof mag !== 'number' || typeof depth !== 'number') continue;
    events.push({ t, magnitude: mag, depthKm: depth, place: place ?? '' });
  }
  return events.sort(byTime);
}

export function magnitudeSeries(events: readonly QuakeEvent[]): Sample[] {
  return events.map(e => ({ t: e.t, value: e.magnitude }));
}

export async function fetchQuakes(
  deps: Pick<FeedDeps, 'fetchFn' | 'timeoutMs'>,
  now: Date,
): Promise<QuakeEvent[]> {
  return parseQuakes(await fetchJson('quakes', deps, quakesUrl(now)));
}

export async function quakeFeed(deps: FeedDeps, now: Date): Promise<FeedResult<QuakeEvent[]>> {
  return settleFeed('quakes', deps.logger, () => fetchQuakes(deps, now));
}

export function depthSeries(events: readonly QuakeEvent[]): Sample[] {
  return events.map(e => ({ t: e.t, value: e.depthKm }));
}
