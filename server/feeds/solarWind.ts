import { z } from 'zod';
import { driftFromSpeed } from '../stress/evaluator.js';
import type { FeedResult, PlasmaPoint, RawDrift } from '../types.js';
import { FeedError } from './errors.js';
import { byTime, fetchJson, parseCell, settleFeed, toIsoTime, type FeedDeps } from './http.js';

export const PLASMA_RANGES = ['2-hour', '6-hour', '1-day', '7-day'] as const;
export type PlasmaRange = (typeof PLASMA_RANGES)[number];

export function isPlasmaRange(r: string): r is PlasmaRange {
  return (PLASMA_RANGES as readonly string[]).includes(r);
}

export function plasmaUrl(range: PlasmaRange): string {
  return `https://services.swpc.noaa.gov/products/solar-wind/plasma-${range}.json`;
}

export const DSCOVR_PLASMA_URL = 'https://services.swpc.noaa.gov/json/dscovr_plasma.json';

const ProductTableSchema = z
  .array(z.array(z.union([z.string(), z.number(), z.null()])))
  .min(1);

/**
 * Parse a SWPC "products" table: first row is the header
 * (`time_tag`, `density`, `speed`, `temperature`), the rest are string cells.
 */
export function parsePlasmaTable(body: unknown): PlasmaPoint[] {
  const parsed = ProductTableSchema.safeParse(body);
  if (!parsed.success) {
    throw new FeedError('solarWind', `Unexpected plasma payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  const [header, ...rows] = parsed.data;
  const col = (name: string) => header.findIndex(h => h === name);
  const tIdx = col('time_tag');
  const speedIdx = col('speed');
  if (tIdx === -1 || speedIdx === -1) {
    throw new FeedError('solarWind', 'Plasma header lacks time_tag/speed columns');
  }
  const densityIdx = col('density');
  const tempIdx = col('temperature');
  const cell = (row: ReadonlyArray<unknown>, idx: number) => (idx === -1 ? null : parseCell(row[idx]));

  const points: PlasmaPoint[] = [];
  for (const row of rows) {
    const t = toIsoTime(row[tIdx]);
    if (!t) continue;
    points.push({
      t,
      density: cell(row, densityIdx),
      speed: cell(row, speedIdx),
      temperature: cell(row, tempIdx),
    });
  }
  return points.sort(byTime);
}

export async function fetchPlasma(
  deps: Pick<FeedDeps, 'fetchFn' | 'timeoutMs'>,
  range: PlasmaRange,
): Promise<PlasmaPoint[]> {
  return parsePlasmaTable(await fetchJson('solarWind', deps, plasmaUrl(range)));
}

// DSCOVR JSON rows are objects; older dumps use the proton_* field names
const PlasmaObjectSchema = z.object({
  time_tag: z.union([z.string(), z.number()]),
  speed: z.union([z.string(), z.number(), z.null()]).optional(),
  density: z.union([z.string(), z.number(), z.null()]).optional(),
  temperature: z.union([z.string(), z.number(), z.null()]).optional(),
  proton_speed: z.union([z.string(), z.number(), z.null()]).optional(),
  proton_density: z.union([z.string(), z.number(), z.null()]).optional(),
  proton_temperature: z.union([z.string(), z.number(), z.null()]).optional(),
});

/** Parse a SWPC "json" plasma dump: an array of objects keyed by field name. */
export function parsePlasmaObjects(body: unknown): PlasmaPoint[] {
  if (!Array.isArray(body)) throw new FeedError('solarWind', 'Unexpected DSCOVR plasma payload');
  const points: PlasmaPoint[] = [];
  for (const raw of body) {
    const row = PlasmaObjectSchema.safeParse(raw);
    if (!row.success) continue;
    const r = row.data;
    const t = toIsoTime(r.time_tag);
    if (!t) continue;
    points.push({
      t,
      density: parseCell(r.density ?? r.proton_density),
      speed: parseCell(r.speed ?? r.proton_speed),
      temperature: parseCell(r.temperature ?? r.proton_temperature),
    });
  }
  return points.sort(byTime);
}

interface PlasmaSource {
  name: string;
  load: (deps: Pick<FeedDeps, 'fetchFn' | 'timeoutMs'>) => Promise<PlasmaPoint[]>;
}

// Tried in order until one answers with usable rows
export const PLASMA_SOURCES: readonly PlasmaSource[] = [
  { name: '1-day', load: deps => fetchPlasma(deps, '1-day') },
  { name: '7-day', load: deps => fetchPlasma(deps, '7-day') },
  {
    name: 'dscovr',
    load: async deps => parsePlasmaObjects(await fetchJson('solarWind', deps, DSCOVR_PLASMA_URL)),
  },
];

export function driftSeries(plasma: readonly PlasmaPoint[]): RawDrift[] {
  return plasma.map(p => ({
    t: p.t,
    value: p.speed === null ? null : driftFromSpeed(p.speed),
  }));
}

/** Latest reading that carries a speed, for the solar summary. */
export function latestPlasma(plasma: readonly PlasmaPoint[]): PlasmaPoint | null {
  for (let i = plasma.length - 1; i >= 0; i--) {
    if (plasma[i].speed !== null) return plasma[i];
  }
  return null;
}

/** Solar wind plasma, falling back across the SWPC products. */
export async function plasmaFeed(deps: FeedDeps): Promise<FeedResult<PlasmaPoint[]>> {
  return settleFeed('solarWind', deps.logger, async () => {
    const failures: string[] = [];
    for (const source of PLASMA_SOURCES) {
      try {
        const plasma = await source.load(deps);
        if (plasma.length > 0) return plasma;
        failures.push(`${source.name}: no rows`);
      } catch (err: unknown) {
        if (!(err instanceof FeedError)) throw err;
        deps.logger.debug({ source: source.name, err }, 'plasma endpoint unavailable, trying next');
        failures.push(`${source.name}: ${err.message}`);
      }
    }
    throw new FeedError('solarWind', `All solar wind feeds unavailable (${failures.join('; ')})`);
  });
}
