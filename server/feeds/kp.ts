import { z } from 'zod';
import type { FeedResult, KpPoint } from '../types.js';
import { FeedError } from './errors.js';
import { byTime, fetchJson, parseCell, settleFeed, toIsoTime, type FeedDeps } from './http.js';

export const KP_URL = 'https://services.swpc.noaa.gov/products/noaa-planetary-k-index.json';

const KpTableSchema = z.array(z.array(z.union([z.string(), z.number(), z.null()]))).min(1);

// Header: ["time_tag","Kp","Kp_fraction","a_running","station_count"]
export function parseKpTable(body: unknown): KpPoint[] {
  const parsed = KpTableSchema.safeParse(body);
  if (!parsed.success) throw new FeedError('kp', 'Unexpected Kp payload');
  const points: KpPoint[] = [];
  for (const row of parsed.data.slice(1)) {
    const t = toIsoTime(row[0]);
    const kp = parseCell(row[1]);
    if (t && kp !== null) points.push({ t, kp });
  }
  return points.sort(byTime);
}

export function latestKp(points: readonly KpPoint[]): number | null {
  return points.length > 0 ? points[points.length - 1].kp : null;
}

export async function fetchKp(
  deps: Pick<FeedDeps, 'fetchFn' | 'timeoutMs'>,
): Promise<KpPoint[]> {
  return parseKpTable(await fetchJson('kp', deps, KP_URL));
}

export async function kpFeed(deps: FeedDeps): Promise<FeedResult<KpPoint[]>> {
  return settleFeed('kp', deps.logger, () => fetchKp(deps));
}
