import { vi } from 'vitest';
import pino from 'pino';
import type { FeedDeps, FetchFn } from '../feeds/http.js';

export const silentLogger = pino({ level: 'silent' });

export type Route = { status?: number; body: unknown } | Error;

function urlOf(input: Parameters<FetchFn>[0]): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/** Fake fetch answering by URL prefix; unknown URLs reject like a dead host. */
export function fakeFetch(routes: Record<string, Route>) {
  return vi.fn<FetchFn>(async input => {
    const url = urlOf(input);
    const key = Object.keys(routes).find(prefix => url.startsWith(prefix));
    if (key === undefined) throw new TypeError(`fetch failed: ${url}`);
    const route = routes[key];
    if (route instanceof Error) throw route;
    return new Response(JSON.stringify(route.body), {
      status: route.status ?? 200,
      headers: { 'content-type': 'application/json' },
    });
  });
}

export function feedDeps(fetchFn: FetchFn): FeedDeps {
  return { fetchFn, timeoutMs: 1_000, logger: silentLogger };
}

export const PLASMA_1_DAY = 'https://services.swpc.noaa.gov/products/solar-wind/plasma-1-day.json';
export const PLASMA_7_DAY = 'https://services.swpc.noaa.gov/products/solar-wind/plasma-7-day.json';
export const DSCOVR_PLASMA = 'https://services.swpc.noaa.gov/json/dscovr_plasma.json';
export const USGS = 'https://earthquake.usgs.gov/fdsnws/event/1/query';
export const KP = 'https://services.swpc.noaa.gov/products/noaa-planetary-k-index.json';

export function plasmaTable(rows: Array<[string, string, string, string]>): string[][] {
  return [['time_tag', 'density', 'speed', 'temperature'], ...rows];
}

export function kpTable(rows: Array<[string, string]>): string[][] {
  return [
    ['time_tag', 'Kp', 'Kp_fraction', 'a_running', 'station_count'],
    ...rows.map(([t, kp]) => [t, kp, kp, '7', '8']),
  ];
}

export function quakeCollection(
  events: Array<{ time: number; mag: number | null; depth: number; place?: string }>,
) {
  return {
    type: 'FeatureCollection',
    features: events.map(e => ({
      type: 'Feature',
      properties: { time: e.time, mag: e.mag, place: e.place ?? 'test region' },
      geometry: { type: 'Point', coordinates: [14.1, 40.8, e.depth] },
    })),
  };
}
