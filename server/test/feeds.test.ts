import { describe, expect, it, vi } from 'vitest';
import { FeedError } from '../feeds/errors.js';
import { fetchJson, parseCell, toIsoTime, type FetchFn } from '../feeds/http.js';
import { kpFeed, latestKp, parseKpTable } from '../feeds/kp.js';
import {
  driftSeries,
  latestPlasma,
  parsePlasmaObjects,
  parsePlasmaTable,
  plasmaFeed,
} from '../feeds/solarWind.js';
import { depthSeries, magnitudeSeries, parseQuakes, quakeFeed, quakesUrl } from '../feeds/usgs.js';
import {
  DSCOVR_PLASMA,
  KP,
  PLASMA_1_DAY,
  PLASMA_7_DAY,
  USGS,
  fakeFetch,
  feedDeps,
  kpTable,
  plasmaTable,
  quakeCollection,
} from './helpers.js';

describe('parseCell', () => {
  it('parses numeric strings and rejects blanks', () => {
    expect(parseCell('412.5')).toBe(412.5);
    expect(parseCell('')).toBeNull();
    expect(parseCell('n/a')).toBeNull();
    expect(parseCell(null)).toBeNull();
    expect(parseCell(3)).toBe(3);
  });
});

describe('toIsoTime', () => {
  it('reads NOAA product timestamps as UTC', () => {
    expect(toIsoTime('2025-03-01 12:30:00.000')).toBe('2025-03-01T12:30:00.000Z');
  });

  it('reads epoch milliseconds', () => {
    expect(toIsoTime(Date.UTC(2025, 2, 1))).toBe('2025-03-01T00:00:00.000Z');
  });

  it('returns null for garbage', () => {
    expect(toIsoTime('not a time')).toBeNull();
    expect(toIsoTime(undefined)).toBeNull();
  });
});

describe('fetchJson', () => {
  it('raises a FeedError on non-2xx', async () => {
    const deps = feedDeps(fakeFetch({ [KP]: { status: 503, body: {} } }));
    await expect(fetchJson('kp', deps, KP)).rejects.toThrow(`${KP} returned 503`);
    await expect(fetchJson('kp', deps, KP)).rejects.toBeInstanceOf(FeedError);
  });

  it('cancels the body of an error response', async () => {
    const resp = new Response('upstream error page', { status: 502 });
    const body = resp.body;
    if (!body) throw new Error('response has no body');
    const cancel = vi.spyOn(body, 'cancel');
    const deps = feedDeps(vi.fn<FetchFn>(async () => resp));
    await expect(fetchJson('kp', deps, KP)).rejects.toThrow(`${KP} returned 502`);
    expect(cancel).toHaveBeenCalledTimes(1);
  });
});

describe('parsePlasmaTable', () => {
  it('locates columns by header and sorts ascending', () => {
    const points = parsePlasmaTable(plasmaTable([
      ['2025-03-01 00:02:00.000', '5.1', '420.0', '90000'],
      ['2025-03-01 00:01:00.000', '', '410.0', ''],
      ['bogus', '1', '1', '1'],
    ]));
    expect(points).toEqual([
      { t: '2025-03-01T00:01:00.000Z', density: null, speed: 410, temperature: null },
      { t: '2025-03-01T00:02:00.000Z', density: 5.1, speed: 420, temperature: 90000 },
    ]);
  });

  it('rejects a table without a speed column', () => {
    expect(() => parsePlasmaTable([['time_tag', 'density']])).toThrow(FeedError);
  });

  it('rejects a non-table body', () => {
    expect(() => parsePlasmaTable({ data: [] })).toThrow(FeedError);
  });
});

describe('driftSeries', () => {
  it('maps speeds to drift and keeps missing speeds as null', () => {
    const plasma = parsePlasmaTable(plasmaTable([
      ['2025-03-01 00:00:00.000', '4', '400', '1'],
      ['2025-03-01 00:01:00.000', '4', '', '1'],
    ]));
    expect(driftSeries(plasma)).toEqual([
      { t: '2025-03-01T00:00:00.000Z', value: 0.5 },
      { t: '2025-03-01T00:01:00.000Z', value: null },
    ]);
  });
});

describe('latestPlasma', () => {
  it('skips trailing rows without a speed', () => {
    const plasma = parsePlasmaTable(plasmaTable([
      ['2025-03-01 00:00:00.000', '4.2', '410', '70000'],
      ['2025-03-01 00:01:00.000', '4.4', '', '71000'],
    ]));
    expect(latestPlasma(plasma)).toEqual({
      t: '2025-03-01T00:00:00.000Z',
      density: 4.2,
      speed: 410,
      temperature: 70000,
    });
    expect(latestPlasma([])).toBeNull();
  });
});

describe('parsePlasmaObjects', () => {
  it('reads both field spellings and drops rows without a time', () => {
    const points = parsePlasmaObjects([
      { time_tag: '2025-03-01T00:01:00', proton_speed: 390.5, proton_density: 3.1, proton_temperature: 52000 },
      { time_tag: '2025-03-01T00:00:00', speed: '405', density: null, temperature: '61000' },
      { speed: 500 },
    ]);
    expect(points).toEqual([
      { t: '2025-03-01T00:00:00.000Z', density: null, speed: 405, temperature: 61000 },
      { t: '2025-03-01T00:01:00.000Z', density: 3.1, speed: 390.5, temperature: 52000 },
    ]);
  });

  it('rejects a non-array body', () => {
    expect(() => parsePlasmaObjects({ data: [] })).toThrow(FeedError);
  });
});

describe('plasmaFeed', () => {
  it('uses the 1-day product when it answers', async () => {
    const fetchFn = fakeFetch({
      [PLASMA_1_DAY]: { body: plasmaTable([['2025-03-01 00:00:00.000', '4', '400', '1']]) },
    });
    const result = await plasmaFeed(feedDeps(fetchFn));
    expect(result).toEqual({
      status: 'ok',
      data: [{ t: '2025-03-01T00:00:00.000Z', density: 4, speed: 400, temperature: 1 }],
    });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('falls back to the 7-day product', async () => {
    const fetchFn = fakeFetch({
      [PLASMA_1_DAY]: { status: 500, body: {} },
      [PLASMA_7_DAY]: { body: plasmaTable([['2025-03-01 00:00:00.000', '4', '800', '1']]) },
    });
    const result = await plasmaFeed(feedDeps(fetchFn));
    expect(result).toEqual({
      status: 'ok',
      data: [{ t: '2025-03-01T00:00:00.000Z', density: 4, speed: 800, temperature: 1 }],
    });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('falls back to the DSCOVR dump last', async () => {
    const fetchFn = fakeFetch({
      [DSCOVR_PLASMA]: { body: [{ time_tag: '2025-03-01T00:00:00', speed: 320, density: 2, temperature: 40000 }] },
    });
    const result = await plasmaFeed(feedDeps(fetchFn));
    expect(result).toEqual({
      status: 'ok',
      data: [{ t: '2025-03-01T00:00:00.000Z', density: 2, speed: 320, temperature: 40000 }],
    });
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it('fails when every source is unavailable', async () => {
    const result = await plasmaFeed(feedDeps(fakeFetch({ [PLASMA_1_DAY]: { body: plasmaTable([]) } })));
    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.reason).toContain('All solar wind feeds unavailable');
      expect(result.reason).toContain('1-day: no rows');
      expect(result.reason).toContain(`dscovr: Request to ${DSCOVR_PLASMA} failed`);
    }
  });
});

describe('usgs', () => {
  it('builds a seven day query', () => {
    expect(quakesUrl(new Date('2025-03-08T10:00:00Z'))).toBe(
      `${USGS}?format=geojson&starttime=2025-03-01&endtime=2025-03-08&minmagnitude=2.5`,
    );
  });

  it('parses, skips incomplete features and sorts ascending', () => {
    const events = parseQuakes(quakeCollection([
      { time: Date.UTC(2025, 2, 2), mag: 3.1, depth: 8, place: 'later' },
      { time: Date.UTC(2025, 2, 1), mag: 2.7, depth: 1.5, place: 'earlier' },
      { time: Date.UTC(2025, 2, 3), mag: null, depth: 4 },
    ]));
    expect(events).toEqual([
      { t: '2025-03-01T00:00:00.000Z', magnitude: 2.7, depthKm: 1.5, place: 'earlier' },
      { t: '2025-03-02T00:00:00.000Z', magnitude: 3.1, depthKm: 8, place: 'later' },
    ]);
    expect(magnitudeSeries(events)).toEqual([
      { t: '2025-03-01T00:00:00.000Z', value: 2.7 },
      { t: '2025-03-02T00:00:00.000Z', value: 3.1 },
    ]);
    expect(depthSeries(events)).toEqual([
      { t: '2025-03-01T00:00:00.000Z', value: 1.5 },
      { t: '2025-03-02T00:00:00.000Z', value: 8 },
    ]);
  });

  it('turns a malformed body into a failed result', async () => {
    const result = await quakeFeed(feedDeps(fakeFetch({ [USGS]: { body: { nope: true } } })), new Date());
    expect(result).toEqual({ status: 'failed', reason: 'USGS response is not a FeatureCollection' });
  });
});

describe('kp', () => {
  it('parses rows after the header', () => {
    const points = parseKpTable(kpTable([['2025-03-01 00:00:00.000', '2.33'], ['2025-03-01 03:00:00.000', '4.00']]));
    expect(points.map(p => p.kp)).toEqual([2.33, 4]);
    expect(latestKp(points)).toBe(4);
    expect(latestKp([])).toBeNull();
  });

  it('reports a network failure', async () => {
    const result = await kpFeed(feedDeps(fakeFetch({})));
    expect(result).toEqual({
      status: 'failed',
      reason: `Request to ${KP} failed: fetch failed: ${KP}`,
    });
  });
});
