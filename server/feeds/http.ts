import type { Logger } from '../logger.js';
import type { FeedName, FeedResult } from '../types.js';
import { FeedError, describeError } from './errors.js';

export type FetchFn = typeof fetch;

export interface FeedDeps {
  fetchFn: FetchFn;
  timeoutMs: number;
  logger: Logger;
}

export async function fetchJson(
  feed: FeedName,
  deps: Pick<FeedDeps, 'fetchFn' | 'timeoutMs'>,
  url: string,
): Promise<unknown> {
  let resp: Response;
  try {
    resp = await deps.fetchFn(url, { signal: AbortSignal.timeout(deps.timeoutMs) });
  } catch (err: unknown) {
    throw new FeedError(feed, `Request to ${url} failed: ${describeError(err)}`, { cause: err });
  }
  if (!resp.ok) {
    // Release the connection; the error body is never read
    await resp.body?.cancel();
    throw new FeedError(feed, `${url} returned ${resp.status}`);
  }
  try {
    return await resp.json();
  } catch (err: unknown) {
    throw new FeedError(feed, `${url} returned malformed JSON`, { cause: err });
  }
}

/** Runs a feed loader, turning any failure into a logged `failed` result. */
export async function settleFeed<T>(
  feed: FeedName,
  logger: Logger,
  load: () => Promise<T>,
): Promise<FeedResult<T>> {
  try {
    return { status: 'ok', data: await load() };
  } catch (err: unknown) {
    const reason = describeError(err);
    logger.warn({ feed, err }, `${feed} fetch failed: ${reason}`);
    return { status: 'failed', reason };
  }
}

// '' and non-numeric cells become null
export function parseCell(cell: unknown): number | null {
  if (typeof cell === 'number') return Number.isFinite(cell) ? cell : null;
  if (typeof cell !== 'string' || cell.trim() === '') return null;
  const n = Number(cell);
  return Number.isFinite(n) ? n : null;
}

/** Normalises a feed timestamp to ISO-8601, or null when unparsable. */
export function toIsoTime(raw: unknown): string | null {
  if (typeof raw !== 'string' && typeof raw !== 'number') return null;
  // NOAA products use "YYYY-MM-DD hh:mm:ss.sss" in UTC with no zone marker
  const text = typeof raw === 'string' && !/[zZ]|[+-]\d\d:?\d\d$/.test(raw)
    ? `${raw.replace(' ', 'T')}Z`
    : raw;
  const ms = typeof text === 'number' ? text : Date.parse(text);
  return Number.isFinite(ms) ? new Date(ms).toISOString() : null;
}

export function byTime<T extends { t: string }>(a: T, b: T): number {
  return Date.parse(a.t) - Date.parse(b.t);
}
