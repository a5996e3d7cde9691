import { driftSeries, latestPlasma, plasmaFeed } from '../feeds/solarWind.js';
import { depthSeries, magnitudeSeries, quakeFeed } from '../feeds/usgs.js';
import { kpFeed, latestKp } from '../feeds/kp.js';
import type { FeedDeps } from '../feeds/http.js';
import {
  ZFCM_THRESHOLD,
  evaluateDrift,
  latestValue,
  stressOf,
  type StressTransform,
} from '../stress/evaluator.js';
import { KP_FALLBACK, PSI_FALLBACK, classifyRpam, computeEii } from '../stress/indices.js';
import type { FeedResult, FeedStatus, RawDrift, Sample } from '../types.js';
import type { AlertState, DashboardState, FeedSnapshot } from './types.js';

export interface RefreshOptions {
  transform?: StressTransform;
}

function statusOf<T>(result: FeedResult<T>): FeedStatus {
  return result.status === 'ok' ? { status: 'ok' } : { status: 'failed', reason: result.reason };
}

function rawDrift(snapshot: FeedSnapshot): FeedResult<RawDrift[]> {
  const { plasma } = snapshot;
  return plasma.status === 'ok' ? { status: 'ok', data: driftSeries(plasma.data) } : plasma;
}

function finiteDrift(drift: FeedResult<RawDrift[]>): Sample[] {
  if (drift.status !== 'ok') return [];
  const out: Sample[] = [];
  for (const { t, value } of drift.data) {
    if (value !== null && Number.isFinite(value)) out.push({ t, value });
  }
  return out;
}

/**
 * Fold one feed snapshot into the next dashboard state. `previous` only feeds
 * the cycle counter and the alert start time; whether the alert is active
 * depends on the latest stress value alone.
 */
export function refreshCycle(
  previous: DashboardState | null,
  snapshot: FeedSnapshot,
  now: Date,
  options: RefreshOptions = {},
): DashboardState {
  const refreshedAt = now.toISOString();
  const raw = rawDrift(snapshot);
  const evaluation = evaluateDrift(raw, options.transform ?? stressOf);

  const alert: AlertState = {
    active: evaluation.alert,
    threshold: ZFCM_THRESHOLD,
    since: evaluation.alert
      ? (previous?.alert.active ? previous.alert.since : null) ?? refreshedAt
      : null,
  };

  const drift = finiteDrift(raw);
  const quakes = snapshot.quakes.status === 'ok' ? snapshot.quakes.data : [];
  const kp = snapshot.kp.status === 'ok' ? latestKp(snapshot.kp.data) : null;

  const psi = latestValue(drift) ?? PSI_FALLBACK;
  const kpForIndex = kp ?? KP_FALLBACK;
  const eii = computeEii(quakes, psi, kpForIndex);

  return {
    cycle: (previous?.cycle ?? 0) + 1,
    refreshedAt,
    solar: snapshot.plasma.status === 'ok' ? latestPlasma(snapshot.plasma.data) : null,
    drift,
    stress: evaluation.stress,
    latestStress: evaluation.latest,
    alert,
    quakes,
    magnitudes: magnitudeSeries(quakes),
    depths: depthSeries(quakes),
    kp,
    indices: { eii, psi, kp: kpForIndex, rpam: classifyRpam(eii) },
    feeds: {
      solarWind: statusOf(snapshot.plasma),
      quakes: statusOf(snapshot.quakes),
      kp: statusOf(snapshot.kp),
    },
  };
}

/** Fetch every feed; failures come back as `failed` results, never as a rejection. */
export async function collectSnapshot(deps: FeedDeps, now: Date): Promise<FeedSnapshot> {
  const [plasma, quakes, kp] = await Promise.all([
    plasmaFeed(deps),
    quakeFeed(deps, now),
    kpFeed(deps),
  ]);
  return { plasma, quakes, kp };
}
