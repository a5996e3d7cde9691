import type { FeedResult, RawDrift, Sample, Series } from '../types.js';

/** ZFCM alert threshold for k(ΔΦ). Fixed at deploy time. */
export const ZFCM_THRESHOLD = -1.0;

// Solar wind speed (km/s) at which the Ψ coupling saturates
export const PSI_SATURATION_SPEED = 800;

export type StressTransform = (drift: number) => number;

/** ΔΦ drift proxy (Ψ coupling) for one solar wind speed reading. */
export function driftFromSpeed(speedKmS: number): number | null {
  if (!Number.isFinite(speedKmS)) return null;
  return Math.max(0, Math.min(1, speedKmS / PSI_SATURATION_SPEED));
}

/** k(ΔΦ) = ln ΔΦ. Saturated coupling maps to 0, a quiet wind goes negative. */
export const stressOf: StressTransform = drift => Math.log(drift);

/**
 * Map a drift series to its stress series. Missing or non-finite drift values,
 * and values the transform sends to a non-finite result, are dropped; the
 * surviving samples keep their timestamps and order.
 */
export function evaluateStress(
  drift: ReadonlyArray<Sample<number | null>>,
  transform: StressTransform = stressOf,
): Sample[] {
  const out: Sample[] = [];
  for (const sample of drift) {
    const v = sample.value;
    if (v === null || !Number.isFinite(v)) continue;
    const k = transform(v);
    if (!Number.isFinite(k)) continue;
    out.push({ t: sample.t, value: k });
  }
  return out;
}

export function latestValue(series: Series): number | null {
  return series.length > 0 ? series[series.length - 1].value : null;
}

/** True only when the latest stress value is strictly below the threshold. */
export function isAlert(stress: Series, threshold: number = ZFCM_THRESHOLD): boolean {
  const latest = latestValue(stress);
  return latest !== null && latest < threshold;
}

export interface StressEvaluation {
  stress: Sample[];
  latest: number | null;
  alert: boolean;
}

/** A failed feed evaluates as an empty series. */
export function evaluateDrift(
  result: FeedResult<readonly RawDrift[]>,
  transform: StressTransform = stressOf,
): StressEvaluation {
  const drift = result.status === 'ok' ? result.data : [];
  const stress = evaluateStress(drift, transform);
  return {
    stress,
    latest: latestValue(stress),
    alert: isAlert(stress),
  };
}
