import type { QuakeEvent } from '../types.js';

export type RpamPhase = 'ACTIVE' | 'ELEVATED' | 'MONITORING';

// Used for the indices only when the respective feed is down
export const PSI_FALLBACK = 0.5;
export const KP_FALLBACK = 1.0;

export const SHALLOW_DEPTH_KM = 5;

const round3 = (v: number) => Math.round(v * 1000) / 1000;

/** Energetic Instability Index, 0..1. */
export function computeEii(quakes: readonly QuakeEvent[], psi: number, kp: number): number {
  if (quakes.length === 0) return 0;
  const magMean = quakes.reduce((a, q) => a + q.magnitude, 0) / quakes.length;
  const shallowRatio = quakes.filter(q => q.depthKm < SHALLOW_DEPTH_KM).length / quakes.length;
  const raw = (magMean * 0.25 + shallowRatio * 0.35 + psi * 0.25 + kp * 0.15) / 2;
  return round3(Math.max(0, Math.min(1, raw)));
}

export function classifyRpam(eii: number): RpamPhase {
  if (eii >= 0.85) return 'ACTIVE';
  if (eii >= 0.6) return 'ELEVATED';
  return 'MONITORING';
}
