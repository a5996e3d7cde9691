import type { DashboardState } from '../types';

export function dashboardState(overrides: Partial<DashboardState> = {}): DashboardState {
  return {
    cycle: 1,
    refreshedAt: '2025-03-01T01:00:00.000Z',
    solar: { t: '2025-03-01T00:01:00.000Z', density: 4.2, speed: 160, temperature: 61000 },
    drift: [
      { t: '2025-03-01T00:00:00.000Z', value: 0.5 },
      { t: '2025-03-01T00:01:00.000Z', value: 0.2 },
    ],
    stress: [
      { t: '2025-03-01T00:00:00.000Z', value: Math.log(0.5) },
      { t: '2025-03-01T00:01:00.000Z', value: Math.log(0.2) },
    ],
    latestStress: Math.log(0.2),
    alert: { active: true, threshold: -1, since: '2025-03-01T01:00:00.000Z' },
    quakes: [
      { t: '2025-02-28T00:00:00.000Z', magnitude: 3.2, depthKm: 4, place: 'test ridge' },
    ],
    magnitudes: [{ t: '2025-02-28T00:00:00.000Z', value: 3.2 }],
    depths: [{ t: '2025-02-28T00:00:00.000Z', value: 4 }],
    kp: 2,
    indices: { eii: 0.675, psi: 0.2, kp: 2, rpam: 'ELEVATED' },
    feeds: {
      solarWind: { status: 'ok' },
      quakes: { status: 'ok' },
      kp: { status: 'ok' },
    },
    ...overrides,
  };
}
