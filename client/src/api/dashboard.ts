import type { DashboardState } from '../types';

const BASE = import.meta.env.VITE_API_BASE ?? 'http://localhost:3099/api';

async function fetchJson<T>(url: string, init?: RequestInit): Promise<T> {
  const resp = await fetch(url, init);
  if (!resp.ok) {
    const body: { error?: string } = await resp.json().catch(() => ({}));
    throw new Error(body.error || `HTTP ${resp.status}`);
  }
  return resp.json();
}

export async function fetchDashboard(): Promise<DashboardState> {
  return fetchJson<DashboardState>(`${BASE}/dashboard`);
}

export async function forceRefresh(): Promise<DashboardState> {
  return fetchJson<DashboardState>(`${BASE}/dashboard/refresh`, { method: 'POST' });
}
