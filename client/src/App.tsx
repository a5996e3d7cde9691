import React, { useState, useCallback, useEffect } from 'react';
import { AlertBanner } from './components/AlertBanner';
import { FeedStatusList } from './components/FeedStatusList';
import { MetricStrip } from './components/MetricStrip';
import { QuakeTable } from './components/QuakeTable';
import { SeriesChart } from './components/SeriesChart';
import { SolarPanel } from './components/SolarPanel';
import { fetchDashboard, forceRefresh } from './api/dashboard';
import type { DashboardState } from './types';

// Feeds refresh every 10 minutes upstream
export const POLL_INTERVAL = 600_000;

export default function App() {
  const [state, setState] = useState<DashboardState | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [loading, setLoading] = useState(false);

  const load = useCallback(async (fetcher: () => Promise<DashboardState>) => {
    setLoading(true);
    try {
      setState(await fetcher());
      setError(null);
    } catch (err: unknown) {
      // Keep showing the last good state
      setError(err instanceof Error ? err.message : 'Unknown error');
    } finally {
      setLoading(false);
    }
  }, []);

  useEffect(() => {
    void load(fetchDashboard);
    const id = setInterval(() => { void load(fetchDashboard); }, POLL_INTERVAL);
    return () => clearInterval(id);
  }, [load]);

  const handleRefresh = useCallback(() => { void load(forceRefresh); }, [load]);

  return (
    <div className="app">
      <header className="app-header">
        <h1>Solar–Seismic Stress Dashboard</h1>
        <p className="subtitle">
          ΔΦ drift from NOAA SWPC solar wind, seismicity from the USGS catalogue.
          Auto-updates every 10 minutes.
        </p>
        <button className="btn" onClick={handleRefresh} disabled={loading}>
          {loading ? 'Refreshing…' : 'Refresh now'}
        </button>
      </header>

      {error && <div className="error-banner">Update failed: {error}</div>}

      {state === null ? (
        <p className="empty">{loading ? 'Fetching live data feeds…' : 'No data yet.'}</p>
      ) : (
        <div className="main-layout">
          <AlertBanner alert={state.alert} latestStress={state.latestStress} />
          <MetricStrip indices={state.indices} kp={state.kp} />
          <SolarPanel solar={state.solar} />
          <div className="charts">
            <SeriesChart stream="drift" series={state.drift} />
            <SeriesChart stream="stress" series={state.stress} threshold={state.alert.threshold} />
            <SeriesChart stream="magnitude" series={state.magnitudes} />
            <SeriesChart stream="depth" series={state.depths} />
          </div>
          <section className="panel">
            <h2>Seismic Events (Past 7 Days)</h2>
            <QuakeTable quakes={state.quakes} />
          </section>
          <footer className="app-footer">
            <span>Updated {new Date(state.refreshedAt).toUTCString()} · cycle {state.cycle}</span>
            <FeedStatusList feeds={state.feeds} />
          </footer>
        </div>
      )}
    </div>
  );
}
