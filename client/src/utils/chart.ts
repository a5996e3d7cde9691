import type { ChartData } from 'chart.js';
import type { DataPoint } from '../types';

export function timeLabel(t: string): string {
  const date = new Date(t);
  if (Number.isNaN(date.getTime())) return t;
  return date.toLocaleTimeString([], { hour: '2-digit', minute: '2-digit' });
}

/** `#rrggbb` as `rgba(...)` with the given alpha; other colour strings pass through. */
export function withAlpha(color: string, alpha: number): string {
  const m = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(color);
  if (!m) return color;
  const [r, g, b] = [m[1], m[2], m[3]].map(h => parseInt(h, 16));
  return `rgba(${r}, ${g}, ${b}, ${alpha})`;
}

export interface SeriesStyle {
  label: string;
  color: string;
  /** Draws a dashed horizontal line at this value. */
  threshold?: number;
}

/** One label and one value per sample, in series order. */
export function buildChartData(series: readonly DataPoint[], style: SeriesStyle): ChartData<'line'> {
  const datasets: ChartData<'line'>['datasets'] = [
    {
      label: style.label,
      data: series.map(d => d.value),
      borderColor: style.color,
      backgroundColor: withAlpha(style.color, 0.08),
      borderWidth: 1.5,
      pointRadius: 0,
      fill: style.threshold === undefined,
      tension: 0.3,
    },
  ];
  const { threshold } = style;
  if (threshold !== undefined) {
    datasets.push({
      label: `Threshold (${formatThreshold(threshold)})`,
      data: series.map(() => threshold),
      borderColor: '#f87171',
      borderDash: [6, 4],
      borderWidth: 1,
      pointRadius: 0,
      fill: false,
    });
  }
  return { labels: series.map(d => timeLabel(d.t)), datasets };
}

export function formatThreshold(v: number): string {
  return v.toFixed(1);
}

export function formatValue(v: number | null, digits = 3): string {
  return v === null ? '--' : v.toFixed(digits);
}
