import React, { useMemo } from 'react';
import {
  Chart as ChartJS,
  CategoryScale,
  LinearScale,
  PointElement,
  LineElement,
  Title,
  Tooltip,
  Legend,
  Filler,
} from 'chart.js';
import { Line } from 'react-chartjs-2';
import type { ChartStream, DataPoint } from '../types';
import { STREAM_COLORS, STREAM_LABELS } from '../types';
import { buildChartData, formatValue } from '../utils/chart';

ChartJS.register(
  CategoryScale,
  LinearScale,
  PointElement,
  LineElement,
  Title,
  Tooltip,
  Legend,
  Filler,
);

interface Props {
  stream: ChartStream;
  series: DataPoint[];
  threshold?: number;
}

export const SeriesChart: React.FC<Props> = ({ stream, series, threshold }) => {
  const chartData = useMemo(
    () => buildChartData(series, {
      label: STREAM_LABELS[stream],
      color: STREAM_COLORS[stream],
      threshold,
    }),
    [series, stream, threshold],
  );

  const chartOptions = useMemo(() => ({
    responsive: true,
    maintainAspectRatio: false,
    animation: { duration: 300 },
    plugins: {
      title: { display: false },
      legend: { display: threshold !== undefined, labels: { color: '#9ca3af' } },
      tooltip: {
        mode: 'index' as const,
        intersect: false,
      },
    },
    scales: {
      x: {
        display: true,
        ticks: {
          color: '#9ca3af',
          maxTicksLimit: 10,
          font: { size: 10 },
        },
        grid: { color: 'rgba(255,255,255,0.05)' },
      },
      y: {
        display: true,
        ticks: { color: '#9ca3af', font: { size: 10 } },
        grid: { color: 'rgba(255,255,255,0.05)' },
      },
    },
    interaction: {
      mode: 'nearest' as const,
      axis: 'x' as const,
      intersect: false,
    },
  }), [threshold]);

  const latest = series.length > 0 ? series[series.length - 1].value : null;

  return (
    <div className="panel chart-panel">
      <div className="panel-header">
        <h2>{STREAM_LABELS[stream]}</h2>
        <span className="stat-value">{formatValue(latest)}</span>
      </div>
      <div className="chart-container">
        {series.length > 0
          ? <Line data={chartData} options={chartOptions} />
          : <p className="empty">No data from this feed.</p>}
      </div>
    </div>
  );
};
