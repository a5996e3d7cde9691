import React, { useMemo } from 'react';
import type { QuakeEvent } from '../types';

export const QUAKE_ROWS = 15;

export function latestQuakes(quakes: readonly QuakeEvent[], limit = QUAKE_ROWS): QuakeEvent[] {
  return [...quakes].sort((a, b) => Date.parse(b.t) - Date.parse(a.t)).slice(0, limit);
}

export const QuakeTable: React.FC<{ quakes: QuakeEvent[] }> = ({ quakes }) => {
  const rows = useMemo(() => latestQuakes(quakes), [quakes]);

  if (rows.length === 0) {
    return <p className="empty">No seismic data available.</p>;
  }

  return (
    <table className="quake-table">
      <thead>
        <tr>
          <th>Time (UTC)</th>
          <th>Magnitude</th>
          <th>Depth (km)</th>
          <th>Place</th>
        </tr>
      </thead>
      <tbody>
        {rows.map(q => (
          <tr key={`${q.t}-${q.place}`}>
            <td>{q.t.replace('T', ' ').slice(0, 19)}</td>
            <td>{q.magnitude.toFixed(1)}</td>
            <td>{q.depthKm.toFixed(1)}</td>
            <td>{q.place}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
};
