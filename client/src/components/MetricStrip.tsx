import React from 'react';
import type { Indices } from '../types';
import { RPAM_LABELS } from '../types';

interface Props {
  indices: Indices;
  kp: number | null;
}

const Stat: React.FC<{ label: string; value: string }> = ({ label, value }) => (
  <div className="stat">
    <span className="stat-label">{label}</span>
    <span className="stat-value">{value}</span>
  </div>
);

export const MetricStrip: React.FC<Props> = ({ indices, kp }) => (
  <div className="stats-row">
    <Stat label="Energetic Instability Index (EII)" value={indices.eii.toFixed(3)} />
    <Stat label="Ψ Coupling" value={indices.psi.toFixed(3)} />
    {/* Live Kp when available, otherwise the value the index fell back to */}
    <Stat label="Geomagnetic Kp" value={kp === null ? `${indices.kp.toFixed(2)} (fallback)` : kp.toFixed(2)} />
    <Stat label="RPAM Phase" value={RPAM_LABELS[indices.rpam]} />
  </div>
);
