import React from 'react';
import type { PlasmaPoint } from '../types';

interface Props {
  solar: PlasmaPoint | null;
}

const reading = (v: number | null, unit: string, digits = 0) =>
  v === null ? '--' : `${v.toFixed(digits)} ${unit}`;

export const SolarPanel: React.FC<Props> = ({ solar }) => (
  <section className="panel solar-panel">
    <h2>Solar Wind (DSCOVR)</h2>
    {solar === null ? (
      <p className="empty">No plasma reading</p>
    ) : (
      <dl className="solar-readings">
        <dt>Speed</dt>
        <dd>{reading(solar.speed, 'km/s')}</dd>
        <dt>Density</dt>
        <dd>{reading(solar.density, 'p/cm³', 2)}</dd>
        <dt>Temperature</dt>
        <dd>{reading(solar.temperature, 'K')}</dd>
      </dl>
    )}
  </section>
);
