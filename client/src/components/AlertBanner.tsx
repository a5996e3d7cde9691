import React from 'react';
import type { AlertState } from '../types';
import { formatThreshold, formatValue } from '../utils/chart';

interface Props {
  alert: AlertState;
  latestStress: number | null;
}

export const AlertBanner: React.FC<Props> = ({ alert, latestStress }) => {
  if (!alert.active) return null;
  return (
    <div className="alert-banner" role="alert">
      <strong>ZFCM threshold breached</strong>
      <span>
        k(ΔΦ) = {formatValue(latestStress)} &lt; {formatThreshold(alert.threshold)}
      </span>
      {alert.since && (
        <span className="alert-since">since {new Date(alert.since).toUTCString()}</span>
      )}
    </div>
  );
};
