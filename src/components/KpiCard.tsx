import type { ReactNode } from 'react';
import type { CardTone } from '../lib/kpi';
import './styles.css';

interface Props {
  label: string;
  value: string;
  tone?: CardTone;
  delta?: string;
  caption?: string;
  children?: ReactNode;
}

export function KpiCard({ label, value, tone = 'neutral', delta, caption, children }: Props) {
  return (
    <div className={`card kpi tone-${tone}`}>
      <div className="kpi-label">{label}</div>
      <div className="kpi-value">{value}</div>
      {delta && <div className="kpi-delta">{delta}</div>}
      {children}
      {caption && <div className="small">{caption}</div>}
    </div>
  );
}
