import type { ReactNode } from 'react';
import type { AlertTone } from '../lib/kpi';
import './styles.css';

export function StatusNotice({ tone, children }: { tone: AlertTone; children: ReactNode }) {
  return (
    <div className={`notice notice-${tone}`} role={tone === 'error' ? 'alert' : 'status'}>
      {children}
    </div>
  );
}
