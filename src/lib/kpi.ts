import { z } from 'zod';
import type { KpiStatus, KpiThreshold } from './types';
import { finiteNumber, parseOrThrow } from './validation';

export const kpiThresholdSchema = z
  .object({ yellow: finiteNumber, red: finiteNumber })
  .refine((t) => t.red >= t.yellow, { message: 'red threshold must be >= yellow threshold', path: ['red'] });

const severity: Record<KpiStatus, number> = { OPTIMAL: 0, WARNING: 1, CRITICAL: 2 };

export function kpiSeverity(status: KpiStatus): number {
  return severity[status];
}

/**
 * Traffic-light classification, red checked first. Both bounds are inclusive, so a
 * value sitting exactly on a threshold takes that threshold's severity.
 */
export function classifyKpi(value: number, yellow: number, red: number): KpiStatus {
  const v = parseOrThrow(finiteNumber, value, 'kpi.value');
  const t = parseOrThrow(kpiThresholdSchema, { yellow, red }, 'kpi.threshold');

  if (v >= t.red) return 'CRITICAL';
  if (v >= t.yellow) return 'WARNING';
  return 'OPTIMAL';
}

export function classifyAgainst(value: number, threshold: KpiThreshold): KpiStatus {
  return classifyKpi(value, threshold.yellow, threshold.red);
}

export type AlertTone = 'success' | 'warning' | 'error' | 'info';
export type CardTone = 'good' | 'warn' | 'bad' | 'neutral';

export interface StatusDisplay {
  label: string;
  icon: string;
  alert: AlertTone;
  tone: CardTone;
}

export const KPI_STATUS_DISPLAY: Record<KpiStatus, StatusDisplay> = {
  OPTIMAL: { label: 'OPTIMAL', icon: '🟢', alert: 'success', tone: 'good' },
  WARNING: { label: 'WARNING', icon: '🟡', alert: 'warning', tone: 'warn' },
  CRITICAL: { label: 'CRITICAL', icon: '🔴', alert: 'error', tone: 'bad' },
};

export function statusText(status: KpiStatus): string {
  const d = KPI_STATUS_DISPLAY[status];
  return `Status: ${d.icon} ${d.label}`;
}
