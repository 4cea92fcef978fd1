import { describe, expect, it } from 'vitest';
import * as XLSX from 'xlsx';
import { DEFAULT_FACILITY_CONFIG } from './config';
import { evaluateDashboard } from './dashboard';
import { Document } from 'docx';
import {
  buildSnapshotDocument,
  buildSnapshotWorkbook,
  capacityRows,
  snapshotFilename,
  snapshotSections,
  snapshotSummaryRows,
  trendRows,
  ymd,
} from './report';
import { IllustrativeTrendSource } from './trend';

const snapshot = evaluateDashboard(
  { currentStock: 45, cycleTimeSeconds: 29, defectRatePct: 1.2 },
  DEFAULT_FACILITY_CONFIG,
  new IllustrativeTrendSource()
);

const valueOf = (metric: string) => snapshotSummaryRows(snapshot, '2026-01-05').find((r) => r.Metric === metric)?.Value;

describe('Snapshot rows', () => {
  it('summarises inventory and KPI state', () => {
    expect(valueOf('Export date')).toBe('2026-01-05');
    expect(valueOf('Warehouse stock (kg)')).toBe(45);
    expect(valueOf('Reorder needed')).toBe('No');
    expect(valueOf('Recommended order (kg)')).toBe(215);
    expect(valueOf('Below safety stock')).toBe('No');
    expect(valueOf('Cycle time status')).toBe('OPTIMAL');
    expect(valueOf('Hourly throughput (units)')).toBe(124);
  });

  it('rounds capacity to whole units', () => {
    expect(capacityRows(snapshot)).toEqual([
      { Stage: 'Manual (Baseline)', 'Cycle time (s)': 35, 'Units per shift': 720 },
      { Stage: 'U-Layout (Optimized)', 'Cycle time (s)': 29, 'Units per shift': 869 },
      { Stage: 'Semi-Automation', 'Cycle time (s)': 12, 'Units per shift': 2100 },
    ]);
  });

  it('lists the trend by hour', () => {
    expect(trendRows(snapshot)[0]).toEqual({ Hour: '9AM', 'Cycle time (s)': 30 });
  });
});

describe('Recommended order in the summary', () => {
  it('is the EOQ whether or not a reorder is due', () => {
    const low = evaluateDashboard(
      { currentStock: 20, cycleTimeSeconds: 29, defectRatePct: 1.2 },
      DEFAULT_FACILITY_CONFIG,
      new IllustrativeTrendSource()
    );
    const rows = snapshotSummaryRows(low, '2026-01-05');
    expect(rows.find((r) => r.Metric === 'Reorder needed')?.Value).toBe('Yes');
    expect(rows.find((r) => r.Metric === 'Recommended order (kg)')?.Value).toBe(215);
  });
});

describe('Snapshot sections', () => {
  it('pairs each sheet with its document heading', () => {
    expect(snapshotSections(snapshot, '2026-01-05').map((sec) => [sec.sheet, sec.heading])).toEqual([
      ['Summary', 'Summary'],
      ['Capacity', 'Capacity Simulation'],
      ['Trend', 'Cycle Time Trend'],
    ]);
  });

  it('builds a docx document from the sections', () => {
    expect(buildSnapshotDocument(snapshot, '2026-01-05')).toBeInstanceOf(Document);
  });
});

describe('Snapshot workbook', () => {
  it('writes one sheet per section', () => {
    const wb = buildSnapshotWorkbook(snapshot, '2026-01-05');
    expect(wb.SheetNames).toEqual(['Summary', 'Capacity', 'Trend']);
    expect(XLSX.utils.sheet_to_json(wb.Sheets.Capacity)).toEqual(capacityRows(snapshot));
    expect(XLSX.utils.sheet_to_json(wb.Sheets.Summary)).toContainEqual({ Metric: 'Recommended order (kg)', Value: 215 });
  });

  it('names exports by date', () => {
    expect(snapshotFilename('xlsx', '2026-01-05')).toBe('Ops_Snapshot_2026-01-05.xlsx');
    expect(ymd(new Date('2026-03-04T10:00:00Z'))).toBe('2026-03-04');
  });
});
