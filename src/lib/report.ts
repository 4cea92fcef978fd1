import type { DashboardSnapshot } from './types';
import { moduleLogger } from './logger';

import * as XLSX from 'xlsx';
import { saveAs } from 'file-saver';

import { Document, Packer, Paragraph, HeadingLevel, Table, TableRow, TableCell, WidthType, TextRun } from 'docx';

const log = moduleLogger('report');

type Row = Record<string, string | number>;

/** One block of the export: a worksheet in the workbook, a headed table in the document. */
export interface ReportSection {
  sheet: string;
  heading: string;
  rows: Row[];
}

export const ymd = (d: Date = new Date()) => d.toISOString().slice(0, 10);

export function snapshotSummaryRows(s: DashboardSnapshot, exportDate: string = ymd()): Row[] {
  const unit = s.inventory.unit;
  const { state, decision } = s.inventory;

  return [
    { Metric: 'Facility', Value: s.facilityName },
    { Metric: 'Export date', Value: exportDate },
    { Metric: `Warehouse stock (${unit})`, Value: state.currentStock },
    { Metric: `Reorder point (${unit})`, Value: state.reorderPoint },
    { Metric: `Economic order qty (${unit})`, Value: state.economicOrderQty },
    { Metric: `Safety stock (${unit})`, Value: state.safetyStock },
    { Metric: 'Reorder needed', Value: decision.needsReorder ? 'Yes' : 'No' },
    { Metric: `Recommended order (${unit})`, Value: decision.recommendedOrderQty },
    { Metric: 'Below safety stock', Value: decision.belowSafetyStock ? 'Yes' : 'No' },
    { Metric: 'Cycle time (s)', Value: s.cycleTime.value },
    { Metric: 'Cycle time status', Value: s.cycleTime.status },
    { Metric: 'Defect rate (%)', Value: s.defectRate.value },
    { Metric: 'Defect rate status', Value: s.defectRate.status },
    { Metric: 'Hourly throughput (units)', Value: s.hourlyThroughput },
  ];
}

export function capacityRows(s: DashboardSnapshot): Row[] {
  return s.capacity.map((c) => ({
    Stage: c.stageName,
    'Cycle time (s)': c.cycleTimeSeconds,
    'Units per shift': Math.round(c.dailyCapacityUnits),
  }));
}

export function trendRows(s: DashboardSnapshot): Row[] {
  return s.trend.map((p) => ({ Hour: p.hour, 'Cycle time (s)': p.cycleTimeSeconds }));
}

export function snapshotSections(s: DashboardSnapshot, exportDate: string = ymd()): ReportSection[] {
  return [
    { sheet: 'Summary', heading: 'Summary', rows: snapshotSummaryRows(s, exportDate) },
    { sheet: 'Capacity', heading: 'Capacity Simulation', rows: capacityRows(s) },
    { sheet: 'Trend', heading: 'Cycle Time Trend', rows: trendRows(s) },
  ];
}

export function snapshotFilename(ext: 'xlsx' | 'docx', exportDate: string = ymd()): string {
  return `Ops_Snapshot_${exportDate}.${ext}`;
}

function download(blob: Blob, filename: string) {
  saveAs(blob, filename);
  log.info({ filename }, 'Exported snapshot');
}

// --- workbook ---

export function buildSnapshotWorkbook(s: DashboardSnapshot, exportDate: string = ymd()): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();
  for (const section of snapshotSections(s, exportDate)) {
    XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(section.rows), section.sheet);
  }
  return wb;
}

export function exportSnapshotXlsx(s: DashboardSnapshot) {
  const exportDate = ymd();
  const data: ArrayBuffer = XLSX.write(buildSnapshotWorkbook(s, exportDate), { bookType: 'xlsx', type: 'array' });
  const type = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
  download(new Blob([data], { type }), snapshotFilename('xlsx', exportDate));
}

// --- document ---

const textCell = (text: string, bold = false) =>
  new TableCell({ children: [new Paragraph({ children: [new TextRun({ text, bold })] })] });

function sectionTable(rows: Row[]): Table | Paragraph {
  const columns = rows.length > 0 ? Object.keys(rows[0]) : [];
  if (columns.length === 0) return new Paragraph('No entries.');

  const header = new TableRow({ tableHeader: true, children: columns.map((c) => textCell(c, true)) });
  const body = rows.map((r) => new TableRow({ children: columns.map((c) => textCell(String(r[c] ?? ''))) }));

  return new Table({ rows: [header, ...body], width: { size: 100, type: WidthType.PERCENTAGE } });
}

export function buildSnapshotDocument(s: DashboardSnapshot, exportDate: string = ymd()): Document {
  const body = snapshotSections(s, exportDate).flatMap((section) => [
    new Paragraph({ text: section.heading, heading: HeadingLevel.HEADING_1 }),
    sectionTable(section.rows),
  ]);

  return new Document({
    title: `Ops Snapshot - ${s.facilityName}`,
    sections: [
      {
        children: [
          new Paragraph({ text: `Ops Snapshot - ${s.facilityName}`, heading: HeadingLevel.TITLE }),
          new Paragraph({ text: `Export date: ${exportDate}` }),
          ...body,
        ],
      },
    ],
  });
}

export async function exportSnapshotDocx(s: DashboardSnapshot) {
  const exportDate = ymd();
  const blob = await Packer.toBlob(buildSnapshotDocument(s, exportDate));
  download(blob, snapshotFilename('docx', exportDate));
}
