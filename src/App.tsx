import { useEffect, useMemo, useRef, useState } from 'react';

import './components/styles.css';
import { CapacityChart } from './components/CapacityChart';
import { KpiCard } from './components/KpiCard';
import { LiveInputsPanel } from './components/LiveInputsPanel';
import { StatusNotice } from './components/StatusNotice';
import { TrendChart } from './components/TrendChart';

import type { DashboardSnapshot, FacilityConfig, LiveInputs } from './lib/types';
import { automationRecommendation, shiftHours } from './lib/capacity';
import { resolveFacilityConfig } from './lib/config';
import { evaluateWithFallback } from './lib/dashboard';
import { inventoryAlertMessage } from './lib/inventory';
import { KPI_STATUS_DISPLAY, statusText } from './lib/kpi';
import { moduleLogger } from './lib/logger';
import { exportSnapshotDocx, exportSnapshotXlsx } from './lib/report';
import { IllustrativeTrendSource } from './lib/trend';
import type { TrendSource } from './lib/trend';

const log = moduleLogger('app');

function defaultInputs(config: FacilityConfig): LiveInputs {
  return {
    currentStock: config.inputs.currentStock.defaultValue,
    cycleTimeSeconds: config.inputs.cycleTimeSeconds.defaultValue,
    defectRatePct: config.inputs.defectRatePct.defaultValue,
  };
}

function signed(n: number) {
  return `${n > 0 ? '+' : ''}${n}`;
}

export default function App() {
  const [config] = useState<FacilityConfig>(() => resolveFacilityConfig());
  const [trendSource] = useState<TrendSource>(() => new IllustrativeTrendSource());
  const [inputs, setInputs] = useState<LiveInputs>(() => defaultInputs(config));
  const [exportStatus, setExportStatus] = useState<'idle' | 'exporting' | 'error'>('idle');
  const lastGood = useRef<DashboardSnapshot | null>(null);

  const outcome = useMemo(
    () => evaluateWithFallback(inputs, config, trendSource, lastGood.current),
    [inputs, config, trendSource]
  );

  useEffect(() => {
    if (outcome.error) {
      log.warn({ field: outcome.error.field, err: outcome.error.message }, 'Live input rejected');
      return;
    }
    lastGood.current = outcome.snapshot;
  }, [outcome]);

  const snapshot = outcome.snapshot;

  const exportXlsx = (s: DashboardSnapshot) => {
    try {
      exportSnapshotXlsx(s);
      setExportStatus('idle');
    } catch (err) {
      log.error({ err }, 'Workbook export failed');
      setExportStatus('error');
    }
  };

  const exportDocx = (s: DashboardSnapshot) => {
    setExportStatus('exporting');
    void exportSnapshotDocx(s)
      .then(() => setExportStatus('idle'))
      .catch((err: unknown) => {
        log.error({ err }, 'Document export failed');
        setExportStatus('error');
      });
  };

  return (
    <div className="layout">
      <LiveInputsPanel config={config} inputs={inputs} onChange={setInputs} />

      <main className="app">
        <h1>Operational Nervous System: {config.facilityName}</h1>
        <div className="small">
          <b>Focus: Efficiency &amp; Excellence</b>
        </div>

        {outcome.error && (
          <StatusNotice tone="warning">
            Input rejected ({outcome.error.message}).{' '}
            {snapshot ? 'Showing last known good values.' : 'No data to display.'}
          </StatusNotice>
        )}

        {snapshot && (
          <>
            {/* INVENTORY */}
            <h2>1. Inventory Strategy &amp; Liquidity</h2>
            <div className="grid-3">
              <KpiCard label="Warehouse Stock" value={`${snapshot.inventory.state.currentStock} ${snapshot.inventory.unit}`}>
                <StatusNotice tone={snapshot.inventory.decision.needsReorder ? 'error' : 'success'}>
                  {inventoryAlertMessage(snapshot.inventory.state, snapshot.inventory.decision, snapshot.inventory.unit)}
                </StatusNotice>
              </KpiCard>
              <KpiCard
                label="Optimal Order (EOQ)"
                value={`${snapshot.inventory.state.economicOrderQty} ${snapshot.inventory.unit}`}
                caption="Calculated to minimize holding vs. ordering costs."
              />
              <KpiCard
                label="Safety Stock"
                value={`${snapshot.inventory.state.safetyStock} ${snapshot.inventory.unit}`}
                tone={snapshot.inventory.decision.belowSafetyStock ? 'bad' : 'neutral'}
                caption={
                  snapshot.inventory.decision.belowSafetyStock
                    ? 'Stock is below the safety buffer.'
                    : 'Buffer against demand and lead-time variability.'
                }
              />
            </div>

            {/* PRODUCTION KPIs */}
            <h2>2. Real-Time Production Visibility</h2>
            <div className="grid-3">
              <KpiCard
                label="Cycle Time"
                value={`${snapshot.cycleTime.value}s`}
                tone={KPI_STATUS_DISPLAY[snapshot.cycleTime.status].tone}
                delta={`${signed(snapshot.cycleTime.deltaVsBaseline)}s vs baseline`}
              >
                <StatusNotice tone={KPI_STATUS_DISPLAY[snapshot.cycleTime.status].alert}>
                  {statusText(snapshot.cycleTime.status)}
                </StatusNotice>
              </KpiCard>
              <KpiCard
                label="Defect Rate"
                value={`${snapshot.defectRate.value}%`}
                tone={KPI_STATUS_DISPLAY[snapshot.defectRate.status].tone}
              >
                <StatusNotice tone={KPI_STATUS_DISPLAY[snapshot.defectRate.status].alert}>
                  {statusText(snapshot.defectRate.status)}
                </StatusNotice>
              </KpiCard>
              <KpiCard
                label="Hourly Throughput"
                value={`${snapshot.hourlyThroughput} Units`}
                caption="Current productivity ceiling."
              />
            </div>

            {/* TREND */}
            <h2>3. Productivity Trend Analysis</h2>
            <TrendChart points={snapshot.trend} criticalLimit={snapshot.criticalCycleTimeSeconds} />

            {/* SIMULATION */}
            <h2>4. Scalability &amp; Investment Simulation</h2>
            <CapacityChart results={snapshot.capacity} shiftHours={shiftHours(config.shiftDurationSeconds)} />
            <StatusNotice tone="info">
              <b>Recommendation:</b> {automationRecommendation(config)}
            </StatusNotice>

            {/* EXPORT */}
            <div className="card" style={{ marginTop: 16 }}>
              <h3>Export</h3>
              <div className="toolbar">
                <button onClick={() => exportXlsx(snapshot)}>Export snapshot (.xlsx)</button>
                <button onClick={() => exportDocx(snapshot)} disabled={exportStatus === 'exporting'}>
                  Export snapshot (.docx)
                </button>
              </div>
              {exportStatus === 'error' && (
                <StatusNotice tone="error">Export failed. See console for details.</StatusNotice>
              )}
            </div>
          </>
        )}
      </main>
    </div>
  );
}
