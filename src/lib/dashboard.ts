import { hourlyThroughput, simulateCapacity } from './capacity';
import { isInvalidInputError } from './errors';
import type { InvalidInputError } from './errors';
import { evaluateInventory } from './inventory';
import { classifyAgainst } from './kpi';
import type { DashboardSnapshot, FacilityConfig, InventoryState, LiveInputs } from './types';
import type { TrendSource } from './trend';

/**
 * One render pass: live inputs + facility config in, everything the page shows out.
 * Each component is called independently; any InvalidInputError propagates.
 */
export function evaluateDashboard(inputs: LiveInputs, config: FacilityConfig, trendSource: TrendSource): DashboardSnapshot {
  const state: InventoryState = {
    currentStock: inputs.currentStock,
    reorderPoint: config.inventory.reorderPoint,
    economicOrderQty: config.inventory.economicOrderQty,
    safetyStock: config.inventory.safetyStock,
  };

  const decision = evaluateInventory(state);
  const cycleStatus = classifyAgainst(inputs.cycleTimeSeconds, config.thresholds.cycleTime);
  const defectStatus = classifyAgainst(inputs.defectRatePct, config.thresholds.defectRate);

  return {
    facilityName: config.facilityName,
    inventory: { state, decision, unit: config.inventory.unit },
    cycleTime: {
      value: inputs.cycleTimeSeconds,
      status: cycleStatus,
      deltaVsBaseline: inputs.cycleTimeSeconds - config.baselineCycleTimeSeconds,
    },
    defectRate: { value: inputs.defectRatePct, status: defectStatus },
    hourlyThroughput: hourlyThroughput(inputs.cycleTimeSeconds),
    capacity: simulateCapacity(config.shiftDurationSeconds, config.stages),
    trend: trendSource.cycleTimeSeries(inputs.cycleTimeSeconds),
    criticalCycleTimeSeconds: config.thresholds.cycleTime.red,
  };
}

export interface EvaluationOutcome {
  snapshot: DashboardSnapshot | null;
  error: InvalidInputError | null;
}

/**
 * Rejected inputs keep the last good snapshot on screen (or none, for "no data").
 * Anything other than InvalidInputError is rethrown.
 */
export function evaluateWithFallback(
  inputs: LiveInputs,
  config: FacilityConfig,
  trendSource: TrendSource,
  lastGood: DashboardSnapshot | null
): EvaluationOutcome {
  try {
    return { snapshot: evaluateDashboard(inputs, config, trendSource), error: null };
  } catch (err) {
    if (!isInvalidInputError(err)) throw err;
    return { snapshot: lastGood, error: err };
  }
}
