export type KpiStatus = 'OPTIMAL' | 'WARNING' | 'CRITICAL';

export interface InventoryState {
  currentStock: number; // kg
  reorderPoint: number; // kg
  economicOrderQty: number; // kg
  safetyStock: number; // kg
}

export interface InventoryDecision {
  needsReorder: boolean;
  recommendedOrderQty: number;
  // informational only, never drives the reorder
  belowSafetyStock: boolean;
}

/** Higher value = worse. Callers flip the sign for lower-is-worse metrics. */
export interface KpiThreshold {
  yellow: number;
  red: number;
}

export interface ProcessStage {
  name: string;
  cycleTimeSeconds: number;
}

export interface CapacityResult {
  stageName: string;
  cycleTimeSeconds: number;
  dailyCapacityUnits: number;
}

export interface TrendPoint {
  hour: string; // e.g. "9AM"
  cycleTimeSeconds: number;
}

export interface InputRange {
  min: number;
  max: number;
  step: number;
  defaultValue: number;
}

export interface FacilityConfig {
  facilityName: string;
  inventory: {
    reorderPoint: number;
    economicOrderQty: number;
    safetyStock: number;
    unit: string;
  };
  baselineCycleTimeSeconds: number;
  shiftDurationSeconds: number;
  stages: ProcessStage[];
  thresholds: {
    cycleTime: KpiThreshold;
    defectRate: KpiThreshold;
  };
  inputs: {
    currentStock: InputRange;
    cycleTimeSeconds: InputRange;
    defectRatePct: InputRange;
  };
  automationTriggerDailyDemand: number;
}

/** Raw values from the sidebar controls. */
export interface LiveInputs {
  currentStock: number;
  cycleTimeSeconds: number;
  defectRatePct: number;
}

export interface KpiReading {
  value: number;
  status: KpiStatus;
}

export interface DashboardSnapshot {
  facilityName: string;
  inventory: {
    state: InventoryState;
    decision: InventoryDecision;
    unit: string;
  };
  cycleTime: KpiReading & { deltaVsBaseline: number };
  defectRate: KpiReading;
  hourlyThroughput: number;
  capacity: CapacityResult[];
  trend: TrendPoint[];
  criticalCycleTimeSeconds: number;
}
