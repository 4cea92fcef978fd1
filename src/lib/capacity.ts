import { z } from 'zod';
import type { CapacityResult, FacilityConfig, ProcessStage } from './types';
import { parseOrThrow, positiveNumber } from './validation';

const SECONDS_PER_HOUR = 3600;

export const processStageSchema = z.object({
  name: z.string().refine((s) => s.trim().length > 0, 'stage name is required'),
  cycleTimeSeconds: positiveNumber,
});

const stagesSchema = z.array(processStageSchema);

/**
 * Units per shift for each stage (shift seconds / cycle seconds). Output order
 * matches input order; the chart uses it as category order. Values stay real.
 */
export function simulateCapacity(shiftDurationSeconds: number, stages: readonly ProcessStage[]): CapacityResult[] {
  const shift = parseOrThrow(positiveNumber, shiftDurationSeconds, 'shiftDurationSeconds');
  const parsed = parseOrThrow(stagesSchema, stages, 'stages');

  return parsed.map((stage) => ({
    stageName: stage.name,
    cycleTimeSeconds: stage.cycleTimeSeconds,
    dailyCapacityUnits: shift / stage.cycleTimeSeconds,
  }));
}

/** Live "units per hour" figure, truncated to a whole unit. */
export function hourlyThroughput(cycleTimeSeconds: number): number {
  const ct = parseOrThrow(positiveNumber, cycleTimeSeconds, 'cycleTimeSeconds');
  return Math.trunc(SECONDS_PER_HOUR / ct);
}

export function shiftHours(shiftDurationSeconds: number): number {
  return shiftDurationSeconds / SECONDS_PER_HOUR;
}

export function automationRecommendation(config: FacilityConfig): string {
  return `Trigger Level 2 Automation when daily demand exceeds ${config.automationTriggerDailyDemand} units.`;
}
