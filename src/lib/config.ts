import { z } from 'zod';
import { processStageSchema } from './capacity';
import { InvalidInputError, isInvalidInputError } from './errors';
import { kpiThresholdSchema } from './kpi';
import { moduleLogger } from './logger';
import type { FacilityConfig } from './types';
import { finiteNumber, nonNegativeNumber, parseOrThrow, positiveNumber } from './validation';

const log = moduleLogger('config');

export const DEFAULT_FACILITY_CONFIG: FacilityConfig = {
  facilityName: 'Roastery Floor',
  inventory: {
    reorderPoint: 37,
    economicOrderQty: 215,
    safetyStock: 12.5,
    unit: 'kg',
  },
  baselineCycleTimeSeconds: 35,
  shiftDurationSeconds: 7 * 3600, // 7-hour effective shift
  stages: [
    { name: 'Manual (Baseline)', cycleTimeSeconds: 35 },
    { name: 'U-Layout (Optimized)', cycleTimeSeconds: 29 },
    { name: 'Semi-Automation', cycleTimeSeconds: 12 },
  ],
  thresholds: {
    cycleTime: { yellow: 35, red: 40 },
    defectRate: { yellow: 2.0, red: 3.0 },
  },
  inputs: {
    currentStock: { min: 0, max: 1000, step: 1, defaultValue: 45 },
    cycleTimeSeconds: { min: 10, max: 50, step: 1, defaultValue: 29 },
    defectRatePct: { min: 0, max: 5, step: 0.1, defaultValue: 1.2 },
  },
  automationTriggerDailyDemand: 600,
};

const inputRangeSchema = z
  .object({ min: finiteNumber, max: finiteNumber, step: positiveNumber, defaultValue: finiteNumber })
  .refine((r) => r.min <= r.defaultValue && r.defaultValue <= r.max, {
    message: 'defaultValue must lie within [min, max]',
    path: ['defaultValue'],
  });

export const facilityConfigSchema: z.ZodType<FacilityConfig> = z.object({
  facilityName: z.string().min(1),
  inventory: z.object({
    reorderPoint: nonNegativeNumber,
    economicOrderQty: positiveNumber,
    safetyStock: nonNegativeNumber,
    unit: z.string().min(1),
  }),
  baselineCycleTimeSeconds: positiveNumber,
  shiftDurationSeconds: positiveNumber,
  stages: z.array(processStageSchema).min(1),
  thresholds: z.object({
    cycleTime: kpiThresholdSchema,
    defectRate: kpiThresholdSchema,
  }),
  inputs: z.object({
    currentStock: inputRangeSchema,
    cycleTimeSeconds: inputRangeSchema,
    defectRatePct: inputRangeSchema,
  }),
  automationTriggerDailyDemand: nonNegativeNumber,
});

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

const UNSAFE_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/** Objects merge key by key; arrays and scalars in `override` replace. Prototype keys are dropped. */
export function mergeConfig(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) return override === undefined ? base : override;

  const out: Record<string, unknown> = { ...base };
  for (const [k, v] of Object.entries(override)) {
    if (UNSAFE_KEYS.has(k)) continue;
    out[k] = mergeConfig(base[k], v);
  }
  return out;
}

export function parseFacilityConfig(raw: unknown): FacilityConfig {
  return parseOrThrow(facilityConfigSchema, raw, 'config');
}

/**
 * Parse a JSON override (VITE_FACILITY_CONFIG) on top of the defaults.
 * Blank or missing input yields the defaults.
 */
export function loadFacilityConfig(rawJson?: string): FacilityConfig {
  const text = (rawJson ?? '').trim();
  if (!text) return structuredClone(DEFAULT_FACILITY_CONFIG);

  let override: unknown;
  try {
    override = JSON.parse(text);
  } catch (err) {
    throw new InvalidInputError('config: override is not valid JSON', 'config', err);
  }

  return parseFacilityConfig(mergeConfig(structuredClone(DEFAULT_FACILITY_CONFIG), override));
}

/** App bootstrap: an invalid override is logged and the defaults are used instead. */
export function resolveFacilityConfig(rawJson: string | undefined = import.meta.env.VITE_FACILITY_CONFIG): FacilityConfig {
  try {
    return loadFacilityConfig(rawJson);
  } catch (err) {
    if (!isInvalidInputError(err)) throw err;
    log.warn({ field: err.field, err: err.message }, 'Invalid facility config override, using defaults');
    return structuredClone(DEFAULT_FACILITY_CONFIG);
  }
}
