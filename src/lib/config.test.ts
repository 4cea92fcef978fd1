import { describe, expect, it } from 'vitest';
import { DEFAULT_FACILITY_CONFIG, loadFacilityConfig, mergeConfig, resolveFacilityConfig } from './config';
import { InvalidInputError } from './errors';

describe('Facility config loading', () => {
  it('uses defaults when no override is given', () => {
    expect(loadFacilityConfig()).toEqual(DEFAULT_FACILITY_CONFIG);
    expect(loadFacilityConfig('   ')).toEqual(DEFAULT_FACILITY_CONFIG);
  });

  it('does not hand out the shared default object', () => {
    const cfg = loadFacilityConfig();
    cfg.inventory.reorderPoint = 1;
    expect(DEFAULT_FACILITY_CONFIG.inventory.reorderPoint).toBe(37);
  });

  it('deep-merges a JSON override', () => {
    const cfg = loadFacilityConfig('{"shiftDurationSeconds":28800,"inventory":{"reorderPoint":50}}');
    expect(cfg.shiftDurationSeconds).toBe(28800);
    expect(cfg.inventory.reorderPoint).toBe(50);
    expect(cfg.inventory.economicOrderQty).toBe(215);
  });

  it('replaces the stage list wholesale', () => {
    const cfg = loadFacilityConfig('{"stages":[{"name":"Robot Cell","cycleTimeSeconds":8}]}');
    expect(cfg.stages).toEqual([{ name: 'Robot Cell', cycleTimeSeconds: 8 }]);
  });

  it('rejects malformed JSON', () => {
    expect(() => loadFacilityConfig('{oops')).toThrow(InvalidInputError);
  });

  it('rejects inverted thresholds', () => {
    expect(() => loadFacilityConfig('{"thresholds":{"cycleTime":{"yellow":45,"red":40}}}')).toThrow(
      'config.thresholds.cycleTime.red'
    );
  });

  it('rejects a default outside its control range', () => {
    expect(() => loadFacilityConfig('{"inputs":{"cycleTimeSeconds":{"defaultValue":80}}}')).toThrow(
      'config.inputs.cycleTimeSeconds.defaultValue'
    );
  });

  it('rejects a non-positive stage cycle time', () => {
    expect(() => loadFacilityConfig('{"stages":[{"name":"Manual","cycleTimeSeconds":0}]}')).toThrow(
      'config.stages.0.cycleTimeSeconds'
    );
  });
});

describe('resolveFacilityConfig', () => {
  it('falls back to defaults on an invalid override', () => {
    expect(resolveFacilityConfig('{oops')).toEqual(DEFAULT_FACILITY_CONFIG);
    expect(resolveFacilityConfig('{"baselineCycleTimeSeconds":0}')).toEqual(DEFAULT_FACILITY_CONFIG);
  });

  it('applies a valid override', () => {
    expect(resolveFacilityConfig('{"facilityName":"Line 2"}').facilityName).toBe('Line 2');
  });
});

describe('mergeConfig', () => {
  it('merges nested objects and replaces scalars and arrays', () => {
    expect(mergeConfig({ a: { b: 1, c: 2 }, d: [1, 2] }, { a: { c: 3 }, d: [9] })).toEqual({
      a: { b: 1, c: 3 },
      d: [9],
    });
  });

  it('ignores prototype keys from a JSON override', () => {
    const out = mergeConfig({ a: 1 }, JSON.parse('{"__proto__":{"polluted":true},"constructor":{"x":1},"b":2}'));
    expect(Object.getPrototypeOf(out)).toBe(Object.prototype);
    expect(out).toEqual({ a: 1, b: 2 });
  });

  it('loads a config whose override carries __proto__', () => {
    const cfg = loadFacilityConfig('{"__proto__":{"facilityName":"Injected"},"shiftDurationSeconds":28800}');
    expect(Object.getPrototypeOf(cfg)).toBe(Object.prototype);
    expect(cfg.facilityName).toBe('Roastery Floor');
    expect(cfg.shiftDurationSeconds).toBe(28800);
  });

  it('keeps the base when the override is undefined', () => {
    expect(mergeConfig({ a: 1 }, undefined)).toEqual({ a: 1 });
  });
});
