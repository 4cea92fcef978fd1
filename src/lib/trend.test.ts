import { describe, expect, it } from 'vitest';
import { InvalidInputError } from './errors';
import { IllustrativeTrendSource } from './trend';

describe('Illustrative trend source', () => {
  it('appends the live cycle time as the last hour', () => {
    const series = new IllustrativeTrendSource().cycleTimeSeries(29);
    expect(series.map((p) => p.hour)).toEqual(['9AM', '10AM', '11AM', '12PM', '2PM', '3PM', '4PM']);
    expect(series.map((p) => p.cycleTimeSeconds)).toEqual([30, 29, 29, 31, 35, 38, 29]);
  });

  it('returns a fresh series each call', () => {
    const source = new IllustrativeTrendSource();
    const first = source.cycleTimeSeries(42);
    first[0].cycleTimeSeconds = 999;
    expect(source.cycleTimeSeries(42)[0].cycleTimeSeconds).toBe(30);
  });

  it('accepts a custom history and live label', () => {
    const source = new IllustrativeTrendSource([{ hour: '06:00', cycleTimeSeconds: 20 }], '07:00');
    expect(source.cycleTimeSeries(21)).toEqual([
      { hour: '06:00', cycleTimeSeconds: 20 },
      { hour: '07:00', cycleTimeSeconds: 21 },
    ]);
  });

  it('rejects a non-positive live reading', () => {
    expect(() => new IllustrativeTrendSource().cycleTimeSeries(0)).toThrow(InvalidInputError);
  });
});
