import type { TrendPoint } from './types';
import { parseOrThrow, positiveNumber } from './validation';

/**
 * Hourly cycle-time series for the trend chart. A real feed (historian, MES export)
 * would implement the same interface.
 */
export interface TrendSource {
  cycleTimeSeries(liveCycleTimeSeconds: number): TrendPoint[];
}

const ILLUSTRATIVE_SHIFT: readonly TrendPoint[] = [
  { hour: '9AM', cycleTimeSeconds: 30 },
  { hour: '10AM', cycleTimeSeconds: 29 },
  { hour: '11AM', cycleTimeSeconds: 29 },
  { hour: '12PM', cycleTimeSeconds: 31 },
  { hour: '2PM', cycleTimeSeconds: 35 },
  { hour: '3PM', cycleTimeSeconds: 38 },
];

/** Stub source: a fixed afternoon-fatigue shape, with the live reading as the last hour. */
export class IllustrativeTrendSource implements TrendSource {
  constructor(
    private readonly history: readonly TrendPoint[] = ILLUSTRATIVE_SHIFT,
    private readonly liveHour = '4PM'
  ) {}

  cycleTimeSeries(liveCycleTimeSeconds: number): TrendPoint[] {
    const live = parseOrThrow(positiveNumber, liveCycleTimeSeconds, 'trend.liveCycleTimeSeconds');
    return [...this.history.map((p) => ({ ...p })), { hour: this.liveHour, cycleTimeSeconds: live }];
  }
}
