/**
 * Changes computed on top of other derived series.
 */

import type { MovingAverageChangeOptions, TimeSeries } from './types.js';
import { computeMovingAverage } from './computeMovingAverage.js';
import { computeNdChange } from './computeChange.js';
import { assertPositiveDuration, assertPositiveInteger, createTimeSeries, relativeChange } from './helpers.js';

/**
 * Percentage change of a moving average.
 *
 * The change is taken over the moving average's own points: this is exactly
 * `computeNdChange(computeMovingAverage(series, …), periods)`.
 *
 * @example
 * // 24h moving average, then the change against the previous observation
 * computeMovingAverageChange(hourly, { windowMs: 24 * HOUR, periods: 1 })
 */
export function computeMovingAverageChange(
  series: TimeSeries,
  options: MovingAverageChangeOptions
): TimeSeries {
  const { windowMs, minPeriods, periods } = options;
  // Validate everything before computing anything
  assertPositiveDuration('windowMs', windowMs);
  assertPositiveInteger('periods', periods);

  const movingAverage = computeMovingAverage(series, { windowMs, minPeriods });
  return computeNdChange(movingAverage, periods);
}

/**
 * Change against the value exactly `shiftMs` earlier, looked up by timestamp
 * instead of by position. Suited to irregular series where "n rows back" does
 * not mean a fixed span. Absent when no point sits at `t - shiftMs`.
 */
export function computeTimeShiftedChange(series: TimeSeries, shiftMs: number): TimeSeries {
  assertPositiveDuration('shiftMs', shiftMs);

  const { points } = series;
  const result: { timestamp: number; value: number | null }[] = [];

  // Timestamps ascend, so the lookup pointer only moves forward
  let cursor = 0;
  for (const point of points) {
    const target = point.timestamp - shiftMs;
    while (cursor < points.length && points[cursor].timestamp < target) {
      cursor++;
    }
    const prior = cursor < points.length && points[cursor].timestamp === target
      ? points[cursor].value
      : null;
    result.push({ timestamp: point.timestamp, value: relativeChange(point.value, prior) });
  }

  return createTimeSeries(series.name, result);
}
