/**
 * Time-aware moving average.
 *
 * The window for a point at `t` is the half-open interval `(t - windowMs, t]`,
 * measured in real time rather than rows, so unevenly spaced data averages
 * over the same span everywhere. Absent values are skipped, not counted as
 * zero. A single left/right pointer pass keeps this O(n).
 *
 * The running sum is compensated (Neumaier), so a large value leaving the
 * window does not take the small values that entered beside it along.
 */

import type { MovingAverageOptions, TimeSeries } from './types.js';
import { assertPositiveDuration, assertPositiveInteger, createTimeSeries } from './helpers.js';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Running sum with a compensation term for the low-order bits lost on each
 * addition. Removal is addition of the negated value.
 */
class CompensatedSum {
  private sum = 0;
  private compensation = 0;

  add(value: number): void {
    const next = this.sum + value;
    if (Math.abs(this.sum) >= Math.abs(value)) {
      this.compensation += (this.sum - next) + value;
    } else {
      this.compensation += (value - next) + this.sum;
    }
    this.sum = next;
  }

  reset(): void {
    this.sum = 0;
    this.compensation = 0;
  }

  get total(): number {
    return this.sum + this.compensation;
  }
}

/**
 * @throws InvalidParameterError if windowMs is not a positive duration or
 * minPeriods is not a positive integer
 */
export function computeMovingAverage(
  series: TimeSeries,
  options: MovingAverageOptions
): TimeSeries {
  const { windowMs, minPeriods = 1 } = options;
  assertPositiveDuration('windowMs', windowMs);
  assertPositiveInteger('minPeriods', minPeriods);

  const { points } = series;
  const averaged: { timestamp: number; value: number | null }[] = [];

  let left = 0;
  const sum = new CompensatedSum();
  let count = 0;

  for (let right = 0; right < points.length; right++) {
    const { timestamp, value } = points[right];
    if (value !== null) {
      sum.add(value);
      count++;
    }

    // Drop everything at or before the open left edge
    const edge = timestamp - windowMs;
    while (points[left].timestamp <= edge) {
      const dropped = points[left].value;
      if (dropped !== null) {
        sum.add(-dropped);
        count--;
      }
      left++;
    }
    if (count === 0) {
      sum.reset();
    }

    averaged.push({
      timestamp,
      value: count >= minPeriods ? sum.total / count : null,
    });
  }

  return createTimeSeries(series.name, averaged);
}

/**
 * Moving average with the window given in hours.
 *
 * @example
 * computeMovingAverageHours(hourly, 24)   // 24h moving average
 * computeMovingAverageHours(hourly, 168)  // 7 day moving average
 */
export function computeMovingAverageHours(
  series: TimeSeries,
  hours: number,
  minPeriods: number = 1
): TimeSeries {
  return computeMovingAverage(series, { windowMs: hours * HOUR_MS, minPeriods });
}
