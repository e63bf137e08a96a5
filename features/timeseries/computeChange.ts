/**
 * N-PERIOD PERCENTAGE CHANGE
 *
 * change[i] = (v[i] - v[i - n]) / v[i - n]
 *
 * Three strategies with identical output:
 * - computeNdChange:           reference, walks positions in order
 * - computeNdChangeVectorized: columnar, combines values with a shifted copy
 * - computeNdChangeArray:      raw Float64Array, no index carried (NaN = absent)
 *
 * A position is absent (null / NaN) when it has fewer than n predecessors,
 * when either operand is absent, or when the prior value is zero. Division by
 * zero never produces Infinity and never throws.
 */

import type { TimeSeries } from './types.js';
import {
  assertPositiveInteger,
  createTimeSeries,
  fromColumns,
  relativeChange,
  toColumns,
} from './helpers.js';

/**
 * Reference implementation.
 *
 * @param series - Sorted series
 * @param periods - Observations to look back (positive integer)
 * @throws InvalidParameterError if periods is not a positive integer
 *
 * @example
 * computeNdChange(series, 1) // [null, 0.1, -0.1, 0.0909…] for values [100, 110, 99, 108]
 */
export function computeNdChange(series: TimeSeries, periods: number = 1): TimeSeries {
  assertPositiveInteger('periods', periods);

  const { points } = series;
  const result = points.map((point, i) => ({
    timestamp: point.timestamp,
    value: i < periods ? null : relativeChange(point.value, points[i - periods].value),
  }));

  return createTimeSeries(series.name, result);
}

/**
 * Shifts a column forward by `periods`, filling the head with absent values.
 */
function shiftColumn(values: readonly (number | null)[], periods: number): (number | null)[] {
  const shifted = new Array<number | null>(values.length).fill(null);
  for (let i = periods; i < values.length; i++) {
    shifted[i] = values[i - periods];
  }
  return shifted;
}

/**
 * Columnar implementation. Keeps the original index so results line up with
 * the input timestamps.
 */
export function computeNdChangeVectorized(series: TimeSeries, periods: number = 1): TimeSeries {
  assertPositiveInteger('periods', periods);

  const { index, values } = toColumns(series);
  const prior = shiftColumn(values, periods);
  const changes = values.map((value, i) => relativeChange(value, prior[i]));

  return fromColumns(series.name, { index, values: changes });
}

/**
 * Buffer implementation for throughput. Input and output use `NaN` for absent.
 * Output order mirrors input order exactly; re-attach timestamps with
 * `attachIndex`.
 */
export function computeNdChangeArray(
  values: Float64Array | readonly number[],
  periods: number = 1
): Float64Array {
  assertPositiveInteger('periods', periods);

  const length = values.length;
  const result = new Float64Array(length).fill(NaN);
  if (periods >= length) {
    return result;
  }

  for (let i = periods; i < length; i++) {
    const current = values[i];
    const prior = values[i - periods];
    // Non-finite operands leave the NaN fill in place
    if (Number.isFinite(current) && Number.isFinite(prior) && prior !== 0) {
      result[i] = (current - prior) / prior;
    }
  }

  return result;
}

/** 1-period change. */
export function compute1dChange(series: TimeSeries): TimeSeries {
  return computeNdChangeVectorized(series, 1);
}

/** 7-period change. */
export function compute7dChange(series: TimeSeries): TimeSeries {
  return computeNdChangeVectorized(series, 7);
}

/** 30-period change. */
export function compute30dChange(series: TimeSeries): TimeSeries {
  return computeNdChangeVectorized(series, 30);
}
