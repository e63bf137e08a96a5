/**
 * Helper functions shared by the time series transforms: construction,
 * parameter validation, index alignment and the change arithmetic itself.
 */

import type { SeriesColumns, TimeSeries, TimeSeriesPoint } from './types.js';
import { IndexMisalignmentError, InvalidParameterError, UnsortedSeriesError } from './errors.js';

/**
 * Maps anything that is not a finite number to `null`.
 */
export function normalizeValue(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Builds a frozen series from raw points.
 *
 * @throws UnsortedSeriesError if timestamps are not strictly ascending
 */
export function createTimeSeries(
  name: string,
  points: ReadonlyArray<{ timestamp: number; value: number | null | undefined }>
): TimeSeries {
  const normalized: TimeSeriesPoint[] = [];

  for (let i = 0; i < points.length; i++) {
    const { timestamp, value } = points[i];
    if (!Number.isFinite(timestamp)) {
      throw new UnsortedSeriesError(i, `Timestamp at position ${i} is not a finite number`);
    }
    if (i > 0 && timestamp <= points[i - 1].timestamp) {
      throw new UnsortedSeriesError(
        i,
        `Timestamps must be strictly ascending: position ${i} (${timestamp}) follows ${points[i - 1].timestamp}`
      );
    }
    normalized.push(Object.freeze({ timestamp, value: normalizeValue(value) }));
  }

  return Object.freeze({ name, points: Object.freeze(normalized) });
}

/**
 * Returns a copy of `series` under a new name.
 */
export function renameSeries(series: TimeSeries, name: string): TimeSeries {
  return Object.freeze({ name, points: series.points });
}

export function assertPositiveInteger(parameter: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidParameterError(
      parameter,
      value,
      `${parameter} must be a positive integer, got ${value}`
    );
  }
}

export function assertPositiveDuration(parameter: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError(
      parameter,
      value,
      `${parameter} must be a positive duration in milliseconds, got ${value}`
    );
  }
}

/**
 * Relative change from `prior` to `current`.
 * Absent when either operand is absent or `prior` is zero.
 */
export function relativeChange(current: number | null, prior: number | null): number | null {
  if (current === null || prior === null || prior === 0) {
    return null;
  }
  return (current - prior) / prior;
}

export function toColumns(series: TimeSeries): SeriesColumns {
  return {
    index: series.points.map(p => p.timestamp),
    values: series.points.map(p => p.value),
  };
}

export function fromColumns(name: string, columns: SeriesColumns): TimeSeries {
  if (columns.index.length !== columns.values.length) {
    throw new IndexMisalignmentError(
      `Index has ${columns.index.length} entries but values have ${columns.values.length}`
    );
  }
  return createTimeSeries(
    name,
    columns.index.map((timestamp, i) => ({ timestamp, value: columns.values[i] }))
  );
}

/**
 * Re-attaches a timestamp index to an unlabeled buffer, positionally.
 * `NaN` entries become absent values.
 *
 * @throws IndexMisalignmentError if the lengths differ
 */
export function attachIndex(
  name: string,
  timestamps: readonly number[],
  values: ArrayLike<number>
): TimeSeries {
  if (timestamps.length !== values.length) {
    throw new IndexMisalignmentError(
      `Cannot attach an index of ${timestamps.length} timestamps to ${values.length} values`
    );
  }
  return createTimeSeries(
    name,
    timestamps.map((timestamp, i) => ({ timestamp, value: values[i] }))
  );
}

/**
 * @throws IndexMisalignmentError unless both series have identical timestamps
 */
export function assertSameIndex(a: TimeSeries, b: TimeSeries): void {
  if (a.points.length !== b.points.length) {
    throw new IndexMisalignmentError(
      `Series '${a.name}' has ${a.points.length} points but '${b.name}' has ${b.points.length}`
    );
  }
  for (let i = 0; i < a.points.length; i++) {
    if (a.points[i].timestamp !== b.points[i].timestamp) {
      throw new IndexMisalignmentError(
        `Series '${a.name}' and '${b.name}' differ at position ${i}: ${a.points[i].timestamp} vs ${b.points[i].timestamp}`
      );
    }
  }
}
