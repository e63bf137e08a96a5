/**
 * Type definitions for time series transforms
 */

/** A single observation. `value === null` marks an absent value. */
export interface TimeSeriesPoint {
  /** Epoch milliseconds, UTC */
  timestamp: number;
  /** Observed value, or null when missing */
  value: number | null;
}

/**
 * Named, time-indexed series. Points are sorted ascending by timestamp with no
 * duplicates; instances are frozen and never mutated by the transforms.
 */
export interface TimeSeries {
  name: string;
  points: readonly TimeSeriesPoint[];
}

/** Columnar view of a series used by the vectorized strategy. */
export interface SeriesColumns {
  index: readonly number[];
  values: readonly (number | null)[];
}

export interface MovingAverageOptions {
  /** Window length in milliseconds; the window for `t` is `(t - windowMs, t]` */
  windowMs: number;
  /** Minimum present observations required in a window (default 1) */
  minPeriods?: number;
}

export interface MovingAverageChangeOptions extends MovingAverageOptions {
  /** Number of observations of the moving average to look back */
  periods: number;
}
