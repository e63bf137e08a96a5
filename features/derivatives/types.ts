/**
 * Type definitions for derivative metrics
 */

import type { TimeSeries } from '../timeseries/types.js';

export interface ChangeSpec {
  kind: 'change';
  /** Observations to look back */
  periods: number;
}

export interface MovingAverageSpec {
  kind: 'moving_average';
  windowMs: number;
  minPeriods?: number;
}

export interface MovingAverageChangeSpec {
  kind: 'moving_average_change';
  windowMs: number;
  /** Observations of the moving average to look back */
  periods: number;
  minPeriods?: number;
}

export interface TimeShiftedChangeSpec {
  kind: 'time_shifted_change';
  /** Compare against the value exactly this many ms earlier */
  shiftMs: number;
}

/** One transform to apply to a base metric series. */
export type DerivativeSpec =
  | ChangeSpec
  | MovingAverageSpec
  | MovingAverageChangeSpec
  | TimeShiftedChangeSpec;

export type DerivativeKind = DerivativeSpec['kind'];

/** A derived series together with the spec that produced it. */
export interface DerivedSeries {
  spec: DerivativeSpec;
  series: TimeSeries;
}

/** One tabular row: ISO datetime plus one column per series. */
export type SeriesRow = { datetime: string } & Record<string, number | null | string>;
