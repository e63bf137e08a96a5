/**
 * Time Series Transforms
 *
 * Pure, synchronous transforms over named, time-indexed series:
 * n-period change, time-aware moving average and their composition.
 */

export {
  computeNdChange,
  computeNdChangeVectorized,
  computeNdChangeArray,
  compute1dChange,
  compute7dChange,
  compute30dChange,
} from './computeChange.js';

export { computeMovingAverage, computeMovingAverageHours } from './computeMovingAverage.js';

export { computeMovingAverageChange, computeTimeShiftedChange } from './computeMovingAverageChange.js';

export {
  createTimeSeries,
  renameSeries,
  attachIndex,
  assertSameIndex,
  toColumns,
  fromColumns,
  normalizeValue,
} from './helpers.js';

export {
  TimeSeriesError,
  InvalidParameterError,
  IndexMisalignmentError,
  UnsortedSeriesError,
} from './errors.js';

export type {
  TimeSeries,
  TimeSeriesPoint,
  SeriesColumns,
  MovingAverageOptions,
  MovingAverageChangeOptions,
} from './types.js';
