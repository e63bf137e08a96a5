/**
 * Derivative Metrics
 *
 * Named series computed from a base metric: changes, moving averages and
 * their composition, plus tabular output.
 */

export { computeDerivative, buildDerivativeSeries, validateDerivativeSpec } from './buildDerivatives.js';

export {
  parseInterval,
  formatDuration,
  formatHours,
  derivativeSuffix,
  derivativeName,
  MINUTE_MS,
  HOUR_MS,
  DAY_MS,
  WEEK_MS,
} from './naming.js';

export { toRows, toCsv } from './serialize.js';

export type {
  DerivativeSpec,
  DerivativeKind,
  ChangeSpec,
  MovingAverageSpec,
  MovingAverageChangeSpec,
  TimeShiftedChangeSpec,
  DerivedSeries,
  SeriesRow,
} from './types.js';
