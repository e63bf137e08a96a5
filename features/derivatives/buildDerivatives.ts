/**
 * Applies derivative specs to a base series and names the results.
 */

import type { TimeSeries } from '../timeseries/types.js';
import type { DerivativeSpec, DerivedSeries } from './types.js';
import {
  computeMovingAverage,
  computeMovingAverageChange,
  computeNdChangeVectorized,
  computeTimeShiftedChange,
  renameSeries,
} from '../timeseries/index.js';
import { assertPositiveDuration, assertPositiveInteger } from '../timeseries/helpers.js';
import { derivativeName } from './naming.js';
import { InvalidParameterError } from '../timeseries/errors.js';
import { log, TMI } from '../../utils/log.js';

const LOG_EMOJI = '🧮';

/**
 * Computes one derivative of `base`. The result keeps the base index.
 */
export function computeDerivative(base: TimeSeries, spec: DerivativeSpec): TimeSeries {
  switch (spec.kind) {
    case 'change':
      return computeNdChangeVectorized(base, spec.periods);
    case 'moving_average':
      return computeMovingAverage(base, { windowMs: spec.windowMs, minPeriods: spec.minPeriods });
    case 'moving_average_change':
      return computeMovingAverageChange(base, {
        windowMs: spec.windowMs,
        periods: spec.periods,
        minPeriods: spec.minPeriods,
      });
    case 'time_shifted_change':
      return computeTimeShiftedChange(base, spec.shiftMs);
  }
}

/**
 * Checks a spec's parameters without computing anything.
 *
 * @throws InvalidParameterError
 */
export function validateDerivativeSpec(spec: DerivativeSpec): void {
  switch (spec.kind) {
    case 'change':
      assertPositiveInteger('periods', spec.periods);
      return;
    case 'moving_average':
      assertPositiveDuration('windowMs', spec.windowMs);
      assertPositiveInteger('minPeriods', spec.minPeriods ?? 1);
      return;
    case 'moving_average_change':
      assertPositiveDuration('windowMs', spec.windowMs);
      assertPositiveInteger('periods', spec.periods);
      assertPositiveInteger('minPeriods', spec.minPeriods ?? 1);
      return;
    case 'time_shifted_change':
      assertPositiveDuration('shiftMs', spec.shiftMs);
      return;
  }
}

/**
 * Computes every spec against `base`.
 *
 * @param intervalMs - Spacing of `base`, used only for naming
 * @throws InvalidParameterError from the first spec with bad parameters, or
 * when two specs (or a spec and the base) would share a name
 */
export function buildDerivativeSeries(
  base: TimeSeries,
  specs: readonly DerivativeSpec[],
  intervalMs?: number
): DerivedSeries[] {
  const names = new Set<string>([base.name]);
  for (const spec of specs) {
    const name = derivativeName(base.name, spec, intervalMs);
    if (names.has(name)) {
      throw new InvalidParameterError('specs', name, `Derived series name '${name}' is requested more than once`);
    }
    names.add(name);
  }

  return specs.map(spec => {
    const name = derivativeName(base.name, spec, intervalMs);
    log(`${LOG_EMOJI} Derivatives: ${name} from ${base.points.length} points`, TMI);
    return { spec, series: renameSeries(computeDerivative(base, spec), name) };
  });
}
