// Filename: config/configDerivatives.ts

import type { DerivativeSpec } from "../features/derivatives/types.js";
import { DAY_MS, HOUR_MS } from "../features/derivatives/naming.js";
import { InvalidParameterError } from "../features/timeseries/errors.js";

/**
 * Derivatives computed when a caller does not ask for specific ones:
 * 1/7/30-period change, 24h and 7-day moving averages, and the 1-period
 * change of the 24h moving average.
 */
export const DEFAULT_DERIVATIVES: readonly DerivativeSpec[] = [
  { kind: "change", periods: 1 },
  { kind: "change", periods: 7 },
  { kind: "change", periods: 30 },
  { kind: "moving_average", windowMs: 24 * HOUR_MS },
  { kind: "moving_average", windowMs: 7 * DAY_MS },
  { kind: "moving_average_change", windowMs: 24 * HOUR_MS, periods: 1 },
];

/**
 * Query-style derivative selection, as accepted by the HTTP handler.
 */
export interface DerivativeParams {
  /** Comma-separated change periods, e.g. "1,7" */
  change?: string;
  /** Comma-separated moving average windows in hours, e.g. "24,168" */
  ma?: string;
  /** Minimum observations per moving average window */
  minPeriods?: string;
  /** Period of the change applied to each moving average, e.g. "1" */
  maChange?: string;
}

function parseNumberList(parameter: string, raw: string): number[] {
  const values = raw
    .split(",")
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(part => {
      const value = Number(part);
      if (!Number.isFinite(value) || value <= 0) {
        throw new InvalidParameterError(parameter, part, `${parameter} values must be positive numbers, got '${part}'`);
      }
      return value;
    });
  // Repeats would produce identically named series
  return [...new Set(values)];
}

/**
 * Turns query parameters into specs. With no selection at all the defaults apply.
 *
 * @throws InvalidParameterError for non-numeric or non-positive values, or for
 * maChange / minPeriods given without ma
 */
export function derivativesFromParams(params: DerivativeParams): DerivativeSpec[] {
  const changes = params.change ? parseNumberList("change", params.change) : [];
  const windowsHours = params.ma ? parseNumberList("ma", params.ma) : [];
  const maChanges = params.maChange ? parseNumberList("maChange", params.maChange) : [];
  const minPeriods = params.minPeriods ? parseNumberList("minPeriods", params.minPeriods)[0] : undefined;

  if (windowsHours.length === 0) {
    if (maChanges.length > 0) {
      throw new InvalidParameterError("maChange", params.maChange, "maChange requires ma");
    }
    if (minPeriods !== undefined) {
      throw new InvalidParameterError("minPeriods", params.minPeriods, "minPeriods requires ma");
    }
  }

  if (changes.length === 0 && windowsHours.length === 0) {
    return [...DEFAULT_DERIVATIVES];
  }

  const specs: DerivativeSpec[] = changes.map(periods => ({ kind: "change", periods }));
  for (const hours of windowsHours) {
    const windowMs = hours * HOUR_MS;
    specs.push({ kind: "moving_average", windowMs, minPeriods });
    for (const periods of maChanges) {
      specs.push({ kind: "moving_average_change", windowMs, periods, minPeriods });
    }
  }
  return specs;
}
