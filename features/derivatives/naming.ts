/**
 * Naming convention for derived metrics and interval parsing.
 *
 *   price_usd + change(1) @ 1d             -> price_usd_change_1d
 *   price_usd + moving_average(24h)        -> price_usd_24h_moving_average
 *   price_usd + moving_average_change(24h, 1) @ 1d
 *                                          -> price_usd_24h_moving_average_change_1d
 *   price_usd + time_shifted_change(24h)   -> price_usd_change_24h_shift
 */

import type { DerivativeSpec } from './types.js';
import { InvalidParameterError } from '../timeseries/errors.js';

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;
export const WEEK_MS = 7 * DAY_MS;

const INTERVAL_UNITS: Record<string, number> = {
  m: MINUTE_MS,
  h: HOUR_MS,
  d: DAY_MS,
  w: WEEK_MS,
};

/**
 * Parses an upstream interval string such as '5m', '1h', '1d' or '1w'.
 *
 * @throws InvalidParameterError for anything else
 */
export function parseInterval(interval: string): number {
  const match = /^(\d+)([mhdw])$/.exec(interval.trim());
  if (!match) {
    throw new InvalidParameterError('interval', interval, `Unsupported interval '${interval}'`);
  }
  const amount = parseInt(match[1], 10);
  if (amount <= 0) {
    throw new InvalidParameterError('interval', interval, `Interval must be positive, got '${interval}'`);
  }
  return amount * INTERVAL_UNITS[match[2]];
}

/**
 * Renders a duration using the largest unit that divides it evenly.
 */
export function formatDuration(ms: number): string {
  if (ms % DAY_MS === 0) return `${ms / DAY_MS}d`;
  if (ms % HOUR_MS === 0) return `${ms / HOUR_MS}h`;
  if (ms % MINUTE_MS === 0) return `${ms / MINUTE_MS}m`;
  return `${ms}ms`;
}

/**
 * Renders a duration in hours when it is a whole number of hours
 * (moving averages are conventionally labelled 24h, 168h).
 */
export function formatHours(ms: number): string {
  return ms % HOUR_MS === 0 ? `${ms / HOUR_MS}h` : formatDuration(ms);
}

function periodLabel(periods: number, intervalMs?: number): string {
  return intervalMs === undefined ? `${periods}p` : formatDuration(periods * intervalMs);
}

/**
 * Suffix appended to the base metric name for a derivative.
 *
 * @param intervalMs - Spacing of the base series; when unknown, period-based
 * changes are labelled in observations (`_change_3p`)
 */
export function derivativeSuffix(spec: DerivativeSpec, intervalMs?: number): string {
  switch (spec.kind) {
    case 'change':
      return `_change_${periodLabel(spec.periods, intervalMs)}`;
    case 'moving_average':
      return `_${formatHours(spec.windowMs)}_moving_average`;
    case 'moving_average_change':
      return `_${formatHours(spec.windowMs)}_moving_average_change_${periodLabel(spec.periods, intervalMs)}`;
    case 'time_shifted_change':
      return `_change_${formatHours(spec.shiftMs)}_shift`;
  }
}

export function derivativeName(baseName: string, spec: DerivativeSpec, intervalMs?: number): string {
  return `${baseName}${derivativeSuffix(spec, intervalMs)}`;
}
