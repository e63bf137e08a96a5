import { describe, it, expect } from 'vitest';
import {
  DAY_MS,
  HOUR_MS,
  MINUTE_MS,
  WEEK_MS,
  derivativeName,
  derivativeSuffix,
  formatDuration,
  formatHours,
  parseInterval,
} from '../../features/derivatives/naming.js';
import { InvalidParameterError } from '../../features/timeseries/errors.js';

describe('parseInterval', () => {
  it('should parse minute, hour, day and week intervals', () => {
    expect(parseInterval('5m')).toBe(5 * MINUTE_MS);
    expect(parseInterval('1h')).toBe(HOUR_MS);
    expect(parseInterval('1d')).toBe(DAY_MS);
    expect(parseInterval('2w')).toBe(2 * WEEK_MS);
    expect(parseInterval(' 6h ')).toBe(6 * HOUR_MS);
  });

  it('should reject unknown units and zero', () => {
    expect(() => parseInterval('1y')).toThrow(InvalidParameterError);
    expect(() => parseInterval('abc')).toThrow("Unsupported interval 'abc'");
    expect(() => parseInterval('0d')).toThrow(InvalidParameterError);
    expect(() => parseInterval('')).toThrow(InvalidParameterError);
  });
});

describe('formatDuration', () => {
  it('should use the largest unit that divides evenly', () => {
    expect(formatDuration(7 * DAY_MS)).toBe('7d');
    expect(formatDuration(36 * HOUR_MS)).toBe('36h');
    expect(formatDuration(90 * MINUTE_MS)).toBe('90m');
    expect(formatDuration(90_000)).toBe('90000ms');
  });
});

describe('formatHours', () => {
  it('should label whole hours in hours', () => {
    expect(formatHours(24 * HOUR_MS)).toBe('24h');
    expect(formatHours(7 * DAY_MS)).toBe('168h');
    expect(formatHours(30 * MINUTE_MS)).toBe('30m');
  });
});

describe('derivativeSuffix', () => {
  it('should label changes by the span they cover', () => {
    expect(derivativeSuffix({ kind: 'change', periods: 1 }, DAY_MS)).toBe('_change_1d');
    expect(derivativeSuffix({ kind: 'change', periods: 7 }, DAY_MS)).toBe('_change_7d');
    expect(derivativeSuffix({ kind: 'change', periods: 24 }, HOUR_MS)).toBe('_change_1d');
    expect(derivativeSuffix({ kind: 'change', periods: 3 }, 5 * MINUTE_MS)).toBe('_change_15m');
  });

  it('should label changes in observations when the interval is unknown', () => {
    expect(derivativeSuffix({ kind: 'change', periods: 3 })).toBe('_change_3p');
  });

  it('should label moving averages by their window in hours', () => {
    expect(derivativeSuffix({ kind: 'moving_average', windowMs: 24 * HOUR_MS })).toBe('_24h_moving_average');
    expect(derivativeSuffix({ kind: 'moving_average', windowMs: WEEK_MS })).toBe('_168h_moving_average');
  });

  it('should combine window and period for a moving average change', () => {
    const spec = { kind: 'moving_average_change', windowMs: 24 * HOUR_MS, periods: 1 } as const;

    expect(derivativeSuffix(spec, DAY_MS)).toBe('_24h_moving_average_change_1d');
  });

  it('should label time-shifted changes by the shift', () => {
    expect(derivativeSuffix({ kind: 'time_shifted_change', shiftMs: 24 * HOUR_MS })).toBe('_change_24h_shift');
  });
});

describe('derivativeName', () => {
  it('should append the suffix to the base metric', () => {
    expect(derivativeName('price_usd', { kind: 'change', periods: 1 }, DAY_MS)).toBe('price_usd_change_1d');
    expect(derivativeName('daily_active_addresses', { kind: 'moving_average', windowMs: 24 * HOUR_MS })).toBe(
      'daily_active_addresses_24h_moving_average'
    );
  });
});
