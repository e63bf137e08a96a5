import { describe, it, expect } from 'vitest';
import { DEFAULT_DERIVATIVES, derivativesFromParams } from '../../config/configDerivatives.js';
import { HOUR_MS } from '../../features/derivatives/naming.js';
import { InvalidParameterError } from '../../features/timeseries/errors.js';

describe('derivativesFromParams', () => {
  it('should fall back to the defaults when nothing is selected', () => {
    const specs = derivativesFromParams({});

    expect(specs).toEqual(DEFAULT_DERIVATIVES);
    expect(specs).not.toBe(DEFAULT_DERIVATIVES);
    expect(specs).toHaveLength(6);
  });

  it('should build change specs from a comma list', () => {
    expect(derivativesFromParams({ change: '1, 7' })).toEqual([
      { kind: 'change', periods: 1 },
      { kind: 'change', periods: 7 },
    ]);
  });

  it('should add a moving average change per window and period', () => {
    expect(derivativesFromParams({ ma: '24', maChange: '1', minPeriods: '2' })).toEqual([
      { kind: 'moving_average', windowMs: 24 * HOUR_MS, minPeriods: 2 },
      { kind: 'moving_average_change', windowMs: 24 * HOUR_MS, periods: 1, minPeriods: 2 },
    ]);
  });

  it('should reject maChange without a moving average window', () => {
    expect(() => derivativesFromParams({ change: '1', maChange: '1' })).toThrow(InvalidParameterError);
    expect(() => derivativesFromParams({ change: '1', maChange: '1' })).toThrow('maChange requires ma');
  });

  it('should reject minPeriods without a moving average window', () => {
    expect(() => derivativesFromParams({ change: '1', minPeriods: '3' })).toThrow('minPeriods requires ma');
  });

  it('should drop repeated values and keep the first-seen order', () => {
    expect(derivativesFromParams({ change: '7,1,7,1' })).toEqual([
      { kind: 'change', periods: 7 },
      { kind: 'change', periods: 1 },
    ]);
    expect(derivativesFromParams({ ma: '24,24', maChange: '1,1' })).toEqual([
      { kind: 'moving_average', windowMs: 24 * HOUR_MS, minPeriods: undefined },
      { kind: 'moving_average_change', windowMs: 24 * HOUR_MS, periods: 1, minPeriods: undefined },
    ]);
  });

  it('should reject non-numeric and non-positive values', () => {
    expect(() => derivativesFromParams({ change: 'abc' })).toThrow(InvalidParameterError);
    expect(() => derivativesFromParams({ ma: '0' })).toThrow("ma values must be positive numbers, got '0'");
  });
});
