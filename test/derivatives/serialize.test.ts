import { describe, it, expect } from 'vitest';
import { toCsv, toRows } from '../../features/derivatives/serialize.js';
import { createTimeSeries } from '../../features/timeseries/helpers.js';
import { IndexMisalignmentError, InvalidParameterError } from '../../features/timeseries/errors.js';
import { DAY_MS } from '../../features/derivatives/naming.js';

const T0 = Date.UTC(2024, 0, 1);

const price = createTimeSeries('price_usd', [
  { timestamp: T0, value: 10 },
  { timestamp: T0 + DAY_MS, value: 20 },
]);
const change = createTimeSeries('price_usd_change_1d', [
  { timestamp: T0, value: null },
  { timestamp: T0 + DAY_MS, value: 1 },
]);

describe('toRows', () => {
  it('should produce one row per timestamp with a column per series', () => {
    expect(toRows([price, change])).toEqual([
      { datetime: '2024-01-01T00:00:00.000Z', price_usd: 10, price_usd_change_1d: null },
      { datetime: '2024-01-02T00:00:00.000Z', price_usd: 20, price_usd_change_1d: 1 },
    ]);
  });

  it('should refuse series on different indexes', () => {
    const shifted = createTimeSeries('other', [
      { timestamp: T0 + DAY_MS, value: 1 },
      { timestamp: T0 + 2 * DAY_MS, value: 2 },
    ]);

    expect(() => toRows([price, shifted])).toThrow(IndexMisalignmentError);
  });

  it('should refuse two series with the same name', () => {
    expect(() => toRows([price, change, change])).toThrow(InvalidParameterError);
    expect(() => toRows([price, change, change])).toThrow("Column 'price_usd_change_1d' would appear more than once");
  });

  it('should refuse a series named like the datetime column', () => {
    const datetime = createTimeSeries('datetime', price.points);

    expect(() => toRows([price, datetime])).toThrow("Column 'datetime' would appear more than once");
  });

  it('should return no rows for no series', () => {
    expect(toRows([])).toEqual([]);
  });
});

describe('toCsv', () => {
  it('should write a header and leave absent values empty', () => {
    expect(toCsv(toRows([price, change]))).toBe(
      'datetime,price_usd,price_usd_change_1d\n' +
        '2024-01-01T00:00:00.000Z,10,\n' +
        '2024-01-02T00:00:00.000Z,20,1\n'
    );
  });

  it('should quote cells containing separators', () => {
    const rows = [{ datetime: '2024-01-01T00:00:00.000Z', note: 'a,"b"' }];

    expect(toCsv(rows)).toBe('datetime,note\n2024-01-01T00:00:00.000Z,"a,""b"""\n');
  });

  it('should return an empty string for no rows', () => {
    expect(toCsv([])).toBe('');
  });
});
