/**
 * Tabular output for a base series and its derivatives.
 */

import type { TimeSeries } from '../timeseries/types.js';
import { assertSameIndex } from '../timeseries/helpers.js';
import { InvalidParameterError } from '../timeseries/errors.js';
import type { SeriesRow } from './types.js';

/**
 * One row per timestamp, one column per series.
 *
 * @throws IndexMisalignmentError if any series does not share the first one's index
 * @throws InvalidParameterError if two series share a name (or use 'datetime')
 */
export function toRows(series: readonly TimeSeries[]): SeriesRow[] {
  if (series.length === 0) {
    return [];
  }
  const columns = new Set<string>(['datetime']);
  for (const s of series) {
    if (columns.has(s.name)) {
      throw new InvalidParameterError('series', s.name, `Column '${s.name}' would appear more than once`);
    }
    columns.add(s.name);
  }
  const [first, ...rest] = series;
  for (const other of rest) {
    assertSameIndex(first, other);
  }

  return first.points.map((point, i) => {
    const row: SeriesRow = { datetime: new Date(point.timestamp).toISOString() };
    for (const s of series) {
      row[s.name] = s.points[i].value;
    }
    return row;
  });
}

function csvCell(value: number | null | string): string {
  if (value === null) {
    return '';
  }
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Renders rows as CSV with a header line. Absent values are empty cells.
 */
export function toCsv(rows: readonly SeriesRow[]): string {
  if (rows.length === 0) {
    return '';
  }
  const columns = Object.keys(rows[0]);
  const lines = [columns.map(csvCell).join(',')];
  for (const row of rows) {
    lines.push(columns.map(column => csvCell(row[column] ?? null)).join(','));
  }
  return lines.join('\n') + '\n';
}
