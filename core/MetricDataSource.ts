// Filename: core/MetricDataSource.ts

import { createTimeSeries } from '../features/timeseries/helpers.js';
import { InvalidParameterError } from '../features/timeseries/errors.js';
import type { TimeSeries, TimeSeriesPoint } from '../features/timeseries/types.js';
import { DAY_MS } from '../features/derivatives/naming.js';
import { GraphqlRequestError } from '../utils/graphqlClient.js';
import { HttpError } from '../utils/httpClient.js';
import { log, TMI } from '../utils/log.js';

const LOG_EMOJI = '📡';

/** What went wrong while fetching a metric. */
export type MetricFetchErrorKind = 'NotFound' | 'RateLimited' | 'AuthRequired' | 'Transport';

export class MetricFetchError extends Error {
  constructor(
    public kind: MetricFetchErrorKind,
    message: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'MetricFetchError';
  }
}

/** Parameters identifying one upstream metric series. */
export interface MetricRequest {
  /** Metric name, e.g. 'price_usd' or 'daily_active_addresses' */
  metric: string;
  /** Project slug, e.g. 'santiment' */
  slug: string;
  /** Range start, ISO 8601 */
  from: string;
  /** Range end, ISO 8601 */
  to: string;
  /** Sampling interval, e.g. '1d' or '1h' */
  interval: string;
}

/**
 * Source of raw metric series. Implementations throw MetricFetchError.
 */
export interface MetricDataSource {
  /** Fetches one series, sorted ascending and named after the metric. */
  fetchMetric(request: MetricRequest): Promise<TimeSeries>;
  /** Lists every known project slug. */
  listProjectSlugs(): Promise<string[]>;
}

const NOT_FOUND_PATTERN = /not found|does not exist|not exist|not implemented|unknown metric|not supported/i;
const AUTH_PATTERN = /api ?key|unauthori[sz]ed|forbidden|restricted|subscription|log ?in/i;
const RATE_LIMIT_PATTERN = /rate limit|too many requests/i;

/**
 * Maps any failure from the client stack to a MetricFetchError.
 */
export function classifyFetchError(error: unknown, context: string): MetricFetchError {
  if (error instanceof MetricFetchError) {
    return error;
  }

  if (error instanceof HttpError) {
    if (error.status === 429) {
      return new MetricFetchError('RateLimited', `${context}: rate limited (429)`, error);
    }
    if (error.status === 401 || error.status === 403) {
      return new MetricFetchError('AuthRequired', `${context}: authorization required (${error.status})`, error);
    }
    if (error.status === 404) {
      return new MetricFetchError('NotFound', `${context}: not found (404)`, error);
    }
    return new MetricFetchError('Transport', `${context}: ${error.message}`, error);
  }

  if (error instanceof GraphqlRequestError) {
    if (RATE_LIMIT_PATTERN.test(error.message)) {
      return new MetricFetchError('RateLimited', `${context}: ${error.message}`, error);
    }
    if (AUTH_PATTERN.test(error.message)) {
      return new MetricFetchError('AuthRequired', `${context}: ${error.message}`, error);
    }
    if (NOT_FOUND_PATTERN.test(error.message)) {
      return new MetricFetchError('NotFound', `${context}: ${error.message}`, error);
    }
    return new MetricFetchError('Transport', `${context}: ${error.message}`, error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new MetricFetchError('Transport', `${context}: ${message}`, error);
}

/**
 * Sorts points by timestamp and keeps the first point seen for each timestamp.
 */
export function mergePoints(name: string, points: readonly TimeSeriesPoint[]): TimeSeries {
  const sorted = points
    .map((point, order) => ({ point, order }))
    .sort((a, b) => a.point.timestamp - b.point.timestamp || a.order - b.order);

  const unique: TimeSeriesPoint[] = [];
  for (const { point } of sorted) {
    if (unique.length === 0 || unique[unique.length - 1].timestamp !== point.timestamp) {
      unique.push(point);
    }
  }
  return createTimeSeries(name, unique);
}

export interface DateWindow {
  from: string;
  to: string;
}

function parseDate(parameter: string, value: string): number {
  const ms = Date.parse(value);
  if (isNaN(ms)) {
    throw new InvalidParameterError(parameter, value, `${parameter} is not a valid date: '${value}'`);
  }
  return ms;
}

/**
 * Splits [from, to] into consecutive windows of at most `batchDays` days.
 * Adjacent windows share their boundary instant.
 *
 * @throws InvalidParameterError for unparsable dates, from > to or a bad batch size
 */
export function splitDateRange(from: string, to: string, batchDays: number): DateWindow[] {
  const start = parseDate('from', from);
  const end = parseDate('to', to);
  if (start > end) {
    throw new InvalidParameterError('from', from, `from (${from}) is after to (${to})`);
  }
  if (!Number.isInteger(batchDays) || batchDays <= 0) {
    throw new InvalidParameterError('batchDays', batchDays, `batchDays must be a positive integer, got ${batchDays}`);
  }

  const step = batchDays * DAY_MS;
  const windows: DateWindow[] = [];
  let cursor = start;
  do {
    const windowEnd = Math.min(cursor + step, end);
    windows.push({ from: new Date(cursor).toISOString(), to: new Date(windowEnd).toISOString() });
    cursor = windowEnd;
  } while (cursor < end);

  return windows;
}

/**
 * Fetches a long range as a sequence of smaller requests and merges the results.
 * Requests run one after another.
 */
export async function fetchMetricInBatches(
  source: MetricDataSource,
  request: MetricRequest,
  batchDays: number
): Promise<TimeSeries> {
  const windows = splitDateRange(request.from, request.to, batchDays);
  const collected: TimeSeriesPoint[] = [];

  for (let i = 0; i < windows.length; i++) {
    const window = windows[i];
    log(
      `${LOG_EMOJI} Batch ${i + 1}/${windows.length}: ${request.metric}/${request.slug} ${window.from} → ${window.to}`,
      TMI
    );
    const batch = await source.fetchMetric({ ...request, from: window.from, to: window.to });
    collected.push(...batch.points);
  }

  return mergePoints(request.metric, collected);
}
