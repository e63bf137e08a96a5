// Filename: utils/apiErrors.ts

import { MetricFetchError, type MetricFetchErrorKind } from '../core/MetricDataSource.js';
import { TimeSeriesError } from '../features/timeseries/errors.js';
import { HttpError } from './httpClient.js';
import { log, ERR, WARN } from './log.js';

const STATUS_BY_KIND: Record<MetricFetchErrorKind, number> = {
  NotFound: 404,
  RateLimited: 429,
  AuthRequired: 401,
  Transport: 502,
};

/** The part of a serverless response object the error handler writes to. */
export interface JsonResponder {
  status: (code: number) => { json: (data: unknown) => void };
}

/**
 * Sends an error response with a status matching the error type.
 * @param error - The error that occurred
 * @param res - Response object
 * @param context - Optional context string for logging (e.g., 'derivative metrics')
 */
export function handleApiError(
  error: unknown,
  res: JsonResponder,
  context?: string
): void {
  const contextMsg = context ? ` ${context}` : '';

  if (error instanceof TimeSeriesError) {
    log(`Rejected request for${contextMsg}: ${error.message}`, WARN);
    res.status(400).json({
      error: error.name,
      message: error.message,
    });
    return;
  }

  if (error instanceof MetricFetchError) {
    log(`Upstream failure for${contextMsg}: ${error.kind}: ${error.message}`, error.kind === 'Transport' ? ERR : WARN);
    res.status(STATUS_BY_KIND[error.kind]).json({
      error: error.kind,
      message: error.message,
    });
    return;
  }

  if (error instanceof HttpError) {
    res.status(502).json({
      error: 'HTTP error',
      message: error.message,
      details: error.details,
    });
    return;
  }

  const errorMessage = error instanceof Error ? error.message : 'Unknown error';
  log(`Error${contextMsg}: ${errorMessage}`, ERR);

  res.status(500).json({
    error: `Failed to fetch${contextMsg}`,
    message: errorMessage,
  });
}
