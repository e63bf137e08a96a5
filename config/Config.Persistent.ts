// Filename: config/Config.Persistent.ts

import type { TimeSeriesPoint } from '../features/timeseries/types.js';

// --- Types for Stored Cache Data ---

/** JSON shape of a series as written to KV or Blob storage. */
export interface StoredSeries {
  name: string;
  points: TimeSeriesPoint[];
}

/**
 * A cached raw series plus the metadata needed for revalidation.
 */
export interface CachedSeriesResult {
  /** The series payload. */
  data: StoredSeries;

  /** Unix timestamp (milliseconds) when the series was fetched upstream. */
  fetchedAt: number;

  /** Lifetime (in seconds) of this cache entry. */
  ttlSeconds: number;
}

function isStoredPoint(value: unknown): value is TimeSeriesPoint {
  return (
    typeof value === 'object' &&
    value !== null &&
    'timestamp' in value &&
    'value' in value &&
    typeof value.timestamp === 'number' &&
    (value.value === null || typeof value.value === 'number')
  );
}

/**
 * Structural check for entries read back from storage.
 */
export function isCachedSeriesResult(entry: unknown): entry is CachedSeriesResult {
  if (
    typeof entry !== 'object' ||
    entry === null ||
    !('data' in entry && 'fetchedAt' in entry && 'ttlSeconds' in entry)
  ) {
    return false;
  }
  if (typeof entry.fetchedAt !== 'number' || typeof entry.ttlSeconds !== 'number') {
    return false;
  }
  const { data } = entry;
  return (
    typeof data === 'object' &&
    data !== null &&
    'name' in data &&
    'points' in data &&
    typeof data.name === 'string' &&
    Array.isArray(data.points) &&
    data.points.every(isStoredPoint)
  );
}
