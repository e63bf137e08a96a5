// Filename: services/CacheKeyService.ts

import type { MetricRequest } from "../core/MetricDataSource.js";
import { log, TMI } from "../utils/log.js";

// Key Service specific emoji
const LOG_EMOJI = "🔑";

// --- KV/Blob Key Prefixes ---
export const KEY_PREFIXES = {
  RAW_SERIES: "raw:",
  HISTORICAL_SERIES: "history/",
};

/**
 * Normalizes a date so that equivalent spellings ('2024-01-01' and
 * '2024-01-01T00:00:00Z') share a cache entry. Unparsable values pass through.
 */
function normalizeDate(value: string): string {
  const ms = Date.parse(value);
  return isNaN(ms) ? value : new Date(ms).toISOString();
}

/**
 * Generates a deterministic key for a raw metric series.
 * Historical (Blob) keys are path-like; current (KV) keys are colon-separated.
 * @param request - The upstream request the series answers.
 * @param isHistorical - Whether the series is stored in Blob storage.
 * @returns The KV key or Blob pathname prefix.
 */
export function getRawSeriesCacheKey(request: MetricRequest, isHistorical: boolean): string {
  const parts = [
    request.metric,
    request.slug,
    request.interval,
    normalizeDate(request.from),
    normalizeDate(request.to),
  ].map(part => part.replace(/[^a-zA-Z0-9_.:-]/g, "")); // Basic sanitization

  const key = isHistorical
    ? `${KEY_PREFIXES.HISTORICAL_SERIES}${parts.join("/").replace(/:/g, "-")}`
    : `${KEY_PREFIXES.RAW_SERIES}${parts.join(":")}`;

  log(`${LOG_EMOJI} Key Service: Raw series key for ${request.metric}/${request.slug} -> ${key}`, TMI);
  return key;
}
