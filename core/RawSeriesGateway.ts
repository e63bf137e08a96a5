// Filename: core/RawSeriesGateway.ts

import { getRawSeriesCacheKey } from "../services/CacheKeyService.js";
import { isCachedSeriesResult, type CachedSeriesResult } from "../config/Config.Persistent.js";
import { createTimeSeries } from "../features/timeseries/helpers.js";
import type { TimeSeries } from "../features/timeseries/types.js";
import { log, TMI, WARN } from "../utils/log.js";
import {
  fetchMetricInBatches,
  splitDateRange,
  type MetricDataSource,
  type MetricRequest,
} from "./MetricDataSource.js";

// Raw Series Gateway specific emoji
const LOG_EMOJI = "📥";

/**
 * Defines the abstract interface for simple Key-Value storage.
 */
export interface KeyValueStore {
  /** Retrieves data based on the key, or null when absent. */
  get(key: string): Promise<unknown>;
  /** Stores data with a TTL in seconds. */
  set(key: string, data: unknown, ttlSeconds: number): Promise<void>;
}

/**
 * Defines the abstract interface for the full storage mechanism (KV + Blob),
 * used internally by the RawSeriesGateway.
 */
export interface StorageGateway extends KeyValueStore {
  /** Retrieves Blob data (used for historical data). */
  getBlob(key: string): Promise<unknown>;
  /** Stores Blob data; the TTL travels inside the stored entry. */
  putBlob(key: string, data: unknown, ttlSeconds: number): Promise<void>;
}

export interface RawSeriesGatewayOptions {
  /** Longest range per upstream request, in days; longer ranges are historical. */
  batchDays: number;
  /** Lifetime of a cached series, in seconds. */
  ttlSeconds: number;
}

/**
 * Fetches raw metric series through a cache. Ranges longer than one batch are
 * "historical": they are fetched in batches and stored in Blob storage.
 * Shorter ranges go to KV.
 */
export class RawSeriesGateway {
  constructor(
    private readonly source: MetricDataSource,
    private readonly storage: StorageGateway,
    private readonly options: RawSeriesGatewayOptions
  ) {}

  /**
   * Whether a request spans more than one upstream batch.
   * @throws InvalidParameterError for unusable date ranges
   */
  public isHistorical(request: MetricRequest): boolean {
    return splitDateRange(request.from, request.to, this.options.batchDays).length > 1;
  }

  /**
   * Returns the series for `request`, from cache when a fresh entry exists.
   * @throws MetricFetchError when the upstream fetch fails
   * @throws InvalidParameterError for unusable date ranges
   */
  public async fetchSeries(request: MetricRequest): Promise<TimeSeries> {
    const isHistorical = this.isHistorical(request);
    const cacheKey = getRawSeriesCacheKey(request, isHistorical);

    // 1. Check cache
    const cachedEntry = isHistorical
      ? await this.storage.getBlob(cacheKey)
      : await this.storage.get(cacheKey);

    if (cachedEntry) {
      if (isCachedSeriesResult(cachedEntry)) {
        const ageSeconds = (Date.now() - cachedEntry.fetchedAt) / 1000;

        if (ageSeconds < cachedEntry.ttlSeconds) {
          log(
            `${LOG_EMOJI} Gateway: Cache HIT for ${cacheKey}. Age: ${ageSeconds.toFixed(1)}s / ${cachedEntry.ttlSeconds}s.`,
            TMI
          );
          return createTimeSeries(cachedEntry.data.name, cachedEntry.data.points);
        }
        log(
          `${LOG_EMOJI} Gateway: Cache EXPIRED for ${cacheKey}. Age: ${ageSeconds.toFixed(1)}s / ${cachedEntry.ttlSeconds}s.`,
          TMI
        );
      } else {
        log(`${LOG_EMOJI} Gateway: Cache entry for ${cacheKey} has an unexpected format. Refetching.`, WARN);
      }
    } else {
      log(`${LOG_EMOJI} Gateway: Cache MISS for ${cacheKey}.`, TMI);
    }

    // 2. Fetch upstream
    const series = isHistorical
      ? await fetchMetricInBatches(this.source, request, this.options.batchDays)
      : await this.source.fetchMetric(request);

    // 3. Store
    const ttl = this.options.ttlSeconds;
    const wrappedResult: CachedSeriesResult = {
      data: { name: series.name, points: [...series.points] },
      fetchedAt: Date.now(),
      ttlSeconds: ttl,
    };

    try {
      if (isHistorical) {
        await this.storage.putBlob(cacheKey, wrappedResult, ttl);
      } else {
        await this.storage.set(cacheKey, wrappedResult, ttl);
      }
      log(`${LOG_EMOJI} Gateway: Stored ${series.points.length} points under ${cacheKey} (TTL: ${ttl}s)`, TMI);
    } catch (storeError) {
      log(`${LOG_EMOJI} Gateway: ❌ Failed to store raw series in cache! Error: ${storeError}`, WARN);
    }

    return series;
  }
}
