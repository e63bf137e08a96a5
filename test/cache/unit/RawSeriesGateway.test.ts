// Filename: test/cache/unit/RawSeriesGateway.test.ts

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../../utils/log.js', () => ({
  log: vi.fn(),
  ERR: 1,
  WARN: 3,
  LOG: 5,
  INFO: 7,
  TMI: 9,
}));

import { RawSeriesGateway } from '../../../core/RawSeriesGateway.js';
import { MetricFetchError, type MetricRequest } from '../../../core/MetricDataSource.js';
import { getRawSeriesCacheKey } from '../../../services/CacheKeyService.js';
import { createTimeSeries } from '../../../features/timeseries/helpers.js';
import { InvalidParameterError } from '../../../features/timeseries/errors.js';

const DAY = 24 * 60 * 60 * 1000;
const T0 = Date.UTC(2024, 0, 1);

const request: MetricRequest = {
  metric: 'price_usd',
  slug: 'santiment',
  from: '2024-01-01',
  to: '2024-01-03',
  interval: '1d',
};

const storedPoints = [
  { timestamp: T0, value: 10 },
  { timestamp: T0 + DAY, value: 20 },
];

function makeStorage() {
  return {
    get: vi.fn(async (_key: string): Promise<unknown> => null),
    set: vi.fn(async (_key: string, _data: unknown, _ttlSeconds: number): Promise<void> => {}),
    getBlob: vi.fn(async (_key: string): Promise<unknown> => null),
    putBlob: vi.fn(async (_key: string, _data: unknown, _ttlSeconds: number): Promise<void> => {}),
  };
}

function makeSource() {
  return {
    // One point at the start of each requested window
    fetchMetric: vi.fn(async (req: MetricRequest) =>
      createTimeSeries(req.metric, [{ timestamp: Date.parse(req.from), value: 1 }])
    ),
    listProjectSlugs: vi.fn(async (): Promise<string[]> => []),
  };
}

describe('RawSeriesGateway', () => {
  let storage: ReturnType<typeof makeStorage>;
  let source: ReturnType<typeof makeSource>;
  let gateway: RawSeriesGateway;

  beforeEach(() => {
    storage = makeStorage();
    source = makeSource();
    gateway = new RawSeriesGateway(source, storage, { batchDays: 4, ttlSeconds: 300 });
  });

  describe('isHistorical', () => {
    it('should be true only for ranges longer than one batch', () => {
      expect(gateway.isHistorical(request)).toBe(false);
      expect(gateway.isHistorical({ ...request, to: '2024-01-05' })).toBe(false);
      expect(gateway.isHistorical({ ...request, to: '2024-01-06' })).toBe(true);
    });

    it('should reject unusable dates', () => {
      expect(() => gateway.isHistorical({ ...request, from: 'soon' })).toThrow(InvalidParameterError);
    });
  });

  describe('fetchSeries (KV)', () => {
    const key = getRawSeriesCacheKey(request, false);

    it('should fetch and store on a cache miss', async () => {
      const series = await gateway.fetchSeries(request);

      expect(series.points).toEqual([{ timestamp: T0, value: 1 }]);
      expect(storage.get).toHaveBeenCalledWith(key);
      expect(source.fetchMetric).toHaveBeenCalledWith(request);
      expect(storage.set).toHaveBeenCalledWith(
        key,
        {
          data: { name: 'price_usd', points: [{ timestamp: T0, value: 1 }] },
          fetchedAt: expect.any(Number),
          ttlSeconds: 300,
        },
        300
      );
      expect(storage.getBlob).not.toHaveBeenCalled();
    });

    it('should serve a fresh entry without fetching', async () => {
      storage.get.mockResolvedValueOnce({
        data: { name: 'price_usd', points: storedPoints },
        fetchedAt: Date.now() - 10_000,
        ttlSeconds: 300,
      });

      const series = await gateway.fetchSeries(request);

      expect(series.points).toEqual(storedPoints);
      expect(source.fetchMetric).not.toHaveBeenCalled();
      expect(storage.set).not.toHaveBeenCalled();
    });

    it('should refetch an expired entry', async () => {
      storage.get.mockResolvedValueOnce({
        data: { name: 'price_usd', points: storedPoints },
        fetchedAt: Date.now() - 600_000,
        ttlSeconds: 300,
      });

      await gateway.fetchSeries(request);

      expect(source.fetchMetric).toHaveBeenCalledTimes(1);
      expect(storage.set).toHaveBeenCalledTimes(1);
    });

    it('should refetch a malformed entry', async () => {
      storage.get.mockResolvedValueOnce({ data: 'garbage', fetchedAt: Date.now(), ttlSeconds: 300 });

      const series = await gateway.fetchSeries(request);

      expect(source.fetchMetric).toHaveBeenCalledTimes(1);
      expect(series.points).toHaveLength(1);
    });

    it('should still return the series when storing fails', async () => {
      storage.set.mockRejectedValueOnce(new Error('KV unavailable'));

      const series = await gateway.fetchSeries(request);

      expect(series.points).toEqual([{ timestamp: T0, value: 1 }]);
    });

    it('should propagate upstream failures', async () => {
      source.fetchMetric.mockRejectedValueOnce(new MetricFetchError('NotFound', 'price_usd/santiment: not found'));

      await expect(gateway.fetchSeries(request)).rejects.toBeInstanceOf(MetricFetchError);
      expect(storage.set).not.toHaveBeenCalled();
    });
  });

  describe('fetchSeries (historical)', () => {
    const longRequest = { ...request, from: '2024-01-01', to: '2024-01-10' };
    const key = getRawSeriesCacheKey(longRequest, true);

    it('should fetch in batches and store in Blob storage', async () => {
      const series = await gateway.fetchSeries(longRequest);

      expect(source.fetchMetric).toHaveBeenCalledTimes(3);
      expect(series.points.map(p => p.timestamp)).toEqual([T0, T0 + 4 * DAY, T0 + 8 * DAY]);
      expect(storage.getBlob).toHaveBeenCalledWith(key);
      expect(storage.putBlob).toHaveBeenCalledWith(key, expect.objectContaining({ ttlSeconds: 300 }), 300);
      expect(storage.get).not.toHaveBeenCalled();
      expect(storage.set).not.toHaveBeenCalled();
    });

    it('should serve a fresh Blob entry', async () => {
      storage.getBlob.mockResolvedValueOnce({
        data: { name: 'price_usd', points: storedPoints },
        fetchedAt: Date.now(),
        ttlSeconds: 300,
      });

      const series = await gateway.fetchSeries(longRequest);

      expect(series.points).toEqual(storedPoints);
      expect(source.fetchMetric).not.toHaveBeenCalled();
    });
  });
});
