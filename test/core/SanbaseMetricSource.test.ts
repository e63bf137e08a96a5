import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../utils/log.js', () => ({
  log: vi.fn(),
  ERR: 1,
  WARN: 3,
  LOG: 5,
  INFO: 7,
  TMI: 9,
}));

import { SanbaseMetricSource, GET_METRIC_QUERY } from '../../core/SanbaseMetricSource.js';
import { MetricFetchError } from '../../core/MetricDataSource.js';
import { GraphqlClient } from '../../utils/graphqlClient.js';

const URL = 'https://metrics.example.test/graphql';
const DAY = 24 * 60 * 60 * 1000;
const T0 = Date.UTC(2024, 0, 1);

const request = {
  metric: 'price_usd',
  slug: 'santiment',
  from: '2024-01-01T00:00:00Z',
  to: '2024-01-03T00:00:00Z',
  interval: '1d',
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('SanbaseMetricSource', () => {
  const fetchMock = vi.fn();
  let source: SanbaseMetricSource;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    source = new SanbaseMetricSource(new GraphqlClient({ url: URL, apiKey: 'test-key' }));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('fetchMetric', () => {
    it('should send the metric query with the request as variables', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { getMetric: { timeseriesData: [] } } }));

      await source.fetchMetric(request);

      const body = JSON.parse(fetchMock.mock.calls[0][1].body);
      expect(body).toEqual({ query: GET_METRIC_QUERY, variables: request });
    });

    it('should parse, sort and name the returned points', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          data: {
            getMetric: {
              timeseriesData: [
                { datetime: '2024-01-02T00:00:00Z', value: 2 },
                { datetime: '2024-01-01T00:00:00Z', value: 1 },
                { datetime: 'not a date', value: 5 },
                { datetime: '2024-01-03T00:00:00Z', value: null },
              ],
            },
          },
        })
      );

      const series = await source.fetchMetric(request);

      expect(series.name).toBe('price_usd');
      expect(series.points).toEqual([
        { timestamp: T0, value: 1 },
        { timestamp: T0 + DAY, value: 2 },
        { timestamp: T0 + 2 * DAY, value: null },
      ]);
    });

    it('should report a missing metric as NotFound', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { getMetric: null } }));

      await expect(source.fetchMetric(request)).rejects.toMatchObject({ kind: 'NotFound' });
    });

    it('should classify GraphQL errors', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ data: null, errors: [{ message: "The metric 'price_usd' is not supported or is mistyped." }] })
      );

      const error = await source.fetchMetric(request).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MetricFetchError);
      expect(error).toMatchObject({ kind: 'NotFound' });
    });

    it('should classify HTTP 429 as RateLimited', async () => {
      fetchMock.mockResolvedValueOnce(new Response('Too Many Requests', { status: 429 }));

      await expect(source.fetchMetric(request)).rejects.toMatchObject({ kind: 'RateLimited' });
    });

    it('should classify network failures as Transport', async () => {
      fetchMock.mockRejectedValueOnce(new Error('ECONNRESET'));

      await expect(source.fetchMetric(request)).rejects.toMatchObject({ kind: 'Transport' });
    });
  });

  describe('listProjectSlugs', () => {
    it('should return the slug of every project', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ data: { allProjects: [{ slug: 'bitcoin' }, { slug: 'santiment' }] } })
      );

      await expect(source.listProjectSlugs()).resolves.toEqual(['bitcoin', 'santiment']);
    });

    it('should return an empty list when projects are null', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { allProjects: null } }));

      await expect(source.listProjectSlugs()).resolves.toEqual([]);
    });

    it('should classify failures', async () => {
      fetchMock.mockResolvedValueOnce(new Response('denied', { status: 401 }));

      await expect(source.listProjectSlugs()).rejects.toMatchObject({ kind: 'AuthRequired' });
    });
  });
});
