// Filename: core/SanbaseMetricSource.ts

import type { TimeSeries } from '../features/timeseries/types.js';
import type { GraphqlClient } from '../utils/graphqlClient.js';
import { log, ERR, TMI, WARN } from '../utils/log.js';
import {
  classifyFetchError,
  mergePoints,
  MetricFetchError,
  type MetricDataSource,
  type MetricRequest,
} from './MetricDataSource.js';

const LOG_EMOJI = '🌐';

export const GET_METRIC_QUERY = `
  query getMetric($metric: String!, $slug: String!, $from: DateTime!, $to: DateTime!, $interval: interval) {
    getMetric(metric: $metric) {
      timeseriesData(slug: $slug, from: $from, to: $to, interval: $interval) {
        datetime
        value
      }
    }
  }
`;

export const ALL_PROJECTS_QUERY = `
  {
    allProjects {
      slug
    }
  }
`;

interface TimeseriesDataPoint {
  datetime: string;
  value: number | null;
}

interface GetMetricResponse {
  getMetric: { timeseriesData: TimeseriesDataPoint[] | null } | null;
}

interface AllProjectsResponse {
  allProjects: { slug: string }[] | null;
}

/**
 * Metric data source backed by the GraphQL `getMetric` API.
 */
export class SanbaseMetricSource implements MetricDataSource {
  constructor(private readonly client: GraphqlClient) {}

  public async fetchMetric(request: MetricRequest): Promise<TimeSeries> {
    const context = `${request.metric}/${request.slug}`;
    log(`${LOG_EMOJI} Sanbase: Fetching ${context} ${request.from} → ${request.to} (${request.interval})`, TMI);

    let response: GetMetricResponse;
    try {
      response = await this.client.execute<GetMetricResponse>(GET_METRIC_QUERY, {
        metric: request.metric,
        slug: request.slug,
        from: request.from,
        to: request.to,
        interval: request.interval,
      });
    } catch (error) {
      const classified = classifyFetchError(error, context);
      log(`${LOG_EMOJI} Sanbase: ❌ ${classified.kind}: ${classified.message}`, classified.kind === 'RateLimited' ? WARN : ERR);
      throw classified;
    }

    const data = response.getMetric?.timeseriesData;
    if (!data) {
      throw new MetricFetchError('NotFound', `${context}: no timeseries data returned`);
    }

    const points = data.map(entry => ({
      timestamp: Date.parse(entry.datetime),
      value: entry.value,
    }));
    const invalid = points.filter(p => isNaN(p.timestamp)).length;
    if (invalid > 0) {
      log(`${LOG_EMOJI} Sanbase: ⚠️ Dropped ${invalid} point(s) with unparsable datetime for ${context}`, WARN);
    }

    const series = mergePoints(request.metric, points.filter(p => !isNaN(p.timestamp)));
    log(`${LOG_EMOJI} Sanbase: ✅ ${context}: ${series.points.length} points`, TMI);
    return series;
  }

  public async listProjectSlugs(): Promise<string[]> {
    let response: AllProjectsResponse;
    try {
      response = await this.client.execute<AllProjectsResponse>(ALL_PROJECTS_QUERY);
    } catch (error) {
      const classified = classifyFetchError(error, 'allProjects');
      log(`${LOG_EMOJI} Sanbase: ❌ Cannot fetch project slugs. Reason: ${classified.message}`, ERR);
      throw classified;
    }

    return (response.allProjects ?? []).map(project => project.slug);
  }
}
