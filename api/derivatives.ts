// Filename: api/derivatives.ts
/**
 * Derivative metrics endpoint.
 * Query parameters: metric, slug, from, to, interval (default 1d),
 * change, ma, maChange, minPeriods, format (json | csv)
 */
import type { VercelRequest, VercelResponse } from '@vercel/node';
import { getServices } from '../core/services.js';
import { derivativesFromParams } from '../config/configDerivatives.js';
import { toCsv, toRows } from '../features/derivatives/index.js';
import type { TimeSeries } from '../features/timeseries/types.js';
import { DEFAULT_INTERVAL } from '../constants/api.js';
import { handleApiError } from '../utils/apiErrors.js';
import { log, INFO, WARN } from '../utils/log.js';

// API Handler specific emoji
const LOG_EMOJI = '🖥️';

const REQUIRED_PARAMS = ['metric', 'slug', 'from', 'to'] as const;

const OUTPUT_FORMATS: ReadonlySet<string> = new Set(['json', 'csv']);

/** Returns the first value of a query parameter, or undefined. */
export function firstParam(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first === undefined || first === '' ? undefined : first;
}

function serializeSeries(series: TimeSeries) {
  return {
    name: series.name,
    points: series.points.map(point => ({
      datetime: new Date(point.timestamp).toISOString(),
      value: point.value,
    })),
  };
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'GET') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  const missing = REQUIRED_PARAMS.filter(name => firstParam(req.query[name]) === undefined);
  if (missing.length > 0) {
    log(`${LOG_EMOJI} Handler: Missing required parameters: ${missing.join(', ')}`, WARN);
    return res.status(400).json({ error: `Missing required parameters: ${missing.join(', ')}` });
  }

  const request = {
    metric: firstParam(req.query.metric) ?? '',
    slug: firstParam(req.query.slug) ?? '',
    from: firstParam(req.query.from) ?? '',
    to: firstParam(req.query.to) ?? '',
    interval: firstParam(req.query.interval) ?? DEFAULT_INTERVAL,
  };
  const format = firstParam(req.query.format) ?? 'json';
  if (!OUTPUT_FORMATS.has(format)) {
    log(`${LOG_EMOJI} Handler: Unsupported format '${format}'`, WARN);
    return res.status(400).json({ error: `Unsupported format '${format}'. Use json or csv.` });
  }

  try {
    const specs = derivativesFromParams({
      change: firstParam(req.query.change),
      ma: firstParam(req.query.ma),
      maChange: firstParam(req.query.maChange),
      minPeriods: firstParam(req.query.minPeriods),
    });

    log(`${LOG_EMOJI} Handler: ${request.metric}/${request.slug} ${request.from} → ${request.to} (${specs.length} derivatives)`, INFO);

    const { resolver } = getServices();
    const resolution = await resolver.resolve(request, specs);
    const allSeries = [resolution.base, ...resolution.derived.map(d => d.series)];

    if (format === 'csv') {
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      return res.status(200).send(toCsv(toRows(allSeries)));
    }

    return res.status(200).json({
      ...request,
      resolvedAt: resolution.resolvedAt,
      series: allSeries.map(serializeSeries),
    });
  } catch (error) {
    handleApiError(error, res, 'derivative metrics');
  }
}
