// Filename: core/DerivativeResolver.ts

import { buildDerivativeSeries, parseInterval, validateDerivativeSpec } from "../features/derivatives/index.js";
import type { DerivativeSpec, DerivedSeries } from "../features/derivatives/index.js";
import type { TimeSeries } from "../features/timeseries/types.js";
import { InvalidParameterError } from "../features/timeseries/errors.js";
import { log, ERR, TMI } from "../utils/log.js";
import type { MetricRequest } from "./MetricDataSource.js";
import type { RawSeriesGateway } from "./RawSeriesGateway.js";

// Derivative Resolver specific emoji
const LOG_EMOJI = "✨";

/** A base series and the series derived from it, all on the same index. */
export interface DerivativeResolution {
  request: MetricRequest;
  base: TimeSeries;
  derived: DerivedSeries[];
  resolvedAt: number;
}

/**
 * Resolves derivative metrics: fetch the raw series (cache first), then apply
 * each transform.
 */
export class DerivativeResolver {
  constructor(private readonly gateway: RawSeriesGateway) {}

  /**
   * @param request - The base metric to fetch.
   * @param specs - Transforms to apply; at least one.
   * @throws InvalidParameterError for bad specs, intervals or dates (before any fetch)
   * @throws MetricFetchError when the upstream fetch fails
   */
  public async resolve(
    request: MetricRequest,
    specs: readonly DerivativeSpec[]
  ): Promise<DerivativeResolution> {
    if (specs.length === 0) {
      throw new InvalidParameterError("specs", specs, "At least one derivative must be requested");
    }
    const intervalMs = parseInterval(request.interval);

    log(
      `${LOG_EMOJI} RESOLVER: ${request.metric}/${request.slug} with ${specs.length} derivative(s)`,
      TMI
    );

    specs.forEach(validateDerivativeSpec);

    const base = await this.gateway.fetchSeries(request);

    try {
      const derived = buildDerivativeSeries(base, specs, intervalMs);
      log(`${LOG_EMOJI} RESOLVER: ✅ Computed ${derived.length} series over ${base.points.length} points.`, TMI);
      return { request, base, derived, resolvedAt: Date.now() };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      log(`${LOG_EMOJI} RESOLVER: ❌ Derivative computation failed: ${errorMessage}`, ERR);
      throw error;
    }
  }
}
