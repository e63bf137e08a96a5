// Filename: core/services.ts

import { loadSanbaseConfig, type SanbaseConfig } from "../utils/sanbaseConfig.js";
import { GraphqlClient } from "../utils/graphqlClient.js";
import { kvStorageGateway } from "../utils/KvStorageGateway.js";
import { SanbaseMetricSource } from "./SanbaseMetricSource.js";
import { RawSeriesGateway, type StorageGateway } from "./RawSeriesGateway.js";
import { DerivativeResolver } from "./DerivativeResolver.js";
import type { MetricDataSource } from "./MetricDataSource.js";

/** The wired-up backend objects the handlers and scripts use. */
export interface Services {
  config: SanbaseConfig;
  source: MetricDataSource;
  gateway: RawSeriesGateway;
  resolver: DerivativeResolver;
}

/**
 * Builds the service graph from an explicit config and storage backend.
 */
export function createServices(
  config: SanbaseConfig,
  storage: StorageGateway = kvStorageGateway
): Services {
  const client = new GraphqlClient({
    url: config.apiUrl,
    apiKey: config.apiKey,
    context: "Sanbase GraphQL",
  });
  const source = new SanbaseMetricSource(client);
  const gateway = new RawSeriesGateway(source, storage, {
    batchDays: config.batchDays,
    ttlSeconds: config.rawTtlSeconds,
  });
  return { config, source, gateway, resolver: new DerivativeResolver(gateway) };
}

let services: Services | null = null;

/**
 * Lazily built services for the serverless handlers, configured from the environment.
 */
export function getServices(): Services {
  if (!services) {
    services = createServices(loadSanbaseConfig());
  }
  return services;
}
