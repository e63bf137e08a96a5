/**
 * Derived Metrics Exporter
 *
 * Fetches one metric for one project over a date range, computes the default
 * derivative metrics and writes the table to a file.
 *
 * How it works:
 * 1. Reads API settings via utils/sanbaseConfig (dotenv loads .env.local)
 * 2. Splits long ranges into batches of SANBASE_BATCH_DAYS and fetches them in turn
 * 3. Applies DEFAULT_DERIVATIVES (1/7/30-period change, 24h and 7d moving
 *    average, change of the 24h moving average)
 * 4. Writes one row per timestamp as JSON (default) or CSV
 *    - Filename format: [metric]-[slug]-[startDate]-[endDate].[json|csv]
 *    - Dates are formatted as YYYY-MM-DD (UTC)
 *
 * Usage: npx tsx scripts/exportDerivedMetrics.ts <metric> <slug> <from> <to> [interval] [--csv] [--out file]
 * Example: npx tsx scripts/exportDerivedMetrics.ts price_usd santiment 2024-01-01 2024-06-30 1d --csv
 */

import * as fs from 'fs/promises';
import { log, ERR, LOG } from '../utils/log.js';
import { loadSanbaseConfig } from '../utils/sanbaseConfig.js';
import { GraphqlClient } from '../utils/graphqlClient.js';
import { SanbaseMetricSource } from '../core/SanbaseMetricSource.js';
import { fetchMetricInBatches, MetricFetchError, type MetricDataSource, type MetricRequest } from '../core/MetricDataSource.js';
import { DEFAULT_DERIVATIVES } from '../config/configDerivatives.js';
import { buildDerivativeSeries, parseInterval, toCsv, toRows } from '../features/derivatives/index.js';
import { DEFAULT_INTERVAL } from '../constants/api.js';

export interface ExportOptions {
  request: MetricRequest;
  format: 'json' | 'csv';
  outFile?: string;
}

const USAGE = 'Usage: exportDerivedMetrics <metric> <slug> <from> <to> [interval] [--csv] [--out file]';

/**
 * Parses command line arguments (without the node and script entries).
 * @throws Error with usage text when required arguments are missing
 */
export function parseArgs(args: readonly string[]): ExportOptions {
  const positional: string[] = [];
  let format: 'json' | 'csv' = 'json';
  let outFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--csv') {
      format = 'csv';
    } else if (arg === '--out') {
      outFile = args[++i];
      if (!outFile) {
        throw new Error(`--out needs a file name. ${USAGE}`);
      }
    } else {
      positional.push(arg);
    }
  }

  const [metric, slug, from, to, interval = DEFAULT_INTERVAL] = positional;
  if (!metric || !slug || !from || !to) {
    throw new Error(USAGE);
  }

  return { request: { metric, slug, from, to, interval }, format, outFile };
}

export function formatDate(timestamp: number): string {
  return new Date(timestamp).toISOString().split('T')[0];
}

export function defaultFileName(options: ExportOptions): string {
  const { metric, slug, from, to } = options.request;
  const start = formatDate(Date.parse(from));
  const end = formatDate(Date.parse(to));
  return `${metric}-${slug}-${start}-${end}.${options.format}`;
}

/**
 * Fetches the base series and renders the export file contents.
 */
export async function buildExport(
  source: MetricDataSource,
  options: ExportOptions,
  batchDays: number
): Promise<{ content: string; rowCount: number }> {
  const intervalMs = parseInterval(options.request.interval);
  const base = await fetchMetricInBatches(source, options.request, batchDays);
  const derived = buildDerivativeSeries(base, DEFAULT_DERIVATIVES, intervalMs);
  const rows = toRows([base, ...derived.map(d => d.series)]);

  const content = options.format === 'csv'
    ? toCsv(rows)
    : JSON.stringify(rows, null, 2);

  return { content, rowCount: rows.length };
}

export async function main(args: readonly string[] = process.argv.slice(2)) {
  let options: ExportOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    log(error instanceof Error ? error.message : String(error), ERR);
    process.exit(1);
  }

  const config = loadSanbaseConfig();
  const source = new SanbaseMetricSource(
    new GraphqlClient({ url: config.apiUrl, apiKey: config.apiKey, context: 'Sanbase GraphQL' })
  );
  const { metric, slug } = options.request;

  try {
    log(`Exporting derived metrics for ${metric}/${slug}...`, LOG);
    const { content, rowCount } = await buildExport(source, options, config.batchDays);
    const fileName = options.outFile ?? defaultFileName(options);
    await fs.writeFile(fileName, content);
    log(`✓ ${metric}/${slug}: ${rowCount} rows written to ${fileName}`, LOG);
  } catch (error) {
    if (error instanceof MetricFetchError) {
      log(`Failed to fetch ${metric}/${slug}: ${error.message} (${error.kind})`, ERR);
    } else {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      log(`Failed to export ${metric}/${slug}: ${errorMessage}`, ERR);
    }
    process.exit(1);
  }
}

// Only run main() if this file is executed directly (not imported)
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.endsWith('exportDerivedMetrics.ts')) {
  main().catch(error => {
    log(`Unexpected failure: ${error instanceof Error ? error.message : String(error)}`, ERR);
    process.exit(1);
  });
}
