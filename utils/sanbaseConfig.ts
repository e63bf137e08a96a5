// Filename: utils/sanbaseConfig.ts

import { log, WARN } from './log.js';
import {
  DEFAULT_BATCH_DAYS,
  DEFAULT_RAW_SERIES_TTL_SECONDS,
  SANBASE_GRAPHQL_URL,
} from '../constants/api.js';
import dotenv from 'dotenv';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

// This file is in utils/, so project root is one level up
const projectRoot = join(dirname(fileURLToPath(import.meta.url)), '..');

// Load .env.local outside production deployments; env vars may be set another way
if (process.env.VERCEL_ENV !== 'production') {
  dotenv.config({ path: join(projectRoot, '.env.local') });
}

/**
 * Settings for talking to the metrics API. Built once and handed to the
 * client at construction; nothing reads the API key from global state.
 */
export interface SanbaseConfig {
  /** GraphQL endpoint */
  apiUrl: string;
  /** Sent as `Authorization: Apikey <key>` when present */
  apiKey?: string;
  /** Longest range per upstream request, in days */
  batchDays: number;
  /** Lifetime of cached raw series, in seconds */
  rawTtlSeconds: number;
}

function readPositiveInt(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  if (isNaN(parsed) || parsed <= 0) {
    log(`⚠️ ${name}='${raw}' is not a positive integer. Using ${fallback}.`, WARN);
    return fallback;
  }
  return parsed;
}

/**
 * Reads the API configuration from an environment map.
 */
export function loadSanbaseConfig(env: NodeJS.ProcessEnv = process.env): SanbaseConfig {
  const apiKey = env.SANBASE_API_KEY || undefined;
  if (!apiKey) {
    log('🚨 WARNING: SANBASE_API_KEY is not set. Requests are limited to free metrics and public rate limits.', WARN);
  }

  return {
    apiUrl: env.SANBASE_API_URL || SANBASE_GRAPHQL_URL,
    apiKey,
    batchDays: readPositiveInt(env.SANBASE_BATCH_DAYS, DEFAULT_BATCH_DAYS, 'SANBASE_BATCH_DAYS'),
    rawTtlSeconds: readPositiveInt(
      env.RAW_SERIES_TTL_SECONDS,
      DEFAULT_RAW_SERIES_TTL_SECONDS,
      'RAW_SERIES_TTL_SECONDS'
    ),
  };
}
