// Filename: constants/api.ts

/** Public GraphQL endpoint of the metrics API */
export const SANBASE_GRAPHQL_URL = 'https://api.santiment.net/graphql';

/** Longest range (in days) requested in a single upstream call */
export const DEFAULT_BATCH_DAYS = 120;

/** Default lifetime of a cached raw series, in seconds */
export const DEFAULT_RAW_SERIES_TTL_SECONDS = 300;

/** Default interval when a request does not name one */
export const DEFAULT_INTERVAL = '1d';
