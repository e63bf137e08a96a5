// Filename: utils/graphqlClient.ts

import { log, ERR, TMI } from './log.js';
import { fetchJson } from './httpClient.js';

const LOG_EMOJI = '🛰️';

/**
 * An error reported inside a GraphQL response body (HTTP status was 2xx).
 */
export class GraphqlRequestError extends Error {
  constructor(
    message: string,
    public errors: GraphqlErrorEntry[]
  ) {
    super(message);
    this.name = 'GraphqlRequestError';
  }
}

export interface GraphqlErrorEntry {
  message: string;
  path?: (string | number)[];
}

interface GraphqlResponse<T> {
  data?: T | null;
  errors?: GraphqlErrorEntry[];
}

export interface GraphqlClientOptions {
  /** GraphQL endpoint URL */
  url: string;
  /** Sent as `Authorization: Apikey <key>` when present */
  apiKey?: string;
  /** Context label for logs */
  context?: string;
}

export type GraphqlVariables = Record<string, string | number | boolean | null>;

/**
 * Minimal GraphQL-over-HTTP client: POSTs `{ query, variables }` and unwraps `data`.
 */
export class GraphqlClient {
  private readonly url: string;
  private readonly apiKey?: string;
  private readonly context: string;

  constructor(options: GraphqlClientOptions) {
    this.url = options.url;
    this.apiKey = options.apiKey;
    this.context = options.context ?? 'GraphQL';
  }

  /** Whether requests carry an API key. */
  public get isAuthenticated(): boolean {
    return Boolean(this.apiKey);
  }

  /**
   * Executes a query.
   *
   * @returns The `data` member of the response
   * @throws HttpError for transport failures and non-2xx responses
   * @throws GraphqlRequestError when the response carries `errors` or no `data`
   */
  public async execute<T>(query: string, variables: GraphqlVariables = {}): Promise<T> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers['Authorization'] = `Apikey ${this.apiKey}`;
    }
    log(`${LOG_EMOJI} ${this.context}: API key included: ${this.apiKey ? '✅ YES' : '❌ NO'}`, TMI);

    const response = await fetchJson<GraphqlResponse<T>>(this.url, {
      method: 'POST',
      headers,
      body: JSON.stringify({ query, variables }),
      context: this.context,
    });

    if (response.errors && response.errors.length > 0) {
      const message = response.errors.map(e => e.message).join('; ');
      log(`${LOG_EMOJI} ${this.context}: ❌ GraphQL errors: ${message}`, ERR);
      throw new GraphqlRequestError(message, response.errors);
    }

    if (response.data === undefined || response.data === null) {
      throw new GraphqlRequestError('GraphQL response contained no data', []);
    }

    return response.data;
  }
}
