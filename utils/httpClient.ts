// utils/httpClient.ts
/**
 * Generic HTTP Client
 *
 * Centralized fetch utility with consistent error handling, logging, and rate limit detection.
 * All HTTP requests in the application should go through this module.
 */

import { log, ERR, LOG, WARN } from './log.js';

/**
 * Generic HTTP error class for all HTTP-related errors.
 * `status` is 0 when no response was received.
 */
export class HttpError extends Error {
  constructor(
    public status: number,
    message: string,
    public url: string,
    public details?: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/**
 * Options for HTTP requests
 */
export interface HttpRequestOptions {
  /** Custom headers to include in the request */
  headers?: Record<string, string>;
  /** Request method (defaults to GET) */
  method?: string;
  /** Request body */
  body?: string;
  /** Context for logging (e.g., 'Sanbase GraphQL', 'Vercel Blob') */
  context?: string;
}

/**
 * Fetches a URL and returns the response as JSON
 *
 * @param url - The URL to fetch
 * @param options - Optional request configuration
 * @returns Parsed JSON data
 * @throws HttpError if the request fails or response is not OK
 */
export async function fetchJson<T = unknown>(
  url: string,
  options: HttpRequestOptions = {}
): Promise<T> {
  const response = await fetchHttp(url, options);
  try {
    const data = await response.json();
    return data as T;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    log(`Failed to parse JSON response from ${maskSensitiveUrl(url)}: ${errorMessage}`, ERR);
    throw new HttpError(
      response.status,
      `Failed to parse JSON response: ${errorMessage}`,
      url,
      errorMessage
    );
  }
}

/**
 * Core HTTP fetch function with error handling and rate limit detection
 */
async function fetchHttp(
  url: string,
  options: HttpRequestOptions = {}
): Promise<Response> {
  const context = options.context || 'HTTP';
  const method = options.method || 'GET';

  const headers: Record<string, string> = {
    'Accept': 'application/json',
    ...options.headers,
  };

  const urlForLogging = maskSensitiveUrl(url);
  log(`[${context}] ${method} ${urlForLogging}`, LOG);

  let response: Response;
  try {
    response = await fetch(url, {
      method,
      headers,
      body: options.body,
    });
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    log(`[${context}] Network/Request Error: ${errorMessage}`, ERR);
    throw new HttpError(
      0,
      `Failed to fetch from ${context}: ${errorMessage}`,
      url,
      errorMessage
    );
  }

  log(`[${context}] Response: ${response.status} ${response.statusText}`, LOG);
  checkRateLimits(response, context);

  if (!response.ok) {
    const errorText = await response.text().catch(() => 'Unable to read error response');
    log(`[${context}] ❌ Error Response: ${errorText.substring(0, 200)}`, ERR);

    throw new HttpError(
      response.status,
      `${context} responded with status ${response.status}: ${response.statusText}`,
      url,
      errorText
    );
  }

  return response;
}

/**
 * Checks response headers for rate limit information and logs warnings
 */
function checkRateLimits(response: Response, context: string): void {
  const rateLimitRemaining = response.headers.get('x-ratelimit-remaining') ||
                             response.headers.get('ratelimit-remaining') ||
                             response.headers.get('x-ratelimit-remaining-minute');

  const rateLimitReset = response.headers.get('x-ratelimit-reset') ||
                         response.headers.get('ratelimit-reset');

  if (rateLimitRemaining !== null) {
    const remaining = parseInt(rateLimitRemaining, 10);
    log(`[${context}] Rate limit remaining: ${remaining}`, LOG);

    if (remaining < 10) {
      log(`[${context}] ⚠️ Rate limit is low (${remaining} remaining)`, WARN);
    }
  }

  if (rateLimitReset !== null) {
    const resetTime = parseInt(rateLimitReset, 10);
    // Unix seconds, milliseconds, or seconds-until-reset
    const resetDate = resetTime < 1e6
      ? new Date(Date.now() + resetTime * 1000)
      : resetTime < 1e12
        ? new Date(resetTime * 1000)
        : new Date(resetTime);
    log(`[${context}] Rate limit resets at: ${resetDate.toISOString()}`, LOG);
  }

  if (response.status === 429) {
    log(`[${context}] ⚠️ Rate limit exceeded (429)`, WARN);
  }
}

/**
 * Masks sensitive information in URLs (API keys, tokens, etc.)
 */
export function maskSensitiveUrl(url: string): string {
  const sensitiveParams = [
    'api_key',
    'apikey',
    'token',
    'access_token',
    'authorization',
  ];

  let maskedUrl = url;
  for (const param of sensitiveParams) {
    const regex = new RegExp(`([?&])${param}=[^&]+`, 'gi');
    maskedUrl = maskedUrl.replace(regex, `$1${param}=***MASKED***`);
  }

  return maskedUrl;
}
