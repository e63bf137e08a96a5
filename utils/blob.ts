// Filename: utils/blob.ts

import { list, put, type PutBlobResult } from "@vercel/blob";
import { log, TMI, WARN } from "./log.js";
import { fetchJson } from "./httpClient.js";

// Blob Utility specific emoji
const LOG_EMOJI = "☁️";

interface BlobMetadata {
  pathname: string;
  url: string;
}

// Overwritten blobs are served through the CDN; keep its copy short-lived
const BLOB_CACHE_MAX_AGE_SECONDS = 60;

/** The single pathname a cache key is stored under. */
export function blobPathname(key: string): string {
  return `${key}.json`;
}

// --- Private Utilities ---

/**
 * Finds the blob stored at exactly `pathname`.
 * @returns Its metadata, or null if there is none.
 */
async function findBlobMetadata(pathname: string): Promise<BlobMetadata | null> {
  try {
    const { blobs } = await list({
      prefix: pathname,
      limit: 10,
    });

    const match = blobs.find(blob => blob.pathname === pathname);
    if (!match) {
      log(`${LOG_EMOJI} Blob List: No blob stored at ${pathname}`, TMI);
      return null;
    }

    return { pathname: match.pathname, url: match.url };
  } catch (error) {
    log(
      `${LOG_EMOJI} Blob List: ❌ Failed to look up ${pathname}. Error: ${error}`,
      WARN
    );
    return null;
  }
}

// --- Public Access Methods ---

/**
 * Retrieves the blob stored under `key` and parses it as JSON.
 * @param key - The cache key.
 * @returns The parsed data, or null if no blob exists or fetching fails.
 */
export async function getBlobJson(key: string): Promise<unknown> {
  const blob = await findBlobMetadata(blobPathname(key));

  if (!blob) {
    return null;
  }

  try {
    const data = await fetchJson(blob.url, { context: "Vercel Blob Fetch" });
    log(`${LOG_EMOJI} Blob Fetch: Successfully retrieved JSON from ${blob.pathname}`, TMI);
    return data;
  } catch (error) {
    log(`${LOG_EMOJI} Blob Fetch: ❌ Failed to fetch JSON from URL: ${error}`, WARN);
    return null;
  }
}

/**
 * Stores data as the JSON blob for `key`, replacing any previous version.
 * @param key - The cache key.
 * @param data - The data object to store.
 * @returns The result metadata from the put operation.
 */
export async function putBlobJson(key: string, data: unknown): Promise<PutBlobResult> {
  const pathname = blobPathname(key);

  const result = await put(pathname, JSON.stringify(data), {
    access: "public",
    contentType: "application/json",
    addRandomSuffix: false,
    allowOverwrite: true,
    cacheControlMaxAge: BLOB_CACHE_MAX_AGE_SECONDS,
  });

  log(`${LOG_EMOJI} Blob Put: Stored as ${pathname}`, TMI);
  return result;
}
