// Filename: utils/KvStorageGateway.ts

import type { StorageGateway } from "../core/RawSeriesGateway.js";
import { getRedisClient } from "./redis.js";
import { getBlobJson, putBlobJson } from "./blob.js";
import { log, TMI, WARN } from "./log.js";

// KV Storage Gateway specific emoji
const LOG_EMOJI = "📦";

/**
 * StorageGateway backed by Vercel KV (Redis) for short-lived entries and
 * Vercel Blob for large, historical series.
 */
export class KvStorageGateway implements StorageGateway {
  // --- KV (Key-Value) Operations ---

  /**
   * Retrieves data from Vercel KV. KV handles TTL expiration automatically.
   * @returns The cached data, or null if not found, expired or unreadable.
   */
  public async get(key: string): Promise<unknown> {
    try {
      const data = await getRedisClient().get<unknown>(key);
      log(`${LOG_EMOJI} KV Read: Key ${key} ${data ? "found" : "not found/expired"}.`, TMI);
      return data;
    } catch (error) {
      log(`${LOG_EMOJI} KV Read: ⚠️ Error reading key ${key}: ${error}`, WARN);
      return null;
    }
  }

  /**
   * Stores data in Vercel KV with a Time-To-Live in seconds.
   */
  public async set(key: string, data: unknown, ttlSeconds: number): Promise<void> {
    await getRedisClient().set(key, data, { ex: ttlSeconds });
    log(`${LOG_EMOJI} KV Write: Key ${key} set with TTL ${ttlSeconds}s.`, TMI);
  }

  // --- Blob Storage Operations ---

  /**
   * Retrieves a historical series from Vercel Blob Storage.
   * Missing blobs are a cache miss (null).
   */
  public async getBlob(key: string): Promise<unknown> {
    const data = await getBlobJson(key);
    log(`${LOG_EMOJI} Blob Read: Key ${key} ${data ? "found" : "not found"}.`, TMI);
    return data;
  }

  /**
   * Stores a historical series in Vercel Blob Storage.
   * Blob has no native TTL; the stored entry carries `ttlSeconds` and is
   * validated on read.
   */
  public async putBlob(key: string, data: unknown, ttlSeconds: number): Promise<void> {
    await putBlobJson(key, data);
    log(`${LOG_EMOJI} Blob Write: Key ${key} stored (TTL: ${ttlSeconds}s, metadata only).`, TMI);
  }
}

/**
 * Shared instance for the HTTP handlers.
 */
export const kvStorageGateway = new KvStorageGateway();
