// Filename: utils/redis.ts

import { Redis } from "@upstash/redis";
import { ERR, log, TMI } from "./log.js";

// Redis Client specific emoji
const LOG_EMOJI = "💾";

// The Vercel KV client is built on top of Upstash/Redis.
// It is initialized using environment variables provided by Vercel:
// - KV_REST_API_URL: The REST API URL for the Redis instance
// - KV_REST_API_TOKEN: The REST API token for authentication

let redisClient: Redis | null = null;

/**
 * Returns the Vercel KV (Upstash Redis) client, creating it on first use so
 * that importing this module never requires the environment to be set.
 * @returns The initialized Redis client.
 * @throws An error if the required environment variables are not set.
 */
export function getRedisClient(): Redis {
  if (redisClient) {
    return redisClient;
  }

  const url = process.env.KV_REST_API_URL || process.env.KV_URL;
  const token = process.env.KV_REST_API_TOKEN || process.env.KV_TOKEN;

  if (!url || !token) {
    log(`${LOG_EMOJI} ERROR: Vercel KV environment variables are missing.`, ERR);
    log(`${LOG_EMOJI} Expected: KV_REST_API_URL and KV_REST_API_TOKEN (or KV_URL and KV_TOKEN)`, ERR);
    throw new Error("KV environment variables are not set for Redis client. Please set KV_REST_API_URL and KV_REST_API_TOKEN.");
  }

  redisClient = new Redis({ url, token });

  log(`${LOG_EMOJI} Redis Client initialized successfully.`, TMI);
  return redisClient;
}
