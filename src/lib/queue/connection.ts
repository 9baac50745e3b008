/**
 * connection.ts — Redis connection config for BullMQ
 *
 * PURPOSE:
 *   The render queue and the worker share one Redis. REDIS_URL is parsed into
 *   BullMQ's ConnectionOptions; `rediss://` URLs (managed Redis) get TLS.
 *   Evaluated lazily so scripts can load .env.local before first access.
 */

import type { ConnectionOptions as TlsOptions } from "tls";
import { getConfig } from "../config";

export interface RedisConnectionOptions {
  host: string;
  port: number;
  password?: string;
  username?: string;
  tls?: TlsOptions;
  maxRetriesPerRequest: null;
}

export function parseRedisUrl(url: string): RedisConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname || "localhost",
    port: parseInt(parsed.port, 10) || 6379,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    username: parsed.username || undefined,
    tls: parsed.protocol === "rediss:" ? {} : undefined,
    // Required by BullMQ workers (blocking commands)
    maxRetriesPerRequest: null,
  };
}

let _cached: RedisConnectionOptions | null = null;

export function getRedisConnection(): RedisConnectionOptions {
  if (!_cached) {
    _cached = parseRedisUrl(getConfig().redisUrl);
  }
  return _cached;
}
