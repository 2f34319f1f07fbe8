import type { ConnectionOptions } from "bullmq";

const DEFAULT_REDIS_PORT = 6379;

/**
 * Turn a `redis://` URL into BullMQ connection options. BullMQ workers need
 * `maxRetriesPerRequest: null` so blocking commands are never abandoned.
 */
export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || DEFAULT_REDIS_PORT,
    username: parsed.username || undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: parsed.pathname.length > 1 ? Number(parsed.pathname.slice(1)) : undefined,
    tls: parsed.protocol === "rediss:" ? {} : undefined,
    maxRetriesPerRequest: null,
  };
}
