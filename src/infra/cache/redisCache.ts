import { Redis } from "ioredis";
import type { CachePort } from "../../core/ports/outboundPorts";

const SCAN_BATCH_SIZE = 100;

/**
 * Builds a client that fails commands immediately while disconnected instead of buffering them.
 */
export const createRedisClient = (url: string): Redis =>
  new Redis(url, {
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    connectTimeout: 2_000,
  });

/**
 * Redis-backed cache. Prefix deletes walk the keyspace with SCAN and UNLINK.
 */
export class RedisCache implements CachePort {
  constructor(private readonly redis: Redis) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, "EX", ttlSeconds);
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    let cursor = "0";
    let deleted = 0;

    do {
      const [nextCursor, keys] = await this.redis.scan(
        cursor,
        "MATCH",
        `${prefix}*`,
        "COUNT",
        SCAN_BATCH_SIZE,
      );
      cursor = nextCursor;

      if (keys.length > 0) {
        deleted += await this.redis.unlink(...keys);
      }
    } while (cursor !== "0");

    return deleted;
  }

  isAvailable(): boolean {
    return this.redis.status === "ready";
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
