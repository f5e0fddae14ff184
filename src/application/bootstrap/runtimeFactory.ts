import { CacheKeys } from "../services/cacheKeys";
import { IngestionPipeline } from "../services/ingestionPipeline";
import { QueryService } from "../services/queryService";
import { RefreshCoordinator } from "../services/refreshCoordinator";
import type {
  CachePort,
  ClockPort,
  DocumentStorePort,
  IdGeneratorPort,
  RunLockPort,
} from "../../core/ports/outboundPorts";
import { InMemoryCache } from "../../infra/cache/inMemoryCache";
import { RedisCache, createRedisClient } from "../../infra/cache/redisCache";
import { createDb } from "../../infra/db/client";
import { PostgresDocumentRepositoryService } from "../../infra/db/repositories";
import { HtmlDocumentExtractor } from "../../infra/extraction/htmlDocumentExtractor";
import { HttpTextClient } from "../../infra/http/httpTextClient";
import { InMemoryRunLock } from "../../infra/lock/inMemoryRunLock";
import { RedisRunLock, createRunLockClient } from "../../infra/lock/redisRunLock";
import { InMemoryDocumentStore } from "../../infra/store/inMemoryDocumentStore";
import { SystemClock, UuidIdGenerator } from "../../infra/system/systemPorts";
import { loadCatalog } from "../../shared/config/catalog";
import { env } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";

type Closeable<T> = {
  value: T;
  close: () => Promise<void>;
};

const createStore = (ids: IdGeneratorPort): Closeable<DocumentStorePort> => {
  if (env.DOCUMENT_STORE === "memory") {
    return { value: new InMemoryDocumentStore(ids), close: async () => {} };
  }

  const { db, sql } = createDb(env.POSTGRES_URL);
  return {
    value: new PostgresDocumentRepositoryService(db, sql, ids),
    close: async () => {
      await sql.end();
    },
  };
};

/**
 * `none` wires an offline in-memory cache so every read takes the store path.
 */
const createCache = (clock: ClockPort): Closeable<CachePort> => {
  if (env.CACHE_DRIVER === "redis") {
    const redis = createRedisClient(env.REDIS_URL);
    redis.on("error", (error) => {
      logger.warn({ error: error.message }, "Redis cache connection error");
    });
    const cache = new RedisCache(redis);
    return { value: cache, close: () => cache.close() };
  }

  const cache = new InMemoryCache(clock);
  cache.setAvailable(env.CACHE_DRIVER === "memory");
  return { value: cache, close: async () => {} };
};

/**
 * Processes sharing the Postgres store share one Redis lock; a memory store is private to its process.
 */
const createRunLock = (): Closeable<RunLockPort> => {
  if (env.DOCUMENT_STORE === "memory") {
    return { value: new InMemoryRunLock(), close: async () => {} };
  }

  const redis = createRunLockClient(env.REDIS_URL);
  redis.on("error", (error) => {
    logger.warn({ error: error.message }, "Redis run lock connection error");
  });
  return {
    value: new RedisRunLock(redis, logger.child({ component: "run-lock" }), {
      key: "docs-ingest-lock",
      ttlMs: env.RUN_LOCK_TTL_MS,
    }),
    close: async () => {
      await redis.quit();
    },
  };
};

/**
 * Centralizes runtime wiring so the HTTP server and one-shot CLI commands share one composition root.
 * Throws when the catalog file is invalid.
 */
export const createRuntime = () => {
  const catalogResult = loadCatalog(env.CATALOG_PATH);
  if (catalogResult.isErr()) {
    throw new Error(catalogResult.error.message);
  }
  const catalog = catalogResult.value;

  const clock = new SystemClock();
  const ids = new UuidIdGenerator();
  const store = createStore(ids);
  const cache = createCache(clock);
  const runLock = createRunLock();

  const queryService = new QueryService(
    store.value,
    cache.value,
    new CacheKeys(env.CACHE_NAMESPACE),
    logger.child({ component: "query" }),
    { ttlSeconds: env.CACHE_TTL_SECONDS },
  );
  const extractor = new HtmlDocumentExtractor(new HttpTextClient(), clock, {
    timeoutMs: env.EXTRACT_TIMEOUT_MS,
    userAgent: env.EXTRACT_USER_AGENT,
  });
  const pipeline = new IngestionPipeline(
    extractor,
    store.value,
    queryService,
    clock,
    logger.child({ component: "ingestion" }),
    {
      concurrency: env.INGEST_CONCURRENCY,
      fetchRetries: env.INGEST_FETCH_RETRIES,
      retryDelayMs: env.INGEST_RETRY_DELAY_MS,
    },
  );
  const coordinator = new RefreshCoordinator(
    pipeline,
    catalog,
    clock,
    ids,
    runLock.value,
    logger.child({ component: "refresh" }),
  );

  return {
    catalog,
    store: store.value,
    cache: cache.value,
    queryService,
    coordinator,
    close: async () => {
      await Promise.all([store.close(), cache.close(), runLock.close()]);
    },
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
