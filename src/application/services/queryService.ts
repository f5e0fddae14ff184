import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import {
  toErrorDetails,
  type QueryError,
} from "../../core/entities/appError";
import {
  productTypes,
  type DocumentEntity,
} from "../../core/entities/document";
import type {
  DocumentQueryPort,
  SearchPage,
  SearchRequest,
  Statistics,
} from "../../core/ports/inboundPorts";
import type {
  CacheInvalidationPort,
  CachePort,
  DocumentStorePort,
  StoreSearchResult,
} from "../../core/ports/outboundPorts";
import type { Logger } from "../../shared/logger/logger";
import { normalizeSearch, type CacheKeys } from "./cacheKeys";

const cachedDocumentSchema = z.object({
  id: z.string(),
  productType: z.enum(productTypes),
  sourceUrl: z.string(),
  title: z.string(),
  headings: z.array(z.string()),
  bodyText: z.string(),
  fetchedAt: z.coerce.date(),
});

const cachedSearchPageSchema = z.object({
  items: z.array(cachedDocumentSchema),
  total: z.number().int().nonnegative(),
  page: z.number().int().positive(),
  limit: z.number().int().positive(),
});

type QueryOperation = "search" | "getById";

export type QueryServiceOptions = {
  ttlSeconds: number;
};

/**
 * Cache-aside read path over the document store. The cache only ever accelerates reads: when it is
 * offline or erroring, every call goes to the store, and when the store is down calls fail instead of
 * serving cached data.
 *
 * Statistics are never cached so operators always see current counts.
 *
 * Every invalidation bumps `generation`. A read only writes back when the generation it started under is
 * still current, so a store read that straddles an ingestion never re-caches pre-batch content. A flush that
 * could not reach the cache stays pending and is applied before the next cache read.
 */
export class QueryService implements DocumentQueryPort, CacheInvalidationPort {
  private generation = 0;
  private flushPending = false;

  constructor(
    private readonly store: DocumentStorePort,
    private readonly cache: CachePort,
    private readonly keys: CacheKeys,
    private readonly logger: Logger,
    private readonly options: QueryServiceOptions,
  ) {}

  async search(request: SearchRequest): Promise<Result<SearchPage, QueryError>> {
    const normalized = normalizeSearch(request);
    const key = this.keys.search(normalized);
    const generation = this.generation;

    const cached = await this.readCache(key, cachedSearchPageSchema, "search");
    if (cached) {
      return ok(cached);
    }

    let result: StoreSearchResult;
    try {
      result = await this.store.search({
        text: normalized.query ?? undefined,
        productType: normalized.productType ?? undefined,
        offset: (normalized.page - 1) * normalized.limit,
        limit: normalized.limit,
      });
    } catch (error) {
      return err(this.storeUnavailable("search", error));
    }

    const page: SearchPage = {
      items: result.items,
      total: result.total,
      page: normalized.page,
      limit: normalized.limit,
    };
    await this.writeCache(key, page, "search", generation);

    return ok(page);
  }

  /**
   * Malformed ids and missing documents are both `not_found`.
   */
  async getById(id: string): Promise<Result<DocumentEntity, QueryError>> {
    if (!this.store.isValidId(id)) {
      return err(this.notFound(id));
    }

    const key = this.keys.document(id);
    const generation = this.generation;
    const cached = await this.readCache(key, cachedDocumentSchema, "getById");
    if (cached) {
      return ok(cached);
    }

    let document: DocumentEntity | null;
    try {
      document = await this.store.findById(id);
    } catch (error) {
      return err(this.storeUnavailable("getById", error));
    }

    if (!document) {
      return err(this.notFound(id));
    }

    await this.writeCache(key, document, "getById", generation);
    return ok(document);
  }

  async stats(): Promise<Result<Statistics, QueryError>> {
    try {
      const [countPerProductType, lastIngestedAt] = await Promise.all([
        this.store.countByProductType(),
        this.store.latestFetchedAt(),
      ]);
      const totalDocuments = productTypes.reduce(
        (total, productType) => total + countPerProductType[productType],
        0,
      );

      return ok({ totalDocuments, countPerProductType, lastIngestedAt });
    } catch (error) {
      return err(this.storeUnavailable("stats", error));
    }
  }

  /**
   * Drops every entry in the namespace. Returns false when the flush could not be applied now; it is then
   * retried before the next cache read.
   */
  async invalidateAll(): Promise<boolean> {
    this.generation += 1;
    this.flushPending = true;

    if (!this.cache.isAvailable()) {
      this.logger.warn(
        { namespace: this.keys.namespace },
        "Cache unavailable; invalidation deferred",
      );
      return false;
    }

    return this.flush("batch");
  }

  private async flush(reason: "batch" | "deferred"): Promise<boolean> {
    try {
      const deleted = await this.cache.deleteByPrefix(this.keys.prefix);
      this.flushPending = false;
      this.logger.info(
        { namespace: this.keys.namespace, deleted, reason },
        "Cache namespace invalidated",
      );
      return true;
    } catch (error) {
      this.logger.error(
        { namespace: this.keys.namespace, reason, error: toErrorDetails(error) },
        "Cache invalidation failed; will retry before the next cache read",
      );
      return false;
    }
  }

  private async readCache<T, I>(
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, I>,
    operation: QueryOperation,
  ): Promise<T | null> {
    if (!this.cache.isAvailable()) {
      this.logger.warn({ operation }, "Cache unavailable; reading from store");
      return null;
    }

    if (this.flushPending && !(await this.flush("deferred"))) {
      return null;
    }

    let raw: string | null;
    try {
      raw = await this.cache.get(key);
    } catch (error) {
      this.logger.warn(
        { operation, error: toErrorDetails(error) },
        "Cache read failed; reading from store",
      );
      return null;
    }

    if (raw === null) {
      this.logger.debug({ operation, key }, "Cache miss");
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      decoded = undefined;
    }

    const parsed = schema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.warn({ operation, key }, "Discarding unreadable cache entry");
      return null;
    }

    this.logger.debug({ operation, key }, "Cache hit");
    return parsed.data;
  }

  private async writeCache(
    key: string,
    value: SearchPage | DocumentEntity,
    operation: QueryOperation,
    generation: number,
  ): Promise<void> {
    if (!this.cache.isAvailable() || this.flushPending) {
      return;
    }

    if (generation !== this.generation) {
      this.logger.debug(
        { operation, key },
        "Skipping cache write; an invalidation ran during the read",
      );
      return;
    }

    try {
      await this.cache.set(key, JSON.stringify(value), this.options.ttlSeconds);
    } catch (error) {
      this.logger.warn(
        { operation, error: toErrorDetails(error) },
        "Cache write failed",
      );
    }
  }

  private notFound(id: string): QueryError {
    return { code: "not_found", message: `Document ${id} not found.` };
  }

  private storeUnavailable(operation: string, error: unknown): QueryError {
    this.logger.error(
      { operation, error: toErrorDetails(error) },
      "Document store unavailable",
    );
    return {
      code: "store_unavailable",
      message: "Document store is unavailable.",
      cause: error,
    };
  }
}
