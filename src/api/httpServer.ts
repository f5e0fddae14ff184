import express, {
  type ErrorRequestHandler,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { z } from "zod";
import { toErrorDetails, type QueryError } from "../core/entities/appError";
import { productTypes } from "../core/entities/document";
import type {
  DocumentQueryPort,
  RefreshTriggerPort,
} from "../core/ports/inboundPorts";
import type { CachePort, DocumentStorePort } from "../core/ports/outboundPorts";
import type { Logger } from "../shared/logger/logger";

export type HttpAppDependencies = {
  queries: DocumentQueryPort;
  refresh: RefreshTriggerPort;
  store: Pick<DocumentStorePort, "ping">;
  cache: Pick<CachePort, "isAvailable">;
  logger: Logger;
  scheduler?: { nextRunAt(): Promise<Date | null> };
};

const searchQuerySchema = z.object({
  product_type: z
    .preprocess(
      (value) => (typeof value === "string" ? value.toUpperCase() : value),
      z.enum(productTypes),
    )
    .optional(),
  search: z.string().optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

const queryErrorStatus: Record<QueryError["code"], number> = {
  not_found: 404,
  store_unavailable: 503,
};

const asyncHandler =
  (fn: (req: Request, res: Response) => Promise<unknown>) =>
  (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res)).catch(next);
  };

const sendQueryError = (res: Response, error: QueryError) => {
  res
    .status(queryErrorStatus[error.code])
    .json({ error: error.code, message: error.message });
};

/**
 * Builds the Express app for the read API, the manual refresh trigger and health reporting.
 * Listening is left to the caller so tests can bind an ephemeral port.
 */
export const createHttpApp = (deps: HttpAppDependencies) => {
  const { queries, refresh, store, cache, logger, scheduler } = deps;
  const app = express();
  app.disable("x-powered-by");

  app.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const storeUp = await store.ping().catch((error: unknown) => {
        logger.warn({ error: toErrorDetails(error) }, "Store health check failed");
        return false;
      });
      const cacheUp = cache.isAvailable();

      res.json({
        status: storeUp && cacheUp ? "ok" : "degraded",
        store: storeUp ? "up" : "down",
        cache: cacheUp ? "up" : "down",
      });
    }),
  );

  app.get(
    "/api/docs",
    asyncHandler(async (req, res) => {
      const parsed = searchQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({
          error: "invalid_request",
          details: parsed.error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          })),
        });
        return;
      }

      const result = await queries.search({
        productType: parsed.data.product_type,
        query: parsed.data.search,
        page: parsed.data.page,
        limit: parsed.data.limit,
      });
      if (result.isErr()) {
        sendQueryError(res, result.error);
        return;
      }
      res.json(result.value);
    }),
  );

  // Must stay ahead of "/api/docs/:id".
  app.get(
    "/api/docs/stats",
    asyncHandler(async (_req, res) => {
      const result = await queries.stats();
      if (result.isErr()) {
        sendQueryError(res, result.error);
        return;
      }
      res.json(result.value);
    }),
  );

  app.get(
    "/api/docs/ingest/status",
    asyncHandler(async (_req, res) => {
      let nextScheduledRunAt: Date | null = null;
      if (scheduler) {
        nextScheduledRunAt = await scheduler.nextRunAt().catch((error: unknown) => {
          logger.warn(
            { error: toErrorDetails(error) },
            "Could not read next scheduled refresh",
          );
          return null;
        });
      }
      res.json({ ...refresh.snapshot(), nextScheduledRunAt });
    }),
  );

  app.get(
    "/api/docs/:id",
    asyncHandler(async (req, res) => {
      const result = await queries.getById(req.params.id);
      if (result.isErr()) {
        sendQueryError(res, result.error);
        return;
      }
      res.json(result.value);
    }),
  );

  app.post(
    "/api/docs/ingest",
    asyncHandler(async (_req, res) => {
      const result = await refresh.trigger("manual");
      if (result.isOk()) {
        res.json({ status: "completed", report: result.value.report });
        return;
      }

      const error = result.error;
      if (error.code === "already_running") {
        res.status(409).json({
          error: error.code,
          message: error.message,
          activeRunId: error.activeRunId,
          activeSince: error.activeSince,
        });
        return;
      }
      res.status(500).json({
        error: error.code,
        message: error.message,
        runId: error.runId,
      });
    }),
  );

  const handleUnexpected: ErrorRequestHandler = (error, req, res, _next) => {
    logger.error(
      { method: req.method, path: req.path, error: toErrorDetails(error) },
      "Unhandled request error",
    );
    res.status(500).json({ error: "internal_error" });
  };
  app.use(handleUnexpected);

  return app;
};
