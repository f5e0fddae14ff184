import type { Server } from "node:http";
import { Command, InvalidArgumentError } from "commander";
import { createHttpApp } from "../api/httpServer";
import { createRuntime, type Runtime } from "../application/bootstrap/runtimeFactory";
import type { BatchReport } from "../core/entities/ingestion";
import { isProductType, type ProductType } from "../core/entities/document";
import { toErrorDetails } from "../core/entities/appError";
import { RefreshScheduler } from "../infra/queue/refreshScheduler";
import { catalogEntries, loadCatalog } from "../shared/config/catalog";
import { env, redisConfigFromUrl } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

const parsePositiveInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
};

const parseProductType = (value: string): ProductType => {
  const upper = value.toUpperCase();
  if (!isProductType(upper)) {
    throw new InvalidArgumentError(`Unknown product type '${value}'.`);
  }
  return upper;
};

const printJson = (value: unknown) => {
  console.log(JSON.stringify(value, null, 2));
};

/**
 * Formats a batch report into a compact terminal summary.
 */
const formatBatchReport = (report: BatchReport): string => {
  const lines = [
    `Run ${report.runId}`,
    `Attempted: ${report.attempted}, succeeded: ${report.succeeded}, failed: ${report.failed.length}`,
    `Created: ${report.created}, updated: ${report.updated}`,
    `Cache invalidated: ${report.cacheInvalidated ? "yes" : "no"}`,
  ];

  if (report.failed.length > 0) {
    lines.push("Failures:");
    report.failed.forEach((failure) => {
      const reason =
        failure.kind === "fetch"
          ? `${failure.cause.code}: ${failure.cause.message}`
          : "no extractable content";
      lines.push(`- [${failure.productType}] ${failure.url} (${reason})`);
    });
  }

  return lines.join("\n");
};

/**
 * Runs a one-shot command against a fresh runtime and releases its connections afterwards.
 */
const withRuntime = async (
  fn: (runtime: Runtime) => Promise<number>,
): Promise<void> => {
  const runtime = createRuntime();
  try {
    process.exitCode = await fn(runtime);
  } finally {
    await runtime.close();
  }
};

const serve = async (opts: { scheduler: boolean }) => {
  const runtime = createRuntime();
  const scheduler = opts.scheduler
    ? new RefreshScheduler(
        redisConfigFromUrl(env.REDIS_URL),
        runtime.coordinator,
        logger.child({ component: "scheduler" }),
      )
    : undefined;

  await scheduler?.start({
    pattern: env.REFRESH_CRON,
    timezone: env.REFRESH_TIMEZONE,
  });

  const app = createHttpApp({
    queries: runtime.queryService,
    refresh: runtime.coordinator,
    store: runtime.store,
    cache: runtime.cache,
    logger: logger.child({ component: "http" }),
    scheduler,
  });
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(env.HTTP_PORT, () => resolve(listening));
  });
  logger.info(
    {
      port: env.HTTP_PORT,
      documentStore: env.DOCUMENT_STORE,
      cacheDriver: env.CACHE_DRIVER,
      scheduler: Boolean(scheduler),
      catalogSize: catalogEntries(runtime.catalog).length,
    },
    "HTTP server listening",
  );

  if (env.REFRESH_ON_START) {
    runtime.coordinator
      .trigger("manual")
      .then((result) => {
        if (result.isErr()) {
          logger.warn({ error: result.error.message }, "Startup refresh did not complete");
        }
      })
      .catch((error: unknown) => {
        logger.error({ error: toErrorDetails(error) }, "Startup refresh crashed");
      });
  }

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    server.close();
    Promise.all([scheduler?.close(), runtime.close()])
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error: toErrorDetails(error) }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

/**
 * Defines a single command surface so operational tasks go through the same services as the HTTP API.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("product-docs-index")
    .description("Product documentation ingestion and search");

  cli
    .command("serve")
    .description("Start the HTTP API and the daily refresh scheduler")
    .option("--no-scheduler", "Serve the API without the BullMQ refresh scheduler")
    .action(serve);

  cli
    .command("ingest")
    .description("Run one manual ingestion over the whole catalog")
    .option("--json", "Print the raw batch report")
    .action(async (opts: { json?: boolean }) => {
      await withRuntime(async (runtime) => {
        const result = await runtime.coordinator.trigger("manual");
        if (result.isErr()) {
          logger.error({ error: result.error.message }, "Ingestion failed");
          return 1;
        }

        const { report } = result.value;
        if (opts.json) {
          printJson(report);
        } else {
          console.log(formatBatchReport(report));
        }
        return 0;
      });
    });

  cli
    .command("search")
    .description("Search stored documents")
    .option("--query <text>", "Full-text query")
    .option("--product-type <type>", "Restrict to one product type", parseProductType)
    .option("--page <n>", "Page number", parsePositiveInt, 1)
    .option("--limit <n>", "Page size (max 100)", parsePositiveInt, 10)
    .action(
      async (opts: {
        query?: string;
        productType?: ProductType;
        page: number;
        limit: number;
      }) => {
        await withRuntime(async (runtime) => {
          const result = await runtime.queryService.search({
            query: opts.query,
            productType: opts.productType,
            page: opts.page,
            limit: Math.min(opts.limit, 100),
          });
          if (result.isErr()) {
            logger.error({ error: result.error.message }, "Search failed");
            return 1;
          }
          printJson(result.value);
          return 0;
        });
      },
    );

  cli
    .command("get")
    .description("Print one document by id")
    .requiredOption("--id <id>", "Document id")
    .action(async (opts: { id: string }) => {
      await withRuntime(async (runtime) => {
        const result = await runtime.queryService.getById(opts.id);
        if (result.isErr()) {
          logger.error({ id: opts.id, error: result.error.message }, "Lookup failed");
          return 1;
        }
        printJson(result.value);
        return 0;
      });
    });

  cli
    .command("stats")
    .description("Print document counts per product type")
    .action(async () => {
      await withRuntime(async (runtime) => {
        const result = await runtime.queryService.stats();
        if (result.isErr()) {
          logger.error({ error: result.error.message }, "Statistics failed");
          return 1;
        }
        printJson(result.value);
        return 0;
      });
    });

  cli
    .command("status")
    .description("Report configuration and catalog size")
    .action(() => {
      const catalog = loadCatalog(env.CATALOG_PATH);

      logger.info(
        {
          documentStore: env.DOCUMENT_STORE,
          cacheDriver: env.CACHE_DRIVER,
          cacheNamespace: env.CACHE_NAMESPACE,
          cacheTtlSeconds: env.CACHE_TTL_SECONDS,
          refreshCron: env.REFRESH_CRON,
          refreshTimezone: env.REFRESH_TIMEZONE,
          ingestConcurrency: env.INGEST_CONCURRENCY,
          runLockTtlMs: env.RUN_LOCK_TTL_MS,
          catalogPath: env.CATALOG_PATH,
          catalogSize: catalog.isOk() ? catalogEntries(catalog.value).length : null,
          catalogIssues: catalog.isErr() ? catalog.error.issues : [],
          redis: env.REDIS_URL,
          postgres: env.POSTGRES_URL,
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
