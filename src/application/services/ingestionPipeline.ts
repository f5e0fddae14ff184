import { err, type Result } from "neverthrow";
import pLimit from "p-limit";
import {
  toErrorDetails,
  type ExtractionFailure,
} from "../../core/entities/appError";
import type { DocumentDraft } from "../../core/entities/document";
import type {
  BatchReport,
  Catalog,
  CatalogEntry,
} from "../../core/entities/ingestion";
import type {
  ExtractorPort,
  IngestionPipelinePort,
} from "../../core/ports/inboundPorts";
import type {
  CacheInvalidationPort,
  ClockPort,
  DocumentStorePort,
} from "../../core/ports/outboundPorts";
import { catalogEntries } from "../../shared/config/catalog";
import type { Logger } from "../../shared/logger/logger";

export type IngestionPipelineOptions = {
  concurrency: number;
  fetchRetries: number;
  retryDelayMs: number;
};

type ExtractionOutcome = {
  entry: CatalogEntry;
  result: Result<DocumentDraft, ExtractionFailure>;
};

/**
 * Drives the extractor across the catalog and upserts what it yields. Per-URL failures are collected into the
 * batch report; only store failures escape, aborting the run.
 */
export class IngestionPipeline implements IngestionPipelinePort {
  constructor(
    private readonly extractor: ExtractorPort,
    private readonly store: DocumentStorePort,
    private readonly invalidator: CacheInvalidationPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly options: IngestionPipelineOptions,
  ) {}

  async run(catalog: Catalog, runId: string): Promise<BatchReport> {
    const startedAt = this.clock.now();
    const entries = catalogEntries(catalog);
    const log = this.logger.child({ runId });

    log.info({ urls: entries.length }, "Ingestion batch started");

    const limit = pLimit(this.options.concurrency);
    const outcomes: ExtractionOutcome[] = await Promise.all(
      entries.map((entry) =>
        limit(async () => ({
          entry,
          result: await this.extractWithRetry(entry, log),
        })),
      ),
    );

    const failed: ExtractionFailure[] = [];
    let created = 0;
    let updated = 0;

    try {
      for (const { result } of outcomes) {
        if (result.isErr()) {
          failed.push(result.error);
          continue;
        }

        const upserted = await this.store.upsert(result.value);
        if (upserted.created) {
          created += 1;
        } else {
          updated += 1;
        }
      }
    } catch (error) {
      // Upserts that landed before the failure are visible in the store.
      if (created + updated > 0) {
        const cacheInvalidated = await this.invalidator.invalidateAll();
        log.error(
          { applied: created + updated, cacheInvalidated, error: toErrorDetails(error) },
          "Ingestion batch aborted after partial upserts",
        );
      }
      throw error;
    }

    // Runs after every upsert of the batch has been applied.
    const cacheInvalidated = await this.invalidator.invalidateAll();

    const report: BatchReport = {
      runId,
      attempted: entries.length,
      succeeded: created + updated,
      failed,
      created,
      updated,
      cacheInvalidated,
      startedAt,
      finishedAt: this.clock.now(),
    };

    log.info(
      {
        attempted: report.attempted,
        succeeded: report.succeeded,
        failed: report.failed.length,
        created,
        updated,
        cacheInvalidated,
      },
      "Ingestion batch finished",
    );

    return report;
  }

  /**
   * Re-attempts retryable fetch failures; empty pages are final on the first attempt.
   */
  private async extractWithRetry(
    entry: CatalogEntry,
    log: Logger,
  ): Promise<Result<DocumentDraft, ExtractionFailure>> {
    const maxAttempts = this.options.fetchRetries + 1;
    let result = await this.extractOnce(entry);

    for (let attempt = 1; attempt < maxAttempts; attempt += 1) {
      if (result.isOk() || !this.isRetryable(result.error)) {
        break;
      }

      log.debug(
        { url: entry.url, attempt, reason: this.describe(result.error) },
        "Retrying page fetch",
      );
      await this.delay(this.options.retryDelayMs * attempt);
      result = await this.extractOnce(entry);
    }

    if (result.isErr()) {
      log.warn(
        {
          url: entry.url,
          productType: entry.productType,
          kind: result.error.kind,
          reason: this.describe(result.error),
        },
        "Page extraction failed",
      );
    }

    return result;
  }

  private async extractOnce(
    entry: CatalogEntry,
  ): Promise<Result<DocumentDraft, ExtractionFailure>> {
    try {
      return await this.extractor.extract(entry.url, entry.productType);
    } catch (error) {
      const details = toErrorDetails(error);
      return err({
        kind: "fetch",
        url: entry.url,
        productType: entry.productType,
        cause: {
          code: "transport_error",
          message: details.message,
          retryable: false,
          cause: error,
        },
      });
    }
  }

  private isRetryable(failure: ExtractionFailure): boolean {
    return failure.kind === "fetch" && failure.cause.retryable;
  }

  private describe(failure: ExtractionFailure): string {
    return failure.kind === "fetch"
      ? failure.cause.message
      : "Page contained no extractable text.";
  }

  private async delay(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }

    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
