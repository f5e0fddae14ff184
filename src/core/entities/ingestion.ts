import type { ExtractionFailure } from "./appError";
import type { ProductType } from "./document";

/**
 * Source URLs grouped by product classification. Produced only by the catalog loader, which guarantees
 * that no URL appears twice across all product types.
 */
export type Catalog = Readonly<Record<ProductType, readonly string[]>>;

export type CatalogEntry = {
  productType: ProductType;
  url: string;
};

export type BatchReport = {
  runId: string;
  attempted: number;
  succeeded: number;
  failed: ExtractionFailure[];
  created: number;
  updated: number;
  cacheInvalidated: boolean;
  startedAt: Date;
  finishedAt: Date;
};

export type TriggerSource = "scheduled" | "manual";

export type ActiveRun = {
  runId: string;
  source: TriggerSource;
  startedAt: Date;
};

/**
 * Coordinator lifecycle. `failed` is transient: the coordinator records the failure and returns to `idle`.
 */
export type CoordinatorState =
  | { status: "idle" }
  | ({ status: "running" } & ActiveRun)
  | ({ status: "failed"; reason: string } & ActiveRun);

export type CompletedRun = ActiveRun & {
  outcome: "completed";
  finishedAt: Date;
  report: BatchReport;
};

export type FailedRun = ActiveRun & {
  outcome: "failed";
  finishedAt: Date;
  reason: string;
};

export type RunRecord = CompletedRun | FailedRun;

export type CoordinatorSnapshot = {
  state: CoordinatorState;
  lastRun: RunRecord | null;
  runsStarted: number;
};
