import { err, ok, type Result } from "neverthrow";
import {
  toErrorDetails,
  type TriggerError,
} from "../../core/entities/appError";
import type {
  ActiveRun,
  Catalog,
  CompletedRun,
  CoordinatorSnapshot,
  CoordinatorState,
  RunRecord,
  TriggerSource,
} from "../../core/entities/ingestion";
import type {
  IngestionPipelinePort,
  RefreshTriggerPort,
} from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  IdGeneratorPort,
  RunLease,
  RunLockPort,
} from "../../core/ports/outboundPorts";
import type { Logger } from "../../shared/logger/logger";

/**
 * Funnels scheduled and manual triggers through one guard so at most one ingestion run is in flight.
 *
 * The local state tag is checked and set before the first `await` in `trigger`, which makes the check-and-set
 * atomic on the event loop. The run lock then excludes runs started by other processes sharing the same store.
 * Triggers arriving while a run is active, here or elsewhere, are rejected, never queued.
 */
export class RefreshCoordinator implements RefreshTriggerPort {
  private state: CoordinatorState = { status: "idle" };
  private lastRun: RunRecord | null = null;
  private runsStarted = 0;

  constructor(
    private readonly pipeline: IngestionPipelinePort,
    private readonly catalog: Catalog,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
    private readonly lock: RunLockPort,
    private readonly logger: Logger,
  ) {}

  async trigger(
    source: TriggerSource,
  ): Promise<Result<CompletedRun, TriggerError>> {
    if (this.state.status === "running") {
      return this.rejectOverlap(source, this.state);
    }

    const run: ActiveRun = {
      runId: this.ids.next(),
      source,
      startedAt: this.clock.now(),
    };
    this.transition({ status: "running", ...run });

    let lease: RunLease;
    try {
      const acquisition = await this.lock.acquire(run);
      if (!acquisition.acquired) {
        this.transition({ status: "idle" });
        return this.rejectOverlap(source, acquisition.holder);
      }
      lease = acquisition.lease;
    } catch (error) {
      return this.fail(run, error, "Run lock unavailable");
    }

    this.runsStarted += 1;

    try {
      const report = await this.pipeline.run(this.catalog, run.runId);
      const completed: CompletedRun = {
        ...run,
        outcome: "completed",
        finishedAt: this.clock.now(),
        report,
      };
      await this.release(lease, run);
      this.lastRun = completed;
      this.transition({ status: "idle" });
      return ok(completed);
    } catch (error) {
      await this.release(lease, run);
      return this.fail(run, error, "Ingestion run failed");
    }
  }

  snapshot(): CoordinatorSnapshot {
    return {
      state: this.state,
      lastRun: this.lastRun,
      runsStarted: this.runsStarted,
    };
  }

  private rejectOverlap(
    source: TriggerSource,
    active: ActiveRun,
  ): Result<CompletedRun, TriggerError> {
    this.logger.info(
      { source, activeRunId: active.runId },
      "Refresh trigger rejected; run already in progress",
    );
    return err({
      code: "already_running",
      message: `Ingestion run ${active.runId} is already in progress.`,
      activeRunId: active.runId,
      activeSince: active.startedAt,
    });
  }

  private fail(
    run: ActiveRun,
    error: unknown,
    logMessage: string,
  ): Result<CompletedRun, TriggerError> {
    const reason = toErrorDetails(error).message;
    this.transition({ status: "failed", reason, ...run });
    this.logger.error(
      { runId: run.runId, source: run.source, error: toErrorDetails(error) },
      logMessage,
    );
    this.lastRun = {
      ...run,
      outcome: "failed",
      finishedAt: this.clock.now(),
      reason,
    };
    this.transition({ status: "idle" });

    return err({
      code: "run_failed",
      message: `Ingestion run ${run.runId} failed: ${reason}`,
      runId: run.runId,
      cause: error,
    });
  }

  private async release(lease: RunLease, run: ActiveRun): Promise<void> {
    try {
      await lease.release();
    } catch (error) {
      this.logger.warn(
        { runId: run.runId, error: toErrorDetails(error) },
        "Run lock release failed; it lapses after its TTL",
      );
    }
  }

  private transition(next: CoordinatorState): void {
    this.logger.debug(
      { from: this.state.status, to: next.status },
      "Coordinator state changed",
    );
    this.state = next;
  }
}
