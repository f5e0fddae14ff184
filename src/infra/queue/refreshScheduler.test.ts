import { err, ok } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { TriggerError } from "../../core/entities/appError";
import type { CompletedRun } from "../../core/entities/ingestion";
import type { RefreshTriggerPort } from "../../core/ports/inboundPorts";
import { silentLogger } from "../../testing/fixtures";
import { createRefreshProcessor } from "./refreshScheduler";

const startedAt = new Date("2026-03-02T02:00:00.000Z");

const coordinatorReturning = (
  outcome: Awaited<ReturnType<RefreshTriggerPort["trigger"]>>,
): RefreshTriggerPort & { sources: string[] } => {
  const sources: string[] = [];
  return {
    sources,
    trigger: async (source) => {
      sources.push(source);
      return outcome;
    },
    snapshot: () => ({ state: { status: "idle" }, lastRun: null, runsStarted: 0 }),
  };
};

describe("createRefreshProcessor", () => {
  it("fires a scheduled trigger and summarizes the completed run", async () => {
    const completed: CompletedRun = {
      runId: "run-1",
      source: "scheduled",
      startedAt,
      outcome: "completed",
      finishedAt: startedAt,
      report: {
        runId: "run-1",
        attempted: 3,
        succeeded: 2,
        failed: [
          {
            kind: "empty_content",
            url: "https://docs.example.test/gpu/empty",
            productType: "GPU",
          },
        ],
        created: 2,
        updated: 0,
        cacheInvalidated: true,
        startedAt,
        finishedAt: startedAt,
      },
    };
    const coordinator = coordinatorReturning(ok(completed));

    const outcome = await createRefreshProcessor(coordinator, silentLogger)("job-1");

    expect(coordinator.sources).toEqual(["scheduled"]);
    expect(outcome).toEqual({
      status: "completed",
      runId: "run-1",
      succeeded: 2,
      failed: 1,
    });
  });

  it("completes the job as skipped when a run is already in progress", async () => {
    const rejection: TriggerError = {
      code: "already_running",
      message: "Ingestion run run-0 is already in progress.",
      activeRunId: "run-0",
      activeSince: startedAt,
    };

    const outcome = await createRefreshProcessor(
      coordinatorReturning(err(rejection)),
      silentLogger,
    )("job-2");

    expect(outcome).toEqual({ status: "skipped", activeRunId: "run-0" });
  });

  it("completes the job with the failure reason instead of retrying", async () => {
    const failure: TriggerError = {
      code: "run_failed",
      message: "Ingestion run run-3 failed: connection refused",
      runId: "run-3",
    };

    const outcome = await createRefreshProcessor(
      coordinatorReturning(err(failure)),
      silentLogger,
    )();

    expect(outcome).toEqual({
      status: "failed",
      runId: "run-3",
      reason: "Ingestion run run-3 failed: connection refused",
    });
  });
});
