import { ok } from "neverthrow";
import { describe, expect, it, vi } from "vitest";
import type { BatchReport, Catalog } from "../../core/entities/ingestion";
import type {
  ExtractorPort,
  IngestionPipelinePort,
} from "../../core/ports/inboundPorts";
import type {
  IdGeneratorPort,
  RunLockPort,
} from "../../core/ports/outboundPorts";
import { InMemoryRunLock } from "../../infra/lock/inMemoryRunLock";
import { InMemoryDocumentStore } from "../../infra/store/inMemoryDocumentStore";
import {
  ManualClock,
  catalogOf,
  draftFor,
  sequentialIds,
  silentLogger,
} from "../../testing/fixtures";
import { IngestionPipeline } from "./ingestionPipeline";
import { RefreshCoordinator } from "./refreshCoordinator";

const catalog = catalogOf({
  GPU: ["https://docs.example.test/gpu/h100"],
  SOFTWARE: ["https://docs.example.test/software/cuda"],
});

const emptyReport = (runId: string): BatchReport => ({
  runId,
  attempted: 0,
  succeeded: 0,
  failed: [],
  created: 0,
  updated: 0,
  cacheInvalidated: true,
  startedAt: new Date("2026-03-02T02:00:00.000Z"),
  finishedAt: new Date("2026-03-02T02:00:00.000Z"),
});

const createGate = () => {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
};

describe("RefreshCoordinator", () => {
  it("rejects triggers that arrive while a run is in flight and writes one batch", async () => {
    const clock = new ManualClock(new Date("2026-03-02T02:00:00.000Z"));
    const gate = createGate();
    const extractor: ExtractorPort = {
      extract: async (url, productType) => {
        await gate.opened;
        return ok(draftFor(url, { productType }));
      },
    };
    const store = new InMemoryDocumentStore(sequentialIds());
    const upsert = vi.spyOn(store, "upsert");
    const pipeline = new IngestionPipeline(
      extractor,
      store,
      { invalidateAll: async () => true },
      clock,
      silentLogger,
      { concurrency: 2, fetchRetries: 0, retryDelayMs: 0 },
    );
    const coordinator = new RefreshCoordinator(
      pipeline,
      catalog,
      clock,
      sequentialIds(),
      new InMemoryRunLock(),
      silentLogger,
    );

    const first = coordinator.trigger("scheduled");
    const [manual, scheduled] = await Promise.all([
      coordinator.trigger("manual"),
      coordinator.trigger("scheduled"),
    ]);
    expect(coordinator.snapshot().state.status).toBe("running");
    gate.open();
    const completed = await first;

    expect(manual._unsafeUnwrapErr()).toMatchObject({
      code: "already_running",
      activeRunId: "00000000-0000-4000-8000-000000000001",
    });
    expect(scheduled._unsafeUnwrapErr().code).toBe("already_running");
    expect(completed._unsafeUnwrap().report.succeeded).toBe(2);
    expect(upsert).toHaveBeenCalledTimes(2);
    expect(coordinator.snapshot().runsStarted).toBe(1);
    expect(coordinator.snapshot().state).toEqual({ status: "idle" });
  });

  it("retains the last completed run until the next one supersedes it", async () => {
    const clock = new ManualClock(new Date("2026-03-02T02:00:00.000Z"));
    const runs: string[] = [];
    const pipeline: IngestionPipelinePort = {
      run: async (_catalog, runId) => {
        runs.push(runId);
        clock.advance(1_000);
        return emptyReport(runId);
      },
    };
    const coordinator = new RefreshCoordinator(
      pipeline,
      catalog,
      clock,
      sequentialIds(),
      new InMemoryRunLock(),
      silentLogger,
    );

    await coordinator.trigger("manual");
    const firstRun = coordinator.snapshot().lastRun;
    await coordinator.trigger("scheduled");
    const secondRun = coordinator.snapshot().lastRun;

    expect(runs).toEqual([
      "00000000-0000-4000-8000-000000000001",
      "00000000-0000-4000-8000-000000000002",
    ]);
    expect(firstRun).toEqual({
      runId: "00000000-0000-4000-8000-000000000001",
      source: "manual",
      startedAt: new Date("2026-03-02T02:00:00.000Z"),
      outcome: "completed",
      finishedAt: new Date("2026-03-02T02:00:01.000Z"),
      report: emptyReport("00000000-0000-4000-8000-000000000001"),
    });
    expect(secondRun?.runId).toBe("00000000-0000-4000-8000-000000000002");
    expect(secondRun?.source).toBe("scheduled");
  });

  it("records a thrown pipeline as a failed run and returns to idle", async () => {
    const clock = new ManualClock(new Date("2026-03-02T02:00:00.000Z"));
    let shouldFail = true;
    const pipeline: IngestionPipelinePort = {
      run: async (_catalog, runId) => {
        if (shouldFail) {
          throw new Error("document store unreachable");
        }
        return emptyReport(runId);
      },
    };
    const coordinator = new RefreshCoordinator(
      pipeline,
      catalog,
      clock,
      sequentialIds(),
      new InMemoryRunLock(),
      silentLogger,
    );

    const failed = await coordinator.trigger("scheduled");

    expect(failed._unsafeUnwrapErr()).toMatchObject({
      code: "run_failed",
      runId: "00000000-0000-4000-8000-000000000001",
      message:
        "Ingestion run 00000000-0000-4000-8000-000000000001 failed: document store unreachable",
    });
    expect(coordinator.snapshot().state).toEqual({ status: "idle" });
    expect(coordinator.snapshot().lastRun).toMatchObject({
      outcome: "failed",
      reason: "document store unreachable",
    });

    shouldFail = false;
    const retried = await coordinator.trigger("manual");

    expect(retried.isOk()).toBe(true);
    expect(coordinator.snapshot().lastRun?.outcome).toBe("completed");
  });

  it("rejects a trigger while another coordinator sharing the run lock is running", async () => {
    const clock = new ManualClock(new Date("2026-03-02T02:00:00.000Z"));
    const lock = new InMemoryRunLock();
    const gate = createGate();
    const pipelineRuns: string[] = [];
    const pipeline: IngestionPipelinePort = {
      run: async (_catalog, runId) => {
        pipelineRuns.push(runId);
        await gate.opened;
        return emptyReport(runId);
      },
    };
    const cliIds: IdGeneratorPort = {
      next: () => "00000000-0000-4000-8000-0000000000c1",
    };
    const serving = new RefreshCoordinator(
      pipeline,
      catalog,
      clock,
      sequentialIds(),
      lock,
      silentLogger,
    );
    const oneShot = new RefreshCoordinator(
      pipeline,
      catalog,
      clock,
      cliIds,
      lock,
      silentLogger,
    );

    const scheduled = serving.trigger("scheduled");
    const rejected = await oneShot.trigger("manual");

    expect(rejected._unsafeUnwrapErr()).toMatchObject({
      code: "already_running",
      activeRunId: "00000000-0000-4000-8000-000000000001",
      activeSince: new Date("2026-03-02T02:00:00.000Z"),
    });
    expect(oneShot.snapshot()).toEqual({
      state: { status: "idle" },
      lastRun: null,
      runsStarted: 0,
    });

    gate.open();
    expect((await scheduled).isOk()).toBe(true);
    const afterwards = await oneShot.trigger("manual");

    expect(afterwards.isOk()).toBe(true);
    expect(pipelineRuns).toEqual([
      "00000000-0000-4000-8000-000000000001",
      "00000000-0000-4000-8000-0000000000c1",
    ]);
    expect(lock.current()).toBeNull();
  });

  it("fails the run without starting the pipeline when the run lock is unreachable", async () => {
    const clock = new ManualClock(new Date("2026-03-02T02:00:00.000Z"));
    const run = vi.fn(async (_catalog: Catalog, runId: string) => emptyReport(runId));
    const lock: RunLockPort = {
      acquire: async () => {
        throw new Error("lock backend unreachable");
      },
    };
    const coordinator = new RefreshCoordinator(
      { run },
      catalog,
      clock,
      sequentialIds(),
      lock,
      silentLogger,
    );

    const result = await coordinator.trigger("manual");

    expect(result._unsafeUnwrapErr()).toMatchObject({
      code: "run_failed",
      message:
        "Ingestion run 00000000-0000-4000-8000-000000000001 failed: lock backend unreachable",
    });
    expect(run).not.toHaveBeenCalled();
    expect(coordinator.snapshot()).toMatchObject({
      state: { status: "idle" },
      runsStarted: 0,
      lastRun: { outcome: "failed", reason: "lock backend unreachable" },
    });
  });
});
