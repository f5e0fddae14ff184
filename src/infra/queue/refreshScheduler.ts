import { Queue, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type { RefreshTriggerPort } from "../../core/ports/inboundPorts";
import type { Logger } from "../../shared/logger/logger";

/**
 * Uses a hyphen-only queue name because BullMQ uses colon as an internal Redis key separator.
 */
export const refreshQueueName = "docs-refresh";

const schedulerId = "daily-catalog-refresh";

export type RefreshJobData = {
  requestedBy: "scheduler";
};

export type RefreshJobOutcome =
  | { status: "completed"; runId: string; succeeded: number; failed: number }
  | { status: "skipped"; activeRunId: string }
  | { status: "failed"; runId: string; reason: string };

export type RefreshScheduleOptions = {
  pattern: string;
  timezone: string;
};

export const refreshJobOptions = {
  attempts: 1,
  removeOnComplete: 50,
  removeOnFail: 50,
} as const;

/**
 * Maps coordinator outcomes onto job results. Rejected and failed triggers still complete the job;
 * the next scheduled tick is the retry.
 */
export const createRefreshProcessor =
  (coordinator: RefreshTriggerPort, logger: Logger) =>
  async (jobId?: string): Promise<RefreshJobOutcome> => {
    const result = await coordinator.trigger("scheduled");

    if (result.isOk()) {
      const { report } = result.value;
      logger.info(
        {
          jobId,
          runId: report.runId,
          succeeded: report.succeeded,
          failed: report.failed.length,
        },
        "Scheduled refresh completed",
      );
      return {
        status: "completed",
        runId: report.runId,
        succeeded: report.succeeded,
        failed: report.failed.length,
      };
    }

    const error = result.error;
    if (error.code === "already_running") {
      logger.warn(
        { jobId, activeRunId: error.activeRunId },
        "Scheduled refresh skipped; a run is already in progress",
      );
      return { status: "skipped", activeRunId: error.activeRunId };
    }

    logger.error(
      { jobId, runId: error.runId, reason: error.message },
      "Scheduled refresh failed",
    );
    return { status: "failed", runId: error.runId, reason: error.message };
  };

/**
 * Owns the BullMQ queue and worker that fire the daily refresh into the coordinator.
 */
export class RefreshScheduler {
  private readonly queue: Queue<RefreshJobData, RefreshJobOutcome>;
  private worker: Worker<RefreshJobData, RefreshJobOutcome> | null = null;

  constructor(
    private readonly connection: RedisOptions,
    private readonly coordinator: RefreshTriggerPort,
    private readonly logger: Logger,
  ) {
    this.queue = new Queue<RefreshJobData, RefreshJobOutcome>(refreshQueueName, {
      connection: this.connection,
    });
  }

  /**
   * Upserts the cron schedule and starts a single-concurrency worker. Calling it again replaces the schedule.
   */
  async start(schedule: RefreshScheduleOptions): Promise<void> {
    await this.queue.upsertJobScheduler(
      schedulerId,
      { pattern: schedule.pattern, tz: schedule.timezone },
      {
        name: "refresh",
        data: { requestedBy: "scheduler" },
        opts: refreshJobOptions,
      },
    );

    if (this.worker) {
      return;
    }

    const processor = createRefreshProcessor(this.coordinator, this.logger);
    this.worker = new Worker<RefreshJobData, RefreshJobOutcome>(
      refreshQueueName,
      async (job) => processor(job.id),
      { connection: this.connection, concurrency: 1 },
    );
    this.worker.on("failed", (job, error) => {
      this.logger.error(
        { jobId: job?.id, error: error.message },
        "Refresh job failed",
      );
    });

    this.logger.info(
      { pattern: schedule.pattern, timezone: schedule.timezone },
      "Refresh scheduler online",
    );
  }

  /**
   * Next fire time of the daily schedule, or null before `start` has registered it.
   */
  async nextRunAt(): Promise<Date | null> {
    const scheduler = await this.queue.getJobScheduler(schedulerId);
    return scheduler?.next ? new Date(scheduler.next) : null;
  }

  async close(): Promise<void> {
    await this.worker?.close();
    await this.queue.close();
  }
}
