import { Redis } from "ioredis";
import { z } from "zod";
import { toErrorDetails } from "../../core/entities/appError";
import type { ActiveRun } from "../../core/entities/ingestion";
import type {
  RunLease,
  RunLockAcquisition,
  RunLockPort,
} from "../../core/ports/outboundPorts";
import type { Logger } from "../../shared/logger/logger";

const releaseScript = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
  else
    return 0
  end
`;

const extendScript = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("pexpire", KEYS[1], ARGV[2])
  else
    return 0
  end
`;

const holderSchema = z.object({
  runId: z.string().min(1),
  source: z.enum(["scheduled", "manual"]),
  startedAt: z.coerce.date(),
});

/**
 * The commands the lock needs. An ioredis client satisfies it.
 */
export type RunLockClient = {
  set(
    key: string,
    value: string,
    millisecondsToken: "PX",
    milliseconds: number,
    nx: "NX",
  ): Promise<"OK" | null>;
  get(key: string): Promise<string | null>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
};

export type RedisRunLockOptions = {
  key: string;
  ttlMs: number;
};

/**
 * Queues commands until the connection is up, unlike the fail-fast cache client.
 */
export const createRunLockClient = (url: string): Redis =>
  new Redis(url, {
    maxRetriesPerRequest: 1,
    connectTimeout: 2_000,
  });

/**
 * Cross-process run lock on a single Redis key.
 *
 * The key holds the holder's run as JSON and is written with `SET NX PX`. While a lease is held a
 * heartbeat re-arms the expiry every third of the TTL; a crashed holder's lock lapses after one TTL.
 * Release and extension compare the stored value first, so a lease never touches a lock another run took over.
 */
export class RedisRunLock implements RunLockPort {
  constructor(
    private readonly redis: RunLockClient,
    private readonly logger: Logger,
    private readonly options: RedisRunLockOptions,
  ) {}

  async acquire(run: ActiveRun): Promise<RunLockAcquisition> {
    const { key, ttlMs } = this.options;
    const value = JSON.stringify(run);

    // A second attempt covers a holder that expired between SET and GET.
    for (let attempt = 0; attempt < 2; attempt += 1) {
      const set = await this.redis.set(key, value, "PX", ttlMs, "NX");
      if (set === "OK") {
        this.logger.debug({ key, runId: run.runId }, "Run lock acquired");
        return { acquired: true, lease: this.lease(value, run.runId) };
      }

      const current = await this.redis.get(key);
      if (current !== null) {
        return { acquired: false, holder: this.parseHolder(current) };
      }
    }

    throw new Error(`Run lock '${key}' changed hands while it was being acquired.`);
  }

  private lease(value: string, runId: string): RunLease {
    const { key, ttlMs } = this.options;

    const heartbeat = setInterval(() => {
      this.redis
        .eval(extendScript, 1, key, value, String(ttlMs))
        .then((extended) => {
          if (extended !== 1) {
            this.logger.warn({ key, runId }, "Run lock lost before the run finished");
          }
        })
        .catch((error: unknown) => {
          this.logger.warn(
            { key, runId, error: toErrorDetails(error) },
            "Run lock extension failed",
          );
        });
    }, Math.max(1, Math.floor(ttlMs / 3)));
    heartbeat.unref();

    return {
      release: async () => {
        clearInterval(heartbeat);
        const released = await this.redis.eval(releaseScript, 1, key, value);
        if (released !== 1) {
          this.logger.warn({ key, runId }, "Run lock had already expired at release");
          return;
        }
        this.logger.debug({ key, runId }, "Run lock released");
      },
    };
  }

  private parseHolder(raw: string): ActiveRun {
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      decoded = undefined;
    }

    const parsed = holderSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new Error(`Run lock '${this.options.key}' holds an unreadable value.`);
    }
    return parsed.data;
  }
}
