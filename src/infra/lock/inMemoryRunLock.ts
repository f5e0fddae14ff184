import type { ActiveRun } from "../../core/entities/ingestion";
import type {
  RunLockAcquisition,
  RunLockPort,
} from "../../core/ports/outboundPorts";

/**
 * Process-local run lock. Coordinators that share one instance exclude each other.
 */
export class InMemoryRunLock implements RunLockPort {
  private holder: ActiveRun | null = null;

  async acquire(run: ActiveRun): Promise<RunLockAcquisition> {
    if (this.holder) {
      return { acquired: false, holder: { ...this.holder } };
    }

    this.holder = { ...run };
    return {
      acquired: true,
      lease: {
        release: async () => {
          if (this.holder?.runId === run.runId) {
            this.holder = null;
          }
        },
      },
    };
  }

  current(): ActiveRun | null {
    return this.holder ? { ...this.holder } : null;
  }
}
