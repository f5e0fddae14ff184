import type { CachePort, ClockPort } from "../../core/ports/outboundPorts";

type Entry = {
  value: string;
  expiresAt: number;
};

/**
 * Process-local TTL cache. Can be switched offline to exercise degraded read paths.
 */
export class InMemoryCache implements CachePort {
  private readonly entries = new Map<string, Entry>();
  private available = true;

  constructor(private readonly clock: ClockPort) {}

  async get(key: string): Promise<string | null> {
    this.assertAvailable();
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (entry.expiresAt <= this.clock.now().getTime()) {
      this.entries.delete(key);
      return null;
    }

    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.assertAvailable();
    this.entries.set(key, {
      value,
      expiresAt: this.clock.now().getTime() + ttlSeconds * 1_000,
    });
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    this.assertAvailable();
    let deleted = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        deleted += 1;
      }
    }
    return deleted;
  }

  isAvailable(): boolean {
    return this.available;
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  private assertAvailable(): void {
    if (!this.available) {
      throw new Error("In-memory cache is offline.");
    }
  }
}
