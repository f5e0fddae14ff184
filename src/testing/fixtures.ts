import pino from "pino";
import type {
  DocumentDraft,
  ProductType,
} from "../core/entities/document";
import type { Catalog } from "../core/entities/ingestion";
import type {
  ClockPort,
  IdGeneratorPort,
} from "../core/ports/outboundPorts";

export const silentLogger = pino({ level: "silent" });

/**
 * Produces valid UUIDs in a predictable sequence: ...-000000000001, ...-000000000002.
 */
export const sequentialIds = (): IdGeneratorPort => {
  let counter = 0;
  return {
    next: () => {
      counter += 1;
      return `00000000-0000-4000-8000-${String(counter).padStart(12, "0")}`;
    },
  };
};

export class ManualClock implements ClockPort {
  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export const catalogOf = (
  entries: Partial<Record<ProductType, string[]>>,
): Catalog => ({
  GPU: entries.GPU ?? [],
  TRANSCEIVER: entries.TRANSCEIVER ?? [],
  CABLING: entries.CABLING ?? [],
  NETWORK_CARD: entries.NETWORK_CARD ?? [],
  SOFTWARE: entries.SOFTWARE ?? [],
});

export const draftFor = (
  sourceUrl: string,
  overrides: Partial<DocumentDraft> = {},
): DocumentDraft => ({
  productType: "GPU",
  sourceUrl,
  title: `Title for ${sourceUrl}`,
  headings: ["Overview"],
  bodyText: `Body for ${sourceUrl}`,
  fetchedAt: new Date("2026-03-01T00:00:00.000Z"),
  ...overrides,
});
