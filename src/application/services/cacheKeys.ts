import { createHash } from "node:crypto";
import type { ProductType } from "../../core/entities/document";
import type { SearchRequest } from "../../core/ports/inboundPorts";

export type NormalizedSearch = {
  productType: ProductType | null;
  query: string | null;
  page: number;
  limit: number;
};

/**
 * Collapses whitespace and case so equivalent search texts share one cache slot and one store query.
 */
export const normalizeQueryText = (query: string | undefined): string | null => {
  const normalized = query?.replace(/\s+/g, " ").trim().toLowerCase() ?? "";
  return normalized.length > 0 ? normalized : null;
};

export const normalizeSearch = (request: SearchRequest): NormalizedSearch => ({
  productType: request.productType ?? null,
  query: normalizeQueryText(request.query),
  page: request.page,
  limit: request.limit,
});

const digest = (parts: ReadonlyArray<string | number | null>): string =>
  createHash("sha256").update(JSON.stringify(parts)).digest("hex");

/**
 * Derives cache keys from a SHA-256 over the JSON-encoded parameter tuple, so distinct parameter sets
 * cannot alias through delimiter characters inside user-supplied text.
 */
export class CacheKeys {
  constructor(readonly namespace: string) {}

  get prefix(): string {
    return `${this.namespace}:`;
  }

  search(search: NormalizedSearch): string {
    return `${this.prefix}search:${digest([
      "search",
      search.productType,
      search.query,
      search.page,
      search.limit,
    ])}`;
  }

  document(id: string): string {
    return `${this.prefix}document:${digest(["document", id])}`;
  }
}
