import { readFileSync } from "node:fs";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { CatalogError } from "../../core/entities/appError";
import {
  isProductType,
  productTypes,
  type ProductType,
} from "../../core/entities/document";
import type { Catalog, CatalogEntry } from "../../core/entities/ingestion";

const rawCatalogSchema = z.record(z.string(), z.array(z.string()));

const invalidCatalog = (issues: string[]): CatalogError => ({
  code: "invalid_catalog",
  message: `Catalog rejected: ${issues.join("; ")}`,
  issues,
});

const normalizeUrl = (raw: string): string | null => {
  try {
    const parsed = new URL(raw.trim());
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return null;
    }
    parsed.hash = "";
    return parsed.toString();
  } catch {
    return null;
  }
};

/**
 * Validates a decoded catalog document. Product-type keys must belong to the closed set and every URL must be
 * an absolute http(s) URL that appears once across the whole catalog after normalization.
 */
export const parseCatalog = (raw: unknown): Result<Catalog, CatalogError> => {
  const parsed = rawCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      invalidCatalog(
        parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
        ),
      ),
    );
  }

  const issues: string[] = [];
  const catalog: Record<ProductType, string[]> = {
    GPU: [],
    TRANSCEIVER: [],
    CABLING: [],
    NETWORK_CARD: [],
    SOFTWARE: [],
  };
  const firstSeenUnder = new Map<string, ProductType>();

  for (const [key, urls] of Object.entries(parsed.data)) {
    if (!isProductType(key)) {
      issues.push(
        `unknown product type '${key}' (expected one of ${productTypes.join(", ")})`,
      );
      continue;
    }

    for (const rawUrl of urls) {
      const url = normalizeUrl(rawUrl);
      if (!url) {
        issues.push(`${key}: '${rawUrl}' is not an absolute http(s) URL`);
        continue;
      }

      const previous = firstSeenUnder.get(url);
      if (previous) {
        issues.push(`duplicate URL '${url}' under ${previous} and ${key}`);
        continue;
      }

      firstSeenUnder.set(url, key);
      catalog[key].push(url);
    }
  }

  if (issues.length > 0) {
    return err(invalidCatalog(issues));
  }

  return ok(catalog);
};

/**
 * Reads and validates the catalog file once at startup.
 */
export const loadCatalog = (path: string): Result<Catalog, CatalogError> => {
  let decoded: unknown;
  try {
    decoded = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    return err(
      invalidCatalog([
        `cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`,
      ]),
    );
  }

  return parseCatalog(decoded);
};

export const catalogEntries = (catalog: Catalog): CatalogEntry[] =>
  productTypes.flatMap((productType) =>
    catalog[productType].map((url) => ({ productType, url })),
  );
