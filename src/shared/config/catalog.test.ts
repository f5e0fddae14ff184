import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { catalogEntries, loadCatalog, parseCatalog } from "./catalog";

describe("parseCatalog", () => {
  it("accepts known product types and fills missing ones with empty lists", () => {
    const catalog = parseCatalog({
      GPU: ["https://docs.example.test/gpu/h100", "https://docs.example.test/gpu/l4"],
      SOFTWARE: ["https://docs.example.test/software/cuda#install"],
    })._unsafeUnwrap();

    expect(catalog).toEqual({
      GPU: ["https://docs.example.test/gpu/h100", "https://docs.example.test/gpu/l4"],
      TRANSCEIVER: [],
      CABLING: [],
      NETWORK_CARD: [],
      SOFTWARE: ["https://docs.example.test/software/cuda"],
    });
  });

  it("rejects URLs that appear twice after normalization", () => {
    const result = parseCatalog({
      GPU: ["https://Docs.Example.test/shared"],
      CABLING: ["https://docs.example.test/shared"],
    });

    expect(result._unsafeUnwrapErr().issues).toEqual([
      "duplicate URL 'https://docs.example.test/shared' under GPU and CABLING",
    ]);
  });

  it("rejects unknown product types", () => {
    const result = parseCatalog({
      GPU: [],
      SWITCH: ["https://docs.example.test/switch"],
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      code: "invalid_catalog",
      message:
        "Catalog rejected: unknown product type 'SWITCH' (expected one of GPU, TRANSCEIVER, CABLING, NETWORK_CARD, SOFTWARE)",
      issues: [
        "unknown product type 'SWITCH' (expected one of GPU, TRANSCEIVER, CABLING, NETWORK_CARD, SOFTWARE)",
      ],
    });
  });

  it("rejects relative and non-http URLs", () => {
    const result = parseCatalog({
      GPU: ["/gpu/h100", "ftp://docs.example.test/gpu"],
    });

    expect(result._unsafeUnwrapErr().issues).toEqual([
      "GPU: '/gpu/h100' is not an absolute http(s) URL",
      "GPU: 'ftp://docs.example.test/gpu' is not an absolute http(s) URL",
    ]);
  });

  it("rejects documents of the wrong shape", () => {
    const result = parseCatalog({ GPU: "https://docs.example.test/gpu" });

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().issues[0]).toMatch(/^GPU: /);
  });
});

describe("loadCatalog", () => {
  it("reads a catalog file", () => {
    const dir = mkdtempSync(join(tmpdir(), "catalog-"));
    const path = join(dir, "catalog.json");
    writeFileSync(
      path,
      JSON.stringify({ NETWORK_CARD: ["https://docs.example.test/nic/cx7"] }),
    );

    const catalog = loadCatalog(path)._unsafeUnwrap();

    expect(catalogEntries(catalog)).toEqual([
      { productType: "NETWORK_CARD", url: "https://docs.example.test/nic/cx7" },
    ]);
  });

  it("reports unreadable files as invalid catalogs", () => {
    const result = loadCatalog(join(tmpdir(), "missing-catalog-file.json"));

    expect(result._unsafeUnwrapErr().code).toBe("invalid_catalog");
  });
});

describe("catalogEntries", () => {
  it("flattens in product type order", () => {
    const catalog = parseCatalog({
      SOFTWARE: ["https://docs.example.test/software/a"],
      GPU: ["https://docs.example.test/gpu/a"],
    })._unsafeUnwrap();

    expect(catalogEntries(catalog).map((entry) => entry.productType)).toEqual([
      "GPU",
      "SOFTWARE",
    ]);
  });
});
