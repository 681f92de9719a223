import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  bundledCatalogPath,
  loadCatalog,
  parseCatalog,
} from "../../src/catalog/catalog-loader.js";

describe("catalog", () => {
  it("loads the bundled catalog", async () => {
    const catalog = await loadCatalog(bundledCatalogPath());

    expect(catalog.version).toBe("1");
    expect(catalog.packages).toContain("boto3");
    expect(catalog.packages).toContain("aws-lambda-powertools");
    expect(catalog.architectures).toEqual(["x86_64", "arm64"]);
    expect(catalog.runtimes).toContain("python3.13");
  });

  it("loads a catalog from disk", async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "layerproof-"));
    const catalogPath = path.join(tempDir, "catalog.yaml");
    await fs.writeFile(
      catalogPath,
      [
        'catalog_version: "2"',
        "packages: [requests]",
        "runtimes: [python3.12]",
        "architectures: [x86_64]",
      ].join("\n"),
      "utf8",
    );

    expect(await loadCatalog(catalogPath)).toEqual({
      version: "2",
      packages: ["requests"],
      runtimes: ["python3.12"],
      architectures: ["x86_64"],
    });
  });

  it("reports a missing file", async () => {
    await expect(loadCatalog("/nonexistent/catalog.yaml")).rejects.toThrow(
      "Unable to read catalog: /nonexistent/catalog.yaml",
    );
  });

  it("collects every problem in one error", () => {
    expect(() =>
      parseCatalog(
        {
          catalog_version: 1,
          packages: ["boto3", "boto3"],
          runtimes: ["python3.13", "nodejs20.x"],
          architectures: [],
          extra: true,
        },
        "test.yaml",
      ),
    ).toThrow(
      "Invalid catalog test.yaml: unknown key 'extra'; catalog_version must be a non-empty string; packages: duplicate entry 'boto3'; architectures must be a non-empty list; runtimes: 'nodejs20.x' is not a python3.x identifier",
    );
  });

  it("rejects documents that are not mappings", () => {
    expect(() => parseCatalog(["boto3"])).toThrow(
      "Invalid catalog: catalog must be a mapping",
    );
  });

  it("rejects blank entries", () => {
    expect(() =>
      parseCatalog({
        catalog_version: "1",
        packages: ["boto3", " "],
        runtimes: ["python3.13"],
        architectures: ["arm64"],
      }),
    ).toThrow("Invalid catalog catalog: packages entries must be non-empty strings");
  });
});
