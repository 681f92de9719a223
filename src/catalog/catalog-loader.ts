import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import type { Catalog } from "./types.js";

const CATALOG_KEYS = new Set([
  "catalog_version",
  "packages",
  "runtimes",
  "architectures",
]);

const RUNTIME_PATTERN = /^python3\.\d+$/;

export function bundledCatalogPath(): string {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(moduleDir, "..", "..", "catalog", "catalog.yaml");
}

export async function loadCatalog(catalogPath: string): Promise<Catalog> {
  let raw: string;
  try {
    raw = await fs.readFile(catalogPath, "utf8");
  } catch (error) {
    throw new Error(`Unable to read catalog: ${catalogPath}`, {
      cause: error,
    });
  }
  return parseCatalog(yaml.load(raw), catalogPath);
}

/**
 * Validate a parsed catalog document. Every problem is collected before
 * throwing so a broken catalog is fixed in one pass.
 */
export function parseCatalog(doc: unknown, source = "catalog"): Catalog {
  const errors: string[] = [];
  if (!isRecord(doc)) {
    throw new Error(`Invalid catalog: ${source} must be a mapping`);
  }

  for (const key of Object.keys(doc)) {
    if (!CATALOG_KEYS.has(key)) {
      errors.push(`unknown key '${key}'`);
    }
  }

  const version = doc.catalog_version;
  if (typeof version !== "string" || version.length === 0) {
    errors.push("catalog_version must be a non-empty string");
  }

  const packages = parseNameList(doc.packages, "packages", errors);
  const runtimes = parseNameList(doc.runtimes, "runtimes", errors);
  const architectures = parseNameList(
    doc.architectures,
    "architectures",
    errors,
  );

  for (const runtime of runtimes) {
    if (!RUNTIME_PATTERN.test(runtime)) {
      errors.push(`runtimes: '${runtime}' is not a python3.x identifier`);
    }
  }

  if (errors.length > 0) {
    throw new Error(`Invalid catalog ${source}: ${errors.join("; ")}`);
  }

  return {
    version: typeof version === "string" ? version : "",
    packages,
    runtimes,
    architectures,
  };
}

function parseNameList(
  input: unknown,
  field: string,
  errors: string[],
): string[] {
  if (!Array.isArray(input) || input.length === 0) {
    errors.push(`${field} must be a non-empty list`);
    return [];
  }
  const names: string[] = [];
  const seen = new Set<string>();
  for (const entry of input) {
    if (typeof entry !== "string" || entry.trim().length === 0) {
      errors.push(`${field} entries must be non-empty strings`);
      continue;
    }
    if (seen.has(entry)) {
      errors.push(`${field}: duplicate entry '${entry}'`);
      continue;
    }
    seen.add(entry);
    names.push(entry);
  }
  return names;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
