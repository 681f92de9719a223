import os from "node:os";
import path from "node:path";
import { bundledCatalogPath } from "../catalog/catalog-loader.js";
import { isLogLevel, type LogLevel } from "../logging/logger.js";

export interface LayerproofConfig {
  /** Ephemeral root that holds staging trees and archives. */
  readonly workRoot: string;
  readonly pythonExecutable: string;
  readonly registryUrl: string;
  /** Mount point of attached layers in the verifier's execution context. */
  readonly layerRoot: string;
  readonly catalogPath: string;
  readonly logLevel: LogLevel;
}

export type Environment = Readonly<Record<string, string | undefined>>;

const DEFAULT_REGISTRY_URL = "https://pypi.org/pypi";
const DEFAULT_LAYER_ROOT = "/opt";
const DEFAULT_PYTHON = "python3";

export function loadConfig(env: Environment = process.env): LayerproofConfig {
  const logLevel = (env.LAYERPROOF_LOG_LEVEL ?? "info").toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new Error(
      `LAYERPROOF_LOG_LEVEL must be one of debug, info, warn, error (got '${logLevel}')`,
    );
  }

  return Object.freeze({
    workRoot: resolvePath(env.LAYERPROOF_WORK_ROOT, os.tmpdir()),
    pythonExecutable: nonEmpty(env.LAYERPROOF_PYTHON) ?? DEFAULT_PYTHON,
    registryUrl: (
      nonEmpty(env.LAYERPROOF_REGISTRY_URL) ?? DEFAULT_REGISTRY_URL
    ).replace(/\/+$/, ""),
    layerRoot: resolvePath(env.LAYERPROOF_LAYER_ROOT, DEFAULT_LAYER_ROOT),
    catalogPath: resolvePath(env.LAYERPROOF_CATALOG, bundledCatalogPath()),
    logLevel,
  });
}

function resolvePath(value: string | undefined, fallback: string): string {
  const chosen = nonEmpty(value);
  if (!chosen) {
    return fallback;
  }
  if (chosen.includes("~")) {
    throw new Error(`Paths must not include '~': ${chosen}`);
  }
  return path.resolve(chosen);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
