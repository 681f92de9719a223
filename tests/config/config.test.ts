import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { bundledCatalogPath } from "../../src/catalog/catalog-loader.js";
import { loadConfig } from "../../src/config/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      workRoot: os.tmpdir(),
      pythonExecutable: "python3",
      registryUrl: "https://pypi.org/pypi",
      layerRoot: "/opt",
      catalogPath: bundledCatalogPath(),
      logLevel: "info",
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      LAYERPROOF_WORK_ROOT: "/tmp/work",
      LAYERPROOF_PYTHON: " /usr/bin/python3.13 ",
      LAYERPROOF_REGISTRY_URL: "https://mirror.test/pypi//",
      LAYERPROOF_LAYER_ROOT: "layers",
      LAYERPROOF_CATALOG: "/etc/layerproof/catalog.yaml",
      LAYERPROOF_LOG_LEVEL: "DEBUG",
    });

    expect(config).toEqual({
      workRoot: "/tmp/work",
      pythonExecutable: "/usr/bin/python3.13",
      registryUrl: "https://mirror.test/pypi",
      layerRoot: path.resolve("layers"),
      catalogPath: "/etc/layerproof/catalog.yaml",
      logLevel: "debug",
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ LAYERPROOF_PYTHON: "  " }).pythonExecutable).toBe(
      "python3",
    );
  });

  it("rejects unknown log levels", () => {
    expect(() => loadConfig({ LAYERPROOF_LOG_LEVEL: "trace" })).toThrow(
      "LAYERPROOF_LOG_LEVEL must be one of debug, info, warn, error (got 'trace')",
    );
  });

  it("rejects home-relative paths", () => {
    expect(() => loadConfig({ LAYERPROOF_WORK_ROOT: "~/tmp" })).toThrow(
      "Paths must not include '~': ~/tmp",
    );
  });
});
