import os from "node:os";
import path from "node:path";
import {
  describeCommandFailure,
  execCommand,
  type CommandRunner,
} from "../exec/command.js";
import type { LoadResult, ModuleLoader, RuntimeIntrospector } from "./types.js";

const RUNTIME_SCRIPT =
  "import sys; print('python%d.%d' % sys.version_info[:2])";

// ImportError means "not installed"; any other failure exits non-zero.
const IMPORT_SCRIPT = [
  "import importlib, json, sys",
  "try:",
  "    module = importlib.import_module(sys.argv[1])",
  "except ImportError:",
  "    print(json.dumps({'loaded': False}))",
  "else:",
  "    version = getattr(module, '__version__', None)",
  "    print(json.dumps({'loaded': True, 'version': None if version is None else str(version)}))",
].join("\n");

export interface PythonProbeOptions {
  readonly pythonExecutable: string;
  /** Directory attached layers are extracted into, /opt on Lambda. */
  readonly layerRoot: string;
  readonly run?: CommandRunner;
  readonly machine?: () => string;
  readonly env?: NodeJS.ProcessEnv;
}

export type PythonProbe = RuntimeIntrospector & ModuleLoader;

/**
 * Observes the execution context through a Python interpreter, with the
 * layer's python/ and python/lib/<runtime>/site-packages on its path.
 */
export function createPythonProbe(options: PythonProbeOptions): PythonProbe {
  const run = options.run ?? execCommand;
  const machine = options.machine ?? (() => os.machine());
  const baseEnv = options.env ?? process.env;

  return {
    async runtime(): Promise<string> {
      let stdout: string;
      try {
        ({ stdout } = await run(options.pythonExecutable, [
          "-c",
          RUNTIME_SCRIPT,
        ]));
      } catch (error) {
        throw new Error(
          `Unable to query Python runtime: ${describeCommandFailure(error)}`,
          { cause: error },
        );
      }
      const runtime = stdout.trim();
      if (!/^python\d+\.\d+$/.test(runtime)) {
        throw new Error(`Unexpected Python runtime output: ${runtime}`);
      }
      return runtime;
    },

    architecture(): string {
      return machine();
    },

    async load(importName: string, runtime: string): Promise<LoadResult> {
      const env = {
        ...baseEnv,
        PYTHONPATH: layerSearchPath(
          options.layerRoot,
          runtime,
          baseEnv.PYTHONPATH,
        ),
      };
      let stdout: string;
      try {
        ({ stdout } = await run(
          options.pythonExecutable,
          ["-c", IMPORT_SCRIPT, importName],
          { env },
        ));
      } catch (error) {
        throw new Error(
          `Importing ${importName} failed: ${describeCommandFailure(error)}`,
          { cause: error },
        );
      }
      return parseLoadResult(stdout);
    },
  };
}

export function layerSearchPath(
  layerRoot: string,
  runtime: string,
  existing?: string,
): string {
  const entries = [
    path.join(layerRoot, "python"),
    path.join(layerRoot, "python", "lib", runtime, "site-packages"),
  ];
  if (existing) {
    entries.push(existing);
  }
  return entries.join(path.delimiter);
}

export function parseLoadResult(stdout: string): LoadResult {
  const lines = stdout.trim().split("\n");
  const last = lines[lines.length - 1] ?? "";
  let parsed: unknown;
  try {
    parsed = JSON.parse(last);
  } catch {
    throw new Error(`Unexpected import probe output: ${last}`);
  }
  if (
    typeof parsed !== "object" ||
    parsed === null ||
    !("loaded" in parsed) ||
    typeof parsed.loaded !== "boolean"
  ) {
    throw new Error(`Unexpected import probe output: ${last}`);
  }
  if (!parsed.loaded) {
    return { loaded: false };
  }
  const version =
    "version" in parsed && typeof parsed.version === "string"
      ? parsed.version
      : null;
  return { loaded: true, version };
}
