import fs from "node:fs/promises";
import path from "node:path";

const WORKDIR_NAME = "layerproof-build";
const SCRATCH_DIR = "site-packages";
const LAYER_DIR = "python";

/**
 * Scoped staging area under the ephemeral root. Acquiring it removes
 * whatever a previous invocation left behind; dispose removes it again.
 */
export interface WorkDir {
  readonly root: string;
  /** pip install target. */
  readonly scratchDir: string;
  /** Top-level folder of the archive. */
  readonly layerDir: string;
  runtimeDir(runtime: string): string;
  dispose(): Promise<void>;
}

export async function acquireWorkDir(ephemeralRoot: string): Promise<WorkDir> {
  const root = path.join(ephemeralRoot, WORKDIR_NAME);
  await fs.rm(root, { recursive: true, force: true });
  await fs.mkdir(root, { recursive: true });

  const layerDir = path.join(root, LAYER_DIR);
  return {
    root,
    scratchDir: path.join(root, SCRATCH_DIR),
    layerDir,
    runtimeDir: (runtime) =>
      path.join(layerDir, "lib", runtime, "site-packages"),
    dispose: async () => {
      await fs.rm(root, { recursive: true, force: true });
    },
  };
}

export function workDirPath(ephemeralRoot: string): string {
  return path.join(ephemeralRoot, WORKDIR_NAME);
}
