import fs from "node:fs/promises";
import path from "node:path";
import AdmZip from "adm-zip";
import { StagingError, errorMessage, isNotFound } from "../errors.js";
import type { Artifact, PackageInstaller, ResolvedVersion } from "./types.js";
import type { WorkDir } from "./workdir.js";

/** Writes `sourceDir` into a zip at `archivePath` under `folderName/`. */
export type ZipWriter = (
  sourceDir: string,
  folderName: string,
  archivePath: string,
) => Promise<void>;

export const admZipWriter: ZipWriter = async (
  sourceDir,
  folderName,
  archivePath,
) => {
  const zip = new AdmZip();
  zip.addLocalFolder(sourceDir, folderName);
  await zip.writeZipPromise(archivePath, { overwrite: true });
};

/**
 * Install the resolved release into the scratch target, then move it into
 * python/lib/<runtime>/site-packages. Returns the runtime-shaped path.
 */
export async function stageLayer(
  workDir: WorkDir,
  runtime: string,
  resolved: ResolvedVersion,
  installer: PackageInstaller,
): Promise<string> {
  const installed = await installer.install(
    resolved.name,
    resolved.version,
    workDir.scratchDir,
  );
  if (!installed.ok) {
    throw installed.error;
  }

  const runtimeDir = workDir.runtimeDir(runtime);
  try {
    await fs.mkdir(path.dirname(runtimeDir), { recursive: true });
    await fs.rename(workDir.scratchDir, runtimeDir);
  } catch (error) {
    throw new StagingError(
      `Unable to move ${workDir.scratchDir} to ${runtimeDir}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
  return runtimeDir;
}

/**
 * Archive the top-level python/ folder. The file is checked afterwards:
 * a writer that reports success without producing it is still a failure.
 */
export async function createArchive(
  workDir: WorkDir,
  fileName: string,
  writeZip: ZipWriter = admZipWriter,
): Promise<Artifact> {
  const archivePath = path.join(workDir.root, fileName);
  await writeZip(
    workDir.layerDir,
    path.basename(workDir.layerDir),
    archivePath,
  );

  if (!(await isFile(archivePath))) {
    throw new StagingError(`Failed to create ZIP file: ${archivePath}`);
  }
  return { path: archivePath, fileName };
}

export async function removeArtifact(artifact: Artifact): Promise<boolean> {
  try {
    await fs.rm(artifact.path);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

async function isFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile();
  } catch {
    return false;
  }
}
