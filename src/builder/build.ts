import { StagingError, errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import {
  archiveFileName,
  deriveImportName,
  formatList,
  layerKey,
} from "./naming.js";
import {
  createArchive,
  removeArtifact,
  stageLayer,
  type ZipWriter,
} from "./staging.js";
import type {
  Artifact,
  BuilderResponseData,
  IdentityRecord,
  ObjectStore,
  PackageInstaller,
  PackageRequest,
  PublishedLocation,
  RegistryClient,
  ResolvedVersion,
} from "./types.js";
import { acquireWorkDir, type WorkDir } from "./workdir.js";

export interface BuildDependencies {
  readonly registry: RegistryClient;
  readonly installer: PackageInstaller;
  readonly store: ObjectStore;
  /** Ephemeral root shared with other invocations in the same sandbox. */
  readonly workRoot: string;
  readonly logger: Logger;
  readonly writeZip?: ZipWriter;
}

/**
 * Resolve, stage, archive and publish one layer. The staging tree and the
 * local archive are gone when this returns or throws.
 */
export async function buildLayer(
  request: PackageRequest,
  deps: BuildDependencies,
): Promise<IdentityRecord> {
  const { logger } = deps;
  const resolved = await deps.registry.resolveLatest(request.packageName);
  const importName = deriveImportName(request.packageName);
  logger.info("Resolved package", {
    packageName: resolved.name,
    version: resolved.version,
    importName,
  });

  const workDir = await acquireWorkDir(deps.workRoot);
  try {
    const artifact = await packageLayer(workDir, request, resolved, deps);
    logger.info("Layer package created", { archive: artifact.path });

    const key = layerKey(
      request.runtime,
      request.architecture,
      request.packageName,
    );
    logger.info("Uploading layer package", {
      bucket: request.bucketName,
      key,
    });
    let location: PublishedLocation;
    try {
      location = await deps.store.put(request.bucketName, key, artifact.path);
    } finally {
      await discardArtifact(artifact, logger);
    }

    return {
      packageName: request.packageName,
      importName,
      version: resolved.version,
      runtime: request.runtime,
      architecture: request.architecture,
      location,
    };
  } finally {
    await workDir.dispose();
  }
}

// A cleanup fault must not mask the upload outcome; dispose still removes
// the whole work directory afterwards.
async function discardArtifact(
  artifact: Artifact,
  logger: Logger,
): Promise<void> {
  try {
    if (await removeArtifact(artifact)) {
      logger.info("Cleaned up local archive", { archive: artifact.path });
    }
  } catch (error) {
    logger.warn("Unable to remove local archive", {
      archive: artifact.path,
      error: errorMessage(error),
    });
  }
}

async function packageLayer(
  workDir: WorkDir,
  request: PackageRequest,
  resolved: ResolvedVersion,
  deps: BuildDependencies,
): Promise<Artifact> {
  try {
    await stageLayer(workDir, request.runtime, resolved, deps.installer);
    return await createArchive(
      workDir,
      archiveFileName(request.packageName, request.runtime, resolved.version),
      deps.writeZip,
    );
  } catch (error) {
    throw new StagingError(
      `Layer package creation failed: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}

export function emptyBuilderResponse(): BuilderResponseData {
  return {
    S3Location: "",
    S3Bucket: "",
    S3Key: "",
    PackageName: "",
    PackageVersion: "",
    PackageImportName: "",
    CompatibleRuntimes: "",
    CompatibleArchitectures: "",
  };
}

export function toBuilderResponse(
  identity: IdentityRecord,
): BuilderResponseData {
  return {
    S3Location: identity.location.location,
    S3Bucket: identity.location.bucket,
    S3Key: identity.location.key,
    PackageName: identity.packageName,
    PackageVersion: identity.version,
    PackageImportName: identity.importName,
    CompatibleRuntimes: formatList([identity.runtime]),
    CompatibleArchitectures: formatList([identity.architecture]),
  };
}
