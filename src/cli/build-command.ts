import { loadCatalog } from "../catalog/catalog-loader.js";
import { createBuilderHandler } from "../builder/handler.js";
import { createPipInstaller } from "../builder/installer.js";
import {
  createLocalObjectStore,
  resolveStoreDir,
  type LocalObjectStore,
} from "../builder/local-store.js";
import {
  createS3ObjectStore,
  sharedS3Client,
} from "../builder/object-store.js";
import { createRegistryClient } from "../builder/registry-client.js";
import type {
  ObjectStore,
  PackageInstaller,
  RegistryClient,
} from "../builder/types.js";
import type { LayerproofConfig } from "../config/config.js";
import type { Logger } from "../logging/logger.js";
import { createRecordingTransport } from "../protocol/recording-transport.js";
import type { ReportFormat } from "../report/types.js";
import { LOCAL_LOG_STREAM, synthesizeEvent } from "./events.js";
import { renderResult, type CommandResult } from "./output.js";

export interface BuildOptions {
  readonly packageName: string;
  readonly runtime: string;
  readonly architecture: string;
  readonly bucket?: string;
  /** Publish into a local directory store instead of Amazon S3. */
  readonly storeDir?: string;
  readonly format: ReportFormat;
}

export interface BuildCollaborators {
  readonly registry?: RegistryClient;
  readonly installer?: PackageInstaller;
  readonly store?: ObjectStore;
}

const LOCAL_BUCKET = "local";

export async function runBuildCommand(
  options: BuildOptions,
  config: LayerproofConfig,
  logger: Logger,
  toolVersion: string,
  collaborators: BuildCollaborators = {},
): Promise<CommandResult> {
  const bucket =
    options.bucket ?? (options.storeDir ? LOCAL_BUCKET : undefined);
  const transport = createRecordingTransport();
  const localStore =
    collaborators.store === undefined && options.storeDir !== undefined
      ? createLocalObjectStore(resolveStoreDir(options.storeDir))
      : undefined;
  const handler = createBuilderHandler({
    loadCatalog: () => loadCatalog(config.catalogPath),
    registry:
      collaborators.registry ??
      createRegistryClient({ baseUrl: config.registryUrl }),
    installer:
      collaborators.installer ??
      createPipInstaller({ pythonExecutable: config.pythonExecutable }),
    store:
      collaborators.store ??
      localStore ??
      createS3ObjectStore(sharedS3Client()),
    transport,
    workRoot: config.workRoot,
    logger,
  });

  const event = synthesizeEvent("LayerBuilder", {
    BucketName: bucket,
    PackageName: options.packageName,
    Runtime: options.runtime,
    Architecture: options.architecture,
  });
  const data = await handler(event, { logStreamName: LOCAL_LOG_STREAM });
  if (localStore && data.S3Key) {
    await logLocalVersions(localStore, data.S3Bucket, data.S3Key, logger);
  }
  return renderResult("builder", transport.last(), options.format, toolVersion);
}

async function logLocalVersions(
  store: LocalObjectStore,
  bucket: string,
  key: string,
  logger: Logger,
): Promise<void> {
  const versions = await store.listVersions(bucket, key);
  logger.info("Local store updated", {
    current: await store.resolveCurrent(bucket, key),
    versions: versions.map((entry) => entry.id),
  });
}
