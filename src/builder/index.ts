export {
  buildLayer,
  emptyBuilderResponse,
  toBuilderResponse,
} from "./build.js";
export type { BuildDependencies } from "./build.js";
export { createBuilderHandler } from "./handler.js";
export type { BuilderHandler, BuilderHandlerDependencies } from "./handler.js";
export { createPipInstaller, pipInstallArgs } from "./installer.js";
export { createLocalObjectStore, resolveStoreDir } from "./local-store.js";
export type { LocalObjectStore, ObjectVersionEntry } from "./local-store.js";
export {
  archiveFileName,
  deriveImportName,
  formatList,
  layerKey,
  storeLocation,
} from "./naming.js";
export { createS3ObjectStore, sharedS3Client } from "./object-store.js";
export { createRegistryClient } from "./registry-client.js";
export {
  admZipWriter,
  createArchive,
  removeArtifact,
  stageLayer,
} from "./staging.js";
export type { ZipWriter } from "./staging.js";
export type {
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
export { validateBuildRequest } from "./validate.js";
export { acquireWorkDir, workDirPath } from "./workdir.js";
export type { WorkDir } from "./workdir.js";
