import type { Result } from "../errors.js";

export interface PackageRequest {
  readonly bucketName: string;
  readonly packageName: string;
  readonly runtime: string;
  readonly architecture: string;
}

export interface ResolvedVersion {
  readonly name: string;
  readonly version: string;
}

export interface PublishedLocation {
  readonly bucket: string;
  readonly key: string;
  /** Full address, e.g. s3://bucket/key. */
  readonly location: string;
}

export interface IdentityRecord {
  readonly packageName: string;
  readonly importName: string;
  readonly version: string;
  readonly runtime: string;
  readonly architecture: string;
  readonly location: PublishedLocation;
}

export interface Artifact {
  readonly path: string;
  readonly fileName: string;
}

export interface BuilderResponseData {
  readonly S3Location: string;
  readonly S3Bucket: string;
  readonly S3Key: string;
  readonly PackageName: string;
  readonly PackageVersion: string;
  readonly PackageImportName: string;
  readonly CompatibleRuntimes: string;
  readonly CompatibleArchitectures: string;
  readonly [field: string]: string;
}

export interface RegistryClient {
  resolveLatest(name: string): Promise<ResolvedVersion>;
}

export interface PackageInstaller {
  install(
    name: string,
    version: string,
    targetDir: string,
  ): Promise<Result<void>>;
}

export interface ObjectStore {
  put(
    bucket: string,
    key: string,
    filePath: string,
  ): Promise<PublishedLocation>;
}
