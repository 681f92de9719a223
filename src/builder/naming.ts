/** aws-xray-sdk -> aws_xray_sdk */
export function deriveImportName(packageName: string): string {
  return packageName.replaceAll("-", "_");
}

/**
 * Store key for a layer. Independent of the package version so that a
 * rebuild overwrites the previous object instead of adding a key.
 */
export function layerKey(
  runtime: string,
  architecture: string,
  packageName: string,
): string {
  const runtimeId = runtime.replaceAll(".", "").toLowerCase();
  return `${runtimeId}-${architecture}-${packageName}.zip`;
}

export function archiveFileName(
  packageName: string,
  runtime: string,
  version: string,
): string {
  return `${packageName}-${runtime}-${version}.zip`;
}

export function formatList(values: readonly string[]): string {
  return `[${values.map((value) => `'${value}'`).join(", ")}]`;
}

export function storeLocation(bucket: string, key: string): string {
  return `s3://${bucket}/${key}`;
}
