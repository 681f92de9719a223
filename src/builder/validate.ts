import type { Catalog } from "../catalog/types.js";
import { InputError } from "../errors.js";
import { readProperty } from "../protocol/event.js";
import type { ResourceProperties } from "../protocol/types.js";
import type { PackageRequest } from "./types.js";

const REQUIRED_PROPERTIES = [
  "BucketName",
  "PackageName",
  "Runtime",
  "Architecture",
] as const;

type RequiredProperty = (typeof REQUIRED_PROPERTIES)[number];

export function validateBuildRequest(
  properties: ResourceProperties,
  catalog: Catalog,
): PackageRequest {
  const values = new Map<RequiredProperty, string>();
  const missing: RequiredProperty[] = [];
  for (const key of REQUIRED_PROPERTIES) {
    const value = readProperty(properties, key);
    if (value === undefined) {
      missing.push(key);
    } else {
      values.set(key, value);
    }
  }
  if (missing.length > 0) {
    throw new InputError(`Missing required properties: ${missing.join(", ")}`);
  }

  const request: PackageRequest = {
    bucketName: values.get("BucketName") ?? "",
    packageName: values.get("PackageName") ?? "",
    runtime: values.get("Runtime") ?? "",
    architecture: values.get("Architecture") ?? "",
  };

  if (!catalog.packages.includes(request.packageName)) {
    throw new InputError(
      `Package '${request.packageName}' is not supported. Supported packages: ${sorted(catalog.packages).join(", ")}`,
    );
  }
  if (!catalog.runtimes.includes(request.runtime)) {
    throw new InputError(
      `Runtime '${request.runtime}' is not supported. Supported runtimes: ${catalog.runtimes.join(", ")}`,
    );
  }
  if (!catalog.architectures.includes(request.architecture)) {
    throw new InputError(
      `Architecture '${request.architecture}' is not supported. Supported architectures: ${catalog.architectures.join(", ")}`,
    );
  }

  return request;
}

function sorted(values: readonly string[]): string[] {
  return [...values].sort();
}
