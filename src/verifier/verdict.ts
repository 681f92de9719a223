import type { ResourceProperties } from "../protocol/types.js";
import { readProperty } from "../protocol/event.js";
import type {
  ExpectedIdentity,
  LoadResult,
  ObservedIdentity,
  Verdict,
  VerifierResponseData,
} from "./types.js";

export const NOT_AVAILABLE = "N/A";
export const INSTALLED = "INSTALLED";
export const NOT_INSTALLED = "NOT INSTALLED";
export const VERSION_NOT_FOUND = "Version Not Found";

const MACHINE_ALIASES: Readonly<Record<string, string>> = {
  aarch64: "arm64",
};

/** Absent expectations become N/A and surface as a mismatch. */
export function readExpectations(
  properties: ResourceProperties,
): ExpectedIdentity {
  const read = (key: string): string =>
    readProperty(properties, key) ?? NOT_AVAILABLE;
  return {
    packageName: read("PackageName"),
    importName: read("PackageImportName"),
    version: read("PackageVersion"),
    runtime: read("Runtime"),
    architecture: read("Architecture"),
  };
}

export function normalizeArchitecture(machine: string): string {
  return MACHINE_ALIASES[machine] ?? machine;
}

export function installedVersion(module: LoadResult): string {
  if (!module.loaded) {
    return NOT_INSTALLED;
  }
  return module.version ?? VERSION_NOT_FOUND;
}

export function computeVerdict(
  expected: ExpectedIdentity,
  observed: ObservedIdentity,
): Verdict {
  const version = installedVersion(observed.module);
  const passed =
    observed.module.loaded &&
    version === expected.version &&
    observed.runtime === expected.runtime &&
    observed.architecture === expected.architecture;

  return {
    status: passed ? "SUCCESS" : "FAILED",
    message: formatVerdictMessage(expected, observed),
    testPackage: expected.packageName,
    testPackageVersion: version,
    testRuntime: observed.runtime,
    testArchitecture: observed.architecture,
  };
}

/** Target and current value of every dimension, whichever of them failed. */
export function formatVerdictMessage(
  expected: ExpectedIdentity,
  observed: ObservedIdentity,
): string {
  const status = observed.module.loaded ? INSTALLED : NOT_INSTALLED;
  return [
    `Installation: Target: ${expected.packageName}, Current: ${status}.`,
    `Version: Target: ${expected.version}, Current: ${installedVersion(observed.module)}.`,
    `Runtime: Target: ${expected.runtime}, Current: ${observed.runtime}.`,
    `Architecture: Target: ${expected.architecture}, Current: ${observed.architecture}.`,
  ]
    .map((part) => `${part} `)
    .join("");
}

export function failedVerdict(message: string): Verdict {
  return {
    status: "FAILED",
    message,
    testPackage: "",
    testPackageVersion: "",
    testRuntime: "",
    testArchitecture: "",
  };
}

export function emptyVerifierResponse(): VerifierResponseData {
  return {
    Status: "",
    Message: "",
    TestPackage: "",
    TestPackageVersion: "",
    TestRuntime: "",
    TestArchitecture: "",
  };
}

export function toVerifierResponse(verdict: Verdict): VerifierResponseData {
  return {
    Status: verdict.status,
    Message: verdict.message,
    TestPackage: verdict.testPackage,
    TestPackageVersion: verdict.testPackageVersion,
    TestRuntime: verdict.testRuntime,
    TestArchitecture: verdict.testArchitecture,
  };
}
