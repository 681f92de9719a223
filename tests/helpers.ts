import fs from "node:fs/promises";
import path from "node:path";
import { storeLocation } from "../src/builder/naming.js";
import type {
  ObjectStore,
  PackageInstaller,
  PublishedLocation,
  RegistryClient,
} from "../src/builder/types.js";
import type { Catalog } from "../src/catalog/types.js";
import type { RequestType } from "../src/protocol/types.js";

export const LOG_STREAM = "test-log-stream";

export const testCatalog: Catalog = {
  version: "1",
  packages: [
    "boto3",
    "requests",
    "urllib3",
    "aws-lambda-powertools",
    "aws-xray-sdk",
  ],
  runtimes: ["python3.12", "python3.13"],
  architectures: ["x86_64", "arm64"],
};

export function makeEvent(
  properties: Record<string, unknown>,
  requestType: RequestType = "Create",
): Record<string, unknown> {
  return {
    RequestType: requestType,
    ResponseURL: "https://callback.test/response",
    StackId: "arn:aws:cloudformation:us-east-1:000000000000:stack/test/1",
    RequestId: "request-1",
    LogicalResourceId: "LayerResource",
    ResourceType: "Custom::Layer",
    ResourceProperties: { ServiceToken: "arn:test", ...properties },
  };
}

export interface FakeRegistry extends RegistryClient {
  readonly calls: string[];
}

export function fakeRegistry(...versions: string[]): FakeRegistry {
  const calls: string[] = [];
  let index = 0;
  return {
    calls,
    async resolveLatest(name: string) {
      calls.push(name);
      const version =
        versions[Math.min(index, versions.length - 1)] ?? "1.0.0";
      index += 1;
      return { name, version };
    },
  };
}

/** Writes <name-as-import>/__init__.py into the target, like pip would. */
export function fakeInstaller(): PackageInstaller & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async install(name: string, version: string, targetDir: string) {
      calls.push(`${name}==${version}`);
      const moduleDir = path.join(targetDir, name.replaceAll("-", "_"));
      await fs.mkdir(moduleDir, { recursive: true });
      await fs.writeFile(
        path.join(moduleDir, "__init__.py"),
        `__version__ = "${version}"\n`,
        "utf8",
      );
      return { ok: true, value: undefined };
    },
  };
}

export interface FakeStore extends ObjectStore {
  readonly uploads: { bucket: string; key: string; fileName: string }[];
}

export function fakeStore(failWith?: Error): FakeStore {
  const uploads: { bucket: string; key: string; fileName: string }[] = [];
  return {
    uploads,
    async put(
      bucket: string,
      key: string,
      filePath: string,
    ): Promise<PublishedLocation> {
      uploads.push({ bucket, key, fileName: path.basename(filePath) });
      await fs.access(filePath);
      if (failWith) {
        throw failWith;
      }
      return { bucket, key, location: storeLocation(bucket, key) };
    },
  };
}
