import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { buildLayer, toBuilderResponse } from "../../src/builder/build.js";
import { workDirPath } from "../../src/builder/workdir.js";
import { PublishError } from "../../src/errors.js";
import { createLogger, silentLogger } from "../../src/logging/logger.js";
import { fakeInstaller, fakeRegistry, fakeStore } from "../helpers.js";

const request = {
  bucketName: "layers",
  packageName: "aws-lambda-powertools",
  runtime: "python3.13",
  architecture: "arm64",
};

async function tempRoot(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "layerproof-"));
}

describe("buildLayer", () => {
  it("publishes the layer and describes what was built", async () => {
    const workRoot = await tempRoot();
    const store = fakeStore();
    const registry = fakeRegistry("3.4.0");

    const identity = await buildLayer(request, {
      registry,
      installer: fakeInstaller(),
      store,
      workRoot,
      logger: silentLogger(),
    });

    expect(registry.calls).toEqual(["aws-lambda-powertools"]);
    expect(store.uploads).toEqual([
      {
        bucket: "layers",
        key: "python313-arm64-aws-lambda-powertools.zip",
        fileName: "aws-lambda-powertools-python3.13-3.4.0.zip",
      },
    ]);
    expect(toBuilderResponse(identity)).toEqual({
      S3Location: "s3://layers/python313-arm64-aws-lambda-powertools.zip",
      S3Bucket: "layers",
      S3Key: "python313-arm64-aws-lambda-powertools.zip",
      PackageName: "aws-lambda-powertools",
      PackageVersion: "3.4.0",
      PackageImportName: "aws_lambda_powertools",
      CompatibleRuntimes: "['python3.13']",
      CompatibleArchitectures: "['arm64']",
    });
    await expect(fs.access(workDirPath(workRoot))).rejects.toThrow();
  });

  it("reuses the key when the resolved version changes", async () => {
    const workRoot = await tempRoot();
    const store = fakeStore();
    const deps = {
      registry: fakeRegistry("3.4.0", "3.5.0"),
      installer: fakeInstaller(),
      store,
      workRoot,
      logger: silentLogger(),
    };

    await buildLayer(request, deps);
    await buildLayer(request, deps);

    expect(store.uploads.map((upload) => upload.key)).toEqual([
      "python313-arm64-aws-lambda-powertools.zip",
      "python313-arm64-aws-lambda-powertools.zip",
    ]);
    expect(store.uploads.map((upload) => upload.fileName)).toEqual([
      "aws-lambda-powertools-python3.13-3.4.0.zip",
      "aws-lambda-powertools-python3.13-3.5.0.zip",
    ]);
  });

  it("cleans up when the upload fails", async () => {
    const workRoot = await tempRoot();
    const failure = new PublishError("Upload to s3://layers/key failed: denied");

    await expect(
      buildLayer(request, {
        registry: fakeRegistry("3.4.0"),
        installer: fakeInstaller(),
        store: fakeStore(failure),
        workRoot,
        logger: silentLogger(),
      }),
    ).rejects.toBe(failure);
    await expect(fs.access(workDirPath(workRoot))).rejects.toThrow();
  });

  it("keeps the upload error when the archive cannot be removed", async () => {
    const workRoot = await tempRoot();
    const failure = new PublishError("Upload to s3://layers/key failed: denied");
    const warnings: string[] = [];
    const logger = createLogger({
      sink: (entry) => {
        if (entry.level === "warn") {
          warnings.push(entry.message);
        }
      },
    });

    await expect(
      buildLayer(request, {
        registry: fakeRegistry("3.4.0"),
        installer: fakeInstaller(),
        // Leaves a directory where the archive was, so removing it fails.
        store: {
          put: async (_bucket, _key, filePath) => {
            await fs.rm(filePath);
            await fs.mkdir(filePath);
            throw failure;
          },
        },
        workRoot,
        logger,
      }),
    ).rejects.toBe(failure);
    expect(warnings).toEqual(["Unable to remove local archive"]);
    await expect(fs.access(workDirPath(workRoot))).rejects.toThrow();
  });

  it("wraps staging failures and leaves nothing behind", async () => {
    const workRoot = await tempRoot();
    const store = fakeStore();

    await expect(
      buildLayer(request, {
        registry: fakeRegistry("3.4.0"),
        installer: fakeInstaller(),
        store,
        workRoot,
        logger: silentLogger(),
        writeZip: async () => undefined,
      }),
    ).rejects.toThrow(
      `Layer package creation failed: Failed to create ZIP file: ${path.join(
        workDirPath(workRoot),
        "aws-lambda-powertools-python3.13-3.4.0.zip",
      )}`,
    );
    expect(store.uploads).toEqual([]);
    await expect(fs.access(workDirPath(workRoot))).rejects.toThrow();
  });

  it("does not touch the work directory when resolution fails", async () => {
    const workRoot = await tempRoot();

    await expect(
      buildLayer(request, {
        registry: {
          resolveLatest: async () => {
            throw new Error("registry down");
          },
        },
        installer: fakeInstaller(),
        store: fakeStore(),
        workRoot,
        logger: silentLogger(),
      }),
    ).rejects.toThrow("registry down");
    expect(await fs.readdir(workRoot)).toEqual([]);
  });
});
