import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  createBuilderHandler,
  type BuilderHandlerDependencies,
} from "../../src/builder/handler.js";
import { CallbackError } from "../../src/errors.js";
import { silentLogger } from "../../src/logging/logger.js";
import {
  createRecordingTransport,
} from "../../src/protocol/recording-transport.js";
import type { CallbackTransport } from "../../src/protocol/types.js";
import {
  LOG_STREAM,
  fakeInstaller,
  fakeRegistry,
  fakeStore,
  makeEvent,
  testCatalog,
} from "../helpers.js";

const properties = {
  BucketName: "layers",
  PackageName: "boto3",
  Runtime: "python3.13",
  Architecture: "x86_64",
};

const emptyData = {
  S3Location: "",
  S3Bucket: "",
  S3Key: "",
  PackageName: "",
  PackageVersion: "",
  PackageImportName: "",
  CompatibleRuntimes: "",
  CompatibleArchitectures: "",
};

async function dependencies(
  transport: CallbackTransport,
  overrides: Partial<BuilderHandlerDependencies> = {},
): Promise<BuilderHandlerDependencies> {
  return {
    registry: fakeRegistry("1.36.2"),
    installer: fakeInstaller(),
    store: fakeStore(),
    workRoot: await fs.mkdtemp(path.join(os.tmpdir(), "layerproof-")),
    logger: silentLogger(),
    loadCatalog: async () => testCatalog,
    transport,
    ...overrides,
  };
}

describe("builder handler", () => {
  it("answers Create with the published layer", async () => {
    const transport = createRecordingTransport();
    const handler = createBuilderHandler(await dependencies(transport));

    const data = await handler(makeEvent(properties), {
      logStreamName: LOG_STREAM,
    });

    expect(transport.sent).toHaveLength(1);
    expect(transport.sent[0]?.url).toBe("https://callback.test/response");
    expect(transport.last()).toEqual({
      Status: "SUCCESS",
      Reason: `See the details in CloudWatch Log Stream: ${LOG_STREAM}`,
      PhysicalResourceId: LOG_STREAM,
      StackId: "arn:aws:cloudformation:us-east-1:000000000000:stack/test/1",
      RequestId: "request-1",
      LogicalResourceId: "LayerResource",
      NoEcho: false,
      Data: {
        S3Location: "s3://layers/python313-x86_64-boto3.zip",
        S3Bucket: "layers",
        S3Key: "python313-x86_64-boto3.zip",
        PackageName: "boto3",
        PackageVersion: "1.36.2",
        PackageImportName: "boto3",
        CompatibleRuntimes: "['python3.13']",
        CompatibleArchitectures: "['x86_64']",
      },
    });
    expect(data).toEqual(transport.last()?.Data);
  });

  it("treats Update like Create and keeps the physical id", async () => {
    const transport = createRecordingTransport();
    const registry = fakeRegistry("1.36.3");
    const handler = createBuilderHandler(
      await dependencies(transport, { registry }),
    );

    await handler(
      { ...makeEvent(properties, "Update"), PhysicalResourceId: "layer-1" },
      { logStreamName: LOG_STREAM },
    );

    expect(registry.calls).toEqual(["boto3"]);
    expect(transport.last()?.Status).toBe("SUCCESS");
    expect(transport.last()?.PhysicalResourceId).toBe("layer-1");
    expect(transport.last()?.Data.PackageVersion).toBe("1.36.3");
  });

  it("answers Delete without building", async () => {
    const transport = createRecordingTransport();
    const registry = fakeRegistry("1.36.2");
    const handler = createBuilderHandler(
      await dependencies(transport, { registry }),
    );

    const data = await handler(makeEvent(properties, "Delete"), {
      logStreamName: LOG_STREAM,
    });

    expect(data).toEqual(emptyData);
    expect(registry.calls).toEqual([]);
    expect(transport.sent).toHaveLength(1);
    expect(transport.last()?.Status).toBe("SUCCESS");
    expect(transport.last()?.Data).toEqual(emptyData);
  });

  it("reports validation failures once with a reason", async () => {
    const transport = createRecordingTransport();
    const handler = createBuilderHandler(await dependencies(transport));

    const data = await handler(
      makeEvent({ ...properties, PackageName: "numpy" }),
      { logStreamName: LOG_STREAM },
    );

    expect(data).toEqual(emptyData);
    expect(transport.sent).toHaveLength(1);
    expect(transport.last()?.Status).toBe("FAILED");
    expect(transport.last()?.Reason).toBe(
      "Lambda Layer creation failed: Package 'numpy' is not supported. Supported packages: aws-lambda-powertools, aws-xray-sdk, boto3, requests, urllib3",
    );
  });

  it("reports a catalog that cannot be loaded", async () => {
    const transport = createRecordingTransport();
    const handler = createBuilderHandler(
      await dependencies(transport, {
        loadCatalog: async () => {
          throw new Error("Unable to read catalog: /missing.yaml");
        },
      }),
    );

    await handler(makeEvent(properties), { logStreamName: LOG_STREAM });

    expect(transport.last()?.Status).toBe("FAILED");
    expect(transport.last()?.Reason).toBe(
      "Lambda Layer creation failed: Unable to read catalog: /missing.yaml",
    );
  });

  it("reports upload failures", async () => {
    const transport = createRecordingTransport();
    const handler = createBuilderHandler(
      await dependencies(transport, {
        store: fakeStore(new Error("Upload to s3://layers/k failed: denied")),
      }),
    );

    await handler(makeEvent(properties), { logStreamName: LOG_STREAM });

    expect(transport.sent).toHaveLength(1);
    expect(transport.last()?.Reason).toBe(
      "Lambda Layer creation failed: Upload to s3://layers/k failed: denied",
    );
  });

  it("lets callback failures propagate", async () => {
    const attempts: string[] = [];
    const transport: CallbackTransport = {
      send: async (url) => {
        attempts.push(url);
        throw new CallbackError("Callback to ResponseURL failed with status 403");
      },
    };
    const handler = createBuilderHandler(await dependencies(transport));

    await expect(
      handler(makeEvent(properties), { logStreamName: LOG_STREAM }),
    ).rejects.toThrow("Callback to ResponseURL failed with status 403");
    expect(attempts).toEqual(["https://callback.test/response"]);
  });

  it("rejects malformed events before responding", async () => {
    const transport = createRecordingTransport();
    const handler = createBuilderHandler(await dependencies(transport));

    await expect(
      handler({ RequestType: "Create" }, { logStreamName: LOG_STREAM }),
    ).rejects.toThrow(
      "Custom resource event is missing: ResponseURL, StackId, RequestId, LogicalResourceId",
    );
    expect(transport.sent).toEqual([]);
  });
});
