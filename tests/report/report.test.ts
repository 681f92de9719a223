import { describe, expect, it } from "vitest";
import {
  buildHandlerReport,
  renderJsonReport,
  renderMarkdownReport,
} from "../../src/report/index.js";
import type { ResponseBody } from "../../src/protocol/types.js";

function body(overrides: Partial<ResponseBody> = {}): ResponseBody {
  return {
    Status: "SUCCESS",
    Reason: "See the details in CloudWatch Log Stream: layerproof-cli",
    PhysicalResourceId: "layerproof-cli",
    StackId: "local",
    RequestId: "request-1",
    LogicalResourceId: "Layer",
    NoEcho: false,
    Data: { Status: "SUCCESS", Message: "" },
    ...overrides,
  };
}

describe("handler report", () => {
  it("sorts data fields", () => {
    const report = buildHandlerReport(
      "builder",
      body({ Data: { S3Key: "k.zip", PackageName: "boto3" } }),
      "0.1.0",
    );

    expect(Object.keys(report.data)).toEqual(["PackageName", "S3Key"]);
    expect(JSON.parse(renderJsonReport(report))).toEqual({
      tool: { name: "layerproof", version: "0.1.0" },
      handler: "builder",
      status: "SUCCESS",
      reason: "See the details in CloudWatch Log Stream: layerproof-cli",
      data: { PackageName: "boto3", S3Key: "k.zip" },
    });
  });

  it("renders non-empty fields as a table", () => {
    const report = buildHandlerReport("verifier", body(), "0.1.0");

    expect(renderMarkdownReport(report)).toBe(
      [
        "## Layer Verification: SUCCESS",
        "",
        "+--------+---------+",
        "| Field  | Value   |",
        "+--------+---------+",
        "| Status | SUCCESS |",
        "+--------+---------+",
        "",
        "_layerproof 0.1.0_",
      ].join("\n"),
    );
  });

  it("quotes the reason of a failure", () => {
    const report = buildHandlerReport(
      "builder",
      body({
        Status: "FAILED",
        Reason: "Lambda Layer creation failed: registry down",
        Data: { S3Key: "" },
      }),
      "0.1.0",
    );

    expect(renderMarkdownReport(report)).toBe(
      [
        "## Layer Build: FAILED",
        "",
        "> Lambda Layer creation failed: registry down",
        "",
        "_No response data._",
        "",
        "_layerproof 0.1.0_",
      ].join("\n"),
    );
  });
});
