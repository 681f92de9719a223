import type { ResponseBody } from "../protocol/types.js";
import {
  buildHandlerReport,
  renderJsonReport,
  renderMarkdownReport,
  type HandlerName,
  type HandlerReport,
  type ReportFormat,
} from "../report/index.js";

export interface CommandResult {
  readonly report: HandlerReport;
  readonly output: string;
}

export function renderResult(
  handler: HandlerName,
  body: ResponseBody | undefined,
  format: ReportFormat,
  toolVersion: string,
): CommandResult {
  if (!body) {
    throw new Error(`The ${handler} handler returned without a response`);
  }
  const report = buildHandlerReport(handler, body, toolVersion);
  const output =
    format === "json"
      ? renderJsonReport(report)
      : renderMarkdownReport(report);
  return { report, output };
}

export function parseFormat(value: string): ReportFormat {
  if (value === "json" || value === "md") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}
