import type { ResponseBody } from "../protocol/types.js";
import type { HandlerName, HandlerReport } from "./types.js";

export function buildHandlerReport(
  handler: HandlerName,
  body: ResponseBody,
  toolVersion: string,
): HandlerReport {
  return {
    tool: { name: "layerproof", version: toolVersion },
    handler,
    status: body.Status,
    reason: body.Reason,
    data: sortFields(body.Data),
  };
}

export function renderJsonReport(report: HandlerReport): string {
  return JSON.stringify(report, null, 2);
}

function sortFields(
  data: Readonly<Record<string, string>>,
): Record<string, string> {
  const sorted: Record<string, string> = {};
  for (const key of Object.keys(data).sort()) {
    sorted[key] = data[key] ?? "";
  }
  return sorted;
}
