import type { ResponseData, ResponseStatus } from "../protocol/types.js";

export type HandlerName = "builder" | "verifier";

export interface HandlerReport {
  readonly tool: { readonly name: string; readonly version: string };
  readonly handler: HandlerName;
  readonly status: ResponseStatus;
  readonly reason: string;
  readonly data: ResponseData;
}

export type ReportFormat = "json" | "md";
