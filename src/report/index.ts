export { buildHandlerReport, renderJsonReport } from "./json-reporter.js";
export { renderMarkdownReport } from "./markdown-reporter.js";
export type { HandlerName, HandlerReport, ReportFormat } from "./types.js";
