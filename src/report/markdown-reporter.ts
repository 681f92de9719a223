import type { HandlerReport } from "./types.js";

const TITLES = {
  builder: "Layer Build",
  verifier: "Layer Verification",
} as const;

export function renderMarkdownReport(report: HandlerReport): string {
  const lines: string[] = [];
  lines.push(`## ${TITLES[report.handler]}: ${report.status}`);
  lines.push("");
  if (report.status === "FAILED") {
    lines.push(`> ${report.reason}`);
    lines.push("");
  }

  const rows = Object.entries(report.data)
    .filter(([, value]) => value.length > 0)
    .map(([field, value]) => [field, value]);
  if (rows.length === 0) {
    lines.push("_No response data._");
  } else {
    lines.push(renderAsciiTable(rows, ["Field", "Value"]));
  }
  lines.push("");
  lines.push(`_${report.tool.name} ${report.tool.version}_`);
  return lines.join("\n");
}

function renderAsciiTable(
  rows: readonly string[][],
  headers: readonly string[],
): string {
  const widths = headers.map((header, index) =>
    Math.max(
      header.length,
      ...rows.map((row) => (row[index] ? row[index].length : 0)),
    ),
  );
  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const headerLine = `| ${headers
    .map((header, index) => header.padEnd(widths[index] ?? 0))
    .join(" | ")} |`;
  const body = rows.map(
    (row) =>
      `| ${row
        .map((cell, index) => cell.padEnd(widths[index] ?? 0))
        .join(" | ")} |`,
  );
  return [border, headerLine, border, ...body, border].join("\n");
}
