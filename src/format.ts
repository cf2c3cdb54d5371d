import { isKnownStatus } from "./processors/status.js";
import { KNOWN_STATUSES, type ReportTable, type StatusSummary } from "./types.js";
import type { ReportRunResult } from "./runner/types.js";

export function buildTable(headers: string[], rows: Record<string, unknown>[]) {
  const widths = headers.map((header) => header.length);
  for (const row of rows) {
    headers.forEach((header, index) => {
      const value = String(row[header] ?? "");
      widths[index] = Math.max(widths[index], value.length);
    });
  }
  const headerLine = headers.map((header, index) => header.padEnd(widths[index])).join("  ");
  const separator = headers.map((_, index) => "-".repeat(widths[index])).join("  ");
  const body = rows.map((row) =>
    headers
      .map((header, index) => String(row[header] ?? "").padEnd(widths[index]))
      .join("  ")
      .trimEnd()
  );
  return [headerLine.trimEnd(), separator, ...body].join("\n");
}

export function tableToRecords(table: ReportTable) {
  return table.rows.map((row) =>
    Object.fromEntries(table.columns.map((column, index) => [column.header, row[index]]))
  );
}

/** Known categories in their fixed order, then any other raw state alphabetically. */
export function formatStatusSummary(summary: StatusSummary) {
  const lines = KNOWN_STATUSES.filter((status) => summary[status] !== undefined).map(
    (status) => `${status}: ${summary[status]}`
  );
  const others = Object.keys(summary)
    .filter((status) => !isKnownStatus(status))
    .sort();
  for (const status of others) {
    lines.push(`${status}: ${summary[status]} (unclassified state)`);
  }
  return lines.join("\n");
}

export function formatRunResult(result: ReportRunResult) {
  const lines = [
    `status: ${result.status}`,
    `region: ${result.region}`,
    `generatedAt: ${result.generatedAt}`,
    `durationMs: ${result.durationMs}`
  ];
  if (result.reportUri) lines.push(`report: ${result.reportUri}`);
  if (result.workbookUri) lines.push(`workbook: ${result.workbookUri}`);
  if (result.totalBackups !== undefined) lines.push(`totalBackups: ${result.totalBackups}`);
  if (result.issues.length > 0) {
    lines.push(`partialFailures: ${result.issues.length}`);
    for (const issue of result.issues) {
      lines.push(`  - ${issue.scope}${issue.target ? ` (${issue.target})` : ""}: ${issue.message}`);
    }
  }
  if (result.statusSummary && Object.keys(result.statusSummary).length > 0) {
    lines.push("statusSummary:");
    lines.push(
      formatStatusSummary(result.statusSummary)
        .split("\n")
        .map((line) => `  ${line}`)
        .join("\n")
    );
  }
  if (result.error) lines.push(`error: ${result.error}`);
  return lines.join("\n");
}
