import type { CollectionIssue, StatusSummary } from "../types.js";

export type ReportRunResult = {
  status: "success" | "failed";
  region: string;
  generatedAt: string;
  durationMs: number;
  reportUri?: string;
  workbookUri?: string;
  manifestKey?: string;
  totalBackups?: number;
  statusSummary?: StatusSummary;
  issues: CollectionIssue[];
  error?: string;
};
