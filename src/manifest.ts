import type { StoredArtifact, StorageClient } from "./storage.js";
import type { CollectionIssue, ReportDocument, StatusSummary } from "./types.js";

export type ManifestArtifact = StoredArtifact & {
  id: "report" | "workbook";
  format: "json" | "xlsx";
};

export type RunManifest = {
  schemaVersion: number;
  status: "success" | "failed";
  error?: string;
  region: string;
  periodDays: number;
  generatedAt: string;
  timezone?: string;
  empty: boolean;
  artifacts: ManifestArtifact[];
  stats: {
    backups: number;
    uniqueResources: number;
    plans: number;
    volumes: number;
    snapshots: number;
    statusSummary: StatusSummary;
  };
  // Sub-fetches that failed and were reported as empty lists.
  issues: CollectionIssue[];
  durationMs?: number;
};

export function buildManifest(args: {
  report: ReportDocument;
  timezone?: string;
  artifacts: ManifestArtifact[];
  issues: CollectionIssue[];
  durationMs?: number;
}): RunManifest {
  const { report } = args;
  return {
    schemaVersion: 1,
    status: "success",
    region: report.region,
    periodDays: report.period_days,
    generatedAt: report.generated_at,
    timezone: args.timezone,
    empty: report.backups.length === 0,
    artifacts: args.artifacts,
    stats: {
      backups: report.total_backups,
      uniqueResources: report.unique_resources.length,
      plans: report.plans.length,
      volumes: report.storage.volumes.length,
      snapshots: report.storage.snapshots.length,
      statusSummary: report.status_summary
    },
    issues: args.issues,
    durationMs: args.durationMs
  };
}

export function buildFailedManifest(args: {
  region: string;
  periodDays: number;
  generatedAt: string;
  timezone?: string;
  error: string;
  issues?: CollectionIssue[];
  durationMs?: number;
}): RunManifest {
  return {
    schemaVersion: 1,
    status: "failed",
    error: args.error,
    region: args.region,
    periodDays: args.periodDays,
    generatedAt: args.generatedAt,
    timezone: args.timezone,
    empty: true,
    artifacts: [],
    stats: {
      backups: 0,
      uniqueResources: 0,
      plans: 0,
      volumes: 0,
      snapshots: 0,
      statusSummary: {}
    },
    issues: args.issues ?? [],
    durationMs: args.durationMs
  };
}

export async function writeManifest(
  storage: StorageClient,
  key: string,
  manifest: RunManifest
) {
  const body = JSON.stringify(manifest, null, 2);
  return storage.put(key, body, "application/json");
}

export function serializeReport(report: ReportDocument) {
  return `${JSON.stringify(report, null, 2)}\n`;
}
