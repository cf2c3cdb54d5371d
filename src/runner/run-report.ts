import { createAwsBackupSource, type BackupSource } from "../aws.js";
import { collectInventory } from "../collector.js";
import { describeError, logger, type ContextLogger } from "../logger.js";
import {
  buildFailedManifest,
  buildManifest,
  serializeReport,
  writeManifest,
  type ManifestArtifact
} from "../manifest.js";
import { assembleReport } from "../processors/assemble.js";
import { hasJobs, projectReport } from "../processors/tables.js";
import { renderWorkbook, XLSX_CONTENT_TYPE } from "../workbook.js";
import {
  buildReportBaseKey,
  formatDateTimeSeconds,
  formatRunStamp,
  withDuration
} from "../utils.js";
import type { AppConfig } from "../config.js";
import type { StorageClient } from "../storage.js";
import type { CollectionIssue } from "../types.js";
import type { ReportRunResult } from "./types.js";

export type RunReportOptions = {
  periodDays?: number;
  prefix?: string;
  workbook?: boolean;
};

export async function runReport(args: {
  region: string;
  config: AppConfig;
  storage: StorageClient;
  source?: BackupSource;
  now?: Date;
  options?: RunReportOptions;
  runLogger?: ContextLogger;
}): Promise<ReportRunResult> {
  const { region, config, storage } = args;
  const timeZone = config.timeZone;
  const periodDays = args.options?.periodDays ?? config.report.periodDays;
  const writeWorkbook = args.options?.workbook ?? config.report.workbook;
  const prefix = args.options?.prefix ?? config.output.prefix;
  const generatedAt = args.now ?? new Date();
  const runLogger = args.runLogger ?? logger.withContext({ region });

  const baseKey = buildReportBaseKey(prefix, region, formatRunStamp(generatedAt, timeZone));
  const reportKey = `${baseKey}/backup-report.json`;
  const workbookKey = `${baseKey}/backup-analysis.xlsx`;
  const manifestKey = `${baseKey}/manifest.json`;

  const source =
    args.source ??
    createAwsBackupSource({ region }, (skipped) => runLogger.warn("collect.record_skipped", skipped));

  const runStart = Date.now();
  let issues: CollectionIssue[] = [];
  runLogger.info("run.start", { periodDays, jobStates: config.report.jobStates, baseKey });

  try {
    const collected = await collectInventory(
      source,
      {
        periodDays,
        jobStates: config.report.jobStates,
        now: generatedAt,
        includeTimings: config.logging.includeTimings
      },
      runLogger
    );
    issues = collected.issues;
    if (collected.requests > 0 && issues.length === collected.requests) {
      throw new Error(`Every inventory request failed: ${issues[0]?.message ?? "unknown error"}`);
    }

    const report = assembleReport({
      region,
      periodDays,
      generatedAt,
      timeZone,
      inventory: collected.inventory
    });
    if (!hasJobs(report)) {
      runLogger.warn("report.no_jobs", { periodDays });
    }

    const artifacts: ManifestArtifact[] = [];
    const storedReport = await storage.put(
      reportKey,
      serializeReport(report),
      "application/json; charset=utf-8"
    );
    artifacts.push({ id: "report", format: "json", ...storedReport });

    if (writeWorkbook) {
      const renderStart = Date.now();
      const tables = projectReport(report);
      const workbook = await renderWorkbook(tables, generatedAt);
      const storedWorkbook = await storage.put(workbookKey, workbook, XLSX_CONTENT_TYPE);
      artifacts.push({ id: "workbook", format: "xlsx", ...storedWorkbook });
      runLogger.info("workbook.written", {
        sheets: tables.map((table) => table.name),
        uri: storedWorkbook.uri,
        ...withDuration(renderStart, config.logging.includeTimings)
      });
    }

    const durationMs = Date.now() - runStart;
    await writeManifest(
      storage,
      manifestKey,
      buildManifest({ report, timezone: timeZone, artifacts, issues, durationMs })
    );

    runLogger.info("report.written", {
      uri: storedReport.uri,
      totalBackups: report.total_backups,
      issues: issues.length,
      ...withDuration(runStart, config.logging.includeTimings)
    });

    return {
      status: "success",
      region,
      generatedAt: report.generated_at,
      durationMs,
      reportUri: storedReport.uri,
      workbookUri: artifacts.find((artifact) => artifact.id === "workbook")?.uri,
      manifestKey,
      totalBackups: report.total_backups,
      statusSummary: report.status_summary,
      issues
    };
  } catch (error) {
    const details = describeError(error);
    const message = String(details.message);
    const durationMs = Date.now() - runStart;
    runLogger.error("run.error", details);
    try {
      await writeManifest(
        storage,
        manifestKey,
        buildFailedManifest({
          region,
          periodDays,
          generatedAt: formatDateTimeSeconds(generatedAt, timeZone),
          timezone: timeZone,
          error: message,
          issues,
          durationMs
        })
      );
    } catch (writeError) {
      runLogger.warn("manifest.write_failed", describeError(writeError));
    }
    return {
      status: "failed",
      region,
      generatedAt: formatDateTimeSeconds(generatedAt, timeZone),
      durationMs,
      manifestKey,
      issues,
      error: message
    };
  }
}
