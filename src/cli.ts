import { Command } from "commander";
import { z } from "zod";
import { loadConfig, type AppConfig } from "./config.js";
import { listAwsRegions } from "./aws.js";
import { createStorageClient, describeStorage, validateStorage } from "./storage.js";
import { describeError, logger, setLoggerConfig } from "./logger.js";
import { runReport } from "./runner/run-report.js";
import { assertKnownRegion, formatRegionMenu, promptRegion } from "./regions.js";
import { parseManifestSummary, parseReportDocument } from "./report-schema.js";
import { findTable, projectReport, TABLE_NAMES } from "./processors/tables.js";
import { buildTable, formatRunResult, tableToRecords } from "./format.js";
import type { StorageClient } from "./storage.js";

type BaseContext = {
  config: AppConfig;
  storage: StorageClient;
};

const CORRECTIVE_HINT = "Check your AWS credentials and the selected region, then try again.";

const runOptionsSchema = z.object({
  region: z.string().optional(),
  days: z.coerce.number().int().positive().optional(),
  prefix: z.string().optional(),
  workbook: z.boolean().default(true),
  json: z.boolean().default(false)
});

const listOptionsSchema = z.object({
  region: z.string().optional(),
  prefix: z.string().optional(),
  json: z.boolean().default(false)
});

const showOptionsSchema = z.object({
  report: z.string(),
  table: z.string().default("Summary"),
  prefix: z.string().optional(),
  json: z.boolean().default(false)
});

const program = new Command();
program
  .name("backup-reporter")
  .description("AWS Backup inventory and analysis reports")
  .version("0.1.0");

program
  .command("run")
  .description("Collect backup activity for one region and write the report files")
  .option("--region <region>", "AWS region (prompted when omitted)")
  .option("--days <days>", "Look-back period for backup jobs")
  .option("--prefix <prefix>", "Override storage prefix")
  .option("--no-workbook", "Skip the .xlsx analysis")
  .option("--json", "JSON output")
  .action(async (raw) => {
    const options = runOptionsSchema.parse(raw);
    const { config, storage } = await loadBase({ prefix: options.prefix, validate: true });
    const region = await resolveRegion(config, options.region);

    const result = await runReport({
      region,
      config,
      storage,
      options: { periodDays: options.days, workbook: options.workbook }
    });

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(formatRunResult(result));
    }
    if (result.status === "failed") {
      console.error(CORRECTIVE_HINT);
      process.exitCode = 1;
    }
  });

program
  .command("regions")
  .description("List regions enabled for the account")
  .option("--json", "JSON output")
  .action(async (raw) => {
    const { json } = z.object({ json: z.boolean().default(false) }).parse(raw);
    const { config } = await loadBase({ validate: false });
    const regions = await listAwsRegions({ region: config.aws.region });
    console.log(json ? JSON.stringify(regions, null, 2) : formatRegionMenu(regions));
  });

program
  .command("list")
  .description("List stored report runs")
  .option("--region <region>", "Only runs for this region")
  .option("--prefix <prefix>", "Override storage prefix")
  .option("--json", "JSON output")
  .action(async (raw) => {
    const options = listOptionsSchema.parse(raw);
    const { config, storage } = await loadBase({ prefix: options.prefix, validate: false });
    const base = options.region
      ? `${config.output.prefix}/${options.region}`
      : config.output.prefix;
    const manifestKeys = (await storage.list(base)).filter((key) =>
      key.endsWith("/manifest.json")
    );

    const rows: Record<string, unknown>[] = [];
    for (const key of manifestKeys) {
      const body = await storage.get(key);
      if (!body) continue;
      const manifest = parseManifestSummary(body);
      rows.push({
        run: key.slice(0, -"/manifest.json".length),
        region: manifest.region,
        generatedAt: manifest.generatedAt,
        status: manifest.status,
        backups: manifest.stats.backups,
        issues: manifest.issues.length
      });
    }
    printJsonOrTable(rows, ["run", "region", "generatedAt", "status", "backups", "issues"], options.json);
  });

program
  .command("show")
  .description("Print one table of a stored report")
  .requiredOption("--report <key>", "Storage key of backup-report.json")
  .option("--table <name>", `One of: ${TABLE_NAMES.join(", ")}`)
  .option("--prefix <prefix>", "Override storage prefix")
  .option("--json", "JSON output")
  .action(async (raw) => {
    const options = showOptionsSchema.parse(raw);
    const { storage } = await loadBase({ prefix: options.prefix, validate: false });
    const body = await storage.get(options.report);
    if (!body) {
      throw new Error(`Report not found: ${options.report}`);
    }
    const tables = projectReport(parseReportDocument(body));
    const table = findTable(tables, options.table);
    if (!table) {
      throw new Error(`Unknown table: ${options.table}. Expected one of: ${TABLE_NAMES.join(", ")}`);
    }
    printJsonOrTable(
      tableToRecords(table),
      table.columns.map((column) => column.header),
      options.json
    );
  });

program.parseAsync(process.argv).catch((error) => {
  logger.error("cli.error", describeError(error));
  console.error(CORRECTIVE_HINT);
  process.exitCode = 1;
});

async function loadBase(args: { prefix?: string; validate: boolean }): Promise<BaseContext> {
  const config = loadConfig();
  if (args.prefix) {
    config.output = { ...config.output, prefix: args.prefix };
  }
  setLoggerConfig({
    level: config.logging.level,
    includeTimings: config.logging.includeTimings,
    format: config.logging.format,
    color: config.logging.color,
    timeZone: config.timeZone
  });
  const storage = createStorageClient(config.storage);
  if (args.validate) {
    logger.debug("storage.validate.start", describeStorage(config.storage));
    await validateStorage(config.storage);
  }
  return { config, storage };
}

async function resolveRegion(config: AppConfig, requested?: string) {
  const region = requested ?? config.aws.region;
  if (region) {
    // Fails fast on missing credentials or a region the account cannot use.
    assertKnownRegion(region, await listAwsRegions({ region }));
    return region;
  }
  let regions: string[] = [];
  try {
    regions = await listAwsRegions({});
  } catch (error) {
    logger.warn("regions.list_failed", describeError(error));
  }
  return promptRegion(regions);
}

function printJsonOrTable(rows: Record<string, unknown>[], headers: string[], json: boolean) {
  if (json) {
    console.log(JSON.stringify(rows, null, 2));
    return;
  }
  if (rows.length === 0) {
    console.log("No results.");
    return;
  }
  console.log(buildTable(headers, rows));
}
