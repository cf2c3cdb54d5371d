import type { ConfigFile } from "./src/config.js";

export const defaultConfig: ConfigFile = {
  aws: {
    // region: "eu-west-1", // Leave unset to be prompted on each run
  },
  report: {
    periodDays: 90, // How far back to list backup jobs
    jobStates: ["COMPLETED", "FAILED", "EXPIRED", "PARTIAL"], // One job listing per state
    workbook: true, // Write the .xlsx analysis next to the JSON report
  },
  output: {
    prefix: "reports", // Storage path prefix for all reports
  },
  storage: {
    type: "local", // "local" writes under ./out, "s3" writes to the bucket below
    forcePathStyle: false, // Use path-style URLs (needed for S3-compatible services)
  },
  logging: {
    level: "info", // Log level: "debug", "info", "warn", "error"
    includeTimings: true, // Include execution time in log entries
    format: "pretty", // Log format: "pretty" (human-readable) or "json"
    color: true, // Enable colored output in terminal logs
  },
};
