import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("falls back to the defaults file", () => {
    const config = loadConfig({});
    expect(config.aws.region).toBeUndefined();
    expect(config.report).toEqual({
      periodDays: 90,
      jobStates: ["COMPLETED", "FAILED", "EXPIRED", "PARTIAL"],
      workbook: true
    });
    expect(config.output.prefix).toBe("reports");
    expect(config.storage.type).toBe("local");
    expect(config.logging.level).toBe("info");
  });

  it("reads report settings from the environment", () => {
    const config = loadConfig({
      AWS_REGION: "eu-west-1",
      REPORT_PERIOD_DAYS: "30",
      REPORT_JOB_STATES: " completed, failed ,",
      WORKBOOK_ENABLED: "false",
      OUTPUT_PREFIX: "backups",
      TIMEZONE: "Europe/Berlin"
    });
    expect(config.aws.region).toBe("eu-west-1");
    expect(config.report).toEqual({ periodDays: 30, jobStates: ["COMPLETED", "FAILED"], workbook: false });
    expect(config.output.prefix).toBe("backups");
    expect(config.timeZone).toBe("Europe/Berlin");
    expect(config.logging).not.toHaveProperty("timeZone");
  });

  it("rejects a non-positive period", () => {
    expect(() => loadConfig({ REPORT_PERIOD_DAYS: "0" })).toThrow();
  });

  it("strips the scheme from a bucket URI", () => {
    const config = loadConfig({ BUCKET_TYPE: "s3", BUCKET_URI: "s3://backup-reports" });
    expect(config.storage.bucket).toBe("backup-reports");
  });

  it("requires a bucket for S3 storage", () => {
    expect(() => loadConfig({ BUCKET_TYPE: "s3" })).toThrow(
      "Missing BUCKET_NAME/BUCKET_URI for S3 storage."
    );
  });
});
