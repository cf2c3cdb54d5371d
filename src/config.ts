import "dotenv/config";
import { z } from "zod";
import { defaultConfig } from "../config.defaults.js";

const truthy = new Set(["true", "1", "yes"]);

const envSchema = z.object({
  AWS_REGION: z.string().optional(),

  REPORT_PERIOD_DAYS: z.coerce.number().int().positive().optional(),
  REPORT_JOB_STATES: z.string().optional(),
  WORKBOOK_ENABLED: z.string().optional(),

  OUTPUT_PREFIX: z.string().optional(),
  TIMEZONE: z.string().optional(),

  BUCKET_TYPE: z.enum(["local", "s3"]).optional(),
  BUCKET_URI: z.string().optional(),
  BUCKET_NAME: z.string().optional(),
  BUCKET_REGION: z.string().optional(),
  BUCKET_ENDPOINT: z.string().optional(),
  BUCKET_FORCE_PATH_STYLE: z.string().optional(),
  BUCKET_ACCESS_KEY_ID: z.string().optional(),
  BUCKET_SECRET_ACCESS_KEY: z.string().optional(),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
  LOG_INCLUDE_TIMINGS: z.string().optional(),
  LOG_FORMAT: z.enum(["json", "pretty"]).optional(),
  LOG_COLOR: z.string().optional(),
});

export type AppConfig = ReturnType<typeof loadConfig>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsedEnv = envSchema.parse(env);
  const fileConfig = fileConfigSchema.parse(defaultConfig);

  const storage = {
    type: parsedEnv.BUCKET_TYPE ?? fileConfig.storage.type,
    bucket: resolveBucketName(parsedEnv, fileConfig.storage.bucket),
    region: parsedEnv.BUCKET_REGION ?? fileConfig.storage.region,
    endpoint: parsedEnv.BUCKET_ENDPOINT ?? fileConfig.storage.endpoint,
    forcePathStyle: resolveBool(
      parsedEnv.BUCKET_FORCE_PATH_STYLE,
      fileConfig.storage.forcePathStyle
    ),
    accessKeyId: parsedEnv.BUCKET_ACCESS_KEY_ID ?? fileConfig.storage.accessKeyId,
    secretAccessKey:
      parsedEnv.BUCKET_SECRET_ACCESS_KEY ?? fileConfig.storage.secretAccessKey,
  };

  if (storage.type === "s3" && !storage.bucket) {
    throw new Error("Missing BUCKET_NAME/BUCKET_URI for S3 storage.");
  }

  const timeZone = parsedEnv.TIMEZONE ?? fileConfig.logging.timeZone;

  return {
    aws: {
      region: parsedEnv.AWS_REGION ?? fileConfig.aws.region,
    },
    report: {
      periodDays: parsedEnv.REPORT_PERIOD_DAYS ?? fileConfig.report.periodDays,
      jobStates: resolveList(
        parsedEnv.REPORT_JOB_STATES,
        fileConfig.report.jobStates
      ),
      workbook: resolveBool(parsedEnv.WORKBOOK_ENABLED, fileConfig.report.workbook),
    },
    output: {
      prefix: parsedEnv.OUTPUT_PREFIX ?? fileConfig.output.prefix,
    },
    storage,
    timeZone,
    logging: {
      level: parsedEnv.LOG_LEVEL ?? fileConfig.logging.level,
      includeTimings: resolveBool(
        parsedEnv.LOG_INCLUDE_TIMINGS,
        fileConfig.logging.includeTimings
      ),
      format: parsedEnv.LOG_FORMAT ?? fileConfig.logging.format,
      color: resolveBool(parsedEnv.LOG_COLOR, fileConfig.logging.color),
    },
  };
}

export const fileConfigSchema = z.object({
  aws: z
    .object({
      region: z.string().optional(),
    })
    .default({}),
  report: z
    .object({
      periodDays: z.coerce.number().int().positive().default(90),
      jobStates: z
        .array(z.string().min(1))
        .min(1)
        .default(["COMPLETED", "FAILED", "EXPIRED", "PARTIAL"]),
      workbook: z.boolean().default(true),
    })
    .default({}),
  output: z
    .object({
      prefix: z.string().default("reports"),
    })
    .default({}),
  storage: z
    .object({
      type: z.enum(["local", "s3"]).default("local"),
      bucket: z.string().optional(),
      region: z.string().optional(),
      endpoint: z.string().optional(),
      forcePathStyle: z.boolean().default(false),
      accessKeyId: z.string().optional(),
      secretAccessKey: z.string().optional(),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).default("info"),
      includeTimings: z.boolean().default(false),
      format: z.enum(["json", "pretty"]).default("json"),
      color: z.boolean().default(false),
      timeZone: z.string().optional(),
    })
    .default({}),
});

export type ConfigFile = z.input<typeof fileConfigSchema>;

function resolveBool(value: string | undefined, fallback: boolean) {
  if (value === undefined) return fallback;
  return truthy.has(value.toLowerCase());
}

function resolveList(value: string | undefined, fallback: string[]) {
  if (!value) return fallback;
  const items = value
    .split(",")
    .map((item) => item.trim().toUpperCase())
    .filter(Boolean);
  return items.length > 0 ? items : fallback;
}

function resolveBucketName(
  env: { BUCKET_NAME?: string; BUCKET_URI?: string },
  fallback?: string
) {
  if (env.BUCKET_NAME) return env.BUCKET_NAME;
  if (env.BUCKET_URI) return stripBucketScheme(env.BUCKET_URI);
  return fallback;
}

function stripBucketScheme(value: string) {
  return value.replace(/^s3:\/\//, "");
}
