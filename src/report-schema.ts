import { z } from "zod";
import type { ReportDocument } from "./types.js";

const ruleSchema = z.object({
  name: z.string(),
  target_vault: z.string(),
  schedule_expression: z.string(),
  start_window_minutes: z.union([z.number(), z.string()]),
  completion_window_minutes: z.union([z.number(), z.string()]),
  lifecycle: z.object({
    delete_after_days: z.number().optional(),
    move_to_cold_storage_after_days: z.number().optional(),
    opt_in_to_archive: z.boolean().optional()
  }),
  continuous_backup_enabled: z.boolean()
});

const selectionSchema = z.object({
  name: z.string(),
  iam_role: z.string(),
  resources: z.array(z.string()),
  conditions: z.record(z.unknown())
});

export const reportDocumentSchema = z.object({
  generated_at: z.string(),
  region: z.string(),
  period_days: z.number().int(),
  total_backups: z.number().int(),
  status_summary: z.record(z.number().int()),
  plans: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      version: z.string(),
      created_at: z.string(),
      deployment_status: z.string(),
      rules: z.array(ruleSchema),
      selections: z.array(selectionSchema)
    })
  ),
  unique_resources: z.array(
    z.object({
      resource_id: z.string(),
      resource_type: z.string(),
      resource_locator: z.string(),
      last_backup_time: z.string(),
      vault_name: z.string()
    })
  ),
  backups: z.array(
    z.object({
      id: z.string(),
      resource_id: z.string(),
      resource_locator: z.string(),
      resource_type: z.string(),
      size_bytes: z.number(),
      size_gb: z.number(),
      created_at: z.string(),
      completed_at: z.string(),
      state: z.string(),
      status_message: z.string(),
      vault_name: z.string(),
      recovery_point_locator: z.string()
    })
  ),
  storage: z.object({
    volumes: z.array(
      z.object({
        volume_id: z.string(),
        name: z.string(),
        size_gb: z.number(),
        volume_type: z.string(),
        state: z.string(),
        creation_date: z.string(),
        encrypted: z.boolean(),
        availability_zone: z.string(),
        attached_instance: z.string(),
        device: z.string()
      })
    ),
    snapshots: z.array(
      z.object({
        snapshot_id: z.string(),
        name: z.string(),
        volume_id: z.string(),
        start_time: z.string(),
        size_gb: z.number(),
        state: z.string(),
        progress: z.string(),
        description: z.string(),
        encrypted: z.boolean()
      })
    )
  })
});

export function parseReportDocument(text: string): ReportDocument {
  return reportDocumentSchema.parse(JSON.parse(text));
}

export const manifestSummarySchema = z.object({
  status: z.enum(["success", "failed"]),
  region: z.string(),
  generatedAt: z.string(),
  empty: z.boolean(),
  stats: z.object({ backups: z.number() }),
  issues: z.array(z.unknown()),
  error: z.string().optional()
});

export function parseManifestSummary(text: string) {
  return manifestSummarySchema.parse(JSON.parse(text));
}
