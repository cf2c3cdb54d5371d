import {
  NOT_AVAILABLE,
  type BackupInventory,
  type BackupJob,
  type BackupJobView,
  type BackupPlan,
  type BackupRule,
  type PlanView,
  type ReportDocument,
  type RuleView,
  type Snapshot,
  type SnapshotView,
  type Volume,
  type VolumeView
} from "../types.js";
import { bytesToGb, formatDateTime, formatDateTimeSeconds } from "../utils.js";
import { buildResourceRegistry, resourceIdFromLocator } from "./resources.js";
import { summarizeStatuses } from "./status.js";

export type AssembleInput = {
  region: string;
  periodDays: number;
  generatedAt: Date;
  timeZone?: string;
  inventory: BackupInventory;
};

/**
 * Joins collector output into the report document. Collectors have already
 * degraded failed sub-fetches to empty lists; partial data is taken as is.
 * `generatedAt` is the only clock value, so equal inputs give equal documents.
 */
export function assembleReport(input: AssembleInput): ReportDocument {
  const { inventory, timeZone } = input;
  const registry = buildResourceRegistry(inventory.jobs, timeZone);

  return {
    generated_at: formatDateTimeSeconds(input.generatedAt, timeZone),
    region: input.region,
    period_days: input.periodDays,
    total_backups: inventory.jobs.length,
    status_summary: summarizeStatuses(inventory.jobs),
    plans: inventory.plans.map((plan) => toPlanView(plan, timeZone)),
    unique_resources: Array.from(registry.values()),
    backups: inventory.jobs.map((job) => toJobView(job, timeZone)),
    storage: {
      volumes: inventory.volumes.map((volume) => toVolumeView(volume, timeZone)),
      snapshots: inventory.snapshots.map((snapshot) => toSnapshotView(snapshot, timeZone))
    }
  };
}

export function toJobView(job: BackupJob, timeZone?: string): BackupJobView {
  const sizeBytes = job.sizeBytes ?? 0;
  return {
    id: job.id,
    resource_id: resourceIdFromLocator(job.resourceLocator),
    resource_locator: job.resourceLocator,
    resource_type: job.resourceType ?? NOT_AVAILABLE,
    size_bytes: sizeBytes,
    size_gb: bytesToGb(sizeBytes),
    created_at: formatDateTime(job.createdAt, timeZone),
    completed_at: job.completedAt ? formatDateTime(job.completedAt, timeZone) : NOT_AVAILABLE,
    state: job.state,
    status_message: job.statusMessage ?? NOT_AVAILABLE,
    vault_name: job.vaultName ?? NOT_AVAILABLE,
    recovery_point_locator: job.recoveryPointLocator ?? NOT_AVAILABLE
  };
}

function toPlanView(plan: BackupPlan, timeZone?: string): PlanView {
  return {
    id: plan.id,
    name: plan.name ?? NOT_AVAILABLE,
    version: plan.versionId ?? NOT_AVAILABLE,
    created_at: plan.createdAt ? formatDateTime(plan.createdAt, timeZone) : NOT_AVAILABLE,
    // Plan listings carry no deployment state.
    deployment_status: NOT_AVAILABLE,
    rules: plan.rules.map(toRuleView),
    selections: plan.selections.map((selection) => ({
      name: selection.name ?? NOT_AVAILABLE,
      iam_role: selection.iamRole ?? NOT_AVAILABLE,
      resources: [...selection.resources],
      conditions: { ...selection.conditions }
    }))
  };
}

function toRuleView(rule: BackupRule): RuleView {
  const lifecycle = rule.lifecycle;
  return {
    name: rule.name ?? NOT_AVAILABLE,
    target_vault: rule.targetVault ?? NOT_AVAILABLE,
    schedule_expression: rule.scheduleExpression ?? NOT_AVAILABLE,
    start_window_minutes: rule.startWindowMinutes ?? NOT_AVAILABLE,
    completion_window_minutes: rule.completionWindowMinutes ?? NOT_AVAILABLE,
    lifecycle: {
      ...(lifecycle?.deleteAfterDays !== undefined
        ? { delete_after_days: lifecycle.deleteAfterDays }
        : {}),
      ...(lifecycle?.moveToColdStorageAfterDays !== undefined
        ? { move_to_cold_storage_after_days: lifecycle.moveToColdStorageAfterDays }
        : {}),
      ...(lifecycle?.optInToArchiveForSupportedResources !== undefined
        ? { opt_in_to_archive: lifecycle.optInToArchiveForSupportedResources }
        : {})
    },
    continuous_backup_enabled: rule.continuousBackupEnabled ?? false
  };
}

function toVolumeView(volume: Volume, timeZone?: string): VolumeView {
  return {
    volume_id: volume.id,
    name: volume.name ?? NOT_AVAILABLE,
    size_gb: volume.sizeGb,
    volume_type: volume.volumeType ?? NOT_AVAILABLE,
    state: volume.state ?? NOT_AVAILABLE,
    creation_date: volume.createdAt ? formatDateTime(volume.createdAt, timeZone) : NOT_AVAILABLE,
    encrypted: volume.encrypted,
    availability_zone: volume.availabilityZone ?? NOT_AVAILABLE,
    attached_instance: volume.attachedInstance ?? "Not Attached",
    device: volume.device ?? NOT_AVAILABLE
  };
}

function toSnapshotView(snapshot: Snapshot, timeZone?: string): SnapshotView {
  return {
    snapshot_id: snapshot.id,
    name: snapshot.name ?? NOT_AVAILABLE,
    volume_id: snapshot.volumeId ?? NOT_AVAILABLE,
    start_time: snapshot.startTime ? formatDateTime(snapshot.startTime, timeZone) : NOT_AVAILABLE,
    size_gb: snapshot.sizeGb,
    state: snapshot.state ?? NOT_AVAILABLE,
    progress: snapshot.progress ?? NOT_AVAILABLE,
    description: snapshot.description ?? NOT_AVAILABLE,
    encrypted: snapshot.encrypted
  };
}
