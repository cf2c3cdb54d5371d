export const KNOWN_STATUSES = [
  "COMPLETED",
  "COMPLETED_WITH_ISSUES",
  "FAILED",
  "EXPIRED",
  "PARTIAL"
] as const;

export type KnownStatus = (typeof KNOWN_STATUSES)[number];

// Providers add job states over time; anything outside the known set is kept verbatim.
export type StatusCategory = KnownStatus | (string & {});

// Keyed by StatusCategory; counts sum to the number of classified jobs.
export type StatusSummary = Record<string, number>;

export const NOT_AVAILABLE = "N/A";

export type BackupJob = {
  id: string;
  resourceLocator: string;
  resourceType?: string;
  createdAt: Date;
  completedAt?: Date;
  sizeBytes?: number;
  state: string;
  statusMessage?: string;
  vaultName?: string;
  recoveryPointLocator?: string;
};

export type BackupLifecycle = {
  deleteAfterDays?: number;
  moveToColdStorageAfterDays?: number;
  optInToArchiveForSupportedResources?: boolean;
};

export type BackupRule = {
  name?: string;
  targetVault?: string;
  scheduleExpression?: string;
  startWindowMinutes?: number;
  completionWindowMinutes?: number;
  lifecycle?: BackupLifecycle;
  continuousBackupEnabled?: boolean;
};

export type BackupSelection = {
  name?: string;
  iamRole?: string;
  resources: string[];
  conditions: Record<string, unknown>;
};

export type BackupPlanSummary = {
  id: string;
  name?: string;
  versionId?: string;
  createdAt?: Date;
};

export type BackupPlan = BackupPlanSummary & {
  rules: BackupRule[];
  selections: BackupSelection[];
};

export type Volume = {
  id: string;
  name?: string;
  sizeGb: number;
  volumeType?: string;
  state?: string;
  createdAt?: Date;
  encrypted: boolean;
  availabilityZone?: string;
  attachedInstance?: string;
  device?: string;
};

export type Snapshot = {
  id: string;
  name?: string;
  volumeId?: string;
  startTime?: Date;
  sizeGb: number;
  state?: string;
  progress?: string;
  description?: string;
  encrypted: boolean;
};

export type BackupInventory = {
  jobs: BackupJob[];
  plans: BackupPlan[];
  volumes: Volume[];
  snapshots: Snapshot[];
};

export type CollectionIssue = {
  scope: "jobs" | "plans" | "rules" | "selections" | "volumes" | "snapshots";
  target?: string;
  message: string;
};

// Serialized report document. Field names are part of the output format.

export type ResourceRecord = {
  resource_id: string;
  resource_type: string;
  resource_locator: string;
  last_backup_time: string;
  vault_name: string;
};

export type BackupJobView = {
  id: string;
  resource_id: string;
  resource_locator: string;
  resource_type: string;
  size_bytes: number;
  size_gb: number;
  created_at: string;
  completed_at: string;
  state: string;
  status_message: string;
  vault_name: string;
  recovery_point_locator: string;
};

export type LifecycleView = {
  delete_after_days?: number;
  move_to_cold_storage_after_days?: number;
  opt_in_to_archive?: boolean;
};

export type RuleView = {
  name: string;
  target_vault: string;
  schedule_expression: string;
  start_window_minutes: number | string;
  completion_window_minutes: number | string;
  lifecycle: LifecycleView;
  continuous_backup_enabled: boolean;
};

export type SelectionView = {
  name: string;
  iam_role: string;
  resources: string[];
  conditions: Record<string, unknown>;
};

export type PlanView = {
  id: string;
  name: string;
  version: string;
  created_at: string;
  deployment_status: string;
  rules: RuleView[];
  selections: SelectionView[];
};

export type VolumeView = {
  volume_id: string;
  name: string;
  size_gb: number;
  volume_type: string;
  state: string;
  creation_date: string;
  encrypted: boolean;
  availability_zone: string;
  attached_instance: string;
  device: string;
};

export type SnapshotView = {
  snapshot_id: string;
  name: string;
  volume_id: string;
  start_time: string;
  size_gb: number;
  state: string;
  progress: string;
  description: string;
  encrypted: boolean;
};

export type ReportDocument = {
  generated_at: string;
  region: string;
  period_days: number;
  total_backups: number;
  status_summary: StatusSummary;
  plans: PlanView[];
  unique_resources: ResourceRecord[];
  backups: BackupJobView[];
  storage: {
    volumes: VolumeView[];
    snapshots: SnapshotView[];
  };
};

export type CellValue = string | number | boolean;

// `value` columns hold labels and numbers side by side; numbers are formatted per cell.
export type ColumnKind = "text" | "integer" | "decimal" | "value";

export type TableColumn = {
  header: string;
  kind: ColumnKind;
};

export type ReportTable = {
  name: string;
  columns: TableColumn[];
  rows: CellValue[][];
};

export type PivotCell = {
  count: number;
  avg_gb: number;
  total_gb: number;
};

export type MonthlyPivot = {
  months: string[];
  rows: { resource_id: string; cells: PivotCell[] }[];
};
