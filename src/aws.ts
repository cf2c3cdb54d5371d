import {
  BackupClient,
  BackupJobState,
  GetBackupPlanCommand,
  GetBackupSelectionCommand,
  ListBackupJobsCommand,
  ListBackupPlansCommand,
  ListBackupSelectionsCommand,
  type BackupRule as AwsBackupRule,
  type Conditions as AwsConditions
} from "@aws-sdk/client-backup";
import {
  DescribeRegionsCommand,
  DescribeSnapshotsCommand,
  DescribeVolumesCommand,
  EC2Client,
  type Tag
} from "@aws-sdk/client-ec2";
import type {
  BackupJob,
  BackupPlanSummary,
  BackupRule,
  BackupSelection,
  Snapshot,
  Volume
} from "./types.js";

export type AwsSourceConfig = {
  region: string;
};

/**
 * Read-only view of the provider. Every method lists all pages before
 * returning and throws on the first failed request.
 */
export type BackupSource = {
  listBackupJobs: (filter: { createdAfter: Date; state: string }) => Promise<BackupJob[]>;
  listBackupPlans: () => Promise<BackupPlanSummary[]>;
  getBackupPlanRules: (planId: string) => Promise<BackupRule[]>;
  listBackupSelections: (planId: string) => Promise<BackupSelection[]>;
  listVolumes: () => Promise<Volume[]>;
  listSnapshots: () => Promise<Snapshot[]>;
};

export type SkippedRecordHandler = (record: { kind: "job"; id?: string; reason: string }) => void;

export function isBackupJobState(value: string): value is BackupJobState {
  return Object.values(BackupJobState).some((state) => state === value);
}

export function createAwsBackupSource(
  config: AwsSourceConfig,
  onSkipped?: SkippedRecordHandler
): BackupSource {
  const backup = new BackupClient({ region: config.region });
  const ec2 = new EC2Client({ region: config.region });

  return {
    async listBackupJobs({ createdAfter, state }) {
      if (!isBackupJobState(state)) {
        throw new Error(`Unsupported backup job state: ${state}`);
      }
      const jobs: BackupJob[] = [];
      let nextToken: string | undefined;
      do {
        const response = await backup.send(
          new ListBackupJobsCommand({
            ByCreatedAfter: createdAfter,
            ByState: state,
            NextToken: nextToken
          })
        );
        for (const job of response.BackupJobs ?? []) {
          if (!job.ResourceArn || !job.CreationDate) {
            onSkipped?.({
              kind: "job",
              id: job.BackupJobId,
              reason: !job.ResourceArn ? "missing_resource_arn" : "missing_creation_date"
            });
            continue;
          }
          jobs.push({
            id: job.BackupJobId ?? "N/A",
            resourceLocator: job.ResourceArn,
            resourceType: job.ResourceType,
            createdAt: job.CreationDate,
            completedAt: job.CompletionDate,
            sizeBytes: job.BackupSizeInBytes,
            state: job.State ?? state,
            statusMessage: job.StatusMessage,
            vaultName: job.BackupVaultName,
            recoveryPointLocator: job.RecoveryPointArn
          });
        }
        nextToken = response.NextToken;
      } while (nextToken);
      return jobs;
    },

    async listBackupPlans() {
      const plans: BackupPlanSummary[] = [];
      let nextToken: string | undefined;
      do {
        const response = await backup.send(
          new ListBackupPlansCommand({ NextToken: nextToken })
        );
        for (const plan of response.BackupPlansList ?? []) {
          if (!plan.BackupPlanId) continue;
          plans.push({
            id: plan.BackupPlanId,
            name: plan.BackupPlanName,
            versionId: plan.VersionId,
            createdAt: plan.CreationDate
          });
        }
        nextToken = response.NextToken;
      } while (nextToken);
      return plans;
    },

    async getBackupPlanRules(planId) {
      const response = await backup.send(
        new GetBackupPlanCommand({ BackupPlanId: planId })
      );
      return (response.BackupPlan?.Rules ?? []).map(toRule);
    },

    async listBackupSelections(planId) {
      const selections: BackupSelection[] = [];
      let nextToken: string | undefined;
      do {
        const response = await backup.send(
          new ListBackupSelectionsCommand({ BackupPlanId: planId, NextToken: nextToken })
        );
        for (const item of response.BackupSelectionsList ?? []) {
          if (!item.SelectionId) continue;
          const details = await backup.send(
            new GetBackupSelectionCommand({
              BackupPlanId: planId,
              SelectionId: item.SelectionId
            })
          );
          const selection = details.BackupSelection;
          selections.push({
            name: selection?.SelectionName ?? item.SelectionName,
            iamRole: selection?.IamRoleArn ?? item.IamRoleArn,
            resources: selection?.Resources ?? [],
            conditions: toConditions(selection?.Conditions)
          });
        }
        nextToken = response.NextToken;
      } while (nextToken);
      return selections;
    },

    async listVolumes() {
      const volumes: Volume[] = [];
      let nextToken: string | undefined;
      do {
        const response = await ec2.send(new DescribeVolumesCommand({ NextToken: nextToken }));
        for (const volume of response.Volumes ?? []) {
          if (!volume.VolumeId) continue;
          const attachment = volume.Attachments?.[0];
          volumes.push({
            id: volume.VolumeId,
            name: findNameTag(volume.Tags),
            sizeGb: volume.Size ?? 0,
            volumeType: volume.VolumeType,
            state: volume.State,
            createdAt: volume.CreateTime,
            encrypted: volume.Encrypted ?? false,
            availabilityZone: volume.AvailabilityZone,
            attachedInstance: attachment?.InstanceId,
            device: attachment?.Device
          });
        }
        nextToken = response.NextToken;
      } while (nextToken);
      return volumes;
    },

    async listSnapshots() {
      const snapshots: Snapshot[] = [];
      let nextToken: string | undefined;
      do {
        const response = await ec2.send(
          new DescribeSnapshotsCommand({ OwnerIds: ["self"], NextToken: nextToken })
        );
        for (const snapshot of response.Snapshots ?? []) {
          if (!snapshot.SnapshotId) continue;
          snapshots.push({
            id: snapshot.SnapshotId,
            name: findNameTag(snapshot.Tags),
            volumeId: snapshot.VolumeId,
            startTime: snapshot.StartTime,
            sizeGb: snapshot.VolumeSize ?? 0,
            state: snapshot.State,
            progress: snapshot.Progress,
            description: snapshot.Description,
            encrypted: snapshot.Encrypted ?? false
          });
        }
        nextToken = response.NextToken;
      } while (nextToken);
      return snapshots;
    }
  };
}

/** Regions enabled for the account, sorted by name. */
export async function listAwsRegions(config: { region?: string }) {
  const ec2 = new EC2Client({ region: config.region ?? "us-east-1" });
  const response = await ec2.send(new DescribeRegionsCommand({}));
  return (response.Regions ?? [])
    .map((region) => region.RegionName)
    .filter((name): name is string => Boolean(name))
    .sort();
}

function toRule(rule: AwsBackupRule): BackupRule {
  return {
    name: rule.RuleName,
    targetVault: rule.TargetBackupVaultName,
    scheduleExpression: rule.ScheduleExpression,
    startWindowMinutes: rule.StartWindowMinutes,
    completionWindowMinutes: rule.CompletionWindowMinutes,
    lifecycle: rule.Lifecycle
      ? {
          deleteAfterDays: rule.Lifecycle.DeleteAfterDays,
          moveToColdStorageAfterDays: rule.Lifecycle.MoveToColdStorageAfterDays,
          optInToArchiveForSupportedResources:
            rule.Lifecycle.OptInToArchiveForSupportedResources
        }
      : undefined,
    continuousBackupEnabled: rule.EnableContinuousBackup
  };
}

function toConditions(conditions?: AwsConditions): Record<string, unknown> {
  if (!conditions) return {};
  const groups = {
    StringEquals: conditions.StringEquals,
    StringNotEquals: conditions.StringNotEquals,
    StringLike: conditions.StringLike,
    StringNotLike: conditions.StringNotLike
  };
  const result: Record<string, unknown> = {};
  for (const [operator, parameters] of Object.entries(groups)) {
    if (!parameters || parameters.length === 0) continue;
    result[operator] = parameters.map((parameter) => ({
      ConditionKey: parameter.ConditionKey,
      ConditionValue: parameter.ConditionValue
    }));
  }
  return result;
}

function findNameTag(tags?: Tag[]) {
  return tags?.find((tag) => tag.Key === "Name")?.Value;
}
