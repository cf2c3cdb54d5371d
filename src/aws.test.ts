import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  GetBackupPlanCommand,
  GetBackupSelectionCommand,
  ListBackupJobsCommand,
  ListBackupPlansCommand,
  ListBackupSelectionsCommand
} from "@aws-sdk/client-backup";
import {
  DescribeRegionsCommand,
  DescribeSnapshotsCommand,
  DescribeVolumesCommand
} from "@aws-sdk/client-ec2";
import { createAwsBackupSource, isBackupJobState, listAwsRegions } from "./aws.js";

const mocks = vi.hoisted(() => ({
  backupSend: vi.fn(),
  ec2Send: vi.fn()
}));

vi.mock("@aws-sdk/client-backup", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@aws-sdk/client-backup")>();
  return {
    ...actual,
    BackupClient: class {
      send = mocks.backupSend;
    }
  };
});

vi.mock("@aws-sdk/client-ec2", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@aws-sdk/client-ec2")>();
  return {
    ...actual,
    EC2Client: class {
      send = mocks.ec2Send;
    }
  };
});

const createdAfter = new Date("2024-03-03T00:00:00Z");

describe("createAwsBackupSource", () => {
  beforeEach(() => {
    mocks.backupSend.mockReset();
    mocks.ec2Send.mockReset();
  });

  it("follows job pages and maps each job", async () => {
    mocks.backupSend
      .mockResolvedValueOnce({
        BackupJobs: [
          {
            BackupJobId: "job-1",
            ResourceArn: "arn:aws:ec2:eu-west-1:111122223333:volume/vol-1",
            ResourceType: "EBS",
            CreationDate: new Date("2024-05-10T08:00:00Z"),
            BackupSizeInBytes: 1024,
            State: "COMPLETED",
            BackupVaultName: "Default"
          }
        ],
        NextToken: "page-2"
      })
      .mockResolvedValueOnce({
        BackupJobs: [
          {
            BackupJobId: "job-2",
            ResourceArn: "arn:aws:ec2:eu-west-1:111122223333:volume/vol-2",
            CreationDate: new Date("2024-05-11T08:00:00Z"),
            State: "COMPLETED"
          }
        ]
      });

    const source = createAwsBackupSource({ region: "eu-west-1" });
    const jobs = await source.listBackupJobs({ createdAfter, state: "COMPLETED" });

    expect(jobs.map((job) => job.id)).toEqual(["job-1", "job-2"]);
    expect(jobs[0]).toEqual({
      id: "job-1",
      resourceLocator: "arn:aws:ec2:eu-west-1:111122223333:volume/vol-1",
      resourceType: "EBS",
      createdAt: new Date("2024-05-10T08:00:00Z"),
      completedAt: undefined,
      sizeBytes: 1024,
      state: "COMPLETED",
      statusMessage: undefined,
      vaultName: "Default",
      recoveryPointLocator: undefined
    });

    const first = mocks.backupSend.mock.calls[0][0];
    const second = mocks.backupSend.mock.calls[1][0];
    expect(first).toBeInstanceOf(ListBackupJobsCommand);
    expect(first.input).toEqual({ ByCreatedAfter: createdAfter, ByState: "COMPLETED", NextToken: undefined });
    expect(second.input.NextToken).toBe("page-2");
  });

  it("reports jobs without a resource or creation date as skipped", async () => {
    mocks.backupSend.mockResolvedValueOnce({
      BackupJobs: [
        { BackupJobId: "no-arn", CreationDate: new Date("2024-05-10T08:00:00Z") },
        { BackupJobId: "no-date", ResourceArn: "arn:aws:ec2:eu-west-1:111122223333:volume/vol-3" }
      ]
    });
    const onSkipped = vi.fn();
    const source = createAwsBackupSource({ region: "eu-west-1" }, onSkipped);

    await expect(source.listBackupJobs({ createdAfter, state: "FAILED" })).resolves.toEqual([]);
    expect(onSkipped).toHaveBeenNthCalledWith(1, { kind: "job", id: "no-arn", reason: "missing_resource_arn" });
    expect(onSkipped).toHaveBeenNthCalledWith(2, { kind: "job", id: "no-date", reason: "missing_creation_date" });
  });

  it("rejects job states the provider does not know", async () => {
    const source = createAwsBackupSource({ region: "eu-west-1" });
    await expect(source.listBackupJobs({ createdAfter, state: "DONE" })).rejects.toThrow(
      "Unsupported backup job state: DONE"
    );
    expect(mocks.backupSend).not.toHaveBeenCalled();
  });

  it("maps plans without inventing a status or creation date", async () => {
    mocks.backupSend.mockResolvedValueOnce({
      BackupPlansList: [
        { BackupPlanId: "p1", BackupPlanName: "daily", VersionId: "v1", CreationDate: new Date("2024-01-01T00:00:00Z") },
        { BackupPlanId: "p2", BackupPlanName: "weekly" },
        { BackupPlanName: "no-id" }
      ]
    });
    const source = createAwsBackupSource({ region: "eu-west-1" });
    const plans = await source.listBackupPlans();

    expect(mocks.backupSend.mock.calls[0][0]).toBeInstanceOf(ListBackupPlansCommand);
    expect(plans).toEqual([
      { id: "p1", name: "daily", versionId: "v1", createdAt: new Date("2024-01-01T00:00:00Z") },
      { id: "p2", name: "weekly", versionId: undefined, createdAt: undefined }
    ]);
    expect(plans[1]).not.toHaveProperty("deploymentStatus");
  });

  it("maps plan rules with their lifecycle", async () => {
    mocks.backupSend.mockResolvedValueOnce({
      BackupPlan: {
        BackupPlanName: "daily",
        Rules: [
          {
            RuleName: "daily-rule",
            TargetBackupVaultName: "Default",
            ScheduleExpression: "cron(0 5 ? * * *)",
            StartWindowMinutes: 60,
            Lifecycle: { DeleteAfterDays: 35 },
            EnableContinuousBackup: true
          }
        ]
      }
    });
    const source = createAwsBackupSource({ region: "eu-west-1" });
    const rules = await source.getBackupPlanRules("p1");

    const command = mocks.backupSend.mock.calls[0][0];
    expect(command).toBeInstanceOf(GetBackupPlanCommand);
    expect(command.input).toEqual({ BackupPlanId: "p1" });
    expect(rules).toEqual([
      {
        name: "daily-rule",
        targetVault: "Default",
        scheduleExpression: "cron(0 5 ? * * *)",
        startWindowMinutes: 60,
        completionWindowMinutes: undefined,
        lifecycle: {
          deleteAfterDays: 35,
          moveToColdStorageAfterDays: undefined,
          optInToArchiveForSupportedResources: undefined
        },
        continuousBackupEnabled: true
      }
    ]);
  });

  it("loads each selection's resources and conditions", async () => {
    mocks.backupSend.mockImplementation(async (command: unknown) => {
      if (command instanceof ListBackupSelectionsCommand) {
        return { BackupSelectionsList: [{ SelectionId: "s1", SelectionName: "tagged" }] };
      }
      if (command instanceof GetBackupSelectionCommand) {
        return {
          BackupSelection: {
            SelectionName: "tagged",
            IamRoleArn: "arn:aws:iam::111122223333:role/backup",
            Resources: ["arn:aws:ec2:*:*:volume/*"],
            Conditions: {
              StringEquals: [{ ConditionKey: "aws:ResourceTag/backup", ConditionValue: "daily" }],
              StringLike: []
            }
          }
        };
      }
      throw new Error("unexpected command");
    });

    const source = createAwsBackupSource({ region: "eu-west-1" });
    await expect(source.listBackupSelections("p1")).resolves.toEqual([
      {
        name: "tagged",
        iamRole: "arn:aws:iam::111122223333:role/backup",
        resources: ["arn:aws:ec2:*:*:volume/*"],
        conditions: {
          StringEquals: [{ ConditionKey: "aws:ResourceTag/backup", ConditionValue: "daily" }]
        }
      }
    ]);
  });

  it("reads the first attachment and name tag of volumes", async () => {
    mocks.ec2Send.mockResolvedValueOnce({
      Volumes: [
        {
          VolumeId: "vol-1",
          Size: 100,
          VolumeType: "gp3",
          State: "in-use",
          Encrypted: true,
          AvailabilityZone: "eu-west-1a",
          Tags: [{ Key: "Name", Value: "data" }],
          Attachments: [{ InstanceId: "i-0abc", Device: "/dev/xvdf" }]
        },
        { VolumeId: "vol-2", Size: 8 }
      ]
    });
    const source = createAwsBackupSource({ region: "eu-west-1" });
    const volumes = await source.listVolumes();

    expect(mocks.ec2Send.mock.calls[0][0]).toBeInstanceOf(DescribeVolumesCommand);
    expect(volumes[0]).toMatchObject({ id: "vol-1", name: "data", attachedInstance: "i-0abc", device: "/dev/xvdf" });
    expect(volumes[1]).toMatchObject({ id: "vol-2", sizeGb: 8, encrypted: false, attachedInstance: undefined });
  });

  it("lists only snapshots owned by the account", async () => {
    mocks.ec2Send.mockResolvedValueOnce({
      Snapshots: [{ SnapshotId: "snap-1", VolumeId: "vol-1", VolumeSize: 100, State: "completed", Progress: "100%" }]
    });
    const source = createAwsBackupSource({ region: "eu-west-1" });
    const snapshots = await source.listSnapshots();

    const command = mocks.ec2Send.mock.calls[0][0];
    expect(command).toBeInstanceOf(DescribeSnapshotsCommand);
    expect(command.input).toEqual({ OwnerIds: ["self"], NextToken: undefined });
    expect(snapshots).toEqual([
      {
        id: "snap-1",
        name: undefined,
        volumeId: "vol-1",
        startTime: undefined,
        sizeGb: 100,
        state: "completed",
        progress: "100%",
        description: undefined,
        encrypted: false
      }
    ]);
  });
});

describe("listAwsRegions", () => {
  beforeEach(() => {
    mocks.ec2Send.mockReset();
  });

  it("returns region names sorted", async () => {
    mocks.ec2Send.mockResolvedValueOnce({
      Regions: [{ RegionName: "us-east-1" }, { RegionName: "eu-west-1" }, {}]
    });
    await expect(listAwsRegions({ region: "eu-west-1" })).resolves.toEqual(["eu-west-1", "us-east-1"]);
    expect(mocks.ec2Send.mock.calls[0][0]).toBeInstanceOf(DescribeRegionsCommand);
  });
});

describe("isBackupJobState", () => {
  it("accepts provider job states", () => {
    expect(isBackupJobState("COMPLETED")).toBe(true);
    expect(isBackupJobState("completed")).toBe(false);
  });
});
