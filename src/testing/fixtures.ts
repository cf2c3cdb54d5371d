import { vi } from "vitest";
import type { ContextLogger } from "../logger.js";
import type { ArtifactBody, StorageClient } from "../storage.js";
import type { BackupInventory, BackupJob, BackupPlan } from "../types.js";

export const GIB = 1024 ** 3;

export function makeJob(overrides: Partial<BackupJob> = {}): BackupJob {
  return {
    id: "job-1",
    resourceLocator: "arn:aws:ec2:eu-west-1:111122223333:volume/vol-1",
    resourceType: "EBS",
    createdAt: new Date("2024-05-10T08:00:00Z"),
    completedAt: new Date("2024-05-10T08:20:00Z"),
    sizeBytes: 5 * GIB,
    state: "COMPLETED",
    statusMessage: undefined,
    vaultName: "Default",
    recoveryPointLocator: "arn:aws:ec2:eu-west-1::snapshot/snap-1",
    ...overrides
  };
}

export function makePlan(overrides: Partial<BackupPlan> = {}): BackupPlan {
  return {
    id: "plan-1",
    name: "daily",
    versionId: "v1",
    createdAt: new Date("2024-01-15T09:30:00Z"),
    rules: [
      {
        name: "daily-rule",
        targetVault: "Default",
        scheduleExpression: "cron(0 5 ? * * *)",
        startWindowMinutes: 60,
        completionWindowMinutes: 180,
        lifecycle: { deleteAfterDays: 35 },
        continuousBackupEnabled: false
      }
    ],
    selections: [
      {
        name: "tagged",
        iamRole: "arn:aws:iam::111122223333:role/backup",
        resources: ["arn:aws:ec2:*:*:volume/*"],
        conditions: {}
      }
    ],
    ...overrides
  };
}

export function makeInventory(overrides: Partial<BackupInventory> = {}): BackupInventory {
  return { jobs: [], plans: [], volumes: [], snapshots: [], ...overrides };
}

export function createMemoryStorage() {
  const objects = new Map<string, ArtifactBody>();
  const storage: StorageClient = {
    async put(key, body) {
      objects.set(key, body);
      const size = typeof body === "string" ? Buffer.byteLength(body, "utf8") : body.byteLength;
      return { key, uri: `memory://${key}`, size };
    },
    async get(key) {
      const body = objects.get(key);
      if (body === undefined) return null;
      return typeof body === "string" ? body : Buffer.from(body).toString("utf8");
    },
    async list(prefix) {
      return Array.from(objects.keys())
        .filter((key) => key.startsWith(prefix))
        .sort();
    }
  };
  return { storage, objects };
}

export function createTestLogger(): ContextLogger {
  const log: ContextLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    withContext: () => log
  };
  return log;
}
