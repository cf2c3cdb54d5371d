import {
  KNOWN_STATUSES,
  type BackupJob,
  type KnownStatus,
  type StatusCategory,
  type StatusSummary
} from "../types.js";

export function isKnownStatus(value: string): value is KnownStatus {
  return KNOWN_STATUSES.some((status) => status === value);
}

export function classifyJob(job: Pick<BackupJob, "state" | "statusMessage">): StatusCategory {
  const message = (job.statusMessage ?? "").toLowerCase();
  if (job.state === "COMPLETED" && message.includes("issue")) {
    return "COMPLETED_WITH_ISSUES";
  }
  return job.state;
}

export function summarizeStatuses(jobs: BackupJob[]): StatusSummary {
  const summary: StatusSummary = {};
  for (const job of jobs) {
    const category = classifyJob(job);
    summary[category] = (summary[category] ?? 0) + 1;
  }
  return summary;
}
