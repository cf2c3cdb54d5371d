import { describeError, type ContextLogger } from "./logger.js";
import type { BackupSource } from "./aws.js";
import type {
  BackupInventory,
  BackupJob,
  BackupPlan,
  CollectionIssue
} from "./types.js";
import { withDuration } from "./utils.js";

export type CollectOptions = {
  periodDays: number;
  jobStates: string[];
  now: Date;
  includeTimings?: boolean;
};

export type CollectResult = {
  inventory: BackupInventory;
  issues: CollectionIssue[];
  requests: number;
};

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Pulls every resource list for the report. A failed sub-fetch is logged,
 * recorded as an issue and replaced by an empty list; the rest of the
 * inventory is still collected.
 */
export async function collectInventory(
  source: BackupSource,
  options: CollectOptions,
  log: ContextLogger
): Promise<CollectResult> {
  const issues: CollectionIssue[] = [];
  let requests = 0;

  async function settle<T>(
    scope: CollectionIssue["scope"],
    target: string | undefined,
    fetch: () => Promise<T[]>
  ): Promise<T[]> {
    requests += 1;
    try {
      return await fetch();
    } catch (error) {
      const details = describeError(error);
      log.warn("collect.partial_failure", { scope, target: target ?? null, ...details });
      issues.push({ scope, target, message: String(details.message) });
      return [];
    }
  }

  const createdAfter = new Date(options.now.getTime() - options.periodDays * DAY_MS);

  const jobsStart = Date.now();
  const jobs: BackupJob[] = [];
  for (const state of options.jobStates) {
    const page = await settle("jobs", state, () =>
      source.listBackupJobs({ createdAfter, state })
    );
    jobs.push(...page);
  }
  log.info("collect.jobs.done", {
    count: jobs.length,
    states: options.jobStates,
    createdAfter: createdAfter.toISOString(),
    ...withDuration(jobsStart, options.includeTimings)
  });

  const plansStart = Date.now();
  const summaries = await settle("plans", undefined, () => source.listBackupPlans());
  const plans: BackupPlan[] = [];
  for (const summary of summaries) {
    const rules = await settle("rules", summary.id, () =>
      source.getBackupPlanRules(summary.id)
    );
    const selections = await settle("selections", summary.id, () =>
      source.listBackupSelections(summary.id)
    );
    plans.push({ ...summary, rules, selections });
  }
  log.info("collect.plans.done", {
    count: plans.length,
    ...withDuration(plansStart, options.includeTimings)
  });

  const storageStart = Date.now();
  const volumes = await settle("volumes", undefined, () => source.listVolumes());
  const snapshots = await settle("snapshots", undefined, () => source.listSnapshots());
  log.info("collect.storage.done", {
    volumes: volumes.length,
    snapshots: snapshots.length,
    ...withDuration(storageStart, options.includeTimings)
  });

  return { inventory: { jobs, plans, volumes, snapshots }, issues, requests };
}
