import { NOT_AVAILABLE, type BackupJob, type ResourceRecord } from "../types.js";
import { formatDateTime } from "../utils.js";

/**
 * Resource id is the last path segment of the resource ARN, e.g.
 * `arn:aws:ec2:eu-west-1:111122223333:volume/vol-1` -> `vol-1`.
 * A locator without `/` is its own id.
 */
export function resourceIdFromLocator(locator: string) {
  const index = locator.lastIndexOf("/");
  return index === -1 ? locator : locator.slice(index + 1);
}

/**
 * One record per distinct resource id. Jobs are scanned in fetch order and the
 * first job seen for a resource fills its record; later jobs never overwrite it,
 * so `last_backup_time` is whatever the listing returned first, not the newest.
 */
export function buildResourceRegistry(jobs: BackupJob[], timeZone?: string) {
  const registry = new Map<string, ResourceRecord>();
  for (const job of jobs) {
    const resourceId = resourceIdFromLocator(job.resourceLocator);
    if (registry.has(resourceId)) continue;
    registry.set(resourceId, {
      resource_id: resourceId,
      resource_type: job.resourceType ?? NOT_AVAILABLE,
      resource_locator: job.resourceLocator,
      last_backup_time: formatDateTime(job.createdAt, timeZone),
      vault_name: job.vaultName ?? NOT_AVAILABLE
    });
  }
  return registry;
}
