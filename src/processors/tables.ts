import {
  KNOWN_STATUSES,
  NOT_AVAILABLE,
  type BackupJobView,
  type CellValue,
  type ColumnKind,
  type MonthlyPivot,
  type PivotCell,
  type ReportDocument,
  type ReportTable,
  type TableColumn
} from "../types.js";
import { gbToTb, listMonthsBetween, monthOf, round2 } from "../utils.js";

export const TABLE_NAMES = [
  "Summary",
  "Unique Resources",
  "Backup Plans",
  "Backup Jobs",
  "Resource Summary",
  "Monthly Resource Summary",
  "EBS Volumes",
  "Snapshots"
] as const;

export type TableName = (typeof TABLE_NAMES)[number];

export function hasJobs(report: ReportDocument) {
  return report.backups.length > 0;
}

/**
 * Flattens a report into the workbook tables, in sheet order. Reads the
 * document only; repeated calls on the same report give equal tables.
 */
export function projectReport(report: ReportDocument): ReportTable[] {
  return [
    buildSummaryTable(report),
    recordTable("Unique Resources", report.unique_resources, [
      ["resource_id", "text"],
      ["resource_type", "text"],
      ["resource_locator", "text"],
      ["last_backup_time", "text"],
      ["vault_name", "text"]
    ]),
    buildPlansTable(report),
    recordTable("Backup Jobs", report.backups, [
      ["id", "text"],
      ["resource_id", "text"],
      ["resource_locator", "text"],
      ["resource_type", "text"],
      ["size_bytes", "integer"],
      ["size_gb", "decimal"],
      ["created_at", "text"],
      ["completed_at", "text"],
      ["state", "text"],
      ["status_message", "text"],
      ["vault_name", "text"],
      ["recovery_point_locator", "text"]
    ]),
    buildResourceSummaryTable(report.backups),
    pivotToTable(buildMonthlyPivot(report.backups)),
    recordTable("EBS Volumes", report.storage.volumes, [
      ["volume_id", "text"],
      ["name", "text"],
      ["size_gb", "integer"],
      ["volume_type", "text"],
      ["state", "text"],
      ["creation_date", "text"],
      ["encrypted", "text"],
      ["availability_zone", "text"],
      ["attached_instance", "text"],
      ["device", "text"]
    ]),
    recordTable("Snapshots", report.storage.snapshots, [
      ["snapshot_id", "text"],
      ["name", "text"],
      ["volume_id", "text"],
      ["start_time", "text"],
      ["size_gb", "integer"],
      ["state", "text"],
      ["progress", "text"],
      ["description", "text"],
      ["encrypted", "text"]
    ])
  ];
}

export function findTable(tables: ReportTable[], name: string) {
  const wanted = name.trim().toLowerCase();
  return tables.find((table) => table.name.toLowerCase() === wanted);
}

function buildSummaryTable(report: ReportDocument): ReportTable {
  const created = report.backups.map((job) => job.created_at);
  // `YYYY-MM-DD HH:mm` compares lexicographically in time order.
  const first = created.reduce<string | undefined>(
    (min, value) => (min === undefined || value < min ? value : min),
    undefined
  );
  const last = created.reduce<string | undefined>(
    (max, value) => (max === undefined || value > max ? value : max),
    undefined
  );
  const totalGb = report.backups.reduce((sum, job) => sum + job.size_gb, 0);

  const rows: CellValue[][] = [
    ["Report Generation Date", report.generated_at],
    ["Region", report.region],
    ["Period (days)", report.period_days],
    ["First Backup Date", first ?? NOT_AVAILABLE],
    ["Last Backup Date", last ?? NOT_AVAILABLE],
    ["Total Unique Resources", report.unique_resources.length],
    ["Total Backups", report.backups.length],
    ["Total Size (TB)", round2(gbToTb(totalGb))],
    ["", ""],
    ["Job Status Summary:", ""],
    // Other raw states appear in the JSON document only.
    ...KNOWN_STATUSES.map((status) => [status, report.status_summary[status] ?? 0])
  ];

  return {
    name: "Summary",
    columns: [
      { header: "Report Information", kind: "text" },
      { header: "Values", kind: "value" }
    ],
    rows
  };
}

function buildPlansTable(report: ReportDocument): ReportTable {
  const rows: CellValue[][] = [];
  for (const plan of report.plans) {
    const resourcesCount = plan.selections.reduce(
      (sum, selection) => sum + selection.resources.length,
      0
    );
    for (const rule of plan.rules) {
      rows.push([
        plan.name,
        plan.id,
        plan.created_at,
        rule.name,
        rule.schedule_expression,
        rule.target_vault,
        rule.lifecycle.delete_after_days ?? NOT_AVAILABLE,
        resourcesCount
      ]);
    }
  }
  return {
    name: "Backup Plans",
    columns: [
      { header: "Plan Name", kind: "text" },
      { header: "Plan ID", kind: "text" },
      { header: "Creation Date", kind: "text" },
      { header: "Rule Name", kind: "text" },
      { header: "Schedule", kind: "text" },
      { header: "Vault", kind: "text" },
      { header: "Retention Days", kind: "integer" },
      { header: "Resources Count", kind: "integer" }
    ],
    rows
  };
}

function buildResourceSummaryTable(backups: BackupJobView[]): ReportTable {
  const totals = new Map<string, { count: number; sizeGb: number }>();
  for (const job of backups) {
    const entry = totals.get(job.resource_id) ?? { count: 0, sizeGb: 0 };
    entry.count += 1;
    entry.sizeGb += job.size_gb;
    totals.set(job.resource_id, entry);
  }
  return {
    name: "Resource Summary",
    columns: [
      { header: "Resource ID", kind: "text" },
      { header: "Total Backups", kind: "integer" },
      { header: "Total Size (TB)", kind: "decimal" },
      { header: "Average Size (GB)", kind: "decimal" }
    ],
    rows: Array.from(totals, ([resourceId, entry]) => [
      resourceId,
      entry.count,
      round2(gbToTb(entry.sizeGb)),
      round2(entry.sizeGb / entry.count)
    ])
  };
}

/**
 * Month-by-resource aggregates in one pass. Months cover every calendar month
 * from the earliest to the latest job, so a resource with no jobs in a month
 * still gets a zero cell there. Rows are ordered by resource id.
 */
export function buildMonthlyPivot(backups: BackupJobView[]): MonthlyPivot {
  if (backups.length === 0) {
    return { months: [], rows: [] };
  }

  const byResource = new Map<string, Map<string, { count: number; sum: number }>>();
  let firstMonth = monthOf(backups[0].created_at);
  let lastMonth = firstMonth;

  for (const job of backups) {
    const month = monthOf(job.created_at);
    if (month < firstMonth) firstMonth = month;
    if (month > lastMonth) lastMonth = month;

    const months = byResource.get(job.resource_id) ?? new Map<string, { count: number; sum: number }>();
    const cell = months.get(month) ?? { count: 0, sum: 0 };
    cell.count += 1;
    cell.sum += job.size_gb;
    months.set(month, cell);
    byResource.set(job.resource_id, months);
  }

  const months = listMonthsBetween(firstMonth, lastMonth);
  const resourceIds = Array.from(byResource.keys()).sort();

  return {
    months,
    rows: resourceIds.map((resourceId) => {
      const cells = byResource.get(resourceId);
      return {
        resource_id: resourceId,
        cells: months.map((month): PivotCell => {
          const cell = cells?.get(month);
          if (!cell) return { count: 0, avg_gb: 0, total_gb: 0 };
          return { count: cell.count, avg_gb: cell.sum / cell.count, total_gb: cell.sum };
        })
      };
    })
  };
}

export function pivotToTable(pivot: MonthlyPivot): ReportTable {
  const columns: TableColumn[] = [{ header: "resource_id", kind: "text" }];
  for (const month of pivot.months) {
    columns.push(
      { header: `${month} (Count)`, kind: "integer" },
      { header: `${month} (GB Avg)`, kind: "decimal" },
      { header: `${month} (GB Total)`, kind: "decimal" }
    );
  }
  return {
    name: "Monthly Resource Summary",
    columns,
    rows: pivot.rows.map((row) => [
      row.resource_id,
      ...row.cells.flatMap((cell) => [cell.count, cell.avg_gb, cell.total_gb])
    ])
  };
}

function recordTable<T extends Record<string, CellValue>>(
  name: TableName,
  records: T[],
  columns: [keyof T & string, ColumnKind][]
): ReportTable {
  return {
    name,
    columns: columns.map(([key, kind]) => ({ header: key, kind })),
    rows: records.map((record) => columns.map(([key]) => record[key]))
  };
}
