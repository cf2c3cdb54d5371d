import ExcelJS from "exceljs";
import type { ColumnKind, ReportTable } from "./types.js";

export const XLSX_CONTENT_TYPE =
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

const INTEGER_FORMAT = "#,##0";
const DECIMAL_FORMAT = "#,##0.00";

const numberFormats: Record<ColumnKind, string | undefined> = {
  text: undefined,
  integer: INTEGER_FORMAT,
  decimal: DECIMAL_FORMAT,
  value: undefined
};

const MAX_COLUMN_WIDTH = 60;

export function buildWorkbook(tables: ReportTable[], generatedAt?: Date) {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = "backup-reporter";
  if (generatedAt) {
    workbook.created = generatedAt;
  }

  for (const table of tables) {
    const sheet = workbook.addWorksheet(table.name);
    sheet.columns = table.columns.map((column, index) => {
      const numFmt = numberFormats[column.kind];
      return {
        header: column.header,
        key: `c${index}`,
        width: columnWidth(table, index),
        style: numFmt ? { numFmt } : {}
      };
    });
    sheet.getRow(1).font = { bold: true };
    sheet.views = [{ state: "frozen", ySplit: 1 }];
    for (const row of table.rows) {
      const added = sheet.addRow(row);
      table.columns.forEach((column, index) => {
        const value = row[index];
        if (column.kind !== "value" || typeof value !== "number") return;
        added.getCell(index + 1).numFmt = Number.isInteger(value) ? INTEGER_FORMAT : DECIMAL_FORMAT;
      });
    }
  }

  return workbook;
}

export async function renderWorkbook(tables: ReportTable[], generatedAt?: Date) {
  const buffer = await buildWorkbook(tables, generatedAt).xlsx.writeBuffer();
  return new Uint8Array(buffer);
}

function columnWidth(table: ReportTable, index: number) {
  const header = table.columns[index]?.header ?? "";
  let width = header.length;
  for (const row of table.rows) {
    const value = row[index];
    if (value === undefined) continue;
    width = Math.max(width, String(value).length);
  }
  return Math.min(MAX_COLUMN_WIDTH, width + 2);
}
