import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { type BulkTable, toExportMatrix } from "./assembleTable";
import { BulkgenError } from "./errors";

export const SP_CREATE_SHEET_NAME = "Sponsored Products Campaigns";
export const EXPORT_FORMATS = ["xlsx", "csv"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

function isExportFormat(value: string): value is ExportFormat {
  return (EXPORT_FORMATS as readonly string[]).includes(value);
}

export function parseExportFormat(value: string): ExportFormat {
  const lower = value.trim().toLowerCase();
  if (!isExportFormat(lower)) {
    throw new BulkgenError("UnsupportedExportFormat", `Unsupported format: ${value}`, {
      allowed: [...EXPORT_FORMATS],
    });
  }
  return lower;
}

export function exportTimestamp(now: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${date}_${time}`;
}

function columnWidths(matrix: (string | number)[][]): XLSX.ColInfo[] {
  const header = matrix[0] ?? [];
  return header.map((_, idx) => {
    const longest = Math.max(0, ...matrix.map((row) => String(row[idx] ?? "").length));
    return { wch: longest + 2 };
  });
}

export function buildBulkWorkbook(table: BulkTable): XLSX.WorkBook {
  const matrix = toExportMatrix(table);
  const sheet = XLSX.utils.aoa_to_sheet(matrix);
  sheet["!cols"] = columnWidths(matrix);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, SP_CREATE_SHEET_NAME);
  return workbook;
}

/** Writes the table as `sp_bulk_upload_<timestamp>.<format>` and returns the path. */
export function writeBulkSheet(params: {
  table: BulkTable;
  outDir: string;
  format: string;
  timestamp?: string;
}): string {
  const format = parseExportFormat(params.format);
  if (!fs.existsSync(params.outDir)) {
    fs.mkdirSync(params.outDir, { recursive: true });
  }

  const timestamp = params.timestamp ?? exportTimestamp();
  const outputPath = path.join(params.outDir, `sp_bulk_upload_${timestamp}.${format}`);
  XLSX.writeFile(buildBulkWorkbook(params.table), outputPath, { bookType: format });
  return outputPath;
}
