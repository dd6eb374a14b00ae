import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";

export type SheetRows = (string | number | boolean | null)[][];

function readWorkbook(filePath: string): XLSX.WorkBook {
  if (path.extname(filePath).toLowerCase() === ".csv") {
    const text = fs.readFileSync(filePath, "utf-8").replace(/^\uFEFF/, "");
    return XLSX.read(text, { type: "string", raw: true });
  }
  return XLSX.readFile(filePath);
}

/**
 * Reads the first sheet of a CSV or XLSX file. CSV files are decoded as UTF-8 and their
 * cells kept as written, so SKUs like "007" keep their leading zeros. XLSX cells come
 * back as stored values, not their display text.
 */
export function readSheetRows(filePath: string): SheetRows {
  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }
  const workbook = readWorkbook(filePath);
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new Error(`No sheet found in ${filePath}`);
  }
  return XLSX.utils.sheet_to_json<(string | number | boolean | null)[]>(sheet, {
    header: 1,
    raw: true,
    defval: "",
    blankrows: false,
  });
}

export function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "number") return String(value);
  return String(value).trim();
}

/**
 * Values of one column, header row skipped, blank cells dropped, order kept.
 * Without `column` the first column is read.
 */
export function readListColumn(filePath: string, options: { column?: string } = {}): string[] {
  const rows = readSheetRows(filePath);
  const header = (rows[0] ?? []).map(cellText);
  let columnIndex = 0;
  if (options.column) {
    columnIndex = header.indexOf(options.column);
    if (columnIndex === -1) {
      throw new Error(`Column ${options.column} not found in ${filePath}`);
    }
  }

  const values = rows
    .slice(1)
    .map((row) => cellText(row[columnIndex]))
    .filter((value) => value.length > 0);
  if (!values.length) {
    throw new Error(`No values found in ${filePath}`);
  }
  return values;
}

/** Comma or newline separated text, e.g. pasted keywords. */
export function parseListText(text: string): string[] {
  return text
    .replace(/\r?\n/g, ",")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
