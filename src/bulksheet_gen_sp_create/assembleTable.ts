import {
  BIDDING_STRATEGY,
  type BulkRow,
  OPERATION,
  PRODUCT,
  STATE,
  TARGETING_TYPE,
} from "./types";

export const BULK_COLUMNS = [
  "Product",
  "Entity",
  "Operation",
  "Campaign ID",
  "Ad Group ID",
  "Portfolio ID",
  "Ad ID",
  "Keyword ID",
  "Product Targeting ID",
  "Campaign Name",
  "Ad Group Name",
  "Start Date",
  "End Date",
  "Targeting Type",
  "State",
  "Daily Budget",
  "SKU",
  "Ad Group Default Bid",
  "Bid",
  "Keyword Text",
  "Native Language Keyword",
  "Native Language Locale",
  "Match Type",
  "Bidding Strategy",
  "Placement",
  "Percentage",
  "Product Targeting Expression",
] as const;

export type BulkColumn = (typeof BULK_COLUMNS)[number];

export type CellValue = string | number | null;

export type BulkTableRow = Record<BulkColumn, CellValue>;

export type BulkTable = {
  columns: readonly BulkColumn[];
  rows: BulkTableRow[];
};

export const CURRENCY_COLUMNS: ReadonlySet<BulkColumn> = new Set<BulkColumn>([
  "Daily Budget",
  "Ad Group Default Bid",
  "Bid",
]);

const PREVIEW_HIDDEN_COLUMNS: ReadonlySet<BulkColumn> = new Set<BulkColumn>([
  "Portfolio ID",
  "End Date",
]);

function rowCells(row: BulkRow): Partial<Record<BulkColumn, CellValue>> {
  const shared = {
    Product: PRODUCT,
    Entity: row.entity,
    Operation: OPERATION,
    "Campaign ID": row.campaignId,
    State: STATE,
  };
  switch (row.entity) {
    case "Campaign":
      return {
        ...shared,
        "Campaign Name": row.campaignName,
        "Start Date": row.startDate,
        "Targeting Type": TARGETING_TYPE,
        "Daily Budget": row.dailyBudget,
        "Bidding Strategy": BIDDING_STRATEGY,
      };
    case "Ad Group":
      return {
        ...shared,
        "Ad Group ID": row.adGroupId,
        "Ad Group Name": row.adGroupName,
        "Ad Group Default Bid": row.defaultBid,
      };
    case "Bidding Adjustment":
      return {
        ...shared,
        "Ad Group ID": row.adGroupId,
        Placement: row.placement,
        Percentage: row.percentage,
      };
    case "Product Ad":
      return {
        ...shared,
        "Ad Group ID": row.adGroupId,
        SKU: row.sku,
      };
    case "Keyword":
      return {
        ...shared,
        "Ad Group ID": row.adGroupId,
        Bid: row.bid,
        "Keyword Text": row.keywordText,
        "Match Type": row.matchType,
      };
    default: {
      const neverRow: never = row;
      throw new Error(`Unsupported row: ${JSON.stringify(neverRow)}`);
    }
  }
}

function normalizeCell(value: CellValue | undefined): CellValue {
  if (value === undefined || value === null) return null;
  if (typeof value === "string" && !value.trim()) return null;
  return value;
}

function emptyTableRow(): BulkTableRow {
  return {
    Product: null,
    Entity: null,
    Operation: null,
    "Campaign ID": null,
    "Ad Group ID": null,
    "Portfolio ID": null,
    "Ad ID": null,
    "Keyword ID": null,
    "Product Targeting ID": null,
    "Campaign Name": null,
    "Ad Group Name": null,
    "Start Date": null,
    "End Date": null,
    "Targeting Type": null,
    State: null,
    "Daily Budget": null,
    SKU: null,
    "Ad Group Default Bid": null,
    Bid: null,
    "Keyword Text": null,
    "Native Language Keyword": null,
    "Native Language Locale": null,
    "Match Type": null,
    "Bidding Strategy": null,
    Placement: null,
    Percentage: null,
    "Product Targeting Expression": null,
  };
}

export function toTableRow(row: BulkRow): BulkTableRow {
  const cells = rowCells(row);
  const out = emptyTableRow();
  for (const column of BULK_COLUMNS) {
    out[column] = normalizeCell(cells[column]);
  }
  return out;
}

export function assembleBulkTable(rows: BulkRow[]): BulkTable {
  return { columns: BULK_COLUMNS, rows: rows.map(toTableRow) };
}

/** Export/display value of a cell; currency columns become two-decimal strings. */
export function formatCellForExport(column: BulkColumn, value: CellValue): string | number | null {
  if (value === null) return null;
  if (CURRENCY_COLUMNS.has(column) && typeof value === "number") {
    return value.toFixed(2);
  }
  return value;
}

export function toExportMatrix(table: BulkTable): (string | number)[][] {
  const header: (string | number)[] = [...table.columns];
  const body = table.rows.map((row) =>
    table.columns.map((column) => formatCellForExport(column, row[column]) ?? "")
  );
  return [header, ...body];
}

export function countByEntity(table: BulkTable): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const row of table.rows) {
    const entity = String(row.Entity ?? "");
    counts[entity] = (counts[entity] ?? 0) + 1;
  }
  return counts;
}

export function buildPreviewRows(
  table: BulkTable,
  maxRows = 5
): Record<string, string | number | null>[] {
  const columns = table.columns.filter((column) => !PREVIEW_HIDDEN_COLUMNS.has(column));
  return table.rows.slice(0, maxRows).map((row) => {
    const preview: Record<string, string | number | null> = {};
    for (const column of columns) {
      preview[column] = formatCellForExport(column, row[column]);
    }
    return preview;
  });
}
