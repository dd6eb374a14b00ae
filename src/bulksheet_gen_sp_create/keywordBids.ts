import { BulkgenError } from "./errors";
import { cellText, readSheetRows } from "./readInputs";
import { parseDecimal } from "./validate";

export const KEYWORD_BIDS_REQUIRED_COLUMNS = ["Keyword", "Bid"] as const;

/**
 * Loads keyword-specific bids from a two-column file with "Keyword" and "Bid"
 * headers. Rows whose bid is not a number are skipped; a later row for the same
 * keyword replaces an earlier one. A file without both columns cannot be used and
 * throws `BulkgenError` (MalformedOverrideFile).
 */
export function loadKeywordBids(filePath: string): Map<string, number> {
  const rows = readSheetRows(filePath);
  const header = (rows[0] ?? []).map(cellText);
  const missing = KEYWORD_BIDS_REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length) {
    throw new BulkgenError(
      "MalformedOverrideFile",
      `Keyword bids file must contain 'Keyword' and 'Bid' columns (missing: ${missing.join(", ")})`,
      { filePath, header }
    );
  }

  const keywordIdx = header.indexOf("Keyword");
  const bidIdx = header.indexOf("Bid");
  const bids = new Map<string, number>();
  for (const row of rows.slice(1)) {
    const keyword = cellText(row[keywordIdx]);
    const bid = parseDecimal(cellText(row[bidIdx]));
    if (!keyword || bid === null) continue;
    bids.set(keyword, bid);
  }
  return bids;
}
