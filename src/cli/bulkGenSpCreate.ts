import fs from "node:fs";
import {
  createLocalSessionVerifier,
  createSupabaseSessionVerifier,
} from "../auth/session";
import { BulkgenError } from "../bulksheet_gen_sp_create/errors";
import { EXAMPLE_KEYWORDS, EXAMPLE_SKUS } from "../bulksheet_gen_sp_create/exampleData";
import { loadKeywordBids } from "../bulksheet_gen_sp_create/keywordBids";
import { parseListText, readListColumn } from "../bulksheet_gen_sp_create/readInputs";
import { runSpCreate } from "../bulksheet_gen_sp_create/runCreate";
import { parseSettingsInput } from "../bulksheet_gen_sp_create/settings";
import { getBulkgenEnv } from "../lib/env";

function usage() {
  console.log(
    "Usage: npm run bulkgen:sp:create -- --settings <settings.json> (--keywords <csv|xlsx> | --keywords-text <a,b>) (--skus <csv|xlsx> | --skus-text <a,b>) [--keyword-bids <csv|xlsx>] [--keyword-group-size <n>] [--sku-group-size <n>] [--format xlsx,csv] [--out-dir <dir>] [--access-token <token>] [--run-id <id>] [--example]"
  );
  console.log("Keyword-specific bids are read only from --keyword-bids (columns: Keyword, Bid).");
}

function getArg(flag: string): string | undefined {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

function hasFlag(flag: string): boolean {
  return process.argv.includes(flag);
}

function parseIntegerArg(value: string | undefined, label: string): number | undefined {
  if (value === undefined) return undefined;
  const num = Number(value);
  if (!Number.isInteger(num)) throw new Error(`Invalid ${label}: ${value}`);
  return num;
}

function generateRunId(): string {
  const ts = new Date().toISOString().replace(/[:.]/g, "-");
  const rand = Math.random().toString(36).slice(2, 8);
  return `${ts}-${rand}`;
}

function readSettingsFile(filePath: string) {
  const raw = fs.readFileSync(filePath, "utf-8");
  return parseSettingsInput(JSON.parse(raw));
}

function resolveList(params: {
  fileFlag: string;
  textFlag: string;
  example: string[];
  useExample: boolean;
}): string[] | undefined {
  const filePath = getArg(params.fileFlag);
  if (filePath) return readListColumn(filePath);
  const text = getArg(params.textFlag);
  if (text !== undefined) return parseListText(text);
  if (params.useExample) return [...params.example];
  return undefined;
}

async function main() {
  const env = getBulkgenEnv();
  const settingsPath = getArg("--settings");
  const useExample = hasFlag("--example");
  const keywords = resolveList({
    fileFlag: "--keywords",
    textFlag: "--keywords-text",
    example: EXAMPLE_KEYWORDS,
    useExample,
  });
  const skus = resolveList({
    fileFlag: "--skus",
    textFlag: "--skus-text",
    example: EXAMPLE_SKUS,
    useExample,
  });

  if (!settingsPath || !keywords || !skus) {
    usage();
    process.exit(1);
  }

  const settings = readSettingsFile(settingsPath);
  const keywordBidsPath = getArg("--keyword-bids");
  if (keywordBidsPath) {
    settings.keyword_bids = loadKeywordBids(keywordBidsPath);
  }
  const keywordGroupSize = parseIntegerArg(getArg("--keyword-group-size"), "keyword-group-size");
  const skuGroupSize = parseIntegerArg(getArg("--sku-group-size"), "sku-group-size");
  if (keywordGroupSize !== undefined) settings.keyword_group_size = keywordGroupSize;
  if (skuGroupSize !== undefined) settings.sku_group_size = skuGroupSize;

  const result = await runSpCreate({
    keywords,
    skus,
    settings,
    formats: (getArg("--format") ?? "xlsx").split(","),
    outDir: getArg("--out-dir") ?? env.outDir,
    accessToken: getArg("--access-token") ?? env.accessToken,
    verifier: env.authDisabled ? createLocalSessionVerifier() : createSupabaseSessionVerifier(),
    runId: getArg("--run-id") ?? generateRunId(),
  });

  if (result.status === "unauthenticated") {
    console.error(result.reason);
    process.exit(1);
  }
  if (result.status === "invalid") {
    console.error(`${result.failure.code}: ${result.failure.message}`);
    process.exit(1);
  }

  for (const collision of result.collisions) {
    console.warn(
      `Campaign ID ${collision.unitId} is shared by ${collision.occurrences} campaign units; their rows carry the same ID.`
    );
  }

  console.table(result.preview);
  console.log("Bulk sheet written.");
  console.log({
    runId: result.runId,
    userId: result.userId,
    rows: result.table.rows.length,
    outputPaths: result.outputPaths,
    manifestPath: result.manifestPath,
  });
}

main().catch((err) => {
  if (err instanceof BulkgenError) {
    console.error(`${err.code}: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
