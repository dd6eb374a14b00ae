import { assembleBulkTable, type BulkTable } from "./assembleTable";
import { buildCampaignUnits } from "./buildUploadRows";
import type { ValidationFailure } from "./errors";
import { normalizeCampaignSettings } from "./settings";
import type { CampaignSettings, CampaignSettingsInput, CampaignUnit } from "./types";
import { validateCampaignSettings, validateKeywords, validateSkus } from "./validate";

export type GenerateResult =
  | { ok: true; settings: CampaignSettings; units: CampaignUnit[]; table: BulkTable }
  | ValidationFailure;

/**
 * Validates the lists and settings, then expands them into the bulksheet table.
 * Rule violations come back as the failure variant; nothing is generated for them.
 */
export function generateBulkSheet(params: {
  keywords: string[];
  skus: string[];
  settings: CampaignSettingsInput;
}): GenerateResult {
  const checks = [
    () => validateKeywords(params.keywords),
    () => validateSkus(params.skus),
    () => validateCampaignSettings(params.settings),
  ];
  for (const check of checks) {
    const result = check();
    if (!result.ok) return result;
  }

  const settings = normalizeCampaignSettings(params.settings);
  const units = buildCampaignUnits({
    keywords: params.keywords,
    skus: params.skus,
    settings,
  });
  const table = assembleBulkTable(units.flatMap((unit) => unit.rows));
  return { ok: true, settings, units, table };
}
