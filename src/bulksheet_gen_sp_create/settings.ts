import { findBid, isMatchType, parseDecimal } from "./validate";
import {
  type CampaignSettings,
  type CampaignSettingsInput,
  type MatchType,
  type PlacementAdjustment,
  PLACEMENT_TOP_OF_SEARCH,
} from "./types";

export const DEFAULT_CAMPAIGN_NAME_TEMPLATE = "SP_match_type_[SKU]";
export const DEFAULT_AD_GROUP_NAME_TEMPLATE = "AG_match_type_[SKU]";

type RecordValue = Record<string, unknown>;

function isRecord(value: unknown): value is RecordValue {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function numberOrString(value: unknown, field: string, errors: string[]): number | string {
  if (typeof value === "number" || typeof value === "string") return value;
  errors.push(`${field} is required and must be a number or string`);
  return "";
}

function requiredString(value: unknown, field: string, errors: string[]): string {
  if (typeof value !== "string") {
    errors.push(`${field} is required and must be a string`);
    return "";
  }
  return value.trim();
}

function optionalString(value: unknown, field: string, errors: string[]): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    errors.push(`${field} must be a string when provided`);
    return undefined;
  }
  return value.trim() || undefined;
}

function optionalNumber(value: unknown, field: string, errors: string[]): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    errors.push(`${field} must be a finite number when provided`);
    return undefined;
  }
  return value;
}

function stringList(value: unknown, field: string, errors: string[]): string[] {
  if (!Array.isArray(value)) {
    errors.push(`${field} is required and must be an array of strings`);
    return [];
  }
  const out: string[] = [];
  value.forEach((item, idx) => {
    if (typeof item !== "string") {
      errors.push(`${field}[${idx}] must be a string`);
      return;
    }
    out.push(item.trim());
  });
  return out;
}

function bidMap(value: unknown, field: string, errors: string[]): Record<string, number | string> {
  if (!isRecord(value)) {
    errors.push(`${field} is required and must be an object of match type to bid`);
    return {};
  }
  const out: Record<string, number | string> = {};
  for (const [key, bid] of Object.entries(value)) {
    out[key] = numberOrString(bid, `${field}.${key}`, errors);
  }
  return out;
}

/**
 * Reads a settings JSON document into `CampaignSettingsInput`. Only the shape is
 * checked here; value rules belong to `validateCampaignSettings`.
 */
export function parseSettingsInput(raw: unknown): CampaignSettingsInput {
  if (!isRecord(raw)) {
    throw new Error("Invalid settings: expected JSON object.");
  }
  const errors: string[] = [];

  const settings: CampaignSettingsInput = {
    daily_budget: numberOrString(raw.daily_budget, "daily_budget", errors),
    start_date: requiredString(raw.start_date, "start_date", errors),
    match_types: stringList(raw.match_types, "match_types", errors),
    bids: bidMap(raw.bids, "bids", errors),
    bid_adjustment: optionalString(raw.bid_adjustment, "bid_adjustment", errors),
    placement: optionalString(raw.placement, "placement", errors),
    campaign_name_template:
      optionalString(raw.campaign_name_template, "campaign_name_template", errors) ??
      DEFAULT_CAMPAIGN_NAME_TEMPLATE,
    ad_group_name_template:
      optionalString(raw.ad_group_name_template, "ad_group_name_template", errors) ??
      DEFAULT_AD_GROUP_NAME_TEMPLATE,
    keyword_group_size: optionalNumber(raw.keyword_group_size, "keyword_group_size", errors),
    sku_group_size: optionalNumber(raw.sku_group_size, "sku_group_size", errors),
  };

  if (raw.keyword_bids !== undefined) {
    errors.push("keyword_bids is not read from settings; pass a Keyword/Bid file with --keyword-bids");
  }

  if (errors.length) {
    throw new Error(`Invalid settings:\n- ${errors.join("\n- ")}`);
  }
  return settings;
}

function requireDecimal(value: number | string, label: string): number {
  const num = parseDecimal(value);
  if (num === null) throw new Error(`Invalid ${label}: ${value}`);
  return num;
}

/**
 * Builds the immutable settings used by the row generator. Call only after
 * `validateCampaignSettings` passed; anything it would reject is thrown here.
 */
export function normalizeCampaignSettings(input: CampaignSettingsInput): CampaignSettings {
  const matchTypes: MatchType[] = [];
  const bids = new Map<MatchType, number>();
  for (const raw of input.match_types) {
    const matchType = raw.toLowerCase();
    if (!isMatchType(matchType)) {
      throw new Error(`Invalid match type: ${raw}`);
    }
    if (bids.has(matchType)) continue;
    const bid = findBid(input.bids, matchType);
    if (bid === undefined) {
      throw new Error(`Missing bid for match type: ${matchType}`);
    }
    matchTypes.push(matchType);
    bids.set(matchType, requireDecimal(bid, `bid for ${matchType}`));
  }

  let placementAdjustment: PlacementAdjustment | undefined;
  if (input.placement && input.bid_adjustment) {
    if (input.placement !== PLACEMENT_TOP_OF_SEARCH) {
      throw new Error(`Invalid placement: ${input.placement}`);
    }
    placementAdjustment = { placement: PLACEMENT_TOP_OF_SEARCH, percentage: input.bid_adjustment };
  }

  return Object.freeze({
    dailyBudget: requireDecimal(input.daily_budget, "daily_budget"),
    startDate: input.start_date,
    matchTypes: Object.freeze(matchTypes),
    bids,
    keywordBids: input.keyword_bids,
    placementAdjustment,
    campaignNameTemplate: input.campaign_name_template,
    adGroupNameTemplate: input.ad_group_name_template,
    keywordGroupSize: input.keyword_group_size,
    skuGroupSize: input.sku_group_size,
  });
}
