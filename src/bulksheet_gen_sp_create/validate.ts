import { DATE_EXAMPLES, TEMPLATE_TOKENS } from "./nameTemplate";
import { fail, VALID, type ValidationResult } from "./errors";
import {
  type CampaignSettingsInput,
  MATCH_TYPES,
  type MatchType,
  type NameTemplateKind,
  PLACEMENT_TOP_OF_SEARCH,
} from "./types";

export const MAX_KEYWORD_LENGTH = 80;
export const MAX_SKU_LENGTH = 40;
export const MAX_TEMPLATE_LENGTH = 128;
export const MIN_DAILY_BUDGET = 1.0;
export const MIN_BID_AMOUNT = 0.02;
export const MIN_BID_ADJUSTMENT = 0;
export const MAX_BID_ADJUSTMENT = 900;

const KEYWORD_PATTERN = /^[\p{L}\p{N}\s\-']+$/u;
const SKU_PATTERN = /^[a-zA-Z0-9_\-.,></":;+=]+$/;
const TEMPLATE_FREE_TEXT_PATTERN = /^[A-Za-z0-9\-_]+$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const TEMPLATE_SYNONYMS = new Set([
  "type",
  "kw",
  "[kw]",
  "match",
  "keyword",
  "sp",
  "sponsored",
  "products",
  "root",
  "group",
  "category",
  "ag",
]);

function validateList(
  items: string[],
  params: {
    singular: string;
    plural: string;
    field: string;
    maxLength: number;
    pattern: RegExp;
  }
): ValidationResult {
  if (!items.length) {
    return fail("EmptyInput", `No ${params.singular} provided`);
  }
  for (const item of items) {
    if (!item.trim()) {
      return fail("EmptyItem", `Empty value found in ${params.plural}`);
    }
    if (item.length > params.maxLength) {
      return fail(
        "LengthExceeded",
        `Invalid length for ${params.field}: '${item}' exceeds maximum length of ${params.maxLength}`
      );
    }
    if (!params.pattern.test(item)) {
      return fail("InvalidCharacters", `Invalid characters in ${params.field}: ${item}`);
    }
  }
  return VALID;
}

export function validateKeywords(keywords: string[]): ValidationResult {
  return validateList(keywords, {
    singular: "keyword",
    plural: "keywords",
    field: "Keyword",
    maxLength: MAX_KEYWORD_LENGTH,
    pattern: KEYWORD_PATTERN,
  });
}

export function validateSkus(skus: string[]): ValidationResult {
  return validateList(skus, {
    singular: "SKU",
    plural: "SKUs",
    field: "SKU",
    maxLength: MAX_SKU_LENGTH,
    pattern: SKU_PATTERN,
  });
}

export function isMatchType(value: string): value is MatchType {
  return (MATCH_TYPES as readonly string[]).includes(value);
}

export function validateMatchTypes(matchTypes: string[]): ValidationResult {
  if (!matchTypes.length) {
    return fail("EmptyInput", "No Match type provided");
  }
  const invalid = [...new Set(matchTypes.map((value) => value.toLowerCase()))].filter(
    (value) => !isMatchType(value)
  );
  if (invalid.length) {
    return fail("InvalidCharacters", `Invalid characters in Match type: ${invalid.join(", ")}`);
  }
  return VALID;
}

export function parseDecimal(value: number | string): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const raw = value.trim();
  if (!DECIMAL_PATTERN.test(raw)) return null;
  const num = Number(raw);
  return Number.isFinite(num) ? num : null;
}

export function validateNumericInput(
  value: number | string,
  fieldName: string,
  minValue: number
): ValidationResult {
  const num = parseDecimal(value);
  if (num === null) {
    return fail("InvalidNumber", `Invalid numeric value for ${fieldName}`);
  }
  if (num <= minValue) {
    return fail("BelowMinimum", `Invalid value for ${fieldName}: must be greater than ${minValue}`);
  }
  return VALID;
}

export function todayIsoDate(now: Date = new Date()): string {
  const yyyy = String(now.getFullYear()).padStart(4, "0");
  const mm = String(now.getMonth() + 1).padStart(2, "0");
  const dd = String(now.getDate()).padStart(2, "0");
  return `${yyyy}-${mm}-${dd}`;
}

export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

/** `date` is a YYYY-MM-DD string; "today" is the local calendar day. */
export function validateDate(date: string): ValidationResult {
  if (!isCalendarDate(date)) {
    return fail(
      "InvalidDate",
      `Invalid value: ${date} specified for field: Start Date, the correct date format is YYYY-MM-DD`
    );
  }
  if (date < todayIsoDate()) {
    return fail("PastDate", "Start date cannot be in the past");
  }
  return VALID;
}

export function validateBidAdjustment(value: string, placement: string): ValidationResult {
  if (placement !== PLACEMENT_TOP_OF_SEARCH) {
    return fail("InvalidPlacement", `Invalid value: "${placement}" for column: "Placement"`);
  }
  if (!value.endsWith("%")) {
    return fail("InvalidPercentageFormat", `Invalid value: "${value}" for column: "Percentage"`);
  }
  const digits = value.replace(/%+$/, "");
  if (!INTEGER_PATTERN.test(digits)) {
    return fail("InvalidNumber", `Invalid value: "${value}" for column: "Percentage"`);
  }
  const percentage = Number(digits);
  if (percentage < MIN_BID_ADJUSTMENT || percentage > MAX_BID_ADJUSTMENT) {
    return fail(
      "PercentageOutOfRange",
      `Bid adjustment must be between ${MIN_BID_ADJUSTMENT}% and ${MAX_BID_ADJUSTMENT}%`
    );
  }
  return VALID;
}

function knownTokensFor(kind: NameTemplateKind): Set<string> {
  const tokens: string[] = [
    TEMPLATE_TOKENS.sku,
    TEMPLATE_TOKENS.matchType,
    TEMPLATE_TOKENS.adType,
    TEMPLATE_TOKENS.root,
    TEMPLATE_TOKENS.keyword,
  ];
  if (kind === "ad_group") tokens.push(TEMPLATE_TOKENS.adGroup);
  return new Set(tokens.map((token) => token.toLowerCase()));
}

function templateLabel(kind: NameTemplateKind): string {
  return kind === "campaign" ? "campaign" : "ad group";
}

export function validateNameTemplate(template: string, kind: NameTemplateKind): ValidationResult {
  const label = templateLabel(kind);
  if (!template.trim()) {
    return fail("EmptyItem", `Empty value found in ${label} name template`);
  }
  if (template.length > MAX_TEMPLATE_LENGTH) {
    return fail("TemplateLengthExceeded", `${label} name template exceeds maximum length`);
  }

  const knownTokens = knownTokensFor(kind);
  const dateExamples: readonly string[] = DATE_EXAMPLES;
  let hasSku = false;
  let hasMatchType = false;

  for (const segment of template.split("_")) {
    if (!segment) continue;
    const lower = segment.toLowerCase();

    // "match_type" is split in two by the separator; "match" alone marks it.
    if (lower.includes(TEMPLATE_TOKENS.sku.toLowerCase())) hasSku = true;
    if (lower.includes("match")) hasMatchType = true;

    if (knownTokens.has(lower)) continue;
    if (dateExamples.includes(segment)) continue;
    if (TEMPLATE_SYNONYMS.has(lower)) continue;
    if (!TEMPLATE_FREE_TEXT_PATTERN.test(segment)) {
      return fail(
        "InvalidTemplateCharacters",
        `Invalid characters in custom text: ${segment}. Only letters, numbers, hyphens, and underscores are allowed.`
      );
    }
  }

  const missing: string[] = [];
  if (!hasSku) missing.push(TEMPLATE_TOKENS.sku);
  if (!hasMatchType) missing.push(TEMPLATE_TOKENS.matchType);
  if (missing.length) {
    return fail(
      "MissingTemplatePlaceholder",
      `Missing required parts in ${label} template: ${missing.join(", ")}`
    );
  }
  return VALID;
}

function validateGroupSize(value: number | undefined, fieldName: string): ValidationResult {
  if (value === undefined) return VALID;
  if (!Number.isInteger(value)) {
    return fail("InvalidNumber", `Invalid numeric value for ${fieldName}: must be a whole number`);
  }
  return VALID;
}

export function validateCampaignSettings(settings: CampaignSettingsInput): ValidationResult {
  const checks: (() => ValidationResult)[] = [
    () => validateMatchTypes(settings.match_types),
    () => validateNumericInput(settings.daily_budget, "Daily budget", MIN_DAILY_BUDGET),
    () => validateBids(settings),
    () => validateGroupSize(settings.keyword_group_size, "Keyword group size"),
    () => validateGroupSize(settings.sku_group_size, "SKU group size"),
    () =>
      settings.bid_adjustment && settings.placement
        ? validateBidAdjustment(settings.bid_adjustment, settings.placement)
        : VALID,
    () => validateDate(settings.start_date),
    () => validateNameTemplate(settings.campaign_name_template, "campaign"),
    () => validateNameTemplate(settings.ad_group_name_template, "ad_group"),
  ];

  for (const check of checks) {
    const result = check();
    if (!result.ok) return result;
  }
  return VALID;
}

export function findBid(bids: Record<string, number | string>, matchType: string): number | string | undefined {
  const lower = matchType.toLowerCase();
  const key = Object.keys(bids).find((candidate) => candidate.toLowerCase() === lower);
  return key === undefined ? undefined : bids[key];
}

function validateBids(settings: CampaignSettingsInput): ValidationResult {
  for (const matchType of settings.match_types) {
    const bid = findBid(settings.bids, matchType);
    if (bid === undefined) {
      return fail("EmptyInput", `No bid provided for ${matchType.toLowerCase()}`);
    }
    const result = validateNumericInput(bid, `Bid for ${matchType.toLowerCase()}`, MIN_BID_AMOUNT);
    if (!result.ok) return result;
  }
  return VALID;
}
