import { groupItems } from "./grouping";
import { renderNameTemplate } from "./nameTemplate";
import type {
  BulkRow,
  CampaignSettings,
  CampaignUnit,
  KeywordRow,
  MatchType,
  ProductAdRow,
} from "./types";

/** YYYY-MM-DD -> YYYYMMDD, the bulksheet date format. */
export function toBulkDate(isoDate: string): string {
  const compact = isoDate.replace(/-/g, "");
  if (!/^\d{8}$/.test(compact)) {
    throw new Error(`Invalid start date: ${isoDate}`);
  }
  return compact;
}

export function cleanKeywordForName(keyword: string): string {
  return keyword.replace(/[^a-zA-Z0-9]/g, "_").toLowerCase();
}

/**
 * Campaign ID shared by every row of a unit. Built from the first keyword only, so
 * two keyword groups that open with the same cleaned keyword map to the same id.
 */
export function buildUnitId(skus: string[], matchType: MatchType, keywords: string[]): string {
  const firstKeyword = keywords[0];
  if (firstKeyword === undefined) {
    throw new Error("Cannot build a campaign unit without keywords");
  }
  return `${skus.join("_")}_${matchType}_${cleanKeywordForName(firstKeyword)}`;
}

function resolveDefaultBid(settings: CampaignSettings, matchType: MatchType): number {
  const bid = settings.bids.get(matchType);
  if (bid === undefined) {
    throw new Error(`Missing bid for match type: ${matchType}`);
  }
  return bid;
}

export function buildCampaignUnit(params: {
  skus: string[];
  keywords: string[];
  matchType: MatchType;
  startDate: string;
  settings: CampaignSettings;
}): CampaignUnit {
  const { skus, keywords, matchType, startDate, settings } = params;
  const unitId = buildUnitId(skus, matchType, keywords);
  const groupSuffix = cleanKeywordForName(keywords[0]);
  const combinedSku = skus.join("_");
  const defaultBid = resolveDefaultBid(settings, matchType);

  const campaignName = `${renderNameTemplate({
    template: settings.campaignNameTemplate,
    sku: combinedSku,
    matchType,
    startDate,
  })}_${groupSuffix}`;
  const adGroupName = `${renderNameTemplate({
    template: settings.adGroupNameTemplate,
    sku: combinedSku,
    matchType,
    startDate,
  })}_${groupSuffix}`;

  const rows: BulkRow[] = [
    {
      entity: "Campaign",
      campaignId: unitId,
      campaignName,
      startDate,
      dailyBudget: settings.dailyBudget,
    },
    {
      entity: "Ad Group",
      campaignId: unitId,
      adGroupId: unitId,
      adGroupName,
      defaultBid,
    },
  ];

  if (settings.placementAdjustment) {
    rows.push({
      entity: "Bidding Adjustment",
      campaignId: unitId,
      adGroupId: unitId,
      placement: settings.placementAdjustment.placement,
      percentage: settings.placementAdjustment.percentage,
    });
  }

  rows.push(
    ...skus.map(
      (sku): ProductAdRow => ({
        entity: "Product Ad",
        campaignId: unitId,
        adGroupId: unitId,
        sku,
      })
    )
  );

  rows.push(
    ...keywords.map(
      (keyword): KeywordRow => ({
        entity: "Keyword",
        campaignId: unitId,
        adGroupId: unitId,
        keywordText: keyword,
        matchType,
        bid: settings.keywordBids?.get(keyword) ?? defaultBid,
      })
    )
  );

  return {
    unitId,
    matchType,
    skus: [...skus],
    keywords: [...keywords],
    campaignName,
    adGroupName,
    rows,
  };
}

/** SKU groups, then keyword groups, then match types; this order is part of the output. */
export function buildCampaignUnits(params: {
  keywords: string[];
  skus: string[];
  settings: CampaignSettings;
}): CampaignUnit[] {
  const { settings } = params;
  const startDate = toBulkDate(settings.startDate);
  const keywordGroups = groupItems(params.keywords, settings.keywordGroupSize);
  const skuGroups = groupItems(params.skus, settings.skuGroupSize);

  const units: CampaignUnit[] = [];
  for (const skuGroup of skuGroups) {
    for (const keywordGroup of keywordGroups) {
      for (const matchType of settings.matchTypes) {
        units.push(
          buildCampaignUnit({
            skus: skuGroup,
            keywords: keywordGroup,
            matchType,
            startDate,
            settings,
          })
        );
      }
    }
  }
  return units;
}

export function buildUploadRows(params: {
  keywords: string[];
  skus: string[];
  settings: CampaignSettings;
}): BulkRow[] {
  return buildCampaignUnits(params).flatMap((unit) => unit.rows);
}

export type UnitIdCollision = {
  unitId: string;
  occurrences: number;
  keywordGroups: string[][];
};

export function findUnitIdCollisions(units: CampaignUnit[]): UnitIdCollision[] {
  const byId = new Map<string, CampaignUnit[]>();
  for (const unit of units) {
    const list = byId.get(unit.unitId) ?? [];
    list.push(unit);
    byId.set(unit.unitId, list);
  }
  const collisions: UnitIdCollision[] = [];
  for (const [unitId, list] of byId) {
    if (list.length < 2) continue;
    collisions.push({
      unitId,
      occurrences: list.length,
      keywordGroups: list.map((unit) => unit.keywords),
    });
  }
  return collisions;
}
