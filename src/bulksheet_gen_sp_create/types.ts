export const MATCH_TYPES = ["exact", "phrase", "broad"] as const;
export type MatchType = (typeof MATCH_TYPES)[number];

export const PLACEMENT_TOP_OF_SEARCH = "top-of-search" as const;
export type Placement = typeof PLACEMENT_TOP_OF_SEARCH;

export type BulkEntity =
  | "Campaign"
  | "Ad Group"
  | "Bidding Adjustment"
  | "Product Ad"
  | "Keyword";

export const PRODUCT = "Sponsored Products";
export const OPERATION = "Create";
export const TARGETING_TYPE = "MANUAL";
export const BIDDING_STRATEGY = "Dynamic bids - down only";
export const STATE = "enabled";

export type NameTemplateKind = "campaign" | "ad_group";

/** Settings as they arrive from a settings file or caller, before any rule has run. */
export type CampaignSettingsInput = {
  daily_budget: number | string;
  start_date: string;
  match_types: string[];
  bids: Record<string, number | string>;
  keyword_bids?: ReadonlyMap<string, number>;
  bid_adjustment?: string;
  placement?: string;
  campaign_name_template: string;
  ad_group_name_template: string;
  keyword_group_size?: number;
  sku_group_size?: number;
};

export type PlacementAdjustment = {
  placement: Placement;
  percentage: string;
};

export type CampaignSettings = Readonly<{
  dailyBudget: number;
  /** YYYY-MM-DD */
  startDate: string;
  matchTypes: readonly MatchType[];
  bids: ReadonlyMap<MatchType, number>;
  keywordBids?: ReadonlyMap<string, number>;
  placementAdjustment?: PlacementAdjustment;
  campaignNameTemplate: string;
  adGroupNameTemplate: string;
  keywordGroupSize?: number;
  skuGroupSize?: number;
}>;

export type CampaignRow = {
  entity: "Campaign";
  campaignId: string;
  campaignName: string;
  startDate: string;
  dailyBudget: number;
};

export type AdGroupRow = {
  entity: "Ad Group";
  campaignId: string;
  adGroupId: string;
  adGroupName: string;
  defaultBid: number;
};

export type BiddingAdjustmentRow = {
  entity: "Bidding Adjustment";
  campaignId: string;
  adGroupId: string;
  placement: Placement;
  percentage: string;
};

export type ProductAdRow = {
  entity: "Product Ad";
  campaignId: string;
  adGroupId: string;
  sku: string;
};

export type KeywordRow = {
  entity: "Keyword";
  campaignId: string;
  adGroupId: string;
  keywordText: string;
  matchType: MatchType;
  bid: number;
};

export type BulkRow =
  | CampaignRow
  | AdGroupRow
  | BiddingAdjustmentRow
  | ProductAdRow
  | KeywordRow;

export type CampaignUnit = {
  unitId: string;
  matchType: MatchType;
  skus: string[];
  keywords: string[];
  campaignName: string;
  adGroupName: string;
  rows: BulkRow[];
};
