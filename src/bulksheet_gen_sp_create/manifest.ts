import { type BulkTable, countByEntity } from "./assembleTable";
import { findUnitIdCollisions, type UnitIdCollision } from "./buildUploadRows";
import type { CampaignUnit, MatchType } from "./types";

export type SpCreateManifest = {
  run_id: string;
  generator: string;
  created_at: string;
  user_id: string | null;
  counts: Record<string, number>;
  units: {
    unit_id: string;
    campaign_name: string;
    ad_group_name: string;
    match_type: MatchType;
    skus: string[];
    keywords: string[];
  }[];
  unit_id_collisions: UnitIdCollision[];
  output_paths: string[];
};

export function buildCreateManifest(params: {
  units: CampaignUnit[];
  table: BulkTable;
  runId: string;
  generator: string;
  userId?: string | null;
  outputPaths?: string[];
  now?: Date;
}): SpCreateManifest {
  return {
    run_id: params.runId,
    generator: params.generator,
    created_at: (params.now ?? new Date()).toISOString(),
    user_id: params.userId ?? null,
    counts: countByEntity(params.table),
    units: params.units.map((unit) => ({
      unit_id: unit.unitId,
      campaign_name: unit.campaignName,
      ad_group_name: unit.adGroupName,
      match_type: unit.matchType,
      skus: unit.skus,
      keywords: unit.keywords,
    })),
    unit_id_collisions: findUnitIdCollisions(params.units),
    output_paths: params.outputPaths ?? [],
  };
}
