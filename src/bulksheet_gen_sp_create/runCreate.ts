import fs from "node:fs";
import path from "node:path";
import type { SessionVerifier } from "../auth/session";
import { buildPreviewRows, type BulkTable } from "./assembleTable";
import type { UnitIdCollision } from "./buildUploadRows";
import type { ValidationFailure } from "./errors";
import { generateBulkSheet } from "./generate";
import { buildCreateManifest } from "./manifest";
import type { CampaignSettingsInput } from "./types";
import { exportTimestamp, parseExportFormat, writeBulkSheet } from "./writeXlsx";

export const GENERATOR_NAME = "bulkgen:sp:create";

export type SpCreateRunResult =
  | {
      status: "written";
      runId: string;
      userId: string;
      table: BulkTable;
      preview: Record<string, string | number | null>[];
      outputPaths: string[];
      manifestPath: string;
      collisions: UnitIdCollision[];
    }
  | { status: "unauthenticated"; reason: string }
  | { status: "invalid"; failure: ValidationFailure };

/**
 * Session check, generation and export for one run. Export formats are parsed before
 * anything is generated so an unsupported selector fails without partial output.
 */
export async function runSpCreate(params: {
  keywords: string[];
  skus: string[];
  settings: CampaignSettingsInput;
  formats: string[];
  outDir: string;
  accessToken?: string;
  verifier: SessionVerifier;
  runId: string;
  now?: Date;
}): Promise<SpCreateRunResult> {
  const session = await params.verifier.verify(params.accessToken);
  if (!session.authenticated) {
    return { status: "unauthenticated", reason: session.reason };
  }

  const formats = [...new Set(params.formats.map(parseExportFormat))];
  if (!formats.length) {
    throw new Error("At least one export format is required.");
  }

  const generated = generateBulkSheet({
    keywords: params.keywords,
    skus: params.skus,
    settings: params.settings,
  });
  if (!generated.ok) {
    return { status: "invalid", failure: generated };
  }

  const now = params.now ?? new Date();
  const outDir = path.resolve(params.outDir);
  const timestamp = exportTimestamp(now);
  const outputPaths = formats.map((format) =>
    writeBulkSheet({ table: generated.table, outDir, format, timestamp })
  );

  const manifest = buildCreateManifest({
    units: generated.units,
    table: generated.table,
    runId: params.runId,
    generator: GENERATOR_NAME,
    userId: session.userId,
    outputPaths,
    now,
  });
  const manifestPath = path.join(outDir, "creation_manifest.json");
  fs.writeFileSync(manifestPath, `${JSON.stringify(manifest, null, 2)}\n`, "utf-8");

  return {
    status: "written",
    runId: params.runId,
    userId: session.userId,
    table: generated.table,
    preview: buildPreviewRows(generated.table),
    outputPaths,
    manifestPath,
    collisions: manifest.unit_id_collisions,
  };
}
