import fs from "node:fs";
import path from "node:path";
import { afterAll, describe, expect, it } from "vitest";
import { createLocalSessionVerifier, type SessionVerifier } from "../src/auth/session";
import { BulkgenError } from "../src/bulksheet_gen_sp_create/errors";
import { runSpCreate } from "../src/bulksheet_gen_sp_create/runCreate";
import { makeSettingsInput } from "./utils/settings";
import { makeTmpDir } from "./utils/makeXlsx";

const tmpDir = makeTmpDir("bulkgen-run");
const NOW = new Date(2026, 2, 10, 12, 0, 0);

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

const rejectingVerifier: SessionVerifier = {
  async verify() {
    return { authenticated: false, reason: "Invalid session: JWT expired" };
  },
};

describe("runSpCreate", () => {
  it("writes every requested format and a manifest", async () => {
    const outDir = path.join(tmpDir, "written");
    const result = await runSpCreate({
      keywords: ["gaming keyboard", "wireless mouse"],
      skus: ["SKU001"],
      settings: makeSettingsInput(),
      formats: ["xlsx", "CSV", "xlsx"],
      outDir,
      verifier: createLocalSessionVerifier("user-1"),
      runId: "run-1",
      now: NOW,
    });

    if (result.status !== "written") throw new Error(`unexpected status ${result.status}`);
    expect(result.userId).toBe("user-1");
    expect(result.outputPaths).toEqual([
      path.join(outDir, "sp_bulk_upload_20260310_120000.xlsx"),
      path.join(outDir, "sp_bulk_upload_20260310_120000.csv"),
    ]);
    for (const outputPath of result.outputPaths) {
      expect(fs.existsSync(outputPath)).toBe(true);
    }
    expect(result.preview).toHaveLength(5);
    expect(result.collisions).toEqual([]);

    const manifest = JSON.parse(fs.readFileSync(result.manifestPath, "utf-8"));
    expect(manifest.run_id).toBe("run-1");
    expect(manifest.generator).toBe("bulkgen:sp:create");
    expect(manifest.user_id).toBe("user-1");
    expect(manifest.created_at).toBe(NOW.toISOString());
    expect(manifest.counts).toEqual({ Campaign: 2, "Ad Group": 2, "Product Ad": 2, Keyword: 2 });
    expect(manifest.units.map((unit: { unit_id: string }) => unit.unit_id)).toEqual([
      "SKU001_exact_gaming_keyboard",
      "SKU001_exact_wireless_mouse",
    ]);
    expect(manifest.output_paths).toEqual(result.outputPaths);
  });

  it("records campaign id collisions", async () => {
    const result = await runSpCreate({
      keywords: ["blue shoes", "blue-shoes"],
      skus: ["SKU001"],
      settings: makeSettingsInput(),
      formats: ["csv"],
      outDir: path.join(tmpDir, "collisions"),
      verifier: createLocalSessionVerifier(),
      runId: "run-2",
      now: NOW,
    });

    if (result.status !== "written") throw new Error(`unexpected status ${result.status}`);
    expect(result.collisions).toEqual([
      {
        unitId: "SKU001_exact_blue_shoes",
        occurrences: 2,
        keywordGroups: [["blue shoes"], ["blue-shoes"]],
      },
    ]);
  });

  it("stops before generating when the session is rejected", async () => {
    const outDir = path.join(tmpDir, "unauthenticated");
    const result = await runSpCreate({
      keywords: ["gaming keyboard"],
      skus: ["SKU001"],
      settings: makeSettingsInput(),
      formats: ["xlsx"],
      outDir,
      accessToken: "test-token",
      verifier: rejectingVerifier,
      runId: "run-3",
    });

    expect(result).toEqual({ status: "unauthenticated", reason: "Invalid session: JWT expired" });
    expect(fs.existsSync(outDir)).toBe(false);
  });

  it("returns the validation failure without writing files", async () => {
    const outDir = path.join(tmpDir, "invalid");
    const result = await runSpCreate({
      keywords: ["gaming keyboard"],
      skus: ["SKU001"],
      settings: makeSettingsInput({ daily_budget: "1.0" }),
      formats: ["xlsx"],
      outDir,
      verifier: createLocalSessionVerifier(),
      runId: "run-4",
    });

    expect(result).toEqual({
      status: "invalid",
      failure: {
        ok: false,
        code: "BelowMinimum",
        message: "Invalid value for Daily budget: must be greater than 1",
      },
    });
    expect(fs.existsSync(outDir)).toBe(false);
  });

  it("throws for an unsupported format before writing anything", async () => {
    const outDir = path.join(tmpDir, "unsupported");
    await expect(
      runSpCreate({
        keywords: ["gaming keyboard"],
        skus: ["SKU001"],
        settings: makeSettingsInput(),
        formats: ["xlsx", "pdf"],
        outDir,
        verifier: createLocalSessionVerifier(),
        runId: "run-5",
      })
    ).rejects.toBeInstanceOf(BulkgenError);
    expect(fs.existsSync(outDir)).toBe(false);
  });
});
