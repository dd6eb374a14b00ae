import { config as loadEnv } from "dotenv";

loadEnv({ path: ".env.local" });

type EnvName =
  | "SUPABASE_URL"
  | "SUPABASE_SERVICE_ROLE_KEY"
  | "BULKGEN_OUT_DIR"
  | "BULKGEN_ACCESS_TOKEN"
  | "BULKGEN_AUTH_DISABLED";

export function requireEnv(name: EnvName): string {
  const value = process.env[name];
  if (!value || value.trim() === "") {
    throw new Error(`Missing ${name}. Put it in .env.local`);
  }
  return value;
}

export type BulkgenEnv = {
  outDir: string;
  accessToken?: string;
  authDisabled: boolean;
};

export function getBulkgenEnv(source: NodeJS.ProcessEnv = process.env): BulkgenEnv {
  return {
    outDir: source.BULKGEN_OUT_DIR?.trim() || "output",
    accessToken: source.BULKGEN_ACCESS_TOKEN?.trim() || undefined,
    authDisabled: source.BULKGEN_AUTH_DISABLED === "1",
  };
}
