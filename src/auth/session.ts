import { getSupabaseClient } from "../db/supabaseClient";

export type SessionCheckResult =
  | { authenticated: true; userId: string }
  | { authenticated: false; reason: string };

export interface SessionVerifier {
  verify(accessToken: string | undefined): Promise<SessionCheckResult>;
}

/** The part of the Supabase client the session check talks to. */
export type SessionAuthClient = {
  auth: {
    getUser(jwt?: string): Promise<{
      data: { user: { id: string } | null };
      error: { message: string } | null;
    }>;
  };
};

export function createSupabaseSessionVerifier(
  getClient: () => SessionAuthClient = getSupabaseClient
): SessionVerifier {
  return {
    async verify(accessToken) {
      const token = accessToken?.trim();
      if (!token) {
        return { authenticated: false, reason: "Missing access token. Log in and pass --access-token." };
      }
      const { data, error } = await getClient().auth.getUser(token);
      if (error) {
        return { authenticated: false, reason: `Invalid session: ${error.message}` };
      }
      if (!data.user) {
        return { authenticated: false, reason: "Invalid session: no user for access token" };
      }
      return { authenticated: true, userId: data.user.id };
    },
  };
}

/** Used when BULKGEN_AUTH_DISABLED=1, e.g. on a local machine. */
export function createLocalSessionVerifier(userId = "local"): SessionVerifier {
  return {
    async verify() {
      return { authenticated: true, userId };
    },
  };
}
