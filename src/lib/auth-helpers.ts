import { headers } from "next/headers";
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { Database } from "@/types/database";
import { ApiErrorResponse } from "@/lib/api-response";

export interface SessionUser {
  id: string;
  email: string | null;
}

export interface AuthContext {
  supabase: SupabaseClient<Database>;
  user: SessionUser;
}

const serverAuthOptions = {
  persistSession: false,
  autoRefreshToken: false,
};

function getSupabaseUrl() {
  return process.env.SUPABASE_URL ?? process.env.NEXT_PUBLIC_SUPABASE_URL;
}

function assertEnv(value: string | undefined, name: string): string {
  if (!value) {
    throw new ApiErrorResponse(
      "Saved trips are not configured on this server.",
      503,
      "supabase_not_configured",
      { missing: name }
    );
  }
  return value;
}

export function extractBearerToken(authHeader: string | null) {
  if (!authHeader || !authHeader.toLowerCase().startsWith("bearer ")) {
    return null;
  }
  const token = authHeader.slice(7).trim();
  return token || null;
}

/**
 * Verifies the caller's bearer token with the service-role client and
 * returns a client scoped to that user, so row-level security applies.
 */
export async function requireAuthContext(): Promise<AuthContext> {
  const headerStore = await headers();
  const accessToken = extractBearerToken(
    headerStore.get("Authorization") ?? headerStore.get("authorization")
  );

  if (!accessToken) {
    throw new ApiErrorResponse("Sign in to continue.", 401, "unauthorized");
  }

  const supabaseUrl = assertEnv(getSupabaseUrl(), "SUPABASE_URL/NEXT_PUBLIC_SUPABASE_URL");
  const serviceRoleKey = assertEnv(process.env.SUPABASE_SERVICE_ROLE_KEY, "SUPABASE_SERVICE_ROLE_KEY");
  const anonKey = assertEnv(process.env.NEXT_PUBLIC_SUPABASE_ANON_KEY, "NEXT_PUBLIC_SUPABASE_ANON_KEY");

  const serviceClient = createClient<Database>(supabaseUrl, serviceRoleKey, {
    auth: serverAuthOptions,
  });

  const { data, error } = await serviceClient.auth.getUser(accessToken);
  if (error || !data.user) {
    throw new ApiErrorResponse("Your session has expired, please sign in again.", 401, "unauthorized", error);
  }

  const supabase = createClient<Database>(supabaseUrl, anonKey, {
    auth: serverAuthOptions,
    global: {
      headers: {
        Authorization: `Bearer ${accessToken}`,
      },
    },
  });

  return {
    supabase,
    user: {
      id: data.user.id,
      email: data.user.email ?? null,
    },
  };
}
