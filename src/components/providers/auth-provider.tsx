"use client";

import {
  createContext,
  useCallback,
  useContext,
  useEffect,
  useMemo,
  useState,
  type ReactNode,
} from "react";
import type { User } from "@supabase/supabase-js";
import { getSupabaseClient } from "@/lib/supabase-client";

type AuthContextValue = {
  user: User | null;
  loading: boolean;
  /** False when the deployment has no Supabase settings; accounts are hidden then. */
  configured: boolean;
  getAccessToken: () => Promise<string | null>;
  signOut: () => Promise<void>;
};

const AuthContext = createContext<AuthContextValue | undefined>(undefined);

export function AuthProvider({ children }: { children: ReactNode }) {
  const supabaseClient = useMemo(() => getSupabaseClient(), []);
  const [user, setUser] = useState<User | null>(null);
  const [loading, setLoading] = useState(() => supabaseClient !== null);

  useEffect(() => {
    if (!supabaseClient) {
      return;
    }

    let isMounted = true;

    supabaseClient.auth
      .getSession()
      .then(({ data }) => {
        if (isMounted) {
          setUser(data.session?.user ?? null);
        }
      })
      .catch((error: unknown) => {
        console.error("[auth] Failed to fetch session", error);
      })
      .finally(() => {
        if (isMounted) {
          setLoading(false);
        }
      });

    const { data } = supabaseClient.auth.onAuthStateChange((_event, session) => {
      if (isMounted) {
        setUser(session?.user ?? null);
      }
    });

    return () => {
      isMounted = false;
      data.subscription.unsubscribe();
    };
  }, [supabaseClient]);

  const getAccessToken = useCallback(async () => {
    if (!supabaseClient) {
      return null;
    }
    const { data } = await supabaseClient.auth.getSession();
    return data.session?.access_token ?? null;
  }, [supabaseClient]);

  const handleSignOut = useCallback(async () => {
    if (!supabaseClient) {
      return;
    }
    const { error } = await supabaseClient.auth.signOut();
    if (error) {
      throw error;
    }
    setUser(null);
  }, [supabaseClient]);

  const value = useMemo<AuthContextValue>(
    () => ({
      user,
      loading,
      configured: supabaseClient !== null,
      getAccessToken,
      signOut: handleSignOut,
    }),
    [user, loading, supabaseClient, getAccessToken, handleSignOut]
  );

  return <AuthContext.Provider value={value}>{children}</AuthContext.Provider>;
}

export function useAuth() {
  const context = useContext(AuthContext);
  if (!context) {
    throw new Error("useAuth must be used within an AuthProvider");
  }
  return context;
}
