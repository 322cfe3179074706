"use client";

import { useState } from "react";
import Link from "next/link";
import { useRouter } from "next/navigation";
import { useAuth } from "@/components/providers/auth-provider";
import { Button } from "@/components/ui/button";
import { Spinner } from "@/components/ui/spinner";
import { useToast } from "@/components/ui/toast";
import { describeError } from "@/lib/api-client";

export function AuthMenu() {
  const router = useRouter();
  const { toast } = useToast();
  const { user, loading, configured, signOut } = useAuth();
  const [signingOut, setSigningOut] = useState(false);

  if (!configured) {
    return null;
  }

  if (loading) {
    return <Spinner size="sm" label="Checking session" />;
  }

  const handleSignOut = async () => {
    try {
      setSigningOut(true);
      await signOut();
      toast({ title: "Signed out", description: "Safe travels!", variant: "success" });
      router.push("/");
      router.refresh();
    } catch (error) {
      toast({
        title: "Sign-out failed",
        description: describeError(error, "Please try again."),
        variant: "error",
      });
    } finally {
      setSigningOut(false);
    }
  };

  if (!user) {
    return (
      <div className="flex items-center gap-3 text-sm font-medium">
        <Link href="/login" className="rounded-xl px-4 py-2 text-muted transition hover:text-foreground">
          Sign in
        </Link>
        <Link
          href="/register"
          className="rounded-xl bg-primary px-4 py-2 text-primary-foreground shadow-sm transition hover:bg-primary/90"
        >
          Create account
        </Link>
      </div>
    );
  }

  return (
    <div className="flex items-center gap-3 text-sm font-medium">
      <span className="hidden max-w-[200px] truncate text-muted sm:inline">{user.email ?? "Signed in"}</span>
      <Button type="button" size="sm" variant="secondary" onClick={handleSignOut} loading={signingOut}>
        Sign out
      </Button>
    </div>
  );
}
