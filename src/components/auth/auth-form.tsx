"use client";

import { FormEvent, useState } from "react";
import Link from "next/link";
import { useRouter } from "next/navigation";
import { AuthCard } from "@/components/auth/auth-card";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/field";
import { useToast } from "@/components/ui/toast";
import { describeError } from "@/lib/api-client";
import { getSupabaseClient } from "@/lib/supabase-client";

type AuthMode = "login" | "register";

const MIN_PASSWORD_LENGTH = 6;

const copy: Record<AuthMode, { title: string; description: string; submit: string }> = {
  login: {
    title: "Welcome back",
    description: "Sign in to open the trips you have saved.",
    submit: "Sign in",
  },
  register: {
    title: "Create an account",
    description: "Save generated itineraries and come back to them later.",
    submit: "Create account",
  },
};

export function AuthForm({ mode }: { mode: AuthMode }) {
  const router = useRouter();
  const { toast } = useToast();
  const [email, setEmail] = useState("");
  const [password, setPassword] = useState("");
  const [confirmPassword, setConfirmPassword] = useState("");
  const [loading, setLoading] = useState(false);
  const [formError, setFormError] = useState<string | null>(null);

  const validate = () => {
    if (!email || !password) return "Enter your email and password.";
    if (mode === "register" && password.length < MIN_PASSWORD_LENGTH) {
      return `Passwords need at least ${MIN_PASSWORD_LENGTH} characters.`;
    }
    if (mode === "register" && password !== confirmPassword) return "Passwords do not match.";
    return null;
  };

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    const problem = validate();
    setFormError(problem);
    if (problem) return;

    const supabase = getSupabaseClient();
    if (!supabase) {
      setFormError("Accounts are not enabled on this deployment.");
      return;
    }

    try {
      setLoading(true);
      if (mode === "login") {
        const { error } = await supabase.auth.signInWithPassword({ email, password });
        if (error) {
          setFormError(error.message);
          return;
        }
        toast({ title: "Signed in", description: "Your saved trips are ready.", variant: "success" });
        router.push("/trips");
        return;
      }

      const { error } = await supabase.auth.signUp({
        email,
        password,
        options: { emailRedirectTo: `${window.location.origin}/login` },
      });
      if (error) {
        setFormError(error.message);
        return;
      }
      toast({
        title: "Check your inbox",
        description: "Confirm your email address, then sign in.",
        variant: "success",
      });
      router.push("/login");
    } catch (error) {
      setFormError(describeError(error, "Something went wrong, please try again."));
    } finally {
      setLoading(false);
    }
  };

  const text = copy[mode];

  return (
    <AuthCard
      title={text.title}
      description={text.description}
      footer={
        mode === "login" ? (
          <>
            New here?
            <Link href="/register" className="ml-1 text-primary hover:underline">
              Create an account
            </Link>
          </>
        ) : (
          <>
            Already registered?
            <Link href="/login" className="ml-1 text-primary hover:underline">
              Sign in
            </Link>
          </>
        )
      }
    >
      <form onSubmit={handleSubmit} className="space-y-4">
        <Input
          label="Email"
          type="email"
          autoComplete="email"
          placeholder="you@example.com"
          value={email}
          onChange={(event) => setEmail(event.target.value)}
        />
        <Input
          label="Password"
          type="password"
          autoComplete={mode === "login" ? "current-password" : "new-password"}
          value={password}
          onChange={(event) => setPassword(event.target.value)}
        />
        {mode === "register" && (
          <Input
            label="Confirm password"
            type="password"
            autoComplete="new-password"
            value={confirmPassword}
            onChange={(event) => setConfirmPassword(event.target.value)}
          />
        )}
        {formError && <p className="text-sm text-destructive">{formError}</p>}
        <Button type="submit" className="w-full" loading={loading}>
          {text.submit}
        </Button>
      </form>
    </AuthCard>
  );
}
