"use client";

import { useState } from "react";
import Link from "next/link";
import { TripIntentAssistant } from "@/components/planner/trip-intent-assistant";
import { TripPreferencesForm } from "@/components/planner/trip-preferences-form";
import { useAuth } from "@/components/providers/auth-provider";
import { DayPlans } from "@/components/trip/day-plans";
import { ItineraryOverview } from "@/components/trip/itinerary-overview";
import { PackingListPanel } from "@/components/trip/packing-list-panel";
import { TravelDateSuggestions } from "@/components/trip/travel-date-suggestions";
import { TripBudgetSummary } from "@/components/trip/trip-budget";
import { Button } from "@/components/ui/button";
import { useToast } from "@/components/ui/toast";
import { apiRequest, describeError } from "@/lib/api-client";
import { addDays, diffInDays, toIsoDate } from "@/lib/format";
import type { ExpenseSummary } from "@/lib/planner/expenses";
import { BUDGET_RANGE } from "@/lib/planner/preferences";
import { intentToPreferences } from "@/lib/trip-intent/parser";
import { cn } from "@/lib/utils";
import type { Itinerary, TripPreferences } from "@/types/travel";

type ResultTab = "overview" | "days" | "budget" | "packing";

const tabs: Array<{ key: ResultTab; label: string }> = [
  { key: "overview", label: "Overview" },
  { key: "days", label: "Day-by-Day" },
  { key: "budget", label: "Budget" },
  { key: "packing", label: "Packing" },
];

interface PlanResult {
  itinerary: Itinerary;
  expenses: ExpenseSummary;
  preferences: TripPreferences;
}

function initialPreferences(destination: string): TripPreferences {
  const today = toIsoDate(new Date());
  return {
    origin: "",
    destination,
    startDate: addDays(today, 7),
    endDate: addDays(today, 14),
    budget: BUDGET_RANGE.default,
    transportation: "Any",
    accommodation: "Any",
    activities: [],
    travelers: 1,
  };
}

function validatePreferences(preferences: TripPreferences) {
  if (!preferences.origin.trim()) return "Tell us where you are traveling from.";
  if (!preferences.destination) return "Choose a destination.";
  if (diffInDays(preferences.startDate, preferences.endDate) < 1) return "End date must be after start date.";
  if (preferences.activities.length === 0) return "Pick at least one interest.";
  return null;
}

export function PlannerWorkspace({
  destinations,
  initialDestination,
}: {
  destinations: string[];
  initialDestination: string;
}) {
  const { toast } = useToast();
  const { user, configured, getAccessToken } = useAuth();
  const [preferences, setPreferences] = useState(() => initialPreferences(initialDestination));
  const [result, setResult] = useState<PlanResult | null>(null);
  const [tab, setTab] = useState<ResultTab>("overview");
  const [generating, setGenerating] = useState(false);
  const [saving, setSaving] = useState(false);

  const handleGenerate = async () => {
    const problem = validatePreferences(preferences);
    if (problem) {
      toast({ title: "Almost there", description: problem, variant: "warning" });
      return;
    }

    try {
      setGenerating(true);
      const data = await apiRequest<Omit<PlanResult, "preferences">>("/api/itineraries", {
        body: preferences,
      });
      setResult({ ...data, preferences });
      setTab("overview");
    } catch (error) {
      toast({
        title: "Could not generate the plan",
        description: describeError(error, "Please try again."),
        variant: "error",
      });
    } finally {
      setGenerating(false);
    }
  };

  const handleSave = async () => {
    if (!result) return;
    try {
      setSaving(true);
      const token = await getAccessToken();
      if (!token) {
        toast({ title: "Sign in to save trips", variant: "warning" });
        return;
      }
      await apiRequest("/api/trips", {
        body: { preferences: result.preferences, itinerary: result.itinerary },
        token,
      });
      toast({ title: "Trip saved", description: "Find it under My trips.", variant: "success" });
    } catch (error) {
      toast({ title: "Could not save the trip", description: describeError(error, "Please try again."), variant: "error" });
    } finally {
      setSaving(false);
    }
  };

  const duration = Math.max(1, diffInDays(preferences.startDate, preferences.endDate) || 1);

  return (
    <div className="grid gap-8 lg:grid-cols-[380px_1fr] lg:items-start">
      <div className="space-y-6">
        <TripIntentAssistant
          onApply={(draft) => setPreferences((current) => intentToPreferences(draft, current))}
        />
        <TripPreferencesForm
          value={preferences}
          destinations={destinations}
          submitting={generating}
          onChange={setPreferences}
          onSubmit={handleGenerate}
        />
      </div>

      <div className="space-y-6">
        {preferences.destination && (
          <TravelDateSuggestions
            destination={preferences.destination}
            durationDays={duration}
            onSelect={(startDate, endDate) => setPreferences((current) => ({ ...current, startDate, endDate }))}
          />
        )}

        {!result ? (
          <div className="rounded-3xl border border-dashed border-border p-10 text-center text-sm text-muted">
            Complete your travel preferences and click “Generate travel plan” to create your itinerary.
          </div>
        ) : (
          <section className="space-y-6 rounded-3xl border border-border bg-surface p-6 shadow-card">
            <header className="flex flex-wrap items-center justify-between gap-3">
              <div>
                <h2 className="text-2xl font-semibold">{result.itinerary.destination.name}</h2>
                <p className="text-sm text-muted">{result.itinerary.destination.region}</p>
              </div>
              {configured &&
                (user ? (
                  <Button type="button" variant="secondary" onClick={handleSave} loading={saving}>
                    Save trip
                  </Button>
                ) : (
                  <Link href="/login" className="text-sm text-primary hover:underline">
                    Sign in to save this trip
                  </Link>
                ))}
            </header>

            <nav className="flex gap-2 border-b border-border/60" role="tablist">
              {tabs.map((item) => (
                <button
                  key={item.key}
                  type="button"
                  role="tab"
                  aria-selected={tab === item.key}
                  onClick={() => setTab(item.key)}
                  className={cn(
                    "-mb-px border-b-2 px-3 py-2 text-sm transition",
                    tab === item.key
                      ? "border-primary font-medium text-primary"
                      : "border-transparent text-muted hover:text-foreground"
                  )}
                >
                  {item.label}
                </button>
              ))}
            </nav>

            {tab === "overview" && <ItineraryOverview itinerary={result.itinerary} />}
            {tab === "days" && <DayPlans plans={result.itinerary.dailyPlans} />}
            {tab === "budget" && <TripBudgetSummary expenses={result.expenses} />}
            {tab === "packing" && (
              <PackingListPanel
                destination={result.itinerary.destination.name}
                startDate={result.itinerary.trip.startDate}
                endDate={result.itinerary.trip.endDate}
                activities={result.itinerary.trip.activities}
                travelers={result.itinerary.trip.travelers}
              />
            )}
          </section>
        )}
      </div>
    </div>
  );
}
