"use client";

import { useState } from "react";
import { Button } from "@/components/ui/button";
import { TextArea } from "@/components/ui/field";
import { useToast } from "@/components/ui/toast";
import { apiRequest, describeError } from "@/lib/api-client";
import { cn } from "@/lib/utils";
import type { TripIntentDraft, TripIntentFieldKey } from "@/types/trip-intent";

interface TripIntentAssistantProps {
  onApply: (draft: TripIntentDraft) => void;
}

interface TripIntentResponse {
  intent: TripIntentDraft;
  missingFields: TripIntentFieldKey[];
}

const fieldLabels: Record<TripIntentFieldKey, string> = {
  destination: "Destination",
  date: "Dates",
  budget: "Budget",
  travelers: "Travelers",
  preferences: "Interests",
};

export function TripIntentAssistant({ onApply }: TripIntentAssistantProps) {
  const { toast } = useToast();
  const [rawInput, setRawInput] = useState("");
  const [result, setResult] = useState<TripIntentResponse | null>(null);
  const [processing, setProcessing] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const runParser = async () => {
    const text = rawInput.trim();
    if (!text) {
      setError("Describe your trip first.");
      return;
    }

    try {
      setProcessing(true);
      setError(null);
      const response = await apiRequest<TripIntentResponse>("/api/trip-intents", {
        body: { rawInput: text, source: "text" },
      });
      setResult(response);
    } catch (parserError) {
      setResult(null);
      setError(describeError(parserError, "Could not read that description, try rephrasing it."));
    } finally {
      setProcessing(false);
    }
  };

  const draft = result?.intent ?? null;

  return (
    <section className="space-y-4 rounded-3xl border border-border bg-surface/90 p-6 shadow-card">
      <header className="space-y-2">
        <p className="text-xs font-semibold uppercase tracking-[0.2em] text-primary/80">Quick fill</p>
        <h2 className="text-xl font-semibold text-foreground">Describe the trip in one sentence</h2>
        <p className="text-sm text-muted">
          Try: “A week in Barcelona from June 3, budget $3,000 for a couple, love food and beaches,
          flying from London.”
        </p>
      </header>

      <TextArea
        placeholder="Where, when, how much, who with and what you enjoy"
        rows={3}
        value={rawInput}
        onChange={(event) => setRawInput(event.target.value)}
      />
      <div className="flex flex-wrap gap-3">
        <Button type="button" onClick={runParser} loading={processing}>
          Read description
        </Button>
        <Button
          type="button"
          variant="secondary"
          onClick={() => {
            setRawInput("");
            setResult(null);
            setError(null);
          }}
        >
          Clear
        </Button>
      </div>

      {error && <p className="text-sm text-destructive">{error}</p>}

      {draft && result && (
        <div className="space-y-4 rounded-2xl border border-dashed border-primary/40 bg-primary/5 p-4">
          <div className="flex items-center justify-between text-sm">
            <span className="font-medium text-primary">What we understood</span>
            <span className="text-muted">
              Confidence {confidenceLabel(draft.confidence)} ({Math.round(draft.confidence * 100)}%)
            </span>
          </div>

          <ul className="space-y-3 text-sm text-foreground/90">
            <IntentField
              label="Destination"
              value={
                draft.destinations.length > 0
                  ? draft.destinations.join(" / ")
                  : draft.unmatchedDestinations.length > 0
                    ? `${draft.unmatchedDestinations.join(", ")} (not in our catalog yet)`
                    : null
              }
              confidence={draft.fieldConfidences.destination}
            />
            <IntentField label="Dates" value={formatDateRange(draft)} confidence={draft.fieldConfidences.date} />
            <IntentField
              label="Budget"
              value={draft.budget ? `${draft.budget.amount} ${draft.budget.currency}` : null}
              confidence={draft.fieldConfidences.budget}
            />
            <IntentField
              label="Travelers"
              value={draft.travelParty?.description ?? null}
              confidence={draft.fieldConfidences.travelers}
            />
            <IntentField
              label="Interests"
              value={draft.preferences.length > 0 ? draft.preferences.join(", ") : null}
              confidence={draft.fieldConfidences.preferences}
            />
          </ul>

          {result.missingFields.length > 0 && (
            <p className="text-xs text-muted">
              Still missing: {result.missingFields.map((field) => fieldLabels[field]).join(", ")}. The
              form keeps its current values for those.
            </p>
          )}

          <Button
            type="button"
            className="w-full"
            onClick={() => {
              onApply(draft);
              toast({ title: "Form updated", description: "Review the details, then generate.", variant: "success" });
            }}
          >
            Apply to form
          </Button>
        </div>
      )}
    </section>
  );
}

function confidenceLabel(value: number) {
  if (value >= 0.8) return "high";
  if (value >= 0.55) return "medium";
  if (value > 0) return "low";
  return "none";
}

function IntentField({
  label,
  value,
  confidence = 0,
}: {
  label: string;
  value: string | null;
  confidence?: number;
}) {
  return (
    <li className="flex items-start justify-between gap-2">
      <div>
        <p className="text-xs uppercase tracking-[0.2em] text-muted">{label}</p>
        <p className="text-sm text-foreground">{value ?? "Not mentioned"}</p>
      </div>
      <span
        className={cn(
          "mt-1 rounded-full px-2 py-0.5 text-xs",
          confidence >= 0.75
            ? "bg-emerald-100 text-emerald-600"
            : confidence >= 0.4
              ? "bg-amber-100 text-amber-600"
              : "bg-gray-100 text-gray-500"
        )}
      >
        {(confidence * 100).toFixed(0)}%
      </span>
    </li>
  );
}

function formatDateRange(draft: TripIntentDraft) {
  const { dateRange } = draft;
  if (!dateRange) {
    return null;
  }
  if (dateRange.startDate && dateRange.endDate) {
    return `${dateRange.startDate} → ${dateRange.endDate}`;
  }
  if (dateRange.startDate && dateRange.durationDays) {
    return `From ${dateRange.startDate}, ${dateRange.durationDays} days`;
  }
  if (dateRange.durationDays) {
    return `${dateRange.durationDays} days`;
  }
  return dateRange.startDate ?? null;
}
