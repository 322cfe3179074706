"use client";

import { useState } from "react";
import { Button } from "@/components/ui/button";
import { apiRequest, describeError } from "@/lib/api-client";
import { addDays, formatShortDate, toIsoDate } from "@/lib/format";
import type { TravelDateSuggestion } from "@/lib/seasons";
import { cn } from "@/lib/utils";

const SEARCH_WINDOW_DAYS = 180;

interface TravelDatesResponse {
  destination: string;
  bestTimeToVisit: string;
  suggestions: TravelDateSuggestion[];
}

interface TravelDateSuggestionsProps {
  destination: string;
  durationDays: number;
  onSelect: (startDate: string, endDate: string) => void;
}

export function TravelDateSuggestions({ destination, durationDays, onSelect }: TravelDateSuggestionsProps) {
  const [result, setResult] = useState<TravelDatesResponse | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const search = async () => {
    const earliestStart = addDays(toIsoDate(new Date()), 1);
    try {
      setLoading(true);
      setError(null);
      const data = await apiRequest<TravelDatesResponse>("/api/travel-dates", {
        body: {
          destination,
          durationDays,
          earliestStart,
          latestStart: addDays(earliestStart, SEARCH_WINDOW_DAYS),
        },
      });
      setResult(data);
    } catch (requestError) {
      setError(describeError(requestError, "Could not look up travel dates."));
    } finally {
      setLoading(false);
    }
  };

  return (
    <section className="space-y-3 rounded-3xl border border-border bg-surface p-6 shadow-card">
      <div className="flex flex-wrap items-center justify-between gap-3">
        <div>
          <h2 className="text-lg font-semibold">Best dates to go</h2>
          <p className="text-sm text-muted">
            {durationDays}-night windows in the next six months, ranked by season.
          </p>
        </div>
        <Button type="button" variant="secondary" onClick={search} loading={loading} disabled={!destination}>
          Find dates
        </Button>
      </div>

      {error && <p className="text-sm text-destructive">{error}</p>}

      {result && (
        <>
          <p className="text-xs text-muted">
            Best time to visit {result.destination}: {result.bestTimeToVisit}
          </p>
          <ul className="grid gap-3 md:grid-cols-3">
            {result.suggestions.map((suggestion) => (
              <li key={suggestion.startDate} className="space-y-2 rounded-2xl border border-border/60 p-4 text-sm">
                <p className="font-semibold">
                  {formatShortDate(suggestion.startDate)} – {formatShortDate(suggestion.endDate)}
                </p>
                <span
                  className={cn(
                    "inline-flex rounded-full px-2 py-0.5 text-xs",
                    suggestion.label === "Peak season"
                      ? "bg-emerald-100 text-emerald-600"
                      : suggestion.label === "Shoulder season"
                        ? "bg-amber-100 text-amber-600"
                        : "bg-gray-100 text-gray-500"
                  )}
                >
                  {suggestion.label}
                </span>
                <Button
                  type="button"
                  size="sm"
                  variant="ghost"
                  className="w-full"
                  onClick={() => onSelect(suggestion.startDate, suggestion.endDate)}
                >
                  Use these dates
                </Button>
              </li>
            ))}
          </ul>
        </>
      )}
    </section>
  );
}
