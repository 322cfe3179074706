"use client";

import { useEffect, useState } from "react";
import Link from "next/link";
import { Input, Select } from "@/components/ui/field";
import { LoadingBlock } from "@/components/ui/spinner";
import { apiRequest, describeError } from "@/lib/api-client";
import type { DestinationSummary } from "@/lib/destinations/filter";
import { formatCurrency, monthName } from "@/lib/format";
import { cn, toggleItem } from "@/lib/utils";
import { ACTIVITY_CATEGORIES, type ActivityCategory } from "@/types/travel";

interface DestinationsResponse {
  destinations: DestinationSummary[];
  total: number;
  regions: string[];
}

interface ExplorerFilters {
  query: string;
  region: string;
  maxCostLevel: string;
  month: string;
  interests: ActivityCategory[];
}

const costLevelOptions = [1, 2, 3, 4, 5].map((level) => ({
  value: `${level}`,
  label: `${"$".repeat(level)} or less`,
}));

const monthOptions = Array.from({ length: 12 }, (_, index) => ({
  value: `${index + 1}`,
  label: monthName(index + 1),
}));

function toSearchParams(filters: ExplorerFilters) {
  const params = new URLSearchParams();
  if (filters.query.trim()) params.set("query", filters.query.trim());
  if (filters.region) params.set("region", filters.region);
  if (filters.maxCostLevel) params.set("maxCostLevel", filters.maxCostLevel);
  if (filters.month) params.set("month", filters.month);
  if (filters.interests.length > 0) params.set("interest", filters.interests.join(","));
  return params;
}

export function DestinationExplorer() {
  const [filters, setFilters] = useState<ExplorerFilters>({
    query: "",
    region: "",
    maxCostLevel: "",
    month: "",
    interests: [],
  });
  const [data, setData] = useState<DestinationsResponse | null>(null);
  const [error, setError] = useState<string | null>(null);
  const queryString = toSearchParams(filters).toString();

  useEffect(() => {
    const controller = new AbortController();
    const timer = window.setTimeout(() => {
      apiRequest<DestinationsResponse>(`/api/destinations${queryString ? `?${queryString}` : ""}`, {
        signal: controller.signal,
      })
        .then((response) => {
          setData(response);
          setError(null);
        })
        .catch((requestError: unknown) => {
          if (!controller.signal.aborted) {
            setError(describeError(requestError, "Could not load destinations."));
          }
        });
    }, 250);

    return () => {
      window.clearTimeout(timer);
      controller.abort();
    };
  }, [queryString]);

  const update = (patch: Partial<ExplorerFilters>) => setFilters((current) => ({ ...current, ...patch }));

  return (
    <div className="grid gap-8 lg:grid-cols-[300px_1fr] lg:items-start">
      <aside className="space-y-4 rounded-3xl border border-border bg-surface p-6 shadow-card">
        <Input
          label="Search"
          placeholder="beach, temples, Paris..."
          value={filters.query}
          onChange={(event) => update({ query: event.target.value })}
        />
        <Select
          label="Region"
          placeholder="Any region"
          options={(data?.regions ?? []).map((region) => ({ value: region, label: region }))}
          value={filters.region}
          onChange={(event) => update({ region: event.target.value })}
        />
        <Select
          label="Cost level"
          placeholder="Any cost"
          options={costLevelOptions}
          value={filters.maxCostLevel}
          onChange={(event) => update({ maxCostLevel: event.target.value })}
        />
        <Select
          label="Travel month"
          placeholder="Any month"
          options={monthOptions}
          value={filters.month}
          onChange={(event) => update({ month: event.target.value })}
        />
        <fieldset className="space-y-2">
          <legend className="text-sm font-medium text-foreground/90">Strong for</legend>
          <div className="flex flex-wrap gap-2">
            {ACTIVITY_CATEGORIES.map((category) => {
              const selected = filters.interests.includes(category);
              return (
                <button
                  key={category}
                  type="button"
                  aria-pressed={selected}
                  onClick={() => update({ interests: toggleItem(filters.interests, category) })}
                  className={cn(
                    "rounded-full border px-3 py-1 text-xs transition",
                    selected ? "border-primary bg-primary/10 text-primary" : "border-border text-muted"
                  )}
                >
                  {category}
                </button>
              );
            })}
          </div>
        </fieldset>
      </aside>

      <section className="space-y-4">
        {error && <p className="text-sm text-destructive">{error}</p>}
        {!data ? (
          <LoadingBlock message="Loading destinations..." />
        ) : data.total === 0 ? (
          <p className="rounded-3xl border border-dashed border-border p-10 text-center text-sm text-muted">
            No destination matches these filters.
          </p>
        ) : (
          <ul className="grid gap-4 md:grid-cols-2">
            {data.destinations.map((destination) => (
              <li key={destination.id} className="flex flex-col gap-2 rounded-3xl border border-border bg-surface p-5 shadow-card">
                <div className="flex items-baseline justify-between gap-2">
                  <h2 className="text-lg font-semibold">{destination.name}</h2>
                  <span className="text-xs text-muted">{"$".repeat(destination.costLevel)}</span>
                </div>
                <p className="text-xs text-muted">
                  {destination.region} · {destination.climate} · about {formatCurrency(destination.avgDailyCost)} a day
                </p>
                <p className="text-sm text-foreground/90">{destination.description}</p>
                <p className="text-xs text-muted">Top for: {destination.topFeatures.join(", ")}</p>
                <p className="text-xs text-muted">Best time: {destination.bestTimeToVisit}</p>
                <Link
                  href={`/planner?destination=${encodeURIComponent(destination.name)}`}
                  className="mt-auto text-sm font-medium text-primary hover:underline"
                >
                  Plan a trip here →
                </Link>
              </li>
            ))}
          </ul>
        )}
      </section>
    </div>
  );
}
