"use client";

import type { FormEvent } from "react";
import { Button } from "@/components/ui/button";
import { Input, Select, TextArea } from "@/components/ui/field";
import { formatCurrency } from "@/lib/format";
import { BUDGET_RANGE } from "@/lib/planner/preferences";
import { cn, pickOption, toggleItem } from "@/lib/utils";
import {
  ACCOMMODATION_PREFERENCES,
  ACTIVITY_CATEGORIES,
  TRANSPORTATION_PREFERENCES,
  type TripPreferences,
} from "@/types/travel";

interface TripPreferencesFormProps {
  value: TripPreferences;
  destinations: string[];
  submitting: boolean;
  onChange: (next: TripPreferences) => void;
  onSubmit: () => void;
}

const toOptions = (values: readonly string[]) => values.map((value) => ({ value, label: value }));

export function TripPreferencesForm({
  value,
  destinations,
  submitting,
  onChange,
  onSubmit,
}: TripPreferencesFormProps) {
  const update = (patch: Partial<TripPreferences>) => onChange({ ...value, ...patch });

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    onSubmit();
  };

  return (
    <form
      onSubmit={handleSubmit}
      className="space-y-5 rounded-3xl border border-border bg-surface p-6 shadow-card"
    >
      <h2 className="text-xl font-semibold">Travel preferences</h2>

      <Input
        label="Where are you traveling from?"
        name="origin"
        value={value.origin}
        placeholder="e.g. New York"
        onChange={(event) => update({ origin: event.target.value })}
      />
      <Select
        label="Destination"
        name="destination"
        value={value.destination}
        placeholder="Choose a destination"
        options={toOptions(destinations)}
        onChange={(event) => update({ destination: event.target.value })}
      />

      <div className="grid gap-4 sm:grid-cols-2">
        <Input
          label="Start date"
          type="date"
          name="startDate"
          value={value.startDate}
          onChange={(event) => update({ startDate: event.target.value })}
        />
        <Input
          label="End date"
          type="date"
          name="endDate"
          value={value.endDate}
          min={value.startDate}
          onChange={(event) => update({ endDate: event.target.value })}
        />
      </div>

      <Input
        label={`Total budget: ${formatCurrency(value.budget)}`}
        type="range"
        name="budget"
        min={BUDGET_RANGE.min}
        max={BUDGET_RANGE.max}
        step={BUDGET_RANGE.step}
        value={value.budget}
        className="h-auto border-none px-0 shadow-none"
        onChange={(event) => update({ budget: Number(event.target.value) })}
      />

      <div className="grid gap-4 sm:grid-cols-2">
        <Select
          label="Transportation"
          name="transportation"
          value={value.transportation}
          options={toOptions(TRANSPORTATION_PREFERENCES)}
          onChange={(event) => {
            const transportation = pickOption(TRANSPORTATION_PREFERENCES, event.target.value);
            if (transportation) update({ transportation });
          }}
        />
        <Select
          label="Accommodation"
          name="accommodation"
          value={value.accommodation}
          options={toOptions(ACCOMMODATION_PREFERENCES)}
          onChange={(event) => {
            const accommodation = pickOption(ACCOMMODATION_PREFERENCES, event.target.value);
            if (accommodation) update({ accommodation });
          }}
        />
      </div>

      <fieldset className="space-y-2">
        <legend className="text-sm font-medium text-foreground/90">Interests</legend>
        <div className="flex flex-wrap gap-2">
          {ACTIVITY_CATEGORIES.map((category) => {
            const selected = value.activities.includes(category);
            return (
              <button
                key={category}
                type="button"
                aria-pressed={selected}
                onClick={() => update({ activities: toggleItem(value.activities, category) })}
                className={cn(
                  "rounded-full border px-3 py-1.5 text-sm transition",
                  selected
                    ? "border-primary bg-primary/10 text-primary"
                    : "border-border text-muted hover:text-foreground"
                )}
              >
                {category}
              </button>
            );
          })}
        </div>
      </fieldset>

      <Input
        label="Travelers"
        type="number"
        name="travelers"
        min={1}
        max={20}
        value={value.travelers ?? 1}
        onChange={(event) => update({ travelers: Math.max(1, Number(event.target.value) || 1) })}
      />

      <TextArea
        label="Special requests"
        name="specialRequests"
        rows={3}
        placeholder="Accessibility needs, dietary restrictions, must-see places..."
        value={value.specialRequests ?? ""}
        onChange={(event) => update({ specialRequests: event.target.value || undefined })}
      />

      <Button type="submit" size="lg" className="w-full" loading={submitting}>
        Generate travel plan
      </Button>
    </form>
  );
}
