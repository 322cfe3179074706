import { z } from "zod";
import { diffInDays, isIsoDate } from "@/lib/format";
import { PlanningError } from "@/lib/errors";
import type { TravelCatalog } from "@/lib/catalog";
import {
  ACCOMMODATION_PREFERENCES,
  ACTIVITY_CATEGORIES,
  TRANSPORTATION_PREFERENCES,
  type ResolvedTripPreferences,
  type TripPreferences,
} from "@/types/travel";

const isoDate = z.string().refine(isIsoDate, "Use the YYYY-MM-DD format");

export const tripPreferencesSchema = z.object({
  origin: z.string().trim().min(1, "Origin is required").max(100),
  destination: z.string().trim().min(1, "Destination is required").max(100),
  startDate: isoDate,
  endDate: isoDate,
  budget: z.number().positive("Budget must be positive").max(1_000_000),
  transportation: z.enum(TRANSPORTATION_PREFERENCES).default("Any"),
  accommodation: z.enum(ACCOMMODATION_PREFERENCES).default("Any"),
  activities: z.array(z.enum(ACTIVITY_CATEGORIES)).max(ACTIVITY_CATEGORIES.length),
  specialRequests: z.string().max(500).optional(),
  travelers: z.number().int().min(1).max(20).optional(),
  distanceKm: z.number().positive().max(40_000).optional(),
});

export type TripPreferencesInput = z.input<typeof tripPreferencesSchema>;

export const BUDGET_RANGE = { min: 500, max: 10_000, step: 100, default: 2_000 } as const;

/** Longest trip, in nights, that gets a day-by-day plan. */
export const MAX_TRIP_DURATION_DAYS = 60;

/**
 * Trip length in whole days between the two dates (the number of nights).
 */
export function calculateTripDuration(startDate: string, endDate: string) {
  return diffInDays(startDate, endDate);
}

export function resolvePreferences(
  preferences: TripPreferences,
  catalog?: TravelCatalog
): ResolvedTripPreferences {
  const duration = calculateTripDuration(preferences.startDate, preferences.endDate);
  if (!Number.isFinite(duration) || duration < 1) {
    throw new PlanningError("invalid_dates", "End date must be after start date");
  }
  if (duration > MAX_TRIP_DURATION_DAYS) {
    throw new PlanningError(
      "invalid_dates",
      `Trips can last at most ${MAX_TRIP_DURATION_DAYS} nights.`,
      { duration, maxDuration: MAX_TRIP_DURATION_DAYS }
    );
  }

  if (preferences.activities.length === 0) {
    throw new PlanningError(
      "missing_activities",
      "Please select at least one activity interest."
    );
  }

  if (!(preferences.budget > 0)) {
    throw new PlanningError("invalid_budget", "Budget must be a positive amount.");
  }

  let destination = preferences.destination;
  if (catalog) {
    const match = catalog.findDestination(preferences.destination);
    if (!match) {
      throw new PlanningError(
        "unknown_destination",
        `We don't have travel data for ${preferences.destination} yet.`,
        { available: catalog.listDestinationNames() }
      );
    }
    destination = match.name;
  }

  return {
    ...preferences,
    destination,
    duration,
    travelers: preferences.travelers ?? 1,
  };
}
