import { addDays, diffInDays, isIsoDate } from "@/lib/format";
import { PlanningError } from "@/lib/errors";
import type { Destination } from "@/types/travel";
import { evaluateSeasonFit } from "./seasons";

export const MAX_SEARCH_WINDOW_DAYS = 366;

export type SeasonLabel = "Peak season" | "Shoulder season" | "Off season";

export interface TravelDateSuggestion {
  startDate: string;
  endDate: string;
  score: number;
  bestSeasonDays: number;
  totalDays: number;
  label: SeasonLabel;
}

export interface TravelDateQuery {
  destination: Pick<Destination, "bestSeasons" | "hemisphere">;
  durationDays: number;
  earliestStart: string;
  latestStart: string;
  maxResults?: number;
}

export function labelForScore(score: number): SeasonLabel {
  if (score >= 0.8) return "Peak season";
  if (score >= 0.4) return "Shoulder season";
  return "Off season";
}

function overlaps(a: TravelDateSuggestion, b: TravelDateSuggestion) {
  return a.startDate < b.endDate && b.startDate < a.endDate;
}

/**
 * Scores every start date in the window and keeps the best non-overlapping
 * trips, highest season share first.
 */
export function optimizeTravelDates(query: TravelDateQuery): TravelDateSuggestion[] {
  const { destination, durationDays, earliestStart, latestStart, maxResults = 3 } = query;

  if (!Number.isInteger(durationDays) || durationDays < 1) {
    throw new PlanningError("invalid_dates", "Trip duration must be at least one day.");
  }
  if (!isIsoDate(earliestStart) || !isIsoDate(latestStart)) {
    throw new PlanningError("invalid_window", "Search window dates must use YYYY-MM-DD.");
  }

  const windowDays = diffInDays(earliestStart, latestStart) + 1;
  if (windowDays < 1) {
    throw new PlanningError("invalid_window", "Latest start must not be before earliest start.");
  }
  if (windowDays > MAX_SEARCH_WINDOW_DAYS) {
    throw new PlanningError(
      "invalid_window",
      `Search window is limited to ${MAX_SEARCH_WINDOW_DAYS} days.`,
      { windowDays }
    );
  }

  const candidates = Array.from({ length: windowDays }, (_, offset) => {
    const startDate = addDays(earliestStart, offset);
    const endDate = addDays(startDate, durationDays);
    const fit = evaluateSeasonFit(destination, startDate, endDate);
    return {
      startDate,
      endDate,
      score: fit.score,
      bestSeasonDays: fit.bestSeasonDays,
      totalDays: fit.totalDays,
      label: labelForScore(fit.score),
    } satisfies TravelDateSuggestion;
  });

  candidates.sort((a, b) => b.score - a.score || a.startDate.localeCompare(b.startDate));

  const selected: TravelDateSuggestion[] = [];
  for (const candidate of candidates) {
    if (selected.length >= maxResults) break;
    if (selected.some((existing) => overlaps(existing, candidate))) continue;
    selected.push(candidate);
  }
  return selected;
}
