import { calculateDateRange, monthName, monthOf } from "@/lib/format";
import type { Destination, Hemisphere, Season, SeasonFit } from "@/types/travel";

const MONTH_ABBREVIATIONS = [
  "jan",
  "feb",
  "mar",
  "apr",
  "may",
  "jun",
  "jul",
  "aug",
  "sep",
  "oct",
  "nov",
  "dec",
] as const;

const NORTHERN_SEASONS: Record<Season, number[]> = {
  spring: [3, 4, 5],
  summer: [6, 7, 8],
  fall: [9, 10, 11],
  winter: [12, 1, 2],
};

const rangePattern = /\(\s*([a-z]{3})[a-z]*\s*-\s*([a-z]{3})[a-z]*\s*\)/i;

function monthFromAbbreviation(value: string) {
  const index = MONTH_ABBREVIATIONS.findIndex((month) => month === value.toLowerCase());
  return index === -1 ? null : index + 1;
}

function shiftMonth(month: number, offset: number) {
  return ((month - 1 + offset + 12) % 12) + 1;
}

export function seasonMonths(season: Season, hemisphere: Hemisphere) {
  const months = NORTHERN_SEASONS[season];
  return hemisphere === "north" ? [...months] : months.map((month) => shiftMonth(month, 6));
}

/**
 * Inclusive month span, wrapping past December (`Nov-Feb` → 11, 12, 1, 2).
 */
export function monthSpan(from: number, to: number) {
  const months: number[] = [];
  let current = from;
  for (;;) {
    months.push(current);
    if (current === to) break;
    current = shiftMonth(current, 1);
  }
  return months;
}

function parseSeasonName(label: string): Season | null {
  if (label.includes("spring")) return "spring";
  if (label.includes("summer")) return "summer";
  if (label.includes("fall") || label.includes("autumn")) return "fall";
  if (label.includes("winter")) return "winter";
  return null;
}

export function resolveSeasonLabel(label: string, hemisphere: Hemisphere) {
  const range = rangePattern.exec(label);
  if (range) {
    const from = monthFromAbbreviation(range[1]);
    const to = monthFromAbbreviation(range[2]);
    if (from !== null && to !== null) {
      return monthSpan(from, to);
    }
  }

  const normalized = label.trim().toLowerCase();
  const season = parseSeasonName(normalized);
  if (!season) {
    return [];
  }

  const months = seasonMonths(season, hemisphere);
  if (normalized.startsWith("early")) return months.slice(0, 1);
  if (normalized.startsWith("late")) return months.slice(-1);
  return months;
}

export function resolveBestMonths(destination: Pick<Destination, "bestSeasons" | "hemisphere">) {
  const months = new Set<number>();
  for (const label of destination.bestSeasons) {
    for (const month of resolveSeasonLabel(label, destination.hemisphere)) {
      months.add(month);
    }
  }
  return [...months].sort((a, b) => a - b);
}

export function seasonOf(isoDate: string, hemisphere: Hemisphere): Season {
  const month = monthOf(isoDate);
  const seasons: Season[] = ["spring", "summer", "fall", "winter"];
  const match = seasons.find((season) => seasonMonths(season, hemisphere).includes(month));
  return match ?? "winter";
}

export function describeBestMonths(months: number[]) {
  if (months.length === 0) {
    return "Year-round";
  }
  return months.map((month) => monthName(month).slice(0, 3)).join(", ");
}

export function evaluateSeasonFit(
  destination: Pick<Destination, "bestSeasons" | "hemisphere">,
  startDate: string,
  endDate: string
): SeasonFit {
  const bestMonths = resolveBestMonths(destination);
  const dates = calculateDateRange(startDate, endDate);
  const bestSeasonDays = dates.filter((date) => bestMonths.includes(monthOf(date))).length;
  const score =
    bestMonths.length === 0 || dates.length === 0
      ? 0
      : Number((bestSeasonDays / dates.length).toFixed(3));

  return {
    score,
    bestSeasonDays,
    totalDays: dates.length,
    bestMonths,
  };
}
