import { describe, expect, it } from "vitest";
import {
  describeBestMonths,
  evaluateSeasonFit,
  monthSpan,
  resolveBestMonths,
  resolveSeasonLabel,
  seasonOf,
} from "@/lib/seasons";

describe("resolveSeasonLabel", () => {
  it("maps season names by hemisphere", () => {
    expect(resolveSeasonLabel("spring", "north")).toEqual([3, 4, 5]);
    expect(resolveSeasonLabel("Winter", "south")).toEqual([6, 7, 8]);
    expect(resolveSeasonLabel("autumn", "north")).toEqual([9, 10, 11]);
  });

  it("narrows early and late labels to one month", () => {
    expect(resolveSeasonLabel("Early spring", "south")).toEqual([9]);
    expect(resolveSeasonLabel("late fall", "north")).toEqual([11]);
  });

  it("reads explicit month ranges", () => {
    expect(resolveSeasonLabel("Dry season (May-Sep)", "south")).toEqual([5, 6, 7, 8, 9]);
    expect(resolveSeasonLabel("Cool season (November - February)", "north")).toEqual([11, 12, 1, 2]);
  });

  it("ignores labels it cannot place", () => {
    expect(resolveSeasonLabel("Year-round", "north")).toEqual([]);
  });
});

describe("month helpers", () => {
  it("wraps a span past December", () => {
    expect(monthSpan(11, 2)).toEqual([11, 12, 1, 2]);
    expect(monthSpan(4, 4)).toEqual([4]);
  });

  it("merges and sorts the best months", () => {
    expect(resolveBestMonths({ bestSeasons: ["fall", "spring", "late spring"], hemisphere: "north" })).toEqual([
      3, 4, 5, 9, 10, 11,
    ]);
  });

  it("describes months with short names", () => {
    expect(describeBestMonths([1, 12])).toBe("Jan, Dec");
    expect(describeBestMonths([])).toBe("Year-round");
  });

  it("finds the season of a date", () => {
    expect(seasonOf("2026-01-10", "north")).toBe("winter");
    expect(seasonOf("2026-01-10", "south")).toBe("summer");
    expect(seasonOf("2026-04-10", "south")).toBe("fall");
  });
});

describe("evaluateSeasonFit", () => {
  const harbor = { bestSeasons: ["spring", "fall"], hemisphere: "north" as const };

  it("counts the share of trip days in the best months", () => {
    expect(evaluateSeasonFit(harbor, "2026-05-30", "2026-06-02")).toEqual({
      score: 0.5,
      bestSeasonDays: 2,
      totalDays: 4,
      bestMonths: [3, 4, 5, 9, 10, 11],
    });
  });

  it("scores zero without best seasons", () => {
    expect(evaluateSeasonFit({ bestSeasons: [], hemisphere: "north" }, "2026-05-01", "2026-05-03")).toEqual({
      score: 0,
      bestSeasonDays: 0,
      totalDays: 3,
      bestMonths: [],
    });
  });
});
