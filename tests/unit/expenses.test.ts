import { describe, expect, it } from "vitest";
import { ItineraryGenerator } from "@/lib/planner/itinerary-generator";
import { summarizeExpenses } from "@/lib/planner/expenses";
import type { TripPreferences } from "@/types/travel";
import { HARBOR_CITY, createTestCatalog } from "./utils/catalog";
import { sequenceRandom } from "./utils/random";

const preferences: TripPreferences = {
  origin: "Springfield",
  destination: HARBOR_CITY,
  startDate: "2026-05-04",
  endDate: "2026-05-07",
  budget: 1500,
  transportation: "Train",
  accommodation: "Any",
  activities: ["Cultural & Historical", "Food & Culinary"],
  distanceKm: 400,
};

function generate(overrides: Partial<TripPreferences> = {}) {
  const generator = new ItineraryGenerator(createTestCatalog(), { random: sequenceRandom([0]) });
  return generator.generateItinerary({ ...preferences, ...overrides });
}

describe("summarizeExpenses", () => {
  it("totals the breakdown against the budget", () => {
    const summary = summarizeExpenses(generate());

    expect(summary.categories).toEqual([
      { category: "Transportation", amount: 40 },
      { category: "Accommodation", amount: 360 },
      { category: "Activities", amount: 210 },
      { category: "Food", amount: 440 },
      { category: "Miscellaneous", amount: 110 },
    ]);
    expect(summary.totalBudget).toBe(1500);
    expect(summary.totalCost).toBe(1160);
    expect(summary.remainingBudget).toBe(340);
    expect(summary.overBudget).toBe(false);
    expect(summary.overBy).toBe(0);
  });

  it("lists one line per slot between travel and food", () => {
    const { lineItems } = summarizeExpenses(generate());

    expect(lineItems).toHaveLength(13);
    expect(lineItems[0]).toEqual({
      category: "Transportation",
      description: `Train (Springfield to ${HARBOR_CITY})`,
      amount: 40,
    });
    expect(lineItems[1].description).toBe("Hotel - Mid-range Hotel Harbor (3 nights)");
    expect(lineItems[2]).toEqual({
      category: "Activities",
      description: "Day 1 - Morning: Guided cultural tour of the art museum",
      amount: 20,
    });
    expect(lineItems[12]).toEqual({
      category: "Miscellaneous",
      description: "Souvenirs, tips, unexpected expenses, etc.",
      amount: 110,
    });
  });

  it("flags an itinerary that costs more than the budget", () => {
    const summary = summarizeExpenses(generate({ budget: 300, transportation: "Plane", distanceKm: 5000 }));

    expect(summary.totalCost).toBe(888);
    expect(summary.remainingBudget).toBe(-588);
    expect(summary.overBudget).toBe(true);
    expect(summary.overBy).toBe(588);
    expect(summary.lineItems[2].description).toBe(
      "Day 1 - Morning: Explore the area near your accommodation in Harbor..."
    );
  });
});
