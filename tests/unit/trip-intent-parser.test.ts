import { describe, expect, it } from "vitest";
import { collectMissingFields, intentToPreferences, parseTripIntent } from "@/lib/trip-intent/parser";
import type { TripPreferences } from "@/types/travel";

const now = new Date("2026-01-15T12:00:00.000Z");

describe("parseTripIntent", () => {
  it("extracts every field from a detailed request", () => {
    const draft = parseTripIntent(
      "Flying from Boston to Tokyo on June 3 to June 10 with a budget of $3,000 for two adults and one kid. We love museums, sushi restaurants and hiking.",
      { now, source: "chat" }
    );

    expect(draft.source).toBe("chat");
    expect(draft.origin).toBe("Boston");
    expect(draft.destinations).toEqual(["Tokyo, Japan"]);
    expect(draft.unmatchedDestinations).toEqual([]);
    expect(draft.dateRange).toEqual({
      startDate: "2026-06-03",
      endDate: "2026-06-10",
      durationDays: 7,
      text: "2026-06-03 - 2026-06-10",
    });
    expect(draft.budget).toEqual({ amount: 3000, currency: "USD", text: "budget of $3,000" });
    expect(draft.travelParty).toEqual({
      adults: 2,
      kids: 1,
      total: 3,
      hasKids: true,
      description: "3 travelers / 2 adults, 1 kids",
    });
    expect(draft.preferences).toEqual(["Cultural & Historical", "Outdoor & Adventure", "Food & Culinary"]);
    expect(draft.transportation).toBe("Plane");
    expect(draft.accommodation).toBeUndefined();
    expect(draft.fieldConfidences).toEqual({
      destination: 0.85,
      date: 0.85,
      budget: 0.8,
      travelers: 0.85,
      preferences: 0.84,
    });
    expect(draft.confidence).toBeCloseTo(0.84, 2);
    expect(draft.createdAt).toBe("2026-01-15T12:00:00.000Z");
  });

  it("keeps places outside the catalog as unmatched", () => {
    const draft = parseTripIntent(
      "A 5-day solo trip to Lisbon next month, around 1.5k euros, staying in a hostel",
      { now }
    );

    expect(draft.source).toBe("text");
    expect(draft.destinations).toEqual([]);
    expect(draft.unmatchedDestinations).toEqual(["Lisbon"]);
    expect(draft.fieldConfidences.destination).toBe(0.4);
    expect(draft.dateRange).toEqual({ durationDays: 5, text: "5 days" });
    expect(draft.budget).toEqual({ amount: 1500, currency: "EUR", text: "1.5k euros" });
    expect(draft.travelParty).toEqual({ total: 1, description: "1 traveler" });
    expect(draft.accommodation).toBe("Hostel");
    expect(collectMissingFields(draft)).toEqual(["destination", "preferences"]);
  });

  it("rolls dates without a year past the previous date", () => {
    const draft = parseTripIntent("Paris from Dec 28 to Jan 4", {
      now: new Date("2026-10-19T12:00:00.000Z"),
    });

    expect(draft.origin).toBeUndefined();
    expect(draft.destinations).toEqual(["Paris, France"]);
    expect(draft.dateRange?.startDate).toBe("2026-12-28");
    expect(draft.dateRange?.endDate).toBe("2027-01-04");
    expect(draft.dateRange?.durationDays).toBe(7);
  });

  it("orders reversed ISO dates and reads family size", () => {
    const draft = parseTripIntent(
      "Trip to Bali 2026-08-01 to 2026-07-20, family of four who love the beach and spa",
      { now }
    );

    expect(draft.destinations).toEqual(["Bali, Indonesia"]);
    expect(draft.dateRange?.startDate).toBe("2026-07-20");
    expect(draft.dateRange?.endDate).toBe("2026-08-01");
    expect(draft.dateRange?.durationDays).toBe(12);
    expect(draft.travelParty).toEqual({ total: 4, hasKids: true, description: "4 travelers / includes kids" });
    expect(draft.fieldConfidences.travelers).toBe(0.7);
    expect(draft.preferences).toEqual(["Outdoor & Adventure", "Relaxation & Wellness"]);
  });

  it("rejects blank input", () => {
    expect(() => parseTripIntent("   ")).toThrow("Cannot parse an empty trip description.");
  });
});

describe("intentToPreferences", () => {
  const defaults: TripPreferences = {
    origin: "Springfield",
    destination: "Paris, France",
    startDate: "2026-03-01",
    endDate: "2026-03-08",
    budget: 2000,
    transportation: "Any",
    accommodation: "Any",
    activities: ["Sightseeing"],
    travelers: 2,
  };

  it("applies parsed fields and derives the end date from the duration", () => {
    const draft = parseTripIntent(
      "A 5-day solo trip to Lisbon next month, around 1.5k euros, staying in a hostel",
      { now }
    );

    expect(intentToPreferences(draft, defaults)).toEqual({
      ...defaults,
      endDate: "2026-03-06",
      budget: 1500,
      travelers: 1,
      accommodation: "Hostel",
    });
  });
});

describe("collectMissingFields", () => {
  it("lists every field an empty intent lacks", () => {
    expect(collectMissingFields({ destinations: [], preferences: [] })).toEqual([
      "destination",
      "date",
      "budget",
      "travelers",
      "preferences",
    ]);
  });
});
