import { describe, expect, it } from "vitest";
import { CatalogLookupError } from "@/lib/errors";
import {
  RecommendationEngine,
  cosineSimilarity,
  resolveCostLevel,
  roundMoney,
} from "@/lib/planner/recommendation-engine";
import type { ResolvedTripPreferences } from "@/types/travel";
import { EMPTY_TOWN, HARBOR_CITY, PALM_BAY, createTestCatalog } from "./utils/catalog";
import { sequenceRandom } from "./utils/random";

function preferences(overrides: Partial<ResolvedTripPreferences> = {}): ResolvedTripPreferences {
  return {
    origin: "Springfield",
    destination: HARBOR_CITY,
    startDate: "2026-05-04",
    endDate: "2026-05-07",
    duration: 3,
    budget: 1500,
    transportation: "Train",
    accommodation: "Any",
    activities: ["Cultural & Historical", "Food & Culinary"],
    travelers: 1,
    distanceKm: 400,
    ...overrides,
  };
}

describe("resolveCostLevel", () => {
  it("maps daily budgets onto five levels", () => {
    expect(resolveCostLevel(49.99)).toBe(1);
    expect(resolveCostLevel(50)).toBe(2);
    expect(resolveCostLevel(100)).toBe(3);
    expect(resolveCostLevel(200)).toBe(4);
    expect(resolveCostLevel(349)).toBe(4);
    expect(resolveCostLevel(350)).toBe(5);
  });
});

describe("cosineSimilarity", () => {
  it("returns 0 for orthogonal or zero vectors", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it("returns 1 for parallel vectors", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
  });
});

describe("roundMoney", () => {
  it("rounds to cents", () => {
    expect(roundMoney(0.4722)).toBe(0.47);
    expect(roundMoney(63.749)).toBe(63.75);
  });
});

describe("RecommendationEngine", () => {
  const catalog = createTestCatalog();

  describe("createUserFeatureVector", () => {
    it("weights a single interest fully and appends the cost level", () => {
      const engine = new RecommendationEngine(catalog);
      const vector = engine.createUserFeatureVector({
        activities: ["Cultural & Historical"],
        budget: 1000,
        duration: 5,
      });
      expect(vector).toEqual([1, 0, 0, 0, 0, 0, 0, 0.8]);
    });

    it("splits the weight between several interests", () => {
      const engine = new RecommendationEngine(catalog);
      const vector = engine.createUserFeatureVector({
        activities: ["Outdoor & Adventure", "Relaxation & Wellness"],
        budget: 700,
        duration: 7,
      });
      expect(vector).toEqual([0, 0.75, 0, 0.75, 0, 0, 0, 0.6]);
    });
  });

  describe("recommendDestinations", () => {
    it("ranks destinations by similarity to the interests", () => {
      const engine = new RecommendationEngine(catalog);
      const ranked = engine.recommendDestinations({
        activities: ["Outdoor & Adventure", "Relaxation & Wellness"],
        budget: 700,
        duration: 7,
      });

      expect(ranked.map((entry) => entry.destination.name)).toEqual([PALM_BAY, EMPTY_TOWN, HARBOR_CITY]);
      expect(ranked.map((entry) => entry.similarity)).toEqual([0.7799, 0.5336, 0.3179]);
    });

    it("returns only the named destination with similarity 1", () => {
      const engine = new RecommendationEngine(catalog);
      const ranked = engine.recommendDestinations({
        activities: ["Shopping"],
        budget: 1000,
        duration: 3,
        destination: "harbor city",
      });
      expect(ranked).toHaveLength(1);
      expect(ranked[0].destination.name).toBe(HARBOR_CITY);
      expect(ranked[0].similarity).toBe(1);
    });

    it("throws for an unknown named destination", () => {
      const engine = new RecommendationEngine(catalog);
      expect(() =>
        engine.recommendDestinations({ activities: [], budget: 100, duration: 1, destination: "Atlantis" })
      ).toThrow(CatalogLookupError);
    });
  });

  describe("recommendTransportation", () => {
    it("uses the preferred mode and given distance", () => {
      const engine = new RecommendationEngine(catalog, sequenceRandom([0.5]));
      expect(engine.recommendTransportation(preferences())).toEqual({
        mode: "Train",
        distanceKm: 400,
        cost: 40,
        travelTimeHours: 2,
        details: `From Springfield to ${HARBOR_CITY} via Train`,
      });
    });

    it("simulates a plane distance between 500 and 5000 km", () => {
      const engine = new RecommendationEngine(catalog, sequenceRandom([0]));
      const plan = engine.recommendTransportation(
        preferences({ transportation: "Plane", distanceKm: undefined })
      );
      expect(plan.distanceKm).toBe(500);
      expect(plan.cost).toBe(75);
      expect(plan.travelTimeHours).toBe(0.56);
    });

    it("flies when the distance is over 1000 km", () => {
      const engine = new RecommendationEngine(catalog, sequenceRandom([0.99]));
      const plan = engine.recommendTransportation(preferences({ transportation: "Any", distanceKm: 1200 }));
      expect(plan.mode).toBe("Plane");
      expect(plan.cost).toBe(180);
      expect(plan.travelTimeHours).toBe(1.33);
    });

    it("picks among plane, train and car for medium distances", () => {
      const engine = new RecommendationEngine(catalog, sequenceRandom([0.5]));
      const plan = engine.recommendTransportation(preferences({ transportation: "Any", distanceKm: 500 }));
      expect(plan.mode).toBe("Train");
      expect(plan.cost).toBe(50);
      expect(plan.travelTimeHours).toBe(2.5);
    });

    it("picks among train, bus and car for short distances", () => {
      const engine = new RecommendationEngine(catalog, sequenceRandom([0.4]));
      const plan = engine.recommendTransportation(preferences({ transportation: "Any", distanceKm: 200 }));
      expect(plan.mode).toBe("Bus");
      expect(plan.cost).toBe(10);
      expect(plan.travelTimeHours).toBe(2.5);
    });

    it("simulates a long-haul distance most of the time", () => {
      const engine = new RecommendationEngine(catalog, sequenceRandom([0.1, 0, 0.9]));
      const plan = engine.recommendTransportation(preferences({ transportation: "Any", distanceKm: undefined }));
      expect(plan.distanceKm).toBe(1000);
      expect(plan.mode).toBe("Car");
      expect(plan.cost).toBe(200);
      expect(plan.travelTimeHours).toBe(10);
    });

    it("simulates a regional distance otherwise", () => {
      const engine = new RecommendationEngine(catalog, sequenceRandom([0.8, 0.5, 0]));
      const plan = engine.recommendTransportation(preferences({ transportation: "Any", distanceKm: undefined }));
      expect(plan.distanceKm).toBe(425);
      expect(plan.mode).toBe("Plane");
      expect(plan.cost).toBe(63.75);
      expect(plan.travelTimeHours).toBe(0.47);
    });
  });

  describe("recommendAccommodation", () => {
    const engine = new RecommendationEngine(catalog);

    it("takes the best rated option within 35% of the daily budget", () => {
      expect(engine.recommendAccommodation(preferences(), 1)).toEqual({
        id: 2,
        name: "Mid-range Hotel Harbor",
        type: "Hotel",
        costPerNight: 120,
        totalCost: 360,
        rating: 4.2,
        amenities: ["WiFi", "Breakfast"],
      });
    });

    it("falls back to the cheapest option when nothing is affordable", () => {
      const plan = engine.recommendAccommodation(preferences({ budget: 60 }), 1);
      expect(plan.name).toBe("Budget Hostel Harbor");
      expect(plan.totalCost).toBe(90);
    });

    it("ignores the preferred type when the destination has none of it", () => {
      const plan = engine.recommendAccommodation(preferences({ accommodation: "Resort" }), 1);
      expect(plan.name).toBe("Mid-range Hotel Harbor");
    });

    it("invents a local stay when the destination has no accommodations", () => {
      expect(engine.recommendAccommodation(preferences({ accommodation: "Hostel" }), 3)).toEqual({
        id: null,
        name: "Local Accommodation",
        type: "Hostel",
        costPerNight: 100,
        totalCost: 300,
        rating: 4,
        amenities: ["WiFi", "Breakfast"],
      });
    });
  });

  describe("recommendActivities", () => {
    const engine = new RecommendationEngine(catalog);

    it("prefers the selected categories, most popular first", () => {
      const names = engine.recommendActivities(preferences(), 1).map((activity) => activity.name);
      expect(names).toEqual(["Art Museum Tour", "Street Food Crawl"]);
    });

    it("filters by time of day", () => {
      const names = engine
        .recommendActivities(preferences(), 1, { timeOfDay: "morning" })
        .map((activity) => activity.name);
      expect(names).toEqual(["Art Museum Tour"]);
    });

    it("uses every activity when none match the interests", () => {
      const names = engine
        .recommendActivities(preferences({ activities: ["Shopping"] }), 1, { maxCost: 25 })
        .map((activity) => activity.name);
      expect(names).toEqual(["Art Museum Tour", "Old Town Walk"]);
    });

    it("caps the result count", () => {
      const names = engine
        .recommendActivities(preferences({ activities: [] }), 1, { maxResults: 3 })
        .map((activity) => activity.name);
      expect(names).toEqual(["Art Museum Tour", "Street Food Crawl", "Harbor Kayak"]);
    });

    it("returns nothing for a destination without activities", () => {
      expect(engine.recommendActivities(preferences(), 3)).toEqual([]);
    });
  });

  describe("recommendDailyPlan", () => {
    it("welcomes the traveler on day one", () => {
      const engine = new RecommendationEngine(catalog, sequenceRandom([0]));
      const plan = engine.recommendDailyPlan(preferences(), 1, 1, 100);

      expect(plan.day).toBe(1);
      expect(plan.date).toBe("2026-05-04");
      expect(plan.title).toBe(`Welcome to ${HARBOR_CITY}`);
      expect(plan.morning.name).toBe("Art Museum Tour");
      expect(plan.afternoon.name).toBe("Art Museum Tour");
      expect(plan.evening.name).toBe("Street Food Crawl");
      expect(plan.totalCost).toBe(70);
    });

    it("names middle days after the activities they contain", () => {
      const random = sequenceRandom([0, 0, 0, 0.9]);
      const engine = new RecommendationEngine(catalog, random);
      const plan = engine.recommendDailyPlan(preferences(), 1, 2, 100);

      expect(plan.date).toBe("2026-05-05");
      expect(plan.title).toBe(`Day of Culinary Exploration in ${HARBOR_CITY}`);
      expect(random.calls()).toBe(4);
    });

    it("marks the last day", () => {
      const engine = new RecommendationEngine(catalog, sequenceRandom([0]));
      const plan = engine.recommendDailyPlan(preferences(), 1, 3, 100);
      expect(plan.title).toBe(`Final Day in ${HARBOR_CITY}`);
      expect(plan.date).toBe("2026-05-06");
    });

    it("falls back to free suggestions when nothing fits the budget", () => {
      const engine = new RecommendationEngine(catalog, sequenceRandom([0]));
      const plan = engine.recommendDailyPlan(preferences(), 1, 2, 10);

      expect(plan.morning).toEqual({
        activityId: null,
        name: null,
        category: null,
        description: `Explore the area near your accommodation in ${HARBOR_CITY}.`,
        cost: 0,
      });
      expect(plan.afternoon.cost).toBe(1.5);
      expect(plan.evening.description).toBe(
        `Dine at a local restaurant and experience ${HARBOR_CITY}'s nightlife.`
      );
      expect(plan.evening.cost).toBe(1.5);
      expect(plan.totalCost).toBe(3);
      expect(plan.title).toBe(`Exploring ${HARBOR_CITY} - Day 2`);
    });

    it("prices the afternoon fallback at half the morning budget", () => {
      const engine = new RecommendationEngine(catalog, sequenceRandom([0]));
      const plan = engine.recommendDailyPlan(preferences({ destination: EMPTY_TOWN }), 3, 2, 100);

      expect(plan.afternoon).toEqual({
        activityId: null,
        name: null,
        category: null,
        description: `Enjoy local sights and culture in ${EMPTY_TOWN}.`,
        cost: 15,
      });
      expect(plan.evening.cost).toBe(15);
      expect(plan.totalCost).toBe(30);
    });
  });
});
