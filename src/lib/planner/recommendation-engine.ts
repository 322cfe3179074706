import type { TravelCatalog } from "@/lib/catalog";
import { addDays } from "@/lib/format";
import { defaultRandom, pickOne, randomInt, type RandomSource } from "@/lib/random";
import {
  FEATURE_KEYS,
  type AccommodationPlan,
  type Activity,
  type ActivityCategory,
  type ActivitySlot,
  type DailyPlan,
  type Destination,
  type FeatureKey,
  type RankedDestination,
  type ResolvedTripPreferences,
  type TimeOfDay,
  type TransportationMode,
  type TransportationPlan,
} from "@/types/travel";

const categoryFeature: Record<ActivityCategory, FeatureKey> = {
  "Cultural & Historical": "cultural",
  "Outdoor & Adventure": "outdoor",
  "Food & Culinary": "culinary",
  "Relaxation & Wellness": "relaxation",
  Shopping: "shopping",
  Entertainment: "entertainment",
  Sightseeing: "sightseeing",
};

const SLOT_BUDGET_SHARE: Record<TimeOfDay, number> = {
  morning: 0.3,
  afternoon: 0.4,
  evening: 0.3,
};

const ACCOMMODATION_BUDGET_SHARE = 0.35;
const LONG_HAUL_PROBABILITY = 0.7;
const TOP_CHOICES_PER_SLOT = 3;

export type DestinationQuery = Pick<ResolvedTripPreferences, "activities" | "budget" | "duration"> & {
  destination?: string;
};

export interface ActivityConstraints {
  timeOfDay?: TimeOfDay;
  maxCost?: number;
  maxResults?: number;
}

/**
 * Content-based scoring plus rule-based picks for transport, lodging and
 * daily activities.
 */
export class RecommendationEngine {
  constructor(
    private readonly catalog: TravelCatalog,
    private readonly random: RandomSource = defaultRandom
  ) {}

  createUserFeatureVector(preferences: Pick<DestinationQuery, "activities" | "budget" | "duration">) {
    const features: Record<FeatureKey, number> = {
      cultural: 0,
      outdoor: 0,
      culinary: 0,
      relaxation: 0,
      shopping: 0,
      entertainment: 0,
      sightseeing: 0,
    };

    const selectedCount = preferences.activities.length;
    for (const category of preferences.activities) {
      features[categoryFeature[category]] = 0.5 + (1 / selectedCount) * 0.5;
    }

    const dailyBudget = preferences.budget / Math.max(1, preferences.duration);
    return [...FEATURE_KEYS.map((key) => features[key]), resolveCostLevel(dailyBudget) / 5];
  }

  recommendDestinations(preferences: DestinationQuery): RankedDestination[] {
    if (preferences.destination) {
      const destination = this.catalog.getDestinationByName(preferences.destination);
      return [{ destination, similarity: 1 }];
    }

    const userVector = this.createUserFeatureVector(preferences);
    return this.catalog
      .listDestinations()
      .map((destination, index) => ({
        destination,
        index,
        similarity: cosineSimilarity(
          userVector,
          this.catalog.getDestinationFeatureVector(destination)
        ),
      }))
      .sort((a, b) => b.similarity - a.similarity || a.index - b.index)
      .map(({ destination, similarity }) => ({
        destination,
        similarity: Number(similarity.toFixed(4)),
      }));
  }

  recommendTransportation(preferences: ResolvedTripPreferences): TransportationPlan {
    const preferredMode = preferences.transportation ?? "Any";

    if (preferredMode !== "Any") {
      const transport = this.catalog.getTransportationByMode(preferredMode, this.random);
      const distanceKm = preferences.distanceKm ?? this.simulateDistanceForMode(preferredMode);
      return buildTransportationPlan(transport, distanceKm, preferences);
    }

    const distanceKm = preferences.distanceKm ?? this.simulateTripDistance();
    const mode = this.chooseModeForDistance(distanceKm);
    const transport = this.catalog.getTransportationByMode(mode, this.random);
    return buildTransportationPlan(transport, distanceKm, preferences);
  }

  recommendAccommodation(
    preferences: ResolvedTripPreferences,
    destinationId: number
  ): AccommodationPlan {
    const preferredType = preferences.accommodation ?? "Any";

    let candidates = this.catalog.getAccommodationsByDestinationAndType(destinationId, preferredType);
    if (candidates.length === 0) {
      candidates = this.catalog.getAccommodationsByDestination(destinationId);
    }

    if (candidates.length === 0) {
      return {
        id: null,
        name: "Local Accommodation",
        type: preferredType === "Any" ? "Hotel" : preferredType,
        costPerNight: 100,
        totalCost: 100 * preferences.duration,
        rating: 4.0,
        amenities: ["WiFi", "Breakfast"],
      };
    }

    const nightlyBudget = (preferences.budget / preferences.duration) * ACCOMMODATION_BUDGET_SHARE;
    const affordable = candidates.filter((item) => item.costPerNight <= nightlyBudget);

    const selected =
      affordable.length > 0
        ? [...affordable].sort((a, b) => b.rating - a.rating || a.costPerNight - b.costPerNight)[0]
        : [...candidates].sort((a, b) => a.costPerNight - b.costPerNight)[0];

    return {
      id: selected.id,
      name: selected.name,
      type: selected.type,
      costPerNight: selected.costPerNight,
      totalCost: roundMoney(selected.costPerNight * preferences.duration),
      rating: selected.rating,
      amenities: selected.amenities,
    };
  }

  recommendActivities(
    preferences: Pick<ResolvedTripPreferences, "activities">,
    destinationId: number,
    constraints: ActivityConstraints = {}
  ): Activity[] {
    const all = this.catalog.getActivitiesByDestination(destinationId);
    if (all.length === 0) {
      return [];
    }

    let matches = all;
    if (preferences.activities.length > 0) {
      const preferred = all.filter((activity) => preferences.activities.includes(activity.category));
      matches = preferred.length > 0 ? preferred : all;
    }

    const { timeOfDay, maxCost, maxResults = 10 } = constraints;
    if (timeOfDay) {
      matches = matches.filter((activity) => isSuitableFor(activity, timeOfDay));
    }
    if (maxCost !== undefined) {
      matches = matches.filter((activity) => activity.cost <= maxCost);
    }

    return [...matches]
      .sort((a, b) => b.popularity - a.popularity || a.cost - b.cost)
      .slice(0, maxResults);
  }

  recommendDailyPlan(
    preferences: ResolvedTripPreferences,
    destinationId: number,
    dayNumber: number,
    dailyBudget: number
  ): DailyPlan {
    const destination = this.catalog.getDestinationById(destinationId);
    const slotBudget = (slot: TimeOfDay) => dailyBudget * SLOT_BUDGET_SHARE[slot];

    const morning = this.pickSlot(preferences, destination, "morning", slotBudget("morning"), {
      description: `Explore the area near your accommodation in ${destination.name}.`,
      cost: 0,
    });
    const afternoon = this.pickSlot(preferences, destination, "afternoon", slotBudget("afternoon"), {
      description: `Enjoy local sights and culture in ${destination.name}.`,
      // priced off the morning share, not the afternoon one
      cost: slotBudget("morning") / 2,
    });
    const evening = this.pickSlot(preferences, destination, "evening", slotBudget("evening"), {
      description: `Dine at a local restaurant and experience ${destination.name}'s nightlife.`,
      cost: slotBudget("evening") / 2,
    });

    return {
      day: dayNumber,
      date: addDays(preferences.startDate, dayNumber - 1),
      title: this.resolveDayTitle(destination, dayNumber, preferences.duration, {
        morning,
        afternoon,
        evening,
      }),
      morning,
      afternoon,
      evening,
      totalCost: roundMoney(morning.cost + afternoon.cost + evening.cost),
    };
  }

  private pickSlot(
    preferences: ResolvedTripPreferences,
    destination: Destination,
    timeOfDay: TimeOfDay,
    budget: number,
    fallback: { description: string; cost: number }
  ): ActivitySlot {
    const options = this.recommendActivities(preferences, destination.id, {
      timeOfDay,
      maxCost: budget,
      maxResults: TOP_CHOICES_PER_SLOT,
    });

    if (options.length === 0) {
      return {
        activityId: null,
        name: null,
        category: null,
        description: fallback.description,
        cost: roundMoney(fallback.cost),
      };
    }

    const activity = pickOne(this.random, options);
    return {
      activityId: activity.id,
      name: activity.name,
      category: activity.category,
      description: activity.description,
      cost: activity.cost,
    };
  }

  private resolveDayTitle(
    destination: Destination,
    dayNumber: number,
    duration: number,
    slots: Record<TimeOfDay, ActivitySlot>
  ) {
    if (dayNumber === 1) {
      return `Welcome to ${destination.name}`;
    }
    if (dayNumber === duration) {
      return `Final Day in ${destination.name}`;
    }

    const keywords: string[] = [];
    if (mentions(slots.morning, ["cultural", "museum"])) {
      keywords.push("Cultural");
    }
    if (mentions(slots.afternoon, ["outdoor", "nature"])) {
      keywords.push("Outdoor");
    }
    if (mentions(slots.evening, ["food", "cuisine"])) {
      keywords.push("Culinary");
    }

    if (keywords.length > 0) {
      const keyword = pickOne(this.random, keywords);
      return `Day of ${keyword} Exploration in ${destination.name}`;
    }
    return `Exploring ${destination.name} - Day ${dayNumber}`;
  }

  private simulateDistanceForMode(mode: string) {
    if (mode === "Plane") {
      return randomInt(this.random, 500, 5000);
    }
    if (mode === "Train" || mode === "Bus" || mode === "Car") {
      return randomInt(this.random, 50, 800);
    }
    return randomInt(this.random, 50, 2000);
  }

  private simulateTripDistance() {
    if (this.random.next() < LONG_HAUL_PROBABILITY) {
      return randomInt(this.random, 1000, 8000);
    }
    return randomInt(this.random, 50, 800);
  }

  private chooseModeForDistance(distanceKm: number) {
    if (distanceKm > 1000) {
      return "Plane";
    }
    if (distanceKm > 300) {
      return pickOne(this.random, ["Plane", "Train", "Car"]);
    }
    return pickOne(this.random, ["Train", "Bus", "Car"]);
  }
}

export function resolveCostLevel(dailyBudget: number) {
  if (dailyBudget < 50) return 1;
  if (dailyBudget < 100) return 2;
  if (dailyBudget < 200) return 3;
  if (dailyBudget < 350) return 4;
  return 5;
}

export function cosineSimilarity(a: number[], b: number[]) {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function roundMoney(value: number) {
  return Math.round(value * 100) / 100;
}

function buildTransportationPlan(
  transport: TransportationMode,
  distanceKm: number,
  preferences: Pick<ResolvedTripPreferences, "origin" | "destination">
): TransportationPlan {
  return {
    mode: transport.mode,
    distanceKm,
    cost: roundMoney(distanceKm * transport.typicalCostPerKm),
    travelTimeHours: roundMoney(distanceKm / transport.speedKmH),
    details: `From ${preferences.origin} to ${preferences.destination} via ${transport.mode}`,
  };
}

function isSuitableFor(activity: Activity, timeOfDay: TimeOfDay) {
  if (timeOfDay === "morning") return activity.morningSuitable;
  if (timeOfDay === "afternoon") return activity.afternoonSuitable;
  return activity.eveningSuitable;
}

function mentions(slot: ActivitySlot, words: string[]) {
  const text = slot.description.toLowerCase();
  return words.some((word) => text.includes(word));
}
