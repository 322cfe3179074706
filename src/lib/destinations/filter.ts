import { z } from "zod";
import type { TravelCatalog } from "@/lib/catalog";
import { describeBestMonths, resolveBestMonths } from "@/lib/seasons";
import {
  ACTIVITY_CATEGORIES,
  FEATURE_KEYS,
  type ActivityCategory,
  type Climate,
  type Destination,
  type FeatureKey,
} from "@/types/travel";

export const INTEREST_THRESHOLD = 0.7;

const interestFeature: Record<ActivityCategory, FeatureKey> = {
  "Cultural & Historical": "cultural",
  "Outdoor & Adventure": "outdoor",
  "Food & Culinary": "culinary",
  "Relaxation & Wellness": "relaxation",
  Shopping: "shopping",
  Entertainment: "entertainment",
  Sightseeing: "sightseeing",
};

export const destinationFilterSchema = z.object({
  query: z.string().trim().max(100).optional(),
  regions: z.array(z.string().trim().min(1)).optional(),
  climates: z.array(z.enum(["temperate", "mediterranean", "tropical"])).optional(),
  maxCostLevel: z.number().int().min(1).max(5).optional(),
  maxDailyCost: z.number().positive().optional(),
  interests: z.array(z.enum(ACTIVITY_CATEGORIES)).optional(),
  travelMonth: z.number().int().min(1).max(12).optional(),
});

export type DestinationFilter = z.infer<typeof destinationFilterSchema>;

export interface DestinationSummary {
  id: number;
  name: string;
  region: string;
  climate: Climate;
  costLevel: number;
  avgDailyCost: number;
  currency: string;
  description: string;
  topFeatures: FeatureKey[];
  bestMonths: number[];
  bestTimeToVisit: string;
  popularAttractions: string[];
}

export function filterDestinations(catalog: TravelCatalog, criteria: DestinationFilter = {}) {
  const query = criteria.query?.toLowerCase();
  const regions = criteria.regions?.map((region) => region.toLowerCase());

  return catalog.listDestinations().filter((destination) => {
    if (
      query &&
      !destination.name.toLowerCase().includes(query) &&
      !destination.description.toLowerCase().includes(query)
    ) {
      return false;
    }
    if (regions?.length && !regions.includes(destination.region.toLowerCase())) {
      return false;
    }
    if (criteria.climates?.length && !criteria.climates.includes(destination.climate)) {
      return false;
    }
    if (criteria.maxCostLevel !== undefined && destination.costLevel > criteria.maxCostLevel) {
      return false;
    }
    if (criteria.maxDailyCost !== undefined && destination.avgDailyCost > criteria.maxDailyCost) {
      return false;
    }
    if (
      criteria.interests?.some(
        (interest) => destination.features[interestFeature[interest]] < INTEREST_THRESHOLD
      )
    ) {
      return false;
    }
    if (
      criteria.travelMonth !== undefined &&
      !resolveBestMonths(destination).includes(criteria.travelMonth)
    ) {
      return false;
    }
    return true;
  });
}

export function summarizeDestination(destination: Destination, topCount = 3): DestinationSummary {
  const topFeatures = FEATURE_KEYS.map((key, index) => ({ key, index, score: destination.features[key] }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, topCount)
    .map((entry) => entry.key);
  const bestMonths = resolveBestMonths(destination);

  return {
    id: destination.id,
    name: destination.name,
    region: destination.region,
    climate: destination.climate,
    costLevel: destination.costLevel,
    avgDailyCost: destination.avgDailyCost,
    currency: destination.currency,
    description: destination.description,
    topFeatures,
    bestMonths,
    bestTimeToVisit: describeBestMonths(bestMonths),
    popularAttractions: destination.popularAttractions,
  };
}
