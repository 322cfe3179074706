import { z } from "zod";
import { ACTIVITY_CATEGORIES } from "@/types/travel";

const featureScore = z.number().min(0).max(1);

export const destinationSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  region: z.string().min(1),
  hemisphere: z.enum(["north", "south"]),
  costLevel: z.number().int().min(1).max(5),
  features: z.object({
    cultural: featureScore,
    outdoor: featureScore,
    culinary: featureScore,
    relaxation: featureScore,
    shopping: featureScore,
    entertainment: featureScore,
    sightseeing: featureScore,
  }),
  climate: z.enum(["temperate", "mediterranean", "tropical"]),
  bestSeasons: z.array(z.string().min(1)),
  avgDailyCost: z.number().nonnegative(),
  languages: z.array(z.string()),
  currency: z.string().length(3),
  description: z.string().min(1),
  localTransportation: z.array(z.string()),
  popularAttractions: z.array(z.string()),
});

export const activitySchema = z.object({
  id: z.number().int().positive(),
  destinationId: z.number().int().positive(),
  name: z.string().min(1),
  category: z.enum(ACTIVITY_CATEGORIES),
  description: z.string().min(1),
  durationHours: z.number().positive(),
  cost: z.number().nonnegative(),
  morningSuitable: z.boolean(),
  afternoonSuitable: z.boolean(),
  eveningSuitable: z.boolean(),
  popularity: z.number().min(0).max(1),
});

export const accommodationSchema = z.object({
  id: z.number().int().positive(),
  destinationId: z.number().int().positive(),
  name: z.string().min(1),
  type: z.enum(["Hotel", "Hostel", "Airbnb", "Resort"]),
  costPerNight: z.number().nonnegative(),
  rating: z.number().min(0).max(5),
  amenities: z.array(z.string()),
  suitableFor: z.array(z.string()),
  locationQuality: z.number().min(0).max(5),
});

export const transportationModeSchema = z.object({
  mode: z.string().min(1),
  typicalCostPerKm: z.number().nonnegative(),
  speedKmH: z.number().positive(),
  comfortLevel: z.number().int().min(1).max(5),
  ecoFriendliness: z.number().int().min(1).max(5),
  suitableDistanceMinKm: z.number().nonnegative(),
  suitableDistanceMaxKm: z.number().positive(),
});

export const catalogDataSchema = z.object({
  destinations: z.array(destinationSchema).min(1),
  activities: z.array(activitySchema),
  accommodations: z.array(accommodationSchema),
  transportation: z.array(transportationModeSchema).min(1),
});

export type CatalogData = z.infer<typeof catalogDataSchema>;
