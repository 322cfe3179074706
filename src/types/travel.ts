export const ACTIVITY_CATEGORIES = [
  "Cultural & Historical",
  "Outdoor & Adventure",
  "Food & Culinary",
  "Relaxation & Wellness",
  "Shopping",
  "Entertainment",
  "Sightseeing",
] as const;

export type ActivityCategory = (typeof ACTIVITY_CATEGORIES)[number];

export const FEATURE_KEYS = [
  "cultural",
  "outdoor",
  "culinary",
  "relaxation",
  "shopping",
  "entertainment",
  "sightseeing",
] as const;

export type FeatureKey = (typeof FEATURE_KEYS)[number];

export type DestinationFeatures = Record<FeatureKey, number>;

export const TRANSPORTATION_PREFERENCES = ["Plane", "Train", "Bus", "Car", "Any"] as const;
export type TransportationPreference = (typeof TRANSPORTATION_PREFERENCES)[number];

export const ACCOMMODATION_PREFERENCES = ["Hotel", "Hostel", "Airbnb", "Resort", "Any"] as const;
export type AccommodationPreference = (typeof ACCOMMODATION_PREFERENCES)[number];
export type AccommodationType = Exclude<AccommodationPreference, "Any">;

export type Climate = "temperate" | "mediterranean" | "tropical";
export type Hemisphere = "north" | "south";
export type TimeOfDay = "morning" | "afternoon" | "evening";
export type Season = "spring" | "summer" | "fall" | "winter";

export interface Destination {
  id: number;
  name: string;
  region: string;
  hemisphere: Hemisphere;
  /** 1 = budget, 5 = luxury */
  costLevel: number;
  features: DestinationFeatures;
  climate: Climate;
  bestSeasons: string[];
  avgDailyCost: number;
  languages: string[];
  currency: string;
  description: string;
  localTransportation: string[];
  popularAttractions: string[];
}

export interface Activity {
  id: number;
  destinationId: number;
  name: string;
  category: ActivityCategory;
  description: string;
  durationHours: number;
  cost: number;
  morningSuitable: boolean;
  afternoonSuitable: boolean;
  eveningSuitable: boolean;
  popularity: number;
}

export interface Accommodation {
  id: number;
  destinationId: number;
  name: string;
  type: AccommodationType;
  costPerNight: number;
  rating: number;
  amenities: string[];
  suitableFor: string[];
  locationQuality: number;
}

export interface TransportationMode {
  mode: string;
  typicalCostPerKm: number;
  speedKmH: number;
  comfortLevel: number;
  ecoFriendliness: number;
  suitableDistanceMinKm: number;
  suitableDistanceMaxKm: number;
}

export interface TripPreferences {
  origin: string;
  destination: string;
  startDate: string;
  endDate: string;
  budget: number;
  transportation: TransportationPreference;
  accommodation: AccommodationPreference;
  activities: ActivityCategory[];
  specialRequests?: string;
  travelers?: number;
  distanceKm?: number;
}

/**
 * Preferences after validation: dates checked and the trip length resolved.
 */
export interface ResolvedTripPreferences extends TripPreferences {
  duration: number;
  travelers: number;
}

export interface RankedDestination {
  destination: Destination;
  similarity: number;
}

export interface TransportationPlan {
  mode: string;
  distanceKm: number;
  cost: number;
  travelTimeHours: number;
  details: string;
}

export interface AccommodationPlan {
  id: number | null;
  name: string;
  type: AccommodationType;
  costPerNight: number;
  totalCost: number;
  rating: number;
  amenities: string[];
}

export interface ActivitySlot {
  activityId: number | null;
  name: string | null;
  category: ActivityCategory | null;
  description: string;
  cost: number;
}

export interface DailyPlan {
  day: number;
  date: string;
  title: string;
  morning: ActivitySlot;
  afternoon: ActivitySlot;
  evening: ActivitySlot;
  totalCost: number;
}

export interface BudgetBreakdown {
  transportation: number;
  accommodation: number;
  activities: number;
  food: number;
  miscellaneous: number;
}

export interface SeasonFit {
  score: number;
  bestSeasonDays: number;
  totalDays: number;
  bestMonths: number[];
}

export interface Itinerary {
  destination: Destination;
  trip: {
    origin: string;
    startDate: string;
    endDate: string;
    duration: number;
    budget: number;
    travelers: number;
    activities: ActivityCategory[];
    specialRequests?: string;
  };
  transportation: TransportationPlan;
  accommodation: AccommodationPlan;
  dailyPlans: DailyPlan[];
  overview: string;
  budgetBreakdown: BudgetBreakdown;
  seasonFit: SeasonFit;
  generatedAt: string;
}
