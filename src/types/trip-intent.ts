import type {
  AccommodationPreference,
  ActivityCategory,
  TransportationPreference,
} from "@/types/travel";

export type TripIntentSource = "text" | "chat";

export type TripIntentFieldKey = "destination" | "date" | "budget" | "travelers" | "preferences";

export interface TripIntentBudget {
  amount: number;
  currency: string;
  text?: string;
}

export interface TripIntentDateRange {
  startDate?: string;
  endDate?: string;
  durationDays?: number;
  text?: string;
}

export interface TripIntentTravelParty {
  total?: number;
  adults?: number;
  kids?: number;
  hasKids?: boolean;
  description?: string;
}

export interface TripIntentDraft {
  id: string;
  source: TripIntentSource;
  rawInput: string;
  /** Catalog destination names, in the order they appear in the text. */
  destinations: string[];
  /** Places the user named that the catalog does not cover. */
  unmatchedDestinations: string[];
  origin?: string;
  dateRange?: TripIntentDateRange;
  budget?: TripIntentBudget;
  travelParty?: TripIntentTravelParty;
  preferences: ActivityCategory[];
  transportation?: Exclude<TransportationPreference, "Any">;
  accommodation?: Exclude<AccommodationPreference, "Any">;
  confidence: number;
  fieldConfidences: Partial<Record<TripIntentFieldKey, number>>;
  createdAt: string;
}
