import destinationsData from "@/data/destinations.json";
import activitiesData from "@/data/activities.json";
import accommodationsData from "@/data/accommodations.json";
import transportationData from "@/data/transportation.json";
import { CatalogLookupError } from "@/lib/errors";
import { pickOne, type RandomSource, defaultRandom } from "@/lib/random";
import {
  FEATURE_KEYS,
  type Accommodation,
  type AccommodationPreference,
  type Activity,
  type ActivityCategory,
  type Destination,
  type TransportationMode,
} from "@/types/travel";
import { catalogDataSchema, type CatalogData } from "./schema";

/**
 * In-memory catalog of destinations, activities, accommodations and
 * transportation modes. Every getter hands out copies.
 */
export class TravelCatalog {
  private readonly destinations: Destination[];
  private readonly activities: Activity[];
  private readonly accommodations: Accommodation[];
  private readonly transportation: TransportationMode[];

  constructor(data: CatalogData) {
    this.destinations = data.destinations;
    this.activities = data.activities;
    this.accommodations = data.accommodations;
    this.transportation = data.transportation;
  }

  static fromUnknown(raw: unknown) {
    const parsed = catalogDataSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .slice(0, 5)
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join("; ");
      throw new CatalogLookupError("invalid_catalog_data", `Catalog data is invalid: ${issues}`, {
        cause: parsed.error,
      });
    }
    return new TravelCatalog(parsed.data);
  }

  listDestinations(): Destination[] {
    return this.destinations.map(cloneDestination);
  }

  listDestinationNames() {
    return this.destinations.map((destination) => destination.name);
  }

  listRegions() {
    return Array.from(new Set(this.destinations.map((destination) => destination.region)));
  }

  findDestination(name: string): Destination | undefined {
    const exact = this.destinations.find((destination) => destination.name === name);
    if (exact) {
      return cloneDestination(exact);
    }

    const needle = name.trim().toLowerCase();
    if (!needle) {
      return undefined;
    }
    const loose = this.destinations.find((destination) => {
      const fullName = destination.name.toLowerCase();
      const city = fullName.split(",")[0]?.trim();
      return fullName === needle || city === needle;
    });
    return loose ? cloneDestination(loose) : undefined;
  }

  getDestinationByName(name: string): Destination {
    const destination = this.findDestination(name);
    if (!destination) {
      throw new CatalogLookupError("destination_not_found", `Unknown destination: ${name}`);
    }
    return destination;
  }

  getDestinationById(destinationId: number): Destination {
    const destination = this.destinations.find((item) => item.id === destinationId);
    if (!destination) {
      throw new CatalogLookupError(
        "destination_not_found",
        `Unknown destination id: ${destinationId}`
      );
    }
    return cloneDestination(destination);
  }

  getActivitiesByDestination(destinationId: number): Activity[] {
    return this.activities
      .filter((activity) => activity.destinationId === destinationId)
      .map((activity) => ({ ...activity }));
  }

  getActivitiesByDestinationAndCategory(
    destinationId: number,
    category: ActivityCategory
  ): Activity[] {
    return this.getActivitiesByDestination(destinationId).filter(
      (activity) => activity.category === category
    );
  }

  getAccommodationsByDestination(destinationId: number): Accommodation[] {
    return this.accommodations
      .filter((accommodation) => accommodation.destinationId === destinationId)
      .map(cloneAccommodation);
  }

  getAccommodationsByDestinationAndType(
    destinationId: number,
    type: AccommodationPreference
  ): Accommodation[] {
    const all = this.getAccommodationsByDestination(destinationId);
    if (type === "Any") {
      return all;
    }
    return all.filter((accommodation) => accommodation.type === type);
  }

  getTransportationOptions(): TransportationMode[] {
    return this.transportation.map((mode) => ({ ...mode }));
  }

  getTransportationByMode(mode: string, random: RandomSource = defaultRandom): TransportationMode {
    if (mode === "Any") {
      return { ...pickOne(random, this.transportation) };
    }
    const match = this.transportation.find((item) => item.mode === mode);
    if (!match) {
      throw new CatalogLookupError("transportation_not_found", `Unknown transportation mode: ${mode}`);
    }
    return { ...match };
  }

  getDestinationFeatureVector(destination: Destination): number[] {
    return [...FEATURE_KEYS.map((key) => destination.features[key]), destination.costLevel / 5];
  }
}

function cloneDestination(destination: Destination): Destination {
  return {
    ...destination,
    features: { ...destination.features },
    bestSeasons: [...destination.bestSeasons],
    languages: [...destination.languages],
    localTransportation: [...destination.localTransportation],
    popularAttractions: [...destination.popularAttractions],
  };
}

function cloneAccommodation(accommodation: Accommodation): Accommodation {
  return {
    ...accommodation,
    amenities: [...accommodation.amenities],
    suitableFor: [...accommodation.suitableFor],
  };
}

let defaultCatalog: TravelCatalog | null = null;

export function getDefaultCatalog() {
  if (!defaultCatalog) {
    defaultCatalog = TravelCatalog.fromUnknown({
      destinations: destinationsData,
      activities: activitiesData,
      accommodations: accommodationsData,
      transportation: transportationData,
    });
  }
  return defaultCatalog;
}
