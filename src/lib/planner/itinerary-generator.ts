import type { TravelCatalog } from "@/lib/catalog";
import { formatLongDate } from "@/lib/format";
import { defaultRandom, pickOne, sampleItems, type RandomSource } from "@/lib/random";
import { evaluateSeasonFit } from "@/lib/seasons";
import type {
  AccommodationPlan,
  DailyPlan,
  Destination,
  Itinerary,
  ResolvedTripPreferences,
  TransportationPlan,
  TripPreferences,
} from "@/types/travel";
import { resolvePreferences } from "./preferences";
import { RecommendationEngine, roundMoney } from "./recommendation-engine";

const FALLBACK_ACTIVITY_SHARE = 0.2;
const FOOD_SHARE = 0.4;
const MISC_SHARE = 0.1;
const HIGHLIGHT_COUNT = 3;

interface ItineraryGeneratorOptions {
  engine?: RecommendationEngine;
  random?: RandomSource;
  now?: () => Date;
}

export class ItineraryGenerator {
  private readonly engine: RecommendationEngine;
  private readonly random: RandomSource;
  private readonly now: () => Date;

  constructor(
    private readonly catalog: TravelCatalog,
    options: ItineraryGeneratorOptions = {}
  ) {
    this.random = options.random ?? defaultRandom;
    this.engine = options.engine ?? new RecommendationEngine(catalog, this.random);
    this.now = options.now ?? (() => new Date());
  }

  generateItinerary(input: TripPreferences): Itinerary {
    const preferences = resolvePreferences(input, this.catalog);
    const destination = this.catalog.getDestinationByName(preferences.destination);

    const transportation = this.engine.recommendTransportation(preferences);
    const accommodation = this.engine.recommendAccommodation(preferences, destination.id);

    let remainingBudget = preferences.budget - transportation.cost - accommodation.totalCost;
    if (remainingBudget < 0) {
      remainingBudget = preferences.budget * FALLBACK_ACTIVITY_SHARE;
    }

    const dailyActivityBudget = remainingBudget / preferences.duration;
    const dailyPlans = Array.from({ length: preferences.duration }, (_, index) =>
      this.engine.recommendDailyPlan(preferences, destination.id, index + 1, dailyActivityBudget)
    );

    const activitiesCost = roundMoney(dailyPlans.reduce((sum, plan) => sum + plan.totalCost, 0));

    const overview = this.composeOverview(
      preferences,
      destination,
      transportation,
      accommodation,
      dailyPlans
    );

    return {
      destination,
      trip: {
        origin: preferences.origin,
        startDate: preferences.startDate,
        endDate: preferences.endDate,
        duration: preferences.duration,
        budget: preferences.budget,
        travelers: preferences.travelers,
        activities: preferences.activities,
        specialRequests: preferences.specialRequests,
      },
      transportation,
      accommodation,
      dailyPlans,
      overview,
      budgetBreakdown: {
        transportation: transportation.cost,
        accommodation: accommodation.totalCost,
        activities: activitiesCost,
        food: roundMoney(remainingBudget * FOOD_SHARE),
        miscellaneous: roundMoney(remainingBudget * MISC_SHARE),
      },
      seasonFit: evaluateSeasonFit(destination, preferences.startDate, preferences.endDate),
      generatedAt: this.now().toISOString(),
    };
  }

  private composeOverview(
    preferences: ResolvedTripPreferences,
    destination: Destination,
    transportation: TransportationPlan,
    accommodation: AccommodationPlan,
    dailyPlans: DailyPlan[]
  ) {
    const { duration } = preferences;
    const name = destination.name;

    const intro = pickOne(this.random, [
      `Get ready for an amazing ${duration}-day adventure in ${name}!`,
      `Your ${duration}-day journey to beautiful ${name} awaits!`,
      `Prepare for an unforgettable ${duration}-day experience in ${name}!`,
    ]);

    const transportLine = `You'll travel from ${preferences.origin} to ${name} by ${transportation.mode.toLowerCase()}.`;
    const stayLine = `During your stay, you'll be enjoying the comfort of a ${accommodation.type.toLowerCase()} accommodation at ${accommodation.name}.`;

    const descriptions = dailyPlans.flatMap((plan) => [
      plan.morning.description,
      plan.afternoon.description,
      plan.evening.description,
    ]);
    const highlights =
      descriptions.length > 0
        ? `Some highlights of your trip include: ${sampleItems(this.random, descriptions, HIGHLIGHT_COUNT).join("; ")}`
        : `You'll have plenty of time to explore the best of ${name}.`;

    return [
      intro,
      `From ${formatLongDate(preferences.startDate)} to ${formatLongDate(preferences.endDate)}, you'll be exploring ${name}. ${transportLine} ${stayLine}`,
      highlights,
      `${name} is known for ${destination.description}`,
    ].join("\n\n");
  }
}
