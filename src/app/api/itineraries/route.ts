import { NextRequest } from "next/server";
import { ok, handleApiError, parseJsonBody } from "@/lib/api-response";
import { getDefaultCatalog } from "@/lib/catalog";
import { summarizeExpenses } from "@/lib/planner/expenses";
import { ItineraryGenerator } from "@/lib/planner/itinerary-generator";
import { tripPreferencesSchema } from "@/lib/planner/preferences";
import { enforceRateLimit, resolveRateLimitNumber } from "@/lib/rate-limit";

const ITINERARY_RATE_LIMIT_WINDOW_MS = resolveRateLimitNumber(
  process.env.ITINERARY_RATE_LIMIT_WINDOW_MS,
  60_000
);
const ITINERARY_RATE_LIMIT_MAX = resolveRateLimitNumber(process.env.ITINERARY_RATE_LIMIT_MAX, 20);

export async function POST(request: NextRequest) {
  try {
    const rateLimitHeaders = enforceRateLimit(request, {
      bucket: "itinerary",
      windowMs: ITINERARY_RATE_LIMIT_WINDOW_MS,
      limit: ITINERARY_RATE_LIMIT_MAX,
      message: "Too many itineraries requested, please wait a moment.",
    });

    const preferences = await parseJsonBody(request, tripPreferencesSchema);
    const generator = new ItineraryGenerator(getDefaultCatalog());
    const itinerary = generator.generateItinerary(preferences);
    const expenses = summarizeExpenses(itinerary);

    if (process.env.NODE_ENV !== "production") {
      console.info("[planner] Itinerary generated", {
        destination: itinerary.destination.name,
        duration: itinerary.trip.duration,
        totalCost: expenses.totalCost,
      });
    }

    return ok({ itinerary, expenses }, { status: 200, headers: rateLimitHeaders });
  } catch (error) {
    return handleApiError(error);
  }
}
