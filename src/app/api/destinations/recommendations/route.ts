import { NextRequest } from "next/server";
import { z } from "zod";
import { ok, handleApiError, parseJsonBody } from "@/lib/api-response";
import { getDefaultCatalog } from "@/lib/catalog";
import { summarizeDestination } from "@/lib/destinations/filter";
import { PlanningError } from "@/lib/errors";
import { isIsoDate } from "@/lib/format";
import { calculateTripDuration } from "@/lib/planner/preferences";
import { RecommendationEngine } from "@/lib/planner/recommendation-engine";
import { ACTIVITY_CATEGORIES } from "@/types/travel";

const isoDate = z.string().refine(isIsoDate, "Use the YYYY-MM-DD format");

const recommendationSchema = z.object({
  activities: z.array(z.enum(ACTIVITY_CATEGORIES)).min(1, "Pick at least one interest"),
  budget: z.number().positive(),
  startDate: isoDate,
  endDate: isoDate,
  destination: z.string().trim().min(1).optional(),
  limit: z.number().int().min(1).max(10).default(5),
});

export async function POST(request: NextRequest) {
  try {
    const { activities, budget, startDate, endDate, destination, limit } = await parseJsonBody(
      request,
      recommendationSchema
    );

    const duration = calculateTripDuration(startDate, endDate);
    if (duration < 1) {
      throw new PlanningError("invalid_dates", "End date must be after start date");
    }

    const engine = new RecommendationEngine(getDefaultCatalog());
    const recommendations = engine
      .recommendDestinations({ activities, budget, duration, destination })
      .slice(0, limit)
      .map(({ destination: match, similarity }) => ({
        ...summarizeDestination(match),
        similarity,
      }));

    return ok({ recommendations, duration });
  } catch (error) {
    return handleApiError(error);
  }
}
